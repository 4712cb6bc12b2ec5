// Catalog file format and loader
// The JSON is validated once at load; everything downstream sees frozen Maps

import { readFileSync } from "node:fs";
import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import { z } from "zod";
import type { BitDescriptions, FaultTables } from "../decoder.ts";
import { ConfigurationError, describeError } from "../errors.ts";

/** A writable holding register with its engineering-unit scaling. */
export interface RegisterCommand {
  readonly name: string;
  readonly address: number;
  readonly multiplier: number;
  /** Added to negative encoded values (two's-complement wrap). */
  readonly maxRegisterValue?: number;
}

/** A readable holding register with its engineering-unit scaling. */
export interface TelemetryPoint {
  readonly name: string;
  readonly address: number;
  readonly multiplier: number;
  /** Interpret the raw word as int16 before scaling. */
  readonly signed: boolean;
}

export interface Catalog {
  readonly commands: ReadonlyMap<string, RegisterCommand>;
  readonly telemetry: ReadonlyMap<string, TelemetryPoint>;
  readonly faultTables: FaultTables;
}

const address = z.number().int().min(0).max(0xffff);

const commandSchema = z.object({
  address,
  maxRegisterValue: z.number().int().positive().optional(),
  multiplier: z.number().positive().default(1),
});

const telemetrySchema = z.object({
  address,
  multiplier: z.number().positive().default(1),
  signed: z.boolean().default(false),
});

const bitTableSchema = z.record(
  z.string().regex(/^(?:[0-9]|1[0-5])$/, "bit keys must be 0..15"),
  z.string().min(1),
);

export const catalogSchema = z.object({
  commands: z.record(z.string().min(1), commandSchema),
  faultTables: z.object({
    faults: bitTableSchema,
    faults2: bitTableSchema,
    warnings: bitTableSchema,
    warnings2: bitTableSchema,
  }),
  telemetry: z.record(z.string().min(1), telemetrySchema),
});

export type CatalogFile = z.input<typeof catalogSchema>;

const DEFAULT_CATALOG_URL = new URL("./motor-controller.json", import.meta.url);

function toBitDescriptions(table: Record<string, string>): BitDescriptions {
  return new Map(
    Object.entries(table).map(([bit, text]) => [Number(bit), text] as const),
  );
}

/** Validate raw catalog data. */
export function parseCatalog(
  input: unknown,
): Result<Catalog, ConfigurationError> {
  const parsed = catalogSchema.safeParse(input);
  if (!parsed.success) {
    return createErr(
      new ConfigurationError(
        "Invalid register catalog",
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`,
        ),
      ),
    );
  }
  const data = parsed.data;
  const commands = new Map<string, RegisterCommand>(
    Object.entries(data.commands).map(([name, command]) => [
      name,
      Object.freeze({ name, ...command }),
    ]),
  );
  const telemetry = new Map<string, TelemetryPoint>(
    Object.entries(data.telemetry).map(([name, point]) => [
      name,
      Object.freeze({ name, ...point }),
    ]),
  );
  return createOk(
    Object.freeze({
      commands,
      faultTables: {
        faults: toBitDescriptions(data.faultTables.faults),
        faults2: toBitDescriptions(data.faultTables.faults2),
        warnings: toBitDescriptions(data.faultTables.warnings),
        warnings2: toBitDescriptions(data.faultTables.warnings2),
      },
      telemetry,
    }),
  );
}

/**
 * Load and validate the catalog JSON. Defaults to the bundled
 * `motor-controller.json`.
 *
 * @throws ConfigurationError when the file is unreadable or invalid
 */
export function loadCatalog(path?: string): Catalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path ?? DEFAULT_CATALOG_URL, "utf8"));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read register catalog ${path ?? DEFAULT_CATALOG_URL.pathname}`,
      [describeError(error)],
    );
  }
  const result = parseCatalog(raw);
  if (isErr(result)) {
    throw unwrapErr(result);
  }
  return unwrapOk(result);
}
