// Named command execution and telemetry reads on top of the gateway

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import { toSigned16 } from "../decoder.ts";
import {
  CommandEncodingError,
  type ModbusError,
  UnknownCommandError,
  UnknownTelemetryError,
} from "../errors.ts";
import type { RegisterGateway } from "../gateway/index.ts";
import { type Logger, silentLogger } from "../logging/index.ts";
import type { Catalog, RegisterCommand, TelemetryPoint } from "./schema.ts";

/**
 * Convert an engineering value to the raw register word.
 *
 * `round(value * multiplier)`, then negative results wrap by the command's
 * `maxRegisterValue` when it has one. A word outside 0..65535 is an error.
 *
 * @example
 * ```typescript
 * encodeCommandValue(torque, -50); // 65536 + round(-50 * 40.46) = 63513
 * ```
 */
export function encodeCommandValue(
  command: RegisterCommand,
  value: number,
): Result<number, CommandEncodingError> {
  let encoded = Math.round(value * command.multiplier);
  if (command.maxRegisterValue !== undefined && encoded < 0) {
    encoded += command.maxRegisterValue;
  }
  if (!Number.isInteger(encoded) || encoded < 0 || encoded > 0xffff) {
    return createErr(new CommandEncodingError(command.name, encoded));
  }
  return createOk(encoded);
}

/** Scale a raw word read from `point` into engineering units. */
export function decodeTelemetryValue(
  point: TelemetryPoint,
  raw: number,
): number {
  const word = point.signed ? toSigned16(raw) : raw & 0xffff;
  return word * point.multiplier;
}

export interface CommandCatalogOptions {
  logger?: Logger;
}

/**
 * Command and telemetry access by name.
 *
 * Every method returns a Result except {@link readTelemetry}, which keeps
 * the controller's silent-zero convention for display values.
 */
export class CommandCatalog {
  readonly #gateway: RegisterGateway;
  readonly #catalog: Catalog;
  readonly #logger: Logger;

  constructor(
    gateway: RegisterGateway,
    catalog: Catalog,
    options: CommandCatalogOptions = {},
  ) {
    this.#gateway = gateway;
    this.#catalog = catalog;
    this.#logger = (options.logger ?? silentLogger).child("CommandCatalog");
  }

  get definitions(): Catalog {
    return this.#catalog;
  }

  getCommand(name: string): RegisterCommand | undefined {
    return this.#catalog.commands.get(name);
  }

  getTelemetryPoint(name: string): TelemetryPoint | undefined {
    return this.#catalog.telemetry.get(name);
  }

  /**
   * Encode `value` and write it to the command's register.
   * Resolves with the encoded word that was written.
   */
  async execute(
    name: string,
    value: number,
  ): Promise<Result<number, ModbusError>> {
    const command = this.#catalog.commands.get(name);
    if (!command) {
      this.#logger.error(`Unknown command: ${name}`);
      return createErr(new UnknownCommandError(name));
    }
    const encoded = encodeCommandValue(command, value);
    if (isErr(encoded)) {
      const error = unwrapErr(encoded);
      this.#logger.error(error.message);
      return createErr(error);
    }
    const word = unwrapOk(encoded);
    const written = await this.#gateway.writeRegister(command.address, word);
    if (isErr(written)) {
      const error = unwrapErr(written);
      this.#logger.warn(`Error executing ${name}: ${error.message}`);
      return createErr(error);
    }
    this.#logger.debug(
      `Executed ${name}=${value} (register ${command.address} <- ${word})`,
    );
    return createOk(word);
  }

  /** Unscaled, unsigned register word of a telemetry point. */
  async readRaw(name: string): Promise<Result<number, ModbusError>> {
    const point = this.#catalog.telemetry.get(name);
    if (!point) {
      return createErr(new UnknownTelemetryError(name));
    }
    return this.#gateway.readRegister(point.address);
  }

  /** Scaled telemetry value, or the error that prevented reading it. */
  async readTelemetryResult(
    name: string,
  ): Promise<Result<number, ModbusError>> {
    const point = this.#catalog.telemetry.get(name);
    if (!point) {
      return createErr(new UnknownTelemetryError(name));
    }
    const raw = await this.#gateway.readRegister(point.address);
    if (isErr(raw)) {
      return createErr(unwrapErr(raw));
    }
    return createOk(decodeTelemetryValue(point, unwrapOk(raw)));
  }

  /** Scaled telemetry value; `0` when the name is unknown or the read fails. */
  async readTelemetry(name: string): Promise<number> {
    const result = await this.readTelemetryResult(name);
    if (isErr(result)) {
      this.#logger.error(`Error reading ${name}: ${unwrapErr(result).message}`);
      return 0;
    }
    return unwrapOk(result);
  }
}
