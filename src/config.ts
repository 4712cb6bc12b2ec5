// Controller configuration: schema, defaults and loading
// Parsed once at start-up and passed down; nothing reads it globally

import { readFileSync } from "node:fs";
import { homedir, platform } from "node:os";
import { join } from "node:path";
import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import { z } from "zod";
import { ConfigurationError, describeError } from "./errors.ts";

/** Default serial device for the host platform. */
export function defaultSerialPath(host: NodeJS.Platform = platform()): string {
  return host === "win32" ? "COM3" : "/dev/ttyUSB0";
}

const positiveInt = z.number().int().positive();
const nonNegative = z.number().nonnegative();

const serialSchema = z.object({
  baudRate: positiveInt.default(115200),
  dataBits: z.union([z.literal(7), z.literal(8)]).default(8),
  parity: z.enum(["none", "even", "odd"]).default("none"),
  path: z.string().min(1).default(defaultSerialPath()),
  slaveId: z.number().int().min(1).max(247).default(1),
  stopBits: z.union([z.literal(1), z.literal(2)]).default(1),
  timeoutMs: positiveInt.default(1000),
});

const retrySchema = (maxAttempts: number, delayMs: number) =>
  z.object({
    delayMs: nonNegative.default(delayMs),
    /** Double the delay after every failed attempt. */
    exponentialBackoff: z.boolean().default(false),
    maxAttempts: positiveInt.default(maxAttempts),
  });

export const recoveryStageSchema = z.object({
  attempts: positiveInt,
  intervalSeconds: positiveInt,
});

export type RecoveryStage = z.infer<typeof recoveryStageSchema>;

/** Escalating recovery stages: 5 attempts each at 1, 5, 15 and 30 minutes. */
export const DEFAULT_RECOVERY_STAGES: readonly RecoveryStage[] = [
  { attempts: 5, intervalSeconds: 60 },
  { attempts: 5, intervalSeconds: 300 },
  { attempts: 5, intervalSeconds: 900 },
  { attempts: 5, intervalSeconds: 1800 },
];

const recoverySchema = z.object({
  checkChunkSeconds: positiveInt.default(60),
  errorBackoffSeconds: nonNegative.default(60),
  initialWaitSeconds: z.number().int().nonnegative().default(10),
  settleDelayMs: nonNegative.default(500),
  stages: z
    .array(recoveryStageSchema)
    .min(1)
    .default(DEFAULT_RECOVERY_STAGES.map((stage) => ({ ...stage }))),
});

const monitorSchema = z.object({
  errorBackoffMs: nonNegative.default(5000),
  pollIntervalMs: positiveInt.default(1000),
  resumeDelayMs: nonNegative.default(100),
});

const verificationSchema = z.object({
  /** Forward segment is verified above this rpm. */
  forwardMinRpm: nonNegative.default(10),
  maxChecks: positiveInt.default(5),
  /** Torque factor after a direction mismatch. */
  mismatchTorqueFactor: z.number().positive().default(1.2),
  /** Reverse segment is verified below this |rpm| (clutch holding). */
  reverseHoldRpm: nonNegative.default(5),
  /** |rpm| above this under reverse torque means the clutch slipped. */
  reverseSlipRpm: nonNegative.default(10),
  /** Torque factor after all checks fail to verify rotation. */
  unverifiedTorqueFactor: z.number().positive().default(1.5),
});

export type VerificationThresholds = z.infer<typeof verificationSchema>;

const startupSchema = z.object({
  batteryCurrentLimit: nonNegative.default(75),
  regenBatteryCurrentLimit: nonNegative.default(48),
  speedRegulatorMode: z.number().int().nonnegative().default(2),
});

const cycleSchema = z.object({
  commandSettleMs: nonNegative.default(100),
  startup: startupSchema.default({}),
  tickMs: positiveInt.default(10),
  transitionPauseMs: nonNegative.default(200),
  verification: verificationSchema.default({}),
});

const filesSchema = z.object({
  activityLog: z.string().min(1).optional(),
  cycleLog: z
    .string()
    .min(1)
    .default(join(homedir(), "one_way_clutch_data", "data", "No_of_cycles.txt")),
});

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const controllerConfigSchema = z.object({
  catalogPath: z.string().min(1).optional(),
  connection: retrySchema(3, 2000).default({}),
  cycle: cycleSchema.default({}),
  files: filesSchema.default({}),
  logging: z.object({ level: logLevelSchema.default("info") }).default({}),
  monitor: monitorSchema.default({}),
  recovery: recoverySchema.default({}),
  retry: retrySchema(3, 1000).default({}),
  serial: serialSchema.default({}),
});

export type ControllerConfig = z.infer<typeof controllerConfigSchema>;
export type ControllerConfigInput = z.input<typeof controllerConfigSchema>;
export type RetryPolicy = ControllerConfig["retry"];
export type RecoveryConfig = ControllerConfig["recovery"];
export type MonitorConfig = ControllerConfig["monitor"];
export type CycleConfig = ControllerConfig["cycle"];

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join(".")}: ${issue.message}`
      : issue.message,
  );
}

/** Validate a configuration object, filling in defaults. */
export function parseConfig(
  input: unknown = {},
): Result<ControllerConfig, ConfigurationError> {
  const parsed = controllerConfigSchema.safeParse(input);
  if (!parsed.success) {
    return createErr(
      new ConfigurationError("Invalid configuration", formatIssues(parsed.error)),
    );
  }
  return createOk(parsed.data);
}

/**
 * Build the configuration from an optional JSON file plus overrides.
 * Overrides are merged one level deep over the file contents.
 *
 * @throws ConfigurationError
 */
export function loadConfig(
  path?: string,
  overrides: ControllerConfigInput = {},
): ControllerConfig {
  let fileContents: Record<string, unknown> = {};
  if (path !== undefined) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf8"));
    } catch (error) {
      throw new ConfigurationError(`Cannot read configuration ${path}`, [
        describeError(error),
      ]);
    }
    if (!isRecord(raw)) {
      throw new ConfigurationError(`Configuration ${path} must be a JSON object`);
    }
    fileContents = raw;
  }

  const merged: Record<string, unknown> = { ...fileContents };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const base = merged[key];
    merged[key] =
      isRecord(base) && isRecord(value) ? { ...base, ...value } : value;
  }

  const result = parseConfig(merged);
  if (isErr(result)) {
    throw unwrapErr(result);
  }
  return unwrapOk(result);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Test parameters

export const testParametersSchema = z.object({
  forwardDurationSeconds: z.number().positive(),
  forwardTorquePercent: z.number().positive().max(100),
  maxBrakeCurrent: z.number().positive(),
  maxMotorCurrent: z.number().positive(),
  reverseDurationSeconds: z.number().positive(),
  reverseTorquePercent: z.number().negative().min(-100),
  targetRpm: z.number().nonnegative(),
});

export type TestParameters = z.infer<typeof testParametersSchema>;

export const DEFAULT_TEST_PARAMETERS: Readonly<TestParameters> = Object.freeze({
  forwardDurationSeconds: 5,
  forwardTorquePercent: 100,
  maxBrakeCurrent: 40,
  maxMotorCurrent: 70,
  reverseDurationSeconds: 2,
  reverseTorquePercent: -100,
  targetRpm: 300,
});

export function parseTestParameters(
  input: unknown,
): Result<TestParameters, ConfigurationError> {
  const parsed = testParametersSchema.safeParse(input);
  if (!parsed.success) {
    return createErr(
      new ConfigurationError("Invalid test parameters", formatIssues(parsed.error)),
    );
  }
  return createOk(parsed.data);
}

/** Number of cycles to run; `"unbounded"` runs until stopped. */
export type CycleTarget = number | "unbounded";

/** Value accepted on the command line for an unbounded run. */
export const UNBOUNDED = -1;

/** Accepts a positive integer, `-1` or `"unbounded"`. */
export function parseCycleTarget(
  input: number | string,
): Result<CycleTarget, ConfigurationError> {
  if (input === "unbounded") {
    return createOk("unbounded");
  }
  const value = typeof input === "number" ? input : Number(input);
  if (value === UNBOUNDED) {
    return createOk("unbounded");
  }
  if (!Number.isInteger(value) || value < 1) {
    return createErr(
      new ConfigurationError(
        `Invalid cycle target ${String(input)}: expected a positive integer or ${UNBOUNDED}`,
      ),
    );
  }
  return createOk(value);
}
