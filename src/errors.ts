/**
 * Unified error types for register access, catalog lookups and configuration.
 */

/** Modbus exception codes a device may answer with. */
export const MODBUS_EXCEPTION_CODES = {
  1: "Illegal function",
  2: "Illegal data address (address does not exist)",
  3: "Illegal data value",
  4: "Slave device failure",
  5: "Acknowledge",
  6: "Slave device busy",
  8: "Memory parity error",
  10: "Gateway path unavailable",
  11: "Gateway target device failed to respond",
} as const;

export type ModbusExceptionCode = keyof typeof MODBUS_EXCEPTION_CODES;

/** Base error class for everything that goes wrong around the register map. */
export class ModbusError extends Error {
  constructor(
    message: string,
    public readonly code?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ModbusError";
  }
}

/** Exception response from the device (function code | 0x80). */
export class ModbusExceptionError extends ModbusError {
  constructor(public readonly exceptionCode: number) {
    const message = isModbusExceptionCode(exceptionCode)
      ? MODBUS_EXCEPTION_CODES[exceptionCode]
      : `Unknown exception ${exceptionCode}`;
    super(`${message} (code: ${exceptionCode})`, exceptionCode);
    this.name = "ModbusExceptionError";
  }
}

/**
 * Any failure of the link itself: port errors, timeouts and device exception
 * responses. `timeout` tells the fault checks whether the failure may be
 * ignored as a transient.
 */
export class TransportError extends ModbusError {
  public readonly timeout: boolean;

  constructor(
    message: string,
    options: { cause?: unknown; timeout?: boolean } = {},
  ) {
    super(message, undefined, { cause: options.cause });
    this.name = "TransportError";
    this.timeout = options.timeout ?? false;
  }
}

/** A command name that the catalog does not know. No I/O was performed. */
export class UnknownCommandError extends ModbusError {
  constructor(public readonly commandName: string) {
    super(`Unknown command: ${commandName}`);
    this.name = "UnknownCommandError";
  }
}

/** A telemetry point that the catalog does not know. */
export class UnknownTelemetryError extends ModbusError {
  constructor(public readonly telemetryName: string) {
    super(`Unknown telemetry point: ${telemetryName}`);
    this.name = "UnknownTelemetryError";
  }
}

/** The encoded value does not fit an unsigned 16-bit register. */
export class CommandEncodingError extends ModbusError {
  constructor(
    public readonly commandName: string,
    public readonly encoded: number,
  ) {
    super(
      `Encoded value ${encoded} for ${commandName} is outside the register range 0..65535`,
    );
    this.name = "CommandEncodingError";
  }
}

/** Invalid configuration, catalog or test input. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }
}

export function isModbusExceptionCode(
  code: number,
): code is ModbusExceptionCode {
  return Object.hasOwn(MODBUS_EXCEPTION_CODES, code);
}

const TIMEOUT_PATTERN = /time(?:d)?\s?out/i;

/**
 * Normalise whatever a transport rejected with into a {@link TransportError}.
 *
 * `modbus-serial` rejects with plain `Error`s: timeouts are named
 * `TransactionTimedOutError`, exception responses carry `modbusCode`.
 */
export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (error instanceof Error) {
    const modbusCode = readModbusCode(error);
    if (modbusCode !== undefined) {
      const exception = new ModbusExceptionError(modbusCode);
      return new TransportError(exception.message, { cause: exception });
    }
    const timeout =
      error.name === "TransactionTimedOutError" ||
      TIMEOUT_PATTERN.test(error.message);
    return new TransportError(error.message, { cause: error, timeout });
  }
  return new TransportError(String(error), { cause: error });
}

function readModbusCode(error: Error): number | undefined {
  if (!("modbusCode" in error)) {
    return undefined;
  }
  const code = error.modbusCode;
  return typeof code === "number" ? code : undefined;
}

/** Message of an unknown thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
