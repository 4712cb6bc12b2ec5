// Register gateway: the only path from the controller to the transport
// Every operation holds the serial gate for its whole duration

import { createErr, createOk, type Result } from "option-t/plain_result";
import { type TransportError, toTransportError } from "../errors.ts";
import { type Logger, silentLogger } from "../logging/index.ts";
import type { IRegisterTransport } from "../transport/transport.ts";
import { type GateStats, SerialGate } from "./serial-gate.ts";

export interface RegisterGatewayOptions {
  gate?: SerialGate;
  logger?: Logger;
}

/**
 * Serialised register access over one transport.
 *
 * Failures never reject: connection errors, timeouts and device exception
 * responses all come back as an Err carrying a {@link TransportError}.
 * There is no retry here; callers decide.
 */
export class RegisterGateway {
  readonly #transport: IRegisterTransport;
  readonly #gate: SerialGate;
  readonly #logger: Logger;

  constructor(
    transport: IRegisterTransport,
    options: RegisterGatewayOptions = {},
  ) {
    this.#transport = transport;
    this.#gate = options.gate ?? new SerialGate();
    this.#logger = (options.logger ?? silentLogger).child("RegisterGateway");
  }

  get transport(): IRegisterTransport {
    return this.#transport;
  }

  /** Read one holding register as a raw unsigned word. */
  readRegister(address: number): Promise<Result<number, TransportError>> {
    return this.#guarded(`read ${address}`, () =>
      this.#transport.readHoldingRegister(address),
    );
  }

  /** Write one raw word. */
  writeRegister(
    address: number,
    value: number,
  ): Promise<Result<void, TransportError>> {
    return this.writeRegisters(address, [value]);
  }

  /** Write consecutive raw words starting at `address`. */
  writeRegisters(
    address: number,
    values: readonly number[],
  ): Promise<Result<void, TransportError>> {
    return this.#guarded(`write ${address}=[${values.join(",")}]`, () =>
      this.#transport.writeRegisters(address, values),
    );
  }

  getStats(): GateStats {
    return this.#gate.getStats();
  }

  #guarded<T>(
    description: string,
    operation: () => Promise<T>,
  ): Promise<Result<T, TransportError>> {
    return this.#gate.run(async (): Promise<Result<T, TransportError>> => {
      try {
        const value = await operation();
        this.#logger.debug(`${description} ok`);
        return createOk(value);
      } catch (error) {
        const transportError = toTransportError(error);
        this.#logger.debug(`${description} failed: ${transportError.message}`);
        return createErr(transportError);
      }
    });
  }
}
