// Serial transport backed by modbus-serial
// Owns the RTU client; framing, CRC and inter-frame timing stay inside the library

import ModbusRTU from "modbus-serial";
import { TransportError, toTransportError } from "../errors.ts";
import {
  createTransportErrorEvent,
  type IRegisterTransport,
  type SerialTransportConfig,
  type TransportEventMap,
  type TransportState,
} from "./transport.ts";

/**
 * Concrete transport for the motor controller's RS-485 link.
 *
 * Responsibilities:
 * - Opening the port with the configured line settings and slave id
 * - FC03 single register reads and FC16 multi-register writes
 * - Minimal state machine bridging imperative connect/disconnect lifecycle
 */
export class SerialTransport implements IRegisterTransport {
  readonly #client = new ModbusRTU();
  readonly #target = new EventTarget();
  #state: TransportState = "disconnected";

  constructor(public readonly config: SerialTransportConfig) {}

  get state(): TransportState {
    return this.#state;
  }

  get connected(): boolean {
    return this.#state === "connected";
  }

  /** Open the port. Rejects with a {@link TransportError} on failure. */
  async connect(): Promise<void> {
    if (this.connected) return;
    this.#setState("connecting");
    try {
      await this.#client.connectRTUBuffered(this.config.path, {
        baudRate: this.config.baudRate,
        dataBits: this.config.dataBits,
        parity: this.config.parity,
        stopBits: this.config.stopBits,
      });
      this.#client.setID(this.config.slaveId);
      this.#client.setTimeout(this.config.timeoutMs);
    } catch (error) {
      const failure = new TransportError(
        `Failed to open ${this.config.path}: ${toTransportError(error).message}`,
        { cause: error },
      );
      this.#setState("error");
      this.#target.dispatchEvent(createTransportErrorEvent(failure));
      throw failure;
    }
    this.#setState("connected");
    this.#target.dispatchEvent(new Event("open"));
  }

  /** Close the underlying port if open. Safe to call repeatedly. */
  async disconnect(): Promise<void> {
    if (this.#state === "disconnected") return;
    if (this.#client.isOpen) {
      await new Promise<void>((resolve) => {
        this.#client.close(() => resolve());
      });
    }
    this.#setState("disconnected");
    this.#target.dispatchEvent(new Event("close"));
  }

  async readHoldingRegister(address: number): Promise<number> {
    this.#assertConnected();
    try {
      const response = await this.#client.readHoldingRegisters(address, 1);
      const [word] = response.data;
      if (typeof word !== "number") {
        throw new TransportError(`Empty response reading register ${address}`);
      }
      return word;
    } catch (error) {
      throw this.#fail(error);
    }
  }

  async writeRegisters(
    address: number,
    values: readonly number[],
  ): Promise<void> {
    this.#assertConnected();
    try {
      await this.#client.writeRegisters(address, [...values]);
    } catch (error) {
      throw this.#fail(error);
    }
  }

  #assertConnected(): void {
    if (!this.connected) {
      throw new TransportError("Transport not connected");
    }
  }

  #fail(error: unknown): TransportError {
    const failure = toTransportError(error);
    if (!this.#client.isOpen && this.#state === "connected") {
      // Port vanished underneath us (cable unplugged).
      this.#setState("error");
      this.#target.dispatchEvent(createTransportErrorEvent(failure));
    }
    return failure;
  }

  #setState(state: TransportState): void {
    if (this.#state !== state) {
      this.#state = state;
      this.#target.dispatchEvent(new CustomEvent("statechange", { detail: state }));
    }
  }

  addEventListener<K extends keyof TransportEventMap>(
    type: K,
    listener: (ev: TransportEventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void {
    this.#target.addEventListener(type, listener as EventListener, options);
  }
}
