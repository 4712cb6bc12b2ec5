// Mock transport implementation for testing and simulation
// Provides an in-memory register bank with hooks and failure injection

import { TransportError } from "../errors.ts";
import {
  createTransportErrorEvent,
  type IRegisterTransport,
  type MockTransportConfig,
  type TransportEventMap,
  type TransportState,
} from "./transport.ts";

/** Options controlling test / simulation behaviour of {@link MockTransport}. */
export interface MockTransportOptions {
  /** Artificial delay before a successful connect resolves (ms). */
  connectDelay?: number;
  /** Artificial delay applied to every read and write (ms). */
  operationDelay?: number;
  /** When true `connect()` will reject with `errorMessage`. */
  shouldFailConnect?: boolean;
  /** Error message used for simulated failures. */
  errorMessage?: string;
  /** Initial register contents keyed by address. */
  registers?: Record<number, number>;
}

/** One recorded `writeRegisters` call. */
export interface RecordedWrite {
  address: number;
  values: number[];
}

type ReadHandler = (address: number) => number;
type WriteHandler = (address: number, values: readonly number[]) => void;

/**
 * In-memory transport used for unit tests and the CLI simulation mode.
 *
 * Provides deterministic control over timing, error injection and register
 * behaviour so higher level logic can be validated without serial hardware.
 */
export class MockTransport implements IRegisterTransport {
  private _state: TransportState = "disconnected";
  private options: MockTransportOptions;
  private readonly target = new EventTarget();
  private readonly registerBank = new Map<number, number>();
  private readonly readHandlers = new Map<number, ReadHandler>();
  private readonly writeHandlers: WriteHandler[] = [];
  private readonly pendingReadFailures: Error[] = [];
  private readonly pendingWriteFailures: Error[] = [];
  private activeOperations = 0;

  // For testing: inspect traffic
  public writes: RecordedWrite[] = [];
  public reads: number[] = [];
  /** Highest number of operations that were in flight at the same time. */
  public maxConcurrentOperations = 0;

  constructor(
    public readonly config: MockTransportConfig = { type: "mock" },
    options: MockTransportOptions = {},
  ) {
    this.options = {
      connectDelay: 0,
      errorMessage: "Mock transport error",
      operationDelay: 0,
      shouldFailConnect: false,
      ...options,
    };
    for (const [address, value] of Object.entries(options.registers ?? {})) {
      this.registerBank.set(Number(address), value);
    }
  }

  get state(): TransportState {
    return this._state;
  }

  get connected(): boolean {
    return this._state === "connected";
  }

  /** Establish a simulated connection (optionally delayed / failed). */
  async connect(): Promise<void> {
    if (this._state === "connected") {
      return;
    }

    this.setState("connecting");

    const connectDelay = this.options.connectDelay ?? 0;
    if (connectDelay > 0) {
      await this.delay(connectDelay);
    }

    if (this.options.shouldFailConnect) {
      const error = new TransportError(
        this.options.errorMessage ?? "Mock transport error",
      );
      this.setState("error");
      this.target.dispatchEvent(createTransportErrorEvent(error));
      throw error;
    }

    this.setState("connected");
    this.target.dispatchEvent(new Event("open"));
  }

  async disconnect(): Promise<void> {
    if (this._state === "disconnected") {
      return;
    }
    this.setState("disconnected");
    this.target.dispatchEvent(new Event("close"));
  }

  async readHoldingRegister(address: number): Promise<number> {
    return this.operate(() => {
      const failure = this.pendingReadFailures.shift();
      if (failure) {
        throw failure;
      }
      this.reads.push(address);
      const handler = this.readHandlers.get(address);
      const value = handler ? handler(address) : this.getRegister(address);
      return value & 0xffff;
    });
  }

  async writeRegisters(
    address: number,
    values: readonly number[],
  ): Promise<void> {
    return this.operate(() => {
      const failure = this.pendingWriteFailures.shift();
      if (failure) {
        throw failure;
      }
      this.writes.push({ address, values: [...values] });
      values.forEach((value, offset) => {
        this.registerBank.set(address + offset, value & 0xffff);
      });
      for (const handler of this.writeHandlers) {
        handler(address, values);
      }
    });
  }

  // Testing utilities
  /** Set the stored value of a register. */
  public setRegister(address: number, value: number): void {
    this.registerBank.set(address, value & 0xffff);
  }

  /** Stored value of a register (0 when never written). */
  public getRegister(address: number): number {
    return this.registerBank.get(address) ?? 0;
  }

  /** Compute the value of `address` on every read instead of using the bank. */
  public onRead(address: number, handler: ReadHandler): void {
    this.readHandlers.set(address, handler);
  }

  /** Observe every successful write. */
  public onWrite(handler: WriteHandler): void {
    this.writeHandlers.push(handler);
  }

  /** Make the next `count` reads reject. */
  public failNextReads(count: number, error?: Error): void {
    for (let i = 0; i < count; i++) {
      this.pendingReadFailures.push(error ?? this.defaultFailure());
    }
  }

  /** Make the next `count` writes reject. */
  public failNextWrites(count: number, error?: Error): void {
    for (let i = 0; i < count; i++) {
      this.pendingWriteFailures.push(error ?? this.defaultFailure());
    }
  }

  /** First written word of every write to `address`, in order. */
  public writesTo(address: number): number[] {
    return this.writes
      .filter((write) => write.address === address)
      .map((write) => write.values[0] ?? 0);
  }

  public clearTraffic(): void {
    this.writes = [];
    this.reads = [];
  }

  /** Simulate an abrupt disconnect (fires `close`). */
  public simulateDisconnect(): void {
    if (this._state === "connected") {
      this.setState("disconnected");
      this.target.dispatchEvent(new Event("close"));
    }
  }

  private async operate<T>(action: () => T): Promise<T> {
    if (this._state !== "connected") {
      throw new TransportError("Transport not connected");
    }
    this.activeOperations++;
    this.maxConcurrentOperations = Math.max(
      this.maxConcurrentOperations,
      this.activeOperations,
    );
    try {
      const operationDelay = this.options.operationDelay ?? 0;
      if (operationDelay > 0) {
        await this.delay(operationDelay);
      }
      return action();
    } finally {
      this.activeOperations--;
    }
  }

  private defaultFailure(): TransportError {
    return new TransportError(
      this.options.errorMessage ?? "Mock transport error",
    );
  }

  private setState(newState: TransportState): void {
    if (this._state !== newState) {
      this._state = newState;
      this.target.dispatchEvent(
        new CustomEvent("statechange", { detail: newState }),
      );
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  addEventListener<K extends keyof TransportEventMap>(
    type: K,
    listener: (ev: TransportEventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void {
    this.target.addEventListener(type, listener as EventListener, options);
  }
}
