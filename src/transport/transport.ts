/**
 * Transport abstraction for register access on the motor controller.
 *
 * The contract is intentionally narrow: read one holding register, write a
 * run of holding registers. Framing, CRC and the serial line discipline live
 * below this interface (in `modbus-serial` for the real link), so the
 * controller logic never sees bytes.
 *
 * Design notes:
 * - Uses DOM `addEventListener` semantics instead of a custom EventEmitter
 * - Operations reject on failure; the gateway above turns rejections into
 *   Results and owns mutual exclusion
 * - State changes are observable via a dedicated `statechange` event whose
 *   `detail` carries the new {@link TransportState}.
 */

/** Configuration for the RS-485 / USB serial link. */
export interface SerialTransportConfig {
  type: "serial";
  /** Device path, e.g. `/dev/ttyUSB0` or `COM3`. */
  path: string;
  /** Modbus slave address of the motor controller. */
  slaveId: number;
  baudRate: number;
  dataBits: 7 | 8;
  parity: "none" | "even" | "odd";
  stopBits: 1 | 2;
  /** Per-transaction response timeout (ms). */
  timeoutMs: number;
}

/** Configuration for the in-memory / test oriented mock transport. */
export interface MockTransportConfig {
  type: "mock";
  name?: string;
}

/** Discriminated union of all supported transport configuration objects. */
export type TransportConfig = SerialTransportConfig | MockTransportConfig;

/** Lifecycle states reported by a transport. */
export type TransportState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "error";

/** Event emitted on transport level errors (I/O, disconnection, etc.). */
export interface TransportErrorEvent extends CustomEvent<Error> {
  /** Shortcut reference to the error object (mirrors WebSocket semantics). */
  readonly error: Error;
}

/** Strongly typed event map used by transports. */
export type TransportEventMap = {
  /** Fired after a successful `connect()`. */
  open: Event;
  /** Fired after `disconnect()` or an unexpected closure. */
  close: Event;
  /** Fired whenever {@link TransportState} transitions. New state in `detail`. */
  statechange: CustomEvent<TransportState>;
  /** Fired on link level errors; the error is available via `detail` and `.error`. */
  error: TransportErrorEvent;
};

/**
 * Minimal contract implemented by every transport.
 *
 * Implementations do not serialise calls themselves; callers go through
 * the gateway, which guarantees one operation on the link at a time.
 */
export interface IRegisterTransport {
  readonly config: TransportConfig;
  readonly state: TransportState;
  /** Convenience boolean alias for `state === "connected"`. */
  readonly connected: boolean;

  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Read one holding register and resolve with its raw unsigned 16-bit word. */
  readHoldingRegister(address: number): Promise<number>;
  /** Write raw unsigned 16-bit words starting at `address`. */
  writeRegisters(address: number, values: readonly number[]): Promise<void>;
  addEventListener<K extends keyof TransportEventMap>(
    type: K,
    listener: (ev: TransportEventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void;
}

/** Factory function responsible for instantiating a transport for `config`. */
export type TransportFactory<T extends TransportConfig = TransportConfig> = (
  config: T,
) => IRegisterTransport;

const factories = new Map<
  TransportConfig["type"],
  (config: TransportConfig) => IRegisterTransport
>();

/**
 * Registry of available transports, keyed by the config discriminator.
 *
 * Typical usage: `TransportRegistry.register("serial", cfg => new SerialTransport(cfg))`.
 */
export const TransportRegistry = {
  create(config: TransportConfig): IRegisterTransport {
    const factory = factories.get(config.type);
    if (!factory) {
      throw new Error(`Unknown transport type: ${config.type}`);
    }
    return factory(config);
  },

  getRegisteredTypes(): string[] {
    return Array.from(factories.keys());
  },

  /** Register (or overwrite) a transport factory for a given discriminator. */
  register<K extends TransportConfig["type"]>(
    type: K,
    factory: TransportFactory<Extract<TransportConfig, { type: K }>>,
  ) {
    factories.set(type, (config) => {
      if (!isConfigOfType(config, type)) {
        throw new Error(`Invalid config type for ${type} transport`);
      }
      return factory(config);
    });
  },
} as const;

function isConfigOfType<K extends TransportConfig["type"]>(
  config: TransportConfig,
  type: K,
): config is Extract<TransportConfig, { type: K }> {
  return config.type === type;
}

/** Shared helper for implementations: build the `error` event payload. */
export function createTransportErrorEvent(error: Error): TransportErrorEvent {
  return Object.assign(new CustomEvent<Error>("error", { detail: error }), {
    error,
  });
}
