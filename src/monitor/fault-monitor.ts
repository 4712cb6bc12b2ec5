// Fault Monitor
// Polls the fault and warning registers while a test runs and hands off to
// the recovery engine when a fault appears

import {
  createErr,
  createOk,
  isErr,
  isOk,
  type Result,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import type { CommandCatalog } from "../catalog/index.ts";
import { type Clock, systemClock } from "../clock.ts";
import type { MonitorConfig, RetryPolicy } from "../config.ts";
import { decodeFaultSnapshot, type FaultTables } from "../decoder.ts";
import { describeError, type ModbusError, TransportError } from "../errors.ts";
import type {
  ControllerEventEmitter,
  FaultUpdateEvent,
} from "../events.ts";
import { type Logger, silentLogger } from "../logging/index.ts";
import type { RecoveryState } from "../recovery/recovery-engine.ts";
import { executeWithRetry } from "../retry.ts";
import type { RunState } from "../run-state.ts";

/** Decoded view of one register pair. */
export interface StatusCheck {
  messages: string[];
  register: number;
  register2: number;
}

/** Reported when a register pair cannot be read at all. */
export const INTERNAL_MODBUS_ERROR = "Internal Modbus error";

/** Result of one recovery run as seen by the monitor. */
export interface RecoveryAttempt {
  recovered: boolean;
  state: RecoveryState;
}

export interface FaultMonitorOptions {
  catalog: CommandCatalog;
  events: ControllerEventEmitter;
  runState: RunState;
  retry: RetryPolicy;
  monitor: MonitorConfig;
  /** Starts a recovery run, cancelling any that is still in flight. */
  recover: (signal: AbortSignal) => Promise<RecoveryAttempt>;
  clock?: Clock;
  logger?: Logger;
}

type RegisterPair = {
  first: string;
  second: string;
  label: "faults" | "warnings";
};

const FAULT_PAIR: RegisterPair = {
  first: "read_faults",
  label: "faults",
  second: "read_faults2",
};

const WARNING_PAIR: RegisterPair = {
  first: "read_warnings",
  label: "warnings",
  second: "read_warnings2",
};

export class FaultMonitor {
  readonly #options: FaultMonitorOptions;
  readonly #clock: Clock;
  readonly #logger: Logger;

  constructor(options: FaultMonitorOptions) {
    this.#options = options;
    this.#clock = options.clock ?? systemClock;
    this.#logger = (options.logger ?? silentLogger).child("FaultMonitor");
  }

  /** Read and decode both fault registers. */
  async checkFaults(signal?: AbortSignal): Promise<StatusCheck> {
    const reading = await this.#readPair(FAULT_PAIR, signal);
    if (isErr(reading)) return unwrapErr(reading);
    const [register, register2] = unwrapOk(reading);
    const { faultMessages } = decodeFaultSnapshot(
      { faults: register, faults2: register2, warnings: 0, warnings2: 0 },
      this.#tables,
    );
    this.#reportActive("faults", faultMessages);
    return { messages: faultMessages, register, register2 };
  }

  /** Read and decode both warning registers. */
  async checkWarnings(signal?: AbortSignal): Promise<StatusCheck> {
    const reading = await this.#readPair(WARNING_PAIR, signal);
    if (isErr(reading)) return unwrapErr(reading);
    const [register, register2] = unwrapOk(reading);
    const { warningMessages } = decodeFaultSnapshot(
      { faults: 0, faults2: 0, warnings: register, warnings2: register2 },
      this.#tables,
    );
    this.#reportActive("warnings", warningMessages);
    return { messages: warningMessages, register, register2 };
  }

  /**
   * One poll: faults, then warnings, decoded together into a `faults`
   * event. A pair that could not be read reports its fallback messages.
   */
  async pollOnce(signal?: AbortSignal): Promise<FaultUpdateEvent> {
    const faults = await this.#readPair(FAULT_PAIR, signal);
    const warnings = await this.#readPair(WARNING_PAIR, signal);
    const [faultsRegister, faults2Register] = registersOf(faults);
    const [warningsRegister, warnings2Register] = registersOf(warnings);
    const snapshot = decodeFaultSnapshot(
      {
        faults: faultsRegister,
        faults2: faults2Register,
        warnings: warningsRegister,
        warnings2: warnings2Register,
      },
      this.#tables,
    );
    const update: FaultUpdateEvent = {
      faults: isOk(faults) ? snapshot.faultMessages : unwrapErr(faults).messages,
      faults2Register: snapshot.faults2Bitmap,
      faultsRegister: snapshot.faultsBitmap,
      warnings: isOk(warnings)
        ? snapshot.warningMessages
        : unwrapErr(warnings).messages,
      warnings2Register: snapshot.warnings2Bitmap,
      warningsRegister: snapshot.warningsBitmap,
    };
    if (isOk(faults)) this.#reportActive("faults", update.faults);
    if (isOk(warnings)) this.#reportActive("warnings", update.warnings);
    this.#options.events.emit("faults", update);
    return update;
  }

  /** Poll until the run stops or `signal` aborts. Never rejects. */
  async run(signal: AbortSignal): Promise<void> {
    const { runState, monitor } = this.#options;
    this.#logger.info("Fault monitor started");
    while (runState.running && !signal.aborted) {
      try {
        const update = await this.pollOnce(signal);
        if (update.faults.length > 0 && runState.autoRecovery && !signal.aborted) {
          this.#logger.warn(
            `Faults detected by monitor: ${update.faults.join(", ")}`,
          );
          await this.#recoverAndResume(signal);
        }
        await this.#clock.sleep(monitor.pollIntervalMs, signal);
      } catch (error) {
        this.#logger.error(`Error in fault monitor: ${describeError(error)}`);
        await this.#clock.sleep(monitor.errorBackoffMs, signal);
      }
    }
    this.#logger.info("Fault monitor stopped");
  }

  async #recoverAndResume(signal: AbortSignal): Promise<void> {
    const { catalog, events, monitor, recover, retry, runState } = this.#options;
    const attempt = await recover(signal);
    if (!attempt.recovered || !runState.running || signal.aborted) {
      return;
    }
    this.#logger.info("Restarting motor after successful fault recovery");
    const enabled = await executeWithRetry(
      () => catalog.execute("set_remote_state_command", 2),
      { ...retry, clock: this.#clock, signal },
    );
    if (isErr(enabled)) {
      const message = unwrapErr(enabled).message;
      this.#logger.error(`Failed to restart motor after recovery: ${message}`);
      events.emit("recovery", {
        attemptInStage: attempt.state.attemptInStage,
        detail: `Motor re-enable failed, manual reset required: ${message}`,
        kind: "recovery_failed",
        stageIndex: attempt.state.stageIndex,
      });
      return;
    }
    await this.#clock.sleep(monitor.resumeDelayMs, signal);
  }

  get #tables(): FaultTables {
    return this.#options.catalog.definitions.faultTables;
  }

  #reportActive(label: RegisterPair["label"], messages: string[]): void {
    if (messages.length > 0) {
      this.#logger.warn(`Active ${label} detected: ${messages.join(", ")}`);
    }
  }

  /**
   * Read a register pair with retry. The Err side carries the check to
   * report when every attempt failed.
   */
  async #readPair(
    pair: RegisterPair,
    signal: AbortSignal | undefined,
  ): Promise<Result<[number, number], StatusCheck>> {
    const { catalog, retry } = this.#options;
    const result = await executeWithRetry(
      async (): Promise<Result<[number, number], ModbusError>> => {
        // Each read takes the gate on its own.
        const first = await catalog.readRaw(pair.first);
        if (isErr(first)) return createErr(unwrapErr(first));
        const second = await catalog.readRaw(pair.second);
        if (isErr(second)) return createErr(unwrapErr(second));
        return createOk([unwrapOk(first), unwrapOk(second)]);
      },
      {
        ...retry,
        clock: this.#clock,
        onRetry: (error, attempt) => {
          this.#logger.warn(
            `Error checking ${pair.label} (attempt ${attempt}/${retry.maxAttempts}): ${describeError(error)}`,
          );
        },
        signal,
      },
    );
    if (isOk(result)) return createOk(unwrapOk(result));

    const error = unwrapErr(result);
    this.#logger.error(
      `Maximum retries reached while checking ${pair.label}: ${error.message}`,
    );
    if (error instanceof TransportError && error.timeout) {
      this.#logger.warn(
        `Temporary Modbus timeout while checking ${pair.label}, ignoring`,
      );
      return createErr({ messages: [], register: 0, register2: 0 });
    }
    return createErr({
      messages: [INTERNAL_MODBUS_ERROR],
      register: 0,
      register2: 0,
    });
  }
}

function registersOf(
  reading: Result<[number, number], StatusCheck>,
): [number, number] {
  if (isOk(reading)) return unwrapOk(reading);
  const { register, register2 } = unwrapErr(reading);
  return [register, register2];
}
