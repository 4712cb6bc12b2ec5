/** Strongly-typed event channel between the engines and their subscribers. */

/** Kinds of recovery status notifications. */
export type RecoveryEventKind =
  | "recovery_started"
  | "recovery_countdown"
  | "recovery_waiting"
  | "recovery_stage_change"
  | "recovery_successful"
  | "recovery_stopped"
  | "recovery_error"
  | "recovery_failed";

export interface RecoveryStatusEvent {
  kind: RecoveryEventKind;
  /** Human readable detail, e.g. `Stage 1, Attempt 1` or `7s`. */
  detail: string;
  stageIndex: number;
  attemptInStage: number;
}

export interface FaultUpdateEvent {
  faults: string[];
  warnings: string[];
  faultsRegister: number;
  faults2Register: number;
  warningsRegister: number;
  warnings2Register: number;
}

export type TimerDirection = "forward" | "reverse" | "none";

export interface TimerProgressEvent {
  direction: TimerDirection;
  elapsedSeconds: number;
  totalSeconds: number;
}

export type TestOutcome =
  | "completed"
  | "stopped"
  | "clutch_failure"
  | "startup_failed"
  | "error";

export interface TestFinishedEvent {
  outcome: TestOutcome;
  /** Last completed cycle number. */
  cycleCount: number;
  error?: Error;
}

/** Events emitted by the motor controller. */
export type ControllerEvents = {
  faults: [FaultUpdateEvent];
  recovery: [RecoveryStatusEvent];
  timer: [TimerProgressEvent];
  cycle: [{ cycle: number }];
  finished: [TestFinishedEvent];
};

/**
 * Minimal strongly-typed event emitter.
 *
 * Listeners run synchronously. An exception thrown by a listener is handed
 * to `onListenerError` and the remaining listeners still run.
 */
export class EventEmitter<
  T extends Record<string, unknown[]> = Record<string, unknown[]>,
> {
  #listeners: { [K in keyof T]?: Array<(...args: T[K]) => void> } = {};
  #onListenerError: (error: unknown, event: keyof T) => void;

  constructor(
    onListenerError: (error: unknown, event: keyof T) => void = (error) => {
      console.error("EventEmitter: listener error", error);
    },
  ) {
    this.#onListenerError = onListenerError;
  }

  on<K extends keyof T>(event: K, listener: (...args: T[K]) => void): void {
    const eventListeners = this.#listeners[event] ?? [];
    eventListeners.push(listener);
    this.#listeners[event] = eventListeners;
  }

  emit<K extends keyof T>(event: K, ...args: T[K]): void {
    const eventListeners = this.#listeners[event];
    if (!eventListeners) return;
    for (const listener of [...eventListeners]) {
      try {
        listener(...args);
      } catch (error) {
        this.#onListenerError(error, event);
      }
    }
  }
}

/** Emitter type used throughout the controller. */
export class ControllerEventEmitter extends EventEmitter<ControllerEvents> {}
