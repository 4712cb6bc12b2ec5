// Recovery Engine
// Staged, escalating clear-fault loop. It never gives up on its own: only a
// successful clear or a cancellation ends a run.

import { isErr, unwrapErr } from "option-t/plain_result";
import type { CommandCatalog } from "../catalog/index.ts";
import { type Clock, systemClock } from "../clock.ts";
import type { RecoveryConfig, RecoveryStage } from "../config.ts";
import { describeError } from "../errors.ts";
import type {
  ControllerEventEmitter,
  RecoveryEventKind,
} from "../events.ts";
import { type Logger, silentLogger } from "../logging/index.ts";
import type { StatusCheck } from "../monitor/fault-monitor.ts";
import type { RunState } from "../run-state.ts";

/** Position of a recovery run in its stage table. */
export interface RecoveryState {
  stageIndex: number;
  attemptInStage: number;
  stages: readonly RecoveryStage[];
}

export interface RecoveryEngineOptions {
  catalog: CommandCatalog;
  events: ControllerEventEmitter;
  runState: RunState;
  config: RecoveryConfig;
  /** Fault check used to verify a clear (normally the monitor's). */
  checkFaults: (signal: AbortSignal) => Promise<StatusCheck>;
  clock?: Clock;
  logger?: Logger;
}

const SECOND = 1000;

/** Raised internally when the run is cancelled mid-wait. */
class RecoveryCancelled extends Error {}

/**
 * One recovery run per detected fault. Create a new engine (or call
 * {@link run} again) for every fault episode; the stage position restarts
 * at stage 1, attempt 1.
 */
export class RecoveryEngine {
  readonly #options: RecoveryEngineOptions;
  readonly #clock: Clock;
  readonly #logger: Logger;
  #stageIndex = 0;
  #attemptInStage = 0;

  constructor(options: RecoveryEngineOptions) {
    this.#options = options;
    this.#clock = options.clock ?? systemClock;
    this.#logger = (options.logger ?? silentLogger).child("RecoveryEngine");
  }

  get state(): RecoveryState {
    return {
      attemptInStage: this.#attemptInStage,
      stageIndex: this.#stageIndex,
      stages: this.#options.config.stages,
    };
  }

  /**
   * Run until the faults clear (`true`) or auto-recovery is cancelled
   * (`false`). Never rejects.
   */
  async run(signal: AbortSignal): Promise<boolean> {
    const { config } = this.#options;
    this.#stageIndex = 0;
    this.#attemptInStage = 0;
    this.#emit("recovery_started", this.#position());

    for (;;) {
      try {
        const stage = this.#currentStage();
        this.#logger.warn(`Fault recovery - ${this.#position()}`);

        if (this.#attemptInStage === 0) {
          this.#logger.info(
            `Fault detected. Waiting ${config.initialWaitSeconds} seconds before first recovery attempt.`,
          );
          await this.#countdown(config.initialWaitSeconds, signal);
        }

        if (await this.#clearAndVerify(signal)) {
          return true;
        }

        this.#logger.info(
          `Faults still present. Waiting ${stage.intervalSeconds} seconds before next attempt.`,
        );
        this.#emit("recovery_waiting", this.#position());
        if (await this.#waitInterval(stage.intervalSeconds, signal)) {
          return true;
        }

        this.#advance(stage);
      } catch (error) {
        if (error instanceof RecoveryCancelled) {
          this.#logger.info("Recovery stopped");
          this.#emit("recovery_stopped", "User stopped recovery");
          return false;
        }
        this.#logger.error(`Error during fault recovery: ${describeError(error)}`);
        this.#emit("recovery_error", describeError(error));
        await this.#clock.sleep(config.errorBackoffSeconds * SECOND, signal);
        if (this.#cancelled(signal)) {
          this.#emit("recovery_stopped", "User stopped recovery");
          return false;
        }
      }
    }
  }

  async #clearAndVerify(signal: AbortSignal): Promise<boolean> {
    const { catalog, checkFaults, config } = this.#options;
    this.#logger.info("Attempting to clear faults...");
    this.#emit("recovery_waiting", "Clearing faults");
    const cleared = await catalog.execute("clear_faults", 1);
    if (isErr(cleared)) {
      this.#logger.error(
        `Failed to send clear faults command: ${unwrapErr(cleared).message}`,
      );
    }
    await this.#clock.sleep(config.settleDelayMs, signal);
    this.#throwIfCancelled(signal);

    const check = await checkFaults(signal);
    this.#throwIfCancelled(signal);
    if (check.messages.length === 0) {
      this.#logger.info("Faults successfully cleared. Resuming motor operation.");
      this.#emit("recovery_successful", "Faults cleared");
      return true;
    }
    return false;
  }

  /**
   * Wait `seconds` in chunks of at most `checkChunkSeconds`, re-checking
   * the faults after each chunk. Resolves `true` as soon as they clear.
   */
  async #waitInterval(seconds: number, signal: AbortSignal): Promise<boolean> {
    const { checkChunkSeconds } = this.#options.config;
    let remaining = seconds;
    while (remaining > 0) {
      const chunk = Math.min(checkChunkSeconds, remaining);
      await this.#countdown(chunk, signal, remaining);
      remaining -= chunk;

      const check = await this.#options.checkFaults(signal);
      this.#throwIfCancelled(signal);
      if (check.messages.length === 0) {
        this.#logger.info(
          "Periodic fault check: No active faults. Resuming motor operation.",
        );
        this.#emit("recovery_successful", "Faults cleared");
        return true;
      }
    }
    return false;
  }

  /** Sleep `seconds` one second at a time, emitting `Ns` counting down. */
  async #countdown(
    seconds: number,
    signal: AbortSignal,
    displayFrom: number = seconds,
  ): Promise<void> {
    for (let elapsed = 0; elapsed < seconds; elapsed++) {
      await this.#clock.sleep(SECOND, signal);
      this.#throwIfCancelled(signal);
      this.#emit("recovery_countdown", `${displayFrom - elapsed}s`);
    }
  }

  #advance(stage: RecoveryStage): void {
    this.#attemptInStage++;
    if (this.#attemptInStage < stage.attempts) {
      return;
    }
    const { stages } = this.#options.config;
    this.#stageIndex = (this.#stageIndex + 1) % stages.length;
    this.#attemptInStage = 0;
    this.#logger.warn(`Moving to fault recovery stage ${this.#stageIndex + 1}`);
    this.#emit("recovery_stage_change", `Stage ${this.#stageIndex + 1}`);
  }

  #currentStage(): RecoveryStage {
    const { stages } = this.#options.config;
    const stage = stages[this.#stageIndex];
    if (!stage) {
      throw new Error(`No recovery stage at index ${this.#stageIndex}`);
    }
    return stage;
  }

  #position(): string {
    return `Stage ${this.#stageIndex + 1}, Attempt ${this.#attemptInStage + 1}`;
  }

  #cancelled(signal: AbortSignal): boolean {
    return signal.aborted || !this.#options.runState.autoRecovery;
  }

  #throwIfCancelled(signal: AbortSignal): void {
    if (this.#cancelled(signal)) {
      throw new RecoveryCancelled();
    }
  }

  #emit(kind: RecoveryEventKind, detail: string): void {
    this.#options.events.emit("recovery", {
      attemptInStage: this.#attemptInStage,
      detail,
      kind,
      stageIndex: this.#stageIndex,
    });
  }
}
