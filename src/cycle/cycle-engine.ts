// Cycle Engine
// Startup sequence and the forward/reverse torque loop with rotation checks

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import type { CommandCatalog } from "../catalog/index.ts";
import { type Clock, systemClock } from "../clock.ts";
import type {
  CycleConfig,
  CycleTarget,
  RetryPolicy,
  TestParameters,
} from "../config.ts";
import { describeError, ModbusError } from "../errors.ts";
import type { ControllerEventEmitter, TimerDirection } from "../events.ts";
import { type Logger, silentLogger } from "../logging/index.ts";
import { executeWithRetry } from "../retry.ts";
import type { RunState } from "../run-state.ts";
import type { CycleLog } from "./cycle-log.ts";
import { classifyRotation } from "./verification.ts";

const TORQUE = "set_remote_torque_command";
const STATE = "set_remote_state_command";

export interface CycleEngineOptions {
  catalog: CommandCatalog;
  events: ControllerEventEmitter;
  runState: RunState;
  cycleLog: CycleLog;
  config: CycleConfig;
  retry: RetryPolicy;
  clock?: Clock;
  logger?: Logger;
}

export type CycleRunOutcome = "completed" | "stopped" | "clutch_failure";

export interface CycleRunResult {
  outcome: CycleRunOutcome;
  /** Number of the last cycle recorded as completed. */
  lastCompletedCycle: number;
}

interface Segment {
  direction: Exclude<TimerDirection, "none">;
  torquePercent: number;
  durationSeconds: number;
}

type SegmentVerdict = "verified" | "unverified" | "clutch_failure" | "skipped";

export class CycleEngine {
  readonly #options: CycleEngineOptions;
  readonly #clock: Clock;
  readonly #logger: Logger;

  constructor(options: CycleEngineOptions) {
    this.#options = options;
    this.#clock = options.clock ?? systemClock;
    this.#logger = (options.logger ?? silentLogger).child("CycleEngine");
  }

  /**
   * Apply the startup sequence, each step retried and followed by a short
   * settle delay. Resolves with the error of the first step that fails
   * every attempt.
   */
  async initialize(
    params: TestParameters,
    signal: AbortSignal,
  ): Promise<Result<void, ModbusError>> {
    const { startup, commandSettleMs } = this.#options.config;
    const steps: ReadonlyArray<readonly [string, number]> = [
      ["set_speed_regulator_mode", startup.speedRegulatorMode],
      [
        "set_remote_maximum_regen_battery_current_limit",
        startup.regenBatteryCurrentLimit,
      ],
      [
        "set_remote_maximum_battery_current_limit",
        startup.batteryCurrentLimit,
      ],
      ["set_remote_maximum_motoring_current", params.maxMotorCurrent],
      ["set_remote_maximum_braking_current", params.maxBrakeCurrent],
      ["set_remote_speed_command", params.targetRpm],
      [TORQUE, 0],
      [STATE, 2],
    ];

    for (const [command, value] of steps) {
      if (signal.aborted) {
        return createErr(new ModbusError("Startup cancelled"));
      }
      const result = await this.#executeWithRetry(command, value, signal);
      if (isErr(result)) {
        const error = unwrapErr(result);
        this.#logger.error(
          `Failed to set ${command} after ${this.#options.retry.maxAttempts} attempts: ${error.message}`,
        );
        return createErr(error);
      }
      this.#logger.info(`Successfully set ${command} to ${value}`);
      await this.#clock.sleep(commandSettleMs, signal);
    }
    return createOk(undefined);
  }

  /**
   * Run cycles from `startCycle` until the target is passed, the run is
   * stopped, or the clutch fails.
   */
  async run(
    params: TestParameters,
    target: CycleTarget,
    startCycle: number,
    signal: AbortSignal,
  ): Promise<CycleRunResult> {
    const { catalog, cycleLog, events, runState } = this.#options;
    const segments: Segment[] = [
      {
        direction: "forward",
        durationSeconds: params.forwardDurationSeconds,
        torquePercent: params.forwardTorquePercent,
      },
      {
        direction: "reverse",
        durationSeconds: params.reverseDurationSeconds,
        torquePercent: params.reverseTorquePercent,
      },
    ];

    let current = startCycle;
    let reachedTarget = this.#pastTarget(current, target);
    if (reachedTarget) {
      this.#logger.info(`Cycle ${current} is beyond the target ${target}`);
      runState.finish();
    }

    while (runState.running && !signal.aborted) {
      const cycleStart = this.#clock.now();
      this.#logger.info(`Starting cycle ${current}`);
      let forwardVerified = false;
      let reverseVerified = false;

      for (const [index, segment] of segments.entries()) {
        if (!runState.running || signal.aborted) break;

        const verdict = await this.#runSegment(segment, signal);
        if (verdict === "clutch_failure") {
          runState.finish();
          return { lastCompletedCycle: current - 1, outcome: "clutch_failure" };
        }
        if (verdict === "skipped") continue;
        if (verdict === "verified") {
          if (segment.direction === "forward") forwardVerified = true;
          else reverseVerified = true;
        }

        if (index < segments.length - 1 && runState.running && !signal.aborted) {
          this.#logger.info(
            `Adding ${this.#options.config.transitionPauseMs} ms delay between direction changes`,
          );
          await this.#setTorque(0);
          await this.#clock.sleep(this.#options.config.transitionPauseMs, signal);
        }
      }

      if (!runState.running || signal.aborted) break;

      const motorTemp = await catalog.readTelemetry("motor_temp");
      const controllerTemp = await catalog.readTelemetry("controller_temp");
      const batteryVoltage = await catalog.readTelemetry("battery_voltage");
      this.#logger.info(
        `Motor temperature: ${motorTemp}°C, Controller: ${controllerTemp}°C, Battery: ${batteryVoltage.toFixed(2)}V`,
      );

      if (forwardVerified && reverseVerified) {
        try {
          await cycleLog.append(current);
          this.#logger.info(`Cycle ${current} completed and logged successfully`);
          events.emit("cycle", { cycle: current });
          current++;
        } catch (error) {
          this.#logger.error(`Error writing to file: ${describeError(error)}`);
        }
      } else {
        this.#logger.warn(
          `Cycle ${current} skipped due to unsuccessful rotation (Forward: ${forwardVerified}, Reverse: ${reverseVerified})`,
        );
      }

      if (this.#pastTarget(current, target)) {
        reachedTarget = true;
        runState.finish();
      }

      const seconds = (this.#clock.now() - cycleStart) / 1000;
      this.#logger.info(`Cycle completed in ${seconds.toFixed(2)} seconds`);
    }

    return {
      lastCompletedCycle: current - 1,
      outcome: reachedTarget ? "completed" : "stopped",
    };
  }

  async #runSegment(
    segment: Segment,
    signal: AbortSignal,
  ): Promise<SegmentVerdict> {
    const { catalog, config, events, runState } = this.#options;
    const { direction, torquePercent, durationSeconds } = segment;
    const thresholds = config.verification;
    this.#logger.info(
      `Setting ${direction} torque: ${torquePercent} for ${durationSeconds} seconds`,
    );

    const applied = await this.#executeWithRetry(TORQUE, torquePercent, signal);
    if (isErr(applied)) {
      this.#logger.error(
        `Failed to set ${direction} torque after ${this.#options.retry.maxAttempts} retries: ${unwrapErr(applied).message}`,
      );
      return "skipped";
    }

    const durationMs = durationSeconds * 1000;
    const start = this.#clock.now();
    let verified = false;
    let checks = 0;

    while (runState.running && !signal.aborted) {
      const elapsedMs = this.#clock.now() - start;
      if (elapsedMs >= durationMs) break;
      events.emit("timer", {
        direction,
        elapsedSeconds: elapsedMs / 1000,
        totalSeconds: durationSeconds,
      });

      if (!verified && checks < thresholds.maxChecks) {
        checks++;
        const rpmResult = await catalog.readTelemetryResult("motor_rpm");
        if (isErr(rpmResult)) {
          this.#logger.warn(
            `Error reading motor RPM: ${unwrapErr(rpmResult).message}`,
          );
        } else {
          const rpm = unwrapOk(rpmResult);
          this.#logger.info(
            `Motor speed: ${rpm} RPM, commanded ${direction} torque ${torquePercent}`,
          );
          switch (classifyRotation(torquePercent, rpm, thresholds)) {
            case "verified":
              verified = true;
              break;
            case "clutch_failure":
              this.#logger.error(
                `One-way clutch broken! Rotation of ${rpm} RPM under reverse torque. Stopping test.`,
              );
              await this.#setTorque(0);
              this.#resetTimer();
              return "clutch_failure";
            case "mismatch":
              this.#logger.warn(
                "Motor rotating in wrong direction! Reapplying torque with higher value.",
              );
              await this.#setTorque(torquePercent * thresholds.mismatchTorqueFactor);
              break;
            case "pending":
              break;
          }
        }
        if (!verified && checks >= thresholds.maxChecks) {
          this.#logger.error(
            `Failed to achieve ${direction} rotation after ${thresholds.maxChecks} attempts`,
          );
          await this.#setTorque(torquePercent * thresholds.unverifiedTorqueFactor);
        }
      }

      await this.#clock.sleep(config.tickMs, signal);
    }

    this.#resetTimer();
    return verified ? "verified" : "unverified";
  }

  #resetTimer(): void {
    this.#options.events.emit("timer", {
      direction: "none",
      elapsedSeconds: 0,
      totalSeconds: 0,
    });
  }

  /** Single-shot torque write; failures are logged only. */
  async #setTorque(torquePercent: number): Promise<void> {
    const result = await this.#options.catalog.execute(TORQUE, torquePercent);
    if (isErr(result)) {
      this.#logger.warn(
        `Failed to set torque ${torquePercent}: ${unwrapErr(result).message}`,
      );
    }
  }

  #executeWithRetry(
    command: string,
    value: number,
    signal: AbortSignal,
  ): Promise<Result<number, ModbusError>> {
    const { catalog, retry } = this.#options;
    return executeWithRetry(() => catalog.execute(command, value), {
      ...retry,
      clock: this.#clock,
      onRetry: (error, attempt) => {
        this.#logger.warn(
          `Failed to set ${command} (attempt ${attempt}): ${describeError(error)}`,
        );
      },
      signal,
    });
  }

  #pastTarget(cycle: number, target: CycleTarget): boolean {
    return target !== "unbounded" && cycle > target;
  }
}
