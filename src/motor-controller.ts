// Motor controller: public operations of the clutch tester
// Owns the transport, the gate, the run state and the task handles

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import {
  type Catalog,
  CommandCatalog,
  loadCatalog,
} from "./catalog/index.ts";
import { type Clock, systemClock } from "./clock.ts";
import {
  type ControllerConfig,
  type CycleTarget,
  DEFAULT_TEST_PARAMETERS,
  parseConfig,
  parseCycleTarget,
  parseTestParameters,
  type TestParameters,
  UNBOUNDED,
} from "./config.ts";
import { CycleEngine, type CycleRunResult } from "./cycle/cycle-engine.ts";
import { CycleLog, getLastCycleCount } from "./cycle/cycle-log.ts";
import {
  describeError,
  type ModbusError,
  toTransportError,
} from "./errors.ts";
import { ControllerEventEmitter, type TestOutcome } from "./events.ts";
import { RegisterGateway } from "./gateway/index.ts";
import { type Logger, silentLogger } from "./logging/index.ts";
import {
  FaultMonitor,
  type RecoveryAttempt,
  type StatusCheck,
} from "./monitor/fault-monitor.ts";
import { RecoveryEngine } from "./recovery/recovery-engine.ts";
import { executeWithRetry } from "./retry.ts";
import { createLinkedAbortController, RunState } from "./run-state.ts";
import {
  createTransport,
  type IRegisterTransport,
} from "./transport/index.ts";

export interface MotorControllerOptions {
  /** Defaults to the schema defaults. */
  config?: ControllerConfig;
  /** Defaults to a serial transport built from `config.serial`. */
  transport?: IRegisterTransport;
  /** Defaults to the catalog at `config.catalogPath` or the bundled one. */
  catalog?: Catalog;
  logger?: Logger;
  clock?: Clock;
}

/** Read-only view of the current run. */
export interface CycleState {
  /** Number of the cycle being run (or the next one to run). */
  currentCycleCount: number;
  targetCycleCount: CycleTarget;
  running: boolean;
  autoRecoveryEnabled: boolean;
}

export interface MotorSnapshot {
  motorRpm: number;
  motorCurrent: number;
  motorTemp: number;
  controllerTemp: number;
  batteryVoltage: number;
  batteryCurrent: number;
}

/**
 * Drives a motor controller through repeated forward/reverse torque cycles
 * while a fault monitor and staged recovery run alongside.
 *
 * @example
 * ```typescript
 * const controller = new MotorController({ config: loadConfig("tester.json") });
 * controller.events.on("cycle", ({ cycle }) => console.log(`cycle ${cycle}`));
 * await controller.connect();
 * const last = await controller.startTest(DEFAULT_TEST_PARAMETERS, 1000);
 * ```
 */
export class MotorController {
  readonly events: ControllerEventEmitter;
  readonly #config: ControllerConfig;
  readonly #transport: IRegisterTransport;
  readonly #gateway: RegisterGateway;
  readonly #catalog: CommandCatalog;
  readonly #clock: Clock;
  readonly #logger: Logger;
  readonly #runState = new RunState();
  readonly #monitor: FaultMonitor;
  readonly #cycleEngine: CycleEngine;

  #currentCycle = 1;
  #target: CycleTarget = "unbounded";
  #stopRequested = false;
  #runTask: Promise<number> | null = null;
  #recoveryTask: Promise<RecoveryAttempt> | null = null;
  #recoveryController: AbortController | null = null;

  constructor(options: MotorControllerOptions = {}) {
    this.#config = options.config ?? defaultConfig();
    const rootLogger = options.logger ?? silentLogger;
    this.#logger = rootLogger.child("MotorController");
    this.#clock = options.clock ?? systemClock;
    this.events = new ControllerEventEmitter((error, event) => {
      this.#logger.error(
        `Listener for ${String(event)} failed: ${describeError(error)}`,
      );
    });

    this.#transport =
      options.transport ??
      createTransport({ type: "serial", ...this.#config.serial });
    this.#gateway = new RegisterGateway(this.#transport, { logger: rootLogger });
    this.#catalog = new CommandCatalog(
      this.#gateway,
      options.catalog ?? loadCatalog(this.#config.catalogPath),
      { logger: rootLogger },
    );

    this.#monitor = new FaultMonitor({
      catalog: this.#catalog,
      clock: this.#clock,
      events: this.events,
      logger: rootLogger,
      monitor: this.#config.monitor,
      recover: (signal) => this.#recover(signal),
      retry: this.#config.retry,
      runState: this.#runState,
    });
    this.#cycleEngine = new CycleEngine({
      catalog: this.#catalog,
      clock: this.#clock,
      config: this.#config.cycle,
      cycleLog: new CycleLog(this.#config.files.cycleLog),
      events: this.events,
      logger: rootLogger,
      retry: this.#config.retry,
      runState: this.#runState,
    });

    this.events.on("cycle", ({ cycle }) => {
      this.#currentCycle = cycle + 1;
    });
  }

  get transport(): IRegisterTransport {
    return this.#transport;
  }

  get gateway(): RegisterGateway {
    return this.#gateway;
  }

  get catalog(): CommandCatalog {
    return this.#catalog;
  }

  get cycleState(): Readonly<CycleState> {
    return Object.freeze({
      autoRecoveryEnabled: this.#runState.autoRecovery,
      currentCycleCount: this.#currentCycle,
      running: this.#runState.running,
      targetCycleCount: this.#target,
    });
  }

  /**
   * Open the transport and confirm the controller answers by reading the
   * fault register, retrying per the `connection` policy.
   *
   * @throws TransportError when every attempt fails
   */
  async connect(): Promise<void> {
    const { connection, serial } = this.#config;
    const result = await executeWithRetry(
      async (): Promise<Result<number, ModbusError>> => {
        if (!this.#transport.connected) {
          try {
            await this.#transport.connect();
          } catch (error) {
            return createErr(toTransportError(error));
          }
        }
        return this.#catalog.readRaw("read_faults");
      },
      {
        ...connection,
        clock: this.#clock,
        onRetry: (error, attempt) => {
          this.#logger.warn(
            `Connection attempt ${attempt} failed: ${describeError(error)}`,
          );
        },
      },
    );
    if (isErr(result)) {
      const error = unwrapErr(result);
      this.#logger.error(
        `Failed to connect after ${connection.maxAttempts} attempts: ${error.message}`,
      );
      await this.#transport.disconnect();
      throw error;
    }
    const target =
      this.#transport.config.type === "serial"
        ? `${serial.path} (slave ${serial.slaveId})`
        : "mock transport";
    this.#logger.info(`Connected to ${target}`);
  }

  /** Stop any running test and close the transport. */
  async disconnect(): Promise<void> {
    if (this.#runTask) {
      await this.stopTest();
    }
    await this.#transport.disconnect();
    this.#logger.info("Disconnected");
  }

  /**
   * Run the test until the target is passed, the clutch fails or
   * {@link stopTest} is called. Resolves with the last completed cycle.
   *
   * @param targetCycles positive count, `-1` or `"unbounded"`
   * @throws ConfigurationError for invalid parameters or target
   */
  async startTest(
    params: TestParameters = DEFAULT_TEST_PARAMETERS,
    targetCycles: CycleTarget | string = UNBOUNDED,
  ): Promise<number> {
    if (this.#runTask) {
      throw new Error("A test is already running");
    }
    const parsedParams = parseTestParameters(params);
    if (isErr(parsedParams)) {
      throw unwrapErr(parsedParams);
    }
    const parsedTarget = parseCycleTarget(targetCycles);
    if (isErr(parsedTarget)) {
      throw unwrapErr(parsedTarget);
    }

    this.#stopRequested = false;
    const task = this.#runTest(unwrapOk(parsedParams), unwrapOk(parsedTarget));
    this.#runTask = task;
    try {
      return await task;
    } finally {
      this.#runTask = null;
    }
  }

  /**
   * Stop the test, wait for every task to finish, then zero the torque and
   * disable the motor.
   *
   * @throws ModbusError when the shutdown commands fail after retries
   */
  async stopTest(): Promise<void> {
    this.#logger.info("Stopping test");
    this.#stopRequested = true;
    this.#runState.stop("Test stopped");
    this.#cancelRecovery();
    const runTask = this.#runTask;
    if (runTask) {
      try {
        await runTask;
      } catch (error) {
        this.#logger.warn(`Test ended with error: ${describeError(error)}`);
      }
    }
    const shutdown = await this.#shutdown();
    if (isErr(shutdown)) {
      const error = unwrapErr(shutdown);
      this.#logger.error(`Error stopping motor: ${error.message}`);
      throw error;
    }
    this.#logger.info("Motor stopped");
  }

  /** Scaled telemetry value; `0` on any failure. */
  readTelemetry(name: string): Promise<number> {
    return this.#catalog.readTelemetry(name);
  }

  readTelemetryResult(name: string): Promise<Result<number, ModbusError>> {
    return this.#catalog.readTelemetryResult(name);
  }

  async readMotorSnapshot(): Promise<MotorSnapshot> {
    return {
      batteryCurrent: await this.readTelemetry("battery_current"),
      batteryVoltage: await this.readTelemetry("battery_voltage"),
      controllerTemp: await this.readTelemetry("controller_temp"),
      motorCurrent: await this.readTelemetry("motor_current"),
      motorRpm: await this.readTelemetry("motor_rpm"),
      motorTemp: await this.readTelemetry("motor_temp"),
    };
  }

  checkFaults(): Promise<StatusCheck> {
    return this.#monitor.checkFaults();
  }

  checkWarnings(): Promise<StatusCheck> {
    return this.#monitor.checkWarnings();
  }

  /** Last cycle recorded in the log (default: the configured cycle log). */
  getLastCycleCount(path: string = this.#config.files.cycleLog): Promise<number> {
    return getLastCycleCount(path);
  }

  async #runTest(params: TestParameters, target: CycleTarget): Promise<number> {
    this.#runState.begin();
    const signal = this.#runState.signal;
    const lastCompleted = await this.getLastCycleCount();
    this.#currentCycle = lastCompleted + 1;
    this.#target = target;
    this.#logger.info(
      `Starting test at cycle ${this.#currentCycle}, target ${target}`,
    );

    await this.#monitor.pollOnce(signal);

    const startup = await this.#cycleEngine.initialize(params, signal);
    if (isErr(startup)) {
      const error = unwrapErr(startup);
      this.#runState.stop("Startup failed");
      const outcome: TestOutcome = this.#stopRequested ? "stopped" : "startup_failed";
      this.#logger.error(`Error starting test: ${error.message}`);
      this.events.emit("finished", { cycleCount: lastCompleted, error, outcome });
      return lastCompleted;
    }

    const monitorController = createLinkedAbortController(signal);
    const monitorTask = this.#monitor.run(monitorController.signal);

    let result: CycleRunResult;
    let failure: Error | undefined;
    try {
      result = await this.#cycleEngine.run(params, target, this.#currentCycle, signal);
    } catch (error) {
      failure = error instanceof Error ? error : new Error(String(error));
      this.#logger.error(`Critical error in motor cycles: ${failure.message}`);
      result = { lastCompletedCycle: this.#currentCycle - 1, outcome: "stopped" };
    } finally {
      monitorController.abort();
      this.#cancelRecovery();
      await monitorTask;
      await this.#recoveryTask;
    }

    let outcome: TestOutcome = failure ? "error" : result.outcome;
    if (this.#stopRequested) {
      outcome = "stopped";
    } else {
      this.#runState.stop("Test finished");
      const shutdown = await this.#shutdown();
      if (isErr(shutdown)) {
        this.#logger.error(
          `Safe shutdown failed: ${unwrapErr(shutdown).message}`,
        );
      }
    }

    this.#logger.info(
      `Test finished (${outcome}) at cycle ${result.lastCompletedCycle}`,
    );
    this.events.emit("finished", {
      cycleCount: result.lastCompletedCycle,
      error: failure,
      outcome,
    });
    return result.lastCompletedCycle;
  }

  /** Cancel any recovery in flight and start a new one. */
  async #recover(signal: AbortSignal): Promise<RecoveryAttempt> {
    const previous = this.#recoveryTask;
    this.#cancelRecovery();
    await previous;

    const controller = createLinkedAbortController(signal, this.#runState.signal);
    const engine = new RecoveryEngine({
      catalog: this.#catalog,
      checkFaults: (checkSignal) => this.#monitor.checkFaults(checkSignal),
      clock: this.#clock,
      config: this.#config.recovery,
      events: this.events,
      logger: this.#logger,
      runState: this.#runState,
    });
    const task = engine
      .run(controller.signal)
      .then((recovered) => ({ recovered, state: engine.state }));
    this.#recoveryTask = task;
    this.#recoveryController = controller;
    try {
      return await task;
    } finally {
      // Detaches the listeners it holds on the monitor and run signals.
      controller.abort();
      if (this.#recoveryTask === task) {
        this.#recoveryTask = null;
        this.#recoveryController = null;
      }
    }
  }

  #cancelRecovery(): void {
    this.#recoveryController?.abort();
  }

  /** Torque 0 then state 0, each with retry. Both are always attempted. */
  async #shutdown(): Promise<Result<void, ModbusError>> {
    let firstError: ModbusError | undefined;
    for (const [command, value] of [
      ["set_remote_torque_command", 0],
      ["set_remote_state_command", 0],
    ] as const) {
      const result = await executeWithRetry(
        () => this.#catalog.execute(command, value),
        { ...this.#config.retry, clock: this.#clock },
      );
      if (isErr(result)) {
        firstError ??= unwrapErr(result);
      }
    }
    return firstError ? createErr(firstError) : createOk(undefined);
  }
}

function defaultConfig(): ControllerConfig {
  const result = parseConfig({});
  if (isErr(result)) {
    throw unwrapErr(result);
  }
  return unwrapOk(result);
}
