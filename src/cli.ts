#!/usr/bin/env node
/**
 * Clutch cycle tester CLI
 * Runs the cycle test, prints controller status or the logged cycle count
 */

import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import { loadCatalog } from "./catalog/index.ts";
import {
  type ControllerConfig,
  DEFAULT_TEST_PARAMETERS,
  loadConfig,
  type TestParameters,
} from "./config.ts";
import { getLastCycleCount } from "./cycle/cycle-log.ts";
import { ConfigurationError, describeError } from "./errors.ts";
import type { FaultUpdateEvent, RecoveryStatusEvent } from "./events.ts";
import {
  createConsoleSink,
  createFileSink,
  createLogger,
  type FileSink,
  isLogLevel,
  type Logger,
  type LogLevel,
  type SinkWithLevel,
} from "./logging/index.ts";
import { MotorController } from "./motor-controller.ts";
import { attachSimulatedMotor, MockTransport } from "./transport/index.ts";

interface CommonOptions {
  config?: string;
  port?: string;
  slave?: number;
  baud?: number;
  logLevel?: string;
  simulate?: boolean;
}

interface RunOptions extends CommonOptions {
  cycles: string;
  rpm: number;
  forwardTorque: number;
  reverseTorque: number;
  forwardDuration: number;
  reverseDuration: number;
  motorCurrent: number;
  brakeCurrent: number;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function buildConfig(options: CommonOptions): ControllerConfig {
  let logging: { level: LogLevel } | undefined;
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new ConfigurationError(
        `Unknown log level ${options.logLevel} (debug, info, warn, error)`,
      );
    }
    logging = { level: options.logLevel };
  }
  return loadConfig(options.config, {
    logging,
    serial: {
      ...(options.port ? { path: options.port } : {}),
      ...(options.slave !== undefined ? { slaveId: options.slave } : {}),
      ...(options.baud !== undefined ? { baudRate: options.baud } : {}),
    },
  });
}

function buildLogger(config: ControllerConfig): {
  logger: Logger;
  fileSink?: FileSink;
} {
  const level = config.logging.level;
  const sinks: SinkWithLevel[] = [{ minLevel: level, sink: createConsoleSink() }];
  let fileSink: FileSink | undefined;
  if (config.files.activityLog) {
    fileSink = createFileSink(config.files.activityLog);
    sinks.push({ minLevel: "debug", sink: fileSink });
  }
  return {
    fileSink,
    logger: createLogger({ level, scope: "cli", sinks }),
  };
}

function buildController(
  config: ControllerConfig,
  logger: Logger,
  simulate: boolean,
): MotorController {
  if (!simulate) {
    return new MotorController({ config, logger });
  }
  const catalog = loadCatalog(config.catalogPath);
  const transport = new MockTransport({ name: "simulator", type: "mock" });
  attachSimulatedMotor(transport, catalog);
  logger.child("cli").warn("Running against the simulated motor");
  return new MotorController({ catalog, config, logger, transport });
}

function printFaults(update: FaultUpdateEvent): void {
  if (update.faults.length > 0) {
    console.log(chalk.red(`Faults: ${update.faults.join(", ")}`));
  }
  if (update.warnings.length > 0) {
    console.log(chalk.yellow(`Warnings: ${update.warnings.join(", ")}`));
  }
}

function printRecovery(event: RecoveryStatusEvent): void {
  if (event.kind === "recovery_countdown") return;
  const text = `[recovery] ${event.kind}: ${event.detail}`;
  switch (event.kind) {
    case "recovery_successful":
      console.log(chalk.green(text));
      break;
    case "recovery_error":
    case "recovery_failed":
      console.log(chalk.red(text));
      break;
    default:
      console.log(chalk.yellow(text));
  }
}

function addConnectionOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "JSON configuration file")
    .option("-p, --port <path>", "serial port (e.g. /dev/ttyUSB0, COM3)")
    .option("--slave <id>", "Modbus slave address", parseInteger)
    .option("--baud <rate>", "baud rate", parseInteger)
    .option("-l, --log-level <level>", "debug, info, warn or error")
    .option("--simulate", "use the built-in simulated motor instead of a port");
}

const program = new Command();
program
  .name("clutch-cycle-tester")
  .description("Bidirectional torque cycling for one-way clutch endurance tests");

addConnectionOptions(
  program
    .command("run")
    .description("Run the cycle test until the target is reached or Ctrl+C")
    .option("-n, --cycles <count>", "target cycle count (-1 for unbounded)", "-1")
    .option(
      "--rpm <rpm>",
      "target speed",
      parseNumber,
      DEFAULT_TEST_PARAMETERS.targetRpm,
    )
    .option(
      "--forward-torque <percent>",
      "forward torque",
      parseNumber,
      DEFAULT_TEST_PARAMETERS.forwardTorquePercent,
    )
    .option(
      "--reverse-torque <percent>",
      "reverse torque (negative)",
      parseNumber,
      DEFAULT_TEST_PARAMETERS.reverseTorquePercent,
    )
    .option(
      "--forward-duration <seconds>",
      "forward segment length",
      parseNumber,
      DEFAULT_TEST_PARAMETERS.forwardDurationSeconds,
    )
    .option(
      "--reverse-duration <seconds>",
      "reverse segment length",
      parseNumber,
      DEFAULT_TEST_PARAMETERS.reverseDurationSeconds,
    )
    .option(
      "--motor-current <amps>",
      "maximum motoring current",
      parseNumber,
      DEFAULT_TEST_PARAMETERS.maxMotorCurrent,
    )
    .option(
      "--brake-current <amps>",
      "maximum braking current",
      parseNumber,
      DEFAULT_TEST_PARAMETERS.maxBrakeCurrent,
    ),
).action(async (options: RunOptions) => {
  const config = buildConfig(options);
  const { logger, fileSink } = buildLogger(config);
  const controller = buildController(config, logger, options.simulate ?? false);
  const params: TestParameters = {
    forwardDurationSeconds: options.forwardDuration,
    forwardTorquePercent: options.forwardTorque,
    maxBrakeCurrent: options.brakeCurrent,
    maxMotorCurrent: options.motorCurrent,
    reverseDurationSeconds: options.reverseDuration,
    reverseTorquePercent: options.reverseTorque,
    targetRpm: options.rpm,
  };

  controller.events.on("faults", printFaults);
  controller.events.on("recovery", printRecovery);
  controller.events.on("cycle", ({ cycle }) => {
    console.log(chalk.green(`✓ Cycle ${cycle} completed`));
  });
  controller.events.on("finished", ({ outcome, cycleCount }) => {
    const color = outcome === "completed" ? chalk.green : chalk.yellow;
    console.log(color(`Test ${outcome} after cycle ${cycleCount}`));
  });

  let stopping: Promise<void> | undefined;
  process.once("SIGINT", () => {
    console.log(chalk.yellow("\nStopping test..."));
    stopping = controller.stopTest().catch((error: unknown) => {
      console.error(chalk.red(`Shutdown failed: ${describeError(error)}`));
      process.exitCode = 1;
    });
  });

  try {
    await controller.connect();
    await controller.startTest(params, options.cycles);
    await stopping;
  } finally {
    await controller.disconnect();
    await fileSink?.close();
  }
});

addConnectionOptions(
  program.command("status").description("Print faults, warnings and telemetry"),
).action(async (options: CommonOptions) => {
  const config = buildConfig(options);
  const { logger, fileSink } = buildLogger(config);
  const controller = buildController(config, logger, options.simulate ?? false);
  try {
    await controller.connect();
    const faults = await controller.checkFaults();
    const warnings = await controller.checkWarnings();
    const snapshot = await controller.readMotorSnapshot();
    console.log(
      chalk.bold("Faults:"),
      faults.messages.length > 0
        ? chalk.red(faults.messages.join(", "))
        : chalk.green("none"),
    );
    console.log(
      chalk.bold("Warnings:"),
      warnings.messages.length > 0
        ? chalk.yellow(warnings.messages.join(", "))
        : chalk.green("none"),
    );
    for (const [name, value] of Object.entries(snapshot)) {
      console.log(`${chalk.gray(name.padEnd(16))} ${value.toFixed(2)}`);
    }
  } finally {
    await controller.disconnect();
    await fileSink?.close();
  }
});

program
  .command("count")
  .description("Print the last cycle recorded in the cycle log")
  .option("-c, --config <path>", "JSON configuration file")
  .option("-f, --file <path>", "cycle log file")
  .action(async (options: { config?: string; file?: string }) => {
    const config = loadConfig(options.config);
    console.log(await getLastCycleCount(options.file ?? config.files.cycleLog));
  });

try {
  await program.parseAsync(process.argv);
} catch (error) {
  console.error(chalk.red(`Error: ${describeError(error)}`));
  process.exitCode = 1;
}
