// Library entry point

export {
  CommandCatalog,
  decodeTelemetryValue,
  encodeCommandValue,
  loadCatalog,
  parseCatalog,
  type Catalog,
  type RegisterCommand,
  type TelemetryPoint,
} from "./catalog/index.ts";
export { systemClock, type Clock } from "./clock.ts";
export {
  controllerConfigSchema,
  DEFAULT_RECOVERY_STAGES,
  DEFAULT_TEST_PARAMETERS,
  loadConfig,
  parseConfig,
  parseCycleTarget,
  parseTestParameters,
  UNBOUNDED,
  type ControllerConfig,
  type ControllerConfigInput,
  type CycleTarget,
  type RecoveryStage,
  type RetryPolicy,
  type TestParameters,
} from "./config.ts";
export {
  CycleEngine,
  type CycleRunOutcome,
  type CycleRunResult,
} from "./cycle/cycle-engine.ts";
export {
  CycleLog,
  formatCycleLine,
  getLastCycleCount,
  parseLastCycleCount,
} from "./cycle/cycle-log.ts";
export { classifyRotation, type RotationCheck } from "./cycle/verification.ts";
export {
  decodeBits,
  decodeFaultSnapshot,
  toSigned16,
  type BitDescriptions,
  type FaultSnapshot,
  type FaultTables,
  type StatusRegisters,
} from "./decoder.ts";
export {
  CommandEncodingError,
  ConfigurationError,
  ModbusError,
  ModbusExceptionError,
  TransportError,
  UnknownCommandError,
  UnknownTelemetryError,
} from "./errors.ts";
export {
  ControllerEventEmitter,
  EventEmitter,
  type ControllerEvents,
  type FaultUpdateEvent,
  type RecoveryEventKind,
  type RecoveryStatusEvent,
  type TestFinishedEvent,
  type TestOutcome,
  type TimerProgressEvent,
} from "./events.ts";
export { RegisterGateway, SerialGate, type GateStats } from "./gateway/index.ts";
export * from "./logging/index.ts";
export {
  FaultMonitor,
  INTERNAL_MODBUS_ERROR,
  type StatusCheck,
} from "./monitor/fault-monitor.ts";
export {
  MotorController,
  type CycleState,
  type MotorControllerOptions,
  type MotorSnapshot,
} from "./motor-controller.ts";
export {
  RecoveryEngine,
  type RecoveryState,
} from "./recovery/recovery-engine.ts";
export { executeWithRetry, type RetryOptions } from "./retry.ts";
export { createLinkedAbortController, RunState } from "./run-state.ts";
export * from "./transport/index.ts";
