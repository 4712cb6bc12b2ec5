export { RegisterGateway } from "./register-gateway.ts";
export type { RegisterGatewayOptions } from "./register-gateway.ts";
export { SerialGate } from "./serial-gate.ts";
export type { GateStats } from "./serial-gate.ts";
