// Transport module exports and registration
// Sets up the transport registry and exports transport implementations

import { MockTransport } from "./mock-transport.ts";
import { SerialTransport } from "./serial-transport.ts";
import {
  type IRegisterTransport,
  type TransportConfig,
  TransportRegistry,
} from "./transport.ts";

/**
 * Register the built-in transports with the TransportRegistry.
 * The registry narrows the config to the matching discriminator.
 */
TransportRegistry.register("serial", (config) => new SerialTransport(config));
TransportRegistry.register("mock", (config) => new MockTransport(config));

export {
  MockTransport,
  type MockTransportOptions,
  type RecordedWrite,
} from "./mock-transport.ts";
export { SerialTransport } from "./serial-transport.ts";
export {
  attachSimulatedMotor,
  type SimulatedMotor,
  type SimulatedMotorOptions,
} from "./simulated-motor.ts";
// Re-export transport types and implementations for consumers
export type {
  IRegisterTransport,
  MockTransportConfig,
  SerialTransportConfig,
  TransportConfig,
  TransportErrorEvent,
  TransportEventMap,
  TransportFactory,
  TransportState,
} from "./transport.ts";
export { TransportRegistry } from "./transport.ts";

// Convenience helper to create transports via the registry
export function createTransport(config: TransportConfig): IRegisterTransport {
  return TransportRegistry.create(config);
}
