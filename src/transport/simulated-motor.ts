// Simulated motor controller behind a MockTransport
// Enough behaviour for end-to-end runs without hardware: rpm follows the
// commanded torque and enable state, and clear-faults clears the fault word

import type { Catalog } from "../catalog/index.ts";
import { toSigned16 } from "../decoder.ts";
import type { MockTransport } from "./mock-transport.ts";

export interface SimulatedMotorOptions {
  /** Rpm reported under forward torque when no speed was commanded. */
  freeRunRpm?: number;
  /** Rpm the output turns backwards when the clutch slips. */
  slipRpm?: number;
  /** Start with a slipping clutch. */
  clutchSlipping?: boolean;
  /** Clear-faults leaves the faults in place while true. */
  stickyFaults?: boolean;
  motorTempC?: number;
  controllerTempC?: number;
  batteryVoltage?: number;
}

export interface SimulatedMotor {
  /** Set bits in the first fault register. */
  injectFault(bits: number): void;
  /** Set bits in the first warning register. */
  injectWarning(bits: number): void;
  setClutchSlipping(slipping: boolean): void;
  setStickyFaults(sticky: boolean): void;
  /** Commanded torque in percent, decoded from the torque register. */
  readonly torquePercent: number;
  readonly enabled: boolean;
  /** Number of clear-faults commands received. */
  readonly clearCount: number;
}

function addressOf(
  map: ReadonlyMap<string, { address: number }>,
  name: string,
): number {
  const entry = map.get(name);
  if (!entry) {
    throw new Error(`Simulated motor needs catalog entry ${name}`);
  }
  return entry.address;
}

/** Wire motor-like behaviour into `transport`. */
export function attachSimulatedMotor(
  transport: MockTransport,
  catalog: Catalog,
  options: SimulatedMotorOptions = {},
): SimulatedMotor {
  const torque = catalog.commands.get("set_remote_torque_command");
  if (!torque) {
    throw new Error("Simulated motor needs catalog entry set_remote_torque_command");
  }
  const stateAddress = addressOf(catalog.commands, "set_remote_state_command");
  const speedAddress = addressOf(catalog.commands, "set_remote_speed_command");
  const clearAddress = addressOf(catalog.commands, "clear_faults");
  const faultsAddress = addressOf(catalog.telemetry, "read_faults");
  const warningsAddress = addressOf(catalog.telemetry, "read_warnings");

  let clutchSlipping = options.clutchSlipping ?? false;
  let stickyFaults = options.stickyFaults ?? false;
  let clearCount = 0;
  const slipRpm = options.slipRpm ?? 60;
  const freeRunRpm = options.freeRunRpm ?? 300;

  const telemetryWord = (name: string, value: number) => {
    const point = catalog.telemetry.get(name);
    if (point) {
      transport.setRegister(point.address, Math.round(value / point.multiplier));
    }
  };
  telemetryWord("motor_temp", options.motorTempC ?? 35);
  telemetryWord("controller_temp", options.controllerTempC ?? 30);
  telemetryWord("battery_voltage", options.batteryVoltage ?? 48);

  const torquePercent = () =>
    toSigned16(transport.getRegister(torque.address)) / torque.multiplier;
  const enabled = () => transport.getRegister(stateAddress) === 2;

  transport.onRead(addressOf(catalog.telemetry, "motor_rpm"), () => {
    if (!enabled()) return 0;
    const percent = torquePercent();
    if (percent > 0) {
      const commanded = transport.getRegister(speedAddress);
      return commanded > 0 ? commanded : freeRunRpm;
    }
    if (percent < 0 && clutchSlipping) {
      return -slipRpm & 0xffff;
    }
    return 0;
  });

  transport.onWrite((address, values) => {
    if (address === clearAddress && values[0] === 1) {
      clearCount++;
      if (!stickyFaults) {
        transport.setRegister(faultsAddress, 0);
      }
    }
  });

  return {
    get clearCount() {
      return clearCount;
    },
    get enabled() {
      return enabled();
    },
    injectFault(bits) {
      transport.setRegister(faultsAddress, transport.getRegister(faultsAddress) | bits);
    },
    injectWarning(bits) {
      transport.setRegister(
        warningsAddress,
        transport.getRegister(warningsAddress) | bits,
      );
    },
    setClutchSlipping(slipping) {
      clutchSlipping = slipping;
    },
    setStickyFaults(sticky) {
      stickyFaults = sticky;
    },
    get torquePercent() {
      return torquePercent();
    },
  };
}
