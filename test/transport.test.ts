import { describe, expect, it } from "vitest";
import { loadCatalog } from "../src/catalog/index.ts";
import { TransportError } from "../src/errors.ts";
import {
  attachSimulatedMotor,
  createTransport,
  MockTransport,
  SerialTransport,
  TransportRegistry,
  type SimulatedMotorOptions,
  type TransportState,
} from "../src/transport/index.ts";

describe("Transport registry", () => {
  it("registers the serial and mock transports", () => {
    expect(TransportRegistry.getRegisteredTypes().sort()).toEqual([
      "mock",
      "serial",
    ]);
  });

  it("creates transports by config type", () => {
    expect(createTransport({ type: "mock" })).toBeInstanceOf(MockTransport);
    const serial = createTransport({
      baudRate: 115200,
      dataBits: 8,
      parity: "none",
      path: "/dev/ttyUSB0",
      slaveId: 1,
      stopBits: 1,
      timeoutMs: 1000,
      type: "serial",
    });
    expect(serial).toBeInstanceOf(SerialTransport);
    expect(serial.state).toBe("disconnected");
  });
});

describe("MockTransport", () => {
  it("reports state transitions and lifecycle events", async () => {
    const transport = new MockTransport();
    const states: TransportState[] = [];
    const events: string[] = [];
    transport.addEventListener("statechange", (event) => {
      states.push(event.detail);
    });
    transport.addEventListener("open", () => events.push("open"));
    transport.addEventListener("close", () => events.push("close"));

    await transport.connect();
    expect(transport.connected).toBe(true);
    await transport.disconnect();

    expect(states).toEqual(["connecting", "connected", "disconnected"]);
    expect(events).toEqual(["open", "close"]);
  });

  it("fails to connect when configured to", async () => {
    const transport = new MockTransport(
      { type: "mock" },
      { errorMessage: "port busy", shouldFailConnect: true },
    );
    const errors: string[] = [];
    transport.addEventListener("error", (event) => {
      errors.push(event.error.message);
    });
    await expect(transport.connect()).rejects.toBeInstanceOf(TransportError);
    expect(transport.state).toBe("error");
    expect(errors).toEqual(["port busy"]);
  });

  it("stores written words and serves them back", async () => {
    const transport = new MockTransport({ type: "mock" }, { registers: { 5: 9 } });
    await transport.connect();
    expect(await transport.readHoldingRegister(5)).toBe(9);
    await transport.writeRegisters(10, [1, 0x1_0002]);
    expect(transport.getRegister(10)).toBe(1);
    expect(transport.getRegister(11)).toBe(2);
    expect(transport.writesTo(10)).toEqual([1]);
  });

  it("injects a fixed number of failures", async () => {
    const transport = new MockTransport();
    await transport.connect();
    transport.failNextReads(2);
    await expect(transport.readHoldingRegister(1)).rejects.toThrow(
      "Mock transport error",
    );
    await expect(transport.readHoldingRegister(1)).rejects.toThrow(
      "Mock transport error",
    );
    await expect(transport.readHoldingRegister(1)).resolves.toBe(0);
  });
});

describe("Simulated motor", () => {
  const catalog = loadCatalog();

  async function setup(options: SimulatedMotorOptions = {}) {
    const transport = new MockTransport();
    await transport.connect();
    const motor = attachSimulatedMotor(transport, catalog, options);
    return { motor, transport };
  }

  it("reports no rotation while disabled", async () => {
    const { transport } = await setup();
    transport.setRegister(494, 2023);
    expect(await transport.readHoldingRegister(263)).toBe(0);
  });

  it("runs at the commanded speed under forward torque", async () => {
    const { motor, transport } = await setup();
    await transport.writeRegisters(1677, [300]);
    await transport.writeRegisters(493, [2]);
    await transport.writeRegisters(494, [2023]);
    expect(motor.enabled).toBe(true);
    expect(motor.torquePercent).toBeCloseTo(50);
    expect(await transport.readHoldingRegister(263)).toBe(300);
  });

  it("holds under reverse torque unless the clutch slips", async () => {
    const { motor, transport } = await setup({ slipRpm: 40 });
    await transport.writeRegisters(493, [2]);
    await transport.writeRegisters(494, [63513]);
    expect(await transport.readHoldingRegister(263)).toBe(0);
    motor.setClutchSlipping(true);
    expect(await transport.readHoldingRegister(263)).toBe(0x10000 - 40);
  });

  it("clears faults on the clear-faults command unless they are sticky", async () => {
    const { motor, transport } = await setup();
    motor.injectFault(0b100);
    await transport.writeRegisters(508, [1]);
    expect(transport.getRegister(258)).toBe(0);
    motor.setStickyFaults(true);
    motor.injectFault(0b100);
    await transport.writeRegisters(508, [1]);
    expect(transport.getRegister(258)).toBe(0b100);
    expect(motor.clearCount).toBe(2);
  });

  it("seeds temperature and voltage telemetry", async () => {
    const { transport } = await setup({ motorTempC: 41 });
    expect(transport.getRegister(261)).toBe(41);
    expect(transport.getRegister(259)).toBe(30);
    expect(transport.getRegister(265)).toBe(1600);
  });
});
