import fc from "fast-check";
import { isErr, isOk, unwrapErr, unwrapOk } from "option-t/plain_result";
import { beforeEach, describe, expect, it } from "vitest";
import {
  CommandCatalog,
  decodeTelemetryValue,
  encodeCommandValue,
  loadCatalog,
  parseCatalog,
  type RegisterCommand,
} from "../src/catalog/index.ts";
import {
  CommandEncodingError,
  ConfigurationError,
  TransportError,
  UnknownCommandError,
  UnknownTelemetryError,
} from "../src/errors.ts";
import { RegisterGateway } from "../src/gateway/index.ts";
import { createLogger, createMemorySink } from "../src/logging/index.ts";
import { MockTransport } from "../src/transport/mock-transport.ts";

const torque: RegisterCommand = {
  address: 494,
  maxRegisterValue: 65536,
  multiplier: 40.46,
  name: "set_remote_torque_command",
};

describe("Command catalog", () => {
  describe("encodeCommandValue", () => {
    it("scales and rounds positive values", () => {
      expect(unwrapOk(encodeCommandValue(torque, 50))).toBe(2023);
      expect(unwrapOk(encodeCommandValue(torque, 0))).toBe(0);
    });

    it("wraps negative values by maxRegisterValue", () => {
      // round(-50 * 40.46) = -2023
      expect(unwrapOk(encodeCommandValue(torque, -50))).toBe(63513);
      expect(unwrapOk(encodeCommandValue(torque, -100))).toBe(61490);
    });

    it("rejects values that do not fit a register", () => {
      const state: RegisterCommand = {
        address: 493,
        multiplier: 1,
        name: "set_remote_state_command",
      };
      const negative = encodeCommandValue(state, -1);
      expect(isErr(negative)).toBe(true);
      expect(unwrapErr(negative)).toBeInstanceOf(CommandEncodingError);
      expect(isErr(encodeCommandValue(state, 65536))).toBe(true);
      expect(unwrapOk(encodeCommandValue(state, 65535))).toBe(65535);
    });

    it("round-trips torque through the signed register view", () => {
      const point = {
        address: 494,
        multiplier: 1,
        name: "torque_raw",
        signed: true,
      };
      fc.assert(
        fc.property(fc.integer({ max: 800, min: -800 }), (percent) => {
          const word = unwrapOk(encodeCommandValue(torque, percent));
          expect(word).toBeGreaterThanOrEqual(0);
          expect(word).toBeLessThanOrEqual(0xffff);
          expect(decodeTelemetryValue(point, word)).toBe(
            Math.round(percent * torque.multiplier),
          );
        }),
      );
    });
  });

  describe("decodeTelemetryValue", () => {
    it("applies sign and multiplier", () => {
      const current = {
        address: 262,
        multiplier: 0.032,
        name: "motor_current",
        signed: true,
      };
      expect(decodeTelemetryValue(current, 1000)).toBeCloseTo(32);
      expect(decodeTelemetryValue(current, 0xffff - 999)).toBeCloseTo(-32);
      const voltage = {
        address: 265,
        multiplier: 0.03,
        name: "battery_voltage",
        signed: false,
      };
      expect(decodeTelemetryValue(voltage, 1600)).toBeCloseTo(48);
    });
  });

  describe("parseCatalog", () => {
    it("loads the bundled catalog", () => {
      const catalog = loadCatalog();
      expect(catalog.commands.get("clear_faults")?.address).toBe(508);
      expect(catalog.commands.get("set_remote_state_command")?.multiplier).toBe(1);
      expect(catalog.telemetry.get("motor_rpm")?.signed).toBe(true);
      expect(catalog.telemetry.get("read_faults")?.signed).toBe(false);
      expect(catalog.faultTables.faults.size).toBe(16);
    });

    it("rejects bit keys outside 0..15", () => {
      const result = parseCatalog({
        commands: {},
        faultTables: {
          faults: { "16": "too high" },
          faults2: {},
          warnings: {},
          warnings2: {},
        },
        telemetry: {},
      });
      expect(isErr(result)).toBe(true);
      const error = unwrapErr(result);
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error.issues).toEqual(["faultTables.faults.16: bit keys must be 0..15"]);
    });

    it("throws a ConfigurationError for an unreadable file", () => {
      expect(() => loadCatalog("/nonexistent/catalog.json")).toThrow(
        ConfigurationError,
      );
    });
  });

  describe("CommandCatalog", () => {
    let transport: MockTransport;
    let catalog: CommandCatalog;
    const sink = createMemorySink();

    beforeEach(async () => {
      sink.clear();
      transport = new MockTransport();
      await transport.connect();
      const logger = createLogger({
        level: "debug",
        sinks: [{ minLevel: "debug", sink }],
      });
      catalog = new CommandCatalog(new RegisterGateway(transport), loadCatalog(), {
        logger,
      });
    });

    it("writes the encoded value and resolves with it", async () => {
      const result = await catalog.execute("set_remote_torque_command", -50);
      expect(unwrapOk(result)).toBe(63513);
      expect(transport.writes).toEqual([{ address: 494, values: [63513] }]);
    });

    it("rejects an unknown command without I/O", async () => {
      const result = await catalog.execute("launch_rocket", 1);
      expect(unwrapErr(result)).toBeInstanceOf(UnknownCommandError);
      expect(transport.writes).toEqual([]);
      expect(sink.messages("error")).toEqual(["Unknown command: launch_rocket"]);
    });

    it("does not write when encoding fails", async () => {
      const result = await catalog.execute("set_remote_state_command", -2);
      expect(unwrapErr(result)).toBeInstanceOf(CommandEncodingError);
      expect(transport.writes).toEqual([]);
    });

    it("surfaces transport failures as TransportError", async () => {
      transport.failNextWrites(1);
      const result = await catalog.execute("clear_faults", 1);
      expect(unwrapErr(result)).toBeInstanceOf(TransportError);
    });

    it("reads signed, scaled telemetry", async () => {
      transport.setRegister(263, 0xffff - 49); // -50 rpm
      transport.setRegister(265, 1600);
      expect(await catalog.readTelemetry("motor_rpm")).toBe(-50);
      expect(await catalog.readTelemetry("battery_voltage")).toBeCloseTo(48);
      const raw = await catalog.readRaw("motor_rpm");
      expect(unwrapOk(raw)).toBe(65486);
    });

    it("returns 0 and logs when a telemetry read fails", async () => {
      transport.failNextReads(1, new Error("Timed out"));
      expect(await catalog.readTelemetry("motor_temp")).toBe(0);
      expect(sink.messages("error")).toEqual(["Error reading motor_temp: Timed out"]);
    });

    it("returns 0 for an unknown telemetry point", async () => {
      expect(await catalog.readTelemetry("flux_capacitor")).toBe(0);
      const result = await catalog.readTelemetryResult("flux_capacitor");
      expect(isOk(result)).toBe(false);
      expect(unwrapErr(result)).toBeInstanceOf(UnknownTelemetryError);
      expect(transport.reads).toEqual([]);
    });
  });
});
