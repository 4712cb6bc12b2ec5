// SerialTransport against a stand-in for the modbus-serial client

import { unwrapErr } from "option-t/plain_result";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { TransportError } from "../src/errors.ts";
import { RegisterGateway } from "../src/gateway/index.ts";
import { SerialTransport } from "../src/transport/serial-transport.ts";
import type {
  SerialTransportConfig,
  TransportState,
} from "../src/transport/transport.ts";

const fake = vi.hoisted(() => {
  class FakeModbusRTU {
    static last: FakeModbusRTU | undefined;

    isOpen = false;
    connectRTUBuffered = vi.fn(async (_path: string, _options: object) => {
      this.isOpen = true;
    });
    setID = vi.fn((_id: number) => {});
    setTimeout = vi.fn((_timeoutMs: number) => {});
    close = vi.fn((callback: () => void) => {
      this.isOpen = false;
      callback();
    });
    readHoldingRegisters = vi.fn(async (_address: number, _length: number) => ({
      buffer: Buffer.alloc(2),
      data: [0] as number[],
    }));
    writeRegisters = vi.fn(async (address: number, values: number[]) => ({
      address,
      length: values.length,
    }));

    constructor() {
      FakeModbusRTU.last = this;
    }
  }
  return { FakeModbusRTU };
});

vi.mock("modbus-serial", () => ({ default: fake.FakeModbusRTU }));

const CONFIG: SerialTransportConfig = {
  baudRate: 115200,
  dataBits: 8,
  parity: "none",
  path: "/dev/ttyUSB0",
  slaveId: 3,
  stopBits: 1,
  timeoutMs: 750,
  type: "serial",
};

function createTransport() {
  const transport = new SerialTransport(CONFIG);
  const client = fake.FakeModbusRTU.last;
  if (!client) throw new Error("modbus-serial client was not created");
  const states: TransportState[] = [];
  const errors: Error[] = [];
  transport.addEventListener("statechange", (event) => states.push(event.detail));
  transport.addEventListener("error", (event) => errors.push(event.error));
  return { client, errors, states, transport };
}

describe("SerialTransport", () => {
  beforeEach(() => {
    fake.FakeModbusRTU.last = undefined;
  });

  describe("connect", () => {
    it("opens the port with the line settings, slave id and timeout", async () => {
      const { client, states, transport } = createTransport();
      let opened = false;
      transport.addEventListener("open", () => {
        opened = true;
      });

      await transport.connect();

      expect(client.connectRTUBuffered).toHaveBeenCalledWith("/dev/ttyUSB0", {
        baudRate: 115200,
        dataBits: 8,
        parity: "none",
        stopBits: 1,
      });
      expect(client.setID).toHaveBeenCalledWith(3);
      expect(client.setTimeout).toHaveBeenCalledWith(750);
      expect(states).toEqual(["connecting", "connected"]);
      expect(opened).toBe(true);
      expect(transport.connected).toBe(true);
    });

    it("does not reopen a connected port", async () => {
      const { client, transport } = createTransport();
      await transport.connect();
      await transport.connect();
      expect(client.connectRTUBuffered).toHaveBeenCalledTimes(1);
    });

    it("reports a port that cannot be opened", async () => {
      const { client, errors, states, transport } = createTransport();
      client.connectRTUBuffered.mockRejectedValueOnce(new Error("No such file"));

      const failure = transport.connect();
      await expect(failure).rejects.toBeInstanceOf(TransportError);
      await expect(failure).rejects.toThrow(
        "Failed to open /dev/ttyUSB0: No such file",
      );
      expect(states).toEqual(["connecting", "error"]);
      expect(errors.map((error) => error.message)).toEqual([
        "Failed to open /dev/ttyUSB0: No such file",
      ]);
      expect(client.setID).not.toHaveBeenCalled();
    });
  });

  describe("register access", () => {
    it("reads one holding register", async () => {
      const { client, transport } = createTransport();
      await transport.connect();
      client.readHoldingRegisters.mockResolvedValueOnce({
        buffer: Buffer.alloc(2),
        data: [0x1234],
      });

      expect(await transport.readHoldingRegister(258)).toBe(0x1234);
      expect(client.readHoldingRegisters).toHaveBeenCalledWith(258, 1);
    });

    it("turns an empty response into a TransportError", async () => {
      const { client, transport } = createTransport();
      await transport.connect();
      client.readHoldingRegisters.mockResolvedValueOnce({
        buffer: Buffer.alloc(0),
        data: [],
      });

      const read = transport.readHoldingRegister(258);
      await expect(read).rejects.toBeInstanceOf(TransportError);
      await expect(read).rejects.toThrow("Empty response reading register 258");
    });

    it("writes a run of registers", async () => {
      const { client, transport } = createTransport();
      await transport.connect();
      await transport.writeRegisters(494, [4046]);
      expect(client.writeRegisters).toHaveBeenCalledWith(494, [4046]);
    });

    it("rejects register access before connect", async () => {
      const { client, transport } = createTransport();
      await expect(transport.readHoldingRegister(258)).rejects.toThrow(
        "Transport not connected",
      );
      await expect(transport.writeRegisters(494, [0])).rejects.toThrow(
        "Transport not connected",
      );
      expect(client.readHoldingRegisters).not.toHaveBeenCalled();
      expect(client.writeRegisters).not.toHaveBeenCalled();
    });

    it("hands a transaction timeout to the gateway as a timeout", async () => {
      const { client, transport } = createTransport();
      await transport.connect();
      client.readHoldingRegisters.mockRejectedValueOnce(
        Object.assign(new Error("Timed out"), {
          name: "TransactionTimedOutError",
        }),
      );

      const result = await new RegisterGateway(transport).readRegister(258);
      const error = unwrapErr(result);
      expect(error).toBeInstanceOf(TransportError);
      expect(error.message).toBe("Timed out");
      expect(error.timeout).toBe(true);
      expect(transport.state).toBe("connected");
    });

    it("moves to the error state when the port vanishes", async () => {
      const { client, errors, states, transport } = createTransport();
      await transport.connect();
      client.isOpen = false;
      client.writeRegisters.mockRejectedValueOnce(new Error("Port Not Open"));

      await expect(transport.writeRegisters(493, [2])).rejects.toThrow(
        "Port Not Open",
      );
      expect(states).toEqual(["connecting", "connected", "error"]);
      expect(errors.map((error) => error.message)).toEqual(["Port Not Open"]);
    });
  });

  describe("disconnect", () => {
    it("closes the port once", async () => {
      const { client, states, transport } = createTransport();
      let closed = 0;
      transport.addEventListener("close", () => {
        closed++;
      });
      await transport.connect();

      await transport.disconnect();
      await transport.disconnect();

      expect(client.close).toHaveBeenCalledTimes(1);
      expect(client.isOpen).toBe(false);
      expect(closed).toBe(1);
      expect(states).toEqual(["connecting", "connected", "disconnected"]);
    });
  });
});
