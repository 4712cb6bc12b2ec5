// Tests for the serial gate and register gateway
// Mutual exclusion, FIFO order and failure normalisation

import { isOk, unwrapErr, unwrapOk } from "option-t/plain_result";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ModbusExceptionError, TransportError } from "../src/errors.ts";
import { RegisterGateway, SerialGate } from "../src/gateway/index.ts";
import { MockTransport } from "../src/transport/mock-transport.ts";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("SerialGate", () => {
  it("runs tasks one at a time in arrival order", async () => {
    const gate = new SerialGate();
    const order: string[] = [];
    const first = deferred();

    const a = gate.run(async () => {
      order.push("a:start");
      await first.promise;
      order.push("a:end");
    });
    const b = gate.run(async () => {
      order.push("b");
    });
    const c = gate.run(async () => {
      order.push("c");
    });

    await Promise.resolve();
    expect(order).toEqual(["a:start"]);
    expect(gate.getStats().queueLength).toBe(2);
    expect(gate.getStats().held).toBe(true);

    first.resolve();
    await Promise.all([a, b, c]);
    expect(order).toEqual(["a:start", "a:end", "b", "c"]);
    expect(gate.getStats()).toMatchObject({
      acquisitions: 3,
      held: false,
      queueLength: 0,
    });
  });

  it("releases the gate when a task rejects", async () => {
    const gate = new SerialGate();
    await expect(
      gate.run(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(gate.run(async () => 42)).resolves.toBe(42);
  });
});

describe("RegisterGateway", () => {
  let transport: MockTransport;
  let gateway: RegisterGateway;

  beforeEach(async () => {
    vi.useFakeTimers();
    transport = new MockTransport({ type: "mock" }, { operationDelay: 5 });
    const connected = transport.connect();
    await vi.advanceTimersByTimeAsync(0);
    await connected;
    gateway = new RegisterGateway(transport);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("never lets two operations overlap on the transport", async () => {
    transport.setRegister(258, 7);
    const operations = [
      gateway.readRegister(258),
      gateway.writeRegister(494, 100),
      gateway.readRegister(258),
      gateway.writeRegisters(360, [1, 2]),
    ];
    await vi.advanceTimersByTimeAsync(50);
    const results = await Promise.all(operations);

    expect(results.every((result) => isOk<number | void, TransportError>(result))).toBe(true);
    expect(transport.maxConcurrentOperations).toBe(1);
    expect(transport.reads).toEqual([258, 258]);
    expect(transport.writes).toEqual([
      { address: 494, values: [100] },
      { address: 360, values: [1, 2] },
    ]);
    expect(gateway.getStats().acquisitions).toBe(4);
  });

  it("resolves reads with the raw word", async () => {
    transport.setRegister(263, 0xfff6);
    const read = gateway.readRegister(263);
    await vi.advanceTimersByTimeAsync(5);
    expect(unwrapOk(await read)).toBe(0xfff6);
  });

  it("turns a timeout into a TransportError with the timeout flag", async () => {
    const timeout = new Error("Timed out");
    timeout.name = "TransactionTimedOutError";
    transport.failNextReads(1, timeout);
    const read = gateway.readRegister(258);
    await vi.advanceTimersByTimeAsync(5);
    const error = unwrapErr(await read);
    expect(error).toBeInstanceOf(TransportError);
    expect(error.timeout).toBe(true);
  });

  it("keeps a device exception response as the cause", async () => {
    const exception = Object.assign(new Error("Modbus exception 2"), {
      modbusCode: 2,
    });
    transport.failNextWrites(1, exception);
    const write = gateway.writeRegister(9999, 1);
    await vi.advanceTimersByTimeAsync(5);
    const error = unwrapErr(await write);
    expect(error.timeout).toBe(false);
    expect(error.cause).toBeInstanceOf(ModbusExceptionError);
    expect(error.message).toBe(
      "Illegal data address (address does not exist) (code: 2)",
    );
  });

  it("reports a closed link as an error result", async () => {
    transport.simulateDisconnect();
    const result = await gateway.readRegister(258);
    expect(unwrapErr(result).message).toBe("Transport not connected");
  });
});
