import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { loadCatalog } from "../src/catalog/index.ts";
import {
  decodeBits,
  decodeFaultSnapshot,
  toSigned16,
} from "../src/decoder.ts";

describe("Fault decoder", () => {
  describe("decodeBits", () => {
    it("returns the descriptions of set bits in bit order", () => {
      const table = new Map([
        [0, "A"],
        [2, "C"],
      ]);
      expect(decodeBits(0b101, table)).toEqual(["A", "C"]);
    });

    it("ignores set bits without a description", () => {
      const table = new Map([[3, "D"]]);
      expect(decodeBits(0b1111_0111, table)).toEqual([]);
      expect(decodeBits(0b1000, table)).toEqual(["D"]);
    });

    it("returns nothing for a zero register", () => {
      const table = new Map([[0, "A"]]);
      expect(decodeBits(0, table)).toEqual([]);
    });

    it("only looks at the low 16 bits", () => {
      const table = new Map([
        [0, "low"],
        [15, "high"],
      ]);
      expect(decodeBits(0x1_8001, table)).toEqual(["low", "high"]);
    });

    it("emits exactly one message per described set bit", () => {
      const descriptions = new Map(
        Array.from({ length: 16 }, (_, bit) => [bit, `bit ${bit}`] as const),
      );
      fc.assert(
        fc.property(fc.integer({ max: 0xffff, min: 0 }), (value) => {
          const messages = decodeBits(value, descriptions);
          const expected = Array.from({ length: 16 }, (_, bit) => bit)
            .filter((bit) => (value >> bit) & 1)
            .map((bit) => `bit ${bit}`);
          expect(messages).toEqual(expected);
        }),
      );
    });
  });

  describe("decodeFaultSnapshot", () => {
    const { faultTables } = loadCatalog();

    it("concatenates first and second register messages", () => {
      const snapshot = decodeFaultSnapshot(
        { faults: 0b10, faults2: 0b1, warnings: 0, warnings2: 0b1000_0000 },
        faultTables,
      );
      expect(snapshot.faultMessages).toEqual([
        "Phase over current (flash code 1,2)",
        "Parameter CRC (flash code 3,1)",
      ]);
      expect(snapshot.warningMessages).toEqual([
        "Missed CAN Message (flash code 7,8)",
      ]);
      expect(snapshot.faultsBitmap).toBe(0b10);
      expect(snapshot.faults2Bitmap).toBe(1);
      expect(snapshot.warningsBitmap).toBe(0);
      expect(snapshot.warnings2Bitmap).toBe(0b1000_0000);
    });
  });

  describe("toSigned16", () => {
    it("reinterprets words at and above 0x8000 as negative", () => {
      expect(toSigned16(0)).toBe(0);
      expect(toSigned16(0x7fff)).toBe(32767);
      expect(toSigned16(0x8000)).toBe(-32768);
      expect(toSigned16(0xffff)).toBe(-1);
      expect(toSigned16(65476)).toBe(-60);
    });
  });
});
