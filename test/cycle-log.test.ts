import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  CycleLog,
  formatCycleLine,
  getLastCycleCount,
  parseLastCycleCount,
} from "../src/cycle/cycle-log.ts";
import { classifyRotation } from "../src/cycle/verification.ts";

describe("Cycle log", () => {
  describe("parseLastCycleCount", () => {
    it("returns the last valid line's count", () => {
      expect(
        parseLastCycleCount(
          "No of cycles: 5\nNo of cycles: 6\nNo of cycles: 7\ngarbage\nNo of cycles: x\n",
        ),
      ).toBe(7);
    });

    it("tolerates CRLF line endings and surrounding spaces", () => {
      expect(parseLastCycleCount("No of cycles: 2\r\nNo of cycles:  3  \r\n")).toBe(3);
    });

    it("returns 0 when nothing matches", () => {
      expect(parseLastCycleCount("")).toBe(0);
      expect(parseLastCycleCount("cycles: 4\n")).toBe(0);
    });
  });

  it("formats one line per cycle", () => {
    expect(formatCycleLine(12)).toBe("No of cycles: 12\n");
  });

  describe("CycleLog", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "cycle-log-test-"));
    });

    afterEach(async () => {
      await rm(dir, { force: true, recursive: true });
    });

    it("returns 0 for a missing file", async () => {
      expect(await getLastCycleCount(join(dir, "missing.txt"))).toBe(0);
    });

    it("creates parent directories and appends", async () => {
      const log = new CycleLog(join(dir, "data", "No_of_cycles.txt"));
      await log.append(1);
      await log.append(2);
      expect(await readFile(log.path, "utf8")).toBe(
        "No of cycles: 1\nNo of cycles: 2\n",
      );
      expect(await log.getLastCycleCount()).toBe(2);
    });

    it("continues after malformed trailing lines", async () => {
      const path = join(dir, "No_of_cycles.txt");
      await writeFile(path, "No of cycles: 7\npower cut her");
      const log = new CycleLog(path);
      expect(await log.getLastCycleCount()).toBe(7);
    });
  });
});

describe("classifyRotation", () => {
  const thresholds = { forwardMinRpm: 10, reverseHoldRpm: 5, reverseSlipRpm: 10 };

  it("verifies forward rotation above the minimum rpm", () => {
    expect(classifyRotation(50, 11, thresholds)).toBe("verified");
    expect(classifyRotation(50, 10, thresholds)).toBe("pending");
    expect(classifyRotation(50, 0, thresholds)).toBe("pending");
  });

  it("flags backwards rotation under forward torque", () => {
    expect(classifyRotation(50, -11, thresholds)).toBe("mismatch");
    expect(classifyRotation(50, -10, thresholds)).toBe("pending");
  });

  it("verifies a holding clutch under reverse torque", () => {
    expect(classifyRotation(-50, 0, thresholds)).toBe("verified");
    expect(classifyRotation(-50, -4, thresholds)).toBe("verified");
    expect(classifyRotation(-50, 5, thresholds)).toBe("pending");
  });

  it("reports a clutch failure when the shaft turns under reverse torque", () => {
    expect(classifyRotation(-50, -11, thresholds)).toBe("clutch_failure");
    expect(classifyRotation(-50, 11, thresholds)).toBe("clutch_failure");
    expect(classifyRotation(-50, 10, thresholds)).toBe("pending");
  });

  it("never verifies with zero torque", () => {
    expect(classifyRotation(0, 100, thresholds)).toBe("pending");
    expect(classifyRotation(0, 0, thresholds)).toBe("pending");
  });
});
