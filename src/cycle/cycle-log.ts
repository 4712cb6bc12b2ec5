// Append-only cycle count log
// One `No of cycles: <n>` line per completed cycle; the last valid line wins

import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";

const CYCLE_LINE = /^No of cycles:\s*(\d+)\s*$/;

/** Text of the log line recorded for cycle `n`. */
export function formatCycleLine(cycle: number): string {
  return `No of cycles: ${cycle}\n`;
}

/**
 * Last completed cycle number recorded in `contents`, scanning from the end.
 * Lines that do not match the pattern are skipped. `0` when none match.
 */
export function parseLastCycleCount(contents: string): number {
  const lines = contents.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i--) {
    const match = CYCLE_LINE.exec(lines[i] ?? "");
    if (match?.[1] !== undefined) {
      return Number.parseInt(match[1], 10);
    }
  }
  return 0;
}

/** Reads and appends the cycle log at a fixed path. */
export class CycleLog {
  constructor(readonly path: string) {}

  /** `0` when the file is missing or unreadable. */
  async getLastCycleCount(): Promise<number> {
    return getLastCycleCount(this.path);
  }

  async append(cycle: number): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, formatCycleLine(cycle), "utf8");
  }
}

export async function getLastCycleCount(path: string): Promise<number> {
  try {
    return parseLastCycleCount(await readFile(path, "utf8"));
  } catch {
    return 0;
  }
}
