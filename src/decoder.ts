// Fault / warning register decoding
// Pure functions turning 16-bit status words into condition descriptions

/** Description per bit position (0-15). Undescribed bits are ignored. */
export type BitDescriptions = ReadonlyMap<number, string>;

/** Bit tables for the four status registers of the controller. */
export interface FaultTables {
  faults: BitDescriptions;
  faults2: BitDescriptions;
  warnings: BitDescriptions;
  warnings2: BitDescriptions;
}

/** Raw values of the four status registers from one poll. */
export interface StatusRegisters {
  faults: number;
  faults2: number;
  warnings: number;
  warnings2: number;
}

/** Decoded view of one poll of the status registers. */
export interface FaultSnapshot {
  faultsBitmap: number;
  faults2Bitmap: number;
  warningsBitmap: number;
  warnings2Bitmap: number;
  /** Fault descriptions, first register then second, each in bit order. */
  faultMessages: string[];
  /** Warning descriptions, first register then second, each in bit order. */
  warningMessages: string[];
}

/**
 * Decode a 16-bit register into the descriptions of its set bits.
 *
 * Bits are visited from 0 to 15, so the result is ordered by bit position.
 */
export function decodeBits(
  registerValue: number,
  descriptions: BitDescriptions,
): string[] {
  const active: string[] = [];
  for (let bit = 0; bit < 16; bit++) {
    if ((registerValue & (1 << bit)) === 0) continue;
    const description = descriptions.get(bit);
    if (description !== undefined) {
      active.push(description);
    }
  }
  return active;
}

export function decodeFaultSnapshot(
  registers: StatusRegisters,
  tables: FaultTables,
): FaultSnapshot {
  return {
    faults2Bitmap: registers.faults2,
    faultMessages: [
      ...decodeBits(registers.faults, tables.faults),
      ...decodeBits(registers.faults2, tables.faults2),
    ],
    faultsBitmap: registers.faults,
    warnings2Bitmap: registers.warnings2,
    warningMessages: [
      ...decodeBits(registers.warnings, tables.warnings),
      ...decodeBits(registers.warnings2, tables.warnings2),
    ],
    warningsBitmap: registers.warnings,
  };
}

/** Reinterpret a raw register word as a two's-complement signed 16-bit value. */
export function toSigned16(word: number): number {
  const value = word & 0xffff;
  return value >= 0x8000 ? value - 0x10000 : value;
}
