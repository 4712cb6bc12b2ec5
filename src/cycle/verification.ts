import type { VerificationThresholds } from "../config.ts";

/**
 * Outcome of one rpm sample taken during a torque segment.
 *
 * - `verified`: rotation matches the commanded direction (forward) or the
 *   clutch holds (reverse).
 * - `clutch_failure`: the shaft turns under reverse torque; the test stops.
 * - `mismatch`: forward torque but the motor turns backwards.
 * - `pending`: nothing conclusive yet.
 */
export type RotationCheck =
  | "verified"
  | "clutch_failure"
  | "mismatch"
  | "pending";

export function classifyRotation(
  torquePercent: number,
  rpm: number,
  thresholds: Pick<
    VerificationThresholds,
    "forwardMinRpm" | "reverseHoldRpm" | "reverseSlipRpm"
  >,
): RotationCheck {
  if (torquePercent > 0) {
    if (rpm > thresholds.forwardMinRpm) return "verified";
    if (rpm < -thresholds.forwardMinRpm) return "mismatch";
    return "pending";
  }
  if (torquePercent < 0) {
    if (Math.abs(rpm) > thresholds.reverseSlipRpm) return "clutch_failure";
    if (Math.abs(rpm) < thresholds.reverseHoldRpm) return "verified";
  }
  return "pending";
}
