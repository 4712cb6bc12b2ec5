// Retry helper shared by the startup sequence, torque commands and fault checks
// Works on Results: a failed attempt is an Err, never a rejection

import { isOk, type Result, unwrapErr } from "option-t/plain_result";
import { type Clock, systemClock } from "./clock.ts";

/** Retry strategy for failed register operations. */
export interface RetryOptions {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  /** Delay between attempts in milliseconds. */
  delayMs: number;
  /** Double the delay after every failed attempt. */
  exponentialBackoff?: boolean;
  clock?: Clock;
  /** Stops retrying (after the current attempt) and cuts the delay short. */
  signal?: AbortSignal;
  /** Called after each failed attempt that will be retried. */
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Run `operation` until it returns Ok or the attempts are exhausted.
 *
 * Resolves with the last result. Sleeps only between attempts, never after
 * the final one.
 */
export async function executeWithRetry<T, E>(
  operation: (attempt: number) => Promise<Result<T, E>>,
  options: RetryOptions,
): Promise<Result<T, E>> {
  const {
    maxAttempts,
    delayMs,
    exponentialBackoff = false,
    clock = systemClock,
    signal,
    onRetry,
  } = options;
  const attempts = Math.max(1, maxAttempts);

  let attempt = 1;
  for (;;) {
    const result = await operation(attempt);
    if (isOk(result) || attempt >= attempts || signal?.aborted) {
      return result;
    }
    onRetry?.(unwrapErr(result), attempt);
    const delay = exponentialBackoff ? delayMs * 2 ** (attempt - 1) : delayMs;
    await clock.sleep(delay, signal);
    if (signal?.aborted) {
      return result;
    }
    attempt++;
  }
}
