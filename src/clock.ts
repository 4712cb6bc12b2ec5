/**
 * Time source used by every loop in the controller.
 *
 * Injected rather than imported so tests can drive the engines with fake
 * timers, and so every wait can be interrupted through an AbortSignal.
 */
export interface Clock {
  /** Milliseconds since an arbitrary origin. */
  now(): number;
  /**
   * Wait `ms` milliseconds. Resolves early (never rejects) when `signal`
   * aborts; callers re-check their run flags after every sleep.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const done = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal?.addEventListener("abort", done, { once: true });
    }),
};
