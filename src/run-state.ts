// Shared run state for the concurrent activities of one test
// A single object handed by reference to the cycle, monitor and recovery tasks

/**
 * Cancellation token plus the two flags every activity observes.
 *
 * `running` is the authoritative stop signal; `autoRecovery` gates the
 * recovery engine. `stop()` clears both and aborts {@link signal}, which
 * wakes every pending sleep.
 */
export class RunState {
  #running = false;
  #autoRecovery = false;
  #controller = new AbortController();

  get running(): boolean {
    return this.#running;
  }

  get autoRecovery(): boolean {
    return this.#autoRecovery;
  }

  /** Aborted by {@link stop}; replaced on every {@link begin}. */
  get signal(): AbortSignal {
    return this.#controller.signal;
  }

  /** True while running and not aborted. */
  get active(): boolean {
    return this.#running && !this.#controller.signal.aborted;
  }

  begin(): void {
    this.#controller = new AbortController();
    this.#running = true;
    this.#autoRecovery = true;
  }

  /** Natural end of the run (target reached); recovery may still finish. */
  finish(): void {
    this.#running = false;
  }

  /** External stop: clears both flags and aborts the signal. */
  stop(reason: string = "Test stopped"): void {
    this.#running = false;
    this.#autoRecovery = false;
    if (!this.#controller.signal.aborted) {
      this.#controller.abort(new Error(reason));
    }
  }
}

/**
 * Create an AbortController that also aborts when any of `parents` does.
 * Used to give each task its own cancel handle under the run's signal.
 *
 * The listeners on `parents` stay attached until the child aborts, so a
 * finished task must abort its controller.
 */
export function createLinkedAbortController(
  ...parents: AbortSignal[]
): AbortController {
  const controller = new AbortController();
  for (const parent of parents) {
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    parent.addEventListener("abort", () => controller.abort(parent.reason), {
      once: true,
      signal: controller.signal,
    });
  }
  return controller;
}
