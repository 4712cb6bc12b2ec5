// Serial Gate for the shared RTU link
// One register transaction at a time, granted in arrival order

import { type Clock, systemClock } from "../clock.ts";

/**
 * Gate statistics
 */
export interface GateStats {
  /** Completed acquisitions. */
  acquisitions: number;
  /** Tasks waiting for the gate right now. */
  queueLength: number;
  /** True while a task holds the gate. */
  held: boolean;
  /** Mean time a task held the gate, in milliseconds. */
  averageHoldMs: number;
}

/**
 * FIFO mutual-exclusion gate.
 *
 * Not reentrant: a task that calls `run` again from inside its own `run`
 * waits behind itself forever. Only the gateway acquires it, once per
 * register operation.
 */
export class SerialGate {
  readonly #clock: Clock;
  #tail: Promise<void> = Promise.resolve();
  #waiting = 0;
  #held = false;
  #acquisitions = 0;
  #totalHoldMs = 0;

  constructor(options: { clock?: Clock } = {}) {
    this.#clock = options.clock ?? systemClock;
  }

  /**
   * Run `task` while holding the gate. The gate is released when the task
   * settles, whether it resolves or rejects.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.#tail;
    let release = () => {};
    this.#tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    this.#waiting++;
    await previous;
    this.#waiting--;

    this.#held = true;
    const startedAt = this.#clock.now();
    try {
      return await task();
    } finally {
      this.#held = false;
      this.#acquisitions++;
      this.#totalHoldMs += this.#clock.now() - startedAt;
      release();
    }
  }

  getStats(): GateStats {
    return {
      acquisitions: this.#acquisitions,
      averageHoldMs:
        this.#acquisitions === 0 ? 0 : this.#totalHoldMs / this.#acquisitions,
      held: this.#held,
      queueLength: this.#waiting,
    };
  }
}
