import { sleep as defaultSleep, systemClock, type Clock, type Sleep } from './timing.js';

export interface ThrottleOptions {
  minIntervalMs: number;
  now?: Clock;
  sleep?: Sleep;
}

/**
 * Fixed-interval throttle: successive acquisitions are spaced at least
 * `minIntervalMs` apart, starting one interval after construction.
 *
 * The slot is reserved synchronously inside `acquire()`, so callers that
 * acquire concurrently queue up behind each other instead of sharing a slot.
 */
export class FixedIntervalThrottle {
  readonly minIntervalMs: number;
  private readonly now: Clock;
  private readonly sleep: Sleep;
  private nextSlotAt: number;

  constructor(options: ThrottleOptions) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs);
    this.now = options.now ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.nextSlotAt = this.now() + this.minIntervalMs;
  }

  /**
   * Wait for the next free slot. Resolves with the number of milliseconds waited.
   */
  async acquire(): Promise<number> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;

    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
    return waitMs;
  }
}
