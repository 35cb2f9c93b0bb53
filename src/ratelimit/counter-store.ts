import type { Rate } from "./rate.js";

/** Fixed-window counter state for one key. */
export interface CounterEntry {
  count: number;
  /** Epoch ms at which the window resets. */
  expiresAt: number;
}

/**
 * Storage for fixed-window counters.
 *
 * Implementations must apply `incrementAndGet` atomically per key: two
 * concurrent calls for the same key never observe the same count. Failures
 * reject the returned promise; a failure is never reported as a zero count.
 */
export interface ICounterStore {
  /**
   * Count one event for `key`. If the entry is absent or its window has
   * expired (`expiresAt <= now`), replace it with `{ count: 1, expiresAt: now + rate.periodMs }`;
   * otherwise increment `count` and leave `expiresAt` unchanged.
   * Returns the entry as it stands after the mutation.
   */
  incrementAndGet(key: string, rate: Rate): Promise<CounterEntry>;

  /** Read the live entry without counting. Returns null if absent or expired. */
  get(key: string): Promise<CounterEntry | null>;

  /** Drop the entry for `key`. Returns whether one existed. */
  reset(key: string): Promise<boolean>;

  /** Delete every entry whose window has expired. Returns the number removed. */
  purgeExpired(): Promise<number>;
}
