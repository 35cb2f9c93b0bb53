/**
 * Fixed-window rate limiter for a single endpoint class.
 *
 * The limiter holds no counters of its own; it turns a store read into a
 * RateDecision. If the store fails, `check` reports `{ ok: false }` and the
 * caller admits the request (fail-open).
 */

import { logger } from "../config/logger.js";
import type { CounterEntry, ICounterStore } from "./counter-store.js";
import { StoreUnavailableError } from "./errors.js";
import type { Rate } from "./rate.js";

export interface RateDecision {
  limit: number;
  /** `max(0, limit - count)`. */
  remaining: number;
  /** True once `count > limit`: this request is over quota. */
  reached: boolean;
  /** Whole seconds until the window resets, rounded up. */
  resetAfterSeconds: number;
  /** Epoch ms at which the window resets. */
  resetAt: number;
}

export type LimiterResult = { ok: true; decision: RateDecision } | { ok: false; error: StoreUnavailableError };

/** Derive a decision from the counter state read at `now`. */
export function decide(rate: Rate, entry: CounterEntry, now: number): RateDecision {
  return {
    limit: rate.limit,
    remaining: Math.max(0, rate.limit - entry.count),
    reached: entry.count > rate.limit,
    resetAfterSeconds: Math.max(0, Math.ceil((entry.expiresAt - now) / 1000)),
    resetAt: entry.expiresAt,
  };
}

export class RateLimiter {
  constructor(
    private readonly store: ICounterStore,
    readonly rate: Rate,
  ) {}

  /** Count one event for `key` and decide whether it is admitted. */
  async check(key: string): Promise<LimiterResult> {
    let entry: CounterEntry;
    try {
      entry = await this.store.incrementAndGet(key, this.rate);
    } catch (err) {
      return this.unavailable(key, err);
    }
    return { ok: true, decision: decide(this.rate, entry, Date.now()) };
  }

  /** Report the current decision for `key` without consuming quota. */
  async peek(key: string): Promise<LimiterResult> {
    let entry: CounterEntry | null;
    try {
      entry = await this.store.get(key);
    } catch (err) {
      return this.unavailable(key, err);
    }
    const now = Date.now();
    return { ok: true, decision: decide(this.rate, entry ?? { count: 0, expiresAt: now + this.rate.periodMs }, now) };
  }

  /** Forget the counter for `key`. Store failures propagate. */
  async reset(key: string): Promise<boolean> {
    return this.store.reset(key);
  }

  private unavailable(key: string, cause: unknown): LimiterResult {
    const error = new StoreUnavailableError(key, cause);
    logger.warn("Rate-limit store unavailable; failing open", {
      key,
      rate: this.rate.formatted,
      error: error.message,
    });
    return { ok: false, error };
  }
}
