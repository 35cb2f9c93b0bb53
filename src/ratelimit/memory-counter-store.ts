/**
 * In-process fixed-window counter store.
 *
 * Every read-modify-write below runs synchronously between awaits, so the
 * event loop serializes all callers: no two `incrementAndGet` calls can
 * interleave on the same key. State is lost on restart.
 */

import type { CounterEntry, ICounterStore } from "./counter-store.js";
import type { Rate } from "./rate.js";

export class MemoryCounterStore implements ICounterStore {
  private readonly entries = new Map<string, CounterEntry>();

  /** Number of entries currently held, expired ones included until swept. */
  get size(): number {
    return this.entries.size;
  }

  async incrementAndGet(key: string, rate: Rate): Promise<CounterEntry> {
    const now = Date.now();
    const existing = this.entries.get(key);

    if (!existing || existing.expiresAt <= now) {
      const fresh = { count: 1, expiresAt: now + rate.periodMs };
      this.entries.set(key, fresh);
      return { ...fresh };
    }

    existing.count += 1;
    return { ...existing };
  }

  async get(key: string): Promise<CounterEntry | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return null;
    }
    return { ...entry };
  }

  async reset(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async purgeExpired(): Promise<number> {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
