import { eq, lte, sql } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { rateLimitCounters } from "../db/schema/index.js";
import type { CounterEntry, ICounterStore } from "./counter-store.js";
import type { Rate } from "./rate.js";

/**
 * SQLite-backed counter store. Counters survive restarts on one host; this
 * is not a shared store for several instances.
 *
 * `incrementAndGet` is one INSERT ... ON CONFLICT DO UPDATE ... RETURNING
 * statement, so rollover, increment and read-back are a single atomic step.
 */
export class DrizzleCounterStore implements ICounterStore {
  constructor(private readonly db: DrizzleDb) {}

  async incrementAndGet(key: string, rate: Rate): Promise<CounterEntry> {
    const now = Date.now();
    const nextExpiry = now + rate.periodMs;

    // SET expressions all see the pre-update row, so both CASEs test the old expiry.
    const row = this.db
      .insert(rateLimitCounters)
      .values({ key, count: 1, expiresAt: nextExpiry })
      .onConflictDoUpdate({
        target: rateLimitCounters.key,
        set: {
          count: sql`CASE WHEN ${rateLimitCounters.expiresAt} <= ${now} THEN 1 ELSE ${rateLimitCounters.count} + 1 END`,
          expiresAt: sql`CASE WHEN ${rateLimitCounters.expiresAt} <= ${now} THEN ${nextExpiry} ELSE ${rateLimitCounters.expiresAt} END`,
        },
      })
      .returning({ count: rateLimitCounters.count, expiresAt: rateLimitCounters.expiresAt })
      .get();

    if (!row) throw new Error(`Upsert returned no row for key "${key}"`);
    return { count: row.count, expiresAt: row.expiresAt };
  }

  async get(key: string): Promise<CounterEntry | null> {
    const row = this.db.select().from(rateLimitCounters).where(eq(rateLimitCounters.key, key)).get();
    if (!row || row.expiresAt <= Date.now()) return null;
    return { count: row.count, expiresAt: row.expiresAt };
  }

  async reset(key: string): Promise<boolean> {
    const result = this.db.delete(rateLimitCounters).where(eq(rateLimitCounters.key, key)).run();
    return result.changes > 0;
  }

  async purgeExpired(): Promise<number> {
    const result = this.db.delete(rateLimitCounters).where(lte(rateLimitCounters.expiresAt, Date.now())).run();
    return result.changes;
  }
}
