import BetterSqlite3 from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createDb } from "../db/index.js";
import { initCounterSchema } from "../db/migrate.js";
import type { ICounterStore } from "./counter-store.js";
import { DrizzleCounterStore } from "./drizzle-counter-store.js";
import { MemoryCounterStore } from "./memory-counter-store.js";
import { createRate } from "./rate.js";

const T0 = new Date("2026-02-21T12:00:00Z").getTime();
const perMinute = createRate(100, 60_000);

describe("ICounterStore contract", () => {
  runCounterStoreContract("MemoryCounterStore", () => ({ store: new MemoryCounterStore(), close: () => {} }));

  runCounterStoreContract("DrizzleCounterStore", () => {
    const sqlite = new BetterSqlite3(":memory:");
    initCounterSchema(sqlite);
    return { store: new DrizzleCounterStore(createDb(sqlite)), close: () => sqlite.close() };
  });
});

function runCounterStoreContract(name: string, open: () => { store: ICounterStore; close: () => void }) {
  describe(name, () => {
    let store: ICounterStore;
    let close: () => void;

    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(T0);
      ({ store, close } = open());
    });

    afterEach(() => {
      close();
      vi.useRealTimers();
    });

    it("starts a new window at count 1 expiring one period from now", async () => {
      expect(await store.incrementAndGet("ip:1.2.3.4", perMinute)).toEqual({ count: 1, expiresAt: T0 + 60_000 });
    });

    it("counts 1..N within a window and keeps the original expiry", async () => {
      const counts: number[] = [];
      for (let i = 0; i < 5; i++) {
        vi.advanceTimersByTime(1_000);
        const entry = await store.incrementAndGet("ip:1.2.3.4", perMinute);
        counts.push(entry.count);
        expect(entry.expiresAt).toBe(T0 + 1_000 + 60_000);
      }
      expect(counts).toEqual([1, 2, 3, 4, 5]);
    });

    it("rolls the window over exactly at expiresAt", async () => {
      await store.incrementAndGet("ip:1.2.3.4", perMinute);
      await store.incrementAndGet("ip:1.2.3.4", perMinute);
      await store.incrementAndGet("ip:1.2.3.4", perMinute);

      vi.setSystemTime(T0 + 60_000);
      const entry = await store.incrementAndGet("ip:1.2.3.4", perMinute);

      expect(entry).toEqual({ count: 1, expiresAt: T0 + 120_000 });
    });

    it("rolls over when accessed long after expiry, measuring the new window from the call", async () => {
      await store.incrementAndGet("ip:1.2.3.4", perMinute);

      vi.setSystemTime(T0 + 5 * 60_000 + 123);
      const entry = await store.incrementAndGet("ip:1.2.3.4", perMinute);

      expect(entry).toEqual({ count: 1, expiresAt: T0 + 6 * 60_000 + 123 });
    });

    it("keeps keys independent", async () => {
      await store.incrementAndGet("user:42", perMinute);
      await store.incrementAndGet("user:42", perMinute);
      const other = await store.incrementAndGet("user:42:export", perMinute);
      expect(other.count).toBe(1);
    });

    it("hands out distinct counts to concurrent callers", async () => {
      const entries = await Promise.all(
        Array.from({ length: 50 }, () => store.incrementAndGet("device:abc:sync", perMinute)),
      );
      const counts = entries.map((e) => e.count).sort((a, b) => a - b);
      expect(counts).toEqual(Array.from({ length: 50 }, (_, i) => i + 1));
    });

    it("get reads without counting", async () => {
      await store.incrementAndGet("ip:1.2.3.4", perMinute);
      await store.incrementAndGet("ip:1.2.3.4", perMinute);

      expect(await store.get("ip:1.2.3.4")).toEqual({ count: 2, expiresAt: T0 + 60_000 });
      expect(await store.get("ip:1.2.3.4")).toEqual({ count: 2, expiresAt: T0 + 60_000 });
    });

    it("get returns null for absent and expired entries", async () => {
      expect(await store.get("ip:9.9.9.9")).toBeNull();

      await store.incrementAndGet("ip:1.2.3.4", perMinute);
      vi.setSystemTime(T0 + 60_000);
      expect(await store.get("ip:1.2.3.4")).toBeNull();
    });

    it("reset drops one entry and reports whether it existed", async () => {
      await store.incrementAndGet("ip:1.2.3.4", perMinute);
      await store.incrementAndGet("ip:5.6.7.8", perMinute);

      expect(await store.reset("ip:1.2.3.4")).toBe(true);
      expect(await store.reset("ip:1.2.3.4")).toBe(false);
      expect(await store.get("ip:1.2.3.4")).toBeNull();
      expect(await store.get("ip:5.6.7.8")).toEqual({ count: 1, expiresAt: T0 + 60_000 });
    });

    it("purgeExpired removes only expired entries", async () => {
      const perHour = createRate(10, 3_600_000);
      await store.incrementAndGet("ip:short", perMinute);
      await store.incrementAndGet("ip:long", perHour);

      vi.setSystemTime(T0 + 60_000);

      expect(await store.purgeExpired()).toBe(1);
      expect(await store.get("ip:long")).toEqual({ count: 1, expiresAt: T0 + 3_600_000 });
      expect(await store.purgeExpired()).toBe(0);
    });
  });
}
