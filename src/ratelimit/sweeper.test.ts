import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../config/logger.js";
import type { ICounterStore } from "./counter-store.js";
import { MemoryCounterStore } from "./memory-counter-store.js";
import { createRate } from "./rate.js";
import { startCounterSweeper } from "./sweeper.js";

vi.mock("../config/logger.js", () => ({
  logger: { warn: vi.fn(), info: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe("startCounterSweeper", () => {
  let stop: () => void = () => {};

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-02-21T12:00:00Z"));
    vi.mocked(logger.warn).mockClear();
    vi.mocked(logger.debug).mockClear();
  });

  afterEach(() => {
    stop();
    vi.useRealTimers();
  });

  it("purges expired counters on each tick", async () => {
    const store = new MemoryCounterStore();
    await store.incrementAndGet("ip:a", createRate(1, 1_000));
    await store.incrementAndGet("ip:b", createRate(1, 120_000));

    stop = startCounterSweeper(store, 60_000);
    await vi.advanceTimersByTimeAsync(60_000);

    expect(store.size).toBe(1);
    expect(logger.debug).toHaveBeenCalledWith("Purged expired rate-limit counters", { removed: 1 });
  });

  it("stops ticking once stopped", async () => {
    const store: ICounterStore = {
      incrementAndGet: vi.fn(),
      get: vi.fn(),
      reset: vi.fn(),
      purgeExpired: vi.fn().mockResolvedValue(0),
    };

    stop = startCounterSweeper(store, 1_000);
    await vi.advanceTimersByTimeAsync(3_000);
    stop();
    await vi.advanceTimersByTimeAsync(3_000);

    expect(store.purgeExpired).toHaveBeenCalledTimes(3);
  });

  it("logs and keeps running when a sweep fails", async () => {
    const purgeExpired = vi.fn().mockRejectedValueOnce(new Error("database is locked")).mockResolvedValue(0);
    const store: ICounterStore = { incrementAndGet: vi.fn(), get: vi.fn(), reset: vi.fn(), purgeExpired };

    stop = startCounterSweeper(store, 1_000);
    await vi.advanceTimersByTimeAsync(2_000);

    expect(logger.warn).toHaveBeenCalledWith("Rate-limit counter sweep failed", { error: "database is locked" });
    expect(purgeExpired).toHaveBeenCalledTimes(2);
  });

  it("skips a tick while the previous sweep is still running", async () => {
    let finish: (removed: number) => void = () => {};
    const purgeExpired = vi.fn(
      () =>
        new Promise<number>((resolve) => {
          finish = resolve;
        }),
    );
    const store: ICounterStore = { incrementAndGet: vi.fn(), get: vi.fn(), reset: vi.fn(), purgeExpired };

    stop = startCounterSweeper(store, 1_000);
    await vi.advanceTimersByTimeAsync(3_000);
    expect(purgeExpired).toHaveBeenCalledTimes(1);

    finish(0);
    await vi.advanceTimersByTimeAsync(1_000);
    expect(purgeExpired).toHaveBeenCalledTimes(2);
  });
});
