import { logger } from "../config/logger.js";
import type { ICounterStore } from "./counter-store.js";

/**
 * Purge expired counters from `store` every `intervalMs`. The timer is
 * unref'd so it never holds the process open. Returns a stop function.
 */
export function startCounterSweeper(store: ICounterStore, intervalMs: number): () => void {
  let running = false;

  const timer = setInterval(() => {
    // Skip a tick rather than stack sweeps behind a slow store.
    if (running) return;
    running = true;
    store
      .purgeExpired()
      .then((removed) => {
        if (removed > 0) logger.debug("Purged expired rate-limit counters", { removed });
      })
      .catch((err: unknown) => {
        logger.warn("Rate-limit counter sweep failed", {
          error: err instanceof Error ? err.message : String(err),
        });
      })
      .finally(() => {
        running = false;
      });
  }, intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
