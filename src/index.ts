import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { type Config, config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createDb, openCounterDatabase } from "./db/index.js";
import type { ICounterStore } from "./ratelimit/counter-store.js";
import { DrizzleCounterStore } from "./ratelimit/drizzle-counter-store.js";
import { buildEndpointClassPolicies } from "./ratelimit/endpoint-classes.js";
import { RateGovernor } from "./ratelimit/governor.js";
import { MemoryCounterStore } from "./ratelimit/memory-counter-store.js";
import { startCounterSweeper } from "./ratelimit/sweeper.js";

// Unhandled rejections are logged and the process keeps serving.
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
};

// Uncaught exceptions leave the process in an undefined state: log and exit.
// The Winston Console transport is synchronous, so the line is flushed first.
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

interface OpenedStore {
  store: ICounterStore;
  close(): void;
}

function openStore(cfg: Config["store"]): OpenedStore {
  if (cfg.driver === "sqlite") {
    const sqlite = openCounterDatabase(cfg.dbPath);
    return { store: new DrizzleCounterStore(createDb(sqlite)), close: () => sqlite.close() };
  }
  return { store: new MemoryCounterStore(), close: () => {} };
}

const { store, close: closeStore } = openStore(config.store);
const governor = new RateGovernor(store, buildEndpointClassPolicies(config.rates));
const stopSweeper = startCounterSweeper(store, config.store.sweepIntervalMs);
const app = createApp({ governor, storeDriver: config.store.driver });

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(`rate-governor listening on port ${info.port}`, {
    store: config.store.driver,
    rates: config.rates,
  });
});

function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down`);
  stopSweeper();
  server.close((err) => {
    if (err) {
      logger.error("Error while closing HTTP server", { error: err.message });
    }
    closeStore();
    process.exit(err ? 1 : 0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
