import Database from "better-sqlite3";
import { initCounterSchema } from "./migrate.js";

/** How long a counter upsert waits on another connection's write lock before SQLITE_BUSY. */
export const COUNTER_DB_BUSY_TIMEOUT_MS = 5000;

/**
 * Open the counter database at `path` and make it ready for the store:
 * WAL so `peek` reads never block on an upsert, a busy timeout for the
 * single writer, and the counters table created if missing.
 */
export function openCounterDatabase(path: string): Database.Database {
  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma(`busy_timeout = ${COUNTER_DB_BUSY_TIMEOUT_MS}`);
  initCounterSchema(sqlite);
  return sqlite;
}
