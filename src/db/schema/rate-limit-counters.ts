import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const rateLimitCounters = sqliteTable(
  "rate_limit_counters",
  {
    key: text("key").primaryKey(),
    count: integer("count").notNull(),
    /** Epoch ms at which the current window resets. */
    expiresAt: integer("expires_at").notNull(),
  },
  (table) => [index("idx_rate_limit_counters_expires").on(table.expiresAt)],
);
