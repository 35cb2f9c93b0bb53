import { z } from "zod";
import { DEFAULT_CLASS_RATES } from "../ratelimit/endpoint-classes.js";
import { parseRate } from "../ratelimit/rate.js";

/**
 * Parse a comma-separated list of IP addresses.
 * Example: "10.0.0.1, 10.0.0.2"
 */
export function parseIpList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/** A formatted rate such as "100-M", validated by parsing it. */
const formattedRate = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .superRefine((value, ctx) => {
      try {
        parseRate(value);
      } catch (err) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
      }
    });

export const configSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(3100),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Counter store backing all endpoint-class limiters. */
  store: z
    .object({
      driver: z.enum(["memory", "sqlite"]).default("memory"),
      dbPath: z.string().min(1).default("/data/ratelimit/counters.db"),
      sweepIntervalMs: z.coerce.number().int().min(1000).default(60_000),
    })
    .default({}),

  /** Per-class rates in "<limit>-<S|M|H|D>" notation. */
  rates: z
    .object({
      general: formattedRate(DEFAULT_CLASS_RATES.general),
      export: formattedRate(DEFAULT_CLASS_RATES.export),
      sync: formattedRate(DEFAULT_CLASS_RATES.sync),
      restore: formattedRate(DEFAULT_CLASS_RATES.restore),
    })
    .default({}),

  /** Socket peers whose X-Forwarded-For header is trusted. */
  trustedProxyIps: z.array(z.string().min(1)).default([]),
});

export type Config = z.infer<typeof configSchema>;

/** Build the config from an environment map. Throws a ZodError on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    store: {
      driver: env.RATE_LIMIT_STORE,
      dbPath: env.RATE_LIMIT_DB_PATH,
      sweepIntervalMs: env.RATE_LIMIT_SWEEP_INTERVAL_MS,
    },
    rates: {
      general: env.RATE_LIMIT_GENERAL,
      export: env.RATE_LIMIT_EXPORT,
      sync: env.RATE_LIMIT_SYNC,
      restore: env.RATE_LIMIT_RESTORE,
    },
    trustedProxyIps: parseIpList(env.TRUSTED_PROXY_IPS),
  });
}

export const config = loadConfig();
