import { InvalidRateError } from "./errors.js";

/** Maximum number of events allowed per fixed window of `periodMs` milliseconds. */
export interface Rate {
  readonly limit: number;
  readonly periodMs: number;
  /** Formatted notation the rate was parsed from, e.g. "100-M". */
  readonly formatted: string;
}

const PERIOD_UNITS_MS: Record<string, number> = {
  S: 1_000,
  M: 60_000,
  H: 60 * 60_000,
  D: 24 * 60 * 60_000,
};

const FORMATTED_RATE = /^(\d+)-([A-Za-z])$/;

/**
 * Build a Rate from a limit and a period in milliseconds.
 * Both must be positive integers.
 */
export function createRate(limit: number, periodMs: number, formatted?: string): Rate {
  const label = formatted ?? `${limit}/${periodMs}ms`;
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidRateError(label, "limit must be a positive integer");
  }
  if (!Number.isInteger(periodMs) || periodMs <= 0) {
    throw new InvalidRateError(label, "period must be a positive number of milliseconds");
  }
  return Object.freeze({ limit, periodMs, formatted: label });
}

/**
 * Parse the `<limit>-<unit>` notation, where unit is S, M, H or D
 * (case-insensitive).
 *
 * ```ts
 * parseRate("10-H"); // { limit: 10, periodMs: 3_600_000, formatted: "10-H" }
 * ```
 */
export function parseRate(formatted: string): Rate {
  const trimmed = formatted.trim();
  const match = FORMATTED_RATE.exec(trimmed);
  if (!match) {
    throw new InvalidRateError(formatted, 'expected "<limit>-<S|M|H|D>"');
  }
  const [, limitStr, unitStr] = match;
  const unit = (unitStr ?? "").toUpperCase();
  const periodMs = PERIOD_UNITS_MS[unit];
  if (periodMs === undefined) {
    throw new InvalidRateError(formatted, `unknown period unit "${unitStr}"`);
  }
  return createRate(Number.parseInt(limitStr ?? "", 10), periodMs, `${limitStr}-${unit}`);
}
