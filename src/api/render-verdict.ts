import type { Context } from "hono";
import type { RateDecision } from "../ratelimit/limiter.js";

/** Quota headers, set on every counted response, admitted or not. */
export function setRateLimitHeaders(c: Context, decision: RateDecision): void {
  c.header("X-RateLimit-Limit", String(decision.limit));
  c.header("X-RateLimit-Remaining", String(decision.remaining));
  c.header("X-RateLimit-Reset", String(decision.resetAfterSeconds));
  if (decision.reached) {
    c.header("Retry-After", String(decision.resetAfterSeconds));
  }
}

export interface LimitedBody {
  error: string;
  retry_after: number;
  limit: number;
  remaining: 0;
  reset_at: string;
  device_id?: string;
}

/** 429 body; `deviceId` is included for device-keyed classes. */
export function limitedBody(message: string, decision: RateDecision, deviceId?: string): LimitedBody {
  const body: LimitedBody = {
    error: message,
    retry_after: decision.resetAfterSeconds,
    limit: decision.limit,
    remaining: 0,
    reset_at: new Date(decision.resetAt).toISOString(),
  };
  if (deviceId !== undefined) body.device_id = deviceId;
  return body;
}
