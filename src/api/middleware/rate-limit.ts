/**
 * Rate-limiting middleware for Hono.
 *
 * One middleware per endpoint class. Each request is keyed by the caller's
 * identity (user, then device, then IP) plus the class suffix and counted in
 * a fixed window. Over-quota requests get 429 with `Retry-After`; restore
 * requests without a device ID get 400 before any counter is touched.
 * If the counter store fails the request passes through (fail-open).
 *
 * ```ts
 * app.use("/api/*", limitRequests(governor, "general"));
 * app.post("/api/backups/restore", limitRequests(governor, "restore"), restoreHandler);
 * ```
 */

import type { Context, MiddlewareHandler, Next } from "hono";
import type { EndpointClass } from "../../ratelimit/endpoint-classes.js";
import type { RateGovernor } from "../../ratelimit/governor.js";
import { type IdentitySignals, resolveDeviceId } from "../../ratelimit/identity.js";
import { limitedBody, setRateLimitHeaders } from "../render-verdict.js";
import { getClientIpFromContext } from "./get-client-ip.js";

/** Context variables read by the limiter. Upstream auth sets `userId`. */
export interface RateLimitEnv {
  Variables: {
    userId?: string;
  };
}

export interface LimitRequestsOptions {
  /** Override the trusted proxy set used to read X-Forwarded-For. */
  trustedProxies?: ReadonlySet<string>;
}

export function identitySignalsFromContext(
  c: Context<RateLimitEnv>,
  trustedProxies?: ReadonlySet<string>,
): IdentitySignals {
  return {
    userId: c.get("userId"),
    deviceIdQuery: c.req.query("device_id"),
    deviceIdHeader: c.req.header("x-device-id"),
    remoteAddress: getClientIpFromContext(c, trustedProxies),
  };
}

export function limitRequests(
  governor: RateGovernor,
  endpointClass: EndpointClass,
  opts: LimitRequestsOptions = {},
): MiddlewareHandler<RateLimitEnv> {
  const policy = governor.policy(endpointClass);

  return async (c: Context<RateLimitEnv>, next: Next) => {
    const signals = identitySignalsFromContext(c, opts.trustedProxies);
    const verdict = await governor.evaluate(endpointClass, signals);

    switch (verdict.outcome) {
      case "identity-required":
        return c.json({ error: verdict.error.message }, 400);
      case "store-unavailable":
        return next();
      case "limited": {
        setRateLimitHeaders(c, verdict.decision);
        const deviceId = policy.requiresDevice ? (resolveDeviceId(signals) ?? undefined) : undefined;
        return c.json(limitedBody(policy.limitMessage, verdict.decision, deviceId), 429);
      }
      case "admitted":
        setRateLimitHeaders(c, verdict.decision);
        return next();
    }
  };
}
