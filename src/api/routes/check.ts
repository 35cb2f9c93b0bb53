import { type Context, Hono } from "hono";
import { z } from "zod";
import { ENDPOINT_CLASSES } from "../../ratelimit/endpoint-classes.js";
import type { GovernorVerdict, RateGovernor } from "../../ratelimit/governor.js";
import type { IdentitySignals } from "../../ratelimit/identity.js";
import { limitedBody, setRateLimitHeaders } from "../render-verdict.js";

// Sidecar API: a reverse proxy or another service asks for a verdict instead
// of mounting the middleware itself. Identity arrives already resolved.
const checkRequestSchema = z.object({
  class: z.enum(ENDPOINT_CLASSES),
  userId: z.string().min(1).optional(),
  deviceId: z.string().min(1).optional(),
  ip: z.string().min(1).optional(),
});

type CheckRequest = z.infer<typeof checkRequestSchema>;

function toSignals(req: CheckRequest): IdentitySignals {
  return { userId: req.userId, deviceIdQuery: req.deviceId, remoteAddress: req.ip };
}

async function parseCheckRequest(c: Context): Promise<CheckRequest | Response> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return c.json({ error: "Invalid JSON body" }, 400);
  }
  const parsed = checkRequestSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: "Validation failed", details: parsed.error.flatten() }, 400);
  }
  return parsed.data;
}

function renderVerdict(c: Context, governor: RateGovernor, req: CheckRequest, verdict: GovernorVerdict): Response {
  switch (verdict.outcome) {
    case "identity-required":
      return c.json({ error: verdict.error.message }, 400);
    case "store-unavailable":
      return c.json({ allowed: true, degraded: true, key: verdict.key });
    case "limited": {
      const policy = governor.policy(req.class);
      setRateLimitHeaders(c, verdict.decision);
      const deviceId = policy.requiresDevice ? req.deviceId : undefined;
      return c.json(limitedBody(policy.limitMessage, verdict.decision, deviceId), 429);
    }
    case "admitted":
      setRateLimitHeaders(c, verdict.decision);
      return c.json({ allowed: true, key: verdict.key, decision: verdict.decision });
  }
}

export function createCheckRoutes(governor: RateGovernor): Hono {
  const routes = new Hono();

  /** Count one request against the class and return the verdict. */
  routes.post("/check", async (c) => {
    const req = await parseCheckRequest(c);
    if (req instanceof Response) return req;
    const verdict = await governor.evaluate(req.class, toSignals(req));
    return renderVerdict(c, governor, req, verdict);
  });

  /** Current quota for the caller, without consuming any. */
  routes.post("/peek", async (c) => {
    const req = await parseCheckRequest(c);
    if (req instanceof Response) return req;
    const verdict = await governor.inspect(req.class, toSignals(req));
    return renderVerdict(c, governor, req, verdict);
  });

  return routes;
}
