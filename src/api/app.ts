import { type ErrorHandler, Hono } from "hono";
import { secureHeaders } from "hono/secure-headers";
import { logger } from "../config/logger.js";
import type { RateGovernor } from "../ratelimit/governor.js";
import { createCheckRoutes } from "./routes/check.js";
import { createHealthRoutes } from "./routes/health.js";

export interface AppDeps {
  governor: RateGovernor;
  /** Reported by /health. */
  storeDriver: string;
}

// Global error handler: log the failure, return a generic 500.
export const errorHandler: ErrorHandler = (err, c) => {
  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });

  return c.json(
    {
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
};

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.use("*", secureHeaders());

  app.route("/health", createHealthRoutes(deps.storeDriver));
  app.route("/v1", createCheckRoutes(deps.governor));

  app.notFound((c) => c.json({ error: "Not found" }, 404));
  app.onError(errorHandler);

  return app;
}
