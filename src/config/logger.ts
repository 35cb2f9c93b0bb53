import winston from "winston";
import { config } from "./index.js";

const { combine, timestamp, errors, json } = winston.format;

/**
 * Process-wide logger. JSON to stdout; level from LOG_LEVEL.
 * The Console transport writes synchronously, so lines logged right before
 * `process.exit` are not lost.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  format: combine(timestamp(), errors({ stack: true }), json()),
  defaultMeta: { service: "rate-governor" },
  transports: [new winston.transports.Console()],
});
