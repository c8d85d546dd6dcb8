import winston from "winston";
import { config } from "./index.js";

const { combine, timestamp, errors, json, colorize, simple } = winston.format;

/**
 * Process-wide logger. Call sites pass a message and a metadata object:
 * `logger.warn("Fleet node read degraded", { node, reason })`.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  defaultMeta: { service: "gpu-fleet-control" },
  format:
    config.nodeEnv === "production"
      ? combine(timestamp(), errors({ stack: true }), json())
      : combine(colorize(), timestamp(), errors({ stack: true }), simple()),
  transports: [new winston.transports.Console({ silent: config.nodeEnv === "test" })],
});
