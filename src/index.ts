import { serve } from "@hono/node-server";
import { createApp, SERVICE_NAME } from "./api/app.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { captureError, initSentry } from "./observability/sentry.js";
import { getServices } from "./services.js";

const port = config.port;

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
  captureError(reason instanceof Error ? reason : new Error(String(reason)), { source: "unhandledRejection" });
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  captureError(err, { source: "uncaughtException", extra: { origin } });
  // The process state is undefined after an uncaught exception.
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

// No-op when SENTRY_DSN is absent
initSentry(config.sentryDsn, config.nodeEnv);

// Only start the server if not imported by tests
if (config.nodeEnv !== "test") {
  const app = createApp(getServices(), { corsOrigins: config.corsOrigins });

  serve({ fetch: app.fetch, port }, () => {
    logger.info(`${SERVICE_NAME} listening on http://0.0.0.0:${port}`, {
      gpuResourcePrefix: config.cluster.gpuResourcePrefix,
      fleetNodePrefix: config.cluster.fleetNodePrefix,
      workloadNamespaces: config.cluster.workloadNamespaces,
    });
  });
}
