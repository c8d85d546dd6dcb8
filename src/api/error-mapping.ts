import type { Context } from "hono";
import { type FleetErrorKind, isFleetError, ValidationError } from "../cluster/errors.js";
import { logger } from "../config/logger.js";
import { captureError } from "../observability/sentry.js";

export type ErrorStatus = 400 | 404 | 409 | 500 | 503;

const STATUS_BY_KIND: Record<FleetErrorKind, ErrorStatus> = {
  NotFound: 404,
  ValidationError: 400,
  Conflict: 409,
  UpstreamUnavailable: 503,
};

/**
 * Render an error thrown by a core operation. Mapped kinds carry their
 * entity; anything else is logged, reported and hidden behind a generic 500.
 */
export function errorResponse(c: Context, err: Error): Response {
  if (isFleetError(err)) {
    if (err.kind === "UpstreamUnavailable") {
      logger.warn("Cluster API unavailable", { error: err.message, path: c.req.path, method: c.req.method });
    }
    return c.json(
      {
        success: false,
        error: err.kind,
        message: err.message,
        entity: err.entity,
        ...(err instanceof ValidationError && { issues: err.issues }),
      },
      STATUS_BY_KIND[err.kind],
    );
  }

  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });
  captureError(err, { route: c.req.path, method: c.req.method, source: "request" });

  return c.json(
    {
      success: false,
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
}
