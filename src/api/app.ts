import { Hono } from "hono";
import { cors } from "hono/cors";
import { secureHeaders } from "hono/secure-headers";
import type { FleetServices } from "../services.js";
import { errorResponse } from "./error-mapping.js";
import { createHealthRoutes } from "./routes/health.js";
import { createJobRoutes } from "./routes/jobs.js";
import { createNodeRoutes } from "./routes/nodes.js";

export const SERVICE_NAME = "gpu-fleet-control";
export const SERVICE_VERSION = "1.0.0";

export interface AppOptions {
  /** Allowed origins; `*` allows any origin without credentials. */
  corsOrigins: readonly string[];
}

export const errorHandler: Parameters<Hono["onError"]>[0] = (err, c) => errorResponse(c, err);

/**
 * HTTP surface over the fleet services. Routes hold no state of their own;
 * every request goes to the injected components.
 */
export function createApp(services: FleetServices, options: AppOptions): Hono {
  const app = new Hono();
  const anyOrigin = options.corsOrigins.includes("*");

  app.use(
    "/*",
    cors({
      origin: anyOrigin ? "*" : [...options.corsOrigins],
      credentials: !anyOrigin,
      allowMethods: ["GET", "POST", "PATCH", "DELETE"],
      allowHeaders: ["Content-Type", "Authorization"],
    }),
  );
  app.use(
    "/*",
    secureHeaders({
      contentSecurityPolicy: { defaultSrc: ["'none'"], frameAncestors: ["'none'"] },
      strictTransportSecurity: "max-age=31536000; includeSubDomains; preload",
      xFrameOptions: "DENY",
    }),
  );

  app.get("/", (c) => c.json({ name: SERVICE_NAME, version: SERVICE_VERSION }));
  app.route("/health", createHealthRoutes(SERVICE_NAME));
  app.route("/nodes", createNodeRoutes(services.inventory));
  app.route("/jobs", createJobRoutes(services));

  app.notFound((c) =>
    c.json({ success: false, error: "NotFound", message: `No route for ${c.req.method} ${c.req.path}` }, 404),
  );
  app.onError(errorHandler);

  return app;
}
