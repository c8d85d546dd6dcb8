import * as Sentry from "@sentry/node";

/**
 * Initialize the Sentry SDK. Call once at process start, before the server
 * is created. Without a DSN Sentry stays disabled and captures are no-ops.
 */
export function initSentry(dsn: string | undefined, environment = "development"): void {
  if (!dsn) return;

  Sentry.init({
    dsn,
    environment,
    release: process.env.SENTRY_RELEASE ?? undefined,
    tracesSampleRate: environment === "production" ? 0.1 : 1.0,
    integrations: [Sentry.dedupeIntegration()],
    // Query strings on cluster API calls can carry label selectors and tokens.
    beforeBreadcrumb(breadcrumb) {
      const url = breadcrumb.data?.url;
      if (breadcrumb.category === "http" && typeof url === "string") {
        try {
          const parsed = new URL(url);
          parsed.search = "";
          breadcrumb.data = { ...breadcrumb.data, url: parsed.toString() };
        } catch (err) {
          if (!(err instanceof TypeError)) throw err;
        }
      }
      return breadcrumb;
    },
  });
}

export interface ErrorContext {
  route?: string;
  method?: string;
  /** Where the error surfaced, e.g. `unhandledRejection`. */
  source?: string;
  extra?: Record<string, unknown>;
}

/** Capture an exception with request or process tags. */
export function captureError(error: unknown, context?: ErrorContext): void {
  Sentry.captureException(error, {
    tags: {
      ...(context?.route && { route: context.route }),
      ...(context?.method && { method: context.method }),
      ...(context?.source && { source: context.source }),
    },
    extra: context?.extra,
  });
}
