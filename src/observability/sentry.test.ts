import { beforeEach, describe, expect, it, vi } from "vitest";

// Mock @sentry/node before importing the module
vi.mock("@sentry/node", () => ({
  init: vi.fn(),
  captureException: vi.fn(),
  dedupeIntegration: vi.fn(() => ({ name: "Dedupe" })),
}));

import * as Sentry from "@sentry/node";
import { captureError, initSentry } from "./sentry.js";

describe("sentry", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("does not call Sentry.init when dsn is undefined", () => {
    initSentry(undefined);
    expect(Sentry.init).not.toHaveBeenCalled();
  });

  it("does not call Sentry.init when dsn is empty string", () => {
    initSentry("");
    expect(Sentry.init).not.toHaveBeenCalled();
  });

  it("calls Sentry.init with dsn and environment when provided", () => {
    initSentry("https://public@sentry.example.com/1", "production");
    expect(Sentry.init).toHaveBeenCalledWith(
      expect.objectContaining({
        dsn: "https://public@sentry.example.com/1",
        environment: "production",
        tracesSampleRate: 0.1,
      }),
    );
  });

  it("strips query strings from http breadcrumbs", () => {
    initSentry("https://public@sentry.example.com/1");
    const options = vi.mocked(Sentry.init).mock.calls[0]?.[0];
    const crumb = options?.beforeBreadcrumb?.(
      { category: "http", data: { url: "https://cluster.local/api/v1/pods?labelSelector=team%3Dml" } },
      undefined,
    );
    expect(crumb?.data?.url).toBe("https://cluster.local/api/v1/pods");
  });

  it("captureError tags the route and source", () => {
    const err = new Error("test");
    captureError(err, { route: "/nodes", method: "GET", source: "request" });
    expect(Sentry.captureException).toHaveBeenCalledWith(err, {
      tags: { route: "/nodes", method: "GET", source: "request" },
      extra: undefined,
    });
  });

  it("captureError does not throw without context", () => {
    expect(() => captureError(new Error("test"))).not.toThrow();
    expect(Sentry.captureException).toHaveBeenCalledWith(expect.any(Error), { tags: {}, extra: undefined });
  });
});
