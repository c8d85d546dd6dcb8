import type { Context } from "hono";
import { z } from "zod";
import type { ReadOptions } from "../cluster/fan-out.js";
import { ValidationError } from "../cluster/errors.js";
import { toIssues } from "../jobs/job-schema.js";

const readQuerySchema = z.object({
  timeoutMs: z.coerce.number().int().positive().max(600_000).optional(),
});

/**
 * Caller controls for aggregated reads: `?timeoutMs=` becomes the deadline,
 * and a client disconnect aborts outstanding sub-reads.
 */
export function readOptions(c: Context): ReadOptions {
  const parsed = readQuerySchema.safeParse({ timeoutMs: c.req.query("timeoutMs") });
  if (!parsed.success) throw new ValidationError("Invalid query parameters", toIssues(parsed.error));
  return { signal: c.req.raw.signal, deadlineMs: parsed.data.timeoutMs };
}

/** Parse the request body as JSON; malformed bodies are a validation failure. */
export async function jsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ValidationError("Request body is not valid JSON", [{ path: "(root)", message: err.message }]);
    }
    throw err;
  }
}
