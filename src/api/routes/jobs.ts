import { Hono } from "hono";
import { z } from "zod";
import type { GpuModelAggregator } from "../../aggregation/gpu-model-view.js";
import { ValidationError } from "../../cluster/errors.js";
import type { JobMutationController } from "../../jobs/job-mutation-controller.js";
import { toIssues } from "../../jobs/job-schema.js";
import { groupByQueue, type WorkloadQueryEngine } from "../../workloads/workload-query.js";
import { jsonBody, readOptions } from "../request.js";

export interface JobRouteDeps {
  workloads: WorkloadQueryEngine;
  jobs: JobMutationController;
  aggregator: GpuModelAggregator;
}

const pendingQuerySchema = z.object({ groupBy: z.enum(["queue"]).optional() });
const deleteQuerySchema = z.object({ strict: z.enum(["true", "false"]).optional() });

function parseQuery<S extends z.ZodTypeAny>(schema: S, query: Record<string, string>): z.infer<S> {
  const parsed = schema.safeParse(query);
  if (!parsed.success) throw new ValidationError("Invalid query parameters", toIssues(parsed.error));
  return parsed.data;
}

/**
 * Kueue workload views and Job mutations.
 *
 * Static paths are registered BEFORE /:namespace/:name so Hono does not
 * read "gpu-models" as a namespace.
 */
export function createJobRoutes({ workloads, jobs, aggregator }: JobRouteDeps): Hono {
  const routes = new Hono();

  /**
   * GET /jobs/pending-workloads
   * Waiting workloads in display order; `?groupBy=queue` splits them per LocalQueue
   */
  routes.get("/pending-workloads", async (c) => {
    const { groupBy } = parseQuery(pendingQuerySchema, c.req.query());
    const result = await workloads.listPendingWorkloads(readOptions(c));
    const body = {
      success: true,
      count: result.items.length,
      partial: result.partial,
      incomplete: result.incomplete,
      fetchedAt: result.fetchedAt.toISOString(),
    };
    if (groupBy === "queue") return c.json({ ...body, queues: groupByQueue(result.items) });
    return c.json({ ...body, workloads: result.items });
  });

  /**
   * GET /jobs/gpu-models
   * Capacity and waiting work per GPU model
   */
  routes.get("/gpu-models", async (c) => {
    const result = await aggregator.gpuModelViews(readOptions(c));
    return c.json({ success: true, ...result.items, partial: result.partial, incomplete: result.incomplete });
  });

  /**
   * GET /jobs/gpu-models/:model
   * One model's view
   */
  routes.get("/gpu-models/:model", async (c) => {
    const result = await aggregator.viewForModel(c.req.param("model"), readOptions(c));
    return c.json({ success: true, view: result.items, partial: result.partial, incomplete: result.incomplete });
  });

  /**
   * POST /jobs/submit
   * Build and submit a suspended Job from a structured request
   */
  routes.post("/submit", async (c) => {
    const result = await jobs.submitStructured(await jsonBody(c));
    return c.json({ success: true, ...result }, 201);
  });

  /**
   * POST /jobs/submit-native
   * Submit a caller-authored Job manifest
   */
  routes.post("/submit-native", async (c) => {
    const result = await jobs.submitNative(await jsonBody(c));
    return c.json({ success: true, ...result }, 201);
  });

  /**
   * PATCH /jobs/:namespace/:name/priority
   * Body: { "priority": <int32> }
   */
  routes.patch("/:namespace/:name/priority", async (c) => {
    const body = await jsonBody(c);
    const priority = typeof body === "object" && body !== null && "priority" in body ? body.priority : undefined;
    const result = await jobs.patchPriority(
      { namespace: c.req.param("namespace"), name: c.req.param("name") },
      priority,
    );
    return c.json({ success: true, ...result });
  });

  /**
   * DELETE /jobs/:namespace/:name
   * `?strict=true` turns an absent Job into a 404
   */
  routes.delete("/:namespace/:name", async (c) => {
    const { strict } = parseQuery(deleteQuerySchema, c.req.query());
    const result = await jobs.deleteJob(
      { namespace: c.req.param("namespace"), name: c.req.param("name") },
      { strict: strict === "true" },
    );
    return c.json({ success: true, ...result });
  });

  return routes;
}
