import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { ClusterApiError } from "../../cluster/errors.js";
import { createTestApp } from "../../test/app.js";
import { gpuNode, InMemoryCluster, makePod, makeWorkload } from "../../test/cluster.js";

function json(method: string, body: unknown): RequestInit {
  return { method, headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) };
}

const structuredRequest = {
  name: "train-1",
  namespace: "ml",
  image: "pytorch:2.3",
  gpuCount: 2,
  gpuModel: "H100",
  owner: { user: "alice", team: "ml-team" },
};

describe("job routes", () => {
  let cluster: InMemoryCluster;

  beforeEach(() => {
    cluster = new InMemoryCluster();
    cluster.nodes = [gpuNode("violet-h100-001", 8)];
    cluster.pods = [makePod("busy", { nodeName: "violet-h100-001", gpus: 2 })];
    cluster.addWorkload(makeWorkload({ name: "high", priority: 10, gpus: 2, gpuType: "H100" }));
    cluster.addWorkload(makeWorkload({ name: "low", priority: 1, gpus: 1, queueName: "batch" }));
    cluster.addWorkload(makeWorkload({ name: "running", priority: 50, gpus: 1, gpuType: "H100", admitted: true }));
    cluster.addWorkload(makeWorkload({ name: "owned-wl", priority: 3, gpus: 1, ownerJob: "owned-job" }));
  });

  describe("GET /jobs/pending-workloads", () => {
    it("lists waiting workloads by priority", async () => {
      const res = await createTestApp(cluster).request("/jobs/pending-workloads");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.count).toBe(3);
      expect(body.partial).toBe(false);
      expect(body.workloads.map((w: { name: string }) => w.name)).toEqual(["high", "owned-wl", "low"]);
      expect(body.workloads[0]).toMatchObject({
        namespace: "default",
        admission: "pending",
        priority: 10,
        queueName: "default",
        gpuCount: 2,
        gpuModels: ["H100"],
      });
    });

    it("groups by queue on request", async () => {
      const res = await createTestApp(cluster).request("/jobs/pending-workloads?groupBy=queue");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.workloads).toBeUndefined();
      expect(Object.keys(body.queues)).toEqual(["default", "batch"]);
      expect(body.queues.default.map((w: { name: string }) => w.name)).toEqual(["high", "owned-wl"]);
      expect(body.queues.batch.map((w: { name: string }) => w.name)).toEqual(["low"]);
    });

    it("rejects an unknown grouping", async () => {
      const res = await createTestApp(cluster).request("/jobs/pending-workloads?groupBy=team");
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.issues.map((i: { path: string }) => i.path)).toEqual(["groupBy"]);
    });
  });

  describe("GET /jobs/gpu-models", () => {
    it("joins capacity with waiting work per model", async () => {
      const res = await createTestApp(cluster).request("/jobs/gpu-models");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.models).toHaveLength(1);
      expect(body.models[0].model).toBe("H100");
      expect(body.models[0].totals).toEqual({ capacity: 8, allocatable: 8, used: 2, free: 6 });
      expect(body.models[0].pendingGpuDemand).toBe(2);
      expect(body.unconstrained.map((w: { name: string }) => w.name)).toEqual(["owned-wl", "low"]);
      expect(body.mismatches).toEqual([]);
    });

    it("returns one model case-insensitively", async () => {
      const res = await createTestApp(cluster).request("/jobs/gpu-models/h100");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.view.model).toBe("H100");
      expect(body.view.pendingWorkloads.map((w: { name: string }) => w.name)).toEqual(["high"]);
    });

    it("returns an empty view for a model with no nodes", async () => {
      const res = await createTestApp(cluster).request("/jobs/gpu-models/B200");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.view).toEqual({
        model: "B200",
        nodes: [],
        totals: { capacity: 0, allocatable: 0, used: 0, free: 0 },
        degradedNodes: 0,
        pendingWorkloads: [],
        pendingGpuDemand: 0,
      });
    });
  });

  describe("POST /jobs/submit", () => {
    it("creates a suspended Job and returns 201", async () => {
      const res = await createTestApp(cluster).request("/jobs/submit", json("POST", structuredRequest));
      const body = await res.json();

      expect(res.status).toBe(201);
      expect(body).toMatchObject({ success: true, name: "train-1", namespace: "ml" });
      expect(body.job.spec.suspend).toBe(true);
      expect(cluster.jobs.has("ml/train-1")).toBe(true);
    });

    it("returns 400 with issues for a zero GPU request", async () => {
      const res = await createTestApp(cluster).request("/jobs/submit", json("POST", { ...structuredRequest, gpuCount: 0 }));
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error).toBe("ValidationError");
      expect(body.issues).toEqual([{ path: "gpuCount", message: "must be greater than 0" }]);
      expect(cluster.jobs.size).toBe(0);
    });

    it("returns 400 for a body that is not JSON", async () => {
      const res = await createTestApp(cluster).request("/jobs/submit", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{",
      });
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.message).toBe("Request body is not valid JSON");
    });

    it("returns 409 when the Job already exists", async () => {
      const app = createTestApp(cluster);
      await app.request("/jobs/submit", json("POST", structuredRequest));
      const res = await app.request("/jobs/submit", json("POST", structuredRequest));
      const body = await res.json();

      expect(res.status).toBe(409);
      expect(body.error).toBe("Conflict");
      expect(body.entity).toEqual({ kind: "Job", name: "train-1", namespace: "ml" });
    });

    it("returns 503 when the cluster API is unreachable", async () => {
      cluster.writeFaults.set("createJob", new ClusterApiError("createJob", null, "connect ECONNREFUSED"));

      const res = await createTestApp(cluster).request("/jobs/submit", json("POST", structuredRequest));

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        success: false,
        error: "UpstreamUnavailable",
        message: "Cluster API unavailable during createJob after 1 attempt(s): createJob failed: connect ECONNREFUSED",
        entity: { kind: "Job", name: "train-1", namespace: "ml" },
      });
    });
  });

  describe("POST /jobs/submit-native", () => {
    it("submits the manifest into the default namespace", async () => {
      const manifest = {
        apiVersion: "batch/v1",
        kind: "Job",
        metadata: { name: "native-1" },
        spec: { template: { spec: { restartPolicy: "Never", containers: [{ name: "main", image: "busybox" }] } } },
      };

      const res = await createTestApp(cluster).request("/jobs/submit-native", json("POST", manifest));
      const body = await res.json();

      expect(res.status).toBe(201);
      expect(body).toMatchObject({ name: "native-1", namespace: "default" });
      expect(cluster.jobs.has("default/native-1")).toBe(true);
    });

    it("rejects a manifest of another kind", async () => {
      const res = await createTestApp(cluster).request(
        "/jobs/submit-native",
        json("POST", { apiVersion: "v1", kind: "Pod", metadata: { name: "p" } }),
      );

      expect(res.status).toBe(400);
    });
  });

  describe("PATCH /jobs/:namespace/:name/priority", () => {
    it("changes the priority and reorders the pending list", async () => {
      const app = createTestApp(cluster);
      const res = await app.request("/jobs/default/low/priority", json("PATCH", { priority: 100 }));
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toEqual({
        success: true,
        workload: "low",
        namespace: "default",
        previous: 1,
        priority: 100,
        changed: true,
      });

      const pending = await (await app.request("/jobs/pending-workloads")).json();
      expect(pending.workloads.map((w: { name: string }) => w.name)).toEqual(["low", "high", "owned-wl"]);
    });

    it("resolves a Job name to its Workload", async () => {
      const res = await createTestApp(cluster).request("/jobs/default/owned-job/priority", json("PATCH", { priority: 7 }));
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.workload).toBe("owned-wl");
      expect(body.previous).toBe(3);
    });

    it("reports an unchanged priority without writing", async () => {
      const res = await createTestApp(cluster).request("/jobs/default/high/priority", json("PATCH", { priority: 10 }));
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.changed).toBe(false);
    });

    it("returns 400 for a priority outside int32", async () => {
      const res = await createTestApp(cluster).request(
        "/jobs/default/high/priority",
        json("PATCH", { priority: 2_147_483_648 }),
      );
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.issues).toEqual([{ path: "priority", message: "must fit in a signed 32-bit integer" }]);
    });

    it("returns 404 for an unknown workload", async () => {
      const res = await createTestApp(cluster).request("/jobs/default/ghost/priority", json("PATCH", { priority: 1 }));

      expect(res.status).toBe(404);
      expect((await res.json()).entity).toEqual({ kind: "Workload", name: "ghost", namespace: "default" });
    });

    it("returns 503 when the patch hits a server error", async () => {
      cluster.writeFaults.set("patchWorkload", new ClusterApiError("patchWorkload", 503, "Service Unavailable"));

      const res = await createTestApp(cluster).request("/jobs/default/low/priority", json("PATCH", { priority: 100 }));
      const body = await res.json();

      expect(res.status).toBe(503);
      expect(body.error).toBe("UpstreamUnavailable");
      expect(body.entity).toEqual({ kind: "Workload", name: "low", namespace: "default" });
    });
  });

  describe("DELETE /jobs/:namespace/:name", () => {
    it("deletes an existing Job", async () => {
      const app = createTestApp(cluster);
      await app.request("/jobs/submit", json("POST", structuredRequest));

      const res = await app.request("/jobs/ml/train-1", { method: "DELETE" });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true, name: "train-1", namespace: "ml", deleted: true });
      expect(cluster.jobs.size).toBe(0);
    });

    it("reports an absent Job as not deleted", async () => {
      const res = await createTestApp(cluster).request("/jobs/ml/missing", { method: "DELETE" });

      expect(res.status).toBe(200);
      expect((await res.json()).deleted).toBe(false);
    });

    it("returns 404 for an absent Job in strict mode", async () => {
      const res = await createTestApp(cluster).request("/jobs/ml/missing?strict=true", { method: "DELETE" });
      const body = await res.json();

      expect(res.status).toBe(404);
      expect(body).toEqual({
        success: false,
        error: "NotFound",
        message: "Job ml/missing not found",
        entity: { kind: "Job", name: "missing", namespace: "ml" },
      });
    });

    it("returns 503 when the delete hits a server error", async () => {
      cluster.writeFaults.set("deleteJob", new ClusterApiError("deleteJob", 503, "Service Unavailable"));

      const res = await createTestApp(cluster).request("/jobs/ml/train-1", { method: "DELETE" });
      const body = await res.json();

      expect(res.status).toBe(503);
      expect(body.error).toBe("UpstreamUnavailable");
      expect(body.message).toBe(
        "Cluster API unavailable during deleteJob after 1 attempt(s): deleteJob failed (HTTP 503): Service Unavailable",
      );
      expect(body.entity).toEqual({ kind: "Job", name: "train-1", namespace: "ml" });
    });
  });
});
