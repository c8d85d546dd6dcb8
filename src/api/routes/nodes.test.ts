import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { createTestApp } from "../../test/app.js";
import { gpuNode, InMemoryCluster, makePod } from "../../test/cluster.js";

describe("node routes", () => {
  let cluster: InMemoryCluster;

  beforeEach(() => {
    cluster = new InMemoryCluster();
    cluster.nodes = [gpuNode("violet-h100-001", 8), gpuNode("violet-a100-001", 4), gpuNode("cpu-node", 0)];
    cluster.pods = [makePod("busy", { nodeName: "violet-h100-001", gpus: 2, annotations: { user: "alice" } })];
  });

  describe("GET /nodes", () => {
    it("lists fleet nodes in name order with usage", async () => {
      const res = await createTestApp(cluster).request("/nodes");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.success).toBe(true);
      expect(body.count).toBe(2);
      expect(body.partial).toBe(false);
      expect(body.incomplete).toEqual([]);
      expect(body.nodes.map((n: { name: string }) => n.name)).toEqual(["violet-a100-001", "violet-h100-001"]);
      expect(body.nodes[1]).toMatchObject({ model: "H100", capacity: 8, allocatable: 8, used: 2, free: 6 });
    });

    it("returns 200 with partial results when one node cannot be read", async () => {
      cluster.podListFaults.set("violet-a100-001", new Error("kubelet unreachable"));

      const res = await createTestApp(cluster).request("/nodes");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.partial).toBe(true);
      expect(body.incomplete).toEqual([
        {
          source: "pods/violet-a100-001",
          status: "failed",
          error: "Cluster API unavailable during listPodsOnNode after 1 attempt(s): kubelet unreachable",
        },
      ]);
      expect(body.nodes[0]).toMatchObject({ name: "violet-a100-001", degraded: true, used: null, free: null });
    });

    it("returns 503 when the node list cannot be read", async () => {
      cluster.nodeListFault = new Error("ECONNREFUSED");

      const res = await createTestApp(cluster).request("/nodes");
      const body = await res.json();

      expect(res.status).toBe(503);
      expect(body).toEqual({
        success: false,
        error: "UpstreamUnavailable",
        message: "Cluster API unavailable during listNodes after 1 attempt(s): ECONNREFUSED",
        entity: null,
      });
    });

    it("rejects a non-numeric timeoutMs", async () => {
      const res = await createTestApp(cluster).request("/nodes?timeoutMs=soon");
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error).toBe("ValidationError");
      expect(body.issues.map((i: { path: string }) => i.path)).toEqual(["timeoutMs"]);
    });
  });

  describe("GET /nodes/usage", () => {
    it("reports per-node GPU usage and claims", async () => {
      const res = await createTestApp(cluster).request("/nodes/usage");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.count).toBe(2);
      expect(body.usage[1]).toMatchObject({ node: "violet-h100-001", inUse: 2, free: 6, degraded: false });
      expect(body.usage[1].claims).toEqual([
        {
          name: "busy",
          namespace: "default",
          phase: "Running",
          gpus: 2,
          deviceIds: ["GPU-violet-h100-001-000", "GPU-violet-h100-001-001"],
          owner: { user: "alice", team: null },
        },
      ]);
    });
  });

  describe("GET /nodes/:name/gpus", () => {
    it("returns the device breakdown", async () => {
      const res = await createTestApp(cluster).request("/nodes/violet-h100-001/gpus");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.devices).toHaveLength(8);
      expect(body.devices[0]).toEqual({
        id: "GPU-violet-h100-001-000",
        index: 0,
        model: "H100",
        status: "assigned",
        pod: { name: "busy", namespace: "default" },
      });
      expect(body.devices[2].status).toBe("free");
    });

    it("returns 404 for a node outside the fleet naming convention", async () => {
      const res = await createTestApp(cluster).request("/nodes/cpu-node/gpus");
      const body = await res.json();

      expect(res.status).toBe(404);
      expect(body).toEqual({
        success: false,
        error: "NotFound",
        message: "Node cpu-node not found: name does not match violet-<model>-<ddd>",
        entity: { kind: "Node", name: "cpu-node" },
      });
    });

    it("returns 404 for a fleet-shaped name with no Node", async () => {
      const res = await createTestApp(cluster).request("/nodes/violet-h100-009/gpus");
      expect(res.status).toBe(404);
      expect((await res.json()).message).toBe("Node violet-h100-009 not found");
    });
  });

  describe("GET /nodes/:name/gpus/:deviceId/pods", () => {
    it("lists pods holding the device", async () => {
      const res = await createTestApp(cluster).request("/nodes/violet-h100-001/gpus/GPU-violet-h100-001-001/pods");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.node).toBe("violet-h100-001");
      expect(body.deviceId).toBe("GPU-violet-h100-001-001");
      expect(body.count).toBe(1);
      expect(body.pods[0].name).toBe("busy");
    });

    it("returns an empty list for a free device", async () => {
      const res = await createTestApp(cluster).request("/nodes/violet-h100-001/gpus/GPU-violet-h100-001-005/pods");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.pods).toEqual([]);
    });

    it("returns 404 for an unknown device", async () => {
      const res = await createTestApp(cluster).request("/nodes/violet-h100-001/gpus/GPU-missing/pods");
      const body = await res.json();

      expect(res.status).toBe(404);
      expect(body.entity).toEqual({ kind: "GpuDevice", name: "GPU-missing" });
      expect(body.message).toBe("GpuDevice GPU-missing not found: no such device on node violet-h100-001");
    });
  });
});
