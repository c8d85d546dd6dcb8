import { Hono } from "hono";
import type { InventoryReader } from "../../inventory/inventory-reader.js";
import { readOptions } from "../request.js";

/**
 * Fleet inventory routes.
 *
 * Static paths (/usage) are registered BEFORE parameterized ones (/:name)
 * so Hono does not match "usage" as a node name.
 */
export function createNodeRoutes(inventory: InventoryReader): Hono {
  const routes = new Hono();

  /**
   * GET /nodes
   * Fleet nodes with capacity and usage
   */
  routes.get("/", async (c) => {
    const result = await inventory.listFleetNodes(readOptions(c));
    return c.json({
      success: true,
      nodes: result.items,
      count: result.items.length,
      partial: result.partial,
      incomplete: result.incomplete,
    });
  });

  /**
   * GET /nodes/usage
   * Per-node GPU usage with the pods holding GPUs
   */
  routes.get("/usage", async (c) => {
    const result = await inventory.gpuUsageByNode(readOptions(c));
    return c.json({
      success: true,
      usage: result.items,
      count: result.items.length,
      partial: result.partial,
      incomplete: result.incomplete,
    });
  });

  /**
   * GET /nodes/:name/gpus
   * Device breakdown of one node
   */
  routes.get("/:name/gpus", async (c) => {
    const detail = await inventory.listGPUsForNode(c.req.param("name"));
    return c.json({ success: true, ...detail });
  });

  /**
   * GET /nodes/:name/gpus/:deviceId/pods
   * Pods holding one device
   */
  routes.get("/:name/gpus/:deviceId/pods", async (c) => {
    const node = c.req.param("name");
    const deviceId = c.req.param("deviceId");
    const pods = await inventory.listPodsForDevice(node, deviceId);
    return c.json({ success: true, node, deviceId, pods, count: pods.length });
  });

  return routes;
}
