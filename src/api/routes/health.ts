import { Hono } from "hono";

/** Liveness for load balancers and the kubelet. Never calls the cluster. */
export function createHealthRoutes(service: string): Hono {
  const routes = new Hono();

  routes.get("/", (c) => c.json({ status: "ok", service }));

  return routes;
}
