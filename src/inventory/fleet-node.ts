import type { V1Node } from "@kubernetes/client-node";
import type { FleetNodeName } from "../cluster/fleet-naming.js";
import type { ResourceNameTranslator } from "../cluster/resource-names.js";
import { logger } from "../config/logger.js";
import type { FleetNode } from "./types.js";

export const GPU_PRODUCT_LABEL = "nvidia.com/gpu.product";
/** HAMi device-plugin registration: `<uuid>,<count>,<mem>,<cores>,<type>,<numa>,<healthy>:` per device. */
export const DEVICE_REGISTER_ANNOTATION = "hami.io/node-nvidia-register";

export function parseRegisteredDevices(annotation: string | undefined): string[] {
  if (!annotation) return [];
  const ids: string[] = [];
  for (const entry of annotation.split(":")) {
    const id = entry.split(",")[0]?.trim();
    if (id && !ids.includes(id)) ids.push(id);
  }
  return ids;
}

export function syntheticDeviceIds(nodeName: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => `GPU-${nodeName}-${String(i).padStart(3, "0")}`);
}

/** Normalize a Node into the fleet view. `used`/`free` stay null until pods are correlated. */
export function buildFleetNode(node: V1Node, name: string, parsed: FleetNodeName, translator: ResourceNameTranslator): FleetNode {
  const capacity = translator.gpuCount(node.status?.capacity);
  let allocatable = translator.gpuCount(node.status?.allocatable);
  if (allocatable > capacity) {
    logger.warn("Node reports more allocatable GPUs than capacity; clamping", { node: name, capacity, allocatable });
    allocatable = capacity;
  }

  const registered = parseRegisteredDevices(node.metadata?.annotations?.[DEVICE_REGISTER_ANNOTATION]);
  return {
    name,
    model: parsed.model,
    ordinal: parsed.ordinal,
    product: node.metadata?.labels?.[GPU_PRODUCT_LABEL] ?? null,
    capacity,
    allocatable,
    deviceIds: registered.length > 0 ? registered : syntheticDeviceIds(name, capacity),
    used: null,
    free: null,
    degraded: false,
  };
}
