import type { V1Container, V1Pod } from "@kubernetes/client-node";
import { type OwnerAnnotationKeys, readOwner } from "../cluster/owner.js";
import type { ResourceNameTranslator } from "../cluster/resource-names.js";
import type { FleetNode, GpuDevice, NodeGpuUsage, PodGpuClaim } from "./types.js";

/** Pods in these phases no longer occupy GPUs, even if the kubelet has not released the claim yet. */
export const TERMINAL_POD_PHASES: ReadonlySet<string> = new Set(["Succeeded", "Failed"]);

/** HAMi per-pod device binding: `<uuid>:<allocation>` entries, comma-separated. */
export const VGPU_ALLOCATED_ANNOTATION = "hami.io/vgpu-devices-allocated";

export function isTerminalPod(pod: V1Pod): boolean {
  return TERMINAL_POD_PHASES.has(pod.status?.phase ?? "");
}

export function parseAllocatedDevices(annotation: string | undefined): string[] {
  if (!annotation) return [];
  const ids: string[] = [];
  for (const item of annotation.split(",")) {
    const id = item.split(":")[0]?.trim();
    if (id && !ids.includes(id)) ids.push(id);
  }
  return ids;
}

export interface NodeCorrelation {
  usage: NodeGpuUsage;
  devices: GpuDevice[];
  claims: PodGpuClaim[];
}

function compareRefs(a: { namespace: string; name: string }, b: { namespace: string; name: string }): number {
  if (a.namespace !== b.namespace) return a.namespace < b.namespace ? -1 : 1;
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  return 0;
}

/**
 * Joins pods against a node's GPU inventory.
 *
 * Pure: both sides are already materialized. Pods naming a different node
 * are ignored, terminal pods are excluded, and each device is handed to at
 * most one pod.
 */
export class GpuCorrelator {
  constructor(
    private readonly translator: ResourceNameTranslator,
    private readonly ownerKeys: OwnerAnnotationKeys,
  ) {}

  /**
   * GPUs a pod holds, using the scheduler's effective request: the larger of
   * the regular containers' sum and the largest init container.
   */
  podGpuRequest(pod: V1Pod): number {
    const containerGpus = (c: V1Container) =>
      this.translator.gpuCount(c.resources?.requests) || this.translator.gpuCount(c.resources?.limits);
    const regular = (pod.spec?.containers ?? []).reduce((sum, c) => sum + containerGpus(c), 0);
    const init = (pod.spec?.initContainers ?? []).reduce((max, c) => Math.max(max, containerGpus(c)), 0);
    return Math.max(regular, init);
  }

  correlateNode(node: FleetNode, pods: V1Pod[]): NodeCorrelation {
    const claims: PodGpuClaim[] = [];
    const declared = new Map<PodGpuClaim, string[]>();

    for (const pod of pods) {
      if (pod.spec?.nodeName && pod.spec.nodeName !== node.name) continue;
      if (isTerminalPod(pod)) continue;
      const gpus = this.podGpuRequest(pod);
      if (gpus === 0) continue;
      const claim: PodGpuClaim = {
        name: pod.metadata?.name ?? "",
        namespace: pod.metadata?.namespace ?? "",
        phase: pod.status?.phase ?? "Unknown",
        gpus,
        deviceIds: [],
        owner: readOwner(pod.metadata?.annotations, this.ownerKeys),
      };
      claims.push(claim);
      declared.set(claim, parseAllocatedDevices(pod.metadata?.annotations?.[VGPU_ALLOCATED_ANNOTATION]));
    }
    claims.sort(compareRefs);

    const devices = node.deviceIds.map((id, index): GpuDevice => ({
      id,
      index,
      model: node.model,
      status: "free",
      pod: null,
    }));
    const byId = new Map(devices.map((d) => [d.id, d] as const));
    const assign = (device: GpuDevice, claim: PodGpuClaim) => {
      device.status = "assigned";
      device.pod = { name: claim.name, namespace: claim.namespace };
      claim.deviceIds.push(device.id);
    };

    // Bindings the device plugin recorded take precedence over positional assignment.
    for (const claim of claims) {
      for (const id of declared.get(claim) ?? []) {
        if (claim.deviceIds.length >= claim.gpus) break;
        const device = byId.get(id);
        if (device && device.status === "free") assign(device, claim);
      }
    }
    for (const claim of claims) {
      for (const device of devices) {
        if (claim.deviceIds.length >= claim.gpus) break;
        if (device.status === "free") assign(device, claim);
      }
    }

    const inUse = claims.reduce((sum, c) => sum + c.gpus, 0);
    return {
      usage: {
        node: node.name,
        model: node.model,
        allocatable: node.allocatable,
        inUse,
        free: Math.max(node.allocatable - inUse, 0),
        claims,
        degraded: false,
      },
      devices,
      claims,
    };
  }
}
