import type { OwnerIdentity } from "../cluster/owner.js";

export interface FleetNode {
  name: string;
  /** Upper-cased model parsed from the node name; the join key for per-model views. */
  model: string;
  ordinal: number;
  /** `nvidia.com/gpu.product` label, when the GPU feature discovery set one. */
  product: string | null;
  capacity: number;
  /** Never exceeds capacity. */
  allocatable: number;
  deviceIds: string[];
  /** GPUs held by non-terminal pods; null when the node's pods could not be read. */
  used: number | null;
  free: number | null;
  degraded: boolean;
  degradedReason?: string;
}

export interface PodRef {
  name: string;
  namespace: string;
}

export type GpuDeviceStatus = "free" | "assigned";

export interface GpuDevice {
  id: string;
  index: number;
  model: string;
  status: GpuDeviceStatus;
  pod: PodRef | null;
}

export interface PodGpuClaim extends PodRef {
  phase: string;
  gpus: number;
  deviceIds: string[];
  owner: OwnerIdentity;
}

export interface NodeGpuUsage {
  node: string;
  model: string;
  allocatable: number;
  inUse: number | null;
  free: number | null;
  claims: PodGpuClaim[];
  degraded: boolean;
}

export interface NodeGpuDetail {
  node: FleetNode;
  devices: GpuDevice[];
  claims: PodGpuClaim[];
}
