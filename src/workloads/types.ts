import type { OwnerIdentity } from "../cluster/owner.js";
import type { PartialResult } from "../cluster/fan-out.js";
import type { ResourceMap } from "../cluster/resource-names.js";

export type AdmissionState = "admitted" | "pending";

export interface PendingWorkload {
  name: string;
  namespace: string;
  admission: AdmissionState;
  /** `spec.priority`; missing or non-numeric values become the lowest int32. */
  priority: number;
  priorityClassName: string | null;
  queueName: string | null;
  createdAt: string | null;
  /** GPU keys only, under the configured prefix. */
  resourceRequests: ResourceMap;
  gpuCount: number;
  /** Upper-cased GPU models the workload asked for; empty when unconstrained. */
  gpuModels: string[];
  owner: OwnerIdentity;
  resourceVersion: string | null;
}

/** A workload listing stamped with the time the cluster answered. */
export interface WorkloadRead extends PartialResult<PendingWorkload[]> {
  fetchedAt: Date;
}

export interface AdmissionMismatch {
  name: string;
  namespace: string;
  pendingRead: AdmissionState;
  admittedRead: AdmissionState;
  /** State taken from whichever read was fetched last. */
  resolved: AdmissionState;
}

export interface AdmissionReconciliation {
  pending: PendingWorkload[];
  mismatches: AdmissionMismatch[];
}
