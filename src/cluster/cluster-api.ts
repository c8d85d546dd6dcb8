import type { V1Job, V1Node, V1Pod } from "@kubernetes/client-node";

export interface ObjectRef {
  name: string;
  namespace: string;
}

/** RFC 6902 operation, the patch format used for Workload updates. */
export type JsonPatchOperation =
  | { op: "add" | "replace" | "test"; path: string; value: unknown }
  | { op: "remove"; path: string };

/**
 * Port to the cluster control plane.
 *
 * Implementations translate transport failures into the error taxonomy:
 * absence is `null`/`false` (never an exception), a 409 is ConflictError,
 * a 400/422 is ValidationError, and anything else is ClusterApiError.
 * Custom resources come back as `unknown`; callers validate their shape.
 */
export interface ClusterApi {
  listNodes(): Promise<V1Node[]>;
  readNode(name: string): Promise<V1Node | null>;
  listPodsOnNode(nodeName: string): Promise<V1Pod[]>;

  /** Kueue Workloads in one namespace, or across all namespaces when `namespace` is null. */
  listWorkloads(namespace: string | null): Promise<unknown[]>;
  getWorkload(ref: ObjectRef): Promise<unknown | null>;
  patchWorkload(ref: ObjectRef, ops: JsonPatchOperation[]): Promise<unknown>;

  getJob(ref: ObjectRef): Promise<V1Job | null>;
  createJob(namespace: string, job: V1Job): Promise<V1Job>;
  /** Returns false when the Job was already absent. */
  deleteJob(ref: ObjectRef): Promise<boolean>;
}
