import {
  ApiException,
  BatchV1Api,
  CoreV1Api,
  CustomObjectsApi,
  KubeConfig,
  type V1Job,
  type V1Node,
  type V1Pod,
} from "@kubernetes/client-node";
import type { ClusterApi, JsonPatchOperation, ObjectRef } from "./cluster-api.js";
import { ClusterApiError, ConflictError, type EntityRef, ValidationError } from "./errors.js";

export const KUEUE_WORKLOADS = {
  group: "kueue.x-k8s.io",
  version: "v1beta1",
  plural: "workloads",
} as const;

function statusMessage(body: unknown): string | null {
  if (typeof body === "string") {
    try {
      return statusMessage(JSON.parse(body));
    } catch {
      return body.length > 0 ? body : null;
    }
  }
  if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
    return body.message;
  }
  return null;
}

function itemsOf(list: unknown): unknown[] {
  if (typeof list === "object" && list !== null && "items" in list && Array.isArray(list.items)) {
    return list.items;
  }
  return [];
}

/** ClusterApi backed by @kubernetes/client-node. */
export class KubeClusterApi implements ClusterApi {
  constructor(
    private readonly core: CoreV1Api,
    private readonly batch: BatchV1Api,
    private readonly custom: CustomObjectsApi,
  ) {}

  /** Load credentials from an explicit kubeconfig path, or the default chain (KUBECONFIG, ~/.kube/config, in-cluster). */
  static fromKubeconfig(path?: string): KubeClusterApi {
    const kc = new KubeConfig();
    if (path) kc.loadFromFile(path);
    else kc.loadFromDefault();
    return new KubeClusterApi(kc.makeApiClient(CoreV1Api), kc.makeApiClient(BatchV1Api), kc.makeApiClient(CustomObjectsApi));
  }

  async listNodes(): Promise<V1Node[]> {
    const list = await this.call("listNodes", null, () => this.core.listNode());
    return list.items;
  }

  async readNode(name: string): Promise<V1Node | null> {
    return this.orNull(() => this.call("readNode", { kind: "Node", name }, () => this.core.readNode({ name })));
  }

  async listPodsOnNode(nodeName: string): Promise<V1Pod[]> {
    const list = await this.call("listPodsOnNode", { kind: "Node", name: nodeName }, () =>
      this.core.listPodForAllNamespaces({ fieldSelector: `spec.nodeName=${nodeName}` }),
    );
    return list.items;
  }

  async listWorkloads(namespace: string | null): Promise<unknown[]> {
    const list: unknown = await this.call("listWorkloads", null, () =>
      namespace === null
        ? this.custom.listClusterCustomObject({ ...KUEUE_WORKLOADS })
        : this.custom.listNamespacedCustomObject({ ...KUEUE_WORKLOADS, namespace }),
    );
    return itemsOf(list);
  }

  async getWorkload(ref: ObjectRef): Promise<unknown | null> {
    return this.orNull(() =>
      this.call("getWorkload", { kind: "Workload", ...ref }, () =>
        this.custom.getNamespacedCustomObject({ ...KUEUE_WORKLOADS, ...ref }),
      ),
    );
  }

  async patchWorkload(ref: ObjectRef, ops: JsonPatchOperation[]): Promise<unknown> {
    return this.call("patchWorkload", { kind: "Workload", ...ref }, () =>
      this.custom.patchNamespacedCustomObject({ ...KUEUE_WORKLOADS, ...ref, body: ops }),
    );
  }

  async getJob(ref: ObjectRef): Promise<V1Job | null> {
    return this.orNull(() => this.call("getJob", { kind: "Job", ...ref }, () => this.batch.readNamespacedJob(ref)));
  }

  async createJob(namespace: string, job: V1Job): Promise<V1Job> {
    const entity: EntityRef = { kind: "Job", name: job.metadata?.name ?? "", namespace };
    return this.call("createJob", entity, () => this.batch.createNamespacedJob({ namespace, body: job }));
  }

  async deleteJob(ref: ObjectRef): Promise<boolean> {
    const deleted = await this.orNull(() =>
      this.call("deleteJob", { kind: "Job", ...ref }, () =>
        this.batch.deleteNamespacedJob({ ...ref, propagationPolicy: "Background" }),
      ),
    );
    return deleted !== null;
  }

  private async orNull<T>(fn: () => Promise<T>): Promise<T | null> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ClusterApiError && err.statusCode === 404) return null;
      throw err;
    }
  }

  private async call<T>(operation: string, entity: EntityRef | null, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw mapApiError(operation, entity, err);
    }
  }
}

/** Translate a client-node failure into the error taxonomy. */
export function mapApiError(operation: string, entity: EntityRef | null, err: unknown): Error {
  if (err instanceof ApiException) {
    const code: number = err.code;
    const message = statusMessage(err.body) ?? err.message;
    if (code === 409 && entity) return new ConflictError(entity, message);
    if (code === 400 || code === 422) {
      return new ValidationError(`Cluster rejected ${operation}: ${message}`, [{ path: "", message }], entity);
    }
    return new ClusterApiError(operation, code, message, { cause: err });
  }
  return new ClusterApiError(operation, null, err instanceof Error ? err.message : String(err), { cause: err });
}
