import type { ClusterApi } from "../cluster/cluster-api.js";
import {
  deadlineSignal,
  fanOut,
  type IncompleteSource,
  isOk,
  partialResult,
  type ReadOptions,
} from "../cluster/fan-out.js";
import { type OwnerAnnotationKeys, readOwner } from "../cluster/owner.js";
import { parseQuantity } from "../cluster/quantity.js";
import { ReadCacheGroup, type ReadCache } from "../cluster/read-cache.js";
import type { ResourceMap, ResourceNameTranslator } from "../cluster/resource-names.js";
import { boundedRead, DEFAULT_RETRY_POLICY, type RetryPolicy, withRetry } from "../cluster/retry.js";
import { logger } from "../config/logger.js";
import type {
  AdmissionMismatch,
  AdmissionReconciliation,
  PendingWorkload,
  WorkloadRead,
} from "./types.js";
import { type KueuePodSet, type KueueWorkload, workloadSchema } from "./workload-schema.js";

export const INT32_MIN = -2_147_483_648;
export const INT32_MAX = 2_147_483_647;

/** Pod template annotation naming the GPU models a job accepts, comma-separated. */
export const GPU_TYPE_ANNOTATION = "nvidia.com/use-gputype";

export interface WorkloadQueryOptions {
  /** Namespaces to read; empty means cluster-wide. */
  namespaces: readonly string[];
  ownerAnnotations: OwnerAnnotationKeys;
  timeoutMs: number;
  retry?: RetryPolicy;
  now?: () => Date;
}

export function parsePriority(value: unknown): number {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^[+-]?\d+$/.test(value.trim())) {
    const n = Number.parseInt(value.trim(), 10);
    if (Number.isSafeInteger(n)) return n;
  }
  return INT32_MIN;
}

function timestampOf(createdAt: string | null): number | null {
  if (!createdAt) return null;
  const ms = Date.parse(createdAt);
  return Number.isNaN(ms) ? null : ms;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Display order for waiting work: priority descending, then oldest first.
 * Workloads without a usable timestamp sort after every dated one;
 * namespace and name make the order total.
 */
export function compareWorkloads(a: PendingWorkload, b: PendingWorkload): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  const ta = timestampOf(a.createdAt);
  const tb = timestampOf(b.createdAt);
  if (ta !== tb) {
    if (ta === null) return 1;
    if (tb === null) return -1;
    return ta - tb;
  }
  return compareText(a.namespace, b.namespace) || compareText(a.name, b.name);
}

function workloadKey(w: { namespace: string; name: string }): string {
  return `${w.namespace}/${w.name}`;
}

export function parseGpuModels(value: string | undefined): string[] {
  if (!value) return [];
  const models: string[] = [];
  for (const part of value.split(",")) {
    const model = part.trim().toUpperCase();
    if (model && !models.includes(model)) models.push(model);
  }
  return models;
}

/**
 * Join two workload reads taken during one aggregated call. A workload whose
 * admission differs between them takes the state of the read fetched last
 * (the second read on a tie). Workloads seen by only one read keep that
 * read's state.
 */
export function reconcileAdmission(pendingRead: WorkloadRead, admittedRead: WorkloadRead): AdmissionReconciliation {
  const admittedWins = admittedRead.fetchedAt.getTime() >= pendingRead.fetchedAt.getTime();
  const merged = new Map<string, PendingWorkload>();
  const mismatches: AdmissionMismatch[] = [];

  for (const w of pendingRead.items) merged.set(workloadKey(w), w);
  for (const w of admittedRead.items) {
    const key = workloadKey(w);
    const earlier = merged.get(key);
    if (!earlier) {
      merged.set(key, w);
      continue;
    }
    if (earlier.admission === w.admission) continue;
    const winner = admittedWins ? w : earlier;
    mismatches.push({
      name: w.name,
      namespace: w.namespace,
      pendingRead: earlier.admission,
      admittedRead: w.admission,
      resolved: winner.admission,
    });
    merged.set(key, winner);
  }

  const pending = [...merged.values()].filter((w) => w.admission === "pending").sort(compareWorkloads);
  return { pending, mismatches };
}

/** Pending workloads per LocalQueue, each list keeping display order. */
export function groupByQueue(workloads: PendingWorkload[]): Record<string, PendingWorkload[]> {
  const groups: Record<string, PendingWorkload[]> = {};
  for (const w of workloads) {
    const queue = w.queueName ?? "";
    (groups[queue] ??= []).push(w);
  }
  return groups;
}

/** Reads Kueue Workloads and shapes them for operators. */
export class WorkloadQueryEngine {
  private readonly retry: RetryPolicy;
  private readonly now: () => Date;
  private readonly cache: ReadCache<WorkloadRead>;

  constructor(
    private readonly api: ClusterApi,
    private readonly translator: ResourceNameTranslator,
    private readonly options: WorkloadQueryOptions,
    caches: ReadCacheGroup = new ReadCacheGroup(0),
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.now = options.now ?? (() => new Date());
    this.cache = caches.create<WorkloadRead>();
  }

  /** Workloads Kueue has not admitted yet, in display order. */
  async listPendingWorkloads(opts: ReadOptions = {}): Promise<WorkloadRead> {
    const read = await this.listWorkloads(opts);
    return { ...read, items: read.items.filter((w) => w.admission === "pending") };
  }

  /** Every readable Workload in both admission states, in display order. */
  listWorkloads(opts: ReadOptions = {}): Promise<WorkloadRead> {
    return this.cache.getOrLoad("workloads", () => this.load(opts), (read) => !read.partial);
  }

  listAdmittedMismatch(pendingRead: WorkloadRead, admittedRead: WorkloadRead): AdmissionReconciliation {
    const result = reconcileAdmission(pendingRead, admittedRead);
    for (const m of result.mismatches) {
      logger.info("Workload admission changed between reads", { ...m });
    }
    return result;
  }

  toPendingWorkload(raw: KueueWorkload): PendingWorkload {
    const { metadata, spec } = raw;
    const admitted = (raw.status?.conditions ?? []).some((c) => c.type === "Admitted" && c.status === "True");
    const resourceRequests = spec.resourceRequests
      ? this.gpuOnly(this.translator.canonicalizeResources(spec.resourceRequests))
      : this.requestsFromPodSets(spec.podSets);

    return {
      name: metadata.name,
      namespace: metadata.namespace,
      admission: admitted ? "admitted" : "pending",
      priority: parsePriority(spec.priority),
      priorityClassName: spec.priorityClassName ?? null,
      queueName: spec.queueName ?? null,
      createdAt: metadata.creationTimestamp ?? null,
      resourceRequests,
      gpuCount: this.translator.gpuCount(resourceRequests),
      gpuModels: this.gpuModelsOf(raw),
      owner: readOwner(metadata.annotations, this.options.ownerAnnotations),
      resourceVersion: metadata.resourceVersion ?? null,
    };
  }

  private async load(opts: ReadOptions): Promise<WorkloadRead> {
    const namespaces = this.options.namespaces;
    const { signal, dispose } = deadlineSignal(opts.signal, opts.deadlineMs);
    try {
      if (namespaces.length === 0) {
        const raw = await boundedRead(() => this.api.listWorkloads(null), {
          operation: "listWorkloads",
          timeoutMs: this.options.timeoutMs,
          signal,
          ...this.retry,
        });
        return { ...partialResult(this.shape(raw), []), fetchedAt: this.now() };
      }

      const outcomes = await fanOut(
        namespaces.map((namespace) => ({
          source: `workloads/${namespace}`,
          run: (taskSignal: AbortSignal) =>
            withRetry(() => this.api.listWorkloads(namespace), {
              operation: "listWorkloads",
              entity: { kind: "Namespace", name: namespace },
              signal: taskSignal,
              ...this.retry,
            }),
        })),
        { timeoutMs: this.options.timeoutMs, signal },
      );

      const raw: unknown[] = [];
      const incomplete: IncompleteSource[] = [];
      for (const outcome of outcomes) {
        if (isOk(outcome)) raw.push(...outcome.value);
        else {
          incomplete.push(outcome);
          logger.warn("Workload read degraded", { source: outcome.source, status: outcome.status, reason: outcome.error });
        }
      }
      return { ...partialResult(this.shape(raw), incomplete), fetchedAt: this.now() };
    } finally {
      dispose();
    }
  }

  private shape(raw: unknown[]): PendingWorkload[] {
    const items: PendingWorkload[] = [];
    for (const obj of raw) {
      const parsed = workloadSchema.safeParse(obj);
      if (!parsed.success) {
        logger.warn("Skipping malformed Workload", {
          issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
        });
        continue;
      }
      items.push(this.toPendingWorkload(parsed.data));
    }
    return items.sort(compareWorkloads);
  }

  private gpuOnly(resources: ResourceMap): ResourceMap {
    const out: ResourceMap = {};
    for (const [key, value] of Object.entries(resources)) {
      if (this.translator.isGpuResource(key)) out[key] = value;
    }
    return out;
  }

  /** Per-container requests multiplied by the pod set's count and summed per key. */
  private requestsFromPodSets(podSets: KueuePodSet[]): ResourceMap {
    const totals = new Map<string, number>();
    for (const podSet of podSets) {
      for (const container of podSet.template?.spec?.containers ?? []) {
        const requests = this.gpuOnly(this.translator.canonicalizeResources(container.resources?.requests));
        for (const [key, value] of Object.entries(requests)) {
          const quantity = parseQuantity(value);
          if (quantity === null) continue;
          totals.set(key, (totals.get(key) ?? 0) + quantity * podSet.count);
        }
      }
    }
    return Object.fromEntries([...totals].map(([key, total]) => [key, String(total)]));
  }

  private gpuModelsOf(raw: KueueWorkload): string[] {
    const models: string[] = [];
    for (const podSet of raw.spec.podSets) {
      for (const model of parseGpuModels(podSet.template?.metadata?.annotations?.[GPU_TYPE_ANNOTATION])) {
        if (!models.includes(model)) models.push(model);
      }
    }
    return models.length > 0 ? models : parseGpuModels(raw.metadata.annotations?.[GPU_TYPE_ANNOTATION]);
  }
}

