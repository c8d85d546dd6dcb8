import type { V1Job } from "@kubernetes/client-node";
import type { ClusterApi, JsonPatchOperation, ObjectRef } from "../cluster/cluster-api.js";
import {
  ClusterApiError,
  ConflictError,
  describeEntity,
  type EntityRef,
  NotFoundError,
  ValidationError,
  type ValidationIssue,
} from "../cluster/errors.js";
import type { OwnerAnnotationKeys } from "../cluster/owner.js";
import { ReadCacheGroup } from "../cluster/read-cache.js";
import type { ResourceNameTranslator } from "../cluster/resource-names.js";
import { unretried } from "../cluster/retry.js";
import { logger } from "../config/logger.js";
import { parsePriority } from "../workloads/workload-query.js";
import { type KueueWorkload, workloadSchema } from "../workloads/workload-schema.js";
import { buildStructuredJob, generateJobName, mirrorGangMetadata } from "./job-manifest.js";
import { int32, isJobManifest, structuredJobSchema, toIssues } from "./job-schema.js";

export interface JobMutationOptions {
  queueName: string;
  schedulerName?: string;
  ownerAnnotations: OwnerAnnotationKeys;
  /** Supplies generated Job names; defaults to the timestamped form. */
  nameGenerator?: () => string;
}

export interface SubmitResult {
  name: string;
  namespace: string;
  job: V1Job;
}

export interface PriorityPatchResult {
  /** The Workload that carries the priority. */
  workload: string;
  namespace: string;
  previous: number;
  priority: number;
  changed: boolean;
}

export interface DeleteResult {
  name: string;
  namespace: string;
  deleted: boolean;
}

export interface DeleteOptions {
  /** Surface an absent Job as NotFound instead of reporting `deleted: false`. */
  strict?: boolean;
}

/**
 * Writes to the cluster: Job submission, Workload priority changes and Job
 * deletion. Nothing here retries: a failed call surfaces as
 * UpstreamUnavailable naming the object. Every successful write clears the
 * read caches.
 */
export class JobMutationController {
  private readonly nameGenerator: () => string;

  constructor(
    private readonly api: ClusterApi,
    private readonly translator: ResourceNameTranslator,
    private readonly options: JobMutationOptions,
    private readonly caches: ReadCacheGroup = new ReadCacheGroup(0),
  ) {
    this.nameGenerator = options.nameGenerator ?? (() => generateJobName());
  }

  async submitStructured(request: unknown): Promise<SubmitResult> {
    const parsed = structuredJobSchema.safeParse(request);
    if (!parsed.success) throw new ValidationError("Invalid job request", toIssues(parsed.error));

    const req = parsed.data;
    const name = req.name ?? this.nameGenerator();
    const job = buildStructuredJob(req, name, {
      queueName: this.options.queueName,
      schedulerName: this.options.schedulerName,
      gpuResourceKey: this.translator.gpuResourceKey,
      ownerAnnotations: {
        user: this.options.ownerAnnotations.user[0] ?? "user",
        team: this.options.ownerAnnotations.team[0] ?? "team",
      },
    });
    return this.create({ name, namespace: req.namespace }, job);
  }

  /** Submit a caller-authored Job as is. GPU resource keys are not translated. */
  async submitNative(manifest: unknown): Promise<SubmitResult> {
    const issues: ValidationIssue[] = [];
    if (!isJobManifest(manifest, issues)) throw new ValidationError("Invalid Job manifest", issues);

    const job = structuredClone(manifest);
    const name = job.metadata?.name ?? "";
    const namespace = job.metadata?.namespace ?? "default";
    job.metadata = { ...job.metadata, name, namespace };
    mirrorGangMetadata(job);
    return this.create({ name, namespace }, job);
  }

  /**
   * Set a Workload's priority. `ref` names the Workload or the Job it was
   * created for. Re-applying the current value writes nothing.
   */
  async patchPriority(ref: ObjectRef, newPriority: unknown): Promise<PriorityPatchResult> {
    const parsed = int32.safeParse(newPriority);
    if (!parsed.success) {
      const issues = toIssues(parsed.error).map((issue) => ({ ...issue, path: "priority" }));
      throw new ValidationError("Priority must be a signed 32-bit integer", issues, { kind: "Workload", ...ref });
    }
    const priority = parsed.data;

    const workload = await this.resolveWorkload(ref);
    const target: ObjectRef = { name: workload.metadata.name, namespace: workload.metadata.namespace };
    const previous = parsePriority(workload.spec.priority);
    if (workload.spec.priority === priority) {
      return { workload: target.name, namespace: target.namespace, previous, priority, changed: false };
    }

    const ops: JsonPatchOperation[] = [];
    if (workload.metadata.resourceVersion) {
      ops.push({ op: "replace", path: "/metadata/resourceVersion", value: workload.metadata.resourceVersion });
    }
    ops.push({ op: "add", path: "/spec/priority", value: priority });
    await unretried(() => this.api.patchWorkload(target, ops), {
      operation: "patchWorkload",
      entity: { kind: "Workload", ...target },
    });

    this.caches.invalidate();
    logger.info("Workload priority changed", { workload: target.name, namespace: target.namespace, previous, priority });
    return { workload: target.name, namespace: target.namespace, previous, priority, changed: true };
  }

  async deleteJob(ref: ObjectRef, opts: DeleteOptions = {}): Promise<DeleteResult> {
    const deleted = await unretried(() => this.api.deleteJob(ref), {
      operation: "deleteJob",
      entity: { kind: "Job", ...ref },
    });
    if (!deleted) {
      if (opts.strict) throw new NotFoundError({ kind: "Job", ...ref });
      logger.info("Job already absent", { job: ref.name, namespace: ref.namespace });
      return { ...ref, deleted: false };
    }
    this.caches.invalidate();
    logger.info("Job deleted", { job: ref.name, namespace: ref.namespace });
    return { ...ref, deleted: true };
  }

  private async create(ref: ObjectRef, job: V1Job): Promise<SubmitResult> {
    const entity: EntityRef = { kind: "Job", ...ref };
    const existing = await unretried(() => this.api.getJob(ref), { operation: "getJob", entity });
    if (existing) throw new ConflictError(entity, "a Job with this name already exists");

    const created = await unretried(() => this.api.createJob(ref.namespace, job), { operation: "createJob", entity });
    this.caches.invalidate();
    logger.info("Job submitted", { job: ref.name, namespace: ref.namespace });
    return { ...ref, job: created };
  }

  private async resolveWorkload(ref: ObjectRef): Promise<KueueWorkload> {
    const entity: EntityRef = { kind: "Workload", ...ref };
    const direct = await unretried(() => this.api.getWorkload(ref), { operation: "getWorkload", entity });
    if (direct !== null) return this.parseWorkload(direct, entity);

    const listed = await unretried(() => this.api.listWorkloads(ref.namespace), { operation: "listWorkloads", entity });
    const owned = listed
      .map((raw) => workloadSchema.safeParse(raw))
      .flatMap((result) => (result.success ? [result.data] : []))
      .find((w) => w.metadata.ownerReferences?.some((o) => o.kind === "Job" && o.name === ref.name));
    if (!owned) throw new NotFoundError(entity);
    return owned;
  }

  private parseWorkload(raw: unknown, entity: EntityRef): KueueWorkload {
    const parsed = workloadSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ClusterApiError(`getWorkload ${describeEntity(entity)}`, null, "response is not a Workload", {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
