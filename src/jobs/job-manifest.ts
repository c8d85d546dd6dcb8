import { randomInt } from "node:crypto";
import type { V1Job } from "@kubernetes/client-node";
import { GPU_TYPE_ANNOTATION } from "../workloads/workload-query.js";
import type { StructuredJobRequest } from "./job-schema.js";

export const QUEUE_NAME_LABEL = "kueue.x-k8s.io/queue-name";
export const PRIORITY_CLASS_LABEL = "kueue.x-k8s.io/priority-class";
export const POD_GROUP_NAME_LABEL = "kueue.x-k8s.io/pod-group-name";
export const POD_GROUP_TOTAL_ANNOTATION = "kueue.x-k8s.io/pod-group-total-count";
export const PRIORITY_LABEL = "priority";
export const APP_LABEL_VALUE = "gpu-fleet-job";

export interface ManifestDefaults {
  queueName: string;
  schedulerName?: string;
  /** `<prefix>/gpu` for the configured prefix. */
  gpuResourceKey: string;
  /** Annotation keys the owner is written under. */
  ownerAnnotations: { user: string; team: string };
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** `job-<yyyyMMddHHmmss UTC>-<1000..9999>`. */
export function generateJobName(now: Date = new Date(), suffix: number = randomInt(1000, 10000)): string {
  const stamp =
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `job-${stamp}-${suffix}`;
}

/**
 * Suspended batch/v1 Job for a structured request. Kueue unsuspends it on
 * admission; the queue label routes it to the LocalQueue.
 */
export function buildStructuredJob(req: StructuredJobRequest, name: string, defaults: ManifestDefaults): V1Job {
  const gang = req.gang;
  const completions = gang?.size ?? 1;
  const groupName = gang ? (gang.groupName ?? name) : undefined;

  const labels: Record<string, string> = {
    ...req.labels,
    app: APP_LABEL_VALUE,
    [QUEUE_NAME_LABEL]: req.queueName ?? defaults.queueName,
    [PRIORITY_LABEL]: String(req.priority),
  };
  if (req.priorityClassName) labels[PRIORITY_CLASS_LABEL] = req.priorityClassName;

  const annotations: Record<string, string> = { ...req.annotations, [defaults.ownerAnnotations.user]: req.owner.user };
  if (req.owner.team) annotations[defaults.ownerAnnotations.team] = req.owner.team;

  const podLabels = { ...labels };
  const podAnnotations = { ...annotations };
  if (req.gpuModel) podAnnotations[GPU_TYPE_ANNOTATION] = req.gpuModel;
  if (gang && groupName) {
    labels[POD_GROUP_NAME_LABEL] = groupName;
    podLabels[POD_GROUP_NAME_LABEL] = groupName;
    annotations[POD_GROUP_TOTAL_ANNOTATION] = String(gang.size);
    podAnnotations[POD_GROUP_TOTAL_ANNOTATION] = String(gang.size);
  }

  const requests: Record<string, string> = { [defaults.gpuResourceKey]: String(req.gpuCount) };
  if (req.cpu) requests.cpu = req.cpu;
  if (req.memory) requests.memory = req.memory;

  return {
    apiVersion: "batch/v1",
    kind: "Job",
    metadata: { name, namespace: req.namespace, labels, annotations },
    spec: {
      suspend: true,
      parallelism: completions,
      completions,
      backoffLimit: 2,
      template: {
        metadata: { labels: podLabels, annotations: podAnnotations },
        spec: {
          schedulerName: defaults.schedulerName,
          restartPolicy: "Never",
          nodeSelector: req.nodeSelector,
          tolerations: [{ key: "gpu", operator: "Exists", effect: "NoSchedule" }],
          containers: [
            {
              name: "main",
              image: req.image,
              command: req.command,
              args: req.args,
              resources: { requests, limits: { ...requests } },
            },
          ],
        },
      },
    },
  };
}

/**
 * Mirror a gang label authored on the Job onto its pod template, with the
 * group's total count, so Kueue sees every pod as part of one group.
 */
export function mirrorGangMetadata(job: V1Job): void {
  const meta = job.metadata;
  const groupName = meta?.labels?.[POD_GROUP_NAME_LABEL];
  const template = job.spec?.template;
  if (!meta || !groupName || !template) return;

  const total = meta.annotations?.[POD_GROUP_TOTAL_ANNOTATION] ?? String(job.spec?.parallelism ?? 1);
  meta.annotations = { ...meta.annotations, [POD_GROUP_TOTAL_ANNOTATION]: total };
  const podMeta = template.metadata ?? {};
  podMeta.labels = { ...podMeta.labels, [POD_GROUP_NAME_LABEL]: groupName };
  podMeta.annotations = { ...podMeta.annotations, [POD_GROUP_TOTAL_ANNOTATION]: total };
  template.metadata = podMeta;
}
