import { z } from "zod";

const quantityMapSchema = z.record(z.union([z.string(), z.number()]));

const containerSchema = z
  .object({
    name: z.string().optional(),
    resources: z
      .object({
        requests: quantityMapSchema.optional(),
        limits: quantityMapSchema.optional(),
      })
      .optional(),
  })
  .passthrough();

const podSetSchema = z
  .object({
    name: z.string().optional(),
    count: z.number().int().nonnegative().default(1),
    template: z
      .object({
        metadata: z
          .object({
            annotations: z.record(z.string()).optional(),
            labels: z.record(z.string()).optional(),
          })
          .passthrough()
          .optional(),
        spec: z
          .object({
            containers: z.array(containerSchema).default([]),
          })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const conditionSchema = z
  .object({
    type: z.string(),
    status: z.string(),
  })
  .passthrough();

/** The parts of a `workloads.kueue.x-k8s.io` object this service reads. */
export const workloadSchema = z
  .object({
    metadata: z
      .object({
        name: z.string().min(1),
        namespace: z.string().min(1),
        creationTimestamp: z.string().optional(),
        resourceVersion: z.string().optional(),
        annotations: z.record(z.string()).optional(),
        labels: z.record(z.string()).optional(),
        ownerReferences: z.array(z.object({ kind: z.string(), name: z.string() }).passthrough()).optional(),
      })
      .passthrough(),
    spec: z
      .object({
        priority: z.unknown(),
        priorityClassName: z.string().optional(),
        queueName: z.string().optional(),
        podSets: z.array(podSetSchema).default([]),
        resourceRequests: quantityMapSchema.optional(),
      })
      .passthrough()
      .default({}),
    status: z
      .object({
        conditions: z.array(conditionSchema).default([]),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type KueueWorkload = z.infer<typeof workloadSchema>;
export type KueuePodSet = z.infer<typeof podSetSchema>;
