import type { V1Job } from "@kubernetes/client-node";
import { type ZodError, z } from "zod";
import type { ValidationIssue } from "../cluster/errors.js";
import { parseQuantity } from "../cluster/quantity.js";
import { INT32_MAX, INT32_MIN } from "../workloads/workload-query.js";

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

const dnsLabel = z.string().max(63).regex(DNS_LABEL, "must be a lowercase RFC 1123 label");
const quantity = z.string().refine((v) => parseQuantity(v) !== null, "must be a resource quantity");

export const int32 = z
  .number()
  .int("must be an integer")
  .min(INT32_MIN, "must fit in a signed 32-bit integer")
  .max(INT32_MAX, "must fit in a signed 32-bit integer");

export const structuredJobSchema = z.object({
  /** Generated as `job-<timestamp>-<4 digits>` when omitted. */
  name: dnsLabel.optional(),
  namespace: dnsLabel.default("default"),
  image: z.string().min(1),
  command: z.array(z.string()).optional(),
  args: z.array(z.string()).optional(),
  gpuCount: z.number().int("must be an integer").positive("must be greater than 0"),
  /** One model or a comma-separated list, e.g. "H100" or "A100,H100". */
  gpuModel: z.string().min(1).optional(),
  cpu: quantity.optional(),
  memory: quantity.optional(),
  priority: int32.default(0),
  priorityClassName: z.string().min(1).optional(),
  queueName: z.string().min(1).optional(),
  owner: z.object({
    user: z.string().trim().min(1),
    team: z.string().trim().min(1).optional(),
  }),
  labels: z.record(z.string()).optional(),
  annotations: z.record(z.string()).optional(),
  nodeSelector: z.record(z.string()).optional(),
  gang: z
    .object({
      size: z.number().int().min(1),
      /** Pod group name; defaults to the Job name. */
      groupName: dnsLabel.optional(),
    })
    .optional(),
});

export type StructuredJobRequest = z.infer<typeof structuredJobSchema>;
export type StructuredJobInput = z.input<typeof structuredJobSchema>;

const metadataSchema = z
  .object({
    name: z.string().min(1),
    namespace: z.string().min(1).optional(),
    labels: z.record(z.string()).optional(),
    annotations: z.record(z.string()).optional(),
  })
  .passthrough();

/** Minimal shape a native manifest must have; everything else is passed through as authored. */
export const nativeJobSchema = z
  .object({
    apiVersion: z.literal("batch/v1"),
    kind: z.literal("Job"),
    metadata: metadataSchema,
    spec: z
      .object({
        template: z
          .object({
            metadata: metadataSchema.partial().optional(),
            spec: z
              .object({
                containers: z.array(z.object({ name: z.string().min(1) }).passthrough()).min(1),
              })
              .passthrough(),
          })
          .passthrough(),
      })
      .passthrough(),
  })
  .passthrough();

export function toIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
  }));
}

/** Structural check for native manifests. Collects problems into `issues` when it fails. */
export function isJobManifest(value: unknown, issues: ValidationIssue[] = []): value is V1Job {
  const result = nativeJobSchema.safeParse(value);
  if (!result.success) issues.push(...toIssues(result.error));
  return result.success;
}
