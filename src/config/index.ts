import { z } from "zod";

/** The two recognized GPU resource-name prefixes: a placeholder domain and the vendor domain. */
export const GPU_RESOURCE_PREFIXES = ["example.com", "nvidia.com"] as const;
export type GpuResourcePrefix = (typeof GPU_RESOURCE_PREFIXES)[number];

/**
 * Split a comma-separated env value into trimmed, non-empty entries.
 * Returns undefined for an unset variable so the schema default applies.
 */
function parseList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  sentryDsn: z.string().optional(),

  /** Cluster connection and the Kueue objects this service reads and writes. */
  cluster: z
    .object({
      kubeconfig: z.string().min(1).optional(),
      gpuResourcePrefix: z.enum(GPU_RESOURCE_PREFIXES).default("example.com"),
      fleetNodePrefix: z
        .string()
        .regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, "Fleet prefix must be lowercase alphanumeric segments joined by '-'")
        .default("violet"),
      /** Namespaces scanned for Workloads. Empty means all namespaces. */
      workloadNamespaces: z.array(z.string().min(1)).default([]),
      ownerAnnotations: z
        .object({
          user: z.array(z.string().min(1)).min(1).default(["user", "user_name"]),
          team: z.array(z.string().min(1)).min(1).default(["team", "team_name"]),
        })
        .default({}),
    })
    .default({}),

  /** Defaults stamped onto structured job submissions. */
  jobs: z
    .object({
      queueName: z.string().min(1).default("default"),
      schedulerName: z.string().min(1).optional(),
    })
    .default({}),

  /** Read-path timing: per sub-read timeout, retry budget, and cache TTL (0 disables the cache). */
  reads: z
    .object({
      timeoutMs: z.coerce.number().int().positive().default(5000),
      retryAttempts: z.coerce.number().int().min(1).max(10).default(3),
      retryBaseMs: z.coerce.number().int().min(0).default(200),
      cacheTtlMs: z.coerce.number().int().min(0).default(0),
      /** Bound on each source of an aggregated per-model view. */
      aggregateTimeoutMs: z.coerce.number().int().positive().default(15000),
    })
    .default({}),

  corsOrigins: z.array(z.string().min(1)).default(["*"]),
});

export type Config = z.infer<typeof configSchema>;

/** Build the process configuration from an environment map. Throws a ZodError on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv): Readonly<Config> {
  const parsed = configSchema.parse({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    sentryDsn: env.SENTRY_DSN || undefined,
    cluster: {
      kubeconfig: env.KUBECONFIG || undefined,
      gpuResourcePrefix: env.GPU_RESOURCE_PREFIX,
      fleetNodePrefix: env.FLEET_NODE_PREFIX,
      workloadNamespaces: parseList(env.WORKLOAD_NAMESPACES),
      ownerAnnotations: {
        user: parseList(env.OWNER_USER_ANNOTATIONS),
        team: parseList(env.OWNER_TEAM_ANNOTATIONS),
      },
    },
    jobs: {
      queueName: env.KUEUE_QUEUE_NAME,
      schedulerName: env.JOB_SCHEDULER_NAME || undefined,
    },
    reads: {
      timeoutMs: env.READ_TIMEOUT_MS,
      retryAttempts: env.READ_RETRY_ATTEMPTS,
      retryBaseMs: env.READ_RETRY_BASE_MS,
      cacheTtlMs: env.CACHE_TTL_MS,
      aggregateTimeoutMs: env.AGGREGATE_TIMEOUT_MS,
    },
    corsOrigins: parseList(env.CORS_ORIGINS),
  });
  return Object.freeze(parsed);
}

export const config = loadConfig(process.env);
