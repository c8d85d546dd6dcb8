/**
 * Error taxonomy surfaced to callers of the core operations.
 *
 * Every error names the affected entity so the HTTP layer can render a
 * response without parsing messages. PartialResult is not here: a degraded
 * aggregated read is a value (see fan-out.ts), not a failure.
 */

export type FleetErrorKind = "NotFound" | "ValidationError" | "Conflict" | "UpstreamUnavailable";

/** Identity of the object an error is about, e.g. `{ kind: "Job", name: "train-1", namespace: "ml" }`. */
export interface EntityRef {
  kind: string;
  name: string;
  namespace?: string;
}

export function describeEntity(entity: EntityRef): string {
  return entity.namespace ? `${entity.kind} ${entity.namespace}/${entity.name}` : `${entity.kind} ${entity.name}`;
}

export abstract class FleetError extends Error {
  abstract readonly kind: FleetErrorKind;

  constructor(
    message: string,
    readonly entity: EntityRef | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class NotFoundError extends FleetError {
  readonly name = "NotFoundError" as const;
  readonly kind = "NotFound" as const;

  constructor(entity: EntityRef, detail?: string) {
    super(detail ? `${describeEntity(entity)} not found: ${detail}` : `${describeEntity(entity)} not found`, entity);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends FleetError {
  readonly name = "ValidationError" as const;
  readonly kind = "ValidationError" as const;

  constructor(
    message: string,
    readonly issues: ValidationIssue[],
    entity: EntityRef | null = null,
  ) {
    super(message, entity);
  }
}

export class ConflictError extends FleetError {
  readonly name = "ConflictError" as const;
  readonly kind = "Conflict" as const;

  constructor(entity: EntityRef, reason: string) {
    super(`Conflict on ${describeEntity(entity)}: ${reason}`, entity);
  }
}

/** The cluster API could not be reached, or a read exhausted its retries. */
export class UpstreamUnavailableError extends FleetError {
  readonly name = "UpstreamUnavailableError" as const;
  readonly kind = "UpstreamUnavailable" as const;

  constructor(
    readonly operation: string,
    readonly attempts: number,
    cause: unknown,
    entity: EntityRef | null = null,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cluster API unavailable during ${operation} after ${attempts} attempt(s): ${reason}`, entity, { cause });
  }
}

/**
 * A cluster API failure that is not one of the mapped kinds.
 * `retryable` marks network errors, 408, 429 and 5xx responses.
 */
export class ClusterApiError extends Error {
  readonly name = "ClusterApiError" as const;

  constructor(
    readonly operation: string,
    readonly statusCode: number | null,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${operation} failed${statusCode === null ? "" : ` (HTTP ${statusCode})`}: ${message}`, options);
  }

  get retryable(): boolean {
    if (this.statusCode === null) return true;
    return this.statusCode === 408 || this.statusCode === 429 || this.statusCode >= 500;
  }
}

export function isFleetError(err: unknown): err is FleetError {
  return err instanceof FleetError;
}
