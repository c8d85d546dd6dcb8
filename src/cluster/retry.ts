import { logger } from "../config/logger.js";
import { ClusterApiError, type EntityRef, isFleetError, UpstreamUnavailableError } from "./errors.js";
import { AbandonedCallError, type FanOutOptions, withinDeadline } from "./fan-out.js";

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { attempts: 3, baseDelayMs: 200 };

export interface RetryOptions extends Partial<RetryPolicy> {
  /** Name used in logs and in the surfaced UpstreamUnavailableError. */
  operation: string;
  entity?: EntityRef | null;
  sleep?: (ms: number) => Promise<void>;
  /** Stops further attempts once aborted; the last failure is surfaced. */
  signal?: AbortSignal;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function isRetryable(err: unknown): boolean {
  if (isFleetError(err)) return false;
  if (err instanceof ClusterApiError) return err.retryable;
  return true;
}

/**
 * Run a read against the cluster API with bounded exponential backoff
 * (baseDelayMs, 2x, 4x, ...). Only read paths use this: mutations are
 * never retried automatically.
 *
 * Taxonomy errors (NotFound, Conflict, ...) propagate untouched. Any other
 * failure surfaces as UpstreamUnavailableError once it is not retryable or
 * the attempts are spent.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const attempts = Math.max(1, opts.attempts ?? DEFAULT_RETRY_POLICY.attempts);
  const baseDelayMs = opts.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs;
  const sleep = opts.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (isFleetError(err)) throw err;
      if (!isRetryable(err) || attempt >= attempts || opts.signal?.aborted) {
        throw new UpstreamUnavailableError(opts.operation, attempt, err, opts.entity ?? null);
      }
      const delayMs = baseDelayMs * 2 ** (attempt - 1);
      logger.warn("Cluster read failed, retrying", {
        operation: opts.operation,
        attempt,
        delayMs,
        error: err instanceof Error ? err.message : String(err),
      });
      await sleep(delayMs);
    }
  }
}

/**
 * withRetry bounded by `timeoutMs` and the caller's signal. A hung call is
 * abandoned rather than awaited, and giving up surfaces as
 * UpstreamUnavailableError.
 */
export async function boundedRead<T>(fn: () => Promise<T>, opts: RetryOptions & FanOutOptions): Promise<T> {
  try {
    return await withinDeadline((signal) => withRetry(fn, { ...opts, signal }), opts);
  } catch (err) {
    if (err instanceof AbandonedCallError) {
      throw new UpstreamUnavailableError(opts.operation, 1, err, opts.entity ?? null);
    }
    throw err;
  }
}

/**
 * Run a write exactly once. Failures outside the error taxonomy (network
 * errors, 5xx) surface as UpstreamUnavailableError.
 */
export async function unretried<T>(fn: () => Promise<T>, opts: { operation: string; entity?: EntityRef | null }): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isFleetError(err)) throw err;
    throw new UpstreamUnavailableError(opts.operation, 1, err, opts.entity ?? null);
  }
}
