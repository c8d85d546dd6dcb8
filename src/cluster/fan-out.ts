/**
 * Concurrent sub-reads with individual timeouts and a shared caller deadline.
 *
 * Every task runs independently; the join point resolves only after each
 * task has completed, failed, timed out, or been abandoned because the
 * caller's signal fired. Abandoned tasks are not awaited: their signal is
 * aborted and whatever they eventually settle with is ignored.
 */

export type IncompleteStatus = "timeout" | "failed" | "aborted";

export interface IncompleteSource {
  source: string;
  status: IncompleteStatus;
  error: string;
}

export type SourceOutcome<T> = { source: string; status: "ok"; value: T } | IncompleteSource;

export interface FanOutTask<T> {
  source: string;
  run: (signal: AbortSignal) => Promise<T>;
}

export interface FanOutOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Caller controls accepted by every aggregated read. */
export interface ReadOptions {
  signal?: AbortSignal;
  /** Relative deadline for the whole call, in milliseconds. */
  deadlineMs?: number;
}

/** Aggregated read result. `partial` is true when any source is incomplete. */
export interface PartialResult<T> {
  items: T;
  partial: boolean;
  incomplete: IncompleteSource[];
}

export function partialResult<T>(items: T, incomplete: IncompleteSource[]): PartialResult<T> {
  return { items, partial: incomplete.length > 0, incomplete };
}

export function isOk<T>(outcome: SourceOutcome<T>): outcome is { source: string; status: "ok"; value: T } {
  return outcome.status === "ok";
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** A bounded call given up on before it settled. */
export class AbandonedCallError extends Error {
  readonly name = "AbandonedCallError" as const;

  constructor(
    readonly status: "timeout" | "aborted",
    message: string,
  ) {
    super(message);
  }
}

/**
 * Settle with `run`, or reject with AbandonedCallError once the timeout
 * elapses or the caller's signal fires. The abandoned call's signal is
 * aborted and its eventual result is ignored.
 */
export function withinDeadline<T>(run: (signal: AbortSignal) => Promise<T>, opts: FanOutOptions): Promise<T> {
  const controller = new AbortController();
  const parent = opts.signal;

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const finish = (settle: () => void) => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      parent?.removeEventListener("abort", onAbort);
      settle();
    };

    function onAbort() {
      controller.abort();
      finish(() => reject(new AbandonedCallError("aborted", "caller deadline expired")));
    }

    if (parent?.aborted) {
      onAbort();
      return;
    }
    parent?.addEventListener("abort", onAbort, { once: true });

    timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new AbandonedCallError("timeout", `no response within ${opts.timeoutMs}ms`)));
    }, opts.timeoutMs);

    let pending: Promise<T>;
    try {
      pending = run(controller.signal);
    } catch (err) {
      finish(() => reject(err));
      return;
    }
    pending.then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => finish(() => reject(err)),
    );
  });
}

/** Run one task under a timeout and the caller's signal. Never rejects. */
export function runWithTimeout<T>(task: FanOutTask<T>, opts: FanOutOptions): Promise<SourceOutcome<T>> {
  return withinDeadline(task.run, opts).then(
    (value): SourceOutcome<T> => ({ source: task.source, status: "ok", value }),
    (err: unknown): SourceOutcome<T> =>
      err instanceof AbandonedCallError
        ? { source: task.source, status: err.status, error: err.message }
        : { source: task.source, status: "failed", error: describeError(err) },
  );
}

/** Run all tasks concurrently and return their outcomes in task order. */
export function fanOut<T>(tasks: FanOutTask<T>[], opts: FanOutOptions): Promise<SourceOutcome<T>[]> {
  return Promise.all(tasks.map((task) => runWithTimeout(task, opts)));
}

/**
 * Build an AbortSignal from an optional caller signal and an optional
 * relative deadline. `dispose` clears the deadline timer.
 */
export function deadlineSignal(
  signal: AbortSignal | undefined,
  deadlineMs: number | undefined,
): { signal: AbortSignal | undefined; dispose: () => void } {
  if (deadlineMs === undefined) return { signal, dispose: () => {} };
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), deadlineMs);
  const onAbort = () => controller.abort();
  if (signal?.aborted) controller.abort();
  else signal?.addEventListener("abort", onAbort, { once: true });
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    },
  };
}

/** One signal that fires when any of the given signals fires. `dispose` detaches the listeners. */
export function linkSignals(...signals: Array<AbortSignal | undefined>): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const sources = signals.filter((s): s is AbortSignal => s !== undefined);
  const onAbort = () => controller.abort();
  for (const source of sources) {
    if (source.aborted) {
      controller.abort();
      break;
    }
    source.addEventListener("abort", onAbort, { once: true });
  }
  return {
    signal: controller.signal,
    dispose: () => {
      for (const source of sources) source.removeEventListener("abort", onAbort);
    },
  };
}
