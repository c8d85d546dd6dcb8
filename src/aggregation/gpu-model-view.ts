import {
  deadlineSignal,
  type IncompleteSource,
  isOk,
  linkSignals,
  type PartialResult,
  partialResult,
  type ReadOptions,
  runWithTimeout,
  type SourceOutcome,
} from "../cluster/fan-out.js";
import type { InventoryReader } from "../inventory/inventory-reader.js";
import type { FleetNode } from "../inventory/types.js";
import type { AdmissionMismatch, PendingWorkload } from "../workloads/types.js";
import type { WorkloadQueryEngine } from "../workloads/workload-query.js";

export interface GpuModelTotals {
  capacity: number;
  allocatable: number;
  used: number;
  free: number;
}

export interface GpuModelView {
  model: string;
  nodes: FleetNode[];
  /** Sums over nodes whose usage could be read. */
  totals: GpuModelTotals;
  degradedNodes: number;
  pendingWorkloads: PendingWorkload[];
  pendingGpuDemand: number;
}

export interface GpuModelOverview {
  models: GpuModelView[];
  /** Pending workloads that accept any GPU model. */
  unconstrained: PendingWorkload[];
  mismatches: AdmissionMismatch[];
}

export interface GpuModelViewOptions {
  /** Bound on each of the fleet, pending and admitted reads. */
  timeoutMs: number;
}

function emptyView(model: string): GpuModelView {
  return {
    model,
    nodes: [],
    totals: { capacity: 0, allocatable: 0, used: 0, free: 0 },
    degradedNodes: 0,
    pendingWorkloads: [],
    pendingGpuDemand: 0,
  };
}

function dedupe(sources: IncompleteSource[]): IncompleteSource[] {
  const seen = new Set<string>();
  return sources.filter((s) => {
    const key = `${s.source}|${s.status}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Per-GPU-model join of fleet capacity and waiting work.
 *
 * The three reads run concurrently within one call and are joined on the
 * upper-cased model name. Nothing is held between calls, so two views may
 * disagree.
 */
export class GpuModelAggregator {
  constructor(
    private readonly inventory: InventoryReader,
    private readonly workloads: WorkloadQueryEngine,
    private readonly options: GpuModelViewOptions,
  ) {}

  async gpuModelViews(opts: ReadOptions = {}): Promise<PartialResult<GpuModelOverview>> {
    const { signal, dispose } = deadlineSignal(opts.signal, opts.deadlineMs);
    try {
      const [fleet, pending, all] = await Promise.all([
        this.bounded("fleet", signal, (o) => this.inventory.listFleetNodes(o)),
        this.bounded("pending-workloads", signal, (o) => this.workloads.listPendingWorkloads(o)),
        this.bounded("workloads", signal, (o) => this.workloads.listWorkloads(o)),
      ]);

      const incomplete: IncompleteSource[] = [];
      const nodes: FleetNode[] = [];
      if (isOk(fleet)) {
        nodes.push(...fleet.value.items);
        incomplete.push(...fleet.value.incomplete);
      } else incomplete.push(fleet);

      let waiting: PendingWorkload[] = [];
      let mismatches: AdmissionMismatch[] = [];
      if (isOk(pending) && isOk(all)) {
        ({ pending: waiting, mismatches } = this.workloads.listAdmittedMismatch(pending.value, all.value));
        incomplete.push(...pending.value.incomplete, ...all.value.incomplete);
      } else if (isOk(pending)) {
        waiting = pending.value.items;
        incomplete.push(...pending.value.incomplete);
      } else if (isOk(all)) {
        waiting = all.value.items.filter((w) => w.admission === "pending");
        incomplete.push(...all.value.incomplete);
      }
      if (!isOk(pending)) incomplete.push(pending);
      if (!isOk(all)) incomplete.push(all);

      return partialResult(this.join(nodes, waiting, mismatches), dedupe(incomplete));
    } finally {
      dispose();
    }
  }

  /** One model's view; a model with no nodes and no waiting work yields an empty view. */
  async viewForModel(model: string, opts: ReadOptions = {}): Promise<PartialResult<GpuModelView>> {
    const key = model.trim().toUpperCase();
    const overview = await this.gpuModelViews(opts);
    const view = overview.items.models.find((v) => v.model === key) ?? emptyView(key);
    return partialResult(view, overview.incomplete);
  }

  /**
   * One source of the view. The aggregate timeout abandons it as a whole;
   * the caller's deadline is handed down so the reader can return what it
   * already fetched and name only the sub-reads that were cut short.
   */
  private bounded<T>(
    source: string,
    callerSignal: AbortSignal | undefined,
    read: (opts: ReadOptions) => Promise<T>,
  ): Promise<SourceOutcome<T>> {
    return runWithTimeout(
      {
        source,
        run: async (taskSignal) => {
          const linked = linkSignals(taskSignal, callerSignal);
          try {
            return await read({ signal: linked.signal });
          } finally {
            linked.dispose();
          }
        },
      },
      { timeoutMs: this.options.timeoutMs },
    );
  }

  private join(nodes: FleetNode[], waiting: PendingWorkload[], mismatches: AdmissionMismatch[]): GpuModelOverview {
    const views = new Map<string, GpuModelView>();
    const viewOf = (model: string): GpuModelView => {
      let view = views.get(model);
      if (!view) {
        view = emptyView(model);
        views.set(model, view);
      }
      return view;
    };

    for (const node of nodes) {
      const view = viewOf(node.model);
      view.nodes.push(node);
      if (node.degraded || node.used === null || node.free === null) {
        view.degradedNodes++;
        continue;
      }
      view.totals.capacity += node.capacity;
      view.totals.allocatable += node.allocatable;
      view.totals.used += node.used;
      view.totals.free += node.free;
    }

    const unconstrained: PendingWorkload[] = [];
    for (const workload of waiting) {
      if (workload.gpuModels.length === 0) {
        unconstrained.push(workload);
        continue;
      }
      for (const model of workload.gpuModels) {
        const view = viewOf(model);
        view.pendingWorkloads.push(workload);
        view.pendingGpuDemand += workload.gpuCount;
      }
    }

    const models = [...views.values()].sort((a, b) => (a.model < b.model ? -1 : a.model > b.model ? 1 : 0));
    return { models, unconstrained, mismatches };
  }
}
