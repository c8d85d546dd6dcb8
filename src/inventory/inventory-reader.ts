import type { V1Pod } from "@kubernetes/client-node";
import type { ClusterApi } from "../cluster/cluster-api.js";
import { NotFoundError } from "../cluster/errors.js";
import {
  deadlineSignal,
  type IncompleteSource,
  isOk,
  type PartialResult,
  partialResult,
  type ReadOptions,
  runWithTimeout,
} from "../cluster/fan-out.js";
import type { FleetNamePattern } from "../cluster/fleet-naming.js";
import { ReadCacheGroup, type ReadCache } from "../cluster/read-cache.js";
import type { ResourceNameTranslator } from "../cluster/resource-names.js";
import { boundedRead, DEFAULT_RETRY_POLICY, type RetryPolicy, withRetry } from "../cluster/retry.js";
import { logger } from "../config/logger.js";
import { buildFleetNode } from "./fleet-node.js";
import type { GpuCorrelator, NodeCorrelation } from "./gpu-correlator.js";
import type { FleetNode, NodeGpuDetail, NodeGpuUsage, PodGpuClaim } from "./types.js";

export interface InventoryReaderOptions {
  /** Per-node Pod listing timeout. */
  timeoutMs: number;
  retry?: RetryPolicy;
}

interface NodeSnapshot {
  node: FleetNode;
  correlation: NodeCorrelation | null;
}

function byName(a: FleetNode, b: FleetNode): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function degradedUsage(node: FleetNode): NodeGpuUsage {
  return {
    node: node.name,
    model: node.model,
    allocatable: node.allocatable,
    inUse: null,
    free: null,
    claims: [],
    degraded: true,
  };
}

/**
 * Read side of the GPU fleet: Nodes matching the fleet naming convention,
 * their GPU capacity, and which Pods hold which devices.
 */
export class InventoryReader {
  private readonly retry: RetryPolicy;
  private readonly cache: ReadCache<PartialResult<NodeSnapshot[]>>;

  constructor(
    private readonly api: ClusterApi,
    private readonly pattern: FleetNamePattern,
    private readonly translator: ResourceNameTranslator,
    private readonly correlator: GpuCorrelator,
    private readonly options: InventoryReaderOptions,
    caches: ReadCacheGroup = new ReadCacheGroup(0),
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.cache = caches.create<PartialResult<NodeSnapshot[]>>();
  }

  /**
   * Every fleet node with GPU capacity and usage. Nodes whose Pods could
   * not be read within the timeout come back degraded with null usage and
   * are named in `incomplete`.
   */
  async listFleetNodes(opts: ReadOptions = {}): Promise<PartialResult<FleetNode[]>> {
    const snapshot = await this.snapshot(opts);
    return partialResult(
      snapshot.items.map((s) => s.node),
      snapshot.incomplete,
    );
  }

  async gpuUsageByNode(opts: ReadOptions = {}): Promise<PartialResult<NodeGpuUsage[]>> {
    const snapshot = await this.snapshot(opts);
    return partialResult(
      snapshot.items.map((s) => s.correlation?.usage ?? degradedUsage(s.node)),
      snapshot.incomplete,
    );
  }

  /** Device-level breakdown of one fleet node. */
  async listGPUsForNode(nodeName: string): Promise<NodeGpuDetail> {
    const entity = { kind: "Node", name: nodeName };
    const parsed = this.pattern.parse(nodeName);
    if (!parsed) throw new NotFoundError(entity, `name does not match ${this.pattern.describe()}`);

    const raw = await withRetry(() => this.api.readNode(nodeName), { operation: "readNode", entity, ...this.retry });
    if (!raw) throw new NotFoundError(entity);

    const node = buildFleetNode(raw, nodeName, parsed, this.translator);
    const pods = await withRetry(() => this.api.listPodsOnNode(nodeName), {
      operation: "listPodsOnNode",
      entity,
      ...this.retry,
    });
    const correlation = this.correlator.correlateNode(node, pods);
    return {
      node: { ...node, used: correlation.usage.inUse, free: correlation.usage.free },
      devices: correlation.devices,
      claims: correlation.claims,
    };
  }

  /** Pods holding one device of a fleet node. */
  async listPodsForDevice(nodeName: string, deviceId: string): Promise<PodGpuClaim[]> {
    const detail = await this.listGPUsForNode(nodeName);
    if (!detail.devices.some((d) => d.id === deviceId)) {
      throw new NotFoundError({ kind: "GpuDevice", name: deviceId }, `no such device on node ${nodeName}`);
    }
    return detail.claims.filter((c) => c.deviceIds.includes(deviceId));
  }

  private snapshot(opts: ReadOptions): Promise<PartialResult<NodeSnapshot[]>> {
    return this.cache.getOrLoad("fleet", () => this.loadSnapshot(opts), (result) => !result.partial);
  }

  private async loadSnapshot(opts: ReadOptions): Promise<PartialResult<NodeSnapshot[]>> {
    const { signal, dispose } = deadlineSignal(opts.signal, opts.deadlineMs);
    try {
      const raw = await boundedRead(() => this.api.listNodes(), {
        operation: "listNodes",
        timeoutMs: this.options.timeoutMs,
        signal,
        ...this.retry,
      });

      const fleet: FleetNode[] = [];
      for (const node of raw) {
        const name = node.metadata?.name;
        const parsed = name ? this.pattern.parse(name) : null;
        if (!name || !parsed) continue;
        fleet.push(buildFleetNode(node, name, parsed, this.translator));
      }
      fleet.sort(byName);

      const settled = await Promise.all(
        fleet.map(async (node) => ({
          node,
          outcome: await runWithTimeout<V1Pod[]>(
            {
              source: `pods/${node.name}`,
              run: (taskSignal) =>
                withRetry(() => this.api.listPodsOnNode(node.name), {
                  operation: "listPodsOnNode",
                  entity: { kind: "Node", name: node.name },
                  signal: taskSignal,
                  ...this.retry,
                }),
            },
            { timeoutMs: this.options.timeoutMs, signal },
          ),
        })),
      );

      const incomplete: IncompleteSource[] = [];
      const items = settled.map(({ node, outcome }): NodeSnapshot => {
        if (isOk(outcome)) {
          const correlation = this.correlator.correlateNode(node, outcome.value);
          return { node: { ...node, used: correlation.usage.inUse, free: correlation.usage.free }, correlation };
        }
        incomplete.push(outcome);
        logger.warn("Fleet node read degraded", { node: node.name, status: outcome.status, reason: outcome.error });
        return {
          node: { ...node, degraded: true, degradedReason: `${outcome.status}: ${outcome.error}` },
          correlation: null,
        };
      });

      return partialResult(items, incomplete);
    } finally {
      dispose();
    }
  }
}
