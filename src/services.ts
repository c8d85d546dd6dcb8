import { GpuModelAggregator } from "./aggregation/gpu-model-view.js";
import type { ClusterApi } from "./cluster/cluster-api.js";
import { FleetNamePattern } from "./cluster/fleet-naming.js";
import { KubeClusterApi } from "./cluster/kube-cluster-api.js";
import { ReadCacheGroup } from "./cluster/read-cache.js";
import { ResourceNameTranslator } from "./cluster/resource-names.js";
import { type Config, config } from "./config/index.js";
import { GpuCorrelator } from "./inventory/gpu-correlator.js";
import { InventoryReader } from "./inventory/inventory-reader.js";
import { JobMutationController } from "./jobs/job-mutation-controller.js";
import { WorkloadQueryEngine } from "./workloads/workload-query.js";

/** The components behind the HTTP routes. */
export interface FleetServices {
  inventory: InventoryReader;
  workloads: WorkloadQueryEngine;
  jobs: JobMutationController;
  aggregator: GpuModelAggregator;
}

/** Wire every component from one config over one cluster connection. */
export function createServices(cfg: Config, api: ClusterApi): FleetServices {
  const translator = new ResourceNameTranslator(cfg.cluster.gpuResourcePrefix);
  const ownerAnnotations = cfg.cluster.ownerAnnotations;
  const retry = { attempts: cfg.reads.retryAttempts, baseDelayMs: cfg.reads.retryBaseMs };
  // Readers share one group so any successful write clears them all.
  const caches = new ReadCacheGroup(cfg.reads.cacheTtlMs);

  const inventory = new InventoryReader(
    api,
    new FleetNamePattern(cfg.cluster.fleetNodePrefix),
    translator,
    new GpuCorrelator(translator, ownerAnnotations),
    { timeoutMs: cfg.reads.timeoutMs, retry },
    caches,
  );
  const workloads = new WorkloadQueryEngine(
    api,
    translator,
    { namespaces: cfg.cluster.workloadNamespaces, ownerAnnotations, timeoutMs: cfg.reads.timeoutMs, retry },
    caches,
  );
  const jobs = new JobMutationController(
    api,
    translator,
    { queueName: cfg.jobs.queueName, schedulerName: cfg.jobs.schedulerName, ownerAnnotations },
    caches,
  );
  const aggregator = new GpuModelAggregator(inventory, workloads, { timeoutMs: cfg.reads.aggregateTimeoutMs });

  return { inventory, workloads, jobs, aggregator };
}

/**
 * Lazy process-wide services. Nothing touches the kubeconfig until the
 * first call.
 */
let _services: FleetServices | null = null;

export function getServices(): FleetServices {
  if (!_services) {
    _services = createServices(config, KubeClusterApi.fromKubeconfig(config.cluster.kubeconfig));
  }
  return _services;
}
