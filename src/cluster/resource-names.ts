import { GPU_RESOURCE_PREFIXES, type GpuResourcePrefix } from "../config/index.js";
import { parseQuantity } from "./quantity.js";

/** Resource-name mapping as found on Node capacity, container requests, and Workload specs. */
export type ResourceMap = Record<string, string>;

/** Quantities as the client library may type them: strings, or numbers for int-or-string fields. */
export type ResourceInput = Readonly<Record<string, string | number>>;

/**
 * Bidirectional mapping between the configured GPU resource prefix and the
 * other recognized form.
 *
 * Cluster objects may be authored with either `example.com/gpu` or
 * `nvidia.com/gpu`; everything this process emits uses the configured one.
 * Keys under neither prefix (cpu, memory, ...) pass through untouched.
 */
export class ResourceNameTranslator {
  readonly canonical: GpuResourcePrefix;
  readonly foreign: GpuResourcePrefix;

  constructor(prefix: GpuResourcePrefix) {
    this.canonical = prefix;
    this.foreign = prefix === GPU_RESOURCE_PREFIXES[0] ? GPU_RESOURCE_PREFIXES[1] : GPU_RESOURCE_PREFIXES[0];
  }

  /** Key under which whole-GPU counts are advertised and requested. */
  get gpuResourceKey(): string {
    return `${this.canonical}/gpu`;
  }

  translate(key: string, from: GpuResourcePrefix, to: GpuResourcePrefix): string {
    const head = `${from}/`;
    if (from === to || !key.startsWith(head)) return key;
    return `${to}/${key.slice(head.length)}`;
  }

  toCanonical(key: string): string {
    return this.translate(key, this.foreign, this.canonical);
  }

  toForeign(key: string): string {
    return this.translate(key, this.canonical, this.foreign);
  }

  isGpuResource(key: string): boolean {
    return key.startsWith(`${this.canonical}/`) || key.startsWith(`${this.foreign}/`);
  }

  /**
   * Translate every key of a resource map to the configured prefix.
   * When both forms of one key are present, integer quantities are summed;
   * otherwise the canonical entry wins.
   */
  canonicalizeResources(resources: ResourceInput | undefined): ResourceMap {
    const out: ResourceMap = {};
    if (!resources) return out;
    for (const [key, raw] of Object.entries(resources)) {
      const value = String(raw);
      const target = this.toCanonical(key);
      const existing = out[target];
      if (existing === undefined) {
        out[target] = value;
        continue;
      }
      const a = parseQuantity(existing);
      const b = parseQuantity(value);
      if (a !== null && b !== null && Number.isInteger(a) && Number.isInteger(b)) {
        out[target] = String(a + b);
      } else if (key === target) {
        out[target] = value;
      }
    }
    return out;
  }

  /** Whole-GPU count in a resource map under either prefix form. Non-integer or absent quantities count as 0. */
  gpuCount(resources: ResourceInput | undefined): number {
    const value = this.canonicalizeResources(resources)[this.gpuResourceKey];
    if (value === undefined) return 0;
    const n = parseQuantity(value);
    return n !== null && Number.isInteger(n) && n > 0 ? n : 0;
  }
}
