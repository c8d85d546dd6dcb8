import { LRUCache } from "lru-cache";

const MAX_ENTRIES = 256;

/**
 * Short-lived memo for aggregated reads. A TTL of 0 disables it: every
 * lookup goes to the loader.
 */
export class ReadCache<V extends {}> {
  private readonly cache: LRUCache<string, V> | null;

  constructor(ttlMs: number) {
    this.cache = ttlMs > 0 ? new LRUCache<string, V>({ max: MAX_ENTRIES, ttl: ttlMs }) : null;
  }

  /** Return the cached value for `key`, or load it. Values rejected by `cacheable` are returned but not stored. */
  async getOrLoad(key: string, load: () => Promise<V>, cacheable: (value: V) => boolean = () => true): Promise<V> {
    const hit = this.cache?.get(key);
    if (hit !== undefined) return hit;
    const value = await load();
    if (this.cache && cacheable(value)) this.cache.set(key, value);
    return value;
  }

  clear(): void {
    this.cache?.clear();
  }
}

/** Every cache the readers hold; mutations clear them all after a successful write. */
export class ReadCacheGroup {
  private readonly caches: Array<Pick<ReadCache<{}>, "clear">> = [];

  constructor(private readonly ttlMs: number) {}

  create<V extends {}>(): ReadCache<V> {
    const cache = new ReadCache<V>(this.ttlMs);
    this.caches.push(cache);
    return cache;
  }

  invalidate(): void {
    for (const cache of this.caches) cache.clear();
  }
}
