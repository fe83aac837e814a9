import { LRUCache } from 'lru-cache';

/**
 * Keyed TTL cache used by the data services. A `ttlMs` of 0 disables caching.
 * `force` on {@link TtlCache.wrap} skips the lookup and replaces the entry.
 */
export class TtlCache<V extends {}> {
  private readonly store: LRUCache<string, V>;
  private readonly inflight = new Map<string, Promise<V>>();

  constructor(private readonly ttlMs: number, max = 1000) {
    this.store = new LRUCache<string, V>({ max, ttl: Math.max(1, ttlMs) });
  }

  get(key: string): V | undefined {
    return this.ttlMs > 0 ? this.store.get(key) : undefined;
  }

  set(key: string, value: V) {
    if (this.ttlMs > 0) this.store.set(key, value);
  }

  delete(key: string) { this.store.delete(key); }

  clear() { this.store.clear(); }

  async wrap(key: string, force: boolean, load: () => Promise<V>): Promise<V> {
    if (!force) {
      const hit = this.get(key);
      if (hit !== undefined) return hit;
      // collapse concurrent misses onto one load
      const pending = this.inflight.get(key);
      if (pending) return pending;
    }
    const p = load().then(v => { this.set(key, v); return v; });
    this.inflight.set(key, p);
    try {
      return await p;
    } finally {
      if (this.inflight.get(key) === p) this.inflight.delete(key);
    }
  }
}
