/**
 * Bounded least-recently-used cache.
 *
 * Backed by a `Map`, whose iteration order is insertion order: every read
 * or write re-inserts the key at the end, so the first key is always the
 * least recently used one. Instances are meant to be owned by one engine;
 * JavaScript runs the engine on a single thread, so there is no locking.
 *
 * @module engine/cache
 */

export const DEFAULT_PARSE_CACHE_SIZE = 100;
export const DEFAULT_COMPILE_CACHE_SIZE = 1000;

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
}

export class LruCache<K, V> {
  private readonly entries = new Map<K, { value: V }>();
  private hits = 0;
  private misses = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Return the cached value for `key`, or compute, store and return it.
   * If `compute` throws, nothing is stored.
   */
  getOrSet(key: K, compute: () => V): V {
    const entry = this.touch(key);
    if (entry) {
      this.hits++;
      return entry.value;
    }
    this.misses++;
    const value = compute();
    this.set(key, value);
    return value;
  }

  get(key: K): V | undefined {
    return this.touch(key)?.value;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, { value });
    if (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    return [...this.entries.keys()];
  }

  get stats(): CacheStats {
    return { size: this.entries.size, capacity: this.capacity, hits: this.hits, misses: this.misses };
  }

  private touch(key: K): { value: V } | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }
}
