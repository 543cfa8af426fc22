/**
 * Bounded in-memory cache with least-recently-used eviction.
 * Relies on Map insertion order: a hit is moved to the back, eviction pops the front.
 *
 * @module lru-cache
 */

export interface CacheStats {
  size: number;
  max: number;
}

export class LruCache<K, V> {
  private readonly entries: Map<K, { value: V }> = new Map();

  constructor(readonly max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`LruCache max must be a positive integer, received ${max}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  /**
   * Returns the cached value and marks it as most recently used.
   */
  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: K, value: V): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    }

    this.entries.set(key, { value });

    while (this.entries.size > this.max) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): CacheStats {
    return { size: this.entries.size, max: this.max };
  }
}
