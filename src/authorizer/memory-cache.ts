/**
 * Bounded map evicting the least recently used key. A capacity below one
 * stores nothing.
 */
export class LRUCache<V> {
  private cache: Map<string, V>;
  private maxSize: number;

  constructor(maxSize: number) {
    this.cache = new Map();
    this.maxSize = maxSize;
  }

  get(key: string): V | undefined {
    const entry = this.cache.get(key);
    if (entry !== undefined) {
      // Move to end (most recently used)
      this.cache.delete(key);
      this.cache.set(key, entry);
    }
    return entry;
  }

  set(key: string, entry: V): void {
    if (this.maxSize < 1) {
      return;
    }

    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }

    this.cache.set(key, entry);
  }

  size(): number {
    return this.cache.size;
  }

  /** Snapshot of the current entries, oldest first. Does not affect recency. */
  entries(): Array<[string, V]> {
    return [...this.cache.entries()];
  }
}
