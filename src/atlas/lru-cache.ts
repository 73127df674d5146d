/**
 * Fixed-capacity least-recently-used map. Insertion order of the backing Map
 * is the recency order, oldest first.
 */
export class LruCache<K, V> {
  readonly capacity: number;
  private map = new Map<K, V>();

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  get size(): number {
    return this.map.size;
  }

  /** Read and mark as most recently used. */
  get(key: K): V | undefined {
    const value = this.map.get(key);
    if (value === undefined) return undefined;
    this.map.delete(key);
    this.map.set(key, value);
    return value;
  }

  /** Read without touching recency. */
  peek(key: K): V | undefined {
    return this.map.get(key);
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  /**
   * Insert or replace. Returns the entry pushed out to stay within
   * capacity, if any.
   */
  set(key: K, value: V): [K, V] | null {
    if (this.map.has(key)) this.map.delete(key);
    this.map.set(key, value);
    if (this.map.size <= this.capacity) return null;
    const oldest = this.map.entries().next();
    if (oldest.done) return null;
    const [oldKey, oldValue] = oldest.value;
    this.map.delete(oldKey);
    return [oldKey, oldValue];
  }

  /** Entries from least to most recently used. */
  entries(): Array<[K, V]> {
    return Array.from(this.map.entries());
  }

  clear(): void {
    this.map.clear();
  }
}
