// TTL-based cache for SSB query responses
// Entries expire lazily on read; the oldest entry is evicted once maxEntries is reached

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export class TTLCache<K, V> {
  private cache = new Map<K, CacheEntry<V>>();

  constructor(
    private defaultTTL: number = 15 * 60 * 1000,
    private maxEntries: number = 500,
    private now: () => number = Date.now
  ) {}

  set(key: K, value: V, ttl?: number): void {
    // Re-inserting moves the key to the back of the eviction order
    this.cache.delete(key);
    if (this.cache.size >= this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(key, { value, expiresAt: this.now() + (ttl ?? this.defaultTTL) });
  }

  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.cache.delete(key);
      return undefined;
    }

    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
