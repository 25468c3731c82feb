/**
 * TtlCache - a Map wrapper with max size (LRU eviction) and optional TTL.
 *
 * A stored `null` or empty array is a real entry: `has()` reports it and
 * `get()` returns it, so callers can tell "looked up, nothing found" apart
 * from "never looked up".
 */
export class TtlCache<V> {
  private map = new Map<string, { value: V; createdAt: number; accessedAt: number }>();
  private readonly maxSize: number;
  private readonly ttlMs: number | null;
  private readonly now: () => number;

  constructor(opts: { maxSize: number; ttlMs?: number; now?: () => number }) {
    this.maxSize = opts.maxSize;
    this.ttlMs = opts.ttlMs ?? null;
    this.now = opts.now ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.liveEntry(key);
    if (!entry) return undefined;
    entry.accessedAt = this.now();
    return entry.value;
  }

  has(key: string): boolean {
    return this.liveEntry(key) !== undefined;
  }

  set(key: string, value: V): this {
    const now = this.now();
    const existing = this.map.get(key);
    if (existing) {
      existing.value = value;
      existing.createdAt = now;
      existing.accessedAt = now;
      return this;
    }

    if (this.map.size >= this.maxSize) {
      this.evictLRU();
    }

    this.map.set(key, { value, createdAt: now, accessedAt: now });
    return this;
  }

  delete(key: string): boolean {
    return this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }

  private liveEntry(key: string) {
    const entry = this.map.get(key);
    if (!entry) return undefined;

    if (this.ttlMs !== null && this.now() - entry.createdAt > this.ttlMs) {
      this.map.delete(key);
      return undefined;
    }
    return entry;
  }

  private evictLRU(): void {
    let oldestKey: string | null = null;
    let oldestAccess = Infinity;

    for (const [key, entry] of Array.from(this.map.entries())) {
      if (entry.accessedAt < oldestAccess) {
        oldestAccess = entry.accessedAt;
        oldestKey = key;
      }
    }

    if (oldestKey !== null) {
      this.map.delete(oldestKey);
    }
  }
}

/**
 * Composite cache key: "Kandy", "Sri Lanka" -> "kandy|sri lanka"
 */
export function cacheKey(...parts: string[]): string {
  return parts.map((part) => part.trim().toLowerCase()).join("|");
}
