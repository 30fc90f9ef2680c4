/** Default TTL: effectively "until invalidated". */
export const DEFAULT_TTL_MS = 365 * 24 * 60 * 60 * 1000;

interface CacheEntry {
  value: unknown;
  expiresAt: number;
}

export interface TtlCacheOptions {
  defaultTtlMs?: number;
  now?: () => number;
}

/**
 * In-memory key/value cache with per-entry expiry and prefix invalidation.
 *
 * Entries are replaced whole on every `set`, so a reader sees either the old
 * value, the new value, or a miss. Expired entries are dropped on read.
 *
 * Loads that may race an eviction take a `mark()` before fetching and write
 * through `setIfCurrent`, which refuses the write once the key has been
 * invalidated or the cache cleared since that mark.
 */
export class TtlCache {
  private readonly entries = new Map<string, CacheEntry>();
  private generation = 0;
  private clearedAt = 0;
  private readonly keyEvictions = new Map<string, number>();
  private readonly prefixEvictions = new Map<string, number>();
  private readonly defaultTtlMs: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions = {}) {
    this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get<T>(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    // Callers own the key namespace, so the stored type matches the read type.
    return entry.value as T;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  set<T>(key: string, value: T, ttlMs: number = this.defaultTtlMs): void {
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  /** Current write generation, to pass back to `setIfCurrent`. */
  mark(): number {
    return this.generation;
  }

  /** Store `value` unless `key` was evicted after `since`. Returns whether it was stored. */
  setIfCurrent<T>(key: string, value: T, since: number, ttlMs?: number): boolean {
    if (this.evictedSince(key, since)) return false;
    this.set(key, value, ttlMs);
    return true;
  }

  invalidate(key: string): void {
    this.entries.delete(key);
    this.keyEvictions.set(key, ++this.generation);
  }

  invalidatePrefix(prefix: string): void {
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) this.entries.delete(key);
    }
    this.prefixEvictions.set(prefix, ++this.generation);
  }

  clear(): void {
    this.entries.clear();
    this.keyEvictions.clear();
    this.prefixEvictions.clear();
    this.clearedAt = ++this.generation;
  }

  private evictedSince(key: string, since: number): boolean {
    if (this.clearedAt > since) return true;
    if ((this.keyEvictions.get(key) ?? 0) > since) return true;
    for (const [prefix, at] of this.prefixEvictions) {
      if (at > since && key.startsWith(prefix)) return true;
    }
    return false;
  }
}
