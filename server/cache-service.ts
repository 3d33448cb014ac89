/**
 * Cache Service
 *
 * In-memory TTL cache for collaborator lookups (geocoding results).
 * Falls back to stale data when a refresh fails.
 */

export interface CacheEntry<T> {
  data: T;
  expiresAt: number;
}

export interface CacheOptions {
  defaultTtlMs?: number;
  cleanupIntervalMs?: number;
  now?: () => number;
}

const DEFAULT_TTL_MS = 7 * 24 * 60 * 60 * 1000; // postal codes and addresses rarely move

export class CacheService<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private readonly defaultTtlMs: number;
  private readonly cleanupIntervalMs: number;
  private readonly now: () => number;
  private cleanupTimer?: NodeJS.Timeout;

  constructor(private readonly name: string, options: CacheOptions = {}) {
    this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_TTL_MS;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? 60000;
    this.now = options.now ?? Date.now;
  }

  get(key: string): T | undefined {
    const entry = this.cache.get(key);

    if (!entry) return undefined;
    if (entry.expiresAt < this.now()) {
      this.cache.delete(key);
      return undefined;
    }

    return entry.data;
  }

  set(key: string, data: T, ttlMs: number = this.defaultTtlMs): void {
    this.cache.set(key, { data, expiresAt: this.now() + ttlMs });
  }

  /**
   * Get from cache OR fetch fresh, automatically caching result
   */
  async getOrFetch(key: string, fetcher: () => Promise<T>): Promise<{ data: T; source: 'cached' | 'fresh' }> {
    // get() evicts expired entries, so keep a handle on a stale one first
    const stale = this.cache.get(key);
    const cached = this.get(key);
    if (cached !== undefined) {
      return { data: cached, source: 'cached' };
    }

    try {
      const fresh = await fetcher();
      this.set(key, fresh);
      return { data: fresh, source: 'fresh' };
    } catch (error) {
      if (stale) {
        console.warn(`[${this.name}] Fetch failed for ${key}, using stale data`);
        return { data: stale.data, source: 'cached' };
      }
      throw error;
    }
  }

  get size(): number {
    return this.cache.size;
  }

  cleanup(): number {
    let cleaned = 0;
    const now = this.now();

    this.cache.forEach((entry, key) => {
      if (entry.expiresAt < now) {
        this.cache.delete(key);
        cleaned++;
      }
    });

    if (cleaned > 0) {
      console.log(`[${this.name}] Cleaned up ${cleaned} expired entries`);
    }
    return cleaned;
  }

  start(): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => this.cleanup(), this.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }
}

/**
 * Cache key builders for type safety
 */
export const cacheKeys = {
  forwardGeocode: (postalCode: string) => `geo:forward:${postalCode.toUpperCase()}`,
  // ~11m precision, enough to share lookups between nearby sightings
  reverseGeocode: (latitude: number, longitude: number) =>
    `geo:reverse:${latitude.toFixed(4)}:${longitude.toFixed(4)}`,
};
