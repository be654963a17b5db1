/**
 * In-process caches on node-cache.
 *
 * Two stores, each with its own counters:
 * - geocodeCache: reverse-geocode answers, keyed by rounded coordinate (Nominatim asks clients to cache)
 * - sessionCache: game sessions with their current target
 *
 * Values are stored by reference; callers only put frozen objects in.
 */

import NodeCache from 'node-cache';
import logger from './logger';

const DEFAULT_TTL_SECONDS = 300;

export interface CacheStats {
  hits: number;
  misses: number;
  sets: number;
  deletes: number;
  hitRate: number;
  size: number;
}

// Log meta uses `entry`: the logger redacts anything named like a key
const logMeta = (key: string): { entry: string } => ({ entry: key.slice(0, 50) });

export class CacheStore {
  private readonly store: NodeCache;
  private readonly counters = { hits: 0, misses: 0, sets: 0, deletes: 0 };

  constructor(readonly name: string, private readonly defaultTtlSeconds: number = DEFAULT_TTL_SECONDS) {
    this.store = new NodeCache({
      stdTTL: defaultTtlSeconds,
      checkperiod: 60,
      useClones: false
    });
  }

  get<T>(key: string): T | null {
    const value = this.store.get<T>(key);
    if (value === undefined) {
      this.counters.misses++;
      logger.debug(`❌ Cache miss (${this.name})`, logMeta(key));
      return null;
    }
    this.counters.hits++;
    logger.debug(`✅ Cache hit (${this.name})`, logMeta(key));
    return value;
  }

  set<T>(key: string, value: T, ttlSeconds: number = this.defaultTtlSeconds): boolean {
    const stored = this.store.set(key, value, ttlSeconds);
    if (stored) {
      this.counters.sets++;
      logger.debug(`💾 Cache set (${this.name})`, { ...logMeta(key), ttl: ttlSeconds });
    }
    return stored;
  }

  del(key: string): number {
    const removed = this.store.del(key);
    this.counters.deletes += removed;
    return removed;
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  /**
   * Restart the expiry clock of a live entry.
   * @returns false when the entry is missing or already expired
   */
  touch(key: string, ttlSeconds: number = this.defaultTtlSeconds): boolean {
    return this.store.ttl(key, ttlSeconds);
  }

  clear(): void {
    this.store.flushAll();
    logger.info(`🧹 Cache cleared (${this.name})`);
  }

  getStats(): CacheStats {
    const { hits, misses } = this.counters;
    const lookups = hits + misses;
    return {
      ...this.counters,
      hitRate: lookups === 0 ? 0 : hits / lookups,
      size: this.store.keys().length
    };
  }

  /**
   * Memoize an async function. Only fulfilled results are stored, so a
   * failed lookup is retried on the next call.
   */
  wrap<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>,
    keyOf: (...args: A) => string,
    ttlSeconds: number = this.defaultTtlSeconds
  ): (...args: A) => Promise<R> {
    return async (...args: A): Promise<R> => {
      const key = keyOf(...args);
      const cached = this.get<R>(key);
      if (cached !== null) {
        return cached;
      }

      try {
        const result = await fn(...args);
        this.set(key, result, ttlSeconds);
        return result;
      } catch (error: unknown) {
        logger.warn('⚠️ Lookup failed, nothing cached', {
          ...logMeta(key),
          error: error instanceof Error ? error.message : String(error)
        });
        throw error;
      }
    };
  }

  /**
   * Stop the expiry timer so the process can exit
   */
  close(): void {
    this.store.close();
  }
}

export const geocodeCache = new CacheStore('geocode');

export const sessionCache = new CacheStore('session');

const joinKey = (...parts: (string | number)[]): string => parts.join(':');

export const CacheKeys = {
  reverseGeocode: (latitude: number, longitude: number, precision: number): string =>
    joinKey('geocode', 'reverse', latitude.toFixed(precision), longitude.toFixed(precision)),

  gameSession: (gameId: string): string => joinKey('game', gameId)
};

export function closeAll(): void {
  geocodeCache.close();
  sessionCache.close();
}
