/**
 * Cache Utility Tests
 */

import { CacheKeys, CacheStore, geocodeCache, sessionCache } from './cache';

describe('cache', () => {
  let cache: CacheStore;

  beforeEach(() => {
    cache = new CacheStore('test');
  });

  afterEach(() => {
    cache.close();
  });

  describe('get/set', () => {
    it('should return null on a miss and the stored reference on a hit', () => {
      const value = Object.freeze({ name: 'Quito, Ecuador' });

      expect(cache.get('test:miss')).toBeNull();
      cache.set('test:hit', value, 60);

      expect(cache.get('test:hit')).toBe(value);
      expect(cache.has('test:hit')).toBe(true);
    });

    it('should count hits, misses, sets and deletes', () => {
      const before = cache.getStats();

      cache.set('test:counted', 1);
      cache.get('test:counted');
      cache.get('test:absent');
      cache.del('test:counted');

      const after = cache.getStats();
      expect(after.sets - before.sets).toBe(1);
      expect(after.hits - before.hits).toBe(1);
      expect(after.misses - before.misses).toBe(1);
      expect(after.deletes - before.deletes).toBe(1);
      expect(after.size).toBe(0);
    });
  });

  describe('wrap', () => {
    it('should call through once per key', async () => {
      const lookup = jest.fn(async (id: number) => ({ id }));
      const cached = cache.wrap(lookup, (id: number) => `test:wrap:${id}`, 60);

      const first = await cached(1);
      const second = await cached(1);
      await cached(2);

      expect(second).toBe(first);
      expect(lookup).toHaveBeenCalledTimes(2);
    });

    it('should not store rejections', async () => {
      const lookup = jest.fn()
        .mockRejectedValueOnce(new Error('upstream down'))
        .mockResolvedValueOnce('recovered');
      const cached = cache.wrap(lookup, () => 'test:wrap:retry');

      await expect(cached()).rejects.toThrow('upstream down');
      await expect(cached()).resolves.toBe('recovered');
      expect(lookup).toHaveBeenCalledTimes(2);
    });
  });

  describe('touch', () => {
    afterEach(() => {
      jest.useRealTimers();
    });

    it('should restart the expiry clock of a live entry', () => {
      jest.useFakeTimers({ now: new Date('2026-01-01T00:00:00Z') });
      cache.set('test:touched', 'value', 10);

      jest.setSystemTime(Date.now() + 8000);
      expect(cache.touch('test:touched', 10)).toBe(true);

      jest.setSystemTime(Date.now() + 8000);
      expect(cache.get('test:touched')).toBe('value');
    });

    it('should return false for a missing entry', () => {
      expect(cache.touch('test:absent')).toBe(false);
    });
  });

  describe('separate stores', () => {
    it('should keep geocode and session statistics apart', () => {
      const geocodeBefore = geocodeCache.getStats();

      sessionCache.set(CacheKeys.gameSession('abc'), { current: null });
      sessionCache.get(CacheKeys.gameSession('abc'));
      sessionCache.get(CacheKeys.gameSession('missing'));

      expect(geocodeCache.getStats()).toEqual(geocodeBefore);
      expect(sessionCache.has(CacheKeys.gameSession('abc'))).toBe(true);
      expect(geocodeCache.has(CacheKeys.gameSession('abc'))).toBe(false);
    });
  });

  describe('CacheKeys', () => {
    it('should round coordinates to the requested precision', () => {
      expect(CacheKeys.reverseGeocode(48.858844, 2.294351, 4)).toBe('geocode:reverse:48.8588:2.2944');
    });

    it('should namespace game sessions', () => {
      expect(CacheKeys.gameSession('abc')).toBe('game:abc');
    });
  });
});
