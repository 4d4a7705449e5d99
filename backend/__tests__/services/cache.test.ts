/**
 * Cache service tests
 */
import { describe, it, expect, beforeEach } from '@jest/globals';
import { TTLCache } from '../../services/cache';
import { FakeClock } from '../helpers/fakeClock';

describe('TTLCache', () => {
  let clock: FakeClock;
  let cache: TTLCache<string, number>;

  beforeEach(() => {
    clock = new FakeClock();
    cache = new TTLCache<string, number>(1000, 10, clock);
  });

  describe('set and get', () => {
    it('should store and retrieve values', () => {
      cache.set('a', 1);
      expect(cache.get('a')).toBe(1);
    });

    it('should return undefined for missing keys', () => {
      expect(cache.get('nonexistent')).toBeUndefined();
    });
  });

  describe('TTL expiration', () => {
    it('should expire items once the TTL has elapsed', () => {
      cache.set('a', 1);
      clock.advance(999);
      expect(cache.has('a')).toBe(true);

      clock.advance(1);
      expect(cache.has('a')).toBe(false);
    });

    it('should respect custom TTL', () => {
      cache.set('short', 1, 50);
      cache.set('long', 2, 5000);
      clock.advance(100);

      expect(cache.get('short')).toBeUndefined();
      expect(cache.get('long')).toBe(2);
    });

    it('should not extend an entry on read', () => {
      cache.set('a', 1);
      clock.advance(600);
      cache.get('a');
      clock.advance(400);
      expect(cache.get('a')).toBeUndefined();
    });
  });

  describe('cleanup', () => {
    it('should remove expired entries', () => {
      cache.set('a', 1, 100);
      cache.set('b', 2, 10_000);
      clock.advance(200);

      cache.cleanup();
      expect(cache.size).toBe(1);
    });
  });

  describe('capacity', () => {
    it('should evict the oldest entries when full', () => {
      for (let i = 0; i < 10; i++) {
        cache.set(`key${i}`, i);
      }
      cache.set('key10', 10);

      expect(cache.size).toBe(10);
      expect(cache.has('key0')).toBe(false);
      expect(cache.get('key10')).toBe(10);
    });

    it('should prefer expired entries when evicting', () => {
      cache.set('stale', 0, 10);
      for (let i = 1; i < 10; i++) {
        cache.set(`key${i}`, i);
      }
      clock.advance(20);
      cache.set('fresh', 11);

      expect(cache.has('stale')).toBe(false);
      expect(cache.get('key1')).toBe(1);
    });
  });

  describe('delete', () => {
    it('should remove a key', () => {
      cache.set('a', 1);
      expect(cache.delete('a')).toBe(true);
      expect(cache.has('a')).toBe(false);
    });
  });
});
