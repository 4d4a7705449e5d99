/**
 * TTL (Time To Live) Cache
 * Entries expire after a fixed time; capacity is bounded with eviction
 */
import { type Clock, systemClock } from '../utils/clock';

interface TTLValue<T> {
  value: T;
  expiresAt: number;
}

export class TTLCache<K, V> {
  private cache: Map<K, TTLValue<V>>;
  private defaultTTL: number;
  private maxSize: number;
  private clock: Clock;

  constructor(defaultTTL: number = 60000, maxSize: number = 10000, clock: Clock = systemClock) {
    this.cache = new Map();
    this.defaultTTL = defaultTTL;
    this.maxSize = maxSize;
    this.clock = clock;
  }

  set(key: K, value: V, ttl: number = this.defaultTTL): void {
    if (this.cache.size >= this.maxSize && !this.cache.has(key)) {
      this.evictOldest();
    }

    const expiresAt = this.clock.now() + ttl;
    this.cache.set(key, { value, expiresAt });
  }

  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (this.clock.now() >= entry.expiresAt) {
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

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }

  cleanup(): void {
    const now = this.clock.now();
    for (const [key, entry] of this.cache.entries()) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
      }
    }
  }

  /**
   * Evict oldest/expired entries when cache is full
   * First removes expired, then oldest entries if still over limit
   */
  private evictOldest(): void {
    const now = this.clock.now();
    let evicted = 0;
    const targetEvictions = Math.ceil(this.maxSize * 0.1); // Evict 10% when full

    for (const [key, entry] of this.cache.entries()) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
        evicted++;
        if (evicted >= targetEvictions) return;
      }
    }

    // Map iteration order is insertion order, so the first keys are the oldest
    const keysIterator = this.cache.keys();
    while (evicted < targetEvictions) {
      const result = keysIterator.next();
      if (result.done) break;
      this.cache.delete(result.value);
      evicted++;
    }
  }
}

export default TTLCache;
