/**
 * LRU cache with TTL, used for DNS lookups
 */

import { LRUCache } from 'lru-cache';
import type { CacheEntry } from './types.js';

/**
 * Bounded cache for values that are expensive to recompute within a run
 */
export class CacheManager<T extends object | string | number | boolean> {
  private cache: LRUCache<string, CacheEntry<T>>;
  private defaultTTL: number;

  /**
   * @param maxSize Maximum number of entries
   * @param ttl Time-to-live in milliseconds
   */
  constructor(maxSize = 1000, ttl = 300000) {
    this.defaultTTL = ttl;
    this.cache = new LRUCache<string, CacheEntry<T>>({ max: maxSize });
  }

  /**
   * Cached value, or undefined when absent or expired
   */
  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: T, ttl?: number): void {
    this.cache.set(key, { value, expiresAt: Date.now() + (ttl ?? this.defaultTTL) });
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Get from cache or compute and cache
   */
  async getOrSet(key: string, factory: () => Promise<T>, ttl?: number): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await factory();
    this.set(key, value, ttl);
    return value;
  }
}
