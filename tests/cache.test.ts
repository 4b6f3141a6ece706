/**
 * Tests for CacheManager
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { CacheManager } from '../src/core/cache.js';

describe('CacheManager', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should compute a value once and reuse it', async () => {
    const cache = new CacheManager<string[]>(10, 60000);
    const factory = vi.fn(async () => ['192.0.2.1']);

    expect(await cache.getOrSet('a:www.example.com', factory)).toEqual(['192.0.2.1']);
    expect(await cache.getOrSet('a:www.example.com', factory)).toEqual(['192.0.2.1']);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('should expire entries after their TTL', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const cache = new CacheManager<string>(10, 1000);

    cache.set('key', 'value');
    expect(cache.get('key')).toBe('value');

    vi.setSystemTime(new Date('2026-01-01T00:00:02Z'));
    expect(cache.get('key')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should evict the least recently used entry when full', () => {
    const cache = new CacheManager<string>(2, 60000);

    cache.set('a', '1');
    cache.set('b', '2');
    cache.get('a');
    cache.set('c', '3');

    expect(cache.get('a')).toBe('1');
    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('c')).toBe('3');
  });
});
