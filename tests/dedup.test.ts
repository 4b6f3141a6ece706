/**
 * Tests for DedupCache
 */

import { describe, it, expect } from 'vitest';
import { DedupCache } from '../src/core/dedup.js';

describe('DedupCache', () => {
  it('should report a triple only after it was added', () => {
    const cache = new DedupCache();

    expect(cache.has('handled', 'DOMAIN_NAME', 'example.com')).toBe(false);
    cache.add('handled', 'DOMAIN_NAME', 'example.com');
    expect(cache.has('handled', 'DOMAIN_NAME', 'example.com')).toBe(true);
  });

  it('should keep kinds and event types apart', () => {
    const cache = new DedupCache();
    cache.add('handled', 'INTERNET_NAME', 'example.com');

    expect(cache.has('emitted', 'INTERNET_NAME', 'example.com')).toBe(false);
    expect(cache.has('handled', 'DOMAIN_NAME', 'example.com')).toBe(false);
  });

  it('should accept a triple once through checkAndAdd', () => {
    const cache = new DedupCache();

    expect(cache.checkAndAdd('handled', 'IP_ADDRESS', '192.0.2.1')).toBe(true);
    expect(cache.checkAndAdd('handled', 'IP_ADDRESS', '192.0.2.1')).toBe(false);
    expect(cache.size).toBe(1);
  });

  it('should start over after clear', () => {
    const cache = new DedupCache();
    cache.add('emitted', 'INTERNET_NAME', 'www.example.com');
    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.has('emitted', 'INTERNET_NAME', 'www.example.com')).toBe(false);
  });
});
