/**
 * Per-run memory of what the connector has already queried or emitted
 */

import type { EventType } from './types.js';

/**
 * `handled`: an input event that was already queried.
 * `emitted`: a hostname that already went through the emission gate.
 */
export type DedupKind = 'handled' | 'emitted';

/**
 * Set of (kind, event type, value) triples, owned by a single connector
 */
export class DedupCache {
  private readonly seen = new Set<string>();

  private static key(kind: DedupKind, type: EventType, value: string): string {
    return `${kind}|${type}:${value}`;
  }

  has(kind: DedupKind, type: EventType, value: string): boolean {
    return this.seen.has(DedupCache.key(kind, type, value));
  }

  add(kind: DedupKind, type: EventType, value: string): void {
    this.seen.add(DedupCache.key(kind, type, value));
  }

  /**
   * Record the triple. Returns false when it was already present.
   */
  checkAndAdd(kind: DedupKind, type: EventType, value: string): boolean {
    const key = DedupCache.key(kind, type, value);
    if (this.seen.has(key)) {
      return false;
    }
    this.seen.add(key);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }

  clear(): void {
    this.seen.clear();
  }
}
