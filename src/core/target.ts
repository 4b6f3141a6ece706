/**
 * Scan target and scope matching
 */

import { emailDomain, isIpAddress, isRootDomain, normalizeHostname } from './domain.js';
import type { ScopeMatcher, WatchedEventType } from './types.js';

/**
 * The entity under investigation: a seed plus any aliases that also belong to it.
 *
 * Hostnames match when they equal a name or sit below one. IP addresses only match themselves.
 */
export class Target implements ScopeMatcher {
  readonly seed: string;
  private readonly names: Set<string>;

  constructor(seed: string, aliases: string[] = []) {
    this.seed = seed;
    this.names = new Set<string>();
    for (const name of [seed, ...aliases]) {
      const normalized = Target.normalize(name);
      if (normalized) {
        this.names.add(normalized);
      }
    }
  }

  private static normalize(value: string): string {
    const trimmed = normalizeHostname(value);
    return trimmed.includes('@') ? (emailDomain(trimmed) ?? '') : trimmed;
  }

  matches(value: string): boolean {
    const candidate = normalizeHostname(value);
    if (!candidate) {
      return false;
    }

    if (this.names.has(candidate)) {
      return true;
    }

    if (isIpAddress(candidate)) {
      return false;
    }

    for (const name of this.names) {
      if (!isIpAddress(name) && candidate.endsWith(`.${name}`)) {
        return true;
      }
    }
    return false;
  }

  get scope(): string[] {
    return [...this.names];
  }
}

/**
 * Event type to seed a scan with, inferred from the target's shape
 */
export function seedEventType(seed: string): WatchedEventType {
  const value = seed.trim();
  if (isIpAddress(value)) {
    return 'IP_ADDRESS';
  }
  if (value.includes('@')) {
    return 'EMAILADDR';
  }
  return isRootDomain(value) ? 'DOMAIN_NAME' : 'INTERNET_NAME';
}
