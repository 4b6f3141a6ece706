/**
 * Forward DNS resolution with caching
 */

import { promises as dns } from 'node:dns';
import { CacheManager } from './cache.js';
import type { HostResolver } from './types.js';

export interface DnsResolverOptions {
  /** Nameservers to query instead of the system ones */
  servers?: string[];
  /** How long a lookup result is reused, in milliseconds */
  ttl?: number;
  timeout?: number;
}

/**
 * A/AAAA lookups. A failed lookup resolves to an empty list.
 */
export class DnsResolver implements HostResolver {
  private resolver: dns.Resolver;
  private cache: CacheManager<string[]>;

  constructor(options: DnsResolverOptions = {}) {
    this.resolver = new dns.Resolver({ timeout: options.timeout ?? 5000, tries: 2 });
    if (options.servers && options.servers.length > 0) {
      this.resolver.setServers(options.servers);
    }
    this.cache = new CacheManager<string[]>(5000, options.ttl ?? 3600000);
  }

  async resolve4(hostname: string): Promise<string[]> {
    return await this.cache.getOrSet(`a:${hostname}`, async () => {
      try {
        return await this.resolver.resolve4(hostname);
      } catch {
        return [];
      }
    });
  }

  async resolve6(hostname: string): Promise<string[]> {
    return await this.cache.getOrSet(`aaaa:${hostname}`, async () => {
      try {
        return await this.resolver.resolve6(hostname);
      } catch {
        return [];
      }
    });
  }
}
