/**
 * Turns Zetalytics responses into pipeline events
 */

import { isRootDomain, normalizeHostname } from '../core/domain.js';
import { logger } from '../utils/logger.js';
import type { DedupCache } from '../core/dedup.js';
import type {
  HostResolver,
  ProducedEventType,
  ScanEvent,
  ScopeMatcher,
} from '../core/types.js';
import {
  decodeEntries,
  decodeList,
  dnsRecordSchema,
  emailDomainEntrySchema,
  hasResultList,
  nsDomainEntrySchema,
  qnameEntrySchema,
  whoisEntrySchema,
} from './schemas.js';

/**
 * The event that triggered the query, and the run's stop signal
 */
export interface EmitContext {
  parent: ScanEvent;
  signal: AbortSignal;
}

/**
 * Hands one event to the host. Returns null when nothing was emitted (stopped run).
 */
export type Emitter = (type: ProducedEventType, data: string, ctx: EmitContext) => ScanEvent | null;

export interface ResultMapperDeps {
  emit: Emitter;
  target: ScopeMatcher;
  resolver: HostResolver;
  dedup: DedupCache;
  /** Require discovered hostnames to resolve before trusting them */
  verify: boolean;
}

/** Fields that carry an affiliated domain, per endpoint family */
export type AffiliateField = 'd' | 'domain' | 'qname';

const IP_RRTYPES = new Set(['a', 'aaaa']);

/**
 * Every method returns whether at least one event was emitted.
 * Responses that are null, not objects, or lack a `results` list produce nothing.
 */
export class ResultMapper {
  private readonly deps: ResultMapperDeps;
  private readonly log = logger.child('zetalytics');

  constructor(deps: ResultMapperDeps) {
    this.deps = deps;
  }

  /**
   * The only way a hostname leaves the connector. Each hostname passes at most once per
   * run, and only when it is in scope. Case variants and a trailing dot name the same host.
   */
  async verifyEmitInternetName(name: string, ctx: EmitContext): Promise<boolean> {
    const { dedup, target, emit } = this.deps;
    const hostname = normalizeHostname(name);
    if (!hostname) {
      return false;
    }

    if (
      dedup.has('handled', 'INTERNET_NAME', hostname) ||
      dedup.has('emitted', 'INTERNET_NAME', hostname)
    ) {
      return false;
    }

    if (!target.matches(hostname)) {
      return false;
    }

    if (ctx.signal.aborted) {
      return false;
    }

    dedup.add('emitted', 'INTERNET_NAME', hostname);

    if (this.deps.verify && !(await this.resolves(hostname))) {
      this.log.debug(`Host ${hostname} could not be resolved`);
      emit('INTERNET_NAME_UNRESOLVED', hostname, ctx);
      return true;
    }

    emit('INTERNET_NAME', hostname, ctx);
    if (isRootDomain(hostname)) {
      emit('DOMAIN_NAME', hostname, ctx);
    }
    return true;
  }

  private async resolves(hostname: string): Promise<boolean> {
    const v4 = await this.deps.resolver.resolve4(hostname);
    if (v4.length > 0) {
      return true;
    }
    const v6 = await this.deps.resolver.resolve6(hostname);
    return v6.length > 0;
  }

  /**
   * `/hostname`: distinct qnames through the gate
   */
  async hostnameEvents(data: unknown, ctx: EmitContext): Promise<boolean> {
    const hostnames = new Set(decodeEntries(data, qnameEntrySchema).map((entry) => entry.qname));

    let generated = false;
    for (const hostname of hostnames) {
      if (await this.verifyEmitInternetName(hostname, ctx)) {
        generated = true;
      }
    }
    return generated;
  }

  /**
   * `/subdomains`: qnames through the gate, plus the addresses of their A/AAAA records
   */
  async subdomainEvents(data: unknown, ctx: EmitContext): Promise<boolean> {
    const entries = decodeEntries(data, qnameEntrySchema);
    const addresses = new Set<string>();

    let generated = false;
    for (const entry of entries) {
      if (await this.verifyEmitInternetName(entry.qname, ctx)) {
        generated = true;
      }
      for (const record of decodeList(entry.records ?? [], dnsRecordSchema)) {
        if (IP_RRTYPES.has(record.rrtype.toLowerCase())) {
          addresses.add(record.value);
        }
      }
    }

    for (const address of addresses) {
      if (this.deps.emit('IP_ADDRESS', address, ctx)) {
        generated = true;
      }
    }
    return generated;
  }

  /**
   * One AFFILIATE_DOMAIN_NAME per distinct value of `field`, never the queried value itself
   */
  affiliateEvents(
    data: unknown,
    field: AffiliateField,
    ctx: EmitContext,
    exclude?: string
  ): boolean {
    const domains = new Set<string>();
    switch (field) {
      case 'd':
        decodeEntries(data, emailDomainEntrySchema).forEach((entry) => domains.add(entry.d));
        break;
      case 'domain':
        decodeEntries(data, nsDomainEntrySchema).forEach((entry) => domains.add(entry.domain));
        break;
      case 'qname':
        decodeEntries(data, qnameEntrySchema).forEach((entry) => domains.add(entry.qname));
        break;
    }

    let generated = false;
    for (const domain of domains) {
      if (domain === exclude) {
        continue;
      }
      if (this.deps.emit('AFFILIATE_DOMAIN_NAME', domain, ctx)) {
        generated = true;
      }
    }
    return generated;
  }

  /**
   * `/domain2whois`: registrant emails
   */
  whoisEvents(data: unknown, ctx: EmitContext): boolean {
    const owners = new Set(decodeEntries(data, whoisEntrySchema).map((entry) => entry.response.x.owner));

    let generated = false;
    for (const owner of owners) {
      if (this.deps.emit('EMAILADDR', owner, ctx)) {
        generated = true;
      }
    }
    return generated;
  }

  /**
   * The whole response, verbatim, for downstream consumers
   */
  rawEvent(data: unknown, ctx: EmitContext): boolean {
    if (!hasResultList(data)) {
      return false;
    }
    return this.deps.emit('RAW_RIR_DATA', JSON.stringify(data), ctx) !== null;
  }
}
