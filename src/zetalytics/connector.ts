/**
 * Zetalytics connector: watches discovery events, queries the passive DNS / WHOIS
 * database and publishes what it finds.
 */

import { DedupCache } from '../core/dedup.js';
import { createEvent } from '../core/events.js';
import { describeError } from '../core/errors.js';
import { normalizeHostname } from '../core/domain.js';
import { logger } from '../utils/logger.js';
import {
  PRODUCED_EVENT_TYPES,
  WATCHED_EVENT_TYPES,
  isWatchedEventType,
  type ConnectorOptions,
  type ConnectorState,
  type EventListener,
  type EventSink,
  type HostResolver,
  type ProducedEventType,
  type ScanEvent,
  type ScopeMatcher,
  type WatchedEventType,
} from '../core/types.js';
import { ResultMapper, type EmitContext } from './mapper.js';
import type { EndpointName, PassiveDnsApi } from './client.js';

export const CONNECTOR_NAME = 'zetalytics';

export interface ZetalyticsConnectorDeps {
  api: PassiveDnsApi;
  target: ScopeMatcher;
  resolver: HostResolver;
}

export class ZetalyticsConnector implements EventListener {
  readonly name = CONNECTOR_NAME;

  private readonly options: Readonly<ConnectorOptions>;
  private readonly api: PassiveDnsApi;
  private readonly dedup = new DedupCache();
  private readonly mapper: ResultMapper;
  private readonly log = logger.child(CONNECTOR_NAME);
  private sink: EventSink | null = null;
  private currentState: ConnectorState = 'uninitialized';

  constructor(options: Readonly<ConnectorOptions>, deps: ZetalyticsConnectorDeps) {
    this.options = options;
    this.api = deps.api;
    this.mapper = new ResultMapper({
      emit: (type, data, ctx) => this.emit(type, data, ctx),
      target: deps.target,
      resolver: deps.resolver,
      dedup: this.dedup,
      verify: options.verify,
    });
  }

  get state(): ConnectorState {
    return this.currentState;
  }

  /**
   * Attach to the host and start a new run
   */
  setup(sink: EventSink): void {
    this.sink = sink;
    this.dedup.clear();
    this.currentState = 'ready';
  }

  watchedEvents(): readonly WatchedEventType[] {
    return WATCHED_EVENT_TYPES;
  }

  producedEvents(): readonly ProducedEventType[] {
    return PRODUCED_EVENT_TYPES;
  }

  private emit(type: ProducedEventType, data: string, ctx: EmitContext): ScanEvent | null {
    if (ctx.signal.aborted || !this.sink) {
      return null;
    }
    const event = createEvent(type, data, this.name, ctx.parent);
    this.sink.publish(event);
    return event;
  }

  async handleEvent(event: ScanEvent, signal: AbortSignal): Promise<void> {
    if (this.currentState === 'error' || signal.aborted) {
      return;
    }

    if (this.currentState === 'uninitialized') {
      this.log.error(`Received ${event.type} before setup, ignoring`);
      return;
    }

    this.log.debug(`Received event, ${event.type}, from ${event.module}`);

    if (this.options.apiKey === '') {
      this.log.error(`You enabled ${this.name} but did not set an API key!`);
      this.currentState = 'error';
      return;
    }

    if (!isWatchedEventType(event.type)) {
      return;
    }

    const key = event.type === 'INTERNET_NAME' || event.type === 'DOMAIN_NAME'
      ? normalizeHostname(event.data)
      : event.data;
    if (!this.dedup.checkAndAdd('handled', event.type, key)) {
      this.log.debug(`Skipping ${event.type}:${event.data}, already checked.`);
      return;
    }

    const ctx: EmitContext = { parent: event, signal };
    this.currentState = 'querying';
    try {
      await this.dispatch(event.type, event.data, ctx);
    } catch (error) {
      this.log.error(`Failed handling ${event.type}:${event.data}: ${describeError(error)}`);
    } finally {
      this.currentState = 'ready';
    }
  }

  private async dispatch(type: WatchedEventType, value: string, ctx: EmitContext): Promise<void> {
    switch (type) {
      case 'INTERNET_NAME':
        return await this.handleInternetName(value, ctx);
      case 'DOMAIN_NAME':
        return await this.handleDomainName(value, ctx);
      case 'IP_ADDRESS':
        return await this.handleIpAddress(value, ctx);
      case 'EMAILADDR':
        return await this.handleEmailAddress(value, ctx);
      default: {
        const unhandled: never = type;
        throw new Error(`Unhandled event type: ${String(unhandled)}`);
      }
    }
  }

  /**
   * Stopped runs issue no further queries
   */
  private async fetch(endpoint: EndpointName, q: string, ctx: EmitContext): Promise<unknown> {
    if (ctx.signal.aborted) {
      return null;
    }
    return await this.api.query(endpoint, q, ctx.signal);
  }

  private async handleInternetName(hostname: string, ctx: EmitContext): Promise<void> {
    const data = await this.fetch('hostname', hostname, ctx);
    if (await this.mapper.hostnameEvents(data, ctx)) {
      this.mapper.rawEvent(data, ctx);
    }
  }

  private async handleDomainName(domain: string, ctx: EmitContext): Promise<void> {
    const subdomains = await this.fetch('subdomains', domain, ctx);
    await this.mapper.subdomainEvents(subdomains, ctx);
    this.mapper.rawEvent(subdomains, ctx);

    const emailDomain = await this.fetch('email_domain', domain, ctx);
    if (this.mapper.affiliateEvents(emailDomain, 'd', ctx)) {
      this.mapper.rawEvent(emailDomain, ctx);
    }

    const sharedNs = await this.fetch('ns2domain', domain, ctx);
    this.mapper.affiliateEvents(sharedNs, 'domain', ctx, domain);
    this.mapper.rawEvent(sharedNs, ctx);

    for (const endpoint of ['domain2ip', 'domain2aaaa', 'domain2mx', 'domain2cname'] as const) {
      this.mapper.rawEvent(await this.fetch(endpoint, domain, ctx), ctx);
    }

    const whois = await this.fetch('domain2whois', domain, ctx);
    this.mapper.rawEvent(whois, ctx);
    this.mapper.whoisEvents(whois, ctx);

    for (const endpoint of ['domain2d8s', 'domain2nsglue'] as const) {
      this.mapper.rawEvent(await this.fetch(endpoint, domain, ctx), ctx);
    }
  }

  private async handleIpAddress(address: string, ctx: EmitContext): Promise<void> {
    for (const endpoint of ['ip2nsglue', 'ip2pwhois'] as const) {
      this.mapper.rawEvent(await this.fetch(endpoint, address, ctx), ctx);
    }

    const reverse = await this.fetch('ip', address, ctx);
    this.mapper.affiliateEvents(reverse, 'qname', ctx, address);
    this.mapper.rawEvent(reverse, ctx);
  }

  private async handleEmailAddress(email: string, ctx: EmitContext): Promise<void> {
    const data = await this.fetch('email_address', email, ctx);
    if (this.mapper.affiliateEvents(data, 'd', ctx)) {
      this.mapper.rawEvent(data, ctx);
    }
  }
}
