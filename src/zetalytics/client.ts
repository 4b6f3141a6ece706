/**
 * Zetalytics (zonecruncher) API client
 */

import { HttpClient } from '../utils/http.js';
import { describeError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import type { ConnectorOptions } from '../core/types.js';
import type { Dispatcher } from 'undici';

/**
 * Every endpoint the connector knows, with any fixed query parameters it needs
 */
export const ENDPOINTS = {
  subdomains: { path: '/subdomains', params: { vvv: 'true' } },
  hostname: { path: '/hostname' },
  email_domain: { path: '/email_domain' },
  email_address: { path: '/email_address' },
  email_user: { path: '/email_user' },
  ns2domain: { path: '/ns2domain' },
  mx2domain: { path: '/mx2domain' },
  cname2qname: { path: '/cname2qname' },
  domain2ip: { path: '/domain2ip' },
  domain2aaaa: { path: '/domain2aaaa' },
  domain2mx: { path: '/domain2mx' },
  domain2cname: { path: '/domain2cname' },
  domain2ns: { path: '/domain2ns' },
  domain2ptr: { path: '/domain2ptr' },
  domain2txt: { path: '/domain2txt' },
  domain2rrtypes: { path: '/domain2rrtypes' },
  domain2whois: { path: '/domain2whois' },
  domain2d8s: { path: '/domain2d8s' },
  domain2nsglue: { path: '/domain2nsglue' },
  'domain-zone-activity': { path: '/domain-zone-activity' },
  'ns-zone-activity': { path: '/ns-zone-activity' },
  ip2nsglue: { path: '/ip2nsglue' },
  ip2pwhois: { path: '/ip2pwhois' },
  ip: { path: '/ip' },
  liveDNS: { path: '/liveDNS' },
} as const satisfies Record<string, { path: string; params?: Record<string, string> }>;

export type EndpointName = keyof typeof ENDPOINTS;

export function isEndpointName(name: string): name is EndpointName {
  return Object.hasOwn(ENDPOINTS, name);
}

export function endpointNames(): EndpointName[] {
  return Object.keys(ENDPOINTS).filter(isEndpointName);
}

/**
 * What the connector needs from the API: one JSON document per (endpoint, query)
 */
export interface PassiveDnsApi {
  query(endpoint: EndpointName, q: string, signal?: AbortSignal): Promise<unknown>;
}

/**
 * Single-shot JSON GETs against the API. Every failure is logged and becomes `null`.
 */
export class QueryClient implements PassiveDnsApi {
  private readonly http: HttpClient;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly log = logger.child('zetalytics');

  constructor(
    options: Pick<ConnectorOptions, 'apiKey' | 'baseUrl' | 'timeout' | 'userAgent'>,
    dispatcher?: Dispatcher
  ) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl;
    this.http = new HttpClient(options.timeout, options.userAgent, dispatcher);
  }

  /**
   * GET `{baseUrl}{path}/?{params}&token=…` and parse the body as JSON
   */
  async request(
    path: string,
    params: Record<string, string>,
    signal?: AbortSignal
  ): Promise<unknown> {
    if (signal?.aborted) {
      return null;
    }

    const query = new URLSearchParams(params).toString();
    const url = `${this.baseUrl}${path}/?${new URLSearchParams({ ...params, token: this.apiKey })}`;

    let status: number;
    let body: string;
    try {
      const response = await this.http.get(url);
      status = response.statusCode;
      body = response.body;
    } catch (error) {
      this.log.error(`Request to ${path}?${query} failed: ${describeError(error)}`);
      return null;
    }

    if (status < 200 || status >= 300) {
      this.log.error(`Zetalytics returned HTTP ${status} for ${path}?${query}`);
      return null;
    }

    if (body.trim() === '') {
      this.log.info(`No Zetalytics info found for ${path}?${query}`);
      return null;
    }

    try {
      return JSON.parse(body) as unknown;
    } catch (error) {
      this.log.error(`Error processing JSON response from Zetalytics: ${describeError(error)}`);
      return null;
    }
  }

  async query(endpoint: EndpointName, q: string, signal?: AbortSignal): Promise<unknown> {
    const { path, ...rest } = ENDPOINTS[endpoint];
    const fixed: Record<string, string> = 'params' in rest ? rest.params : {};
    return await this.request(path, { q, ...fixed }, signal);
  }

  async close(): Promise<void> {
    await this.http.close();
  }
}
