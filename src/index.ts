/**
 * zetalytics-connector
 * Main entry point for programmatic usage
 */

import { loadConfig, type ConnectorOverrides } from './core/config.js';
import { App, type RunResult } from './core/app.js';
import type { WatchedEventType } from './core/types.js';

export { ZetalyticsConnector, CONNECTOR_NAME } from './zetalytics/connector.js';
export { ResultMapper } from './zetalytics/mapper.js';
export type { EmitContext, Emitter } from './zetalytics/mapper.js';
export { QueryClient, ENDPOINTS, endpointNames, isEndpointName } from './zetalytics/client.js';
export type { EndpointName, PassiveDnsApi } from './zetalytics/client.js';
export { App } from './core/app.js';
export type { AppConfig, AppDeps, RunResult } from './core/app.js';
export { EventBus, createEvent } from './core/events.js';
export { DedupCache } from './core/dedup.js';
export { Target, seedEventType } from './core/target.js';
export { DnsResolver } from './core/dns.js';
export { isRootDomain, isValidDomain, isIpAddress } from './core/domain.js';
export { loadConfig, VERSION, DEFAULT_BASE_URL } from './core/config.js';
export { ConfigError, HttpError } from './core/errors.js';
export { logger } from './utils/logger.js';
export * from './core/types.js';

export interface DiscoverOptions extends ConnectorOverrides {
  /** Seed event type; inferred from the target when omitted */
  type?: WatchedEventType;
  /** Other names that belong to the target */
  aliases?: string[];
  /** Feed the connector's own discoveries back into it */
  recurse?: boolean;
  maxEvents?: number;
  signal?: AbortSignal;
}

/**
 * Quick discovery interface for programmatic usage
 * @example
 * ```typescript
 * import { discover } from 'zetalytics-connector';
 *
 * const { events } = await discover('example.com', {
 *   apiKey: process.env.ZETALYTICS_API_KEY,
 *   verify: false,
 * });
 * ```
 */
export async function discover(target: string, options: DiscoverOptions = {}): Promise<RunResult> {
  const { type, aliases, recurse, maxEvents, signal, ...overrides } = options;
  const app = new App({
    target,
    type,
    aliases,
    recurse,
    maxEvents,
    signal,
    connector: loadConfig(overrides),
  });
  return await app.run();
}
