/**
 * Type definitions for the Zetalytics connector and its host pipeline
 */

/**
 * Event types the connector listens for
 */
export const WATCHED_EVENT_TYPES = [
  'INTERNET_NAME',
  'DOMAIN_NAME',
  'EMAILADDR',
  'IP_ADDRESS',
] as const;

/**
 * Event types the connector may emit
 */
export const PRODUCED_EVENT_TYPES = [
  'INTERNET_NAME',
  'INTERNET_NAME_UNRESOLVED',
  'DOMAIN_NAME',
  'AFFILIATE_DOMAIN_NAME',
  'IP_ADDRESS',
  'EMAILADDR',
  'RAW_RIR_DATA',
] as const;

export type WatchedEventType = (typeof WATCHED_EVENT_TYPES)[number];
export type ProducedEventType = (typeof PRODUCED_EVENT_TYPES)[number];

/**
 * Every event type that can travel on the bus. ROOT is the synthetic parent of a seed.
 */
export type EventType = WatchedEventType | ProducedEventType | 'ROOT';

/**
 * A single discovery travelling through the pipeline
 */
export interface ScanEvent {
  readonly id: string;
  readonly type: EventType;
  readonly data: string;
  /** Name of the module that produced the event */
  readonly module: string;
  readonly parent: ScanEvent | null;
  readonly generated: Date;
}

/**
 * Where modules hand their events over to the host
 */
export interface EventSink {
  publish(event: ScanEvent): void;
}

/**
 * A module the bus can deliver events to
 */
export interface EventListener {
  readonly name: string;
  watchedEvents(): readonly EventType[];
  handleEvent(event: ScanEvent, signal: AbortSignal): Promise<void>;
}

/**
 * Decides whether a discovered name belongs to the entity under investigation
 */
export interface ScopeMatcher {
  matches(value: string): boolean;
}

/**
 * Forward DNS lookups used to confirm that hostnames are still live
 */
export interface HostResolver {
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
}

/**
 * Connector runtime options
 */
export interface ConnectorOptions {
  apiKey: string;
  /** Only trust hostnames that still resolve */
  verify: boolean;
  /** Per-request timeout in milliseconds */
  timeout: number;
  baseUrl: string;
  userAgent: string;
}

/**
 * Connector lifecycle
 */
export type ConnectorState = 'uninitialized' | 'ready' | 'querying' | 'error';

/**
 * Cache entry
 */
export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export function isWatchedEventType(type: string): type is WatchedEventType {
  return WATCHED_EVENT_TYPES.some((watched) => watched === type);
}
