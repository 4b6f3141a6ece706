/**
 * Run orchestrator: wires the connector to an event bus and seeds it
 */

import { DnsResolver } from './dns.js';
import { EventBus, createEvent } from './events.js';
import { Target, seedEventType } from './target.js';
import { logger } from '../utils/logger.js';
import { QueryClient, type PassiveDnsApi } from '../zetalytics/client.js';
import { ZetalyticsConnector } from '../zetalytics/connector.js';
import type {
  ConnectorOptions,
  ConnectorState,
  HostResolver,
  ScanEvent,
  WatchedEventType,
} from './types.js';

/**
 * Application configuration
 */
export interface AppConfig {
  target: string;
  /** Seed event type; inferred from the target when omitted */
  type?: WatchedEventType;
  /** Other names that belong to the target */
  aliases?: string[];
  /** Feed the connector's own discoveries back into it */
  recurse?: boolean;
  maxEvents?: number;
  connector: Readonly<ConnectorOptions>;
  /** Aborting stops the run cooperatively */
  signal?: AbortSignal;
  /** Called for every event the connector emits, as it is emitted */
  onEvent?: (event: ScanEvent) => void;
}

/**
 * Collaborators that can be swapped out, mostly for tests
 */
export interface AppDeps {
  api?: PassiveDnsApi;
  resolver?: HostResolver;
}

export interface RunResult {
  seed: ScanEvent;
  events: ScanEvent[];
  /** Every event published on the bus, the seed included */
  published: number;
  state: ConnectorState;
}

export class App {
  private config: AppConfig;
  private deps: AppDeps;

  constructor(config: AppConfig, deps: AppDeps = {}) {
    this.config = config;
    this.deps = deps;
  }

  async run(): Promise<RunResult> {
    const { target, aliases, recurse, maxEvents, signal, onEvent } = this.config;

    const bus = new EventBus({ recurse, maxEvents });
    let ownClient: QueryClient | null = null;
    let api = this.deps.api;
    if (!api) {
      ownClient = new QueryClient(this.config.connector);
      api = ownClient;
    }
    const connector = new ZetalyticsConnector(this.config.connector, {
      api,
      target: new Target(target, aliases),
      resolver: this.deps.resolver ?? new DnsResolver(),
    });
    connector.setup(bus);
    bus.subscribe(connector);

    const events: ScanEvent[] = [];
    bus.onEvent((event) => {
      if (event.module !== connector.name) {
        return;
      }
      events.push(event);
      onEvent?.(event);
    });

    const stop = () => bus.stop();
    signal?.addEventListener('abort', stop, { once: true });

    const root = createEvent('ROOT', target, 'app', null);
    const seed = createEvent(this.config.type ?? seedEventType(target), target, 'app', root);

    try {
      if (signal?.aborted) {
        bus.stop();
      }
      bus.publish(seed);
      await bus.drain();
    } finally {
      signal?.removeEventListener('abort', stop);
      await ownClient?.close();
    }

    logger.debug(`Run finished: ${events.length} events emitted, ${bus.publishedCount} published`);

    return {
      seed,
      events,
      published: bus.publishedCount,
      state: connector.state,
    };
  }
}
