/**
 * In-process event bus for running connectors without a host framework
 */

import { randomUUID } from 'node:crypto';
import pLimit from 'p-limit';
import { describeError } from './errors.js';
import { logger } from '../utils/logger.js';
import type { EventListener, EventSink, EventType, ScanEvent } from './types.js';

const log = logger.child('bus');

export function createEvent(
  type: EventType,
  data: string,
  module: string,
  parent: ScanEvent | null
): ScanEvent {
  return Object.freeze({
    id: randomUUID(),
    type,
    data,
    module,
    parent,
    generated: new Date(),
  });
}

export interface EventBusOptions {
  /** Deliver a listener's own events back to it */
  recurse?: boolean;
  /** Stop the bus once this many events have been published */
  maxEvents?: number;
}

export type EventObserver = (event: ScanEvent) => void;

/**
 * Routes published events to the listeners that watch their type.
 *
 * Deliveries run one at a time: a listener's handleEvent finishes, including all of its
 * network calls, before the next delivery starts.
 */
export class EventBus implements EventSink {
  private readonly queue = pLimit(1);
  private readonly listeners: EventListener[] = [];
  private readonly observers: EventObserver[] = [];
  private readonly pending = new Set<Promise<void>>();
  private readonly controller = new AbortController();
  private readonly recurse: boolean;
  private readonly maxEvents?: number;
  private published = 0;

  constructor(options: EventBusOptions = {}) {
    this.recurse = options.recurse ?? false;
    this.maxEvents = options.maxEvents;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get publishedCount(): number {
    return this.published;
  }

  subscribe(listener: EventListener): void {
    this.listeners.push(listener);
  }

  onEvent(observer: EventObserver): void {
    this.observers.push(observer);
  }

  publish(event: ScanEvent): void {
    if (this.signal.aborted) {
      return;
    }

    this.published++;
    for (const observer of this.observers) {
      observer(event);
    }

    if (this.maxEvents !== undefined && this.published >= this.maxEvents) {
      log.warn(`Event limit of ${this.maxEvents} reached, stopping`);
      this.stop();
      return;
    }

    for (const listener of this.listeners) {
      if (!this.recurse && listener.name === event.module) {
        continue;
      }
      if (!listener.watchedEvents().includes(event.type)) {
        continue;
      }
      this.deliver(listener, event);
    }
  }

  private deliver(listener: EventListener, event: ScanEvent): void {
    const delivery = this.queue(async () => {
      if (this.signal.aborted) {
        return;
      }
      try {
        await listener.handleEvent(event, this.signal);
      } catch (error) {
        log.error(`${listener.name} failed on ${event.type}: ${describeError(error)}`);
      }
    });

    this.pending.add(delivery);
    void delivery.finally(() => this.pending.delete(delivery));
  }

  /**
   * Resolve once every queued delivery, and whatever they published, has been handled
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  /**
   * Cooperative stop: queued deliveries are skipped, in-flight ones finish
   */
  stop(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }
}
