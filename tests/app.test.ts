/**
 * Tests for App, the run orchestrator
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { App } from '../src/core/app.js';
import { logger } from '../src/utils/logger.js';
import type { ScanEvent } from '../src/core/types.js';
import { FakeApi, FakeResolver, TEST_OPTIONS } from './fakes.js';

const pairs = (events: ScanEvent[]) => events.map((event) => [event.type, event.data]);

describe('App', () => {
  beforeAll(() => {
    logger.setQuiet(true);
  });

  it('should seed a domain and collect what the connector emits', async () => {
    const api = new FakeApi({ subdomains: { results: [{ qname: 'www.example.com' }] } });
    const app = new App(
      { target: 'example.com', connector: TEST_OPTIONS },
      { api, resolver: new FakeResolver() }
    );

    const result = await app.run();

    expect(result.seed.type).toBe('DOMAIN_NAME');
    expect(result.seed.parent?.type).toBe('ROOT');
    expect(pairs(result.events)).toEqual([
      ['INTERNET_NAME', 'www.example.com'],
      ['RAW_RIR_DATA', JSON.stringify({ results: [{ qname: 'www.example.com' }] })],
    ]);
    expect(result.published).toBe(3);
    expect(result.state).toBe('ready');
    expect(api.calls).toHaveLength(10);
  });

  it('should follow its own discoveries when recursing', async () => {
    const api = new FakeApi({
      subdomains: { results: [{ qname: 'www.example.com' }] },
      'hostname www.example.com': { results: [{ qname: 'dev.example.com' }] },
    });
    const app = new App(
      { target: 'example.com', recurse: true, connector: TEST_OPTIONS },
      { api, resolver: new FakeResolver() }
    );

    const result = await app.run();

    expect(api.calls).toContainEqual({ endpoint: 'hostname', q: 'www.example.com' });
    expect(api.calls).toContainEqual({ endpoint: 'hostname', q: 'dev.example.com' });
    const names = result.events
      .filter((event) => event.type === 'INTERNET_NAME')
      .map((event) => event.data);
    expect(names).toEqual(['www.example.com', 'dev.example.com']);
  });

  it('should honour an explicit seed type', async () => {
    const api = new FakeApi();
    const app = new App(
      { target: 'example.com', type: 'INTERNET_NAME', connector: TEST_OPTIONS },
      { api, resolver: new FakeResolver() }
    );

    await app.run();

    expect(api.calls).toEqual([{ endpoint: 'hostname', q: 'example.com' }]);
  });

  it('should not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const api = new FakeApi();
    const app = new App(
      { target: 'example.com', connector: TEST_OPTIONS, signal: controller.signal },
      { api, resolver: new FakeResolver() }
    );

    const result = await app.run();

    expect(api.calls).toHaveLength(0);
    expect(result.events).toEqual([]);
    expect(result.published).toBe(0);
  });

  it('should report the error state when no API key is configured', async () => {
    const api = new FakeApi();
    const app = new App(
      { target: 'example.com', connector: { ...TEST_OPTIONS, apiKey: '' } },
      { api, resolver: new FakeResolver() }
    );

    const result = await app.run();

    expect(result.state).toBe('error');
    expect(result.events).toEqual([]);
    expect(api.calls).toHaveLength(0);
  });

  it('should stream events to the callback', async () => {
    const streamed: string[] = [];
    const api = new FakeApi({ email_address: { results: [{ d: 'partner.net' }] } });
    const app = new App(
      {
        target: 'admin@example.com',
        connector: TEST_OPTIONS,
        onEvent: (event) => streamed.push(event.type),
      },
      { api, resolver: new FakeResolver() }
    );

    await app.run();

    expect(streamed).toEqual(['AFFILIATE_DOMAIN_NAME', 'RAW_RIR_DATA']);
  });
});
