/**
 * Tests for CLI helpers
 */

import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { formatEventLine, toEventRecord } from '../src/cli/commands/scan.js';
import { parsePositiveInt } from '../src/cli/options.js';
import { seed } from './fakes.js';
import { createEvent } from '../src/core/events.js';

describe('CLI', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  describe('formatEventLine', () => {
    it('should print type, value and source', () => {
      const event = createEvent('INTERNET_NAME', 'www.example.com', 'zetalytics', seed('DOMAIN_NAME', 'example.com'));

      expect(formatEventLine(event)).toBe(
        `${'INTERNET_NAME'.padEnd(26)} www.example.com <- example.com`
      );
    });

    it('should shorten long raw responses', () => {
      const data = JSON.stringify({ results: Array.from({ length: 20 }, (_, i) => ({ qname: `h${i}.example.com` })) });
      const event = createEvent('RAW_RIR_DATA', data, 'zetalytics', null);

      expect(formatEventLine(event)).toBe(`${'RAW_RIR_DATA'.padEnd(26)} ${data.slice(0, 117)}...`);
    });
  });

  describe('toEventRecord', () => {
    it('should flatten an event for JSON output', () => {
      const parent = seed('IP_ADDRESS', '192.0.2.1');
      const event = createEvent('AFFILIATE_DOMAIN_NAME', 'host.other.org', 'zetalytics', parent);

      expect(toEventRecord(event)).toEqual({
        type: 'AFFILIATE_DOMAIN_NAME',
        data: 'host.other.org',
        module: 'zetalytics',
        source: '192.0.2.1',
        generated: event.generated.toISOString(),
      });
    });
  });

  describe('parsePositiveInt', () => {
    it('should parse positive integers', () => {
      expect(parsePositiveInt('5000')).toBe(5000);
    });

    it.each(['0', '-1', '1.5', 'abc'])('should reject %s', (value) => {
      expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
    });
  });
});
