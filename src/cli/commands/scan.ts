/**
 * Scan command implementation
 */

import { writeFile } from 'fs/promises';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config.js';
import { App, type RunResult } from '../../core/app.js';
import { isIpAddress, isValidDomain } from '../../core/domain.js';
import { seedEventType } from '../../core/target.js';
import {
  WATCHED_EVENT_TYPES,
  isWatchedEventType,
  type ScanEvent,
  type WatchedEventType,
} from '../../core/types.js';
import { logger } from '../../utils/logger.js';
import { parsePositiveInt } from '../options.js';

type OutputFormat = 'text' | 'json';

interface ScanOptions {
  target: string;
  type?: string;
  apiKey?: string;
  verify: boolean;
  timeout?: number;
  baseUrl?: string;
  alias: string[];
  recurse: boolean;
  maxEvents?: number;
  format: string;
  export?: string;
  quiet: boolean;
  debug: boolean;
}

/**
 * JSON shape of an emitted event
 */
export interface EventRecord {
  type: string;
  data: string;
  module: string;
  source: string | null;
  generated: string;
}

export function toEventRecord(event: ScanEvent): EventRecord {
  return {
    type: event.type,
    data: event.data,
    module: event.module,
    source: event.parent ? event.parent.data : null,
    generated: event.generated.toISOString(),
  };
}

/**
 * One line per event; raw API documents are shortened
 */
export function formatEventLine(event: ScanEvent): string {
  const data = event.type === 'RAW_RIR_DATA' && event.data.length > 120
    ? `${event.data.slice(0, 117)}...`
    : event.data;
  const source = event.parent ? chalk.gray(` <- ${event.parent.data}`) : '';
  return `${chalk.cyan(event.type.padEnd(26))} ${data}${source}`;
}

function validateTarget(target: string, type: WatchedEventType): void {
  const valid =
    type === 'IP_ADDRESS'
      ? isIpAddress(target)
      : type === 'EMAILADDR'
        ? /^[^@\s]+@[^@\s]+$/.test(target)
        : isValidDomain(target);
  if (!valid) {
    throw new Error(`Invalid ${type} target: ${target}`);
  }
}

export const scanCommand = new Command('scan')
  .description('Seed the connector with one target and print everything it discovers')
  .requiredOption('-t, --target <value>', 'Domain, hostname, IP address or email address')
  .option('--type <eventType>', `Seed event type: ${WATCHED_EVENT_TYPES.join('|')}`)
  .option('-k, --api-key <key>', 'Zetalytics API key (default: $ZETALYTICS_API_KEY)')
  .option('--no-verify', 'Do not require discovered hostnames to resolve')
  .option('--timeout <ms>', 'Request timeout in milliseconds', parsePositiveInt)
  .option('--base-url <url>', 'API base URL')
  .option('--alias <names...>', 'Other names that belong to the target', [])
  .option('--recurse', 'Feed discoveries back into the connector', false)
  .option('--max-events <n>', 'Stop after this many events', parsePositiveInt)
  .option('-f, --format <type>', 'Output format: text|json', 'text')
  .option('-e, --export <file>', 'Export results to file')
  .option('-q, --quiet', 'Suppress logs', false)
  .option('--debug', 'Verbose logs', false)
  .action(async (options: ScanOptions, command: Command) => {
    try {
      if (options.format !== 'text' && options.format !== 'json') {
        throw new InvalidArgumentError(`Invalid format: ${options.format}. Use text or json.`);
      }
      const format: OutputFormat = options.format;

      const target = options.target.trim();
      let seedType: WatchedEventType;
      if (options.type === undefined) {
        seedType = seedEventType(target);
      } else if (isWatchedEventType(options.type)) {
        seedType = options.type;
      } else {
        throw new InvalidArgumentError(
          `Invalid type: ${options.type}. Use one of ${WATCHED_EVENT_TYPES.join(', ')}.`
        );
      }
      validateTarget(target, seedType);

      logger.setQuiet(options.quiet);
      logger.setLevel(options.debug ? 'debug' : 'info');

      const config = loadConfig({
        apiKey: options.apiKey,
        // --no-verify only overrides ZETALYTICS_VERIFY when given
        verify: command.getOptionValueSource('verify') === 'cli' ? options.verify : undefined,
        timeout: options.timeout,
        baseUrl: options.baseUrl,
      });

      if (!options.quiet) {
        console.error(
          chalk.bold('   Target') +
            chalk.gray(' ──▶ ') +
            chalk.cyan.bold(target) +
            chalk.gray(` (${seedType})\n`)
        );
      }

      const controller = new AbortController();
      const onInterrupt = () => {
        logger.warn('Interrupted, finishing the current query');
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      const app = new App({
        target,
        type: seedType,
        aliases: options.alias,
        recurse: options.recurse,
        maxEvents: options.maxEvents,
        connector: config,
        signal: controller.signal,
        onEvent: (event) => {
          if (format === 'text') {
            console.log(formatEventLine(event));
          }
        },
      });

      let result: RunResult;
      try {
        result = await app.run();
      } finally {
        process.off('SIGINT', onInterrupt);
      }

      const records = result.events.map(toEventRecord);
      if (format === 'json') {
        console.log(JSON.stringify(records, null, 2));
      }

      if (options.export) {
        await writeFile(options.export, JSON.stringify(records, null, 2), 'utf-8');
        logger.info(`Results exported to: ${options.export}`);
      }

      if (result.state === 'error') {
        process.exitCode = 1;
      }

      if (!options.quiet) {
        console.error(
          chalk.green.bold(`\n   ✔ ${result.events.length} events`) +
            chalk.gray(` from ${result.published} published\n`)
        );
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red.bold('\n   ✘ Scan failed\n'));
        console.error(chalk.red('   Error: ') + chalk.white(error.message));
      }
      process.exitCode = 1;
    }
  });
