/**
 * Raw endpoint access: print one Zetalytics response as JSON
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config.js';
import { ENDPOINTS, QueryClient, endpointNames, isEndpointName } from '../../zetalytics/client.js';
import { logger } from '../../utils/logger.js';
import { parsePositiveInt } from '../options.js';

interface QueryOptions {
  list: boolean;
  apiKey?: string;
  timeout?: number;
  baseUrl?: string;
}

function listEndpoints(): void {
  console.log(chalk.white('Available endpoints:\n'));
  for (const name of endpointNames()) {
    console.log(`  ${chalk.green(name.padEnd(22))} ${chalk.gray(ENDPOINTS[name].path)}`);
  }
  console.log();
}

export const queryCommand = new Command('query')
  .description('Call one endpoint and print the JSON response')
  .argument('[endpoint]', 'Endpoint name (see --list)')
  .argument('[q]', 'Query value')
  .option('-l, --list', 'List available endpoints', false)
  .option('-k, --api-key <key>', 'Zetalytics API key (default: $ZETALYTICS_API_KEY)')
  .option('--timeout <ms>', 'Request timeout in milliseconds', parsePositiveInt)
  .option('--base-url <url>', 'API base URL')
  .action(async (endpoint: string | undefined, q: string | undefined, options: QueryOptions) => {
    if (options.list || endpoint === undefined) {
      listEndpoints();
      return;
    }

    try {
      if (!isEndpointName(endpoint)) {
        throw new InvalidArgumentError(`Unknown endpoint: ${endpoint}. Use --list.`);
      }
      if (!q) {
        throw new InvalidArgumentError('Missing query value.');
      }

      const config = loadConfig({
        apiKey: options.apiKey,
        timeout: options.timeout,
        baseUrl: options.baseUrl,
      });
      if (config.apiKey === '') {
        throw new Error('No API key: pass --api-key or set ZETALYTICS_API_KEY.');
      }

      const client = new QueryClient(config);
      try {
        const data = await client.query(endpoint, q);
        if (data === null) {
          logger.warn(`No data returned by ${endpoint}`);
          process.exitCode = 1;
          return;
        }
        console.log(JSON.stringify(data, null, 2));
      } finally {
        await client.close();
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red('Error: ') + chalk.white(error.message));
      }
      process.exitCode = 1;
    }
  });
