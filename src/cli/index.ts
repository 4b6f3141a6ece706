#!/usr/bin/env node

/**
 * zeta-recon CLI entry point
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { scanCommand } from './commands/scan.js';
import { queryCommand } from './commands/query.js';
import { VERSION } from '../core/config.js';

const program = new Command();

program
  .name('zeta-recon')
  .description('Passive DNS and WHOIS discovery against the Zetalytics database')
  .version(VERSION);

const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════════════════╗')}
${chalk.cyan('║')}  ${chalk.bold.white('ZETA-RECON')} ${chalk.gray(`v${VERSION}`)}                                   ${chalk.cyan('║')}
${chalk.cyan('║')}  ${chalk.gray('Passive DNS & WHOIS connector')}                            ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════════════════╝')}
`;

program.addHelpText('beforeAll', banner);

program.addCommand(scanCommand);
program.addCommand(queryCommand);

program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  if (error instanceof Error) {
    console.error(chalk.red(`\n❌ Error: ${error.message}\n`));
    process.exit(1);
  }
  throw error;
}
