#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';

import { setupFetchCommand } from './commands/fetch.js';
import { setupLockCommand } from './commands/lock.js';
import { setupHashCommand } from './commands/hash.js';

/**
 * modpin CLI - Main entry point
 *
 * Pins module dependencies to content hashes and keeps a local cache of
 * their extracted archives.
 */

const program = new Command();

program
  .name('modpin')
  .description('modpin - content-addressed module fetching and locking')
  .version(getVersion())
  .option('--verbose', 'print debug logging')
  .configureHelp({ sortSubcommands: true });

setupFetchCommand(program);
setupLockCommand(program);
setupHashCommand(program);

program.hook('preAction', () => {
  const opts = program.opts<{ verbose?: boolean }>();
  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Working directory: ${process.cwd()}`);
});

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

run().catch((error: unknown) => {
  logger.error('Fatal error in main execution', { error });
  console.error('Fatal error occurred. Exiting.');
  process.exit(1);
});

export { program };
