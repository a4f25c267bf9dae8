import { Command } from 'commander';
import { FetchResult } from '../types/index.js';
import { configManager } from '../core/config.js';
import { createModuleFetcher } from '../core/fetch/module-fetcher.js';
import { parseRef, formatRef } from '../utils/module-path.js';
import { withErrorHandling, errorMessage, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

interface FetchCommandOptions {
  treeHash?: boolean;
  concurrency?: string;
}

export function parseConcurrency(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`--concurrency must be a positive integer, got '${value}'`);
  }
  return parsed;
}

function formatFetchLine(result: FetchResult): string {
  const parts = [`${result.path}@${result.version}`, result.archiveHash];
  if (result.treeHash) {
    parts.push(result.treeHash);
  }
  parts.push(result.extractedDir);
  if (result.fromCache) {
    parts.push('(cached)');
  }
  return parts.join('  ');
}

export function setupFetchCommand(program: Command): void {
  program
    .command('fetch')
    .argument('<modules...>', 'modules to fetch, as path@version')
    .description('Download modules into the local cache and print their hashes')
    .option('--tree-hash', 'also print the tree hash of each extracted module')
    .option('--concurrency <n>', 'maximum parallel downloads')
    .action(
      withErrorHandling(async (modules: string[], options: FetchCommandOptions) => {
        const refs = modules.map(parseRef);
        const concurrency = parseConcurrency(options.concurrency);
        const settings = await configManager.resolveFetchSettings();
        const fetcher = createModuleFetcher(settings);

        logger.debug(`Fetching ${refs.length} module(s)`, { cacheDir: settings.cacheDir });
        const { fetched, failures } = await fetcher.fetchAll(refs, {
          computeTreeHash: options.treeHash === true,
          ...(concurrency ? { concurrency } : {})
        });

        for (const result of fetched) {
          console.log(formatFetchLine(result));
        }
        for (const failure of failures) {
          console.error(`${formatRef(failure.ref)}: ${errorMessage(failure.error)}`);
        }
        if (failures.length > 0) {
          throw new Error(`${failures.length} of ${refs.length} module(s) failed to fetch`);
        }
      })
    );
}
