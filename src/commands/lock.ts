import { Command } from 'commander';
import { resolve } from 'path';
import { Lockfile, PackageRef } from '../types/index.js';
import { configManager } from '../core/config.js';
import { createModuleFetcher } from '../core/fetch/module-fetcher.js';
import { createLockfile, loadLockfile, saveLockfile, getLockfilePath } from '../core/lockfile/lockfile.js';
import { lockModules, lockReplacement, verifyLockfile, VerifyIssue } from '../core/lockfile/lock-pipeline.js';
import { parseRef, formatRef } from '../utils/module-path.js';
import { exists } from '../utils/fs.js';
import { withErrorHandling, errorMessage } from '../utils/errors.js';
import { parseConcurrency } from './fetch.js';

interface LockDirOptions {
  dir: string;
}

interface LockAddOptions extends LockDirOptions {
  toolchain?: string;
  concurrency?: string;
}

async function loadOrCreateLockfile(dir: string, toolchain: string | undefined): Promise<Lockfile> {
  if (await exists(getLockfilePath(dir))) {
    const lockfile = await loadLockfile(dir);
    return toolchain ? { ...lockfile, toolchain } : lockfile;
  }
  return createLockfile(toolchain ?? '');
}

/**
 * `./x`, `../x` and absolute paths are local replacements; anything else is path@version.
 */
export function parseReplacementTarget(input: string): PackageRef | { path: string; local: true } {
  if (input.startsWith('./') || input.startsWith('../') || input.startsWith('/')) {
    return { path: input, local: true };
  }
  return parseRef(input);
}

function formatIssue(issue: VerifyIssue): string {
  if (issue.kind === 'mismatch') {
    return `${issue.path}@${issue.version}: hash mismatch (locked ${issue.expected}, got ${issue.actual})`;
  }
  return `${issue.path}@${issue.version}: ${issue.error}`;
}

export function setupLockCommand(program: Command): void {
  const lock = program
    .command('lock')
    .description('Maintain the modpin.lock.yaml lockfile');

  lock
    .command('add')
    .argument('<modules...>', 'modules to lock, as path@version')
    .description('Fetch modules and record their hashes in the lockfile')
    .option('--dir <dir>', 'directory holding the lockfile', '.')
    .option('--toolchain <version>', 'toolchain version recorded in the lockfile')
    .option('--concurrency <n>', 'maximum parallel downloads')
    .action(
      withErrorHandling(async (modules: string[], options: LockAddOptions) => {
        const dir = resolve(options.dir);
        const refs = modules.map(parseRef);
        const concurrency = parseConcurrency(options.concurrency);
        const lockfile = await loadOrCreateLockfile(dir, options.toolchain);
        const fetcher = createModuleFetcher(await configManager.resolveFetchSettings());

        const result = await lockModules(lockfile, refs, fetcher, concurrency ? { concurrency } : {});
        const path = await saveLockfile(dir, result.lockfile);
        console.log(`Locked ${refs.length - result.failures.length} module(s) in ${path}`);

        for (const failure of result.failures) {
          console.error(`${formatRef(failure.ref)}: ${errorMessage(failure.error)}`);
        }
        if (result.failures.length > 0) {
          throw new Error(`${result.failures.length} module(s) could not be locked`);
        }
      })
    );

  lock
    .command('replace')
    .argument('<old>', 'module path being replaced')
    .argument('<target>', 'replacement, as path@version or a local ./directory')
    .description('Record a module replacement in the lockfile')
    .option('--dir <dir>', 'directory holding the lockfile', '.')
    .action(
      withErrorHandling(async (oldPath: string, targetInput: string, options: LockDirOptions) => {
        const dir = resolve(options.dir);
        const target = parseReplacementTarget(targetInput);
        const lockfile = await loadOrCreateLockfile(dir, undefined);
        const fetcher = createModuleFetcher(await configManager.resolveFetchSettings());

        const updated = await lockReplacement(lockfile, oldPath, target, fetcher);
        const path = await saveLockfile(dir, updated);
        console.log(`Replaced ${oldPath} with ${targetInput} in ${path}`);
      })
    );

  lock
    .command('verify')
    .description('Check locked hashes against the sources')
    .option('--dir <dir>', 'directory holding the lockfile', '.')
    .action(
      withErrorHandling(async (options: LockDirOptions) => {
        const lockfile = await loadLockfile(resolve(options.dir));
        const fetcher = createModuleFetcher(await configManager.resolveFetchSettings());

        const issues = await verifyLockfile(lockfile, fetcher);
        if (issues.length > 0) {
          for (const issue of issues) {
            console.error(formatIssue(issue));
          }
          throw new Error('lockfile verification failed');
        }
        console.log('Lockfile verified');
      })
    );
}
