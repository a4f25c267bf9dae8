import { FetchResult, Lockfile, LockedModule, LockedReplacement, PackageRef } from '../../types/index.js';
import { ModuleFetcher, FetchFailure } from '../fetch/module-fetcher.js';
import { isLocalReplacement } from './lockfile.js';
import { formatRef } from '../../utils/module-path.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Operations that turn fetch results into lockfile entries and check
 * existing entries against what the sources serve today.
 */

export interface LockOptions {
  concurrency?: number;
  failFast?: boolean;
}

export interface LockResult {
  lockfile: Lockfile;
  failures: FetchFailure[];
}

export type VerifyIssue =
  | { kind: 'mismatch'; path: string; version: string; expected: string; actual: string }
  | { kind: 'failed'; path: string; version: string; error: string };

function toLockedModule(result: FetchResult): LockedModule {
  return {
    version: result.version,
    hash: result.archiveHash,
    ...(result.sourceUrl ? { url: result.sourceUrl } : {}),
    ...(result.pinnedRevision ? { rev: result.pinnedRevision } : {})
  };
}

/**
 * Fetch every ref and record it under `modules`. Failed refs are reported and
 * leave any existing entry untouched.
 */
export async function lockModules(
  lockfile: Lockfile,
  refs: readonly PackageRef[],
  fetcher: ModuleFetcher,
  options: LockOptions = {}
): Promise<LockResult> {
  const { fetched, failures } = await fetcher.fetchAll(refs, options);
  const modules = { ...lockfile.modules };

  for (const result of fetched) {
    modules[result.path] = toLockedModule(result);
    logger.debug(`Locked ${result.path}@${result.version}`, { hash: result.archiveHash });
  }

  return { lockfile: { ...lockfile, modules }, failures };
}

/**
 * Record a replacement of `oldPath`, either by another remote module (which is
 * fetched and hashed) or by a local directory.
 */
export async function lockReplacement(
  lockfile: Lockfile,
  oldPath: string,
  target: PackageRef | { path: string; local: true },
  fetcher: ModuleFetcher
): Promise<Lockfile> {
  let replacement: LockedReplacement;

  if ('local' in target) {
    replacement = { path: target.path };
  } else {
    const result = await fetcher.fetch(target);
    const locked = lockfile.modules[oldPath];
    replacement = {
      old: oldPath,
      ...(locked ? { oldVersion: locked.version } : {}),
      new: target.path,
      ...toLockedModule(result)
    };
  }

  return { ...lockfile, replace: { ...lockfile.replace, [oldPath]: replacement } };
}

/**
 * Re-fetch every locked module (the cache answers when it can) and compare
 * archive hashes. Local replacements are skipped.
 */
export async function verifyLockfile(
  lockfile: Lockfile,
  fetcher: ModuleFetcher,
  options: LockOptions = {}
): Promise<VerifyIssue[]> {
  const expected: Array<{ ref: PackageRef; hash: string }> = [];

  for (const [path, locked] of Object.entries(lockfile.modules)) {
    expected.push({ ref: { path, version: locked.version }, hash: locked.hash });
  }
  for (const replacement of Object.values(lockfile.replace)) {
    if (isLocalReplacement(replacement)) continue;
    expected.push({ ref: { path: replacement.new, version: replacement.version }, hash: replacement.hash });
  }

  const { fetched, failures } = await fetcher.fetchAll(expected.map(entry => entry.ref), options);
  const issues: VerifyIssue[] = [];

  for (const failure of failures) {
    issues.push({
      kind: 'failed',
      path: failure.ref.path,
      version: failure.ref.version,
      error: errorMessage(failure.error)
    });
  }

  for (const result of fetched) {
    const entry = expected.find(item => item.ref.path === result.path && item.ref.version === result.version);
    if (entry && entry.hash !== result.archiveHash) {
      logger.warn(`Hash mismatch for ${formatRef(entry.ref)}`, { expected: entry.hash, actual: result.archiveHash });
      issues.push({
        kind: 'mismatch',
        path: result.path,
        version: result.version,
        expected: entry.hash,
        actual: result.archiveHash
      });
    }
  }

  return issues.sort((a, b) => a.path.localeCompare(b.path));
}
