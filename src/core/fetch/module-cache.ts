import { promises as fs } from 'fs';
import { dirname, join, resolve, sep } from 'path';
import { CacheEntry, PackageRef } from '../../types/index.js';
import { ensureDir, exists, isDirectory, readTextFileIfExists, remove, writeTextFileAtomic } from '../../utils/fs.js';
import { acquireFileLock, FileLockOptions } from '../../utils/file-lock.js';
import { computeCacheKey, formatRef } from '../../utils/module-path.js';
import { logger } from '../../utils/logger.js';
import { FileSystemError, ValidationError, errorMessage } from '../../utils/errors.js';
import { LOCK_EXTENSION, SIDECAR_EXTENSIONS, STAGING_PREFIX, SidecarExtension } from '../../constants/index.js';

/**
 * On-disk cache of extracted modules.
 *
 *   {root}/{escapedPath}@{version}/       extracted tree
 *   {root}/{escapedPath}@{version}.hash   archive hash (presence marks a complete entry)
 *   {root}/{escapedPath}@{version}.url    URL the archive came from
 *   {root}/{escapedPath}@{version}.rev    pinned commit, when one was known
 *   {root}/{escapedPath}@{version}.lock   held while an entry is committed
 *
 * Entries only appear through a rename of a staging directory, and `.hash` is
 * written last while the lock is held, so a reader never sees a half-written
 * entry and a writer never clears one another writer is finishing.
 */

export type CommitOutcome = 'committed' | 'existing';

export type CacheSidecars = Omit<CacheEntry, 'extractedDir'>;

export interface CommitResult {
  outcome: CommitOutcome;
  /** The entry now in the cache; on 'existing', the one another writer committed */
  entry: CacheEntry;
}

export interface ModuleCache {
  readonly root: string;
  entryDir(ref: PackageRef): string;
  lookup(ref: PackageRef): Promise<CacheEntry | null>;
  createStagingDir(): Promise<string>;
  commit(stagingDir: string, ref: PackageRef, sidecars: CacheSidecars): Promise<CommitResult>;
}

function sidecarPath(entryDir: string, extension: SidecarExtension): string {
  return `${entryDir}${extension}`;
}

async function readSidecar(entryDir: string, extension: SidecarExtension): Promise<string | null> {
  const path = sidecarPath(entryDir, extension);
  let content: string | null;
  try {
    content = await readTextFileIfExists(path);
  } catch (error) {
    logger.debug(`Unreadable sidecar ${path}: ${errorMessage(error)}`);
    return null;
  }
  const value = content?.trim();
  return value ? value : null;
}

export function createModuleCache(root: string, lockOptions: FileLockOptions = {}): ModuleCache {
  const resolvedRoot = resolve(root);

  const entryDir = (ref: PackageRef): string => {
    const dir = join(root, computeCacheKey(ref));
    if (!resolve(dir).startsWith(resolvedRoot + sep)) {
      throw new ValidationError(`cache entry for ${formatRef(ref)} falls outside ${root}`, { root, dir });
    }
    return dir;
  };

  const lookup = async (ref: PackageRef): Promise<CacheEntry | null> => {
    const dir = entryDir(ref);
    if (!(await isDirectory(dir))) {
      return null;
    }

    const archiveHash = await readSidecar(dir, SIDECAR_EXTENSIONS.HASH);
    if (!archiveHash) {
      logger.debug(`Cache entry without hash sidecar ignored: ${dir}`);
      return null;
    }

    const sourceUrl = await readSidecar(dir, SIDECAR_EXTENSIONS.URL);
    const pinnedRevision = await readSidecar(dir, SIDECAR_EXTENSIONS.REV);
    return {
      extractedDir: dir,
      archiveHash,
      sourceUrl: sourceUrl ?? '',
      ...(pinnedRevision ? { pinnedRevision } : {})
    };
  };

  const clearSidecar = async (ref: PackageRef, extension: SidecarExtension): Promise<void> => {
    const path = sidecarPath(entryDir(ref), extension);
    try {
      await fs.rm(path, { force: true });
    } catch (error) {
      logger.warn(`SidecarWriteWarning: could not clear ${path} for ${formatRef(ref)}: ${errorMessage(error)}`);
    }
  };

  const writeSidecar = async (ref: PackageRef, extension: SidecarExtension, value: string): Promise<void> => {
    const path = sidecarPath(entryDir(ref), extension);
    try {
      await writeTextFileAtomic(path, `${value}\n`);
    } catch (error) {
      logger.warn(`SidecarWriteWarning: could not write ${path} for ${formatRef(ref)}: ${errorMessage(error)}`);
    }
  };

  return {
    root,

    entryDir,

    lookup,

    async createStagingDir(): Promise<string> {
      await ensureDir(root);
      return fs.mkdtemp(join(root, STAGING_PREFIX));
    },

    async commit(stagingDir: string, ref: PackageRef, sidecars: CacheSidecars): Promise<CommitResult> {
      const target = entryDir(ref);
      await ensureDir(dirname(target));
      const release = await acquireFileLock(`${target}${LOCK_EXTENSION}`, lockOptions);

      try {
        const existing = await lookup(ref);
        if (existing) {
          logger.debug(`Cache entry ${target} already committed, discarding staging copy`);
          await remove(stagingDir);
          return { outcome: 'existing', entry: existing };
        }

        // Anything here now was left by a writer that died before writing .hash
        if (await exists(target)) {
          logger.debug(`Replacing incomplete cache entry ${target}`);
          await remove(target);
        }
        for (const extension of Object.values(SIDECAR_EXTENSIONS)) {
          await clearSidecar(ref, extension);
        }

        try {
          await fs.rename(stagingDir, target);
        } catch (error) {
          await remove(stagingDir);
          throw new FileSystemError(`Failed to commit cache entry: ${target}`, { path: target, error });
        }
        logger.debug(`Committed cache entry ${target}`);

        await writeSidecar(ref, SIDECAR_EXTENSIONS.URL, sidecars.sourceUrl);
        if (sidecars.pinnedRevision) {
          await writeSidecar(ref, SIDECAR_EXTENSIONS.REV, sidecars.pinnedRevision);
        }
        await writeSidecar(ref, SIDECAR_EXTENSIONS.HASH, sidecars.archiveHash);

        return { outcome: 'committed', entry: { extractedDir: target, ...sidecars } };
      } finally {
        await release();
      }
    }
  };
}
