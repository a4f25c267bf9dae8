import { promises as fs } from 'fs';
import { dirname } from 'path';
import { setTimeout as sleep } from 'timers/promises';
import { ensureDir, isNodeError } from './fs.js';
import { FileSystemError } from './errors.js';
import { logger } from './logger.js';
import { DEFAULTS } from '../constants/index.js';

export interface FileLockOptions {
  /** A lock file older than this is left over from a dead writer */
  staleMs?: number;
  retryMs?: number;
}

export type ReleaseLock = () => Promise<void>;

async function isStaleLock(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const stats = await fs.stat(lockPath);
    return Date.now() - stats.mtimeMs > staleMs;
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return false;
    }
    throw new FileSystemError(`Failed to inspect lock file: ${lockPath}`, { path: lockPath, error });
  }
}

/**
 * Take an exclusive lock by creating `lockPath`, waiting while another holder
 * has it. Works across processes sharing one file system.
 */
export async function acquireFileLock(lockPath: string, options: FileLockOptions = {}): Promise<ReleaseLock> {
  const staleMs = options.staleMs ?? DEFAULTS.LOCK_STALE_MS;
  const retryMs = options.retryMs ?? DEFAULTS.LOCK_RETRY_MS;
  await ensureDir(dirname(lockPath));

  for (;;) {
    try {
      const handle = await fs.open(lockPath, 'wx');
      try {
        await handle.writeFile(`${process.pid}\n${Date.now()}\n`, 'utf8');
      } finally {
        await handle.close();
      }
      return async () => {
        await fs.rm(lockPath, { force: true });
      };
    } catch (error) {
      if (!isNodeError(error) || error.code !== 'EEXIST') {
        throw new FileSystemError(`Failed to create lock file: ${lockPath}`, { path: lockPath, error });
      }
    }

    if (await isStaleLock(lockPath, staleMs)) {
      logger.warn(`Removing stale lock: ${lockPath}`);
      await fs.rm(lockPath, { force: true });
      continue;
    }
    await sleep(retryMs);
  }
}
