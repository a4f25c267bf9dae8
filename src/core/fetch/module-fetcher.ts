import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  FetchOptions,
  FetchResult,
  FetchSettings,
  PackageRef,
  ResolvedSources,
  SourceCandidate
} from '../../types/index.js';
import { HttpTransport, createFetchTransport } from './http-transport.js';
import { ModuleCache, createModuleCache } from './module-cache.js';
import { extractZipArchive } from './archive-extractor.js';
import { SourceResolver, createSourceResolver } from '../source-resolution/source-resolver.js';
import { CredentialStore, loadCredentialStore } from '../credential-store.js';
import { isFullCommitHash } from '../version-classifier.js';
import { computeArchiveHash } from '../hash/archive-hash.js';
import { computeTreeHash } from '../hash/tree-hash.js';
import { runWithConcurrency } from '../../utils/concurrency-pool.js';
import { computeCacheKey, formatRef } from '../../utils/module-path.js';
import { remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { ResolutionError, TransferError, errorMessage } from '../../utils/errors.js';
import { ENV_VARS } from '../../constants/index.js';

export interface ModuleFetcherDeps {
  transport?: HttpTransport;
  /** Defaults to the credential file named in the settings, read on first private fetch */
  credentials?: CredentialStore;
  resolver?: SourceResolver;
  cache?: ModuleCache;
}

export interface FetchAllOptions extends FetchOptions {
  concurrency?: number;
  failFast?: boolean;
}

export interface FetchFailure {
  ref: PackageRef;
  error: Error;
}

export interface FetchAllResult {
  fetched: FetchResult[];
  failures: FetchFailure[];
}

export interface ModuleFetcher {
  readonly cache: ModuleCache;
  fetch(ref: PackageRef, options?: FetchOptions): Promise<FetchResult>;
  fetchAll(refs: readonly PackageRef[], options?: FetchAllOptions): Promise<FetchAllResult>;
}

interface DownloadedArchive {
  bytes: Uint8Array;
  candidate: SourceCandidate;
}

type StoredModule = Omit<FetchResult, 'treeHash'>;

/**
 * Fetch orchestration: cache lookup, source resolution, download with
 * fallback across candidates, hashing, extraction and the atomic commit into
 * the cache.
 */
export function createModuleFetcher(settings: FetchSettings, deps: ModuleFetcherDeps = {}): ModuleFetcher {
  const transport = deps.transport ?? createFetchTransport();
  const resolver = deps.resolver ?? createSourceResolver(settings, { transport });
  const cache = deps.cache ?? createModuleCache(settings.cacheDir);
  const inFlight = new Map<string, Promise<StoredModule>>();

  let credentialStore: Promise<CredentialStore> | null = deps.credentials
    ? Promise.resolve(deps.credentials)
    : null;
  const getCredentials = (): Promise<CredentialStore> => {
    credentialStore ??= loadCredentialStore(settings.netrcPath);
    return credentialStore;
  };

  const download = async (resolved: ResolvedSources): Promise<DownloadedArchive> => {
    const { ref } = resolved;
    const store = resolved.isPrivate ? await getCredentials() : null;
    let lastError: TransferError | null = null;

    for (const candidate of resolved.candidates) {
      const credentials = store?.lookup(candidate.authHost) ?? null;
      logger.debug(`Trying ${candidate.kind} for ${formatRef(ref)}: ${candidate.url}`, {
        authenticated: credentials !== null
      });

      try {
        const response = await transport.get(candidate.url, {
          credentials,
          timeoutMs: settings.requestTimeoutMs
        });
        if (response.status === 200) {
          return { bytes: response.body, candidate };
        }
        lastError = new TransferError(
          `${candidate.kind} download returned HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
          { strategy: candidate.kind, url: candidate.url, status: response.status }
        );
      } catch (error) {
        lastError = new TransferError(
          `${candidate.kind} download failed: ${errorMessage(error)}`,
          { strategy: candidate.kind, url: candidate.url },
          { cause: error }
        );
      }
      logger.debug(`${formatRef(ref)}: ${lastError.message}`, { url: candidate.url });
    }

    if (!lastError) {
      throw new ResolutionError(ref, 'no download candidates');
    }

    const hint = resolved.isPrivate
      ? ` (private module: check ${ENV_VARS.PRIVATE} and the credentials for ${lastError.url} in ${settings.netrcPath})`
      : '';
    throw new TransferError(
      `Failed to fetch ${formatRef(ref)} via ${lastError.strategy} ${lastError.url}: ${lastError.message}${hint}`,
      { strategy: lastError.strategy, url: lastError.url, status: lastError.status },
      { cause: lastError }
    );
  };

  const store = async (ref: PackageRef, archive: DownloadedArchive, resolved: ResolvedSources): Promise<StoredModule> => {
    const archiveHash = await computeArchiveHash(archive.bytes);
    const tempDir = await fs.mkdtemp(join(tmpdir(), 'modpin-'));
    const stagingDir = await cache.createStagingDir();

    try {
      const archivePath = join(tempDir, 'module.zip');
      await fs.writeFile(archivePath, archive.bytes, { mode: 0o600 });
      await extractZipArchive(archivePath, stagingDir, `${ref.path}@${ref.version}/`);
    } catch (error) {
      await remove(stagingDir);
      throw error;
    } finally {
      await remove(tempDir);
    }

    const pinnedCommit = archive.candidate.kind === 'vcs-pinned-commit'
      ? archive.candidate.pinnedCommit
      : resolved.origin?.commitHash;
    const { outcome, entry } = await cache.commit(stagingDir, ref, {
      archiveHash,
      sourceUrl: archive.candidate.url,
      ...(isFullCommitHash(pinnedCommit) ? { pinnedRevision: pinnedCommit } : {})
    });

    if (outcome === 'existing') {
      logger.debug(`Another writer committed ${formatRef(ref)} first; using its entry`, { url: entry.sourceUrl });
    }
    return { ...entry, path: ref.path, version: ref.version, fromCache: outcome === 'existing' };
  };

  const fetchStored = async (ref: PackageRef): Promise<StoredModule> => {
    const cached = await cache.lookup(ref);
    if (cached) {
      logger.debug(`Cache hit for ${formatRef(ref)}`);
      return { ...cached, path: ref.path, version: ref.version, fromCache: true };
    }

    const resolved = await resolver.resolve(ref);
    const archive = await download(resolved);
    const stored = await store(ref, archive, resolved);
    logger.info(`Fetched ${formatRef(ref)} from ${archive.candidate.kind}`, { url: stored.sourceUrl, hash: stored.archiveHash });
    return stored;
  };

  const fetch = async (ref: PackageRef, options: FetchOptions = {}): Promise<FetchResult> => {
    const key = computeCacheKey(ref);
    let pending = inFlight.get(key);
    if (!pending) {
      pending = fetchStored(ref).finally(() => inFlight.delete(key));
      inFlight.set(key, pending);
    }

    const stored = await pending;
    if (!options.computeTreeHash) {
      return { ...stored };
    }
    return { ...stored, treeHash: await computeTreeHash(stored.extractedDir) };
  };

  return {
    cache,

    fetch,

    async fetchAll(refs: readonly PackageRef[], options: FetchAllOptions = {}): Promise<FetchAllResult> {
      const tasks = refs.map(ref => () => fetch(ref, options));
      const run = await runWithConcurrency(tasks, options.concurrency ?? settings.concurrency, {
        failFast: options.failFast
      });

      const outcome: FetchAllResult = { fetched: [], failures: [] };
      for (const entry of run.results) {
        if (entry.status === 'fulfilled') {
          outcome.fetched.push(entry.value);
        } else {
          outcome.failures.push({ ref: refs[entry.index], error: entry.error });
        }
      }
      return outcome;
    }
  };
}
