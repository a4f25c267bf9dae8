/**
 * modpin library entry point. The command-line tool lives in cli.ts.
 */

export * from './types/index.js';
export * from './utils/errors.js';
export { logger } from './utils/logger.js';
export {
  escapePath,
  unescapePath,
  escapeVersion,
  computeCacheKey,
  formatRef,
  parseRef,
  findRefProblem,
  validateRef
} from './utils/module-path.js';
export { acquireFileLock, type FileLockOptions, type ReleaseLock } from './utils/file-lock.js';
export { runWithConcurrency } from './utils/concurrency-pool.js';

export { classifyVersion, isSnapshot, isFullCommitHash } from './core/version-classifier.js';
export { isPrivateModule, matchesPrivatePattern } from './core/privacy-matcher.js';
export { CredentialStore, parseCredentials, loadCredentialStore } from './core/credential-store.js';
export { ConfigManager, configManager, normalizeProxy } from './core/config.js';
export { getModpinDirectories } from './core/directory.js';

export {
  createSourceResolver,
  buildProxyUrl,
  buildRegistryPathUrl,
  buildArchiveUrl,
  type SourceResolver,
  type SourceResolverDeps
} from './core/source-resolution/source-resolver.js';
export {
  createProxyInfoProvider,
  createRegistryToolProvider,
  createVersionInferenceProvider,
  type OriginProvider
} from './core/source-resolution/origin-providers.js';

export { createFetchTransport, type HttpTransport, type HttpResponse, type HttpGetOptions } from './core/fetch/http-transport.js';
export {
  createModuleCache,
  type ModuleCache,
  type CommitOutcome,
  type CommitResult,
  type CacheSidecars
} from './core/fetch/module-cache.js';
export { extractZipArchive } from './core/fetch/archive-extractor.js';
export {
  createModuleFetcher,
  type ModuleFetcher,
  type ModuleFetcherDeps,
  type FetchAllOptions,
  type FetchAllResult
} from './core/fetch/module-fetcher.js';

export { computeArchiveHash, computeArchiveFileHash } from './core/hash/archive-hash.js';
export { computeTreeHash, writeNar } from './core/hash/tree-hash.js';
export { encodeSri, parseSri, validateSri, isValidSri } from './core/hash/sri.js';

export { createLockfile, loadLockfile, saveLockfile, parseLockfile, serializeLockfile } from './core/lockfile/lockfile.js';
export { lockModules, lockReplacement, verifyLockfile, type VerifyIssue } from './core/lockfile/lock-pipeline.js';
