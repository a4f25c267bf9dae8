/**
 * Common types and interfaces for modpin
 */

// Core application types
export interface ModpinDirectories {
  config: string;
  cache: string;
}

export interface RegistryToolConfig {
  command: string;
  args?: string[];
}

/**
 * Shape of config.jsonc. Every key is optional; environment variables
 * override whatever the file sets.
 */
export interface ModpinConfig {
  proxy?: string;
  private?: string;
  cacheDir?: string;
  netrcPath?: string;
  requestTimeoutMs?: number;
  concurrency?: number;
  vcsHosts?: string[];
  registryTool?: RegistryToolConfig;
}

/**
 * Fully resolved settings the fetch engine runs with.
 */
export interface FetchSettings {
  /** Base URL of the shared caching proxy, or null for direct routing */
  proxy: string | null;
  /** Comma-separated private module patterns */
  privatePatterns: string;
  cacheDir: string;
  netrcPath: string;
  requestTimeoutMs: number;
  concurrency: number;
  vcsHosts: readonly string[];
  registryTool: RegistryToolConfig | null;
}

// Module identity
export interface PackageRef {
  readonly path: string;
  readonly version: string;
}

export type VersionClass =
  | {
      kind: 'snapshot';
      /** 14-digit UTC timestamp embedded in the version */
      timestamp: string;
      /** Abbreviated commit hash, usually 12 hex characters */
      commitPrefix: string;
    }
  | {
      kind: 'tagged';
      name: string;
      prerelease: boolean;
      incompatible: boolean;
    };

/**
 * Provenance of a module on its version-control host.
 */
export interface ModuleOrigin {
  vcs: string;
  repoUrl: string;
  ref?: string;
  commitHash?: string;
}

// Download strategies
export type SourceKind = 'proxy' | 'vcs-archive' | 'vcs-pinned-commit' | 'registry-path';

interface SourceCandidateBase {
  url: string;
  /** Host whose credentials apply to this download */
  authHost: string;
}

export type SourceCandidate =
  | (SourceCandidateBase & { kind: 'proxy' })
  | (SourceCandidateBase & { kind: 'vcs-archive' })
  | (SourceCandidateBase & { kind: 'vcs-pinned-commit'; pinnedCommit: string })
  | (SourceCandidateBase & { kind: 'registry-path' });

export interface ResolvedSources {
  ref: PackageRef;
  isPrivate: boolean;
  candidates: SourceCandidate[];
  origin?: ModuleOrigin;
}

// Cache and fetch results
export interface CacheEntry {
  extractedDir: string;
  archiveHash: string;
  sourceUrl: string;
  pinnedRevision?: string;
}

export interface FetchResult extends CacheEntry {
  path: string;
  version: string;
  fromCache: boolean;
  treeHash?: string;
}

export interface FetchOptions {
  /** Also compute the tree hash of the extracted directory */
  computeTreeHash?: boolean;
}

// Credentials
export interface CredentialEntry {
  /** Empty for the default entry */
  host: string;
  login: string;
  secret: string;
}

// Lockfile types
export interface LockedModule {
  version: string;
  hash: string;
  url?: string;
  rev?: string;
}

export interface RemoteReplacement {
  old?: string;
  oldVersion?: string;
  new: string;
  version: string;
  hash: string;
  url?: string;
  rev?: string;
}

export interface LocalReplacement {
  path: string;
}

export type LockedReplacement = RemoteReplacement | LocalReplacement;

export interface Lockfile {
  schema: number;
  toolchain: string;
  modules: Record<string, LockedModule>;
  replace: Record<string, LockedReplacement>;
}

// Command and operation results
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class ModpinError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ModpinError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  PARSE_ERROR = 'PARSE_ERROR',
  RESOLUTION_ERROR = 'RESOLUTION_ERROR',
  TRANSFER_ERROR = 'TRANSFER_ERROR',
  EXTRACTION_ERROR = 'EXTRACTION_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
