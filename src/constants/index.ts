/**
 * Shared constants for modpin
 * Single source of truth for directory names, file patterns and the
 * fixed strings of the module addressing schemes.
 */

export const DIR_PATTERNS = {
  MODPIN: '.modpin'
} as const;

export const FILE_PATTERNS = {
  CONFIG_FILES: ['config.jsonc', 'config.json'],
  LOCKFILE: 'modpin.lock.yaml',
  NETRC: '.netrc'
} as const;

export const MODPIN_DIRS = {
  CACHE: 'cache',
  MODULES: 'modules'
} as const;

/**
 * Sidecar files stored next to each extracted cache entry.
 */
export const SIDECAR_EXTENSIONS = {
  HASH: '.hash',
  URL: '.url',
  REV: '.rev'
} as const;

export const STAGING_PREFIX = '.staging-';

/** Held beside an entry while it is committed */
export const LOCK_EXTENSION = '.lock';

/** Every commit-snapshot version starts with this literal */
export const SNAPSHOT_PREFIX = 'v0.0.0-';

export const INCOMPATIBLE_SUFFIX = '+incompatible';

export const FULL_COMMIT_HASH_LENGTH = 40;

/** Escape marker placed before each uppercase letter of an escaped module path */
export const CASE_ESCAPE_MARKER = '!';

export const ARCHIVE_EXTENSION = '.zip';
export const INFO_EXTENSION = '.info';

export const DEFAULT_VCS_HOSTS = ['github.com'] as const;

export const LOCKFILE_SCHEMA_VERSION = 1;

export const DEFAULTS = {
  REQUEST_TIMEOUT_MS: 60_000,
  CONCURRENCY: 4,
  LOCK_STALE_MS: 10 * 60_000,
  LOCK_RETRY_MS: 25
} as const;

export const ENV_VARS = {
  PROXY: 'MODPIN_PROXY',
  PRIVATE: 'MODPIN_PRIVATE',
  NOPROXY: 'MODPIN_NOPROXY',
  CACHE_DIR: 'MODPIN_CACHE_DIR',
  REGISTRY_TOOL: 'MODPIN_REGISTRY_TOOL',
  NETRC: 'NETRC'
} as const;

/** Proxy values that turn the shared proxy off */
export const PROXY_DISABLED_VALUES = ['direct', 'off'] as const;

export type SidecarExtension = typeof SIDECAR_EXTENSIONS[keyof typeof SIDECAR_EXTENSIONS];
