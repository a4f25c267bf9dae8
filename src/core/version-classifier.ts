import * as semver from 'semver';
import { VersionClass } from '../types/index.js';
import { SNAPSHOT_PREFIX, INCOMPATIBLE_SUFFIX, FULL_COMMIT_HASH_LENGTH } from '../constants/index.js';

/**
 * Classify a module version string.
 *
 * Anything starting with the snapshot prefix is a commit snapshot, whatever
 * else it carries. Everything else is a tag, flagged as pre-release and/or
 * incompatible-major where the string says so. Never throws: malformed input
 * comes back as a tag and fails later, at download time.
 */
export function classifyVersion(version: string): VersionClass {
  if (version.startsWith(SNAPSHOT_PREFIX)) {
    return parseSnapshot(version);
  }

  return {
    kind: 'tagged',
    name: version,
    prerelease: isPrereleaseTag(version),
    incompatible: version.endsWith(INCOMPATIBLE_SUFFIX)
  };
}

function parseSnapshot(version: string): VersionClass {
  const lastHyphen = version.lastIndexOf('-');
  const commitPrefix = version.slice(lastHyphen + 1);

  // v0.0.0-20231201120000-abcdef123456, or with a pre-release base such as
  // v0.0.0-rc.0.20231201120000-abcdef123456
  let timestamp = '';
  if (lastHyphen > SNAPSHOT_PREFIX.length - 1) {
    const middle = version.slice(SNAPSHOT_PREFIX.length, lastHyphen);
    const lastDot = middle.lastIndexOf('.');
    timestamp = lastDot === -1 ? middle : middle.slice(lastDot + 1);
  }

  return {
    kind: 'snapshot',
    timestamp,
    commitPrefix: stripBuildMetadata(commitPrefix)
  };
}

function isPrereleaseTag(version: string): boolean {
  const bare = stripBuildMetadata(version.startsWith('v') ? version.slice(1) : version);
  const parsed = semver.parse(bare);
  if (!parsed) {
    return false;
  }
  return parsed.prerelease.length > 0;
}

function stripBuildMetadata(version: string): string {
  const plus = version.indexOf('+');
  return plus === -1 ? version : version.slice(0, plus);
}

export function isSnapshot(version: string): boolean {
  return version.startsWith(SNAPSHOT_PREFIX);
}

/**
 * True for a complete, untruncated commit hash.
 */
export function isFullCommitHash(hash: string | undefined): hash is string {
  return hash !== undefined
    && hash.length === FULL_COMMIT_HASH_LENGTH
    && /^[0-9a-f]+$/i.test(hash);
}
