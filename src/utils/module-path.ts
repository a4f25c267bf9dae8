import { PackageRef } from '../types/index.js';
import { CASE_ESCAPE_MARKER } from '../constants/index.js';
import { ValidationError } from './errors.js';

/**
 * Escape a module path for case-folding proxies and file systems:
 * every uppercase letter becomes the marker followed by its lowercase form.
 */
export function escapePath(path: string): string {
  let result = '';
  for (const char of path) {
    if (char >= 'A' && char <= 'Z') {
      result += CASE_ESCAPE_MARKER + char.toLowerCase();
    } else {
      result += char;
    }
  }
  return result;
}

/**
 * Reverse of escapePath.
 */
export function unescapePath(escaped: string): string {
  let result = '';
  let upperNext = false;
  for (const char of escaped) {
    if (char === CASE_ESCAPE_MARKER) {
      upperNext = true;
      continue;
    }
    result += upperNext ? char.toUpperCase() : char;
    upperNext = false;
  }
  return result;
}

const PATH_SEGMENT_SAFE = /^[A-Za-z0-9\-_.~$&+:=@]$/;

/**
 * Path-escape a version for use as a single URL path segment. Sub-delimiters
 * such as `+`, `=` and `@` stay literal; `/ ; , ?` and everything outside the
 * URL-safe set become %XX escapes of their UTF-8 bytes.
 */
export function escapeVersion(version: string): string {
  let result = '';
  for (const byte of Buffer.from(version, 'utf8')) {
    const char = String.fromCharCode(byte);
    result += byte < 0x80 && PATH_SEGMENT_SAFE.test(char)
      ? char
      : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return result;
}

/**
 * First segment of a module path.
 */
export function extractHost(path: string): string {
  const slash = path.indexOf('/');
  return slash === -1 ? path : path.slice(0, slash);
}

export function formatRef(ref: PackageRef): string {
  return `${ref.path}@${ref.version}`;
}

/**
 * Why a ref cannot name a cache entry, or null when it can. Paths are
 * slash-separated segments with no empty, `.` or `..` segment; versions stay
 * within one file name.
 */
export function findRefProblem(ref: PackageRef): string | null {
  if (!ref.path) {
    return 'empty module path';
  }
  if (/[\\\0]/.test(ref.path)) {
    return 'module path contains a backslash or NUL';
  }
  if (ref.path.split('/').some(segment => segment === '' || segment === '.' || segment === '..')) {
    return 'module path has an empty, "." or ".." segment';
  }
  if (!ref.version) {
    return 'empty version';
  }
  if (/[\/\\\0]/.test(ref.version) || ref.version.includes('..')) {
    return 'version contains a slash, backslash, ".." or NUL';
  }
  return null;
}

export function validateRef(ref: PackageRef): void {
  const problem = findRefProblem(ref);
  if (problem) {
    throw new ValidationError(`${problem}: '${formatRef(ref)}'`, { path: ref.path, version: ref.version });
  }
}

/**
 * Cache key of a module: escaped path, "@", version.
 */
export function computeCacheKey(ref: PackageRef): string {
  validateRef(ref);
  return `${escapePath(ref.path)}@${ref.version}`;
}

/**
 * Parse "path@version" as typed on the command line.
 */
export function parseRef(input: string): PackageRef {
  const at = input.lastIndexOf('@');
  if (at <= 0 || at === input.length - 1) {
    throw new ValidationError(`Expected <path>@<version>, got '${input}'`);
  }
  const ref = { path: input.slice(0, at), version: input.slice(at + 1) };
  validateRef(ref);
  return ref;
}
