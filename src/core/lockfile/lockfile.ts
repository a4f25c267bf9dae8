import * as yaml from 'js-yaml';
import { join } from 'path';
import {
  Lockfile,
  LockedModule,
  LockedReplacement,
  RemoteReplacement
} from '../../types/index.js';
import { readTextFile, writeTextFileAtomic } from '../../utils/fs.js';
import { ParseError, errorMessage } from '../../utils/errors.js';
import { isValidSri } from '../hash/sri.js';
import { findRefProblem } from '../../utils/module-path.js';
import { FILE_PATTERNS, LOCKFILE_SCHEMA_VERSION } from '../../constants/index.js';

/**
 * modpin.lock.yaml
 *
 *   schema: 1
 *   toolchain: "1.22"
 *   modules:
 *     github.com/org/lib: { version: v1.2.3, hash: sha256-..., url: ..., rev: ... }
 *   replace:
 *     github.com/org/old: { new: github.com/fork/old, version: v1.0.1, hash: sha256-... }
 *     github.com/org/dev: { path: ../dev }
 */

export function createLockfile(toolchain: string): Lockfile {
  return {
    schema: LOCKFILE_SCHEMA_VERSION,
    toolchain,
    modules: {},
    replace: {}
  };
}

export function getLockfilePath(dir: string): string {
  return join(dir, FILE_PATTERNS.LOCKFILE);
}

export function isLocalReplacement(replacement: LockedReplacement): replacement is { path: string } {
  return 'path' in replacement;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== 'string' || value === '') {
    throw new ParseError(`${where}: '${key}' must be a non-empty string`);
  }
  return value;
}

function optionalString(record: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ParseError(`${where}: '${key}' must be a string`);
  }
  return value;
}

function requireHash(record: Record<string, unknown>, where: string): string {
  const hash = requireString(record, 'hash', where);
  if (!isValidSri(hash)) {
    throw new ParseError(`${where}: invalid hash '${hash}'`);
  }
  return hash;
}

function requireSafeRef(path: string, version: string, where: string): void {
  const problem = findRefProblem({ path, version });
  if (problem) {
    throw new ParseError(`${where}: ${problem}`);
  }
}

function parseModule(path: string, value: unknown): LockedModule {
  const where = `modules.${path}`;
  if (!isRecord(value)) {
    throw new ParseError(`${where} must be a mapping`);
  }
  const version = requireString(value, 'version', where);
  requireSafeRef(path, version, where);
  const url = optionalString(value, 'url', where);
  const rev = optionalString(value, 'rev', where);
  return {
    version,
    hash: requireHash(value, where),
    ...(url ? { url } : {}),
    ...(rev ? { rev } : {})
  };
}

const REMOTE_KEYS = ['old', 'oldVersion', 'new', 'version', 'hash', 'url', 'rev'] as const;

function parseReplacement(path: string, value: unknown): LockedReplacement {
  const where = `replace.${path}`;
  if (!isRecord(value)) {
    throw new ParseError(`${where} must be a mapping`);
  }

  if (value.path !== undefined) {
    const remoteKeys = REMOTE_KEYS.filter(key => value[key] !== undefined);
    if (remoteKeys.length > 0) {
      throw new ParseError(`${where}: a local replacement cannot also set ${remoteKeys.join(', ')}`);
    }
    return { path: requireString(value, 'path', where) };
  }

  const newPath = requireString(value, 'new', where);
  const version = requireString(value, 'version', where);
  requireSafeRef(newPath, version, where);
  const old = optionalString(value, 'old', where);
  const oldVersion = optionalString(value, 'oldVersion', where);
  const url = optionalString(value, 'url', where);
  const rev = optionalString(value, 'rev', where);
  const replacement: RemoteReplacement = {
    ...(old ? { old } : {}),
    ...(oldVersion ? { oldVersion } : {}),
    new: newPath,
    version,
    hash: requireHash(value, where),
    ...(url ? { url } : {}),
    ...(rev ? { rev } : {})
  };
  return replacement;
}

function parseSection<T>(
  source: Record<string, unknown>,
  key: 'modules' | 'replace',
  parseEntry: (path: string, value: unknown) => T
): Record<string, T> {
  const section = source[key];
  if (section === undefined || section === null) {
    return {};
  }
  if (!isRecord(section)) {
    throw new ParseError(`'${key}' must be a mapping`);
  }
  const result: Record<string, T> = {};
  for (const [path, value] of Object.entries(section)) {
    result[path] = parseEntry(path, value);
  }
  return result;
}

/**
 * Parse and validate lockfile content.
 */
export function parseLockfile(content: string): Lockfile {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ParseError(`invalid lockfile YAML: ${errorMessage(error)}`, undefined, { cause: error });
  }

  if (!isRecord(document)) {
    throw new ParseError('lockfile must be a mapping');
  }
  if (document.schema !== LOCKFILE_SCHEMA_VERSION) {
    throw new ParseError(`unsupported lockfile schema ${String(document.schema)}, expected ${LOCKFILE_SCHEMA_VERSION}`);
  }
  const toolchain = document.toolchain;
  if (typeof toolchain !== 'string') {
    throw new ParseError(`'toolchain' must be a string`);
  }

  return {
    schema: LOCKFILE_SCHEMA_VERSION,
    toolchain,
    modules: parseSection(document, 'modules', parseModule),
    replace: parseSection(document, 'replace', parseReplacement)
  };
}

export function serializeLockfile(lockfile: Lockfile): string {
  const document: Record<string, unknown> = {
    schema: lockfile.schema,
    toolchain: lockfile.toolchain
  };
  if (Object.keys(lockfile.modules).length > 0) {
    document.modules = lockfile.modules;
  }
  if (Object.keys(lockfile.replace).length > 0) {
    document.replace = lockfile.replace;
  }
  return yaml.dump(document, {
    indent: 2,
    sortKeys: true,
    lineWidth: -1,
    quotingType: '"'
  });
}

export async function loadLockfile(dir: string): Promise<Lockfile> {
  const path = getLockfilePath(dir);
  try {
    return parseLockfile(await readTextFile(path));
  } catch (error) {
    if (error instanceof ParseError) {
      error.details = { ...error.details, path };
    }
    throw error;
  }
}

export async function saveLockfile(dir: string, lockfile: Lockfile): Promise<string> {
  const path = getLockfilePath(dir);
  await writeTextFileAtomic(path, serializeLockfile(lockfile));
  return path;
}
