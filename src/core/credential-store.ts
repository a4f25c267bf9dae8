import { CredentialEntry } from '../types/index.js';
import { readTextFileIfExists } from '../utils/fs.js';
import { ParseError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Machine-scoped credentials read from a netrc-style file.
 *
 *   machine git.example.com login alice password "s3cret with spaces"
 *   default login anonymous password guest
 *
 * A `macdef` token ends parsing; macros are operator scripting and carry no
 * credentials.
 */
export class CredentialStore {
  private readonly entries: readonly CredentialEntry[];

  constructor(entries: CredentialEntry[] = []) {
    this.entries = Object.freeze(entries.map(entry => Object.freeze({ ...entry })));
  }

  /**
   * Exact host match first, then the default entry.
   */
  lookup(host: string): CredentialEntry | null {
    const exact = this.entries.find(entry => entry.host !== '' && entry.host === host);
    if (exact) {
      return exact;
    }
    return this.entries.find(entry => entry.host === '') ?? null;
  }

  list(): readonly CredentialEntry[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}

/**
 * Split a line into tokens on spaces and tabs, keeping double-quoted runs
 * together. `""` is an empty token.
 */
export function tokenizeCredentialLine(line: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quoted = false;
  let inQuote = false;

  for (const char of line) {
    if (char === '"') {
      inQuote = !inQuote;
      quoted = true;
    } else if ((char === ' ' || char === '\t') && !inQuote) {
      if (current.length > 0 || quoted) {
        tokens.push(current);
        current = '';
        quoted = false;
      }
    } else {
      current += char;
    }
  }

  if (inQuote) {
    throw new ParseError(`unterminated quote in credential line: ${line}`);
  }
  if (current.length > 0 || quoted) {
    tokens.push(current);
  }

  return tokens;
}

const VALUE_KEYWORDS = new Set(['machine', 'login', 'password', 'account']);

/**
 * Parse netrc content. A keyword missing its value, a `machine` without a host
 * and a `login` or `password` before any entry are ParseErrors; unknown tokens
 * are skipped.
 */
export function parseCredentials(content: string): CredentialEntry[] {
  const tokens: Array<{ value: string; line: number }> = [];
  const lines = content.split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    const line = lines[index].trim();
    if (line === '' || line.startsWith('#')) {
      continue;
    }
    for (const value of tokenizeCredentialLine(line)) {
      tokens.push({ value, line: index + 1 });
    }
  }

  const entries: CredentialEntry[] = [];
  let current: CredentialEntry | null = null;

  for (let i = 0; i < tokens.length; i++) {
    const { value: keyword, line } = tokens[i];
    let value = '';
    if (VALUE_KEYWORDS.has(keyword)) {
      const next = tokens[i + 1];
      if (!next || VALUE_KEYWORDS.has(next.value) || next.value === 'default' || next.value === 'macdef') {
        throw new ParseError(`line ${line}: '${keyword}' has no value`, { line });
      }
      value = next.value;
      i++;
    }

    switch (keyword) {
      case 'machine':
        if (value === '') {
          throw new ParseError(`line ${line}: 'machine' needs a host name`, { line });
        }
        if (current) {
          entries.push(current);
        }
        current = { host: value, login: '', secret: '' };
        break;
      case 'default':
        if (current) {
          entries.push(current);
        }
        current = { host: '', login: '', secret: '' };
        break;
      case 'login':
      case 'password':
        if (!current) {
          throw new ParseError(`line ${line}: '${keyword}' outside a machine or default entry`, { line });
        }
        if (keyword === 'login') {
          current.login = value;
        } else {
          current.secret = value;
        }
        break;
      case 'account':
        break;
      case 'macdef':
        if (current) {
          entries.push(current);
        }
        return entries;
      default:
        logger.debug(`Ignoring unknown credential token '${keyword}' on line ${line}`);
        break;
    }
  }

  if (current) {
    entries.push(current);
  }

  return entries;
}

/**
 * Load the credential file at `path`. A missing file is an empty store.
 */
export async function loadCredentialStore(path: string): Promise<CredentialStore> {
  let content: string | null;
  try {
    content = await readTextFileIfExists(path);
  } catch (error) {
    throw new ParseError(`cannot read credential file ${path}: ${errorMessage(error)}`, { path }, { cause: error });
  }

  if (content === null) {
    logger.debug(`No credential file at ${path}`);
    return new CredentialStore();
  }

  let entries: CredentialEntry[];
  try {
    entries = parseCredentials(content);
  } catch (error) {
    if (error instanceof ParseError) {
      error.details = { ...error.details, path };
    }
    throw error;
  }
  logger.debug(`Loaded ${entries.length} credential entr${entries.length === 1 ? 'y' : 'ies'} from ${path}`);
  return new CredentialStore(entries);
}
