import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import {
  CredentialStore,
  parseCredentials,
  tokenizeCredentialLine,
  loadCredentialStore
} from '../../src/core/credential-store.js';
import { ParseError } from '../../src/utils/errors.js';
import { makeTempDir, removeDir } from '../test-helpers.js';

describe('tokenizeCredentialLine', () => {
  it('splits on spaces and tabs and keeps quoted runs together', () => {
    assert.deepEqual(
      tokenizeCredentialLine('machine h login u\tpassword "two words"'),
      ['machine', 'h', 'login', 'u', 'password', 'two words']
    );
  });

  it('keeps an empty quoted token', () => {
    assert.deepEqual(
      tokenizeCredentialLine('machine h login u password "" account a'),
      ['machine', 'h', 'login', 'u', 'password', '', 'account', 'a']
    );
  });

  it('rejects an unterminated quote', () => {
    assert.throws(() => tokenizeCredentialLine('password "open'), ParseError);
  });
});

describe('parseCredentials', () => {
  it('reads machine entries across lines', () => {
    const entries = parseCredentials([
      '# corporate hosts',
      'machine git.corp.example',
      '  login builder',
      '  password test-secret',
      '',
      'machine h.example login other password test-secret-2'
    ].join('\n'));

    assert.deepEqual(entries, [
      { host: 'git.corp.example', login: 'builder', secret: 'test-secret' },
      { host: 'h.example', login: 'other', secret: 'test-secret-2' }
    ]);
  });

  it('reads the default entry with an empty host', () => {
    assert.deepEqual(parseCredentials('default login anonymous password guest'), [
      { host: '', login: 'anonymous', secret: 'guest' }
    ]);
  });

  it('skips account values', () => {
    assert.deepEqual(parseCredentials('machine h login u account acct password test-secret'), [
      { host: 'h', login: 'u', secret: 'test-secret' }
    ]);
  });

  it('stops at macdef and keeps what came before', () => {
    const entries = parseCredentials([
      'machine a.example login a password test-secret',
      'machine b.example login b password test-secret',
      'macdef init',
      'machine c.example login c password test-secret'
    ].join('\n'));

    assert.deepEqual(entries.map(entry => entry.host), ['a.example', 'b.example']);
  });

  it('reads an empty quoted password as an empty secret', () => {
    assert.deepEqual(parseCredentials('machine h.example login u password ""\nmachine other.example login o password test-secret'), [
      { host: 'h.example', login: 'u', secret: '' },
      { host: 'other.example', login: 'o', secret: 'test-secret' }
    ]);
  });

  it('rejects a machine without a host instead of turning it into the default entry', () => {
    assert.throws(() => parseCredentials('machine\nlogin builder password test-secret\n'), (error: unknown) => {
      assert.ok(error instanceof ParseError);
      assert.equal(error.message, "Parse error: line 1: 'machine' has no value");
      return true;
    });
    assert.throws(() => parseCredentials('machine ""\nlogin builder password test-secret\n'), ParseError);
  });

  it('rejects keywords that are missing their value', () => {
    for (const content of [
      'machine h.example login',
      'machine h.example password',
      'machine h.example account',
      'machine h.example login password test-secret'
    ]) {
      assert.throws(() => parseCredentials(content), ParseError, content);
    }
  });

  it('rejects credentials outside any entry', () => {
    assert.throws(() => parseCredentials('login builder password test-secret'), ParseError);
  });
});

describe('CredentialStore', () => {
  const store = new CredentialStore([
    { host: 'git.corp.example', login: 'builder', secret: 'test-secret' },
    { host: '', login: 'anonymous', secret: 'guest' }
  ]);

  it('prefers an exact host match', () => {
    assert.equal(store.lookup('git.corp.example')?.login, 'builder');
  });

  it('falls back to the default entry for every unmatched host', () => {
    const onlyDefault = new CredentialStore(parseCredentials('default login anonymous password guest'));
    for (const host of ['a.example', 'b.example', 'github.com']) {
      assert.deepEqual(onlyDefault.lookup(host), { host: '', login: 'anonymous', secret: 'guest' });
    }
  });

  it('returns null when nothing applies', () => {
    const noDefault = new CredentialStore([{ host: 'a.example', login: 'a', secret: 'test-secret' }]);
    assert.equal(noDefault.lookup('b.example'), null);
  });

  it('does not let an empty host query hit a named entry', () => {
    const noDefault = new CredentialStore([{ host: 'a.example', login: 'a', secret: 'test-secret' }]);
    assert.equal(noDefault.lookup(''), null);
  });
});

describe('loadCredentialStore', () => {
  let dir: string;

  before(async () => {
    dir = await makeTempDir('netrc');
  });

  after(async () => {
    await removeDir(dir);
  });

  it('treats a missing file as an empty store', async () => {
    const store = await loadCredentialStore(join(dir, 'absent'));
    assert.equal(store.size, 0);
  });

  it('loads entries from disk', async () => {
    const path = join(dir, 'netrc');
    await fs.writeFile(path, 'machine h.example login u password test-secret\n');
    const store = await loadCredentialStore(path);
    assert.equal(store.lookup('h.example')?.secret, 'test-secret');
  });

  it('reports the file of a malformed credential list', async () => {
    const path = join(dir, 'malformed');
    await fs.writeFile(path, 'machine\nlogin builder password test-secret\n');
    await assert.rejects(loadCredentialStore(path), (error: unknown) => {
      assert.ok(error instanceof ParseError);
      assert.equal(error.details?.path, path);
      return true;
    });
  });

  it('fails with ParseError on an unreadable file', async () => {
    await assert.rejects(loadCredentialStore(dir), ParseError);
  });
});
