import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  escapePath,
  unescapePath,
  escapeVersion,
  extractHost,
  computeCacheKey,
  parseRef,
  findRefProblem,
  validateRef
} from '../../src/utils/module-path.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('module path helpers', () => {
  it('marks uppercase letters when escaping', () => {
    assert.equal(escapePath('github.com/BurntSushi/toml'), 'github.com/!burnt!sushi/toml');
    assert.equal(escapePath('host.example/org/repo'), 'host.example/org/repo');
  });

  it('reverses the escape', () => {
    assert.equal(unescapePath('github.com/!burnt!sushi/toml'), 'github.com/BurntSushi/toml');
  });

  it('path-escapes versions', () => {
    assert.equal(escapeVersion('v1.2.3'), 'v1.2.3');
    assert.equal(escapeVersion('v2.0.0+incompatible'), 'v2.0.0+incompatible');
    assert.equal(escapeVersion('v1$&=:@~_-'), 'v1$&=:@~_-');
    assert.equal(escapeVersion('a/b;c,d?e'), 'a%2Fb%3Bc%2Cd%3Fe');
    assert.equal(escapeVersion("x y!*'()"), 'x%20y%21%2A%27%28%29');
    assert.equal(escapeVersion('\u00e9'), '%C3%A9');
  });

  it('takes the first segment as host', () => {
    assert.equal(extractHost('host.example/org/repo'), 'host.example');
    assert.equal(extractHost('bare'), 'bare');
  });

  it('builds cache keys from the escaped path', () => {
    assert.equal(computeCacheKey({ path: 'h.example/Org/x', version: 'v1.0.0' }), 'h.example/!org/x@v1.0.0');
  });

  it('parses path@version on the last @', () => {
    assert.deepEqual(parseRef('h.example/org/x@v1.0.0'), { path: 'h.example/org/x', version: 'v1.0.0' });
    assert.deepEqual(parseRef('h.example/@scope/x@v2.0.0'), { path: 'h.example/@scope/x', version: 'v2.0.0' });
    assert.throws(() => parseRef('h.example/org/x'), ValidationError);
    assert.throws(() => parseRef('h.example/org/x@'), ValidationError);
    assert.throws(() => parseRef('@v1.0.0'), ValidationError);
    assert.throws(() => parseRef('h.example/org/x@v1/../../victim'), ValidationError);
  });

  it('accepts ordinary refs as cache entry names', () => {
    assert.equal(findRefProblem({ path: 'h.example/org/x', version: 'v0.0.0-20231201120000-abcdef123456' }), null);
    assert.equal(findRefProblem({ path: 'h.example/@scope/x', version: 'v2.0.0+incompatible' }), null);
  });

  it('rejects refs that would leave their cache directory', () => {
    const unsafe = [
      { path: 'h.example/org/x', version: 'v1/../../../victim' },
      { path: 'h.example/org/x', version: '..' },
      { path: 'h.example/org/x', version: 'v1\\..\\victim' },
      { path: 'h.example/org/x', version: 'v1\0' },
      { path: 'h.example/../x', version: 'v1.0.0' },
      { path: 'h.example//x', version: 'v1.0.0' },
      { path: '/h.example/x', version: 'v1.0.0' },
      { path: 'h.example/./x', version: 'v1.0.0' },
      { path: 'h.example/x', version: '' }
    ];
    for (const ref of unsafe) {
      assert.notEqual(findRefProblem(ref), null, `${ref.path}@${ref.version}`);
      assert.throws(() => validateRef(ref), ValidationError);
      assert.throws(() => computeCacheKey(ref), ValidationError);
    }
  });
});
