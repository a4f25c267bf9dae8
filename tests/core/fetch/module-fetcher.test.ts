import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { createModuleFetcher } from '../../../src/core/fetch/module-fetcher.js';
import { createModuleCache } from '../../../src/core/fetch/module-cache.js';
import { CredentialStore } from '../../../src/core/credential-store.js';
import { computeArchiveHash } from '../../../src/core/hash/archive-hash.js';
import { computeTreeHash } from '../../../src/core/hash/tree-hash.js';
import { TransferError, ValidationError } from '../../../src/utils/errors.js';
import { FetchSettings } from '../../../src/types/index.js';
import { StubTransport, buildZip, listFiles, makeSettings, makeTempDir, removeDir } from '../../test-helpers.js';

const PROXY = 'https://proxy.example';
const REF = { path: 'host.example/org/repo', version: 'v1.2.3' };
const PROXY_URL = `${PROXY}/host.example/org/repo/@v/v1.2.3.zip`;
const REGISTRY_URL = 'https://host.example/host.example/org/repo/@v/v1.2.3.zip';

async function moduleZip(files: Record<string, string> = { 'README.md': 'hello\n', 'lib/code.txt': 'code' }): Promise<Buffer> {
  return buildZip(Object.entries(files).map(([name, content]) => ({
    name: `${REF.path}@${REF.version}/${name}`,
    content
  })));
}

describe('module fetcher', () => {
  let cacheDir: string;
  let settings: FetchSettings;

  beforeEach(async () => {
    cacheDir = await makeTempDir('fetcher');
    settings = makeSettings({ proxy: PROXY, cacheDir, vcsHosts: [] });
  });

  afterEach(async () => {
    await removeDir(cacheDir);
  });

  it('downloads, extracts and records a module', async () => {
    const archive = await moduleZip();
    const transport = new StubTransport({ [PROXY_URL]: { body: archive } });
    const fetcher = createModuleFetcher(settings, { transport });

    const result = await fetcher.fetch(REF);

    assert.equal(result.fromCache, false);
    assert.equal(result.archiveHash, await computeArchiveHash(archive));
    assert.equal(result.sourceUrl, PROXY_URL);
    assert.equal(result.pinnedRevision, undefined);
    assert.equal(result.extractedDir, join(cacheDir, 'host.example/org/repo@v1.2.3'));
    assert.deepEqual(await listFiles(result.extractedDir), ['README.md', 'lib/code.txt']);
    assert.equal(await fs.readFile(`${result.extractedDir}.url`, 'utf8'), `${PROXY_URL}\n`);
  });

  it('serves the second fetch from the cache without touching the network', async () => {
    const transport = new StubTransport({ [PROXY_URL]: { body: await moduleZip() } });
    const fetcher = createModuleFetcher(settings, { transport });

    const first = await fetcher.fetch(REF);
    const second = await fetcher.fetch(REF);

    assert.equal(second.fromCache, true);
    assert.equal(second.archiveHash, first.archiveHash);
    assert.equal(second.sourceUrl, PROXY_URL);
    assert.equal(transport.calls.length, 1);
  });

  it('shares a cache between fetchers on the same root', async () => {
    const transport = new StubTransport({ [PROXY_URL]: { body: await moduleZip() } });
    await createModuleFetcher(settings, { transport }).fetch(REF);

    const later = await createModuleFetcher(settings, { transport, cache: createModuleCache(cacheDir) }).fetch(REF);
    assert.equal(later.fromCache, true);
    assert.equal(transport.calls.length, 1);
  });

  it('falls through to the next candidate on failure', async () => {
    const archive = await moduleZip();
    const transport = new StubTransport({
      [PROXY_URL]: { status: 410 },
      [REGISTRY_URL]: { body: archive }
    });
    const fetcher = createModuleFetcher(settings, { transport });

    const result = await fetcher.fetch(REF);
    assert.equal(result.sourceUrl, REGISTRY_URL);
    assert.deepEqual(transport.calls.map(call => call.url), [PROXY_URL, REGISTRY_URL]);
  });

  it('treats transport errors like bad statuses', async () => {
    const transport = new StubTransport({
      [PROXY_URL]: { error: new Error('The operation was aborted due to timeout') },
      [REGISTRY_URL]: { body: await moduleZip() }
    });

    const result = await createModuleFetcher(settings, { transport }).fetch(REF);
    assert.equal(result.sourceUrl, REGISTRY_URL);
  });

  it('reports the last failure when every candidate fails', async () => {
    const transport = new StubTransport({ [PROXY_URL]: { status: 500 } });
    const fetcher = createModuleFetcher(settings, { transport });

    await assert.rejects(fetcher.fetch(REF), (error: unknown) => {
      assert.ok(error instanceof TransferError);
      assert.equal(error.strategy, 'registry-path');
      assert.equal(error.url, REGISTRY_URL);
      assert.equal(error.status, 404);
      assert.equal(
        error.message,
        `Failed to fetch ${REF.path}@${REF.version} via registry-path ${REGISTRY_URL}: registry-path download returned HTTP 404 Not Found`
      );
      return true;
    });
    await assert.rejects(fs.access(join(cacheDir, 'host.example/org/repo@v1.2.3')));
  });

  it('adds a configuration hint for private modules', async () => {
    const privateSettings = makeSettings({ cacheDir, privatePatterns: 'host.example/*', netrcPath: '/home/test/.netrc' });
    const fetcher = createModuleFetcher(privateSettings, {
      transport: new StubTransport(),
      credentials: new CredentialStore()
    });

    await assert.rejects(fetcher.fetch(REF), (error: unknown) => {
      assert.ok(error instanceof TransferError);
      assert.ok(error.message.endsWith(
        `(private module: check MODPIN_PRIVATE and the credentials for ${REGISTRY_URL} in /home/test/.netrc)`
      ), error.message);
      return true;
    });
  });

  it('sends credentials only for private modules', async () => {
    const archive = await moduleZip();
    const credentials = new CredentialStore([{ host: 'host.example', login: 'builder', secret: 'test-secret' }]);

    const publicTransport = new StubTransport({ [REGISTRY_URL]: { body: archive } });
    await createModuleFetcher(makeSettings({ cacheDir, vcsHosts: [] }), { transport: publicTransport, credentials }).fetch(REF);
    assert.equal(publicTransport.calls[0].options.credentials, null);

    const privateDir = await makeTempDir('fetcher-private');
    try {
      const privateTransport = new StubTransport({ [REGISTRY_URL]: { body: archive } });
      await createModuleFetcher(
        makeSettings({ cacheDir: privateDir, privatePatterns: 'host.example/org/*', vcsHosts: [] }),
        { transport: privateTransport, credentials }
      ).fetch(REF);
      assert.deepEqual(privateTransport.calls[0].options.credentials, {
        host: 'host.example',
        login: 'builder',
        secret: 'test-secret'
      });
    } finally {
      await removeDir(privateDir);
    }
  });

  it('tries private modules without credentials when none match', async () => {
    const transport = new StubTransport({ [REGISTRY_URL]: { body: await moduleZip() } });
    const fetcher = createModuleFetcher(
      makeSettings({ cacheDir, privatePatterns: 'host.example/*', vcsHosts: [] }),
      { transport, credentials: new CredentialStore([{ host: 'other.example', login: 'x', secret: 'test-secret' }]) }
    );

    const result = await fetcher.fetch(REF);
    assert.equal(result.sourceUrl, REGISTRY_URL);
    assert.equal(transport.calls[0].options.credentials, null);
  });

  it('records the pinned revision of a pinned-commit download', async () => {
    const fullHash = 'abcdef123456abcdef123456abcdef123456abcd';
    const ref = { path: 'host.example/org/repo', version: 'v0.0.0-20231201120000-abcdef123456' };
    const pinnedUrl = `https://host.example/org/repo/archive/${fullHash}.zip`;
    const archive = await buildZip([{ name: `repo-${fullHash}/main.txt`, content: 'main' }]);
    const transport = new StubTransport({ [pinnedUrl]: { body: archive } });

    // Fixed resolver answer stands in for the registry tool
    const pinned = createModuleFetcher(
      makeSettings({ cacheDir, privatePatterns: 'host.example/org/*', vcsHosts: ['host.example'] }),
      {
        transport,
        credentials: new CredentialStore(),
        resolver: {
          isPrivate: () => true,
          resolve: async () => ({
            ref,
            isPrivate: true,
            candidates: [{ kind: 'vcs-pinned-commit', url: pinnedUrl, authHost: 'host.example', pinnedCommit: fullHash }]
          })
        }
      }
    );

    const result = await pinned.fetch(ref);
    assert.equal(result.pinnedRevision, fullHash);
    assert.equal(await fs.readFile(`${result.extractedDir}.rev`, 'utf8'), `${fullHash}\n`);
    assert.deepEqual(await listFiles(result.extractedDir), ['main.txt']);
  });

  it('computes the tree hash on request', async () => {
    const transport = new StubTransport({ [PROXY_URL]: { body: await moduleZip() } });
    const fetcher = createModuleFetcher(settings, { transport });

    const plain = await fetcher.fetch(REF);
    assert.equal(plain.treeHash, undefined);

    const hashed = await fetcher.fetch(REF, { computeTreeHash: true });
    assert.equal(hashed.treeHash, await computeTreeHash(hashed.extractedDir));
  });

  it('shares one download between concurrent fetches of the same module', async () => {
    const archive = await moduleZip({ 'a.txt': 'a', 'b.txt': 'b', 'c/d.txt': 'd' });
    const transport = new StubTransport({ [PROXY_URL]: { body: archive, delayMs: 20 } });
    const fetcher = createModuleFetcher(settings, { transport });

    const [first, second] = await Promise.all([fetcher.fetch(REF), fetcher.fetch(REF)]);

    assert.equal(first.archiveHash, second.archiveHash);
    assert.equal(transport.callsTo(PROXY_URL), 1);
    assert.deepEqual(await listFiles(first.extractedDir), ['a.txt', 'b.txt', 'c/d.txt']);
  });

  it('keeps entries whole when separate fetchers race on one cache root', async () => {
    const archive = await moduleZip({ 'a.txt': 'a', 'b.txt': 'b', 'c/d.txt': 'd' });
    const transport = new StubTransport({ [PROXY_URL]: { body: archive, delayMs: 10 } });
    const racers = [1, 2, 3].map(() => createModuleFetcher(settings, { transport }));

    const results = await Promise.all(racers.map(fetcher => fetcher.fetch(REF)));

    for (const result of results) {
      assert.equal(result.archiveHash, await computeArchiveHash(archive));
      assert.deepEqual(await listFiles(result.extractedDir), ['a.txt', 'b.txt', 'c/d.txt']);
    }
    const leftovers = (await fs.readdir(cacheDir)).filter(name => name.startsWith('.staging-'));
    assert.deepEqual(leftovers, []);
  });

  it('hands a slower writer the entry that won the commit', async () => {
    const fastArchive = await moduleZip({ 'a.txt': 'from the proxy' });
    const slowArchive = await moduleZip({ 'b.txt': 'from the registry' });
    const fast = createModuleFetcher(settings, {
      transport: new StubTransport({ [PROXY_URL]: { body: fastArchive } })
    });
    const slow = createModuleFetcher(makeSettings({ cacheDir, vcsHosts: [] }), {
      transport: new StubTransport({ [REGISTRY_URL]: { body: slowArchive, delayMs: 150 } })
    });

    const slowPending = slow.fetch(REF);
    const fastResult = await fast.fetch(REF);
    const slowResult = await slowPending;

    const fastHash = await computeArchiveHash(fastArchive);
    assert.equal(fastResult.fromCache, false);
    assert.equal(fastResult.archiveHash, fastHash);
    assert.equal(slowResult.fromCache, true);
    assert.equal(slowResult.archiveHash, fastHash);
    assert.equal(slowResult.sourceUrl, PROXY_URL);
    assert.deepEqual(await listFiles(slowResult.extractedDir), ['a.txt']);
    assert.equal(await fs.readFile(`${slowResult.extractedDir}.hash`, 'utf8'), `${fastHash}\n`);
    assert.equal(await fs.readFile(`${slowResult.extractedDir}.url`, 'utf8'), `${PROXY_URL}\n`);
  });

  it('refuses versions that would escape the cache root', async () => {
    const parent = await makeTempDir('fetcher-escape');
    try {
      const victim = join(parent, 'victim');
      await fs.mkdir(victim);
      await fs.writeFile(join(victim, 'precious.txt'), 'keep');
      const transport = new StubTransport();
      const fetcher = createModuleFetcher(
        makeSettings({ proxy: PROXY, cacheDir: join(parent, 'cache'), vcsHosts: [] }),
        { transport }
      );

      await assert.rejects(fetcher.fetch({ path: REF.path, version: 'v1/../../../../victim' }), ValidationError);
      assert.equal(transport.calls.length, 0);
      assert.deepEqual(await fs.readdir(victim), ['precious.txt']);
    } finally {
      await removeDir(parent);
    }
  });

  it('fetches many modules and reports failures per module', async () => {
    const other = { path: 'host.example/org/other', version: 'v2.0.0' };
    const transport = new StubTransport({ [PROXY_URL]: { body: await moduleZip() } });
    const fetcher = createModuleFetcher(settings, { transport });

    const { fetched, failures } = await fetcher.fetchAll([REF, other], { concurrency: 2 });

    assert.deepEqual(fetched.map(result => result.path), [REF.path]);
    assert.equal(failures.length, 1);
    assert.deepEqual(failures[0].ref, other);
    assert.ok(failures[0].error instanceof TransferError);
  });
});
