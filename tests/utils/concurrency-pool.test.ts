import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { runWithConcurrency } from '../../src/utils/concurrency-pool.js';

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('runWithConcurrency', () => {
  it('keeps results in task order', async () => {
    const { results, aborted } = await runWithConcurrency([
      async () => { await sleep(15); return 'slow'; },
      async () => 'fast',
      async () => { await sleep(5); return 'medium'; }
    ], 3);

    assert.equal(aborted, false);
    assert.deepEqual(results, [
      { index: 0, status: 'fulfilled', value: 'slow' },
      { index: 1, status: 'fulfilled', value: 'fast' },
      { index: 2, status: 'fulfilled', value: 'medium' }
    ]);
  });

  it('never runs more tasks than the limit', async () => {
    let running = 0;
    let peak = 0;
    const tasks = Array.from({ length: 8 }, () => async () => {
      running++;
      peak = Math.max(peak, running);
      await sleep(5);
      running--;
    });

    await runWithConcurrency(tasks, 3);
    assert.equal(peak, 3);
  });

  it('collects failures without stopping other tasks', async () => {
    const { results } = await runWithConcurrency<number>([
      async () => { throw new Error('first'); },
      async () => 2
    ], 1);

    assert.equal(results.length, 2);
    assert.equal(results[0].status, 'rejected');
    assert.equal(results[0].status === 'rejected' && results[0].error.message, 'first');
    assert.deepEqual(results[1], { index: 1, status: 'fulfilled', value: 2 });
  });

  it('stops starting tasks after a failure with failFast', async () => {
    let started = 0;
    const tasks = [0, 1, 2, 3].map(index => async () => {
      started++;
      if (index === 0) throw 'plain string';
      return index;
    });

    const { results, aborted } = await runWithConcurrency(tasks, 1, { failFast: true });
    assert.equal(aborted, true);
    assert.equal(started, 1);
    assert.equal(results.length, 1);
    assert.equal(results[0].status === 'rejected' && results[0].error.message, 'plain string');
  });

  it('handles an empty task list', async () => {
    assert.deepEqual(await runWithConcurrency([], 4), { results: [], aborted: false });
  });
});
