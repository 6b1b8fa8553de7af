/// <reference types="node" />
/**
 * Tests the bounded worker pool used for image uploads.
 *
 * Used by: `npm test` (Node test runner).
 *
 * Key coverage:
 * - Concurrency ceiling, submission-order start, result and error propagation.
 */

import assert from 'node:assert';
import test from 'node:test';
import { WorkerPool } from './utils/workerPool';

const deferred = () => {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

test('no more than maxConcurrency jobs run at once and queued jobs start in order', async () => {
  const pool = new WorkerPool(2);
  const gates = [deferred(), deferred(), deferred(), deferred()];
  const started: number[] = [];

  const runs = gates.map((gate, i) =>
    pool.run(async () => {
      started.push(i);
      await gate.promise;
      return i;
    }),
  );

  await new Promise((resolve) => setImmediate(resolve));
  assert.deepStrictEqual(started, [0, 1]);
  assert.strictEqual(pool.active, 2);
  assert.strictEqual(pool.queued, 2);

  gates[1].resolve();
  await runs[1];
  await new Promise((resolve) => setImmediate(resolve));
  assert.deepStrictEqual(started, [0, 1, 2]);

  gates[0].resolve();
  gates[2].resolve();
  gates[3].resolve();
  assert.deepStrictEqual(await Promise.all(runs), [0, 1, 2, 3]);
  await new Promise((resolve) => setImmediate(resolve));
  assert.strictEqual(pool.active, 0);
});

test('a failing job rejects its own promise and frees its slot', async () => {
  const pool = new WorkerPool(1);
  const failing = pool.run(async () => {
    throw new Error('upload failed');
  });
  const next = pool.run(async () => 'next');

  await assert.rejects(failing, { message: 'upload failed' });
  assert.strictEqual(await next, 'next');
});

test('a job that throws synchronously is reported as a rejection', async () => {
  const pool = new WorkerPool(1);
  const job = (): Promise<string> => {
    throw new Error('sync');
  };
  await assert.rejects(pool.run(job), { message: 'sync' });
});
