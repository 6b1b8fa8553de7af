/// <reference types="node" />
/**
 * Tests the coordinator that commits slides to the destination page.
 *
 * Used by: `npm test` (Node test runner).
 *
 * Key coverage:
 * - Page order independent of upload completion order, including seeded random
 *   upload delays and explanation arrival orders.
 * - Re-batching under the block ceiling; upload-failure notes.
 * - Append failures isolated to their slide; cancelled slides appending nothing.
 */

import assert from 'node:assert';
import test from 'node:test';
import type { AppendOutcome, DocumentBlock, ExplanationOutcome } from './types';
import { OrderingViolationError } from './services/errors';
import { configureLogger } from './services/logger';
import { UploadCoordinator, type UploadCoordinatorOptions } from './pipeline/uploadCoordinator';
import { FakeWorkspace, makeSlide, NO_RETRY_DELAY, seededRandom, shuffled, wait } from './test_support';

configureLogger({ level: 'silent' });

const paragraph = (text: string): DocumentBlock => ({
  kind: 'paragraph',
  runs: [{ type: 'text', content: text, bold: false }],
  children: [],
});

const coordinatorFor = (
  workspace: FakeWorkspace,
  order: number[],
  overrides: Partial<UploadCoordinatorOptions> = {},
) => {
  const committed = new Map<number, AppendOutcome>();
  const coordinator = new UploadCoordinator({
    pageId: 'page-1',
    workspace,
    order,
    concurrency: 4,
    retry: NO_RETRY_DELAY,
    limits: { maxBlocksPerRequest: 100, maxCharsPerRun: 2000, maxCharsPerEquation: 1000, maxArrayLength: 100, maxNestingDepth: 2 },
    sleep: async () => {},
    onCommitted: (index, outcome) => committed.set(index, outcome),
    ...overrides,
  });
  return { coordinator, committed };
};

const uploadAndRecord = async (coordinator: UploadCoordinator, index: number) => {
  const outcome = await coordinator.uploadSlideImage(makeSlide(index));
  coordinator.recordImage(index, outcome);
};

const SKIPPED: ExplanationOutcome = { status: 'skipped' };

test('image blocks reach the page in index order whatever the upload completion order', async () => {
  const workspace = new FakeWorkspace({ uploadDelayMs: (slide) => (6 - slide.index) * 4 });
  const { coordinator } = coordinatorFor(workspace, [1, 2, 3, 4, 5], { concurrency: 5 });

  for (const index of [1, 2, 3, 4, 5]) coordinator.recordExplanation(index, SKIPPED);
  await Promise.all([1, 2, 3, 4, 5].map((index) => uploadAndRecord(coordinator, index)));
  await coordinator.flush();

  assert.deepStrictEqual(workspace.uploads, [5, 4, 3, 2, 1]);
  assert.deepStrictEqual(workspace.outline, ['img:1', '---', 'img:2', '---', 'img:3', '---', 'img:4', '---', 'img:5', '---']);
});

test('random upload delays and explanation arrival orders still commit in index order', async () => {
  for (const seed of [2, 9, 31, 64, 127]) {
    const next = seededRandom(seed);
    const indices = Array.from({ length: 6 + next(5) }, (_, i) => i + 1);
    const delays = new Map(indices.map((index) => [index, next(15)]));
    const explained = new Set(indices.filter(() => next(2) === 0));
    const arrivals = shuffled(indices, next).map((index) => ({ index, after: next(8) }));

    const workspace = new FakeWorkspace({ uploadDelayMs: (slide) => delays.get(slide.index) ?? 0 });
    const { coordinator } = coordinatorFor(workspace, indices, { concurrency: 1 + next(4) });

    const explain = async () => {
      for (const { index, after } of arrivals) {
        await wait(after);
        coordinator.recordExplanation(
          index,
          explained.has(index) ? { status: 'success', batches: [[paragraph(`Body ${index}`)]] } : SKIPPED,
        );
      }
    };
    await Promise.all([explain(), ...indices.map((index) => uploadAndRecord(coordinator, index))]);
    await coordinator.flush();

    const expected = indices.flatMap((index) =>
      explained.has(index) ? [`img:${index}`, `paragraph:Body ${index}`, '---'] : [`img:${index}`, '---'],
    );
    assert.deepStrictEqual(workspace.outline, expected, `seed ${seed}`);
  }
});

test('a slide commit is re-batched under the block ceiling', async () => {
  const workspace = new FakeWorkspace();
  const { coordinator, committed } = coordinatorFor(workspace, [1], {
    limits: { maxBlocksPerRequest: 3, maxCharsPerRun: 2000, maxCharsPerEquation: 1000, maxArrayLength: 100, maxNestingDepth: 2 },
  });

  coordinator.recordExplanation(1, { status: 'success', batches: [[paragraph('p1'), paragraph('p2')], [paragraph('p3')]] });
  await uploadAndRecord(coordinator, 1);
  await coordinator.flush();

  assert.deepStrictEqual(
    workspace.appends.map((batch) => batch.length),
    [3, 2],
  );
  assert.deepStrictEqual(workspace.outline, ['img:1', 'paragraph:p1', 'paragraph:p2', 'paragraph:p3', '---']);
  assert.deepStrictEqual(committed.get(1), {
    status: 'committed',
    blockIds: ['block-1', 'block-2', 'block-3', 'block-4', 'block-5'],
  });
});

test('a failed upload leaves a note where the image would be', async () => {
  const workspace = new FakeWorkspace({ failUpload: (slide) => slide.index === 2 });
  const { coordinator } = coordinatorFor(workspace, [1, 2]);

  coordinator.recordExplanation(1, SKIPPED);
  coordinator.recordExplanation(2, { status: 'success', batches: [[paragraph('Body 2')]] });
  await Promise.all([uploadAndRecord(coordinator, 1), uploadAndRecord(coordinator, 2)]);
  await coordinator.flush();

  assert.deepStrictEqual(workspace.outline, [
    'img:1',
    '---',
    'paragraph:⚠️ Slide 2 image could not be uploaded: notion rejected: bad image',
    'paragraph:Body 2',
    '---',
  ]);
});

test('a permanently failing append fails only its slide', async () => {
  const workspace = new FakeWorkspace({
    failAppend: (blocks) => blocks.some((block) => block.kind === 'image' && block.fileUploadId === 'upload-2'),
  });
  const { coordinator, committed } = coordinatorFor(workspace, [1, 2, 3]);

  for (const index of [1, 2, 3]) {
    coordinator.recordExplanation(index, SKIPPED);
    await uploadAndRecord(coordinator, index);
  }
  await coordinator.flush();

  assert.deepStrictEqual(workspace.outline, ['img:1', '---', 'img:3', '---']);
  assert.deepStrictEqual(committed.get(2), {
    status: 'failed',
    reason: 'notion rejected: invalid block',
    committedBlockIds: [],
  });
  assert.strictEqual(committed.get(3)?.status, 'committed');
});

test('cancelled slides append nothing', async () => {
  const workspace = new FakeWorkspace();
  const { coordinator, committed } = coordinatorFor(workspace, [1, 2]);

  coordinator.recordImage(1, { status: 'cancelled' });
  coordinator.recordExplanation(1, SKIPPED);
  coordinator.recordExplanation(2, { status: 'cancelled' });
  await uploadAndRecord(coordinator, 2);
  await coordinator.flush();

  assert.deepStrictEqual(workspace.appends, []);
  assert.deepStrictEqual(committed.get(1), { status: 'cancelled' });
  assert.deepStrictEqual(committed.get(2), { status: 'cancelled' });
});

test('an aborted signal cancels uploads that have not started', async () => {
  const controller = new AbortController();
  controller.abort();
  const workspace = new FakeWorkspace();
  const { coordinator } = coordinatorFor(workspace, [1], { signal: controller.signal });

  assert.deepStrictEqual(await coordinator.uploadSlideImage(makeSlide(1)), { status: 'cancelled' });
  assert.deepStrictEqual(workspace.uploads, []);
});

test('flush fails when a slide never reached the page stream', async () => {
  const workspace = new FakeWorkspace();
  const { coordinator } = coordinatorFor(workspace, [1, 2]);

  coordinator.recordExplanation(1, SKIPPED);
  await uploadAndRecord(coordinator, 1);

  await assert.rejects(coordinator.flush(), (error: unknown) => {
    assert.ok(error instanceof OrderingViolationError);
    assert.strictEqual(error.message, 'Slides 2 never reached the page stream.');
    return true;
  });
});

test('appendExplanation appends batches in order and returns every id', async () => {
  const workspace = new FakeWorkspace();
  const { coordinator } = coordinatorFor(workspace, []);

  const ids = await coordinator.appendExplanation([[paragraph('a'), paragraph('b')], [paragraph('c')]]);
  assert.deepStrictEqual(ids, ['block-1', 'block-2', 'block-3']);
  assert.deepStrictEqual(workspace.outline, ['paragraph:a', 'paragraph:b', 'paragraph:c']);
});
