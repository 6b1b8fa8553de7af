/// <reference types="node" />
/**
 * Tests the lecture orchestrator end to end against in-process services.
 *
 * Used by: `npm test` (Node test runner).
 *
 * Key coverage:
 * - Excluded slides: image on the page, no analysis, no transcript turn.
 * - Per-slide failures not aborting the lecture; summary failures reported.
 * - Cancellation; input order validation; finalised slides never changing.
 *
 * Assumptions:
 * - Fakes answer with JSON envelopes the way the model does under the response schema.
 */

import assert from 'node:assert';
import test from 'node:test';
import type { SlideResult } from './types';
import { OrderingViolationError } from './services/errors';
import { configureLogger } from './services/logger';
import {
  initialState,
  isFinal,
  LecturePipeline,
  pipelineReducer,
  type LecturePipelineOptions,
} from './pipeline/lecturePipeline';
import { formatLectureReport } from './pipeline/report';
import { FakeGateway, FakeWorkspace, makeSlide, NO_RETRY_DELAY } from './test_support';

configureLogger({ level: 'silent' });

const optionsFor = (overrides: Partial<LecturePipelineOptions> = {}): LecturePipelineOptions => ({
  pageId: 'page-1',
  courseName: 'Reinforcement Learning',
  systemInstruction: 'SYS',
  limits: { maxBlocksPerRequest: 100, maxCharsPerRun: 2000, maxCharsPerEquation: 1000, maxArrayLength: 100, maxNestingDepth: 2 },
  retry: NO_RETRY_DELAY,
  uploadConcurrency: 2,
  sleep: async () => {},
  ...overrides,
});

const explained = (index: number) => [`img:${index}`, `heading_2:Slide ${index}`, `paragraph:Body ${index}`, '---'];

const SECTIONS = ['heading_1:📝 Lecture Summary', 'paragraph:Key ideas', 'heading_1:❓ Practice Questions', 'numbered_list_item:Why?'];

test('five slides with slide 3 excluded give five images, four explanations and four assistant turns', async () => {
  const delays = [0, 12, 3, 8, 1];
  const workspace = new FakeWorkspace({ uploadDelayMs: (slide) => delays[slide.index - 1] });
  const gateway = new FakeGateway();
  const pipeline = new LecturePipeline({ gateway, workspace }, optionsFor());
  const slides = [1, 2, 3, 4, 5].map((index) => makeSlide(index, index !== 3));

  const report = await pipeline.run(slides);

  assert.deepStrictEqual(workspace.outline, [
    ...explained(1),
    ...explained(2),
    'img:3',
    '---',
    ...explained(4),
    ...explained(5),
    ...SECTIONS,
  ]);
  assert.deepStrictEqual(gateway.analyzed, [1, 2, 4, 5]);

  const summaryTranscript = gateway.snapshots[gateway.snapshots.length - 1];
  const assistantTurns = summaryTranscript.filter((turn) => turn.role === 'assistant');
  assert.deepStrictEqual(
    assistantTurns.map((turn) => turn.slideIndex),
    [1, 2, 4, 5],
  );

  assert.strictEqual(report.succeeded, true);
  assert.deepStrictEqual(report.failedSlides, []);
  assert.deepStrictEqual(
    report.slides.map((slide) => `${slide.index}:${slide.stage}`),
    ['1:done', '2:done', '3:done', '4:done', '5:done'],
  );
  assert.deepStrictEqual(report.slides[2].explanation, { status: 'skipped' });
  assert.strictEqual(report.summary.status, 'committed');
  assert.strictEqual(report.practiceQuestions.status, 'committed');
});

test('each analysis sees the transcript of every earlier answered slide', async () => {
  const gateway = new FakeGateway();
  const pipeline = new LecturePipeline({ gateway, workspace: new FakeWorkspace() }, optionsFor());

  await pipeline.run([makeSlide(1), makeSlide(2), makeSlide(3)]);

  assert.deepStrictEqual(
    gateway.snapshots.slice(0, 3).map((snapshot) => snapshot.map((turn) => `${turn.role}${turn.slideIndex ?? ''}`)),
    [['system'], ['system', 'user1', 'assistant1'], ['system', 'user1', 'assistant1', 'user2', 'assistant2']],
  );
});

test('a failed analysis fails only its slide and the lecture continues', async () => {
  const gateway = new FakeGateway(new Map([[2, new Error('model exploded')]]));
  const workspace = new FakeWorkspace();
  const pipeline = new LecturePipeline({ gateway, workspace }, optionsFor());

  const report = await pipeline.run([makeSlide(1), makeSlide(2), makeSlide(3)]);

  assert.deepStrictEqual(workspace.outline, [...explained(1), 'img:2', '---', ...explained(3), ...SECTIONS]);
  assert.deepStrictEqual(
    gateway.snapshots[2].map((turn) => `${turn.role}${turn.slideIndex ?? ''}`),
    ['system', 'user1', 'assistant1'],
  );
  assert.deepStrictEqual(report.failedSlides, [2]);
  assert.deepStrictEqual(report.slides[1].failure, { stage: 'analyzing', reason: 'model exploded' });
  assert.strictEqual(report.succeeded, false);
  assert.ok(formatLectureReport(report).includes('\n  - slide 2 [analyzing] model exploded\n'));
});

test('a summary failure is reported, not thrown', async () => {
  const gateway = new FakeGateway(new Map(), new Error('summary down'));
  const workspace = new FakeWorkspace();
  const pipeline = new LecturePipeline({ gateway, workspace }, optionsFor());

  const report = await pipeline.run([makeSlide(1)]);

  assert.deepStrictEqual(workspace.outline, explained(1));
  assert.deepStrictEqual(report.summary, { status: 'failed', reason: 'summary down' });
  assert.deepStrictEqual(report.practiceQuestions, { status: 'failed', reason: 'summary down' });
  assert.deepStrictEqual(report.failedSlides, []);
  assert.strictEqual(report.succeeded, false);
});

test('the summary is skipped when no slide was explained', async () => {
  const gateway = new FakeGateway();
  const pipeline = new LecturePipeline({ gateway, workspace: new FakeWorkspace() }, optionsFor());

  const report = await pipeline.run([makeSlide(1, false), makeSlide(2, false)]);

  assert.strictEqual(gateway.summaries, 0);
  assert.deepStrictEqual(report.summary, { status: 'skipped', reason: 'no slide was explained' });
  assert.strictEqual(report.succeeded, true);
});

test('cancellation lets the in-flight slide finish and starts nothing new', async () => {
  const controller = new AbortController();
  const gateway = new FakeGateway(
    new Map([
      [
        2,
        async () => {
          controller.abort();
          return '{"title":"Slide 2","explanation":"Body 2"}';
        },
      ],
    ]),
  );
  const workspace = new FakeWorkspace();
  const pipeline = new LecturePipeline({ gateway, workspace }, optionsFor({ uploadConcurrency: 4 }));

  const report = await pipeline.run([makeSlide(1), makeSlide(2), makeSlide(3), makeSlide(4)], {
    signal: controller.signal,
  });

  assert.deepStrictEqual(gateway.analyzed, [1, 2]);
  assert.strictEqual(gateway.summaries, 0);
  assert.deepStrictEqual(workspace.outline, [...explained(1), ...explained(2)]);
  assert.deepStrictEqual(
    report.slides.map((slide) => `${slide.index}:${slide.stage}`),
    ['1:done', '2:done', '3:cancelled', '4:cancelled'],
  );
  assert.strictEqual(report.cancelled, true);
  assert.strictEqual(report.succeeded, false);
  assert.deepStrictEqual(report.summary, { status: 'skipped', reason: 'run cancelled' });
});

test('slides out of order are rejected before any remote call', async () => {
  const gateway = new FakeGateway();
  const workspace = new FakeWorkspace();
  const pipeline = new LecturePipeline({ gateway, workspace }, optionsFor());

  await assert.rejects(pipeline.run([makeSlide(1), makeSlide(3), makeSlide(2)]), OrderingViolationError);
  assert.deepStrictEqual(gateway.analyzed, []);
  assert.deepStrictEqual(workspace.uploads, []);
});

test('onUpdate reports each slide as final exactly once, as its last update', async () => {
  const updates: SlideResult[] = [];
  const pipeline = new LecturePipeline(
    { gateway: new FakeGateway(), workspace: new FakeWorkspace() },
    optionsFor({ onUpdate: (slide) => updates.push(slide) }),
  );

  await pipeline.run([makeSlide(1), makeSlide(2, false), makeSlide(3)]);

  for (const index of [1, 2, 3]) {
    const forSlide = updates.filter((slide) => slide.index === index);
    assert.strictEqual(forSlide.filter(isFinal).length, 1);
    assert.ok(isFinal(forSlide[forSlide.length - 1]));
  }
  const stagesOfFirst = updates.filter((slide) => slide.index === 1).map((slide) => slide.stage);
  assert.deepStrictEqual(
    stagesOfFirst.filter((stage, i) => stage !== stagesOfFirst[i - 1]),
    ['image_uploading', 'analyzing', 'parsing', 'compiling', 'appending', 'done'],
  );
  assert.strictEqual(pipeline.snapshot.logs.every((entry) => entry.id.length === 36), true);
});

test('pipelineReducer leaves finalised slides untouched', () => {
  const started = pipelineReducer(initialState, { type: 'INIT_SLIDES', slides: [makeSlide(1)] });
  const uploaded = pipelineReducer(started, {
    type: 'UPLOAD_SETTLED',
    index: 1,
    outcome: { status: 'uploaded', fileUploadId: 'upload-1' },
  });
  const skipped = pipelineReducer(uploaded, { type: 'EXPLANATION_SETTLED', index: 1, outcome: { status: 'skipped' } });
  const done = pipelineReducer(skipped, {
    type: 'APPEND_SETTLED',
    index: 1,
    outcome: { status: 'committed', blockIds: ['block-1'] },
  });

  assert.strictEqual(done.slides[0].stage, 'done');
  const after = pipelineReducer(done, { type: 'UPLOAD_SETTLED', index: 1, outcome: { status: 'failed', reason: 'late' } });
  assert.strictEqual(after, done);
});

test('pipelineReducer marks a slide failed at the first failing stage', () => {
  const started = pipelineReducer(initialState, { type: 'INIT_SLIDES', slides: [makeSlide(1)] });
  const uploadFailed = pipelineReducer(started, {
    type: 'UPLOAD_SETTLED',
    index: 1,
    outcome: { status: 'failed', reason: 'bad image' },
  });
  const explainedFailed = pipelineReducer(uploadFailed, {
    type: 'EXPLANATION_SETTLED',
    index: 1,
    outcome: { status: 'failed', stage: 'analyzing', reason: 'model down' },
  });
  const settled = pipelineReducer(explainedFailed, {
    type: 'APPEND_SETTLED',
    index: 1,
    outcome: { status: 'committed', blockIds: ['block-1', 'block-2'] },
  });

  assert.strictEqual(settled.slides[0].stage, 'failed');
  assert.deepStrictEqual(settled.slides[0].failure, { stage: 'image_uploading', reason: 'bad image' });
  assert.deepStrictEqual(
    settled.logs.map((entry) => entry.type),
    ['info', 'error', 'error'],
  );
});
