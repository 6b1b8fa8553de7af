import type {
  AppendOutcome,
  DocumentBlock,
  ExplanationOutcome,
  ImageUploadOutcome,
  Slide,
  StructuralLimits,
} from '../types';
import { describeError, OrderingViolationError, PermanentFailureError } from '../services/errors';
import { createLogger } from '../services/logger';
import type { WorkspaceClient } from '../services/notionService';
import { batchBlocks, spansToRuns } from '../utils/blockCompiler';
import { ReorderBuffer } from '../utils/reorderBuffer';
import { runWithRetry, type RetryContext, type RetryOptions } from '../utils/retry';
import { WorkerPool } from '../utils/workerPool';

const log = createLogger('Coordinator');

export interface UploadCoordinatorOptions {
  pageId: string;
  workspace: WorkspaceClient;
  /** Every slide index of the lecture, in page order. */
  order: readonly number[];
  concurrency: number;
  retry: RetryOptions;
  limits: StructuralLimits;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onAppending?: (index: number) => void;
  onCommitted?: (index: number, outcome: AppendOutcome) => void;
}

interface SlideCommit {
  image: ImageUploadOutcome;
  explanation: ExplanationOutcome;
}

type PartialCommit = { image?: ImageUploadOutcome; explanation?: ExplanationOutcome };

const isSettled = <T extends { status: string }>(outcome: T | undefined): outcome is T =>
  outcome !== undefined && outcome.status !== 'pending';

/**
 * Owns everything that reaches the destination page. Image uploads run in a
 * bounded pool; each slide is committed once both its image and explanation
 * are known, strictly in page order.
 */
export class UploadCoordinator {
  private readonly pool: WorkerPool;
  private readonly buffer: ReorderBuffer<SlideCommit>;
  private readonly partials = new Map<number, PartialCommit>();
  private commitPosition = 0;

  constructor(private readonly options: UploadCoordinatorOptions) {
    this.pool = new WorkerPool(options.concurrency);
    this.buffer = new ReorderBuffer(options.order, (index, commit) => this.commitSlide(index, commit));
  }

  /** Uploads one slide image. Resolves with the outcome; never rejects. */
  uploadSlideImage(slide: Slide): Promise<ImageUploadOutcome> {
    return this.pool.run(async (): Promise<ImageUploadOutcome> => {
      if (this.options.signal?.aborted) return { status: 'cancelled' };
      try {
        const fileUploadId = await runWithRetry(
          () => this.options.workspace.uploadImage(slide),
          this.options.retry,
          this.retryContext(`Slide ${slide.index} image upload`),
        );
        return { status: 'uploaded', fileUploadId };
      } catch (error: unknown) {
        return { status: 'failed', reason: describeError(error) };
      }
    });
  }

  recordImage(index: number, outcome: ImageUploadOutcome): void {
    this.record(index, { image: outcome });
  }

  recordExplanation(index: number, outcome: ExplanationOutcome): void {
    this.record(index, { explanation: outcome });
  }

  /**
   * Appends pre-compiled batches one request at a time, in order. Returns the
   * ids of every committed top-level block.
   */
  async appendExplanation(batches: DocumentBlock[][], label = 'Append'): Promise<string[]> {
    const committed: string[] = [];
    await this.appendBatches(batches, label, committed);
    return committed;
  }

  /** Waits for the page stream to drain. Every slide must have been committed. */
  async flush(): Promise<void> {
    await this.buffer.whenIdle();
    if (!this.buffer.isComplete) {
      const missing = this.options.order.slice(this.buffer.released);
      throw new OrderingViolationError(`Slides ${missing.join(', ')} never reached the page stream.`);
    }
  }

  private record(index: number, update: PartialCommit): void {
    const partial = { ...this.partials.get(index), ...update };
    this.partials.set(index, partial);
    if (isSettled(partial.image) && isSettled(partial.explanation)) {
      this.partials.delete(index);
      this.buffer.push(index, { image: partial.image, explanation: partial.explanation });
    }
  }

  private async commitSlide(index: number, commit: SlideCommit): Promise<void> {
    const expected = this.options.order[this.commitPosition];
    if (index !== expected) {
      throw new OrderingViolationError(`Slide ${index} reached the page while slide ${expected} was expected.`);
    }
    this.commitPosition += 1;

    if (commit.image.status === 'cancelled' || commit.explanation.status === 'cancelled') {
      this.options.onCommitted?.(index, { status: 'cancelled' });
      return;
    }

    this.options.onAppending?.(index);
    const blocks = this.slideBlocks(index, commit);
    const committed: string[] = [];
    const batches = batchBlocks(blocks, this.options.limits.maxBlocksPerRequest);
    try {
      await this.appendBatches(batches, `Slide ${index} append`, committed);
    } catch (error: unknown) {
      if (!(error instanceof PermanentFailureError)) throw error;
      this.options.onCommitted?.(index, { status: 'failed', reason: error.message, committedBlockIds: committed });
      return;
    }
    log.debug(`Slide ${index} committed with ${committed.length} blocks.`);
    this.options.onCommitted?.(index, { status: 'committed', blockIds: committed });
  }

  private slideBlocks(index: number, commit: SlideCommit): DocumentBlock[] {
    const blocks: DocumentBlock[] = [];
    if (commit.image.status === 'uploaded') {
      blocks.push({ kind: 'image', fileUploadId: commit.image.fileUploadId });
    } else if (commit.image.status === 'failed') {
      const note = `⚠️ Slide ${index} image could not be uploaded: ${commit.image.reason}`;
      blocks.push({
        kind: 'paragraph',
        runs: spansToRuns([{ kind: 'text', text: note }], this.options.limits),
        children: [],
      });
    }
    if (commit.explanation.status === 'success') {
      blocks.push(...commit.explanation.batches.flat());
    }
    blocks.push({ kind: 'divider' });
    return blocks;
  }

  // Ids land in `committed` as each batch goes through, so a later failure keeps them.
  private async appendBatches(batches: DocumentBlock[][], label: string, committed: string[]): Promise<void> {
    for (const [position, batch] of batches.entries()) {
      const ids = await runWithRetry(
        () => this.options.workspace.appendBlocks(this.options.pageId, batch),
        this.options.retry,
        this.retryContext(`${label} batch ${position + 1}/${batches.length}`),
      );
      committed.push(...ids);
    }
  }

  private retryContext(label: string): RetryContext {
    return { service: 'notion', label, logger: log, sleep: this.options.sleep, random: this.options.random };
  }
}
