import { OrderingViolationError } from '../services/errors';

export type ReleaseSink<T> = (index: number, item: T) => Promise<void>;

/**
 * Holds items that finish out of order and releases them to `sink` strictly
 * in the order given at construction, one release at a time.
 */
export class ReorderBuffer<T> {
  private readonly positions = new Map<number, number>();
  private readonly pending = new Map<number, T>();
  private cursor = 0;
  private draining: Promise<void> = Promise.resolve();
  private failure: { error: unknown } | null = null;

  constructor(
    private readonly order: readonly number[],
    private readonly sink: ReleaseSink<T>,
  ) {
    order.forEach((index, position) => {
      if (this.positions.has(index)) {
        throw new OrderingViolationError(`Index ${index} appears twice in the release order.`);
      }
      this.positions.set(index, position);
    });
  }

  /** Next index the sink is waiting for, or undefined once everything went out. */
  get nextExpected(): number | undefined {
    return this.order[this.cursor];
  }

  get released(): number {
    return this.cursor;
  }

  get isComplete(): boolean {
    return this.cursor === this.order.length;
  }

  push(index: number, item: T): void {
    if (this.failure) throw this.failure.error;

    const position = this.positions.get(index);
    if (position === undefined) {
      throw new OrderingViolationError(`Index ${index} is not part of this release order.`);
    }
    if (position < this.cursor || this.pending.has(index)) {
      throw new OrderingViolationError(`Index ${index} was pushed more than once.`);
    }

    this.pending.set(index, item);
    this.draining = this.draining
      .then(() => this.drain())
      .catch((error: unknown) => {
        this.failure = { error };
      });
  }

  /** Resolves once every releasable item has gone out; rethrows a sink failure. */
  async whenIdle(): Promise<void> {
    await this.draining;
    if (this.failure) throw this.failure.error;
  }

  private async drain(): Promise<void> {
    while (!this.failure && this.cursor < this.order.length) {
      const index = this.order[this.cursor];
      const item = this.pending.get(index);
      if (item === undefined) return;
      this.pending.delete(index);
      this.cursor += 1;
      await this.sink(index, item);
    }
  }
}
