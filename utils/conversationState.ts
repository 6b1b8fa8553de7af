import type { ConversationTurn, TurnPart } from '../types';
import { OrderingViolationError } from '../services/errors';
import { createLogger } from '../services/logger';

const log = createLogger('Conversation');

export interface ConversationStateOptions {
  // Growth is unbounded; this only controls when a warning is logged.
  warnAfterTurns?: number;
}

/**
 * Append-only transcript replayed to the model on every call. Owned by one
 * lecture run and handed to the gateway per request.
 */
export class ConversationState {
  private readonly turns: ConversationTurn[] = [];
  private readonly skipped = new Map<number, string>();
  private lastSettledIndex: number | null = null;
  private pendingUserIndex: number | null = null;
  private warned = false;

  constructor(private readonly options: ConversationStateOptions = {}) {}

  appendSystem(instruction: string): void {
    if (this.turns.length > 0) {
      throw new OrderingViolationError('System instruction must be the first and only system turn.');
    }
    this.push({ role: 'system', parts: [{ kind: 'text', text: instruction }] });
  }

  appendUser(image: { data: Uint8Array; mimeType: string }, index: number, prompt: string): void {
    if (this.turns.length === 0) {
      throw new OrderingViolationError(`Slide ${index} submitted before the system instruction.`);
    }
    if (this.pendingUserIndex !== null) {
      throw new OrderingViolationError(
        `Slide ${index} submitted while slide ${this.pendingUserIndex} is still waiting for its response.`,
      );
    }
    this.assertAfterSettled(index);
    const parts: TurnPart[] = [
      { kind: 'text', text: prompt },
      { kind: 'image', data: image.data, mimeType: image.mimeType },
    ];
    this.push({ role: 'user', parts, slideIndex: index });
    this.pendingUserIndex = index;
  }

  appendAssistant(text: string, index: number): void {
    if (this.pendingUserIndex !== index) {
      throw new OrderingViolationError(
        `Response for slide ${index} has no matching submission (pending: ${this.pendingUserIndex ?? 'none'}).`,
      );
    }
    this.push({ role: 'assistant', parts: [{ kind: 'text', text }], slideIndex: index });
    this.pendingUserIndex = null;
    this.lastSettledIndex = index;
  }

  /** Marks an included slide whose analysis definitively failed. */
  recordSkip(index: number, reason: string): void {
    if (this.pendingUserIndex !== null) {
      throw new OrderingViolationError(`Cannot skip slide ${index} while slide ${this.pendingUserIndex} is pending.`);
    }
    this.assertAfterSettled(index);
    this.skipped.set(index, reason);
    this.lastSettledIndex = index;
  }

  snapshot(): readonly ConversationTurn[] {
    return Object.freeze(this.turns.map((turn) => Object.freeze({ ...turn, parts: [...turn.parts] })));
  }

  get length(): number {
    return this.turns.length;
  }

  get assistantTurnCount(): number {
    return this.turns.filter((turn) => turn.role === 'assistant').length;
  }

  get answeredSlides(): number[] {
    return this.turns.flatMap((turn) =>
      turn.role === 'assistant' && turn.slideIndex !== undefined ? [turn.slideIndex] : [],
    );
  }

  get skippedSlides(): ReadonlyMap<number, string> {
    return this.skipped;
  }

  private assertAfterSettled(index: number): void {
    if (this.lastSettledIndex !== null && index <= this.lastSettledIndex) {
      throw new OrderingViolationError(
        `Slide ${index} arrived after slide ${this.lastSettledIndex} was already settled.`,
      );
    }
  }

  private push(turn: ConversationTurn): void {
    this.turns.push(turn);
    const threshold = this.options.warnAfterTurns;
    if (!this.warned && threshold !== undefined && this.turns.length > threshold) {
      this.warned = true;
      log.warn(`Transcript passed ${threshold} turns; long lectures may exceed the model's context window.`);
    }
  }
}
