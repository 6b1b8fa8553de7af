import { v4 as uuidv4 } from 'uuid';
import type {
  AppendOutcome,
  ExplanationNode,
  ExplanationOutcome,
  FailureStage,
  ImageUploadOutcome,
  LectureReport,
  LogEntry,
  SectionOutcome,
  Slide,
  SlideResult,
  SlideStage,
  StructuralLimits,
} from '../types';
import { describeError, OrderingViolationError } from '../services/errors';
import type { ModelGateway } from '../services/geminiService';
import { createLogger } from '../services/logger';
import type { WorkspaceClient } from '../services/notionService';
import { SLIDE_INSTRUCTION } from '../services/prompts';
import { compile } from '../utils/blockCompiler';
import { ConversationState } from '../utils/conversationState';
import { headingNode, parseExplanation } from '../utils/explanationParser';
import { parseSlideResponse, parseSummaryResponse } from '../utils/parsers';
import type { RetryOptions } from '../utils/retry';
import { buildLectureReport } from './report';
import { UploadCoordinator } from './uploadCoordinator';

const log = createLogger('Pipeline');

// --- Constants ---
export const SUMMARY_HEADING = '📝 Lecture Summary';
export const PRACTICE_QUESTIONS_HEADING = '❓ Practice Questions';
const SLIDE_TITLE_LEVEL = 2;

// Forward order of the working stages; terminal stages sit outside it.
const STAGE_PROGRESSION: SlideStage[] = ['pending', 'image_uploading', 'analyzing', 'parsing', 'compiling', 'appending'];
const TERMINAL_STAGES: ReadonlySet<SlideStage> = new Set(['done', 'failed', 'cancelled']);

// --- Helpers ---
const generateId = () => uuidv4();

export const createLog = (type: LogEntry['type'], message: string): LogEntry => ({
  id: generateId(),
  type,
  message,
  timestamp: new Date().toISOString(),
});

const advanceStage = (current: SlideStage, next: SlideStage): SlideStage =>
  STAGE_PROGRESSION.indexOf(next) > STAGE_PROGRESSION.indexOf(current) ? next : current;

export const isFinal = (slide: SlideResult): boolean => TERMINAL_STAGES.has(slide.stage);

/** First failure in pipeline order, if any half of the slide failed. */
const firstFailure = (slide: SlideResult): SlideResult['failure'] => {
  if (slide.image.status === 'failed') return { stage: 'image_uploading', reason: slide.image.reason };
  if (slide.explanation.status === 'failed') {
    return { stage: slide.explanation.stage, reason: slide.explanation.reason };
  }
  if (slide.append.status === 'failed') return { stage: 'appending', reason: slide.append.reason };
  return undefined;
};

// --- State ---
export interface PipelineState {
  slides: SlideResult[];
  logs: LogEntry[];
  cancelled: boolean;
}

export const initialState: PipelineState = { slides: [], logs: [], cancelled: false };

// --- Reducer Actions ---
export type Action =
  | { type: 'INIT_SLIDES'; slides: Slide[] }
  | { type: 'START_UPLOAD'; index: number }
  | { type: 'UPLOAD_SETTLED'; index: number; outcome: ImageUploadOutcome }
  | { type: 'ADVANCE_STAGE'; index: number; stage: Exclude<FailureStage, 'image_uploading'> }
  | { type: 'EXPLANATION_SETTLED'; index: number; outcome: ExplanationOutcome }
  | { type: 'APPEND_SETTLED'; index: number; outcome: AppendOutcome }
  | { type: 'CANCEL' }
  | { type: 'LOG'; entry: LogEntry };

const updateSlide = (
  state: PipelineState,
  index: number,
  update: (slide: SlideResult) => SlideResult,
  logEntry?: LogEntry,
): PipelineState => {
  const target = state.slides.find((slide) => slide.index === index);
  // Finalised slides are immutable.
  if (!target || isFinal(target)) return state;
  return {
    ...state,
    slides: state.slides.map((slide) => (slide === target ? update(slide) : slide)),
    logs: logEntry ? [...state.logs, logEntry] : state.logs,
  };
};

const finalize = (slide: SlideResult, append: AppendOutcome): SlideResult => {
  const settled = { ...slide, append, completedAt: Date.now() };
  const cancelled =
    append.status === 'cancelled' || slide.image.status === 'cancelled' || slide.explanation.status === 'cancelled';
  if (cancelled) return { ...settled, stage: 'cancelled' };
  const failure = firstFailure(settled);
  return failure ? { ...settled, stage: 'failed', failure } : { ...settled, stage: 'done' };
};

// --- Reducer Logic ---
export const pipelineReducer = (state: PipelineState, action: Action): PipelineState => {
  switch (action.type) {
    case 'INIT_SLIDES':
      return {
        slides: action.slides.map(
          (slide): SlideResult => ({
            index: slide.index,
            included: slide.included,
            stage: 'pending',
            image: { status: 'pending' },
            explanation: { status: 'pending' },
            append: { status: 'pending' },
          }),
        ),
        logs: [
          createLog(
            'info',
            `Lecture started: ${action.slides.length} slides, ${action.slides.filter((slide) => slide.included).length} to analyse.`,
          ),
        ],
        cancelled: false,
      };

    case 'START_UPLOAD':
      return updateSlide(state, action.index, (slide) => ({
        ...slide,
        stage: advanceStage(slide.stage, 'image_uploading'),
        startedAt: slide.startedAt ?? Date.now(),
      }));

    case 'UPLOAD_SETTLED':
      return updateSlide(
        state,
        action.index,
        (slide) => ({ ...slide, image: action.outcome }),
        action.outcome.status === 'failed'
          ? createLog('error', `Slide ${action.index} image upload failed. Error: ${action.outcome.reason}`)
          : undefined,
      );

    case 'ADVANCE_STAGE':
      return updateSlide(state, action.index, (slide) => ({
        ...slide,
        stage: advanceStage(slide.stage, action.stage),
        startedAt: slide.startedAt ?? Date.now(),
      }));

    case 'EXPLANATION_SETTLED': {
      const { outcome } = action;
      const logEntry =
        outcome.status === 'failed'
          ? createLog('error', `Slide ${action.index} failed at ${outcome.stage}. Error: ${outcome.reason}`)
          : outcome.status === 'success'
            ? createLog('success', `Slide ${action.index} explained (${outcome.batches.flat().length} blocks).`)
            : undefined;
      return updateSlide(
        state,
        action.index,
        (slide) => ({
          ...slide,
          explanation: outcome,
          stage: outcome.status === 'cancelled' ? slide.stage : advanceStage(slide.stage, 'appending'),
        }),
        logEntry,
      );
    }

    case 'APPEND_SETTLED': {
      const logEntry =
        action.outcome.status === 'failed'
          ? createLog('error', `Slide ${action.index} append failed. Error: ${action.outcome.reason}`)
          : undefined;
      return updateSlide(state, action.index, (slide) => finalize(slide, action.outcome), logEntry);
    }

    case 'CANCEL':
      if (state.cancelled) return state;
      return {
        ...state,
        cancelled: true,
        logs: [...state.logs, createLog('warning', 'Cancellation requested. No new slides will start.')],
      };

    case 'LOG':
      return { ...state, logs: [...state.logs, action.entry] };
  }
};

// --- Orchestrator ---
export interface LecturePipelineDeps {
  gateway: ModelGateway;
  workspace: WorkspaceClient;
}

export interface LecturePipelineOptions {
  pageId: string;
  courseName: string;
  systemInstruction: string;
  slideInstruction?: string;
  limits: StructuralLimits;
  retry: RetryOptions;
  uploadConcurrency: number;
  contextWarningTurns?: number;
  onUpdate?: (slide: SlideResult) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

interface ClosingSections {
  summary: SectionOutcome;
  practiceQuestions: SectionOutcome;
}

const assertStrictlyIncreasing = (slides: Slide[]): void => {
  slides.forEach((slide, position) => {
    const previous = slides[position - 1];
    if (previous && slide.index <= previous.index) {
      throw new OrderingViolationError(
        `Slide ${slide.index} follows slide ${previous.index}; slide indices must strictly increase.`,
      );
    }
  });
};

/**
 * Runs one lecture: uploads every slide image through a bounded pool, analyses
 * included slides one at a time against the growing transcript, commits each
 * slide to the page in order, then appends the summary and practice questions.
 */
export class LecturePipeline {
  private state: PipelineState = initialState;

  constructor(
    private readonly deps: LecturePipelineDeps,
    private readonly options: LecturePipelineOptions,
  ) {}

  get snapshot(): PipelineState {
    return this.state;
  }

  async run(slides: Slide[], runOptions: RunOptions = {}): Promise<LectureReport> {
    assertStrictlyIncreasing(slides);
    const { signal } = runOptions;
    this.dispatch({ type: 'INIT_SLIDES', slides });

    const conversation = new ConversationState({ warnAfterTurns: this.options.contextWarningTurns });
    conversation.appendSystem(this.options.systemInstruction);

    const coordinator = new UploadCoordinator({
      pageId: this.options.pageId,
      workspace: this.deps.workspace,
      order: slides.map((slide) => slide.index),
      concurrency: this.options.uploadConcurrency,
      retry: this.options.retry,
      limits: this.options.limits,
      signal,
      sleep: this.options.sleep,
      random: this.options.random,
      onAppending: (index) => this.dispatch({ type: 'ADVANCE_STAGE', index, stage: 'appending' }),
      onCommitted: (index, outcome) => this.dispatch({ type: 'APPEND_SETTLED', index, outcome }),
    });

    await Promise.all([
      Promise.all(slides.map((slide) => this.uploadImage(coordinator, slide, signal))),
      this.analyzeSlides(conversation, coordinator, slides, signal),
    ]);
    await coordinator.flush();

    const sections = await this.appendClosingSections(conversation, coordinator, signal);
    const report = buildLectureReport({
      pageId: this.options.pageId,
      courseName: this.options.courseName,
      slides: this.state.slides,
      cancelled: this.state.cancelled,
      ...sections,
    });
    this.dispatch({
      type: 'LOG',
      entry: createLog(
        report.succeeded ? 'success' : 'warning',
        `Lecture finished: ${report.slides.length - report.failedSlides.length}/${report.slides.length} slides without failures.`,
      ),
    });
    return report;
  }

  private dispatch(action: Action): void {
    const previous = this.state;
    this.state = pipelineReducer(previous, action);

    for (const entry of this.state.logs.slice(previous.logs.length)) {
      if (entry.type === 'error') log.error(entry.message);
      else if (entry.type === 'warning') log.warn(entry.message);
      else log.info(entry.message);
    }

    if ('index' in action) {
      const before = previous.slides.find((slide) => slide.index === action.index);
      const after = this.state.slides.find((slide) => slide.index === action.index);
      if (after && after !== before) this.options.onUpdate?.(after);
    }
  }

  private async uploadImage(coordinator: UploadCoordinator, slide: Slide, signal?: AbortSignal): Promise<void> {
    if (!signal?.aborted) this.dispatch({ type: 'START_UPLOAD', index: slide.index });
    const outcome = await coordinator.uploadSlideImage(slide);
    this.dispatch({ type: 'UPLOAD_SETTLED', index: slide.index, outcome });
    coordinator.recordImage(slide.index, outcome);
  }

  // The analysis lane: one slide at a time, in page order.
  private async analyzeSlides(
    conversation: ConversationState,
    coordinator: UploadCoordinator,
    slides: Slide[],
    signal?: AbortSignal,
  ): Promise<void> {
    for (const slide of slides) {
      let outcome: ExplanationOutcome;
      if (signal?.aborted) {
        this.dispatch({ type: 'CANCEL' });
        outcome = { status: 'cancelled' };
      } else if (!slide.included) {
        outcome = { status: 'skipped' };
      } else {
        outcome = await this.analyzeSlide(conversation, slide);
      }
      this.dispatch({ type: 'EXPLANATION_SETTLED', index: slide.index, outcome });
      coordinator.recordExplanation(slide.index, outcome);
    }
    if (signal?.aborted) this.dispatch({ type: 'CANCEL' });
  }

  private async analyzeSlide(conversation: ConversationState, slide: Slide): Promise<ExplanationOutcome> {
    this.dispatch({ type: 'ADVANCE_STAGE', index: slide.index, stage: 'analyzing' });

    let raw: string;
    try {
      raw = await this.deps.gateway.analyzeSlide(conversation.snapshot(), slide);
    } catch (error: unknown) {
      if (error instanceof OrderingViolationError) throw error;
      const reason = describeError(error);
      conversation.recordSkip(slide.index, reason);
      return { status: 'failed', stage: 'analyzing', reason };
    }
    conversation.appendUser(
      { data: slide.image, mimeType: slide.mimeType },
      slide.index,
      this.options.slideInstruction ?? SLIDE_INSTRUCTION,
    );
    conversation.appendAssistant(raw, slide.index);

    this.dispatch({ type: 'ADVANCE_STAGE', index: slide.index, stage: 'parsing' });
    const response = parseSlideResponse(raw);
    const nodes: ExplanationNode[] = [
      ...(response.title ? [headingNode(SLIDE_TITLE_LEVEL, response.title)] : []),
      ...parseExplanation(response.body),
    ];

    this.dispatch({ type: 'ADVANCE_STAGE', index: slide.index, stage: 'compiling' });
    return { status: 'success', batches: compile(nodes, this.options.limits) };
  }

  private async appendClosingSections(
    conversation: ConversationState,
    coordinator: UploadCoordinator,
    signal?: AbortSignal,
  ): Promise<ClosingSections> {
    if (signal?.aborted || this.state.cancelled) {
      this.dispatch({ type: 'CANCEL' });
      const skipped: SectionOutcome = { status: 'skipped', reason: 'run cancelled' };
      return { summary: skipped, practiceQuestions: skipped };
    }
    if (conversation.assistantTurnCount === 0) {
      const skipped: SectionOutcome = { status: 'skipped', reason: 'no slide was explained' };
      return { summary: skipped, practiceQuestions: skipped };
    }

    let raw: string;
    try {
      raw = await this.deps.gateway.summarize(conversation.snapshot());
    } catch (error: unknown) {
      if (error instanceof OrderingViolationError) throw error;
      const failed: SectionOutcome = { status: 'failed', reason: describeError(error) };
      this.dispatch({ type: 'LOG', entry: createLog('error', `Lecture summary failed. Error: ${failed.reason}`) });
      return { summary: failed, practiceQuestions: failed };
    }

    const parsed = parseSummaryResponse(raw);
    const summary = await this.appendSection(coordinator, SUMMARY_HEADING, parsed.summary);
    const practiceQuestions = await this.appendSection(coordinator, PRACTICE_QUESTIONS_HEADING, parsed.practiceQuestions);
    return { summary, practiceQuestions };
  }

  private async appendSection(coordinator: UploadCoordinator, heading: string, body: string): Promise<SectionOutcome> {
    if (!body.trim()) return { status: 'skipped', reason: 'empty response' };
    const batches = compile([headingNode(1, heading), ...parseExplanation(body)], this.options.limits);
    try {
      const blockIds = await coordinator.appendExplanation(batches, heading);
      this.dispatch({ type: 'LOG', entry: createLog('success', `${heading} appended (${blockIds.length} blocks).`) });
      return { status: 'committed', blockIds };
    } catch (error: unknown) {
      if (error instanceof OrderingViolationError) throw error;
      const reason = describeError(error);
      this.dispatch({ type: 'LOG', entry: createLog('error', `${heading} could not be appended. Error: ${reason}`) });
      return { status: 'failed', reason };
    }
  }
}
