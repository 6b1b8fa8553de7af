import {
  GoogleGenAI,
  Type,
  type Content,
  type GenerateContentConfig,
  type GenerateContentParameters,
  type Part,
  type Schema,
} from '@google/genai';
import type { ConversationTurn, ModelName, Slide, TurnPart } from '../types';
import { PermanentServiceError, TransientServiceError } from './errors';
import { createLogger } from './logger';
import { SLIDE_INSTRUCTION, SUMMARY_INSTRUCTION } from './prompts';
import { runWithRetry, withTimeout, type RetryOptions } from '../utils/retry';

const log = createLogger('Gemini');

// ======================================================================================
// RESPONSE SCHEMAS
// ======================================================================================

export const SLIDE_RESPONSE_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    title: { type: Type.STRING },
    explanation: { type: Type.STRING },
  },
  required: ['title', 'explanation'],
};

export const SUMMARY_RESPONSE_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    summary: { type: Type.STRING },
    practiceQuestions: { type: Type.STRING },
  },
  required: ['summary', 'practiceQuestions'],
};

// Finish reasons that mean the model refused rather than ran out of luck.
const BLOCKING_FINISH_REASONS = new Set(['SAFETY', 'PROHIBITED_CONTENT', 'BLOCKLIST', 'SPII', 'RECITATION', 'IMAGE_SAFETY']);

// ======================================================================================
// API INTERACTION LAYER
// ======================================================================================

export type GenerateContentResponseLike = {
  text?: string;
  promptFeedback?: { blockReason?: string };
  candidates?: Array<{ finishReason?: string }>;
};

/** A request as built here: contents are always a list of turns. */
export interface ModelRequest extends GenerateContentParameters {
  contents: Content[];
  config: GenerateContentConfig;
}

export interface GenerateContentClient {
  generateContent(params: GenerateContentParameters): Promise<GenerateContentResponseLike>;
}

export interface ModelGateway {
  analyzeSlide(snapshot: readonly ConversationTurn[], slide: Slide): Promise<string>;
  summarize(snapshot: readonly ConversationTurn[]): Promise<string>;
}

export interface GeminiGatewayOptions {
  model: ModelName;
  summaryModel?: ModelName;
  retry: RetryOptions;
  requestTimeoutMs: number;
  replayImages: boolean;
  slideInstruction?: string;
  summaryInstruction?: string;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export const createGeminiClient = (apiKey: string): GenerateContentClient => new GoogleGenAI({ apiKey }).models;

const toBase64 = (data: Uint8Array): string => Buffer.from(data).toString('base64');

const toPart = (part: TurnPart, slideIndex: number | undefined, replayImages: boolean): Part => {
  if (part.kind === 'text') return { text: part.text };
  if (replayImages) return { inlineData: { mimeType: part.mimeType, data: toBase64(part.data) } };
  return { text: `[Slide ${slideIndex ?? '?'} image]` };
};

/**
 * Maps the transcript onto Gemini's request shape: the system turn becomes the
 * system instruction, assistant turns become `model` contents.
 */
export const toContents = (
  snapshot: readonly ConversationTurn[],
  replayImages: boolean,
): { systemInstruction?: string; contents: Content[] } => {
  const system = snapshot.find((turn) => turn.role === 'system');
  const systemInstruction = system?.parts.flatMap((part) => (part.kind === 'text' ? [part.text] : [])).join('\n');

  const contents = snapshot
    .filter((turn) => turn.role !== 'system')
    .map(
      (turn): Content => ({
        role: turn.role === 'assistant' ? 'model' : 'user',
        parts: turn.parts.map((part) => toPart(part, turn.slideIndex, replayImages)),
      }),
    );

  return systemInstruction ? { systemInstruction, contents } : { contents };
};

const readResponseText = (response: GenerateContentResponseLike): string => {
  const text = response.text ?? '';
  if (text.trim()) return text;

  const blockReason = response.promptFeedback?.blockReason;
  const finishReason = response.candidates?.[0]?.finishReason;
  if (blockReason) {
    throw new PermanentServiceError('gemini', `Content rejected by the model service (${blockReason}).`);
  }
  if (finishReason && BLOCKING_FINISH_REASONS.has(finishReason)) {
    throw new PermanentServiceError('gemini', `Content rejected by the model service (${finishReason}).`);
  }
  throw new TransientServiceError('gemini', `Empty response from the model service (${finishReason ?? 'no finish reason'}).`);
};

export class GeminiGateway implements ModelGateway {
  constructor(
    private readonly client: GenerateContentClient,
    private readonly options: GeminiGatewayOptions,
  ) {}

  buildSlideRequest(snapshot: readonly ConversationTurn[], slide: Slide): ModelRequest {
    const { systemInstruction, contents } = toContents(snapshot, this.options.replayImages);
    const current: Content = {
      role: 'user',
      parts: [
        { text: this.options.slideInstruction ?? SLIDE_INSTRUCTION },
        { inlineData: { mimeType: slide.mimeType, data: toBase64(slide.image) } },
      ],
    };
    return {
      model: this.options.model,
      contents: [...contents, current],
      config: {
        ...(systemInstruction ? { systemInstruction } : {}),
        responseMimeType: 'application/json',
        responseSchema: SLIDE_RESPONSE_SCHEMA,
      },
    };
  }

  buildSummaryRequest(snapshot: readonly ConversationTurn[]): ModelRequest {
    const { systemInstruction, contents } = toContents(snapshot, this.options.replayImages);
    const current: Content = {
      role: 'user',
      parts: [{ text: this.options.summaryInstruction ?? SUMMARY_INSTRUCTION }],
    };
    return {
      model: this.options.summaryModel ?? this.options.model,
      contents: [...contents, current],
      config: {
        ...(systemInstruction ? { systemInstruction } : {}),
        responseMimeType: 'application/json',
        responseSchema: SUMMARY_RESPONSE_SCHEMA,
      },
    };
  }

  /**
   * Analyzes one slide against everything said about the earlier slides.
   */
  async analyzeSlide(snapshot: readonly ConversationTurn[], slide: Slide): Promise<string> {
    const request = this.buildSlideRequest(snapshot, slide);
    log.debug(`Sending slide ${slide.index} to ${request.model} with ${snapshot.length} transcript turns.`);
    const text = await this.generate(request, `Slide ${slide.index} analysis`);
    log.debug(`Received ${text.length} chars for slide ${slide.index}.`);
    return text;
  }

  async summarize(snapshot: readonly ConversationTurn[]): Promise<string> {
    const request = this.buildSummaryRequest(snapshot);
    log.debug(`Requesting lecture summary from ${request.model} over ${snapshot.length} turns.`);
    return this.generate(request, 'Lecture summary');
  }

  private generate(request: ModelRequest, label: string): Promise<string> {
    return runWithRetry(
      async () => readResponseText(await withTimeout(this.client.generateContent(request), this.options.requestTimeoutMs)),
      this.options.retry,
      { service: 'gemini', label, logger: log, sleep: this.options.sleep, random: this.options.random },
    );
  }
}
