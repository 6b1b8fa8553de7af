import { z } from 'zod';
import { createLogger } from '../services/logger';

const log = createLogger('Parser');

const SlideEnvelopeSchema = z.object({
  title: z.string().optional().default(''),
  explanation: z.string(),
});

const SummaryEnvelopeSchema = z.object({
  summary: z.string(),
  practiceQuestions: z.string().optional().default(''),
});

export interface SlideResponse {
  title: string | null;
  body: string;
}

export interface SummaryResponse {
  summary: string;
  practiceQuestions: string;
}

const PRACTICE_HEADING = /^\s{0,3}#{1,6}\s*(?:\S+\s+)?practice\s+questions\b.*$/im;

/**
 * Strips a wrapping code fence the model sometimes adds around JSON.
 */
const unwrapFence = (text: string): string =>
  text.replace(/^\s*```(?:json)?\s*\n?/i, '').replace(/\n?\s*```\s*$/i, '').trim();

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

/**
 * Reads the JSON envelope, recovering an object embedded in stray text.
 * Returns undefined when no object can be read.
 */
const readEnvelope = <T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined => {
  const candidates = [unwrapFence(raw)];
  const embedded = raw.match(/\{[\s\S]*\}/);
  if (embedded) candidates.push(embedded[0]);

  for (const candidate of candidates) {
    const result = schema.safeParse(parseJson(candidate));
    if (result.success) return result.data;
  }
  return undefined;
};

export const parseSlideResponse = (raw: string): SlideResponse => {
  const envelope = readEnvelope(raw, SlideEnvelopeSchema);
  if (!envelope) {
    log.debug('Slide response had no readable envelope; using the raw text as the explanation.');
    return { title: null, body: unwrapFence(raw) };
  }
  const title = envelope.title.trim();
  return { title: title || null, body: envelope.explanation };
};

export const parseSummaryResponse = (raw: string): SummaryResponse => {
  const envelope = readEnvelope(raw, SummaryEnvelopeSchema);
  if (envelope) return envelope;

  log.debug('Summary response had no readable envelope; splitting on the practice-questions heading.');
  const text = unwrapFence(raw);
  const heading = PRACTICE_HEADING.exec(text);
  if (!heading) return { summary: text, practiceQuestions: '' };
  return {
    summary: text.slice(0, heading.index).trim(),
    practiceQuestions: text.slice(heading.index + heading[0].length).trim(),
  };
};
