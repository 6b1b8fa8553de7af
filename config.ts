import { z } from 'zod';
import { AVAILABLE_MODELS, type ModelName, type StructuralLimits } from './types';
import { ConfigError } from './services/errors';
import type { LogLevel } from './services/logger';
import type { RetryOptions } from './utils/retry';

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  geminiApiKey: string;
  notionApiKey: string;
  model: ModelName;
  summaryModel: ModelName;
  retry: RetryOptions;
  requestTimeoutMs: number;
  uploadConcurrency: number;
  limits: StructuralLimits;
  replayImages: boolean;
  contextWarningTurns: number;
  logLevel: LogLevel;
}

export const COURSE_PAGE_PREFIX = 'NOTION_PAGE_';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string({ required_error: 'is required (API_KEY is accepted too)' }),
  NOTION_API_KEY: z.string({ required_error: 'is required' }),
  GEMINI_MODEL: z.enum(AVAILABLE_MODELS).default('gemini-2.5-pro'),
  SUMMARY_MODEL: z.enum(AVAILABLE_MODELS).optional(),
  RETRY_ATTEMPTS: positiveInt(3),
  RETRY_BASE_DELAY_MS: positiveInt(2000),
  RETRY_MAX_DELAY_MS: positiveInt(30000),
  REQUEST_TIMEOUT_MS: positiveInt(120000),
  UPLOAD_CONCURRENCY: positiveInt(4),
  NOTION_MAX_BLOCKS_PER_APPEND: positiveInt(100),
  NOTION_MAX_CHARS_PER_RUN: positiveInt(2000),
  NOTION_MAX_EQUATION_CHARS: positiveInt(1000),
  NOTION_MAX_ARRAY_LENGTH: positiveInt(100),
  // Notion accepts two levels of children per append request.
  NOTION_MAX_NESTING_DEPTH: z.coerce.number().int().min(0).max(2).default(2),
  REPLAY_SLIDE_IMAGES: flag(false),
  CONTEXT_WARNING_TURNS: positiveInt(120),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

// Blank values count as unset; API_KEY stands in for GEMINI_API_KEY.
const normalizeEnv = (env: Env): Record<string, string> => {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    const trimmed = value?.trim();
    if (trimmed) cleaned[key] = trimmed;
  }
  if (!cleaned.GEMINI_API_KEY && cleaned.API_KEY) cleaned.GEMINI_API_KEY = cleaned.API_KEY;
  return cleaned;
};

/**
 * Validates the environment. Every offending variable is reported at once.
 */
export const loadConfig = (env: Env = process.env): AppConfig => {
  const result = EnvSchema.safeParse(normalizeEnv(env));
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'environment'}: ${issue.message}`),
    );
  }

  const parsed = result.data;
  if (parsed.RETRY_MAX_DELAY_MS < parsed.RETRY_BASE_DELAY_MS) {
    throw new ConfigError(['RETRY_MAX_DELAY_MS: must not be smaller than RETRY_BASE_DELAY_MS']);
  }

  return {
    geminiApiKey: parsed.GEMINI_API_KEY,
    notionApiKey: parsed.NOTION_API_KEY,
    model: parsed.GEMINI_MODEL,
    summaryModel: parsed.SUMMARY_MODEL ?? parsed.GEMINI_MODEL,
    retry: {
      attempts: parsed.RETRY_ATTEMPTS,
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
      maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
    },
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    uploadConcurrency: parsed.UPLOAD_CONCURRENCY,
    limits: {
      maxBlocksPerRequest: parsed.NOTION_MAX_BLOCKS_PER_APPEND,
      maxCharsPerRun: parsed.NOTION_MAX_CHARS_PER_RUN,
      maxCharsPerEquation: parsed.NOTION_MAX_EQUATION_CHARS,
      maxArrayLength: parsed.NOTION_MAX_ARRAY_LENGTH,
      maxNestingDepth: parsed.NOTION_MAX_NESTING_DEPTH,
    },
    replayImages: parsed.REPLAY_SLIDE_IMAGES,
    contextWarningTurns: parsed.CONTEXT_WARNING_TURNS,
    logLevel: parsed.LOG_LEVEL,
  };
};

export const coursePageKey = (courseName: string): string =>
  `${COURSE_PAGE_PREFIX}${courseName.trim().toUpperCase().replace(/\s+/g, '_')}`;

export const resolveCoursePageId = (courseName: string, env: Env = process.env): string => {
  const key = coursePageKey(courseName);
  const pageId = env[key]?.trim();
  if (!pageId) {
    throw new ConfigError([`${key}: no destination page configured for course "${courseName}"`]);
  }
  return pageId;
};

const titleCase = (words: string): string =>
  words
    .toLowerCase()
    .split(' ')
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1) : word))
    .join(' ');

/** Course names derived from the configured NOTION_PAGE_* variables, sorted. */
export const discoverCourses = (env: Env = process.env): string[] =>
  Object.entries(env)
    .filter(([key, value]) => key.startsWith(COURSE_PAGE_PREFIX) && key.length > COURSE_PAGE_PREFIX.length && value?.trim())
    .map(([key]) => titleCase(key.slice(COURSE_PAGE_PREFIX.length).replace(/_/g, ' ')))
    .sort();
