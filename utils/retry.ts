import {
  classifyServiceError,
  PermanentFailureError,
  PermanentServiceError,
  TransientServiceError,
  type ServiceName,
} from '../services/errors';
import type { Logger } from '../services/logger';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryContext {
  service: ServiceName;
  label: string;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export const REQUEST_TIMEOUT_MESSAGE = 'REQUEST_TIMEOUT';

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Wraps a promise with a timeout.
 */
export const withTimeout = <T>(promise: Promise<T>, timeoutMs: number): Promise<T> => {
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => reject(new Error(REQUEST_TIMEOUT_MESSAGE)), timeoutMs);
  });

  return Promise.race([promise, timeoutPromise]).finally(() => clearTimeout(timeoutHandle));
};

/**
 * Delay before retry `attempt` (1-based): exponential growth capped at
 * `maxDelayMs`, half of it fixed and half drawn at random.
 */
export const computeBackoffDelay = (attempt: number, options: RetryOptions, random: () => number = Math.random): number => {
  const exponential = Math.min(options.maxDelayMs, options.baseDelayMs * 2 ** (attempt - 1));
  const half = exponential / 2;
  return Math.round(half + random() * half);
};

export const runWithRetry = async <T>(fn: () => Promise<T>, options: RetryOptions, context: RetryContext): Promise<T> => {
  const wait = context.sleep ?? sleep;
  const random = context.random ?? Math.random;
  const attempts = Math.max(1, options.attempts);

  let lastError: TransientServiceError | undefined;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      const classified = classifyServiceError(context.service, error);
      if (classified instanceof PermanentServiceError) {
        context.logger.error(`${context.label} failed permanently on attempt ${attempt}: ${classified.message}`);
        throw new PermanentFailureError(context.service, 'permanent', attempt, classified);
      }
      lastError = classified;

      if (attempt < attempts) {
        const delay = computeBackoffDelay(attempt, options, random);
        context.logger.warn(
          `${context.label} failed (attempt ${attempt}/${attempts}): ${classified.message}. Retrying in ${delay}ms.`,
        );
        await wait(delay);
      }
    }
  }

  const exhausted = lastError ?? new TransientServiceError(context.service, `${context.label} failed`);
  context.logger.error(`${context.label} failed after ${attempts} attempts: ${exhausted.message}`);
  throw new PermanentFailureError(context.service, 'transient_exhausted', attempts, exhausted);
};
