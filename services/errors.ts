export type ServiceName = 'gemini' | 'notion';

export class TransientServiceError extends Error {
  readonly service: ServiceName;
  readonly status?: number;

  constructor(service: ServiceName, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransientServiceError';
    this.service = service;
    this.status = options.status;
  }
}

export class PermanentServiceError extends Error {
  readonly service: ServiceName;
  readonly status?: number;

  constructor(service: ServiceName, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'PermanentServiceError';
    this.service = service;
    this.status = options.status;
  }
}

export type FailureKind = 'transient_exhausted' | 'permanent';

/**
 * Terminal outcome of a retried remote operation. `kind` tells callers whether
 * the service kept failing transiently or refused the request outright.
 */
export class PermanentFailureError extends Error {
  readonly service: ServiceName;
  readonly kind: FailureKind;
  readonly attempts: number;

  constructor(service: ServiceName, kind: FailureKind, attempts: number, cause: TransientServiceError | PermanentServiceError) {
    const prefix = kind === 'transient_exhausted' ? `gave up after ${attempts} attempts` : 'rejected';
    super(`${service} ${prefix}: ${cause.message}`, { cause });
    this.name = 'PermanentFailureError';
    this.service = service;
    this.kind = kind;
    this.attempts = attempts;
  }
}

/** Raised when content would reach the page or the transcript out of slide order. */
export class OrderingViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OrderingViolationError';
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// --- Classification ---

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'rate_limited',
  'conflict_error',
  'service_unavailable',
  'internal_server_error',
  'gateway_timeout',
  'notionhq_client_request_timeout',
]);

const TRANSIENT_MESSAGE_MARKERS = [
  'request_timeout',
  'resource_exhausted',
  'unavailable',
  'rate limit',
  'socket hang up',
  'fetch failed',
  'econnreset',
  'etimedout',
];

const readNumber = (value: object, key: string): number | undefined => {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
};

const readString = (value: object, key: string): string | undefined => {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
};

const collectCodes = (error: object): string[] => {
  const codes: string[] = [];
  let current: unknown = error;
  // Node network errors hide the socket code one or two `cause` levels down.
  for (let depth = 0; depth < 3 && typeof current === 'object' && current !== null; depth++) {
    const code = readString(current, 'code');
    if (code) codes.push(code);
    current = Reflect.get(current, 'cause');
  }
  return codes;
};

/**
 * Maps anything a remote client throws onto the transient/permanent taxonomy.
 * Unrecognised failures are permanent so they are never retried blindly.
 */
export const classifyServiceError = (
  service: ServiceName,
  error: unknown,
): TransientServiceError | PermanentServiceError => {
  if (error instanceof TransientServiceError || error instanceof PermanentServiceError) return error;

  if (typeof error !== 'object' || error === null) {
    return new PermanentServiceError(service, String(error), { cause: error });
  }

  const message = readString(error, 'message') ?? String(error);
  const status = readNumber(error, 'status') ?? readNumber(error, 'statusCode');

  if (status !== undefined) {
    if (TRANSIENT_STATUSES.has(status) || status >= 500) {
      return new TransientServiceError(service, message, { status, cause: error });
    }
    if (status >= 400) {
      return new PermanentServiceError(service, message, { status, cause: error });
    }
  }

  if (collectCodes(error).some((code) => TRANSIENT_CODES.has(code))) {
    return new TransientServiceError(service, message, { status, cause: error });
  }

  const lowered = message.toLowerCase();
  if (/\b(429|5\d\d)\b/.test(lowered) || TRANSIENT_MESSAGE_MARKERS.some((marker) => lowered.includes(marker))) {
    return new TransientServiceError(service, message, { status, cause: error });
  }

  return new PermanentServiceError(service, message, { status, cause: error });
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
