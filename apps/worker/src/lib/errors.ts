// ============ TAXONOMY ============
export type ErrorDomain = 'auth' | 'enumeration' | 'extraction' | 'write' | 'config';

export type AuthErrorKind = 'unauthorized' | 'transient';
export type EnumerationErrorKind = 'partial' | 'total';
export type ExtractionErrorKind = 'permission-denied' | 'quota' | 'not-found' | 'transient';
export type WriteErrorKind = 'batch-retryable' | 'fatal-configuration';

/**
 * Base class for every failure the pipeline knows how to classify.
 * `errorClass` (`<domain>.<kind>`) is the key used in the run summary.
 */
export abstract class PipelineError<K extends string = string> extends Error {
  abstract readonly domain: ErrorDomain;
  readonly kind: K;
  readonly retryable: boolean;

  constructor(kind: K, message: string, options: { retryable: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.retryable = options.retryable;
  }

  get errorClass(): string {
    return `${this.domain}.${this.kind}`;
  }
}

export class AuthError extends PipelineError<AuthErrorKind> {
  readonly domain = 'auth';

  constructor(kind: AuthErrorKind, message: string, cause?: unknown) {
    super(kind, message, { retryable: kind === 'transient', cause });
  }
}

export class EnumerationError extends PipelineError<EnumerationErrorKind> {
  readonly domain = 'enumeration';

  constructor(kind: EnumerationErrorKind, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(kind, message, { retryable: options.retryable ?? false, cause: options.cause });
  }
}

export class ExtractionError extends PipelineError<ExtractionErrorKind> {
  readonly domain = 'extraction';

  constructor(kind: ExtractionErrorKind, message: string, cause?: unknown) {
    super(kind, message, { retryable: kind === 'quota' || kind === 'transient', cause });
  }
}

export class WriteError extends PipelineError<WriteErrorKind> {
  readonly domain = 'write';

  constructor(kind: WriteErrorKind, message: string, cause?: unknown) {
    super(kind, message, { retryable: kind === 'batch-retryable', cause });
  }
}

export class ConfigError extends PipelineError<'invalid'> {
  readonly domain = 'config';
  readonly issues: string[];

  constructor(issues: string[]) {
    super('invalid', `Invalid configuration: ${issues.join('; ')}`, { retryable: false });
    this.issues = issues;
  }
}

export class CallTimeoutError extends Error {
  constructor(readonly label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
  }
}

// ============ GOOGLE API ERROR INSPECTION ============
const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

// Drive and the Admin SDK report per-user rate limits as 403 with one of these reasons
const QUOTA_REASONS = new Set([
  'rateLimitExceeded',
  'userRateLimitExceeded',
  'quotaExceeded',
  'dailyLimitExceeded',
  'RESOURCE_EXHAUSTED',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** HTTP status of a gaxios error (or anything shaped like one). */
export function httpStatusOf(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  const response = error.response;
  if (isRecord(response) && typeof response.status === 'number') return response.status;
  if (typeof error.status === 'number') return error.status;
  if (typeof error.code === 'number') return error.code;
  if (typeof error.code === 'string' && /^\d{3}$/.test(error.code)) return Number(error.code);
  return undefined;
}

export function errorReasonsOf(error: unknown): string[] {
  if (!isRecord(error)) return [];
  const reasons: string[] = [];
  const collect = (errors: unknown) => {
    if (!Array.isArray(errors)) return;
    for (const entry of errors) {
      if (isRecord(entry) && typeof entry.reason === 'string') reasons.push(entry.reason);
    }
  };

  collect(error.errors);
  const response = error.response;
  if (isRecord(response) && isRecord(response.data) && isRecord(response.data.error)) {
    const body = response.data.error;
    collect(body.errors);
    if (typeof body.status === 'string') reasons.push(body.status);
  }
  return reasons;
}

export function isNetworkFailure(error: unknown): boolean {
  if (!isRecord(error)) return false;
  if (typeof error.code === 'string' && NETWORK_ERROR_CODES.has(error.code)) return true;
  const cause = error.cause;
  return isRecord(cause) && typeof cause.code === 'string' && NETWORK_ERROR_CODES.has(cause.code);
}

export function isQuotaFailure(error: unknown): boolean {
  if (httpStatusOf(error) === 429) return true;
  return errorReasonsOf(error).some((reason) => QUOTA_REASONS.has(reason));
}

export function isTransientFailure(error: unknown): boolean {
  if (error instanceof PipelineError) return error.retryable;
  if (error instanceof CallTimeoutError) return true;
  if (isNetworkFailure(error) || isQuotaFailure(error)) return true;
  const status = httpStatusOf(error);
  return status !== undefined && status >= 500;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

// ============ CLASSIFIERS ============
export function classifyAuthError(error: unknown): AuthError {
  if (error instanceof AuthError) return error;
  const message = describeError(error);
  if (isTransientFailure(error)) return new AuthError('transient', message, error);
  const status = httpStatusOf(error);
  // No status at all means the request never got an answer
  if (status === undefined) return new AuthError('transient', message, error);
  return new AuthError('unauthorized', message, error);
}

export function classifyExtractionError(error: unknown): ExtractionError {
  if (error instanceof ExtractionError) return error;
  const message = describeError(error);
  if (error instanceof CallTimeoutError || isNetworkFailure(error)) {
    return new ExtractionError('transient', message, error);
  }
  if (isQuotaFailure(error)) return new ExtractionError('quota', message, error);

  const status = httpStatusOf(error);
  if (status === 401 || status === 403) return new ExtractionError('permission-denied', message, error);
  if (status === 404) return new ExtractionError('not-found', message, error);
  if (status !== undefined && status >= 400 && status < 500) {
    return new ExtractionError('not-found', message, error);
  }
  return new ExtractionError('transient', message, error);
}

export function classifyWriteError(error: unknown): WriteError {
  if (error instanceof WriteError) return error;
  const message = describeError(error);
  if (isTransientFailure(error)) return new WriteError('batch-retryable', message, error);
  const status = httpStatusOf(error);
  if (status === undefined) return new WriteError('batch-retryable', message, error);
  return new WriteError('fatal-configuration', message, error);
}

export function errorClassOf(error: unknown): string {
  if (error instanceof PipelineError) return error.errorClass;
  return 'unknown';
}
