/**
 * Failure modes of the inference service. Everything here is recoverable per
 * chunk: the analyzer retries what is `retryable`, then falls back to "no
 * timestamps". Non-retryable failures (bad key, bad request, spent quota) skip
 * straight to the fallback.
 */

import type { GeminiErrorBody } from './types';

export class InferenceError extends Error {
  statusCode?: number;
  /** Gemini's canonical status (`UNAVAILABLE`, `RESOURCE_EXHAUSTED`...) when known */
  errorCode?: string;
  details?: Record<string, unknown>;
  /** Whether another attempt can succeed */
  retryable = true;

  constructor(
    message: string,
    statusCode?: number,
    errorCode?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'InferenceError';
    this.statusCode = statusCode;
    this.errorCode = errorCode;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    const parts = [this.message];
    if (this.statusCode) {
      parts.push(`(status: ${this.statusCode})`);
    }
    if (this.errorCode) {
      parts.push(`(code: ${this.errorCode})`);
    }
    return parts.join(' ');
  }
}

/**
 * Chunk media could not be uploaded
 */
export class UploadError extends InferenceError {
  constructor(message: string, statusCode?: number, errorCode?: string, details?: Record<string, unknown>) {
    super(message, statusCode, errorCode, details);
    this.name = 'UploadError';
  }
}

/**
 * Key missing, invalid, or not allowed to use the model
 */
export class InvalidAPIKeyError extends InferenceError {
  retryable = false;

  constructor(message: string, statusCode?: number, errorCode?: string, details?: Record<string, unknown>) {
    super(message, statusCode, errorCode, details);
    this.name = 'InvalidAPIKeyError';
  }
}

/**
 * Uploaded file expired or model id unknown
 */
export class NotFoundError extends InferenceError {
  retryable = false;

  constructor(message: string, statusCode?: number, errorCode?: string, details?: Record<string, unknown>) {
    super(message, statusCode, errorCode, details);
    this.name = 'NotFoundError';
  }
}

/**
 * Request rejected as malformed
 */
export class ValidationError extends InferenceError {
  retryable = false;

  constructor(message: string, statusCode?: number, errorCode?: string, details?: Record<string, unknown>) {
    super(message, statusCode, errorCode, details);
    this.name = 'ValidationError';
  }
}

/**
 * Short-term rate limit; `retryAfter` (seconds) is the server's hint
 */
export class RateLimitError extends InferenceError {
  retryAfter?: number;

  constructor(
    message: string,
    retryAfter?: number,
    statusCode?: number,
    errorCode?: string,
    details?: Record<string, unknown>
  ) {
    super(message, statusCode, errorCode, details);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

/**
 * Project quota spent; waiting seconds will not bring it back
 */
export class QuotaExceededError extends InferenceError {
  retryable = false;

  constructor(message: string, statusCode?: number, errorCode?: string, details?: Record<string, unknown>) {
    super(message, statusCode, errorCode, details);
    this.name = 'QuotaExceededError';
  }
}

/**
 * Server error (5xx)
 */
export class ServerError extends InferenceError {
  constructor(message: string, statusCode?: number, errorCode?: string, details?: Record<string, unknown>) {
    super(message, statusCode, errorCode, details);
    this.name = 'ServerError';
  }
}

export class NetworkError extends InferenceError {
  constructor(message: string) {
    super(message);
    this.name = 'NetworkError';
  }
}

/**
 * Request or readiness wait timed out
 */
export class TimeoutError extends InferenceError {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * 2xx answer whose body is not the JSON shape the endpoint documents
 */
export class InvalidResponseError extends InferenceError {
  constructor(message: string, statusCode?: number, details?: Record<string, unknown>) {
    super(message, statusCode, 'invalid_response', details);
    this.name = 'InvalidResponseError';
  }
}

/**
 * Model answered without any text (blocked or empty candidates)
 */
export class EmptyResponseError extends InferenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, undefined, 'empty_response', details);
    this.name = 'EmptyResponseError';
  }
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Seconds from a `google.rpc.RetryInfo` detail (`retryDelay: "12s"`)
 */
export function retryDelayFromDetails(details: unknown[] | undefined): number | undefined {
  for (const d of details ?? []) {
    if (!isRecord(d) || typeof d['@type'] !== 'string' || !d['@type'].endsWith('google.rpc.RetryInfo')) {
      continue;
    }
    const m = typeof d.retryDelay === 'string' ? /^(\d+(?:\.\d+)?)s$/.exec(d.retryDelay) : null;
    if (m) return Math.ceil(Number(m[1]));
  }
  return undefined;
}

function retryAfterSeconds(response: Response, details: unknown[] | undefined): number | undefined {
  const header = response.headers.get('Retry-After');
  const fromHeader = header ? parseInt(header, 10) : NaN;
  return Number.isFinite(fromHeader) ? fromHeader : retryDelayFromDetails(details);
}

type ErrorKind = 'auth' | 'not_found' | 'invalid' | 'throttled' | 'server' | 'other';

// Gemini's canonical status wins over the HTTP code; proxies rewrite the latter
const KIND_BY_STATUS: Record<string, ErrorKind> = {
  UNAUTHENTICATED: 'auth',
  PERMISSION_DENIED: 'auth',
  NOT_FOUND: 'not_found',
  INVALID_ARGUMENT: 'invalid',
  FAILED_PRECONDITION: 'invalid',
  OUT_OF_RANGE: 'invalid',
  RESOURCE_EXHAUSTED: 'throttled',
  INTERNAL: 'server',
  UNAVAILABLE: 'server',
  DEADLINE_EXCEEDED: 'server',
};

function kindOf(statusCode: number, errorCode: string | undefined): ErrorKind {
  const byStatus = errorCode ? KIND_BY_STATUS[errorCode] : undefined;
  if (byStatus) return byStatus;
  if (statusCode === 401 || statusCode === 403) return 'auth';
  if (statusCode === 404) return 'not_found';
  if (statusCode === 400) return 'invalid';
  if (statusCode === 429) return 'throttled';
  if (statusCode >= 500) return 'server';
  return 'other';
}

/**
 * Map a non-2xx Gemini response to the matching error and throw it
 */
export function handleErrorResponse(response: Response, errorData?: GeminiErrorBody): never {
  const statusCode = response.status;
  const body = errorData?.error;
  const errorCode = body?.status || 'unknown_error';
  const message = body?.message || response.statusText || `HTTP ${statusCode}`;
  const details = body?.details ? { details: body.details } : undefined;

  switch (kindOf(statusCode, body?.status)) {
    case 'auth':
      throw new InvalidAPIKeyError(message, statusCode, errorCode, details);
    case 'not_found':
      throw new NotFoundError(message, statusCode, errorCode, details);
    case 'invalid':
      throw new ValidationError(message, statusCode, errorCode, details);
    case 'throttled':
      // Both arrive as RESOURCE_EXHAUSTED; only the message tells a spent quota apart
      if (/quota/i.test(message)) {
        throw new QuotaExceededError(message, statusCode, errorCode, details);
      }
      throw new RateLimitError(message, retryAfterSeconds(response, body?.details), statusCode, errorCode, details);
    case 'server':
      throw new ServerError(message, statusCode, errorCode, details);
    case 'other':
      throw new InferenceError(message, statusCode, errorCode, details);
  }
}
