/**
 * Retry logic with a fixed backoff, stretched by the server's Retry-After
 */

import { InferenceError, RateLimitError } from './errors';
import type { Sleep } from './types';

export interface RetryConfig {
  /** Total attempts, including the first */
  attempts: number;
  /** Delay between attempts in milliseconds */
  backoffMs: number;
  /** Ceiling for a server-requested delay (Retry-After) */
  maxDelayMs: number;
  /** Errors that are worth another attempt; anything else is rethrown at once */
  retryOn: (error: unknown) => boolean;
  sleep: Sleep;
  onRetry?: (attempt: number, error: unknown) => void;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isInferenceFailure(error: unknown): boolean {
  return error instanceof InferenceError;
}

/**
 * Inference failures another attempt could fix
 */
export function isRetryableFailure(error: unknown): boolean {
  return error instanceof InferenceError && error.retryable;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  attempts: 3,
  backoffMs: 2000,
  maxDelayMs: 60000,
  retryOn: isRetryableFailure,
  sleep,
};

function delayFor(error: unknown, cfg: RetryConfig): number {
  // For rate limit errors, honour Retry-After when it asks for longer
  if (error instanceof RateLimitError && error.retryAfter) {
    return Math.min(cfg.maxDelayMs, Math.max(cfg.backoffMs, error.retryAfter * 1000));
  }
  return cfg.backoffMs;
}

/**
 * Execute function with retry logic
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const cfg: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const attempts = Math.max(1, cfg.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!cfg.retryOn(error)) {
        throw error;
      }
      lastError = error;

      if (attempt < attempts) {
        cfg.onRetry?.(attempt, error);
        await cfg.sleep(delayFor(error, cfg));
      }
    }
  }

  throw lastError;
}
