import { HttpError, NetworkError } from "../errors.js";

export interface RetryOptions {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  retryable?: (error: unknown) => boolean;
  /** Called before sleeping ahead of attempt `attempt + 1`. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Transient failures only: no response at all, 429, or a 5xx.
 * Any other 4xx means the request itself was rejected.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof NetworkError) return true;
  if (error instanceof HttpError) return error.status === 429 || error.status >= 500;
  if (!(error instanceof Error)) return false;
  const msg = error.message;
  if (/\b(429|500|502|503|504)\b/.test(msg)) return true;
  if (/ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED/i.test(msg)) return true;
  return false;
}

/**
 * Full-jitter exponential backoff: random delay in [0, min(cap, base * 2^attempt)]
 */
function fullJitterDelay(attempt: number, minMs: number, maxMs: number): number {
  const exponential = Math.min(maxMs, minMs * Math.pow(2, attempt));
  return Math.random() * exponential;
}

/**
 * Retry an async function with full-jitter exponential backoff.
 * Defaults: 3 attempts, 1s–30s delay range.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    minDelayMs = 1000,
    maxDelayMs = 30000,
    retryable = isRetryable,
    onRetry,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt + 1);
    } catch (error) {
      lastError = error;

      const isLast = attempt === maxAttempts - 1;
      if (isLast || !retryable(error)) {
        throw error;
      }

      const delay = fullJitterDelay(attempt, minDelayMs, maxDelayMs);
      onRetry?.(error, attempt + 1, delay);
      await new Promise<void>((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}
