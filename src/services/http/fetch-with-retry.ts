/**
 * @fileoverview Retry wrapper for outbound HTTP calls to provider APIs.
 *
 * Handles transient network failures and retryable HTTP statuses, and puts a
 * timeout on every attempt.
 */

import { createLogger } from '../../utils/observability/index.js';

const logger = createLogger({ domain: 'http' });

/** Retryable network error codes commonly surfaced by undici/fetch. */
const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

export interface FetchWithRetryOptions {
  /** Human-readable operation label for logs */
  operation: string;
  /** Delays between retries in milliseconds (attempts = delays + 1) */
  retryDelaysMs?: number[];
  /** Per-attempt timeout */
  timeoutMs?: number;
}

/** Retryable HTTP statuses for transient upstream issues. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

/**
 * Extract network error code from a fetch error's cause when available.
 */
function getErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }

  const cause = error.cause;
  if (!cause || typeof cause !== 'object' || !('code' in cause)) {
    return undefined;
  }

  return typeof cause.code === 'string' ? cause.code : undefined;
}

/**
 * Detect transient fetch errors that are worth retrying.
 * Timeouts are not retried: the provider chain moves on instead.
 */
function isRetryableFetchError(error: unknown): boolean {
  if (!(error instanceof TypeError)) {
    return false;
  }

  const code = getErrorCode(error);
  if (code && RETRYABLE_ERROR_CODES.has(code)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return message.includes('fetch failed') || message.includes('network');
}

function delayMs(attempt: number, retryDelaysMs: number[]): number {
  return retryDelaysMs[Math.min(attempt - 1, retryDelaysMs.length - 1)];
}

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Fetch with retries for transient failures.
 *
 * A non-OK response that is not retryable (or out of attempts) is returned
 * as-is; callers decide what a 4xx means for them.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  options: FetchWithRetryOptions
): Promise<Response> {
  const retryDelaysMs = options.retryDelaysMs ?? [250, 750];
  const totalAttempts = retryDelaysMs.length + 1;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    const signal = options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : init.signal;
    try {
      const response = await fetch(url, { ...init, signal });
      if (response.ok) {
        return response;
      }

      const canRetry = attempt < totalAttempts && isRetryableStatus(response.status);
      if (!canRetry) {
        return response;
      }

      const waitMs = delayMs(attempt, retryDelaysMs);
      logger.warn('http_retryable_status', {
        operation: options.operation,
        status: response.status,
        attempt,
        totalAttempts,
        retryInMs: waitMs,
      });
      await sleep(waitMs);
    } catch (error) {
      const canRetry = attempt < totalAttempts && isRetryableFetchError(error);
      if (!canRetry) {
        throw error;
      }

      const waitMs = delayMs(attempt, retryDelaysMs);
      logger.warn('http_transient_error', {
        operation: options.operation,
        error: error instanceof Error ? error.message : String(error),
        errorCode: getErrorCode(error),
        attempt,
        totalAttempts,
        retryInMs: waitMs,
      });
      await sleep(waitMs);
    }
  }

  throw new Error(`${options.operation} failed after retries`);
}
