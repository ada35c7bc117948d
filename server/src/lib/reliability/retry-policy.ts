/**
 * Retry Policy
 * Bounded retry-with-timeout for external HTTP calls
 */

import { logger } from '../logger/structured-logger.js';
import { isUpstreamError } from '../errors/upstream-error.js';
import { isTimeoutError, sleep, withTimeout } from './timeout-guard.js';

export interface RetryPolicyConfig {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Delay before attempt N (index 0 is ignored) */
  backoffMs: number[];
  /** Per-attempt timeout */
  timeoutMs: number;
}

export type ErrorCategory = 'timeout' | 'transport' | 'fatal';

export function categorizeError(error: unknown): ErrorCategory {
  if (isTimeoutError(error)) return 'timeout';
  if (isUpstreamError(error)) {
    if (error.kind === 'TIMEOUT') return 'timeout';
    return error.isRetriable ? 'transport' : 'fatal';
  }
  return 'fatal';
}

export class RetryPolicy {
  constructor(private readonly config: RetryPolicyConfig) {}

  /**
   * Run fn until it succeeds, a non-retriable error occurs, or attempts run out.
   * fn receives an AbortSignal that fires when the attempt times out.
   */
  async execute<T>(operation: string, fn: (signal: AbortSignal, attempt: number) => Promise<T>): Promise<T> {
    const { maxAttempts, backoffMs, timeoutMs } = this.config;
    let lastError: unknown = new Error(`${operation}: no attempts made`);

    for (let attempt = 0; attempt < Math.max(1, maxAttempts); attempt++) {
      const backoff = backoffMs[attempt] ?? 0;
      if (attempt > 0 && backoff > 0) {
        await sleep(backoff);
      }

      const controller = new AbortController();
      try {
        return await withTimeout(fn(controller.signal, attempt), timeoutMs, operation, () => controller.abort());
      } catch (error) {
        lastError = error;
        const category = categorizeError(error);

        if (category === 'fatal') {
          logger.debug({ operation, attempt: attempt + 1, category }, '[Retry] Non-retriable error, failing fast');
          throw error;
        }

        logger.warn({
          operation,
          attempt: attempt + 1,
          maxAttempts,
          category,
          error: error instanceof Error ? error.message : String(error)
        }, '[Retry] Retriable failure');
      }
    }

    throw lastError;
  }
}
