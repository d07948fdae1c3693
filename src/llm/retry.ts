/**
 * Retry orchestration around a single provider call.
 *
 * Retries are immediate: pacing belongs to the vendor SDK's own transport
 * retry layer.
 *
 * @module
 */

import { silentLogger, type Logger } from '../utils/logger.js';
import { toErrorMessage } from '../utils/async.js';
import { clampInteger } from '../utils/numeric.js';
import type { LLMError } from './errors.js';

export interface RetryOptions {
  /** Attempts allowed after the first one. */
  retries: number;
  /** Maps a failure to the canonical taxonomy, or `null` when unrecognized. */
  classify: (error: unknown) => LLMError | null;
  logger?: Logger;
  /** Shown in retry warnings. */
  label?: string;
}

export interface RetryOutcome<T> {
  result: T;
  /** Budget left after the successful attempt. */
  remainingRetries: number;
}

/**
 * Invoke `thunk` until it succeeds or the budget runs out.
 *
 * A classified error is thrown in place of the original (which stays
 * reachable as `cause`); unrecognized failures are rethrown unmodified.
 * Errors whose kind is not retryable stop the loop immediately.
 */
export async function callWithRetries<T>(
  thunk: () => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const logger = options.logger ?? silentLogger;
  const label = options.label ?? 'LLM call';
  let remaining = clampInteger(options.retries, 0, 0);

  for (;;) {
    try {
      const result = await thunk();
      return { result, remainingRetries: remaining };
    } catch (err) {
      const classified = options.classify(err);
      if ((classified !== null && !classified.retryable) || remaining <= 0) {
        throw classified ?? err;
      }
      remaining--;
      logger.warn(`${label} failed: ${toErrorMessage(classified ?? err)}. Retrying (${remaining} left)`);
    }
  }
}

/**
 * Handle for reissuing a completed call with the budget it had left.
 */
export class RetryContinuation<TRequest, TResult> {
  constructor(
    readonly remainingRetries: number,
    readonly request: TRequest,
    private readonly reissue: (request: TRequest, retries: number) => Promise<TResult>,
  ) {}

  resume(): Promise<TResult> {
    return this.reissue(this.request, this.remainingRetries);
  }
}
