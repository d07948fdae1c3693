/**
 * Error classification entry point and helpers shared by the per-backend
 * classifiers.
 *
 * @module
 */

import { isRecord, readNumber, readString } from '../utils/type-guards.js';
import { LLMError } from './errors.js';
import type { ErrorClassifier } from './types.js';

/** Constructor name of an error object (`BadRequestError`, `ApiError`, ...). */
export function errorClassName(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const ctor: unknown = error.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : undefined;
}

/** HTTP status carried by an SDK error (`status`, or `status_code` for ollama). */
export function errorStatus(error: unknown): number | undefined {
  return readNumber(error, 'status') ?? readNumber(error, 'status_code') ?? readNumber(error, 'statusCode');
}

/** Vendor error code, from the error itself or its parsed body. */
export function errorCode(error: unknown): string | undefined {
  const direct = readString(error, 'code');
  if (direct) return direct;
  if (!isRecord(error)) return undefined;
  return readString(error.error, 'code') ?? readString(error.error, 'type');
}

/** Everything textual on the error: message plus any string body. */
export function errorText(error: unknown): string {
  const parts: string[] = [];
  if (error instanceof Error) parts.push(error.message);
  else if (typeof error === 'string') parts.push(error);
  if (isRecord(error)) {
    const body = error.error;
    if (typeof body === 'string') parts.push(body);
    else if (isRecord(body)) {
      const nested = readString(body, 'message');
      if (nested) parts.push(nested);
    }
  }
  return parts.join('\n');
}

/** First capture group of `pattern` in `text` as an integer. */
export function matchInt(pattern: RegExp, text: string, group = 1): number | undefined {
  const match = pattern.exec(text);
  const value = match?.[group];
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function isAuthStatus(status: number | undefined): boolean {
  return status === 401 || status === 403;
}

/**
 * Classify a failure with the backend's classifier. Errors raised by this
 * library pass through unchanged.
 */
export function classifyError(classifier: ErrorClassifier, error: unknown, model: string): LLMError | null {
  if (error instanceof LLMError) return error;
  return classifier.classify(error, model);
}
