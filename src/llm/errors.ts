/**
 * LLM-specific error types for promptline
 *
 * Classified backend failures extend {@link LLMError}; each carries the
 * native SDK error as `cause`.
 *
 * @module
 */

import {
  RuntimeError,
  RuntimeErrorCodes,
  type RuntimeErrorCode,
  type RuntimeErrorOptions,
} from '../types/errors.js';

/**
 * Base class for errors raised by the invocation pipeline.
 */
export class LLMError extends RuntimeError {
  /** Whether the retry controller may reissue the call after this error. */
  public readonly retryable: boolean;

  constructor(message: string, code: RuntimeErrorCode, retryable: boolean, options?: RuntimeErrorOptions) {
    super(message, code, options);
    this.name = 'LLMError';
    this.retryable = retryable;
  }
}

/**
 * Error thrown when the configuration is missing or invalid.
 */
export class LLMConfigError extends LLMError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[] | string) {
    const list = typeof issues === 'string' ? [issues] : issues;
    super(`Invalid LLM configuration: ${list.join('; ')}`, RuntimeErrorCodes.LLM_CONFIG_ERROR, false);
    this.name = 'LLMConfigError';
    this.issues = list;
  }
}

/**
 * Error thrown when a provider cannot be used (SDK missing, unsupported call).
 */
export class LLMProviderError extends LLMError {
  public readonly providerName: string;
  public readonly statusCode?: number;

  constructor(providerName: string, message: string, statusCode?: number, options?: RuntimeErrorOptions) {
    super(`${providerName} error: ${message}`, RuntimeErrorCodes.LLM_PROVIDER_ERROR, false, options);
    this.name = 'LLMProviderError';
    this.providerName = providerName;
    this.statusCode = statusCode;
  }
}

export interface ContextLengthDetails {
  model: string;
  actualTokens?: number;
  maxTokens?: number;
  cause?: unknown;
}

/**
 * The request does not fit the model's context window. Never retried.
 */
export class LLMContextLengthExceededError extends LLMError {
  public readonly model: string;
  public readonly actualTokens?: number;
  public readonly maxTokens?: number;

  constructor(details: ContextLengthDetails) {
    const actual = details.actualTokens ?? '?';
    const max = details.maxTokens ?? '?';
    super(
      `Context length exceeded for ${details.model}: ${actual} tokens requested, ${max} allowed`,
      RuntimeErrorCodes.LLM_CONTEXT_LENGTH_EXCEEDED,
      false,
      { cause: details.cause },
    );
    this.name = 'LLMContextLengthExceededError';
    this.model = details.model;
    this.actualTokens = details.actualTokens;
    this.maxTokens = details.maxTokens;
  }
}

/**
 * Error thrown when an LLM provider rejects authentication. Never retried.
 */
export class LLMAuthenticationError extends LLMError {
  public readonly providerName: string;
  public readonly statusCode?: number;

  constructor(providerName: string, statusCode?: number, options?: RuntimeErrorOptions) {
    const suffix = statusCode !== undefined ? ` (HTTP ${statusCode})` : '';
    super(`${providerName} authentication failed${suffix}`, RuntimeErrorCodes.LLM_AUTHENTICATION_ERROR, false, options);
    this.name = 'LLMAuthenticationError';
    this.providerName = providerName;
    this.statusCode = statusCode;
  }
}

/**
 * Error thrown when the account's quota or credit is exhausted.
 */
export class LLMQuotaExceededError extends LLMError {
  public readonly providerName: string;

  constructor(providerName: string, options?: RuntimeErrorOptions) {
    super(`${providerName} quota exceeded`, RuntimeErrorCodes.LLM_QUOTA_EXCEEDED, true, options);
    this.name = 'LLMQuotaExceededError';
    this.providerName = providerName;
  }
}

/**
 * Error thrown when model output does not hold the expected structured value.
 */
export class MalformedStructuredOutputError extends LLMError {
  /** The text that failed to parse. */
  public readonly text: string;

  constructor(message: string, text: string, options?: RuntimeErrorOptions) {
    super(message, RuntimeErrorCodes.LLM_MALFORMED_OUTPUT, true, options);
    this.name = 'MalformedStructuredOutputError';
    this.text = text;
  }
}

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}
