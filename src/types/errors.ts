/**
 * Error types and utilities for promptline
 *
 * Provides the base error class and string error codes shared by every
 * module. LLM-specific error classes live in `llm/errors.ts`.
 */

// ============================================================================
// Runtime Error Codes
// ============================================================================

/**
 * String error codes for library errors.
 */
export const RuntimeErrorCodes = {
  /** Configuration is missing or invalid */
  LLM_CONFIG_ERROR: 'LLM_CONFIG_ERROR',
  /** LLM provider is unusable (missing SDK, unsupported operation) */
  LLM_PROVIDER_ERROR: 'LLM_PROVIDER_ERROR',
  /** Prompt exceeds the model context window */
  LLM_CONTEXT_LENGTH_EXCEEDED: 'LLM_CONTEXT_LENGTH_EXCEEDED',
  /** Provider rejected the credentials */
  LLM_AUTHENTICATION_ERROR: 'LLM_AUTHENTICATION_ERROR',
  /** Account quota or credit is exhausted */
  LLM_QUOTA_EXCEEDED: 'LLM_QUOTA_EXCEEDED',
  /** Model output does not contain the expected structured value */
  LLM_MALFORMED_OUTPUT: 'LLM_MALFORMED_OUTPUT',
  /** Key-value storage operation failed */
  STORAGE_ERROR: 'STORAGE_ERROR',
} as const;

/** Union type of all runtime error code values */
export type RuntimeErrorCode = (typeof RuntimeErrorCodes)[keyof typeof RuntimeErrorCodes];

// ============================================================================
// Base Runtime Error Class
// ============================================================================

export interface RuntimeErrorOptions {
  /** Underlying failure, preserved in the error chain */
  cause?: unknown;
}

/**
 * Base error class for all library errors.
 *
 * @example
 * ```typescript
 * throw new RuntimeError('Something went wrong', RuntimeErrorCodes.LLM_PROVIDER_ERROR);
 * ```
 */
export class RuntimeError extends Error {
  /** The error code identifying this error type */
  public readonly code: RuntimeErrorCode;

  constructor(message: string, code: RuntimeErrorCode, options?: RuntimeErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RuntimeError';
    this.code = code;
    // Using this.constructor hides subclass constructors from the stack.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when a storage backend cannot complete an operation.
 */
export class StorageError extends RuntimeError {
  public readonly key: string;

  constructor(key: string, message: string, options?: RuntimeErrorOptions) {
    super(`Storage operation failed for "${key}": ${message}`, RuntimeErrorCodes.STORAGE_ERROR, options);
    this.name = 'StorageError';
    this.key = key;
  }
}

/**
 * Type guard for library errors.
 */
export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}
