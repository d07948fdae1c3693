/**
 * promptline - a typed LLM invocation pipeline
 *
 * Main entry point. Re-exports the client, configuration, storage and the
 * small utilities callers use around model output.
 *
 * @packageDocumentation
 */

export * from './llm/index.js';
export * from './config/index.js';
export * from './storage/index.js';

export { RuntimeError, RuntimeErrorCodes, StorageError, isRuntimeError } from './types/errors.js';
export { createLogger, silentLogger, isLogLevel, type Logger, type LogLevel } from './utils/logger.js';
export { runParallel, type RunParallelOptions } from './utils/async.js';
export { countTokens, truncateToTokens } from './utils/tokens.js';
export { extractNumber, type ExtractNumberOptions } from './utils/numeric.js';

export const VERSION = '0.1.0';
