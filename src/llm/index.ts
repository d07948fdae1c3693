/**
 * LLM invocation pipeline for promptline
 *
 * One client per configured backend: prompt normalization, response
 * caching, retries with error classification, stream assembly and
 * structured-output extraction.
 *
 * @module
 */

// Core types
export type {
  BackendType,
  CallRequest,
  ChunkCallback,
  ContentPart,
  ErrorClassifier,
  GenerateOptions,
  GeneratedImage,
  InferenceFunction,
  LLMProvider,
  ParseJsonOptions,
  Prompt,
  ProviderRequest,
  ProviderResult,
  Role,
  SamplingArgs,
  Turn,
} from './types.js';
export { BACKEND_TYPES } from './types.js';

// Error classes
export {
  LLMError,
  LLMConfigError,
  LLMProviderError,
  LLMContextLengthExceededError,
  LLMAuthenticationError,
  LLMQuotaExceededError,
  MalformedStructuredOutputError,
  isLLMError,
} from './errors.js';

// Client
export {
  LLMClient,
  DEFAULT_RETRIES,
  type LLMClientOptions,
  type GenerateManyOptions,
  type RequestEvent,
  type RequestHook,
  type ResponseHook,
} from './client.js';
export { useLLMLogging } from './logging.js';
export { useMetrics, type LLMMetrics, type MetricsSession } from './metrics.js';
export { LLMResponse, type LLMResponseInit, type SerializedLLMResponse } from './response.js';

// Pipeline stages
export {
  systemTurn,
  userTurn,
  assistantTurn,
  imagePart,
  normalizePrompt,
  turnText,
  turnImages,
  promptText,
} from './prompt.js';
export {
  StreamAssembler,
  assembleStream,
  removeHiddenOutput,
  deliverPayload,
  hidesOutput,
  type HiddenMarkers,
} from './stream-assembler.js';
export {
  parseJson,
  fixJson,
  unwrapJsonSubstring,
  type JsonValue,
  type JsonObject,
  type UnwrapOptions,
} from './json-parsing.js';
export { callWithRetries, RetryContinuation, type RetryOptions, type RetryOutcome } from './retry.js';
export { classifyError } from './classify.js';
export { createProvider, classifierFor } from './providers.js';
export {
  ResponseCache,
  deriveCacheKey,
  sanitizePrefix,
  cacheDir,
  canonicalize,
  type CacheKeyInput,
} from './cache/index.js';

// Backends
export { OpenAIProvider, OpenAIErrorClassifier, isImageModel, type OpenAIProviderConfig } from './openai/index.js';
export {
  AnthropicProvider,
  AnthropicErrorClassifier,
  DEFAULT_MAX_TOKENS,
  type AnthropicProviderConfig,
} from './anthropic/index.js';
export { GoogleProvider, GoogleErrorClassifier, type GoogleProviderConfig } from './google/index.js';
export { OllamaProvider, OllamaErrorClassifier, type OllamaProviderConfig } from './ollama/index.js';
export { FunctionProvider, FunctionErrorClassifier } from './function/index.js';
