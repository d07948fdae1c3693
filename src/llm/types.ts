/**
 * LLM pipeline types for promptline
 *
 * Defines the request shapes callers build, the provider contract each
 * backend adapter fulfils, and the per-call options the client accepts.
 *
 * @module
 */

import type { LLMError } from './errors.js';

/**
 * Message role in a conversation
 */
export type Role = 'system' | 'user' | 'assistant';

/**
 * A content part for multimodal turns. Images are base64 attachments.
 */
export type ContentPart =
  | { type: 'text'; text: string }
  | { type: 'image'; mimeType: string; data: string };

/**
 * A single role-tagged message in a conversation.
 */
export interface Turn {
  role: Role;
  content: string | ContentPart[];
}

/**
 * Anything a caller may pass as a prompt. Bare strings become `user` turns.
 */
export type Prompt = string | Turn | ReadonlyArray<string | Turn>;

/**
 * Closed set of supported backend families.
 */
export type BackendType = 'openai' | 'anthropic' | 'google' | 'ollama' | 'function';

export const BACKEND_TYPES: readonly BackendType[] = ['openai', 'anthropic', 'google', 'ollama', 'function'];

/**
 * Sampling and vendor parameters forwarded verbatim into the SDK request body.
 */
export type SamplingArgs = Record<string, unknown>;

/**
 * Observer invoked with each accepted chunk (streaming) or once with the
 * final text (non-streaming). Async observers are awaited before the next.
 */
export type ChunkCallback = (chunk: string) => void | Promise<void>;

/**
 * An image returned by an image-generation model.
 */
export interface GeneratedImage {
  mimeType: string;
  /** Base64-encoded image bytes */
  data: string;
  revisedPrompt?: string;
}

/**
 * One normalized call handed to a provider adapter.
 */
export interface ProviderRequest {
  model: string;
  turns: Turn[];
  args: SamplingArgs;
  stream: boolean;
}

/**
 * Terminal result of one adapter call: a whole payload, or a lazy chunk sequence.
 */
export type ProviderResult =
  | { kind: 'payload'; text: string; raw: unknown; images?: GeneratedImage[] }
  | { kind: 'stream'; chunks: AsyncIterable<string>; raw: unknown };

/**
 * Interface for LLM provider adapters.
 *
 * `generate` performs exactly one network call and propagates the SDK's
 * native errors unchanged; classification happens in the retry controller.
 */
export interface LLMProvider {
  readonly name: BackendType;
  /** False for models that cannot stream (image generation). */
  supportsStreaming(model: string): boolean;
  generate(request: ProviderRequest): Promise<ProviderResult>;
}

/**
 * Maps backend-native failures onto the canonical error taxonomy.
 * Returns `null` for failures it does not recognize. Never throws.
 */
export interface ErrorClassifier {
  readonly backend: BackendType;
  classify(error: unknown, model: string): LLMError | null;
}

/**
 * Caller-supplied inference for the `function` backend.
 */
export type InferenceFunction = (
  request: ProviderRequest,
) => string | AsyncIterable<string> | Promise<string | AsyncIterable<string>>;

export interface ParseJsonOptions {
  /** Throw `MalformedStructuredOutputError` instead of returning `false`. Default true. */
  raiseErrors?: boolean;
  /** Keys that must be present on the parsed object. */
  requiredFields?: readonly string[];
}

/**
 * Per-call options accepted by `LLMClient.generate`.
 */
export interface GenerateOptions {
  /** Overrides the configured model. */
  model?: string;
  /** Sampling args, merged over `config.defaultArgs`. */
  args?: SamplingArgs;
  /** Retry budget after the first attempt. Default 1. */
  retries?: number;
  /** Require structured output; a parse failure triggers a re-issue. */
  parseJson?: boolean | Pick<ParseJsonOptions, 'requiredFields'>;
  /** Enable the file cache, optionally under a namespace prefix. */
  fileCache?: boolean | string;
  callback?: ChunkCallback;
  callbacks?: ChunkCallback[];
  /** Force streaming even without observers. */
  stream?: boolean;
}

/**
 * A normalized call as the client replays it: turns plus the per-call options.
 */
export interface CallRequest {
  turns: Turn[];
  options: GenerateOptions;
}
