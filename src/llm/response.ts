/**
 * The value every successful call resolves to.
 *
 * @module
 */

import type { TiktokenEncoding } from 'js-tiktoken';
import { extractNumber, type ExtractNumberOptions } from '../utils/numeric.js';
import { countTokens } from '../utils/tokens.js';
import { isRecord } from '../utils/type-guards.js';
import { parseJson, type JsonValue } from './json-parsing.js';
import type { RetryContinuation } from './retry.js';
import type { CallRequest, GeneratedImage, ParseJsonOptions, Turn } from './types.js';

/** Shape persisted by the response cache. */
export interface SerializedLLMResponse {
  text: string;
  raw: unknown;
  images?: GeneratedImage[];
}

export interface LLMResponseInit {
  text: string;
  raw?: unknown;
  images?: readonly GeneratedImage[];
  /** Normalized request; omitted when memory saving is on. */
  prompt?: readonly Turn[];
  continuation?: RetryContinuation<CallRequest, LLMResponse>;
}

function isGeneratedImage(value: unknown): value is GeneratedImage {
  return isRecord(value) && typeof value.mimeType === 'string' && typeof value.data === 'string';
}

export class LLMResponse {
  readonly text: string;
  readonly raw: unknown;
  readonly images: readonly GeneratedImage[];
  readonly prompt?: readonly Turn[];
  readonly continuation?: RetryContinuation<CallRequest, LLMResponse>;

  private duration?: number;
  private cached?: boolean;

  constructor(init: LLMResponseInit) {
    this.text = init.text;
    this.raw = init.raw ?? {};
    this.images = init.images ?? [];
    this.prompt = init.prompt;
    this.continuation = init.continuation;
  }

  /** Wall time of the call in seconds. Set once. */
  get genDuration(): number | undefined {
    return this.duration;
  }

  set genDuration(value: number | undefined) {
    if (this.duration !== undefined) throw new TypeError('genDuration is already set');
    this.duration = value;
  }

  /** True when served from the response cache. Set once. */
  get fromCache(): boolean {
    return this.cached ?? false;
  }

  set fromCache(value: boolean) {
    if (this.cached !== undefined) throw new TypeError('fromCache is already set');
    this.cached = value;
  }

  parseJson(options: ParseJsonOptions & { raiseErrors: false }): JsonValue | false;
  parseJson(options?: ParseJsonOptions): JsonValue;
  parseJson(options: ParseJsonOptions = {}): JsonValue | false {
    return options.raiseErrors === false
      ? parseJson(this.text, { ...options, raiseErrors: false })
      : parseJson(this.text, options);
  }

  parseNumber(options?: ExtractNumberOptions): number | null {
    return extractNumber(this.text, options);
  }

  numTokens(encoding?: TiktokenEncoding): number {
    return countTokens(this.text, encoding);
  }

  toString(): string {
    return this.text;
  }

  toJSON(): SerializedLLMResponse {
    const data: SerializedLLMResponse = { text: this.text, raw: this.raw };
    if (this.images.length > 0) data.images = [...this.images];
    return data;
  }

  static isSerialized(value: unknown): value is SerializedLLMResponse {
    if (!isRecord(value) || typeof value.text !== 'string' || !('raw' in value)) return false;
    return value.images === undefined || (Array.isArray(value.images) && value.images.every(isGeneratedImage));
  }

  static fromJSON(data: SerializedLLMResponse, init: Omit<LLMResponseInit, 'text' | 'raw' | 'images'> = {}): LLMResponse {
    return new LLMResponse({ ...init, text: data.text, raw: data.raw, images: data.images });
  }
}
