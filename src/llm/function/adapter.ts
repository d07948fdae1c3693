/**
 * Provider backed by a caller-supplied inference function.
 *
 * Lets a program plug in local inference (or a test double) behind the
 * same pipeline as the hosted backends. The function may return the whole
 * text or an async iterable of chunks.
 *
 * @module
 */

import type { InferenceFunction, LLMProvider, ProviderRequest, ProviderResult } from '../types.js';
import { LLMProviderError } from '../errors.js';
import { isAsyncIterable } from '../../utils/type-guards.js';

export class FunctionProvider implements LLMProvider {
  readonly name = 'function' as const;

  constructor(private readonly inferenceFunction: InferenceFunction) {}

  supportsStreaming(): boolean {
    return true;
  }

  async generate(request: ProviderRequest): Promise<ProviderResult> {
    const output: unknown = await this.inferenceFunction(request);
    if (typeof output === 'string') {
      return { kind: 'payload', text: output, raw: { model: request.model } };
    }
    if (isAsyncIterable<string>(output)) {
      return { kind: 'stream', chunks: output, raw: { model: request.model, stream: true } };
    }
    throw new LLMProviderError(this.name, `inference function returned ${typeof output}, expected a string or an async iterable`);
  }
}
