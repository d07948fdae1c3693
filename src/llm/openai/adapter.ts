/**
 * OpenAI-compatible LLM provider adapter.
 *
 * Uses the `openai` SDK against api.openai.com, Azure OpenAI, or any
 * platform that speaks the chat completions API. Image models go through
 * the images endpoint and never stream.
 *
 * @module
 */

import type OpenAI from 'openai';
import type {
  GeneratedImage,
  LLMProvider,
  ProviderRequest,
  ProviderResult,
  Turn,
} from '../types.js';
import type { OpenAIProviderConfig } from './types.js';
import { LLMProviderError } from '../errors.js';
import { ensureLazyImport, withExtraArgs } from '../lazy-import.js';
import { promptText, turnText } from '../prompt.js';
import { readString } from '../../utils/type-guards.js';

const IMAGE_MODEL = /^(dall-e-|gpt-image-)/;
const IMAGE_FORMATS: Record<string, string> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
  jpg: 'image/jpeg',
  webp: 'image/webp',
};

export function isImageModel(model: string): boolean {
  return IMAGE_MODEL.test(model);
}

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai' as const;

  private client: OpenAI | null = null;
  private readonly config: OpenAIProviderConfig;

  constructor(config: OpenAIProviderConfig) {
    this.config = config;
  }

  supportsStreaming(model: string): boolean {
    return !isImageModel(model);
  }

  async generate(request: ProviderRequest): Promise<ProviderResult> {
    const client = await this.ensureClient();
    if (isImageModel(request.model)) {
      return this.generateImage(client, request);
    }

    const messages = request.turns.map(toOpenAIMessage);
    if (request.stream) {
      const body: OpenAI.Chat.ChatCompletionCreateParamsStreaming = { model: request.model, messages, stream: true };
      const stream = await client.chat.completions.create(withExtraArgs(body, request.args));
      return { kind: 'stream', chunks: textDeltas(stream), raw: { model: request.model, stream: true } };
    }

    const body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = { model: request.model, messages, stream: false };
    const completion = await client.chat.completions.create(withExtraArgs(body, request.args));
    return { kind: 'payload', text: completion.choices[0]?.message?.content ?? '', raw: completion };
  }

  private async generateImage(client: OpenAI, request: ProviderRequest): Promise<ProviderResult> {
    const { stream: _stream, ...args } = request.args;
    if (request.model.startsWith('dall-e-') && args.response_format === undefined) {
      args.response_format = 'b64_json';
    }
    if (args.response_format !== undefined && args.response_format !== 'b64_json') {
      throw new LLMProviderError(this.name, 'only the b64_json response format is supported for images');
    }

    const response = await client.images.generate(
      withExtraArgs({ model: request.model, prompt: promptText(request.turns) }, args),
    );
    const mimeType = IMAGE_FORMATS[readString(response, 'output_format') ?? 'png'] ?? 'image/png';
    const images: GeneratedImage[] = [];
    for (const item of response.data ?? []) {
      if (!item.b64_json) continue;
      images.push({
        mimeType,
        data: item.b64_json,
        ...(item.revised_prompt ? { revisedPrompt: item.revised_prompt } : {}),
      });
    }
    return { kind: 'payload', text: '', raw: response, images };
  }

  private async ensureClient(): Promise<OpenAI> {
    if (this.client) return this.client;

    const { apiKey, baseURL, apiVersion, timeoutMs, clientOptions } = this.config;
    this.client = await ensureLazyImport('openai', this.name, () => import('openai'), (mod) =>
      this.config.platform === 'azure'
        ? new mod.AzureOpenAI(withExtraArgs({ apiKey, endpoint: baseURL, apiVersion, timeout: timeoutMs }, clientOptions))
        : new mod.OpenAI(withExtraArgs({ apiKey, baseURL, timeout: timeoutMs }, clientOptions)),
    );
    return this.client;
  }
}

function toOpenAIMessage(turn: Turn): OpenAI.Chat.ChatCompletionMessageParam {
  if (turn.role === 'system') return { role: 'system', content: turnText(turn) };
  if (turn.role === 'assistant') return { role: 'assistant', content: turnText(turn) };
  if (typeof turn.content === 'string') return { role: 'user', content: turn.content };

  const parts: OpenAI.Chat.ChatCompletionContentPart[] = turn.content.map((part) =>
    part.type === 'text'
      ? { type: 'text', text: part.text }
      : { type: 'image_url', image_url: { url: `data:${part.mimeType};base64,${part.data}` } },
  );
  return { role: 'user', content: parts };
}

async function* textDeltas(stream: AsyncIterable<OpenAI.Chat.ChatCompletionChunk>): AsyncGenerator<string> {
  for await (const chunk of stream) {
    // Azure opens with a chunk that has no choices.
    const text = chunk.choices[0]?.delta?.content;
    if (text) yield text;
  }
}
