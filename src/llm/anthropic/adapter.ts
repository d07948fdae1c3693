/**
 * Anthropic Claude LLM provider adapter.
 *
 * Uses the `@anthropic-ai/sdk` package, loaded lazily on first use.
 *
 * @module
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { LLMProvider, ProviderRequest, ProviderResult, Turn } from '../types.js';
import type { AnthropicProviderConfig } from './types.js';
import { ensureLazyImport, withExtraArgs } from '../lazy-import.js';
import { turnText } from '../prompt.js';

/** The Messages API requires `max_tokens`; args may override it. */
export const DEFAULT_MAX_TOKENS = 1024;

const IMAGE_MEDIA_TYPES = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'] as const;
type ImageMediaType = (typeof IMAGE_MEDIA_TYPES)[number];

function isImageMediaType(value: string): value is ImageMediaType {
  return IMAGE_MEDIA_TYPES.some((type) => type === value);
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;

  private client: Anthropic | null = null;
  private readonly config: AnthropicProviderConfig;

  constructor(config: AnthropicProviderConfig) {
    this.config = config;
  }

  supportsStreaming(): boolean {
    return true;
  }

  async generate(request: ProviderRequest): Promise<ProviderResult> {
    const client = await this.ensureClient();
    // seed is not accepted by the Messages API
    const { seed: _seed, ...args } = request.args;
    const extra: Record<string, unknown> = { max_tokens: DEFAULT_MAX_TOKENS, ...args };
    const { system, messages } = this.buildMessages(request.turns);
    const maxTokens = typeof extra.max_tokens === 'number' ? extra.max_tokens : DEFAULT_MAX_TOKENS;

    if (request.stream) {
      const body: Anthropic.MessageCreateParamsStreaming = {
        model: request.model,
        max_tokens: maxTokens,
        messages,
        stream: true,
        ...(system ? { system } : {}),
      };
      const stream = await client.messages.create(withExtraArgs(body, extra));
      return { kind: 'stream', chunks: textDeltas(stream), raw: { model: request.model, stream: true } };
    }

    const body: Anthropic.MessageCreateParamsNonStreaming = {
      model: request.model,
      max_tokens: maxTokens,
      messages,
      ...(system ? { system } : {}),
    };
    const message = await client.messages.create(withExtraArgs(body, extra));
    const text = message.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('');
    return { kind: 'payload', text, raw: message };
  }

  private buildMessages(turns: readonly Turn[]): { system: string; messages: Anthropic.MessageParam[] } {
    // System turns go to the top-level `system` parameter
    const system = turns
      .filter((turn) => turn.role === 'system')
      .map(turnText)
      .join('\n');
    const messages: Anthropic.MessageParam[] = [];
    for (const turn of turns) {
      if (turn.role === 'system') continue;
      messages.push({ role: turn.role, content: toContent(turn) });
    }
    return { system, messages };
  }

  private async ensureClient(): Promise<Anthropic> {
    if (this.client) return this.client;

    const { apiKey, baseURL, timeoutMs, clientOptions } = this.config;
    this.client = await ensureLazyImport('@anthropic-ai/sdk', this.name, () => import('@anthropic-ai/sdk'), (mod) =>
      new mod.default(withExtraArgs({ apiKey, baseURL, timeout: timeoutMs }, clientOptions)),
    );
    return this.client;
  }
}

function toContent(turn: Turn): string | Anthropic.ContentBlockParam[] {
  if (typeof turn.content === 'string') return turn.content;
  return turn.content.map((part): Anthropic.ContentBlockParam => {
    if (part.type === 'text') return { type: 'text', text: part.text };
    const mediaType = isImageMediaType(part.mimeType) ? part.mimeType : 'image/png';
    return { type: 'image', source: { type: 'base64', media_type: mediaType, data: part.data } };
  });
}

async function* textDeltas(stream: AsyncIterable<Anthropic.RawMessageStreamEvent>): AsyncGenerator<string> {
  for await (const event of stream) {
    if (event.type === 'content_block_delta' && event.delta.type === 'text_delta' && event.delta.text) {
      yield event.delta.text;
    }
  }
}
