/**
 * Ollama local LLM provider adapter.
 *
 * Uses the `ollama` npm package. Sampling args travel in the request's
 * `options` field rather than at the top level.
 *
 * @module
 */

import type { ChatResponse, Message, Ollama, Options } from 'ollama';
import type { LLMProvider, ProviderRequest, ProviderResult, Turn } from '../types.js';
import type { OllamaProviderConfig } from './types.js';
import { ensureLazyImport, withExtraArgs } from '../lazy-import.js';
import { turnImages, turnText } from '../prompt.js';

const DEFAULT_HOST = 'http://localhost:11434';

export class OllamaProvider implements LLMProvider {
  readonly name = 'ollama' as const;

  private client: Ollama | null = null;
  private readonly config: OllamaProviderConfig;

  constructor(config: OllamaProviderConfig) {
    this.config = { ...config, host: config.host ?? DEFAULT_HOST };
  }

  supportsStreaming(): boolean {
    return true;
  }

  async generate(request: ProviderRequest): Promise<ProviderResult> {
    const client = await this.ensureClient();
    const messages = request.turns.map(toOllamaMessage);
    const options = withExtraArgs<Partial<Options>>({}, request.args);

    if (request.stream) {
      const stream = await client.chat({ model: request.model, messages, options, stream: true });
      return { kind: 'stream', chunks: messageContent(stream), raw: { model: request.model, stream: true } };
    }

    const response = await client.chat({ model: request.model, messages, options, stream: false });
    return { kind: 'payload', text: response.message.content, raw: response };
  }

  private async ensureClient(): Promise<Ollama> {
    if (this.client) return this.client;

    const { host, clientOptions } = this.config;
    this.client = await ensureLazyImport('ollama', this.name, () => import('ollama'), (mod) =>
      new mod.Ollama(withExtraArgs({ host }, clientOptions)),
    );
    return this.client;
  }
}

function toOllamaMessage(turn: Turn): Message {
  const images = turnImages(turn).map((part) => part.data);
  return {
    role: turn.role,
    content: turnText(turn),
    ...(images.length > 0 ? { images } : {}),
  };
}

async function* messageContent(stream: AsyncIterable<ChatResponse>): AsyncGenerator<string> {
  for await (const chunk of stream) {
    const text = chunk.message.content;
    if (text) yield text;
  }
}
