/**
 * Google Gemini LLM provider adapter.
 *
 * Uses the `@google/genai` package. Gemini has no system role and rejects
 * two consecutive turns from the same side, so system turns become the
 * `systemInstruction` and neighbouring turns of one role are merged.
 *
 * @module
 */

import type {
  Content,
  GenerateContentConfig,
  GenerateContentResponse,
  GoogleGenAI,
  Part,
} from '@google/genai';
import type { LLMProvider, ProviderRequest, ProviderResult, Turn } from '../types.js';
import type { GoogleProviderConfig } from './types.js';
import { ensureLazyImport, withExtraArgs } from '../lazy-import.js';
import { turnText } from '../prompt.js';

export class GoogleProvider implements LLMProvider {
  readonly name = 'google' as const;

  private client: GoogleGenAI | null = null;
  private readonly config: GoogleProviderConfig;

  constructor(config: GoogleProviderConfig) {
    this.config = config;
  }

  supportsStreaming(): boolean {
    return true;
  }

  async generate(request: ProviderRequest): Promise<ProviderResult> {
    const client = await this.ensureClient();
    const system = request.turns
      .filter((turn) => turn.role === 'system')
      .map(turnText)
      .join('\n');
    const params = {
      model: request.model,
      contents: toGoogleContents(request.turns),
      config: withExtraArgs<GenerateContentConfig>(system ? { systemInstruction: system } : {}, request.args),
    };

    if (request.stream) {
      const stream = await client.models.generateContentStream(params);
      return { kind: 'stream', chunks: textChunks(stream), raw: { model: request.model, stream: true } };
    }

    const response = await client.models.generateContent(params);
    return { kind: 'payload', text: response.text ?? '', raw: response };
  }

  private async ensureClient(): Promise<GoogleGenAI> {
    if (this.client) return this.client;

    const { apiKey, baseURL, timeoutMs, clientOptions } = this.config;
    const httpOptions = baseURL !== undefined || timeoutMs !== undefined
      ? { httpOptions: { baseUrl: baseURL, timeout: timeoutMs } }
      : {};
    this.client = await ensureLazyImport('@google/genai', this.name, () => import('@google/genai'), (mod) =>
      new mod.GoogleGenAI(withExtraArgs({ apiKey, ...httpOptions }, clientOptions)),
    );
    return this.client;
  }
}

function toParts(turn: Turn): Part[] {
  if (typeof turn.content === 'string') return [{ text: turn.content }];
  return turn.content.map((part): Part =>
    part.type === 'text'
      ? { text: part.text }
      : { inlineData: { mimeType: part.mimeType, data: part.data } },
  );
}

/**
 * Convert non-system turns to Gemini contents. `assistant` becomes `model`;
 * consecutive turns of one role collapse into one, their adjoining text
 * parts joined with a newline.
 */
export function toGoogleContents(turns: readonly Turn[]): Content[] {
  const contents: Content[] = [];
  for (const turn of turns) {
    if (turn.role === 'system') continue;
    const role = turn.role === 'assistant' ? 'model' : 'user';
    const parts = toParts(turn);
    const previous = contents[contents.length - 1];

    if (!previous || previous.role !== role || !previous.parts) {
      contents.push({ role, parts });
      continue;
    }
    const tail = previous.parts[previous.parts.length - 1];
    const [head, ...rest] = parts;
    if (tail?.text !== undefined && head?.text !== undefined) {
      tail.text = `${tail.text}\n${head.text}`;
      previous.parts.push(...rest);
    } else {
      previous.parts.push(...parts);
    }
  }
  return contents;
}

async function* textChunks(stream: AsyncIterable<GenerateContentResponse>): AsyncGenerator<string> {
  for await (const chunk of stream) {
    const text = chunk.text;
    if (text) yield text;
  }
}
