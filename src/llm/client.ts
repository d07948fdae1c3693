/**
 * LLMClient: the single entry point for calling a model.
 *
 * Each call runs through the same pipeline: normalize the prompt, consult
 * the response cache, call the provider under the retry controller,
 * assemble the stream (dropping hidden segments and fanning chunks out to
 * observers), validate structured output, then persist and return an
 * {@link LLMResponse}.
 *
 * @example
 * ```typescript
 * const client = new LLMClient({ backend: 'anthropic', apiKey: 'test-key', model: 'claude-3-5-haiku-latest' });
 * const stop = client.onChunk((chunk) => process.stdout.write(chunk));
 * const answer = await client.generate('Name three primes', { retries: 2 });
 * stop();
 * ```
 *
 * @module
 */

import { parseConfig, type LLMConfig, type LLMConfigInput } from '../config/schema.js';
import { FileStorage } from '../storage/file-storage.js';
import type { KeyValueStorage } from '../storage/types.js';
import { runParallel } from '../utils/async.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { clampInteger } from '../utils/numeric.js';
import { ResponseCache } from './cache/response-cache.js';
import { deriveCacheKey } from './cache/key.js';
import { classifyError } from './classify.js';
import { MalformedStructuredOutputError } from './errors.js';
import { parseJson, type JsonValue } from './json-parsing.js';
import { normalizePrompt } from './prompt.js';
import { classifierFor, createProvider } from './providers.js';
import { LLMResponse } from './response.js';
import { RetryContinuation, callWithRetries } from './retry.js';
import { assembleStream, deliverPayload, type HiddenMarkers } from './stream-assembler.js';
import type {
  CallRequest,
  ChunkCallback,
  ErrorClassifier,
  GenerateOptions,
  GeneratedImage,
  LLMProvider,
  Prompt,
  Turn,
} from './types.js';

/** Retry budget after the first attempt when a call sets none. */
export const DEFAULT_RETRIES = 1;

export interface LLMClientOptions {
  /** Defaults to an `info` console logger. */
  logger?: Logger;
  /** Backing store for the response cache. Defaults to files under `config.storagePath`. */
  storage?: KeyValueStorage;
}

/**
 * What request observers see before each call.
 */
export interface RequestEvent {
  model: string;
  turns: readonly Turn[];
  options: GenerateOptions;
}

export type RequestHook = (event: RequestEvent) => void | Promise<void>;
export type ResponseHook = (response: LLMResponse, event: RequestEvent) => void | Promise<void>;

export interface GenerateManyOptions extends GenerateOptions {
  /** Upper bound on calls in flight. Defaults to `config.maxConcurrentTasks`, then the batch size. */
  maxConcurrentTasks?: number;
  /** Put each failure in its slot instead of rejecting the batch. */
  allowFailures?: boolean;
}

interface AttemptResult {
  text: string;
  raw: unknown;
  images?: GeneratedImage[];
}

function subscribe<T>(list: T[], item: T): () => void {
  list.push(item);
  return () => {
    const index = list.indexOf(item);
    if (index !== -1) list.splice(index, 1);
  };
}

function requiredFieldsOf(parse: GenerateOptions['parseJson']): readonly string[] | undefined {
  return typeof parse === 'object' ? parse.requiredFields : undefined;
}

export class LLMClient {
  readonly config: LLMConfig;
  readonly provider: LLMProvider;

  private readonly classifier: ErrorClassifier;
  private readonly cache: ResponseCache;
  private readonly logger: Logger;
  private readonly markers: HiddenMarkers;
  private readonly chunkCallbacks: ChunkCallback[] = [];
  private readonly requestHooks: RequestHook[] = [];
  private readonly responseHooks: ResponseHook[] = [];

  /**
   * @throws {LLMConfigError} when the configuration is invalid
   */
  constructor(config: LLMConfigInput, options: LLMClientOptions = {}) {
    this.config = parseConfig(config);
    this.logger = options.logger ?? createLogger();
    this.provider = createProvider(this.config);
    this.classifier = classifierFor(this.config.backend);
    this.cache = new ResponseCache(options.storage ?? new FileStorage(this.config.storagePath), this.logger);
    this.markers = { begin: this.config.hiddenOutputBegin, end: this.config.hiddenOutputEnd };
  }

  /**
   * Call the model once (plus retries) and resolve to the assembled response.
   *
   * @throws {LLMContextLengthExceededError} when the prompt does not fit the model
   * @throws {LLMAuthenticationError} when the backend rejects the credentials
   * @throws {MalformedStructuredOutputError} when `parseJson` is set and every attempt failed to parse
   */
  generate(prompt: Prompt, options: GenerateOptions = {}): Promise<LLMResponse> {
    return this.execute({ turns: normalizePrompt(prompt), options }, options.retries ?? DEFAULT_RETRIES);
  }

  /**
   * Generate and parse the answer as JSON. Parse failures re-issue the call
   * while the retry budget lasts.
   */
  async generateJson(prompt: Prompt, options: GenerateOptions = {}): Promise<JsonValue> {
    const parse = options.parseJson || true;
    const response = await this.generate(prompt, { ...options, parseJson: parse });
    return response.parseJson({ requiredFields: requiredFieldsOf(parse) });
  }

  /**
   * Run many prompts with bounded concurrency. Results keep prompt order.
   */
  generateMany(
    prompts: readonly Prompt[],
    options: GenerateManyOptions & { allowFailures: true },
  ): Promise<Array<LLMResponse | Error>>;
  generateMany(prompts: readonly Prompt[], options?: GenerateManyOptions): Promise<LLMResponse[]>;
  generateMany(prompts: readonly Prompt[], options: GenerateManyOptions = {}): Promise<Array<LLMResponse | Error>> {
    const { maxConcurrentTasks, allowFailures, ...callOptions } = options;
    const tasks = prompts.map((prompt) => () => this.generate(prompt, callOptions));
    const limit = clampInteger(maxConcurrentTasks ?? this.config.maxConcurrentTasks, prompts.length);

    if (allowFailures) {
      return runParallel(tasks, {
        maxConcurrentTasks: limit,
        allowFailures: true,
        onFailure: (error, index) => this.logger.warn(`Prompt #${index} failed: ${error.message}`),
      });
    }
    return runParallel(tasks, { maxConcurrentTasks: limit });
  }

  /** Observe every accepted chunk of every call. Returns an unsubscribe function. */
  onChunk(callback: ChunkCallback): () => void {
    return subscribe(this.chunkCallbacks, callback);
  }

  /** Observe each request before it is sent (or served from cache). */
  onRequest(hook: RequestHook): () => void {
    return subscribe(this.requestHooks, hook);
  }

  /** Observe each response, cache hits included. */
  onResponse(hook: ResponseHook): () => void {
    return subscribe(this.responseHooks, hook);
  }

  /** Delete cached responses under `prefix`, or the whole cache. */
  flushCache(prefix?: string): Promise<boolean> {
    return this.cache.flush(prefix);
  }

  /**
   * Run one call. `reissue` is set when a continuation resumes a finished
   * call: the cache read is skipped so the provider is asked again, and the
   * fresh answer replaces the cached one.
   */
  private async execute(request: CallRequest, retries: number, reissue = false): Promise<LLMResponse> {
    const { turns, options } = request;
    const event: RequestEvent = { model: options.model ?? this.config.model, turns, options };
    for (const hook of this.requestHooks) {
      await hook(event);
    }

    const started = performance.now();
    const callbacks = [
      ...this.chunkCallbacks,
      ...(options.callbacks ?? []),
      ...(options.callback ? [options.callback] : []),
    ];
    const prompt = this.config.saveMemory ? undefined : turns;
    const cacheKey = options.fileCache
      ? deriveCacheKey({
        config: this.config,
        prefix: typeof options.fileCache === 'string' ? options.fileCache : '',
        turns,
        options,
      })
      : undefined;

    const cached = cacheKey && !reissue ? await this.readCache(cacheKey, request, retries) : undefined;
    if (cached) {
      for (const callback of callbacks) {
        await callback(cached.text);
      }
      cached.genDuration = (performance.now() - started) / 1000;
      return this.respond(cached, event);
    }

    const { result, remainingRetries } = await callWithRetries(
      () => this.attempt(event, callbacks),
      {
        retries,
        classify: (error) => classifyError(this.classifier, error, event.model),
        logger: this.logger,
        label: `${this.provider.name} call to ${event.model}`,
      },
    );

    const response = new LLMResponse({
      ...result,
      prompt,
      continuation: new RetryContinuation(
        remainingRetries,
        request,
        (req, budget) => this.execute(req, budget, true),
      ),
    });
    response.genDuration = (performance.now() - started) / 1000;
    response.fromCache = false;
    if (cacheKey) await this.cache.set(cacheKey, response);
    return this.respond(response, event);
  }

  /**
   * One provider call. Structured-output validation happens here so a
   * parse failure counts against the retry budget like any other failure.
   */
  private async attempt(event: RequestEvent, callbacks: readonly ChunkCallback[]): Promise<AttemptResult> {
    const { model, turns, options } = event;
    const stream = (callbacks.length > 0 || options.stream === true) && this.provider.supportsStreaming(model);
    const result = await this.provider.generate({
      model,
      turns: [...turns],
      args: { ...this.config.defaultArgs, ...options.args },
      stream,
    });

    const attempt: AttemptResult = result.kind === 'stream'
      ? { text: await assembleStream(result.chunks, callbacks, this.markers), raw: result.raw }
      : { text: await deliverPayload(result.text, callbacks, this.markers), raw: result.raw, images: result.images };

    if (options.parseJson) {
      parseJson(attempt.text, { requiredFields: requiredFieldsOf(options.parseJson) });
    }
    return attempt;
  }

  /**
   * Cache lookup. A cached answer that no longer satisfies the requested
   * structured output is evicted so the live path can replace it.
   */
  private async readCache(key: string, request: CallRequest, retries: number): Promise<LLMResponse | undefined> {
    const { options } = request;
    const hit = await this.cache.get(key, {
      prompt: this.config.saveMemory ? undefined : request.turns,
      continuation: new RetryContinuation(retries, request, (req, budget) => this.execute(req, budget, true)),
    });
    if (!hit || !options.parseJson) return hit;

    try {
      parseJson(hit.text, { requiredFields: requiredFieldsOf(options.parseJson) });
      return hit;
    } catch (err) {
      if (!(err instanceof MalformedStructuredOutputError)) throw err;
    }
    this.logger.warn(`Cached response ${key} is not valid structured output; discarding`);
    await this.cache.delete(key);
    return undefined;
  }

  private async respond(response: LLMResponse, event: RequestEvent): Promise<LLMResponse> {
    for (const hook of this.responseHooks) {
      await hook(response, event);
    }
    return response;
  }
}
