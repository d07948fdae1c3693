/**
 * Persistent response cache over a {@link KeyValueStorage}.
 *
 * @module
 */

import type { KeyValueStorage } from '../../storage/types.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { toErrorMessage } from '../../utils/async.js';
import { LLMResponse, type LLMResponseInit } from '../response.js';
import { cacheDir } from './key.js';

export class ResponseCache {
  private readonly logger: Logger;

  constructor(
    private readonly storage: KeyValueStorage,
    logger: Logger = silentLogger,
  ) {
    this.logger = logger;
  }

  /**
   * Load a cached response. An entry that is not valid JSON or not a
   * serialized response is deleted and reported as a miss.
   */
  async get(key: string, init: Omit<LLMResponseInit, 'text' | 'raw' | 'images'> = {}): Promise<LLMResponse | undefined> {
    const stored = await this.storage.read(key);
    if (stored === undefined) {
      this.logger.debug(`Cache miss: ${key}`);
      return undefined;
    }

    let data: unknown;
    try {
      data = JSON.parse(stored);
    } catch (err) {
      this.logger.warn(`Cache entry ${key} is not JSON: ${toErrorMessage(err)}`);
    }
    if (!LLMResponse.isSerialized(data)) {
      this.logger.warn(`Discarding unreadable cache entry ${key}`);
      await this.storage.delete(key);
      return undefined;
    }
    this.logger.debug(`Cache hit: ${key}`);
    const response = LLMResponse.fromJSON(data, init);
    response.fromCache = true;
    return response;
  }

  async set(key: string, response: LLMResponse): Promise<void> {
    await this.storage.write(key, JSON.stringify(response.toJSON()));
    this.logger.debug(`Cache write: ${key}`);
  }

  delete(key: string): Promise<boolean> {
    this.logger.debug(`Cache delete: ${key}`);
    return this.storage.delete(key);
  }

  /** Remove a namespace, or the whole cache when no prefix is given. */
  flush(prefix = ''): Promise<boolean> {
    const dir = cacheDir(prefix);
    this.logger.debug(`Flushing cache ${dir}`);
    return this.storage.deletePrefix(dir);
  }
}

