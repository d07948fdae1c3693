/**
 * Request/response logging hooks.
 *
 * @module
 */

import type { Logger } from '../utils/logger.js';
import type { LLMClient } from './client.js';
import { promptText } from './prompt.js';

/**
 * Log every prompt and response of `client` at debug level.
 * Returns a function that detaches both hooks.
 */
export function useLLMLogging(client: LLMClient, logger: Logger): () => void {
  const offRequest = client.onRequest(({ model, turns }) => {
    logger.debug(`Requesting ${model}:\n${promptText(turns)}`);
  });
  const offResponse = client.onResponse((response, { model }) => {
    const source = response.fromCache ? 'cache' : `${(response.genDuration ?? 0).toFixed(2)}s`;
    logger.debug(`Response from ${model} (${source}):\n${response.text}`);
  });
  return () => {
    offRequest();
    offResponse();
  };
}
