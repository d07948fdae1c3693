/**
 * Failure classification for the `ollama` client.
 *
 * Local servers have no credentials or quota; only context overflow is
 * recognized.
 *
 * @module
 */

import { LLMContextLengthExceededError, type LLMError } from '../errors.js';
import { errorText } from '../classify.js';
import type { ErrorClassifier } from '../types.js';

const CONTEXT_LENGTH = /context length/i;
const OVERFLOW = /exceed|too long/i;

export class OllamaErrorClassifier implements ErrorClassifier {
  readonly backend = 'ollama' as const;

  classify(error: unknown, model: string): LLMError | null {
    const text = errorText(error);
    if (CONTEXT_LENGTH.test(text) && OVERFLOW.test(text)) {
      return new LLMContextLengthExceededError({ model, cause: error });
    }
    return null;
  }
}
