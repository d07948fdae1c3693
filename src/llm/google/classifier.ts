/**
 * Failure classification for `@google/genai`.
 *
 * @module
 */

import {
  LLMAuthenticationError,
  LLMContextLengthExceededError,
  LLMQuotaExceededError,
  type LLMError,
} from '../errors.js';
import { errorStatus, errorText, isAuthStatus, matchInt } from '../classify.js';
import type { ErrorClassifier } from '../types.js';

// Counts may be bare or parenthesized; the actual count is often omitted.
const TOKEN_LIMIT = /input token count (?:\(?(\d+)\)? )?exceeds the maximum number of tokens allowed \(?(\d+)\)?/i;

export class GoogleErrorClassifier implements ErrorClassifier {
  readonly backend = 'google' as const;

  classify(error: unknown, model: string): LLMError | null {
    const status = errorStatus(error);
    const text = errorText(error);

    if (TOKEN_LIMIT.test(text)) {
      return new LLMContextLengthExceededError({
        model,
        actualTokens: matchInt(TOKEN_LIMIT, text, 1),
        maxTokens: matchInt(TOKEN_LIMIT, text, 2),
        cause: error,
      });
    }

    if (isAuthStatus(status) || /API key not valid/i.test(text)) {
      return new LLMAuthenticationError('google', status, { cause: error });
    }

    if ((status === 429 || text.includes('RESOURCE_EXHAUSTED')) && /quota/i.test(text)) {
      return new LLMQuotaExceededError('google', { cause: error });
    }

    return null;
  }
}
