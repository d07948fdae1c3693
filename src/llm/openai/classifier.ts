/**
 * Failure classification for the `openai` SDK and compatible platforms.
 *
 * @module
 */

import {
  LLMAuthenticationError,
  LLMContextLengthExceededError,
  LLMQuotaExceededError,
  type LLMError,
} from '../errors.js';
import { errorClassName, errorCode, errorStatus, errorText, isAuthStatus, matchInt } from '../classify.js';
import type { ErrorClassifier } from '../types.js';

const MAX_TOKENS = /maximum context length is (\d+) tokens/i;
const ACTUAL_TOKENS = /(?:resulted in|you requested) (\d+) tokens/i;
const AUTH_CLASSES = new Set(['AuthenticationError', 'PermissionDeniedError']);

export class OpenAIErrorClassifier implements ErrorClassifier {
  readonly backend = 'openai' as const;

  classify(error: unknown, model: string): LLMError | null {
    const className = errorClassName(error);
    const status = errorStatus(error);
    const code = errorCode(error);
    const text = errorText(error);

    if ((className === 'BadRequestError' || status === 400) &&
      (code === 'context_length_exceeded' || MAX_TOKENS.test(text))) {
      return new LLMContextLengthExceededError({
        model,
        maxTokens: matchInt(MAX_TOKENS, text),
        actualTokens: matchInt(ACTUAL_TOKENS, text),
        cause: error,
      });
    }

    if ((className !== undefined && AUTH_CLASSES.has(className)) || isAuthStatus(status)) {
      return new LLMAuthenticationError('openai', status, { cause: error });
    }

    if (status === 429 && (code === 'insufficient_quota' || /insufficient_quota|exceeded your current quota/i.test(text))) {
      return new LLMQuotaExceededError('openai', { cause: error });
    }

    return null;
  }
}
