/**
 * Failure classification for `@anthropic-ai/sdk`.
 *
 * @module
 */

import {
  LLMAuthenticationError,
  LLMContextLengthExceededError,
  LLMQuotaExceededError,
  type LLMError,
} from '../errors.js';
import { errorClassName, errorStatus, errorText, isAuthStatus, matchInt } from '../classify.js';
import type { ErrorClassifier } from '../types.js';

const TOO_LONG = /prompt is too long: (\d+) tokens > (\d+) maximum/i;
const AUTH_CLASSES = new Set(['AuthenticationError', 'PermissionDeniedError']);

export class AnthropicErrorClassifier implements ErrorClassifier {
  readonly backend = 'anthropic' as const;

  classify(error: unknown, model: string): LLMError | null {
    const className = errorClassName(error);
    const status = errorStatus(error);
    const text = errorText(error);

    if (TOO_LONG.test(text)) {
      return new LLMContextLengthExceededError({
        model,
        actualTokens: matchInt(TOO_LONG, text, 1),
        maxTokens: matchInt(TOO_LONG, text, 2),
        cause: error,
      });
    }

    if ((className !== undefined && AUTH_CLASSES.has(className)) || isAuthStatus(status)) {
      return new LLMAuthenticationError('anthropic', status, { cause: error });
    }

    if (/credit balance is too low/i.test(text)) {
      return new LLMQuotaExceededError('anthropic', { cause: error });
    }

    return null;
  }
}
