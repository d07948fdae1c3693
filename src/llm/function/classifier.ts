import type { LLMError } from '../errors.js';
import type { ErrorClassifier } from '../types.js';

/**
 * Inference functions raise whatever they like; only this library's own
 * errors (passed through by `classifyError`) carry a kind.
 */
export class FunctionErrorClassifier implements ErrorClassifier {
  readonly backend = 'function' as const;

  classify(): LLMError | null {
    return null;
  }
}
