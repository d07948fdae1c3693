/**
 * Anthropic LLM provider module
 *
 * @module
 */

export { AnthropicProvider, DEFAULT_MAX_TOKENS } from './adapter.js';
export { AnthropicErrorClassifier } from './classifier.js';
export type { AnthropicProviderConfig } from './types.js';
