/**
 * OpenAI-compatible LLM provider module
 *
 * @module
 */

export { OpenAIProvider, isImageModel } from './adapter.js';
export { OpenAIErrorClassifier } from './classifier.js';
export type { OpenAIProviderConfig } from './types.js';
