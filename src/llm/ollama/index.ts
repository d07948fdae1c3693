/**
 * Ollama LLM provider module
 *
 * @module
 */

export { OllamaProvider } from './adapter.js';
export { OllamaErrorClassifier } from './classifier.js';
export type { OllamaProviderConfig } from './types.js';
