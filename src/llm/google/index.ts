/**
 * Google Gemini LLM provider module
 *
 * @module
 */

export { GoogleProvider, toGoogleContents } from './adapter.js';
export { GoogleErrorClassifier } from './classifier.js';
export type { GoogleProviderConfig } from './types.js';
