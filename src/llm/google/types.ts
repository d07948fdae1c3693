/**
 * Google Gemini provider configuration types
 *
 * @module
 */

export interface GoogleProviderConfig {
  apiKey?: string;
  /** Override of the Gemini API base URL */
  baseURL?: string;
  /** Per-request timeout handed to the SDK */
  timeoutMs?: number;
  /** Extra `GoogleGenAI` constructor options */
  clientOptions?: Record<string, unknown>;
}
