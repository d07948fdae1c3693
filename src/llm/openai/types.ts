/**
 * OpenAI-compatible provider configuration types
 *
 * @module
 */

/**
 * Configuration for the OpenAI provider and OpenAI-compatible platforms.
 */
export interface OpenAIProviderConfig {
  apiKey?: string;
  /** API base URL; the Azure endpoint when `platform` is `azure` */
  baseURL?: string;
  /** Inference platform (`openai`, `azure`, `groq`, ...) */
  platform?: string;
  /** Azure API version */
  apiVersion?: string;
  /** Per-request timeout handed to the SDK */
  timeoutMs?: number;
  /** Extra SDK constructor options */
  clientOptions?: Record<string, unknown>;
}
