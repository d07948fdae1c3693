/**
 * Anthropic provider configuration types
 *
 * @module
 */

/**
 * Configuration for the Anthropic provider.
 */
export interface AnthropicProviderConfig {
  apiKey?: string;
  /** Override of the Messages API base URL */
  baseURL?: string;
  /** Per-request timeout handed to the SDK */
  timeoutMs?: number;
  /** Extra SDK constructor options */
  clientOptions?: Record<string, unknown>;
}
