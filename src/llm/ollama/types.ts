/**
 * Ollama provider configuration types
 *
 * @module
 */

export interface OllamaProviderConfig {
  /** Ollama server URL (default: http://localhost:11434) */
  host?: string;
  /** Extra `Ollama` constructor options (`headers`, `proxy`, ...) */
  clientOptions?: Record<string, unknown>;
}
