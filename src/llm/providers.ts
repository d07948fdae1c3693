/**
 * Backend dispatch: one provider and one error classifier per configured
 * backend, bound once when the client is built.
 *
 * @module
 */

import type { LLMConfig } from '../config/schema.js';
import type { BackendType, ErrorClassifier, LLMProvider } from './types.js';
import { LLMConfigError } from './errors.js';
import { AnthropicErrorClassifier, AnthropicProvider } from './anthropic/index.js';
import { FunctionErrorClassifier, FunctionProvider } from './function/index.js';
import { GoogleErrorClassifier, GoogleProvider } from './google/index.js';
import { OllamaErrorClassifier, OllamaProvider } from './ollama/index.js';
import { OpenAIErrorClassifier, OpenAIProvider } from './openai/index.js';

/**
 * Create the provider adapter for a validated configuration.
 */
export function createProvider(config: LLMConfig): LLMProvider {
  const { apiKey, apiBase, timeoutMs, clientOptions } = config;

  switch (config.backend) {
    case 'openai':
      return new OpenAIProvider({
        apiKey,
        baseURL: apiBase,
        platform: config.platform,
        apiVersion: config.apiVersion,
        timeoutMs,
        clientOptions,
      });
    case 'anthropic':
      return new AnthropicProvider({ apiKey, baseURL: apiBase, timeoutMs, clientOptions });
    case 'google':
      return new GoogleProvider({ apiKey, baseURL: apiBase, timeoutMs, clientOptions });
    case 'ollama':
      return new OllamaProvider({ host: apiBase, clientOptions });
    case 'function':
      if (!config.inferenceFunction) {
        throw new LLMConfigError('inferenceFunction: required for the function backend');
      }
      return new FunctionProvider(config.inferenceFunction);
    default:
      return assertNever(config.backend);
  }
}

export function classifierFor(backend: BackendType): ErrorClassifier {
  switch (backend) {
    case 'openai':
      return new OpenAIErrorClassifier();
    case 'anthropic':
      return new AnthropicErrorClassifier();
    case 'google':
      return new GoogleErrorClassifier();
    case 'ollama':
      return new OllamaErrorClassifier();
    case 'function':
      return new FunctionErrorClassifier();
    default:
      return assertNever(backend);
  }
}

function assertNever(backend: never): never {
  throw new LLMConfigError(`backend: unsupported value "${String(backend)}"`);
}
