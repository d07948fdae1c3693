import { describe, it, expect } from 'vitest';
import { defineConfig } from '../config/schema.js';
import { BACKEND_TYPES } from './types.js';
import { classifierFor, createProvider } from './providers.js';
import { AnthropicProvider } from './anthropic/index.js';
import { FunctionProvider } from './function/index.js';
import { GoogleProvider } from './google/index.js';
import { OllamaProvider } from './ollama/index.js';
import { OpenAIProvider } from './openai/index.js';

describe('createProvider', () => {
  it('binds each backend to its adapter', () => {
    expect(createProvider(defineConfig({ apiKey: 'test-key', model: 'gpt-4o' }))).toBeInstanceOf(OpenAIProvider);
    expect(createProvider(defineConfig({ backend: 'anthropic', apiKey: 'test-key', model: 'claude-3-5-haiku-latest' })))
      .toBeInstanceOf(AnthropicProvider);
    expect(createProvider(defineConfig({ backend: 'google', apiKey: 'test-key', model: 'gemini-2.0-flash' })))
      .toBeInstanceOf(GoogleProvider);
    expect(createProvider(defineConfig({ backend: 'ollama', model: 'llama3.2' }))).toBeInstanceOf(OllamaProvider);
    expect(createProvider(defineConfig({ backend: 'function', inferenceFunction: () => 'ok' })))
      .toBeInstanceOf(FunctionProvider);
  });
});

describe('classifierFor', () => {
  it('returns a classifier for every backend', () => {
    for (const backend of BACKEND_TYPES) {
      expect(classifierFor(backend).backend).toBe(backend);
    }
  });
});
