import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { LLMConfigError } from '../llm/errors.js';
import { defineConfig, loadConfigFromEnv, parseConfig } from './index.js';

function captureConfigError(fn: () => unknown): LLMConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LLMConfigError) return err;
    throw err;
  }
  throw new Error('expected LLMConfigError');
}

describe('loadConfigFromEnv', () => {
  it('applies defaults for the openai platform', () => {
    const config = loadConfigFromEnv({ env: { LLM_API_KEY: 'test-key', MODEL: 'gpt-4o-mini' } });

    expect(config.backend).toBe('openai');
    expect(config.platform).toBe('openai');
    expect(config.apiBase).toBe('https://api.openai.com/v1');
    expect(config.defaultArgs).toEqual({});
    expect(config.clientOptions).toEqual({});
    expect(config.saveMemory).toBe(false);
    expect(config.storagePath).toBe('storage');
    expect(config.maxConcurrentTasks).toBeUndefined();
  });

  it('decodes JSON, integer and boolean variables', () => {
    const config = loadConfigFromEnv({
      env: {
        LLM_API_KEY: 'test-key',
        LLM_MODEL: 'gpt-4o',
        LLM_DEFAULT_ARGS: '{"temperature":0.2}',
        MAX_CONCURRENT_TASKS: '4',
        SAVE_MEMORY: 'yes',
        LLM_TIMEOUT_MS: '15000',
        INIT_PARAMS: '{"maxRetries":0}',
      },
    });

    expect(config.model).toBe('gpt-4o');
    expect(config.defaultArgs).toEqual({ temperature: 0.2 });
    expect(config.maxConcurrentTasks).toBe(4);
    expect(config.saveMemory).toBe(true);
    expect(config.timeoutMs).toBe(15000);
    expect(config.clientOptions).toEqual({ maxRetries: 0 });
  });

  it('reports every malformed variable at once', () => {
    const error = captureConfigError(() =>
      loadConfigFromEnv({
        env: { LLM_API_KEY: 'test-key', MODEL: 'm', LLM_DEFAULT_ARGS: '{oops', MAX_CONCURRENT_TASKS: 'many' },
      }),
    );

    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^LLM_DEFAULT_ARGS: invalid JSON/);
    expect(error.issues[1]).toBe('MAX_CONCURRENT_TASKS: expected an integer, got "many"');
  });

  it('rejects a JSON array where an object is expected', () => {
    const error = captureConfigError(() =>
      loadConfigFromEnv({ env: { LLM_API_KEY: 'test-key', MODEL: 'm', LLM_DEFAULT_ARGS: '[1,2]' } }),
    );
    expect(error.issues).toEqual(['LLM_DEFAULT_ARGS: expected a JSON object']);
  });

  it('requires credentials and a model for remote backends', () => {
    const error = captureConfigError(() => loadConfigFromEnv({ env: { LLM_API_TYPE: 'anthropic' } }));
    expect(error.issues).toEqual(['apiKey: required for the anthropic backend', 'model: required']);
  });

  it('requires apiBase and apiVersion on Azure', () => {
    const error = captureConfigError(() =>
      loadConfigFromEnv({ env: { LLM_API_KEY: 'test-key', MODEL: 'gpt-4o', LLM_API_PLATFORM: 'azure' } }),
    );
    expect(error.issues).toEqual(['apiBase: required for Azure', 'apiVersion: required for Azure']);
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfigFromEnv({
      env: { LLM_API_KEY: 'test-key', MODEL: 'from-env' },
      overrides: { model: 'from-code' },
    });
    expect(config.model).toBe('from-code');
  });

  describe('with a .env file', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'promptline-config-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('overlays file values on the environment', async () => {
      const file = join(dir, '.env');
      await writeFile(file, 'MODEL=from-file\nLLM_API_KEY=test-key\n');

      const config = loadConfigFromEnv({ env: { MODEL: 'from-env' }, dotEnvFile: file });

      expect(config.model).toBe('from-file');
      expect(config.apiKey).toBe('test-key');
    });

    it('skips a missing file', () => {
      const config = loadConfigFromEnv({
        env: { LLM_API_KEY: 'test-key', MODEL: 'm' },
        dotEnvFile: join(dir, 'absent.env'),
      });
      expect(config.model).toBe('m');
    });
  });
});

describe('parseConfig', () => {
  it('accepts ollama without credentials', () => {
    const config = parseConfig({ backend: 'ollama', model: 'llama3' });
    expect(config.apiKey).toBeUndefined();
    expect(config.platform).toBeUndefined();
    expect(config.apiBase).toBeUndefined();
  });

  it('requires an inference function for the function backend', () => {
    const error = captureConfigError(() => parseConfig({ backend: 'function' }));
    expect(error.issues).toEqual(['inferenceFunction: required for the function backend']);
  });

  it('defaults the model name for the function backend', () => {
    const config = defineConfig({ backend: 'function', inferenceFunction: () => 'ok' });
    expect(config.model).toBe('local');
  });

  it('detects the platform from a known base URL', () => {
    const config = parseConfig({ apiKey: 'test-key', model: 'llama-3.1-8b-instant', apiBase: 'https://api.groq.com/openai/v1/' });
    expect(config.platform).toBe('groq');
    expect(config.apiBase).toBe('https://api.groq.com/openai/v1/');
  });

  it('fills the base URL for a named platform', () => {
    const config = parseConfig({ apiKey: 'test-key', model: 'grok-4', platform: 'xai' });
    expect(config.apiBase).toBe('https://api.x.ai/v1');
  });

  it('rejects unknown platforms, backends and keys', () => {
    expect(() => parseConfig({ apiKey: 'test-key', model: 'm', platform: 'nowhere' })).toThrow(LLMConfigError);
    expect(() => parseConfig({ apiKey: 'test-key', model: 'm', backend: 'telepathy' })).toThrow(LLMConfigError);
    expect(() => parseConfig({ apiKey: 'test-key', model: 'm', temprature: 1 })).toThrow(LLMConfigError);
  });
});
