/**
 * Environment-driven configuration loading.
 *
 * @module
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse as parseDotEnv } from 'dotenv';
import { LLMConfigError } from '../llm/errors.js';
import { toErrorMessage } from '../utils/async.js';
import { isRecord } from '../utils/type-guards.js';
import { parseConfig, type LLMConfig, type LLMConfigInput } from './schema.js';

export interface LoadConfigOptions {
  /** Variables to read. Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  /** `.env` file overlaid on `env`; its values win. Skipped when absent. */
  dotEnvFile?: string;
  /** Values set in code, applied last. */
  overrides?: Partial<LLMConfigInput>;
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off', '']);

function readDotEnv(path: string): Record<string, string> {
  if (!existsSync(path)) return {};
  try {
    return parseDotEnv(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new LLMConfigError(`cannot read ${path}: ${toErrorMessage(err)}`);
  }
}

/**
 * Build configuration from environment variables.
 *
 * | field | variable |
 * |-------|----------|
 * | backend | `LLM_API_TYPE` |
 * | platform | `LLM_API_PLATFORM` |
 * | apiKey | `LLM_API_KEY` |
 * | apiBase | `LLM_API_BASE` |
 * | apiVersion | `LLM_API_VERSION` |
 * | model | `MODEL`, `LLM_MODEL` |
 * | defaultArgs | `LLM_DEFAULT_ARGS` (JSON) |
 * | maxConcurrentTasks | `MAX_CONCURRENT_TASKS` |
 * | hiddenOutputBegin / End | `HIDDEN_OUTPUT_BEGIN` / `HIDDEN_OUTPUT_END` |
 * | saveMemory | `SAVE_MEMORY` |
 * | storagePath | `STORAGE_PATH` |
 * | timeoutMs | `LLM_TIMEOUT_MS` |
 * | clientOptions | `LLM_CLIENT_OPTIONS`, `INIT_PARAMS` (JSON) |
 *
 * @throws {LLMConfigError} listing every malformed variable or invalid field
 */
export function loadConfigFromEnv(options: LoadConfigOptions = {}): LLMConfig {
  const env: Record<string, string | undefined> = {
    ...(options.env ?? process.env),
    ...(options.dotEnvFile ? readDotEnv(options.dotEnvFile) : {}),
  };
  const issues: string[] = [];

  const text = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value === '' ? undefined : value;
  };

  const integer = (name: string): number | undefined => {
    const value = text(name);
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
      issues.push(`${name}: expected an integer, got "${value}"`);
      return undefined;
    }
    return parsed;
  };

  const bool = (name: string): boolean | undefined => {
    const value = env[name];
    if (value === undefined) return undefined;
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
    issues.push(`${name}: expected a boolean, got "${value}"`);
    return undefined;
  };

  const object = (name: string): Record<string, unknown> | undefined => {
    const value = text(name);
    if (value === undefined) return undefined;
    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch (err) {
      issues.push(`${name}: invalid JSON (${toErrorMessage(err)})`);
      return undefined;
    }
    if (!isRecord(parsed)) {
      issues.push(`${name}: expected a JSON object`);
      return undefined;
    }
    return parsed;
  };

  const raw = {
    backend: text('LLM_API_TYPE'),
    platform: text('LLM_API_PLATFORM'),
    apiKey: text('LLM_API_KEY'),
    apiBase: text('LLM_API_BASE'),
    apiVersion: text('LLM_API_VERSION'),
    model: text('MODEL') ?? text('LLM_MODEL'),
    defaultArgs: object('LLM_DEFAULT_ARGS'),
    maxConcurrentTasks: integer('MAX_CONCURRENT_TASKS'),
    hiddenOutputBegin: text('HIDDEN_OUTPUT_BEGIN'),
    hiddenOutputEnd: text('HIDDEN_OUTPUT_END'),
    saveMemory: bool('SAVE_MEMORY'),
    storagePath: text('STORAGE_PATH'),
    timeoutMs: integer('LLM_TIMEOUT_MS'),
    clientOptions: object('LLM_CLIENT_OPTIONS') ?? object('INIT_PARAMS'),
    ...options.overrides,
  };

  if (issues.length > 0) {
    throw new LLMConfigError(issues);
  }
  return parseConfig(raw);
}
