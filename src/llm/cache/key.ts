/**
 * Cache key derivation.
 *
 * A key is the SHA-256 of a canonical JSON document describing everything
 * that can change the model's answer: the configuration (minus credentials
 * and functions), the namespace prefix, the turns and the effective call
 * (model, merged sampling args, structured-output requirement).
 *
 * @module
 */

import { createHash } from 'node:crypto';
import type { LLMConfig } from '../../config/schema.js';
import type { GenerateOptions, Turn } from '../types.js';
import { isRecord } from '../../utils/type-guards.js';

export const CACHE_ROOT = 'cache';

/** Strip traversal sequences and surrounding slashes from a namespace. */
export function sanitizePrefix(prefix: string): string {
  return prefix.replace(/\.\./g, '').replace(/^\/+|\/+$/g, '');
}

/** Storage directory for a namespace: `cache` or `cache/<prefix>`. */
export function cacheDir(prefix = ''): string {
  const clean = sanitizePrefix(prefix);
  return clean ? `${CACHE_ROOT}/${clean}` : CACHE_ROOT;
}

/** Recursively sort object keys; drop functions and undefined fields. */
export function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (!isRecord(value)) return value;
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    const field = value[key];
    if (field === undefined || typeof field === 'function') continue;
    sorted[key] = canonicalize(field);
  }
  return sorted;
}

/**
 * Configuration fields that take part in the key. `model` and `defaultArgs`
 * enter through the effective call instead.
 */
export function configSnapshot(config: LLMConfig): Record<string, unknown> {
  const {
    apiKey: _apiKey,
    inferenceFunction: _inferenceFunction,
    model: _model,
    defaultArgs: _defaultArgs,
    ...rest
  } = config;
  return rest;
}

/** `false` when no structured output is requested, else the sorted required fields. */
function structuredOutput(parse: GenerateOptions['parseJson']): false | string[] {
  if (!parse) return false;
  const fields = typeof parse === 'object' ? parse.requiredFields ?? [] : [];
  return [...new Set(fields)].sort();
}

export interface CacheKeyInput {
  config: LLMConfig;
  prefix?: string;
  turns: readonly Turn[];
  options: GenerateOptions;
}

/**
 * Derive the storage key for a call, e.g. `cache/reviews/<sha256>.json`.
 *
 * Observers, the retry budget and the streaming mode never change the
 * answer and are left out.
 */
export function deriveCacheKey(input: CacheKeyInput): string {
  const prefix = sanitizePrefix(input.prefix ?? '');
  const { config, options } = input;
  const document = canonicalize({
    config: configSnapshot(config),
    prefix,
    turns: input.turns,
    call: {
      model: options.model ?? config.model,
      args: { ...config.defaultArgs, ...options.args },
      parseJson: structuredOutput(options.parseJson),
    },
  });
  const digest = createHash('sha256').update(JSON.stringify(document)).digest('hex');
  return `${cacheDir(prefix)}/${digest}.json`;
}
