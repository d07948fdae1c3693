/**
 * Configuration schema and resolution.
 *
 * @module
 */

import { z } from 'zod';
import { LLMConfigError } from '../llm/errors.js';
import type { BackendType, InferenceFunction, SamplingArgs } from '../llm/types.js';
import {
  DEFAULT_PLATFORMS,
  apiKeyRequired,
  defaultApiBase,
  isOpenAIPlatform,
  platformByApiBase,
} from './platforms.js';

/** Model name used by the `function` backend when none is configured. */
export const FUNCTION_BACKEND_MODEL = 'local';

export const LLMConfigSchema = z
  .object({
    backend: z.enum(['openai', 'anthropic', 'google', 'ollama', 'function']).default('openai'),
    platform: z.string().min(1).optional(),
    apiKey: z.string().min(1).optional(),
    apiBase: z.string().url().optional(),
    apiVersion: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    defaultArgs: z.record(z.unknown()).default({}),
    maxConcurrentTasks: z.number().int().positive().optional(),
    hiddenOutputBegin: z.string().min(1).optional(),
    hiddenOutputEnd: z.string().min(1).optional(),
    saveMemory: z.boolean().default(false),
    storagePath: z.string().min(1).default('storage'),
    timeoutMs: z.number().int().positive().optional(),
    clientOptions: z.record(z.unknown()).default({}),
    inferenceFunction: z
      .custom<InferenceFunction>((value) => typeof value === 'function', 'must be a function')
      .optional(),
  })
  .strict()
  .superRefine((config, ctx) => {
    const issue = (path: string, message: string) =>
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [path], message });

    if (apiKeyRequired(config.backend) && !config.apiKey) {
      issue('apiKey', `required for the ${config.backend} backend`);
    }
    if (config.backend !== 'function' && !config.model) {
      issue('model', 'required');
    }
    if (config.backend === 'function' && !config.inferenceFunction) {
      issue('inferenceFunction', 'required for the function backend');
    }
    if (config.backend === 'openai' && config.platform !== undefined) {
      if (!isOpenAIPlatform(config.platform)) {
        issue('platform', `unknown OpenAI-compatible platform "${config.platform}"`);
      } else if (config.platform === 'azure') {
        if (!config.apiBase) issue('apiBase', 'required for Azure');
        if (!config.apiVersion) issue('apiVersion', 'required for Azure');
      }
    }
  });

export type LLMConfigInput = z.input<typeof LLMConfigSchema>;

/**
 * Validated configuration with platform defaults applied.
 */
export interface LLMConfig {
  backend: BackendType;
  platform?: string;
  apiKey?: string;
  apiBase?: string;
  apiVersion?: string;
  model: string;
  defaultArgs: SamplingArgs;
  maxConcurrentTasks?: number;
  hiddenOutputBegin?: string;
  hiddenOutputEnd?: string;
  saveMemory: boolean;
  storagePath: string;
  timeoutMs?: number;
  /** Extra constructor options for the vendor SDK client. */
  clientOptions: Record<string, unknown>;
  inferenceFunction?: InferenceFunction;
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validate raw configuration and fill platform defaults.
 *
 * @throws {LLMConfigError} listing every issue found
 */
export function parseConfig(raw: unknown): LLMConfig {
  const result = LLMConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new LLMConfigError(result.error.issues.map(formatIssue));
  }
  const config = result.data;

  const platform =
    config.platform ??
    (config.backend === 'openai' && config.apiBase ? platformByApiBase(config.apiBase) : undefined) ??
    DEFAULT_PLATFORMS[config.backend];

  return {
    ...config,
    platform,
    apiBase: config.apiBase ?? defaultApiBase(config.backend, platform),
    model: config.model ?? FUNCTION_BACKEND_MODEL,
  };
}

/** Typed entry point for configuration written in code. */
export function defineConfig(input: LLMConfigInput): LLMConfig {
  return parseConfig(input);
}
