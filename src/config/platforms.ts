/**
 * Inference platforms reachable through each backend family.
 *
 * @module
 */

import type { BackendType } from '../llm/types.js';

export const OPENAI_PLATFORMS = [
  'openai',
  'azure',
  'anyscale',
  'deepinfra',
  'mistral',
  'fireworks',
  'deepseek',
  'xai',
  'cerebras',
  'groq',
  'cohere',
  'together_ai',
  'openrouter',
  'perplexity',
] as const;

export type OpenAIPlatform = (typeof OPENAI_PLATFORMS)[number];

/** Default API base URLs for OpenAI-compatible platforms. Azure endpoints are per-tenant. */
export const PLATFORM_BASE_URLS: Partial<Record<OpenAIPlatform, string>> = {
  openai: 'https://api.openai.com/v1',
  anyscale: 'https://api.endpoints.anyscale.com/v1',
  deepinfra: 'https://api.deepinfra.com/v1/openai',
  mistral: 'https://api.mistral.ai/v1',
  fireworks: 'https://api.fireworks.ai/inference/v1',
  deepseek: 'https://api.deepseek.com/v1',
  xai: 'https://api.x.ai/v1',
  cerebras: 'https://api.cerebras.ai/v1',
  groq: 'https://api.groq.com/openai/v1',
  cohere: 'https://api.cohere.ai/compatibility/v1',
  together_ai: 'https://api.together.xyz/v1',
  openrouter: 'https://openrouter.ai/api/v1',
  perplexity: 'https://api.perplexity.ai',
};

export const DEFAULT_PLATFORMS: Partial<Record<BackendType, string>> = {
  openai: 'openai',
  anthropic: 'anthropic',
  google: 'google_ai_studio',
};

export function isOpenAIPlatform(value: string): value is OpenAIPlatform {
  return OPENAI_PLATFORMS.some((platform) => platform === value);
}

/** Default base URL for a backend/platform pair, if the platform has a fixed one. */
export function defaultApiBase(backend: BackendType, platform: string | undefined): string | undefined {
  if (backend !== 'openai' || platform === undefined) return undefined;
  return isOpenAIPlatform(platform) ? PLATFORM_BASE_URLS[platform] : undefined;
}

/** Reverse lookup: which OpenAI-compatible platform serves the given base URL. */
export function platformByApiBase(apiBase: string): OpenAIPlatform | undefined {
  const normalized = apiBase.replace(/\/+$/, '');
  return OPENAI_PLATFORMS.find((platform) => PLATFORM_BASE_URLS[platform] === normalized);
}

/** Local backends run without credentials. */
export function apiKeyRequired(backend: BackendType): boolean {
  return backend !== 'ollama' && backend !== 'function';
}
