/**
 * Configuration module
 *
 * @module
 */

export {
  LLMConfigSchema,
  FUNCTION_BACKEND_MODEL,
  parseConfig,
  defineConfig,
  type LLMConfig,
  type LLMConfigInput,
} from './schema.js';
export { loadConfigFromEnv, type LoadConfigOptions } from './load.js';
export {
  OPENAI_PLATFORMS,
  PLATFORM_BASE_URLS,
  DEFAULT_PLATFORMS,
  apiKeyRequired,
  defaultApiBase,
  platformByApiBase,
  type OpenAIPlatform,
} from './platforms.js';
