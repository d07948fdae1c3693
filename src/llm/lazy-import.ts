/**
 * Shared lazy-import helper for LLM provider adapters.
 *
 * Vendor SDKs are loaded with a dynamic `import()` on first use, so a
 * program that only talks to one backend never loads the others.
 *
 * @module
 */

import { LLMProviderError } from './errors.js';

/**
 * Load an SDK module and build a client from it.
 *
 * `load` is a thunk around a literal `import()` so the module keeps its
 * static type. Load failures are wrapped with an install hint.
 *
 * @param packageName - npm package to import (e.g. 'openai', '@anthropic-ai/sdk')
 * @param providerName - Provider name for error messages
 */
export async function ensureLazyImport<M, T>(
  packageName: string,
  providerName: string,
  load: () => Promise<M>,
  configure: (mod: M) => T,
): Promise<T> {
  let mod: M;
  try {
    mod = await load();
  } catch (err) {
    throw new LLMProviderError(
      providerName,
      `${packageName} package not installed. Install it: npm install ${packageName}`,
      undefined,
      { cause: err },
    );
  }
  return configure(mod);
}

/**
 * Merge caller-supplied args under a typed request body. Fields of `base`
 * win, so forwarded args can never replace the model or the messages.
 */
export function withExtraArgs<T extends object>(base: T, extra: Record<string, unknown> | undefined): T {
  return Object.assign({}, extra, base);
}
