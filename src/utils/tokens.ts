/**
 * Token counting for caller-facing budgets.
 *
 * Counts are computed with the `o200k_base` BPE from js-tiktoken. They are an
 * estimate for non-OpenAI models.
 *
 * @module
 */

import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';

export const DEFAULT_ENCODING: TiktokenEncoding = 'o200k_base';

const encoders = new Map<TiktokenEncoding, Tiktoken>();

function encoderFor(encoding: TiktokenEncoding): Tiktoken {
  let encoder = encoders.get(encoding);
  if (!encoder) {
    encoder = getEncoding(encoding);
    encoders.set(encoding, encoder);
  }
  return encoder;
}

/** Number of tokens in `text` under the given encoding. */
export function countTokens(text: string, encoding: TiktokenEncoding = DEFAULT_ENCODING): number {
  if (text.length === 0) return 0;
  return encoderFor(encoding).encode(text).length;
}

/** Truncate `text` to at most `maxTokens` tokens. */
export function truncateToTokens(
  text: string,
  maxTokens: number,
  encoding: TiktokenEncoding = DEFAULT_ENCODING,
): string {
  const encoder = encoderFor(encoding);
  const tokens = encoder.encode(text);
  if (tokens.length <= maxTokens) return text;
  return encoder.decode(tokens.slice(0, Math.max(0, maxTokens)));
}
