/**
 * Number extraction from free-form model output.
 *
 * @module
 */

const INTEGER_PATTERN = /[-+]?\d+/g;
const FLOAT_PATTERN = /[-+]?\d*\.?\d+/g;

export interface ExtractNumberOptions {
  /** Parse as integer instead of float. */
  integer?: boolean;
  /** Which match to return when the text holds several numbers. */
  position?: 'first' | 'last';
  /** Returned when no number is found. */
  fallback?: number;
}

/**
 * Pull a number out of text such as `"The answer is 42."`.
 * Returns `fallback` (default `null`) when nothing matches.
 */
export function extractNumber(text: string, options: ExtractNumberOptions = {}): number | null {
  const pattern = options.integer ? INTEGER_PATTERN : FLOAT_PATTERN;
  const matches = text.match(pattern);
  if (!matches || matches.length === 0) return options.fallback ?? null;
  const picked = options.position === 'last' ? matches[matches.length - 1] : matches[0];
  const value = options.integer ? Number.parseInt(picked, 10) : Number.parseFloat(picked);
  return Number.isFinite(value) ? value : options.fallback ?? null;
}

/** Clamp an optional integer to [`min`, ∞), returning `fallback` for undefined / non-finite. */
export function clampInteger(value: number | undefined, fallback: number, min = 1): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(min, Math.floor(value));
}
