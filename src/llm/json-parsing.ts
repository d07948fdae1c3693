/**
 * Best-effort recovery of JSON values from free-form model output.
 *
 * The extractor first isolates the JSON-looking part of the text, then runs a
 * repair ladder that re-parses after every step, so well-formed input never
 * goes through a rewrite.
 *
 * @module
 */

import { MalformedStructuredOutputError } from './errors.js';
import type { ParseJsonOptions } from './types.js';
import { isRecord } from '../utils/type-guards.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface UnwrapOptions {
  /** Look for a `{...}` / `[...]` span inside surrounding prose. Default true. */
  allowInText?: boolean;
  /** Return the trimmed input when nothing is found, else `''`. Default true. */
  returnOriginalOnFail?: boolean;
}

const DELIMITER_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['{', '}'],
  ['[', ']'],
  ['"', '"'],
];

const BARE_LITERAL = /^(?:-?\d+(?:\.\d+)?(?:[eE][-+]?\d+)?|true|false|null)$/;

/**
 * Isolate the JSON part of `input`: strip a Markdown fence, keep text that
 * is already delimited, otherwise take the outermost object or array span.
 */
export function unwrapJsonSubstring(input: string, options: UnwrapOptions = {}): string {
  const { allowInText = true, returnOriginalOnFail = true } = options;
  const text = input.trim();

  if (text.endsWith('```')) {
    if (text.startsWith('```json')) return text.slice(7, -3).trim();
    if (text.startsWith('```')) return text.slice(3, -3).trim();
  }

  for (const [open, close] of DELIMITER_PAIRS) {
    if (text.length > 1 && text.startsWith(open) && text.endsWith(close)) return text;
  }
  if (BARE_LITERAL.test(text)) return text;

  const fail = returnOriginalOnFail ? text : '';
  if (!allowInText) return fail;

  let start = -1;
  let end = -1;
  const objStart = text.indexOf('{');
  const objEnd = text.lastIndexOf('}');
  if (objStart !== -1 && objEnd > objStart) {
    start = objStart;
    end = objEnd;
  }

  const arrStart = text.indexOf('[');
  const arrEnd = text.lastIndexOf(']');
  if (arrStart !== -1 && arrEnd !== -1) {
    // An array wins when there is no object span or when it encloses it.
    if (start === -1 || (arrStart < start && arrEnd > end)) {
      start = arrStart;
      end = arrEnd;
    }
  }

  return start !== -1 && end >= start ? text.slice(start, end + 1) : fail;
}

// ============================================================================
// Repair ladder
// ============================================================================

const OBJ_BEFORE = String.raw`((?<=\{)|(?<=["\d],)|(?<=null,)|(?<=true,)|(?<=false,)|(?<=["\d])|(?<=null)|(?<=true)|(?<=false))\s*`;
const OBJ_AFTER = String.raw`\s*((?=\})|(?="[^"\n]+"\s*:\s*))`;
const LIST_BEFORE = String.raw`((?<=\[)|(?<=["\d],)|(?<=null,)|(?<=true,)|(?<=false,)|(?<=["\d])|(?<=null)|(?<=true)|(?<=false))\s*`;
const LIST_AFTER = String.raw`\s*((?=[\]"\d])|(?=true)|(?=false)|(?=null))`;

/** Pattern matching `inner` only where it sits between two JSON values or delimiters. */
function betweenValues(inner: string): RegExp {
  return new RegExp(`(${OBJ_BEFORE}${inner}${OBJ_AFTER})|(${LIST_BEFORE}${inner}${LIST_AFTER})`, 'g');
}

const LINE_COMMENTS = betweenValues(String.raw`((//|#)[^\n]*\n)+`);
const ELLIPSIS_LINES = betweenValues(String.raw`\.\.\.\n`);
const MISSING_COMMA = /"\s*\n\s*"/g;
const TRAILING_COMMA = /((?<=["\d])|(?<=null)|(?<=true)|(?<=false)|(?<=[}\]]))\s*,(?=\s*[}\]])/g;
const BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;
const CAPITALIZED_LITERALS: Record<string, string> = { True: 'true', False: 'false', None: 'null' };

/**
 * Apply `transform` to every stretch of `text` outside double-quoted strings.
 */
function mapOutsideStrings(text: string, transform: (segment: string) => string): string {
  let out = '';
  let segmentStart = 0;
  let i = 0;
  while (i < text.length) {
    if (text[i] !== '"') {
      i++;
      continue;
    }
    out += transform(text.slice(segmentStart, i));
    let j = i + 1;
    while (j < text.length && text[j] !== '"') {
      j += text[j] === '\\' ? 2 : 1;
    }
    const stringEnd = Math.min(j + 1, text.length);
    out += text.slice(i, stringEnd);
    i = stringEnd;
    segmentStart = i;
  }
  return out + transform(text.slice(segmentStart));
}

/**
 * Rewrite single-quoted strings as double-quoted ones. Apostrophes inside
 * double-quoted strings are left alone.
 */
function normalizeQuotes(text: string): string {
  let out = '';
  let quote: '"' | "'" | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote === null) {
      if (ch === '"' || ch === "'") {
        quote = ch;
        out += '"';
      } else {
        out += ch;
      }
      continue;
    }
    if (ch === '\\' && i + 1 < text.length) {
      const next = text[i + 1];
      out += quote === "'" && next === "'" ? "'" : ch + next;
      i++;
      continue;
    }
    if (ch === quote) {
      quote = null;
      out += '"';
    } else if (ch === '"') {
      out += '\\"';
    } else {
      out += ch;
    }
  }
  return out;
}

const REPAIR_STEPS: ReadonlyArray<(text: string) => string> = [
  (text) => mapOutsideStrings(text.replace(LINE_COMMENTS, '\n'), (s) => s.replace(BLOCK_COMMENT, '')),
  (text) => text.replace(ELLIPSIS_LINES, '\n'),
  (text) => text.replace(MISSING_COMMA, '",\n"'),
  (text) => text.replace(TRAILING_COMMA, ''),
  normalizeQuotes,
  (text) => mapOutsideStrings(text, (s) => s.replace(/\b(True|False|None)\b/g, (word) => CAPITALIZED_LITERALS[word] ?? word)),
];

type ParseAttempt = { ok: true; value: JsonValue } | { ok: false; error: SyntaxError };

function tryParse(text: string): ParseAttempt {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    if (err instanceof SyntaxError) return { ok: false, error: err };
    throw err;
  }
}

/**
 * Run the repair ladder over `text`. Returns the first rewrite that parses
 * (re-serialized), or the best-effort closed text when none does.
 */
export function fixJson(text: string): string {
  let current = text;
  for (const step of REPAIR_STEPS) {
    current = step(current);
    const parsed = tryParse(current);
    if (parsed.ok) return JSON.stringify(parsed.value, null, 4);
  }

  // Truncated object: close the open string, then the brace.
  if (current.startsWith('{') && !current.endsWith('}')) {
    const quotes = current.split('"').length - 1;
    if (quotes % 2 === 1) current += '"';
    current += '}';
  }
  return current;
}

// ============================================================================
// parseJson
// ============================================================================

/**
 * Recover a JSON value from model output.
 *
 * @throws {MalformedStructuredOutputError} when nothing parses (unless
 *   `raiseErrors` is false), and always when `requiredFields` are given but
 *   the value is not an object or lacks one of them
 */
export function parseJson(text: string, options: ParseJsonOptions & { raiseErrors: false }): JsonValue | false;
export function parseJson(text: string, options?: ParseJsonOptions): JsonValue;
export function parseJson(text: string, options: ParseJsonOptions = {}): JsonValue | false {
  const { raiseErrors = true, requiredFields } = options;
  const candidate = unwrapJsonSubstring(text);

  let parsed = tryParse(candidate);
  if (!parsed.ok) parsed = tryParse(fixJson(candidate));
  if (!parsed.ok) {
    if (raiseErrors) {
      throw new MalformedStructuredOutputError('Model output is not valid JSON', text, { cause: parsed.error });
    }
    return false;
  }

  const value = parsed.value;
  if (requiredFields && requiredFields.length > 0) {
    if (!isRecord(value)) {
      throw new MalformedStructuredOutputError('Not an object', text);
    }
    for (const field of requiredFields) {
      if (!(field in value)) {
        throw new MalformedStructuredOutputError(`Missing field "${field}"`, text);
      }
    }
  }
  return value;
}
