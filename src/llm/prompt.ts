/**
 * Request normalization: turns whatever the caller passed into `Turn[]`.
 *
 * @module
 */

import type { ContentPart, Prompt, Role, Turn } from './types.js';

function turn(role: Role, content: string | ContentPart[]): Turn {
  return { role, content };
}

export const systemTurn = (content: string | ContentPart[]): Turn => turn('system', content);
export const userTurn = (content: string | ContentPart[]): Turn => turn('user', content);
export const assistantTurn = (content: string | ContentPart[]): Turn => turn('assistant', content);

/** Inline image part from base64 data. */
export function imagePart(data: string, mimeType = 'image/png'): ContentPart {
  return { type: 'image', mimeType, data };
}

function isTurnList(prompt: Prompt): prompt is ReadonlyArray<string | Turn> {
  return Array.isArray(prompt);
}

/**
 * Normalize a prompt into an ordered list of turns. Bare strings become
 * `user` turns; turn objects are copied so later mutation by the caller
 * cannot change a cached request.
 */
export function normalizePrompt(prompt: Prompt): Turn[] {
  const items = isTurnList(prompt) ? prompt : [prompt];
  return items.map((item) =>
    typeof item === 'string'
      ? userTurn(item)
      : turn(item.role, typeof item.content === 'string' ? item.content : item.content.map((part) => ({ ...part }))),
  );
}

/** Text parts of a turn, joined with newlines. Images are skipped. */
export function turnText(value: Turn): string {
  if (typeof value.content === 'string') return value.content;
  return value.content
    .flatMap((part) => (part.type === 'text' ? [part.text] : []))
    .join('\n');
}

/** Image parts of a turn. */
export function turnImages(value: Turn): Array<Extract<ContentPart, { type: 'image' }>> {
  if (typeof value.content === 'string') return [];
  return value.content.flatMap((part) => (part.type === 'image' ? [part] : []));
}

/** Flatten turns into a single text block (image prompts, token estimates). */
export function promptText(turns: readonly Turn[]): string {
  return turns.map(turnText).filter((text) => text.length > 0).join('\n');
}
