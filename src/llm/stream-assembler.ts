/**
 * Stream assembly: merges incremental chunks into the final text, drops
 * hidden segments and fans accepted chunks out to observers.
 *
 * @module
 */

import type { ChunkCallback } from './types.js';

export interface HiddenMarkers {
  begin?: string;
  end?: string;
}

/** True when both markers are set; hiding is off otherwise. */
export function hidesOutput(markers: HiddenMarkers): markers is Required<HiddenMarkers> {
  return Boolean(markers.begin && markers.end);
}

type AssemblerState = 'normal' | 'hiding';

/**
 * Incremental assembler. Hiding applies only when both markers are set, and
 * markers are recognized only as whole chunks.
 */
export class StreamAssembler {
  private state: AssemblerState = 'normal';
  private buffer = '';
  private readonly begin?: string;
  private readonly end?: string;

  constructor(
    private readonly callbacks: readonly ChunkCallback[] = [],
    markers: HiddenMarkers = {},
  ) {
    if (hidesOutput(markers)) {
      this.begin = markers.begin;
      this.end = markers.end;
    }
  }

  get text(): string {
    return this.buffer;
  }

  get hiding(): boolean {
    return this.state === 'hiding';
  }

  /** Feed one chunk; resolves after every observer has handled it. */
  async push(chunk: string): Promise<void> {
    if (!chunk) return;

    if (this.begin !== undefined && this.end !== undefined) {
      if (this.state === 'normal' && chunk === this.begin) {
        this.state = 'hiding';
        return;
      }
      if (this.state === 'hiding') {
        if (chunk === this.end) this.state = 'normal';
        return;
      }
    }

    this.buffer += chunk;
    for (const callback of this.callbacks) {
      await callback(chunk);
    }
  }

  /** Final text. A segment still open at this point is discarded. */
  finish(): string {
    this.state = 'normal';
    return this.buffer;
  }
}

/** Consume a chunk sequence through a fresh assembler. */
export async function assembleStream(
  chunks: AsyncIterable<string>,
  callbacks: readonly ChunkCallback[] = [],
  markers: HiddenMarkers = {},
): Promise<string> {
  const assembler = new StreamAssembler(callbacks, markers);
  for await (const chunk of chunks) {
    await assembler.push(chunk);
  }
  return assembler.finish();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Remove every `begin ... end` segment (non-greedy, across lines). */
export function removeHiddenOutput(text: string, markers: HiddenMarkers): string {
  if (!hidesOutput(markers)) return text;
  const pattern = new RegExp(`${escapeRegExp(markers.begin)}[\\s\\S]*?${escapeRegExp(markers.end)}`, 'g');
  return text.replace(pattern, '');
}

/**
 * Non-streaming counterpart of {@link assembleStream}: strip hidden segments
 * from a whole payload, then hand the final text to each observer once.
 */
export async function deliverPayload(
  text: string,
  callbacks: readonly ChunkCallback[] = [],
  markers: HiddenMarkers = {},
): Promise<string> {
  const visible = removeHiddenOutput(text, markers);
  for (const callback of callbacks) {
    await callback(visible);
  }
  return visible;
}
