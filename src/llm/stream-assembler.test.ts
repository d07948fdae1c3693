import { describe, it, expect, vi } from 'vitest';
import {
  StreamAssembler,
  assembleStream,
  deliverPayload,
  hidesOutput,
  removeHiddenOutput,
} from './stream-assembler.js';

async function* fromArray(chunks: string[]): AsyncGenerator<string> {
  for (const chunk of chunks) yield chunk;
}

const MARKERS = { begin: '<think>', end: '</think>' };

describe('assembleStream', () => {
  it('concatenates marker-free chunks in order', async () => {
    await expect(assembleStream(fromArray(['Hel', 'lo', ', ', 'world']))).resolves.toBe('Hello, world');
  });

  it('drops a hidden segment and both markers', async () => {
    const seen: string[] = [];
    const text = await assembleStream(
      fromArray(['A', '<think>', 'secret', '</think>', 'B']),
      [(chunk) => { seen.push(chunk); }],
      MARKERS,
    );

    expect(text).toBe('AB');
    expect(seen).toEqual(['A', 'B']);
  });

  it('keeps markers as text when only one is configured', async () => {
    const text = await assembleStream(fromArray(['A', '<think>', 'B']), [], { begin: '<think>' });
    expect(text).toBe('A<think>B');
  });

  it('treats an end marker outside a hidden segment as text', async () => {
    const text = await assembleStream(fromArray(['A', '</think>', 'B']), [], MARKERS);
    expect(text).toBe('A</think>B');
  });

  it('discards an unterminated hidden segment', async () => {
    const text = await assembleStream(fromArray(['visible', '<think>', 'never', 'closed']), [], MARKERS);
    expect(text).toBe('visible');
  });

  it('skips empty chunks without notifying observers', async () => {
    const callback = vi.fn();
    const text = await assembleStream(fromArray(['', 'x', '']), [callback]);
    expect(text).toBe('x');
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('awaits each async observer before the next one and the next chunk', async () => {
    const log: string[] = [];
    const slow = async (chunk: string) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      log.push(`slow:${chunk}`);
    };
    const fast = (chunk: string) => {
      log.push(`fast:${chunk}`);
    };

    await assembleStream(fromArray(['1', '2']), [slow, fast]);

    expect(log).toEqual(['slow:1', 'fast:1', 'slow:2', 'fast:2']);
  });

  it('propagates observer failures', async () => {
    const failing = () => {
      throw new Error('observer broke');
    };
    await expect(assembleStream(fromArray(['a']), [failing])).rejects.toThrow('observer broke');
  });
});

describe('StreamAssembler', () => {
  it('exposes the hiding state while a segment is open', async () => {
    const assembler = new StreamAssembler([], MARKERS);
    await assembler.push('<think>');
    expect(assembler.hiding).toBe(true);
    await assembler.push('</think>');
    expect(assembler.hiding).toBe(false);
  });
});

describe('removeHiddenOutput', () => {
  it('removes segments non-greedily across lines', () => {
    expect(removeHiddenOutput('a<think>x\ny</think>b<think>z</think>c', MARKERS)).toBe('abc');
  });

  it('treats markers literally', () => {
    expect(removeHiddenOutput('keep[[drop]]keep', { begin: '[[', end: ']]' })).toBe('keepkeep');
  });

  it('returns text unchanged without both markers', () => {
    expect(removeHiddenOutput('a<think>x</think>', { begin: '<think>' })).toBe('a<think>x</think>');
  });

  it('keeps an unterminated segment in a payload', () => {
    expect(removeHiddenOutput('a<think>never closed', MARKERS)).toBe('a<think>never closed');
  });
});

describe('hidesOutput', () => {
  it('needs both markers', () => {
    expect(hidesOutput({})).toBe(false);
    expect(hidesOutput({ begin: '<think>' })).toBe(false);
    expect(hidesOutput({ begin: '<think>', end: '' })).toBe(false);
    expect(hidesOutput(MARKERS)).toBe(true);
  });
});

describe('deliverPayload', () => {
  it('invokes each observer once with the visible text', async () => {
    const callback = vi.fn();
    const text = await deliverPayload('a<think>x</think>b', [callback], MARKERS);
    expect(text).toBe('ab');
    expect(callback).toHaveBeenCalledWith('ab');
    expect(callback).toHaveBeenCalledTimes(1);
  });
});
