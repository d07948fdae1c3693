import { describe, it, expect } from 'vitest';
import { MalformedStructuredOutputError } from './errors.js';
import { LLMResponse } from './response.js';

describe('LLMResponse', () => {
  it('allows genDuration and fromCache to be set once', () => {
    const response = new LLMResponse({ text: 'hi' });
    expect(response.fromCache).toBe(false);
    expect(response.genDuration).toBeUndefined();

    response.genDuration = 1.25;
    response.fromCache = true;

    expect(response.genDuration).toBe(1.25);
    expect(response.fromCache).toBe(true);
    expect(() => {
      response.genDuration = 2;
    }).toThrow(TypeError);
    expect(() => {
      response.fromCache = false;
    }).toThrow('fromCache is already set');
  });

  it('parses JSON from its text', () => {
    const response = new LLMResponse({ text: 'Here you go: {"ok": true}' });
    expect(response.parseJson()).toEqual({ ok: true });
    expect(new LLMResponse({ text: 'nope' }).parseJson({ raiseErrors: false })).toBe(false);
    expect(() => new LLMResponse({ text: 'nope' }).parseJson()).toThrow(MalformedStructuredOutputError);
  });

  it('extracts numbers and counts tokens', () => {
    const response = new LLMResponse({ text: 'I rate it 8 of 10' });
    expect(response.parseNumber({ integer: true })).toBe(8);
    expect(response.parseNumber({ position: 'last' })).toBe(10);
    expect(new LLMResponse({ text: 'hello world' }).numTokens()).toBe(2);
  });

  it('behaves as its text in string contexts', () => {
    expect(`${new LLMResponse({ text: 'abc' })}`).toBe('abc');
  });

  it('round-trips through its cache form', () => {
    const original = new LLMResponse({
      text: 'done',
      raw: { id: 'resp_1', usage: { total_tokens: 3 } },
      images: [{ mimeType: 'image/png', data: 'aGVsbG8=' }],
    });
    const data: unknown = JSON.parse(JSON.stringify(original));

    expect(LLMResponse.isSerialized(data)).toBe(true);
    if (!LLMResponse.isSerialized(data)) return;

    const restored = LLMResponse.fromJSON(data);
    expect(restored.text).toBe('done');
    expect(restored.raw).toEqual({ id: 'resp_1', usage: { total_tokens: 3 } });
    expect(restored.images).toEqual([{ mimeType: 'image/png', data: 'aGVsbG8=' }]);
    expect(restored.fromCache).toBe(false);
  });

  it('omits images from the cache form when there are none', () => {
    expect(new LLMResponse({ text: 't', raw: { a: 1 } }).toJSON()).toEqual({ text: 't', raw: { a: 1 } });
  });

  it('rejects malformed cache payloads', () => {
    expect(LLMResponse.isSerialized({ text: 1, raw: {} })).toBe(false);
    expect(LLMResponse.isSerialized({ text: 'x' })).toBe(false);
    expect(LLMResponse.isSerialized({ text: 'x', raw: {}, images: [{ data: 'y' }] })).toBe(false);
    expect(LLMResponse.isSerialized(null)).toBe(false);
  });
});
