import { describe, it, expect } from 'vitest';
import { defineConfig } from '../../config/schema.js';
import { cacheDir, canonicalize, deriveCacheKey, sanitizePrefix } from './key.js';

const config = defineConfig({ apiKey: 'test-key', model: 'gpt-4o-mini' });
const turns = [{ role: 'user' as const, content: 'Hello' }];

describe('sanitizePrefix', () => {
  it('strips traversal sequences and surrounding slashes', () => {
    expect(sanitizePrefix('../../etc/')).toBe('etc');
    expect(sanitizePrefix('/reviews/v2/')).toBe('reviews/v2');
    expect(sanitizePrefix('')).toBe('');
  });

  it('places unprefixed entries at the cache root', () => {
    expect(cacheDir()).toBe('cache');
    expect(cacheDir('/..//')).toBe('cache');
    expect(cacheDir('reviews')).toBe('cache/reviews');
  });
});

describe('canonicalize', () => {
  it('sorts keys at every depth and drops functions', () => {
    const value = canonicalize({ b: 1, a: { d: [{ z: 1, y: 2 }], c: undefined, f: () => 1 } });
    expect(JSON.stringify(value)).toBe('{"a":{"d":[{"y":2,"z":1}]},"b":1}');
  });
});

describe('deriveCacheKey', () => {
  it('produces a sha256 file name under the prefix directory', () => {
    const key = deriveCacheKey({ config, prefix: 'reviews', turns, options: {} });
    expect(key).toMatch(/^cache\/reviews\/[0-9a-f]{64}\.json$/);
  });

  it('ignores key order in args', () => {
    const a = deriveCacheKey({ config, turns, options: { args: { temperature: 0, top_p: 1 } } });
    const b = deriveCacheKey({ config, turns, options: { args: { top_p: 1, temperature: 0 } } });
    expect(a).toBe(b);
  });

  it('changes with the turns, args, model and prefix', () => {
    const base = deriveCacheKey({ config, turns, options: {} });
    expect(deriveCacheKey({ config, turns: [{ role: 'user', content: 'Hi' }], options: {} })).not.toBe(base);
    expect(deriveCacheKey({ config, turns, options: { args: { temperature: 1 } } })).not.toBe(base);
    expect(deriveCacheKey({ config, turns, options: { model: 'gpt-4o' } })).not.toBe(base);
    expect(deriveCacheKey({ config, turns, options: {}, prefix: 'other' }).split('/').pop())
      .not.toBe(base.split('/').pop());
  });

  it('keys the effective call rather than the options as written', () => {
    const base = deriveCacheKey({ config, turns, options: {} });
    expect(deriveCacheKey({ config, turns, options: { args: {} } })).toBe(base);
    expect(deriveCacheKey({ config, turns, options: { model: 'gpt-4o-mini' } })).toBe(base);

    const withDefaults = defineConfig({ apiKey: 'test-key', model: 'gpt-4o-mini', defaultArgs: { temperature: 0 } });
    expect(deriveCacheKey({ config: withDefaults, turns, options: {} }))
      .toBe(deriveCacheKey({ config, turns, options: { args: { temperature: 0 } } }));
  });

  it('treats equivalent structured-output requests alike', () => {
    const plain = deriveCacheKey({ config, turns, options: { parseJson: true } });
    expect(deriveCacheKey({ config, turns, options: { parseJson: {} } })).toBe(plain);
    expect(deriveCacheKey({ config, turns, options: { parseJson: { requiredFields: [] } } })).toBe(plain);
    expect(deriveCacheKey({ config, turns, options: { parseJson: false } }))
      .toBe(deriveCacheKey({ config, turns, options: {} }));
    expect(deriveCacheKey({ config, turns, options: { parseJson: { requiredFields: ['b', 'a'] } } }))
      .toBe(deriveCacheKey({ config, turns, options: { parseJson: { requiredFields: ['a', 'b', 'a'] } } }));
    expect(deriveCacheKey({ config, turns, options: { parseJson: { requiredFields: ['a'] } } })).not.toBe(plain);
    expect(plain).not.toBe(deriveCacheKey({ config, turns, options: {} }));
  });

  it('leaves out credentials, observers and the retry budget', () => {
    const base = deriveCacheKey({ config, turns, options: {} });
    const otherKey = defineConfig({ apiKey: 'another-test-key', model: 'gpt-4o-mini' });
    expect(deriveCacheKey({ config: otherKey, turns, options: {} })).toBe(base);
    expect(deriveCacheKey({
      config,
      turns,
      options: { callback: () => undefined, callbacks: [() => undefined], retries: 5, stream: true },
    })).toBe(base);
  });
});
