import { describe, it, expect } from 'vitest';
import { InMemoryStorage } from '../../storage/in-memory.js';
import { LLMResponse } from '../response.js';
import { ResponseCache } from './response-cache.js';

const KEY = 'cache/default/abc.json';

describe('ResponseCache', () => {
  it('round-trips a response and marks it as cached', async () => {
    const storage = new InMemoryStorage();
    const cache = new ResponseCache(storage);

    await cache.set(KEY, new LLMResponse({ text: 'Hello', raw: { id: 'r1' } }));
    const hit = await cache.get(KEY);

    expect(storage.keys()).toEqual([KEY]);
    expect(hit?.text).toBe('Hello');
    expect(hit?.raw).toEqual({ id: 'r1' });
    expect(hit?.fromCache).toBe(true);
  });

  it('reports a miss for absent keys', async () => {
    await expect(new ResponseCache(new InMemoryStorage()).get(KEY)).resolves.toBeUndefined();
  });

  it('deletes entries that cannot be read back', async () => {
    const storage = new InMemoryStorage();
    const cache = new ResponseCache(storage);
    await storage.write(KEY, '{not json');
    await storage.write('cache/default/b.json', JSON.stringify({ raw: {} }));

    await expect(cache.get(KEY)).resolves.toBeUndefined();
    await expect(cache.get('cache/default/b.json')).resolves.toBeUndefined();
    expect(storage.size).toBe(0);
  });

  it('flushes one namespace or everything', async () => {
    const storage = new InMemoryStorage();
    const cache = new ResponseCache(storage);
    const response = new LLMResponse({ text: 'x' });
    await cache.set('cache/a/1.json', response);
    await cache.set('cache/b/2.json', response);
    await cache.set('cache/3.json', response);

    await expect(cache.flush('/a/')).resolves.toBe(true);
    expect(storage.keys()).toEqual(['cache/b/2.json', 'cache/3.json']);

    await expect(cache.flush()).resolves.toBe(true);
    expect(storage.size).toBe(0);
    await expect(cache.flush()).resolves.toBe(false);
  });
});
