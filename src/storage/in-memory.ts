/**
 * Map-backed storage for tests and ephemeral caches.
 *
 * @module
 */

import type { KeyValueStorage } from './types.js';

export class InMemoryStorage implements KeyValueStorage {
  private readonly entries = new Map<string, string>();

  async read(key: string): Promise<string | undefined> {
    return this.entries.get(key);
  }

  async write(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.entries.has(key);
  }

  async deletePrefix(prefix: string): Promise<boolean> {
    const base = prefix.replace(/\/+$/, '');
    let removed = false;
    for (const key of [...this.entries.keys()]) {
      if (key === base || key.startsWith(`${base}/`)) {
        this.entries.delete(key);
        removed = true;
      }
    }
    return removed;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}
