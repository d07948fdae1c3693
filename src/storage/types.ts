/**
 * Key-value storage contract used by the response cache.
 *
 * Keys are `/`-separated relative paths such as `cache/default/<sha256>.json`.
 *
 * @module
 */

export interface KeyValueStorage {
  /** Stored value, or `undefined` when the key is absent. */
  read(key: string): Promise<string | undefined>;
  write(key: string, value: string): Promise<void>;
  /** True when a value was removed. */
  delete(key: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  /** Remove every key under `prefix`. True when anything was removed. */
  deletePrefix(prefix: string): Promise<boolean>;
}
