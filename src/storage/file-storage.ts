/**
 * File-backed key-value storage rooted at a directory.
 *
 * @module
 */

import { mkdir, readFile, rm, stat, unlink, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { StorageError } from '../types/errors.js';
import { toErrorMessage } from '../utils/async.js';
import type { KeyValueStorage } from './types.js';

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

export class FileStorage implements KeyValueStorage {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /** Absolute path for `key`; rejects keys that escape the root. */
  pathFor(key: string): string {
    const target = resolve(this.root, key);
    const rel = relative(this.root, target);
    if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new StorageError(key, 'key resolves outside the storage root');
    }
    return target;
  }

  async read(key: string): Promise<string | undefined> {
    const path = this.pathFor(key);
    try {
      return await readFile(path, 'utf8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return undefined;
      throw new StorageError(key, toErrorMessage(err), { cause: err });
    }
  }

  async write(key: string, value: string): Promise<void> {
    const path = this.pathFor(key);
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, value, 'utf8');
    } catch (err) {
      throw new StorageError(key, toErrorMessage(err), { cause: err });
    }
  }

  async delete(key: string): Promise<boolean> {
    const path = this.pathFor(key);
    try {
      await unlink(path);
      return true;
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return false;
      throw new StorageError(key, toErrorMessage(err), { cause: err });
    }
  }

  async exists(key: string): Promise<boolean> {
    const path = this.pathFor(key);
    try {
      return (await stat(path)).isFile();
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return false;
      throw new StorageError(key, toErrorMessage(err), { cause: err });
    }
  }

  async deletePrefix(prefix: string): Promise<boolean> {
    const path = this.pathFor(prefix);
    try {
      await stat(path);
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return false;
      throw new StorageError(prefix, toErrorMessage(err), { cause: err });
    }
    try {
      await rm(path, { recursive: true, force: true });
      return true;
    } catch (err) {
      throw new StorageError(prefix, toErrorMessage(err), { cause: err });
    }
  }
}
