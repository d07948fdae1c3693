export type { KeyValueStorage } from './types.js';
export { FileStorage } from './file-storage.js';
export { InMemoryStorage } from './in-memory.js';
