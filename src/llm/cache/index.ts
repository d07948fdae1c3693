export { CACHE_ROOT, cacheDir, canonicalize, configSnapshot, deriveCacheKey, sanitizePrefix } from './key.js';
export type { CacheKeyInput } from './key.js';
export { ResponseCache } from './response-cache.js';
