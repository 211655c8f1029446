export { FileResponseCache } from './file-cache';
export type { FileResponseCacheOptions } from './file-cache';
export { buildCacheKey } from './keys';
export type { CacheKeyPart } from './keys';
export { MemoryResponseCache } from './memory-cache';
export type { ResponseCache } from './types';
