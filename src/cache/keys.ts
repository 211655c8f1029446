import crypto from 'node:crypto';

export type CacheKeyPart = string | number | boolean | null | undefined;

/**
 * Key for (source, query parameters, date window). Parts are order-sensitive.
 */
export function buildCacheKey(...parts: CacheKeyPart[]): string {
  const seed = parts.map((part) => (part === null || part === undefined ? '' : String(part))).join('|');
  return crypto.createHash('sha256').update(seed).digest('hex').slice(0, 16);
}

