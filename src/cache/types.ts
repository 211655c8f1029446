/**
 * Shared response cache. Implementations must tolerate concurrent writers.
 */
export interface ResponseCache {
  /** Cached body, or undefined on miss or expiry */
  get(namespace: string, key: string): Promise<string | undefined>;
  set(namespace: string, key: string, value: string): Promise<void>;
  /** Drop one namespace, or everything */
  clear(namespace?: string): Promise<void>;
}
