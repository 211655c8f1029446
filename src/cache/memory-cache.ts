import type { ResponseCache } from './types';

interface Entry {
  value: string;
  storedAt: number;
}

export class MemoryResponseCache implements ResponseCache {
  private readonly entries = new Map<string, Entry>();

  constructor(
    private readonly ttlMs: number = 24 * 60 * 60 * 1000,
    private readonly now: () => number = Date.now
  ) {}

  async get(namespace: string, key: string): Promise<string | undefined> {
    const entry = this.entries.get(`${namespace}/${key}`);
    if (!entry) return undefined;
    if (this.now() - entry.storedAt > this.ttlMs) {
      this.entries.delete(`${namespace}/${key}`);
      return undefined;
    }
    return entry.value;
  }

  async set(namespace: string, key: string, value: string): Promise<void> {
    this.entries.set(`${namespace}/${key}`, { value, storedAt: this.now() });
  }

  async clear(namespace?: string): Promise<void> {
    if (namespace === undefined) {
      this.entries.clear();
      return;
    }
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(`${namespace}/`)) {
        this.entries.delete(key);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
