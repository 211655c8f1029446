import crypto from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { getLogger, type Logger } from '../utils/logger';
import type { ResponseCache } from './types';

const CacheEnvelopeSchema = z.object({
  stored_at: z.number(),
  value: z.string()
});

export interface FileResponseCacheOptions {
  directory: string;
  ttlHours?: number;
  now?: () => number;
  logger?: Logger;
}

const SAFE_SEGMENT = /^[A-Za-z0-9._-]+$/;

/**
 * JSON-file cache, one directory per namespace. Writes go through a temp
 * file and rename; writes to the same key are serialized.
 */
export class FileResponseCache implements ResponseCache {
  private readonly directory: string;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly pendingWrites = new Map<string, Promise<void>>();

  constructor(options: FileResponseCacheOptions) {
    this.directory = options.directory;
    this.ttlMs = (options.ttlHours ?? 24) * 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? getLogger().child({ service: 'cache' });
  }

  private filePath(namespace: string, key: string): string {
    if (!SAFE_SEGMENT.test(namespace) || !SAFE_SEGMENT.test(key)) {
      throw new Error(`Invalid cache location ${namespace}/${key}`);
    }
    return path.join(this.directory, namespace, `${key}.json`);
  }

  async get(namespace: string, key: string): Promise<string | undefined> {
    const file = this.filePath(namespace, key);
    await this.pendingWrites.get(file);

    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }

    let envelope: unknown;
    try {
      envelope = JSON.parse(raw);
    } catch {
      this.logger.warn('Ignoring unreadable cache entry', { file });
      return undefined;
    }

    const parsed = CacheEnvelopeSchema.safeParse(envelope);
    if (!parsed.success) {
      this.logger.warn('Ignoring malformed cache entry', { file });
      return undefined;
    }
    if (this.now() - parsed.data.stored_at > this.ttlMs) {
      return undefined;
    }
    return parsed.data.value;
  }

  async set(namespace: string, key: string, value: string): Promise<void> {
    const file = this.filePath(namespace, key);
    const previous = this.pendingWrites.get(file) ?? Promise.resolve();
    const write = previous
      .catch(() => undefined)
      .then(() => this.writeAtomic(file, JSON.stringify({ stored_at: this.now(), value })));

    this.pendingWrites.set(file, write);
    try {
      await write;
    } finally {
      if (this.pendingWrites.get(file) === write) {
        this.pendingWrites.delete(file);
      }
    }
  }

  async clear(namespace?: string): Promise<void> {
    const target = namespace === undefined ? this.directory : path.join(this.directory, namespace);
    await fs.rm(target, { recursive: true, force: true });
  }

  private async writeAtomic(file: string, contents: string): Promise<void> {
    await fs.mkdir(path.dirname(file), { recursive: true });
    const tmp = `${file}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`;
    await fs.writeFile(tmp, contents, 'utf-8');
    try {
      await fs.rename(tmp, file);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      throw error;
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
