import axios from 'axios';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { buildCacheKey } from '../cache/keys';
import type { CollectContext, Collector, CollectorResult } from '../types/collectors';
import type { Item, ItemKind, Source } from '../types/items';
import { BaseError, CollectorError, describeError } from '../utils/errors';
import { type QueryValue, buildUrl, parseJsonBody, redactUrl, requestText } from '../utils/http';
import { sleep } from '../utils/retry';

export interface CollectorInit {
  /** Registry name; also the cache namespace */
  name: string;
  /** Minimum pause between two upstream requests of this collector */
  requestDelayMs?: number;
  /** Extra attempts per HTTP request for transient failures */
  httpRetries?: number;
}

export interface CollectorRequest {
  url: string;
  method?: 'GET' | 'POST';
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  body?: unknown;
}

/**
 * Items and sources gathered so far. Survives a failure so the collector
 * can report what it salvaged.
 */
export class ResultBatch {
  readonly items: Item[] = [];
  readonly sources: Source[] = [];
  /** Non-fatal problems (one bad feed out of several) */
  readonly warnings: string[] = [];

  constructor(private readonly maxItems: number) {}

  get isFull(): boolean {
    return this.items.length >= this.maxItems;
  }

  add(item: Item): boolean {
    if (this.isFull) return false;
    this.items.push(item);
    return true;
  }

  addSource(source: Source): void {
    if (!this.sources.some((s) => s.name === source.name && s.url === source.url)) {
      this.sources.push(source);
    }
  }

  toResult(error?: string): CollectorResult {
    return error === undefined
      ? { items: [...this.items], sources: [...this.sources] }
      : { items: [...this.items], sources: [...this.sources], error };
  }
}

/**
 * Failures a collector reports instead of throwing: upstream status,
 * transport errors, aborts and unexpected payload shapes.
 */
export function isOrdinaryFailure(error: unknown): boolean {
  return (
    error instanceof BaseError ||
    error instanceof ZodError ||
    axios.isAxiosError(error) ||
    axios.isCancel(error) ||
    (error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError'))
  );
}

export abstract class AbstractCollector implements Collector {
  abstract readonly type: ItemKind;
  readonly name: string;
  protected readonly requestDelayMs: number;
  protected readonly httpRetries: number;
  private lastRequestAt?: number;

  constructor(init: CollectorInit) {
    this.name = init.name;
    this.requestDelayMs = init.requestDelayMs ?? 0;
    this.httpRetries = init.httpRetries ?? 0;
  }

  requiredCredentials(): ReadonlySet<string> {
    return new Set<string>();
  }

  requiresAny(): boolean {
    return false;
  }

  async collect(context: CollectContext): Promise<CollectorResult> {
    const batch = new ResultBatch(context.depth.maxItems);

    try {
      await this.gather(context, batch);
    } catch (error) {
      if (!isOrdinaryFailure(error)) {
        throw error;
      }
      context.logger.warn('Collector failed', {
        collector: this.name,
        salvaged: batch.items.length,
        error: describeError(error)
      });
      return batch.toResult(describeError(error) ?? 'Unknown collector error');
    }

    if (batch.items.length === 0 && batch.warnings.length > 0) {
      return batch.toResult(batch.warnings.join('; '));
    }
    return batch.toResult();
  }

  /**
   * Fill the batch; throw on failure after adding whatever was salvaged
   */
  protected abstract gather(context: CollectContext, batch: ResultBatch): Promise<void>;

  /**
   * Credential value for this run: the prober's choice, else the first declared key present
   */
  protected credential(context: CollectContext): string {
    const keys = context.resolvedKey ? [context.resolvedKey] : [...this.requiredCredentials()];
    for (const key of keys) {
      const value = context.credentials[key];
      if (value) return value;
    }
    throw new CollectorError(this.name, 'No credential configured');
  }

  /**
   * Cache-aware request returning the raw body
   */
  protected fetchText(context: CollectContext, request: CollectorRequest): Promise<string> {
    return this.fetchParsed(context, request, (body) => body);
  }

  /**
   * Cache-aware request whose JSON body must match `schema`. A body that
   * fails the schema, or that `isCacheable` rejects, is never cached.
   */
  protected fetchJson<T>(
    context: CollectContext,
    schema: ZodType<T, ZodTypeDef, unknown>,
    request: CollectorRequest,
    isCacheable?: (data: T) => boolean
  ): Promise<T> {
    return this.fetchParsed(
      context,
      request,
      (body) => {
        const parsed = schema.safeParse(parseJsonBody(body, request.url));
        if (!parsed.success) {
          const issues = parsed.error.errors
            .slice(0, 3)
            .map((err) => `${err.path.join('.') || 'body'}: ${err.message}`);
          throw new CollectorError(
            this.name,
            `Unexpected payload from ${redactUrl(request.url)} (${issues.join('; ')})`
          );
        }
        return parsed.data;
      },
      isCacheable
    );
  }

  /**
   * Fetch (or read from cache) and parse a body. The body is cached only
   * after `parse` succeeds and `isCacheable` accepts the parsed value.
   */
  protected async fetchParsed<T>(
    context: CollectContext,
    request: CollectorRequest,
    parse: (body: string) => T | Promise<T>,
    isCacheable: (value: T) => boolean = () => true
  ): Promise<T> {
    const method = request.method ?? 'GET';
    const endpoint = redactUrl(buildUrl(request.url, request.query));
    const key = buildCacheKey(
      this.name,
      method,
      endpoint,
      request.body === undefined ? '' : JSON.stringify(request.body),
      context.fromDate,
      context.toDate
    );

    const cached = context.noCache ? undefined : await this.readCache(context, key);
    if (cached !== undefined) {
      context.recordCall({ endpoint, method, status: 200, latencyMs: 0, cached: true });
      return parse(cached);
    }

    await this.throttle(context.signal);
    const response = await requestText(request.url, {
      method,
      query: request.query,
      headers: request.headers,
      body: request.body,
      timeout: context.depth.timeoutMs,
      signal: context.signal,
      retries: this.httpRetries,
      recordCall: context.recordCall
    });

    const value = await parse(response.body);
    if (isCacheable(value)) {
      try {
        await context.cache.set(this.name, key, response.body);
      } catch (error) {
        context.logger.warn('Cache write failed', { collector: this.name, error: describeError(error) });
      }
    }
    return value;
  }

  /**
   * A cache that cannot be read counts as a miss
   */
  private async readCache(context: CollectContext, key: string): Promise<string | undefined> {
    try {
      return await context.cache.get(this.name, key);
    } catch (error) {
      context.logger.warn('Cache read failed', { collector: this.name, error: describeError(error) });
      return undefined;
    }
  }

  /**
   * Fixed inter-request delay for low-quota APIs
   */
  protected async throttle(signal?: AbortSignal): Promise<void> {
    if (this.requestDelayMs > 0 && this.lastRequestAt !== undefined) {
      const wait = this.lastRequestAt + this.requestDelayMs - Date.now();
      if (wait > 0) {
        await sleep(wait, signal);
      }
    }
    this.lastRequestAt = Date.now();
  }

  protected normalizeWhitespace(value: string): string {
    return value.replace(/\s+/g, ' ').trim();
  }

  protected truncate(value: string, max: number): string {
    const normalized = this.normalizeWhitespace(value);
    return normalized.length <= max ? normalized : `${normalized.slice(0, max - 1).trimEnd()}…`;
  }

  protected sanitizeUrl(url: string): string {
    try {
      const parsed = new URL(url);
      parsed.hash = '';
      for (const param of ['utm_source', 'utm_medium', 'utm_campaign', 'utm_term', 'utm_content']) {
        parsed.searchParams.delete(param);
      }
      return parsed.toString();
    } catch {
      return url;
    }
  }
}
