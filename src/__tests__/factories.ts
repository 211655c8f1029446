/**
 * Builders shared by the test suites
 */

import { MemoryResponseCache } from '../cache/memory-cache';
import type {
  CollectContext,
  Collector,
  CollectorResult,
  DepthProfile,
  ProfileContext
} from '../types/collectors';
import { type FinancialItem, type ItemKind, type NewsItem, type SocialItem, generateItemId } from '../types/items';
import { Logger } from '../utils/logger';

export function makeNewsItem(overrides: Partial<NewsItem> = {}): NewsItem {
  const url = overrides.url ?? 'https://news.example.com/story';
  return {
    kind: 'news',
    id: generateItemId(url),
    title: 'Agency wins global account',
    url,
    sourceName: 'Example News',
    collector: 'news',
    snippet: 'An agency won a large account.',
    payload: { categories: [] },
    ...overrides
  };
}

export function makeSocialItem(overrides: Partial<SocialItem> = {}): SocialItem {
  const url = overrides.url ?? 'https://x.com/someone/status/1';
  return {
    kind: 'social',
    id: generateItemId(url),
    title: '@someone: a post',
    url,
    sourceName: 'X - @someone',
    collector: 'x_search',
    snippet: 'a post',
    engagement: 0,
    payload: { handle: 'someone', likes: 0, reposts: 0, replies: 0, quotes: 0 },
    ...overrides
  };
}

export function makeQuoteItem(overrides: Partial<FinancialItem> = {}): FinancialItem {
  return {
    kind: 'financial',
    id: 'quote-wpp',
    title: 'WPP 50.00 USD',
    url: 'https://finance.yahoo.com/quote/WPP',
    sourceName: 'Yahoo Finance',
    collector: 'yahoo_finance',
    snippet: '',
    payload: { symbol: 'WPP', price: 50, currency: 'USD' },
    ...overrides
  };
}

export function makeProfile(overrides: Partial<ProfileContext> = {}): ProfileContext {
  return {
    domain: 'advertising',
    profile: 'default',
    boostKeywords: [],
    filterKeywords: [],
    entities: [],
    thoughtLeaders: [],
    publications: [],
    scrapeTargets: [],
    requireTimestamp: false,
    ...overrides
  };
}

export const DEFAULT_DEPTH: DepthProfile = { name: 'default', maxItems: 25, timeoutMs: 60000, targetItems: 20 };

export function makeContext(overrides: Partial<CollectContext> = {}): CollectContext {
  return {
    profile: makeProfile(),
    fromDate: '2024-01-01',
    toDate: '2024-01-07',
    depth: DEFAULT_DEPTH,
    credentials: {},
    signal: new AbortController().signal,
    cache: new MemoryResponseCache(),
    noCache: false,
    recordCall: () => undefined,
    logger: Logger.silent(),
    ...overrides
  };
}

type Behaviour = (context: CollectContext, attempt: number) => Promise<CollectorResult>;

/**
 * Collector whose attempts follow a script; records every call
 */
export class ScriptedCollector implements Collector {
  readonly calls: CollectContext[] = [];

  constructor(
    readonly name: string,
    private readonly behaviour: Behaviour,
    readonly type: ItemKind = 'news',
    private readonly credentials: readonly string[] = [],
    private readonly any = false
  ) {}

  requiredCredentials(): ReadonlySet<string> {
    return new Set(this.credentials);
  }

  requiresAny(): boolean {
    return this.any;
  }

  collect(context: CollectContext): Promise<CollectorResult> {
    this.calls.push(context);
    return this.behaviour(context, this.calls.length);
  }
}

export function succeedWith(...items: NewsItem[]): Behaviour {
  return async () => ({ items, sources: items.map((item) => ({ name: item.sourceName, url: item.url })) });
}

/**
 * Resolves after `ms`, or rejects with the signal's reason when aborted first
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true }
    );
  });
}
