import { z } from 'zod';
import type { CollectContext, ProfileContext } from '../types/collectors';
import { type NewsItem, generateItemId } from '../types/items';
import { parseTimestamp } from '../utils/dates';
import { AbstractCollector, type CollectorInit, type ResultBatch } from './base';

export const NEWSDATA_KEY = 'NEWSDATA_API_KEY';
export const NEWSAPI_KEY = 'NEWSAPI_API_KEY';

const NEWSDATA_URL = 'https://newsdata.io/api/1/news';
const NEWSAPI_URL = 'https://newsapi.org/v2/everything';
const SNIPPET_LIMIT = 300;
const QUERY_TERMS = 5;

const NewsDataResponseSchema = z.object({
  status: z.string().optional(),
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        link: z.string().nullish(),
        description: z.string().nullish(),
        pubDate: z.string().nullish(),
        source_id: z.string().nullish(),
        source_name: z.string().nullish(),
        source_url: z.string().nullish(),
        category: z.array(z.string()).nullish(),
        creator: z.array(z.string()).nullish()
      })
    )
    .default([])
});

const NewsApiResponseSchema = z.object({
  status: z.string().optional(),
  articles: z
    .array(
      z.object({
        source: z.object({ name: z.string().nullish() }).nullish(),
        author: z.string().nullish(),
        title: z.string().nullish(),
        description: z.string().nullish(),
        url: z.string().nullish(),
        publishedAt: z.string().nullish()
      })
    )
    .default([])
});

/**
 * Search terms in priority order: focus entities by weight, then boost keywords
 */
export function buildNewsQuery(profile: ProfileContext, limit = QUERY_TERMS): string {
  const entities = [...profile.entities].sort((a, b) => b.weight - a.weight).map((e) => e.name);
  const terms = [...new Set([...entities, ...profile.boostKeywords])].slice(0, limit);
  return terms.map((term) => (term.includes(' ') ? `"${term}"` : term)).join(' OR ');
}

/**
 * An article from either news API, before it becomes an item
 */
export interface NewsArticle {
  title: string;
  url: string;
  description: string;
  publishedAt?: Date;
  sourceName: string;
  sourceUrl: string;
  publisher?: string;
  author?: string;
  categories: string[];
}

/**
 * Headlines from NewsData.io, or from NewsAPI when that is the only key configured
 */
export class NewsCollector extends AbstractCollector {
  readonly type = 'news' as const;

  constructor(init: Partial<CollectorInit> = {}) {
    super({ name: 'news', ...init });
  }

  requiredCredentials(): ReadonlySet<string> {
    return new Set([NEWSDATA_KEY, NEWSAPI_KEY]);
  }

  requiresAny(): boolean {
    return true;
  }

  protected buildQuery(profile: ProfileContext): string {
    return buildNewsQuery(profile);
  }

  /**
   * Item for an article, or undefined to drop it
   */
  protected toItem(article: NewsArticle): NewsItem | undefined {
    return {
      kind: 'news',
      id: generateItemId(article.url),
      title: article.title,
      url: article.url,
      sourceName: article.sourceName,
      collector: this.name,
      publishedAt: article.publishedAt,
      snippet: this.truncate(article.description, SNIPPET_LIMIT),
      payload: {
        publisher: article.publisher,
        author: article.author,
        categories: article.categories
      }
    };
  }

  protected async gather(context: CollectContext, batch: ResultBatch): Promise<void> {
    const query = this.buildQuery(context.profile);
    if (!query) {
      batch.warnings.push('Profile has no focus terms to search for');
      return;
    }

    const useNewsApi =
      context.resolvedKey === NEWSAPI_KEY || (!context.resolvedKey && !context.credentials[NEWSDATA_KEY]);
    const articles = useNewsApi
      ? await this.fromNewsApi(context, query)
      : await this.fromNewsData(context, query);

    for (const article of articles) {
      const item = this.toItem(article);
      if (!item) continue;
      if (!batch.add(item)) break;
      batch.addSource({ name: article.sourceName, url: article.sourceUrl });
    }
  }

  private async fromNewsData(context: CollectContext, query: string): Promise<NewsArticle[]> {
    const payload = await this.fetchJson(context, NewsDataResponseSchema, {
      url: NEWSDATA_URL,
      query: { apikey: this.credential(context), q: query, language: 'en' }
    });

    return payload.results.flatMap((article) => {
      if (!article.title || !article.link) return [];
      const url = this.sanitizeUrl(article.link);
      return [
        {
          title: this.normalizeWhitespace(article.title),
          url,
          description: article.description ?? '',
          publishedAt: parseTimestamp(article.pubDate),
          sourceName: article.source_name || article.source_id || 'Unknown',
          sourceUrl: article.source_url || url,
          publisher: article.source_id ?? undefined,
          author: article.creator?.[0],
          categories: article.category ?? []
        }
      ];
    });
  }

  private async fromNewsApi(context: CollectContext, query: string): Promise<NewsArticle[]> {
    const payload = await this.fetchJson(context, NewsApiResponseSchema, {
      url: NEWSAPI_URL,
      query: {
        q: query,
        from: context.fromDate,
        to: context.toDate,
        sortBy: 'relevancy',
        language: 'en',
        pageSize: context.depth.maxItems
      },
      headers: { 'X-Api-Key': this.credential(context) }
    });

    return payload.articles.flatMap((article) => {
      if (!article.title || !article.url) return [];
      const url = this.sanitizeUrl(article.url);
      return [
        {
          title: this.normalizeWhitespace(article.title),
          url,
          description: article.description ?? '',
          publishedAt: parseTimestamp(article.publishedAt),
          sourceName: article.source?.name || 'Unknown',
          sourceUrl: url,
          author: article.author ?? undefined,
          categories: []
        }
      ];
    });
  }
}
