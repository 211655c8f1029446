/**
 * RSS/Atom collector for the profile's publications
 */

import * as cheerio from 'cheerio';
import Parser from 'rss-parser';
import type { CollectContext, Publication } from '../types/collectors';
import { type NewsItem, generateItemId } from '../types/items';
import { parseTimestamp } from '../utils/dates';
import { describeError } from '../utils/errors';
import { AbstractCollector, type CollectorInit, type ResultBatch } from './base';

interface FeedItemFields {
  creator?: string;
  'dc:creator'?: string;
}

const SNIPPET_LIMIT = 500;

function stripHtml(html: string): string {
  return cheerio.load(html).root().text();
}

export class RssCollector extends AbstractCollector {
  readonly type = 'news' as const;
  private readonly parser: Parser<Record<string, unknown>, FeedItemFields>;

  constructor(init: Partial<CollectorInit> = {}) {
    super({ name: 'rss', ...init });
    this.parser = new Parser<Record<string, unknown>, FeedItemFields>({
      customFields: {
        item: ['dc:creator']
      }
    });
  }

  protected async gather(context: CollectContext, batch: ResultBatch): Promise<void> {
    const feeds = context.profile.publications.filter((p): p is Publication & { feedUrl: string } =>
      Boolean(p.feedUrl)
    );
    if (feeds.length === 0) {
      batch.warnings.push('No RSS feeds configured for profile');
      return;
    }

    const perFeed = Math.max(1, Math.ceil(context.depth.maxItems / feeds.length));

    for (const feed of feeds) {
      if (batch.isFull) break;
      try {
        await this.readFeed(context, batch, feed, perFeed);
      } catch (error) {
        if (context.signal.aborted) {
          throw error;
        }
        batch.warnings.push(`${feed.name}: ${describeError(error)}`);
      }
    }
  }

  private async readFeed(
    context: CollectContext,
    batch: ResultBatch,
    feed: Publication & { feedUrl: string },
    limit: number
  ): Promise<void> {
    const parsed = await this.fetchParsed(
      context,
      {
        url: feed.feedUrl,
        headers: { Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8' }
      },
      (xml) => this.parser.parseString(xml)
    );

    let taken = 0;
    for (const entry of parsed.items) {
      if (taken >= limit) break;
      if (!entry.title || !entry.link) continue;

      const url = this.sanitizeUrl(entry.link);
      const body = entry.contentSnippet || (entry.content ? stripHtml(entry.content) : '');
      const item: NewsItem = {
        kind: 'news',
        id: generateItemId(url),
        title: this.normalizeWhitespace(entry.title),
        url,
        sourceName: feed.name,
        collector: this.name,
        publishedAt: parseTimestamp(entry.isoDate ?? entry.pubDate),
        snippet: this.truncate(body, SNIPPET_LIMIT),
        payload: {
          publisher: feed.name,
          author: entry.creator ?? entry['dc:creator'],
          categories: entry.categories ?? []
        }
      };

      if (!batch.add(item)) break;
      taken++;
    }

    if (taken > 0) {
      batch.addSource({ name: feed.name, url: feed.url });
    }
  }
}
