import * as cheerio from 'cheerio';
import type { CollectContext, ScrapeTarget } from '../types/collectors';
import { type ListingItem, generateItemId } from '../types/items';
import { parseTimestamp } from '../utils/dates';
import { describeError } from '../utils/errors';
import { AbstractCollector, type CollectorInit, type ResultBatch } from './base';

export interface WebScraperInit extends Partial<CollectorInit> {
  /** Scraping is opt-in per deployment */
  enabled?: boolean;
}

/**
 * Extract listings from static HTML pages using CSS selectors
 */
export class WebScraperCollector extends AbstractCollector {
  readonly type = 'listing' as const;
  private readonly enabled: boolean;

  constructor(init: WebScraperInit = {}) {
    const { enabled, ...rest } = init;
    super({ name: 'web_scraper', requestDelayMs: 1000, ...rest });
    this.enabled = enabled ?? false;
  }

  disabledReason(): string | undefined {
    return this.enabled ? undefined : 'scraping disabled (set ENABLE_SCRAPING=true)';
  }

  protected async gather(context: CollectContext, batch: ResultBatch): Promise<void> {
    const targets = context.profile.scrapeTargets;
    if (targets.length === 0) {
      batch.warnings.push('No scrape targets configured');
      return;
    }

    for (const target of targets) {
      if (batch.isFull) break;
      try {
        const html = await this.fetchText(context, {
          url: target.url,
          headers: { Accept: 'text/html', 'User-Agent': 'Mozilla/5.0 (compatible; briefing-engine/0.1)' }
        });
        const added = this.extract(html, target, batch);
        if (added > 0) {
          batch.addSource({ name: target.name, url: target.url });
        }
      } catch (error) {
        if (context.signal.aborted) {
          throw error;
        }
        batch.warnings.push(`${target.name}: ${describeError(error)}`);
      }
    }
  }

  /**
   * Add listings found in `html`; returns how many were added
   */
  extract(html: string, target: ScrapeTarget, batch: ResultBatch): number {
    const $ = cheerio.load(html);
    let added = 0;

    $(target.selector).each((_, element) => {
      if (batch.isFull) return false;
      const node = $(element);

      const link = node.find(target.linkSelector ?? 'a[href]').first();
      const href = link.attr('href') ?? (node.is('a') ? node.attr('href') : undefined);
      if (!href) return undefined;

      let url: string;
      try {
        url = this.sanitizeUrl(new URL(href, target.url).toString());
      } catch {
        return undefined;
      }

      const title = this.normalizeWhitespace(
        (target.titleSelector ? node.find(target.titleSelector).first().text() : link.text()) || node.text()
      );
      if (!title) return undefined;

      const snippet = target.snippetSelector ? node.find(target.snippetSelector).first().text() : '';
      const dateNode = node.find(target.dateSelector ?? 'time').first();
      const publishedAt = parseTimestamp(dateNode.attr('datetime') ?? dateNode.text());

      const item: ListingItem = {
        kind: 'listing',
        id: generateItemId(url),
        title: this.truncate(title, 200),
        url,
        sourceName: target.name,
        collector: this.name,
        publishedAt,
        snippet: this.truncate(snippet, 500),
        payload: { site: new URL(target.url).hostname, selector: target.selector }
      };
      if (batch.add(item)) added++;
      return undefined;
    });

    return added;
  }
}
