import { z } from 'zod';
import type { CollectContext } from '../types/collectors';
import { parseTimestamp } from '../utils/dates';
import { AbstractCollector, type CollectorInit, type ResultBatch } from './base';
import { profileSymbols, quoteUrl, toQuoteItem } from './quotes';

const CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            symbol: z.string(),
            currency: z.string().nullish(),
            regularMarketPrice: z.number().nullish(),
            chartPreviousClose: z.number().nullish(),
            previousClose: z.number().nullish(),
            regularMarketTime: z.number().nullish()
          })
        })
      )
      .nullish(),
    error: z.object({ code: z.string().optional(), description: z.string().optional() }).nullish()
  })
});

/**
 * Keyless quotes from the public chart endpoint
 */
export class YahooFinanceCollector extends AbstractCollector {
  readonly type = 'financial' as const;

  constructor(init: Partial<CollectorInit> = {}) {
    super({ name: 'yahoo_finance', ...init });
  }

  protected async gather(context: CollectContext, batch: ResultBatch): Promise<void> {
    for (const symbol of profileSymbols(context.profile)) {
      if (batch.isFull) break;

      const payload = await this.fetchJson(context, ChartResponseSchema, {
        url: `${CHART_URL}/${encodeURIComponent(symbol)}`,
        query: { range: '5d', interval: '1d' },
        headers: { 'User-Agent': 'Mozilla/5.0 (compatible; briefing-engine/0.1)' }
      });

      const meta = payload.chart.result?.[0]?.meta;
      const price = meta?.regularMarketPrice;
      if (!meta || price === undefined || price === null) {
        batch.warnings.push(
          `No quote returned for ${symbol}${payload.chart.error?.description ? `: ${payload.chart.error.description}` : ''}`
        );
        continue;
      }

      const previous = meta.chartPreviousClose ?? meta.previousClose;
      const changePercent =
        previous !== undefined && previous !== null && previous !== 0
          ? ((price - previous) / previous) * 100
          : undefined;

      batch.add(
        toQuoteItem(this.name, 'Yahoo Finance', {
          symbol: meta.symbol.toUpperCase(),
          price,
          changePercent,
          currency: meta.currency ?? undefined,
          observedAt: parseTimestamp(meta.regularMarketTime)
        })
      );
      batch.addSource({ name: 'Yahoo Finance', url: quoteUrl(symbol) });
    }
  }
}
