import { z } from 'zod';
import type { CollectContext } from '../types/collectors';
import { parseTimestamp } from '../utils/dates';
import { RateLimitError } from '../utils/errors';
import { AbstractCollector, type CollectorInit, type ResultBatch } from './base';
import { profileSymbols, toQuoteItem } from './quotes';

export const ALPHA_VANTAGE_KEY = 'ALPHA_VANTAGE_API_KEY';

const ALPHA_VANTAGE_URL = 'https://www.alphavantage.co/query';
// free tier allows 5 requests per minute
const DEFAULT_REQUEST_DELAY_MS = 12_000;

const GlobalQuoteSchema = z.object({
  'Global Quote': z
    .object({
      '01. symbol': z.string().optional(),
      '05. price': z.string().optional(),
      '07. latest trading day': z.string().optional(),
      '10. change percent': z.string().optional()
    })
    .optional(),
  Note: z.string().optional(),
  Information: z.string().optional()
});

// quota exhaustion arrives as a 200 with a Note or Information message
function isQuotaNotice(payload: z.infer<typeof GlobalQuoteSchema>): boolean {
  return Boolean(payload.Note || payload.Information);
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseFloat(value.replace('%', ''));
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Daily quotes for the profile's ticker symbols
 */
export class AlphaVantageCollector extends AbstractCollector {
  readonly type = 'financial' as const;

  constructor(init: Partial<CollectorInit> = {}) {
    super({ name: 'alpha_vantage', requestDelayMs: DEFAULT_REQUEST_DELAY_MS, ...init });
  }

  requiredCredentials(): ReadonlySet<string> {
    return new Set([ALPHA_VANTAGE_KEY]);
  }

  protected async gather(context: CollectContext, batch: ResultBatch): Promise<void> {
    const symbols = profileSymbols(context.profile);
    const apiKey = this.credential(context);

    for (const symbol of symbols) {
      if (batch.isFull) break;

      const payload = await this.fetchJson(
        context,
        GlobalQuoteSchema,
        { url: ALPHA_VANTAGE_URL, query: { function: 'GLOBAL_QUOTE', symbol, apikey: apiKey } },
        (data) => !isQuotaNotice(data)
      );

      if (isQuotaNotice(payload)) {
        throw new RateLimitError(this.name);
      }

      const quote = payload['Global Quote'];
      const price = parseNumber(quote?.['05. price']);
      if (!quote || price === undefined) {
        batch.warnings.push(`No quote returned for ${symbol}`);
        continue;
      }

      batch.add(
        toQuoteItem(this.name, 'Alpha Vantage', {
          symbol,
          price,
          changePercent: parseNumber(quote['10. change percent']),
          currency: 'USD',
          observedAt: parseTimestamp(quote['07. latest trading day'])
        })
      );
      batch.addSource({ name: 'Alpha Vantage', url: 'https://www.alphavantage.co' });
    }
  }
}
