import type { ProfileContext } from '../types/collectors';
import { type FinancialItem, generateContentId } from '../types/items';
import { toIsoDay } from '../utils/dates';

export interface Quote {
  symbol: string;
  price: number;
  changePercent?: number;
  currency?: string;
  /** Time of the quote; the trading day keys the item id */
  observedAt?: Date;
}

export function quoteUrl(symbol: string): string {
  return `https://finance.yahoo.com/quote/${encodeURIComponent(symbol)}`;
}

/**
 * Ticker symbols of the profile's focus entities, highest weight first
 */
export function profileSymbols(profile: ProfileContext): string[] {
  const symbols = [...profile.entities]
    .sort((a, b) => b.weight - a.weight)
    .map((entity) => entity.symbol?.trim().toUpperCase())
    .filter((symbol): symbol is string => Boolean(symbol));
  return [...new Set(symbols)];
}

function formatChange(changePercent?: number): string {
  if (changePercent === undefined) return '';
  const sign = changePercent > 0 ? '+' : '';
  return ` (${sign}${changePercent.toFixed(2)}%)`;
}

export function toQuoteItem(collector: string, sourceName: string, quote: Quote): FinancialItem {
  const day = quote.observedAt ? toIsoDay(quote.observedAt) : 'undated';
  const priceText = quote.currency ? `${quote.price.toFixed(2)} ${quote.currency}` : quote.price.toFixed(2);
  return {
    kind: 'financial',
    id: generateContentId('quote', quote.symbol, day),
    title: `${quote.symbol} ${priceText}${formatChange(quote.changePercent)}`,
    url: quoteUrl(quote.symbol),
    sourceName,
    collector,
    publishedAt: quote.observedAt,
    snippet: `${quote.symbol} last traded at ${priceText}${formatChange(quote.changePercent)}`,
    payload: {
      symbol: quote.symbol,
      price: quote.price,
      changePercent: quote.changePercent,
      currency: quote.currency
    }
  };
}
