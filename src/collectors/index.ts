export { AbstractCollector, ResultBatch, isOrdinaryFailure } from './base';
export type { CollectorInit, CollectorRequest } from './base';
export { AlphaVantageCollector, ALPHA_VANTAGE_KEY } from './alpha-vantage';
export { NewsCollector, NEWSAPI_KEY, NEWSDATA_KEY, buildNewsQuery } from './news';
export { profileSymbols, toQuoteItem } from './quotes';
export { CollectorRegistry, buildRegistry, knownCollectors } from './registry';
export type { RegistryOptions } from './registry';
export { RssCollector } from './rss';
export { WebScraperCollector } from './web-scraper';
export { XSearchCollector, XAI_KEY } from './x-search';
export { YahooFinanceCollector } from './yahoo-finance';
