import type { DomainFile } from '../config/yaml-types';
import { type Collector, DEFAULT_SOURCE_PRIORITY } from '../types/collectors';
import { ConfigurationError } from '../utils/errors';
import { type Logger, getLogger } from '../utils/logger';
import { AlphaVantageCollector } from './alpha-vantage';
import type { CollectorInit } from './base';
import { NewsCollector } from './news';
import { PeActivityCollector } from './pe-activity';
import { RssCollector } from './rss';
import { WebScraperCollector } from './web-scraper';
import { XSearchCollector } from './x-search';
import { YahooFinanceCollector } from './yahoo-finance';

export interface RegistryOptions {
  enableScraping?: boolean;
  logger?: Logger;
}

type CollectorFactory = (init: Partial<CollectorInit>, options: RegistryOptions) => Collector;

const FACTORIES: Record<string, CollectorFactory> = {
  news: (init) => new NewsCollector(init),
  pe_activity: (init) => new PeActivityCollector(init),
  alpha_vantage: (init) => new AlphaVantageCollector(init),
  yahoo_finance: (init) => new YahooFinanceCollector(init),
  x_search: (init) => new XSearchCollector(init),
  rss: (init) => new RssCollector(init),
  web_scraper: (init, options) => new WebScraperCollector({ ...init, enabled: options.enableScraping })
};

export function knownCollectors(): string[] {
  return Object.keys(FACTORIES);
}

/**
 * Ordered set of collectors for a run, with their source priorities
 */
export class CollectorRegistry {
  private readonly entries = new Map<string, { collector: Collector; priority: number }>();

  register(collector: Collector, priority: number = DEFAULT_SOURCE_PRIORITY): this {
    if (this.entries.has(collector.name)) {
      throw new ConfigurationError(`Collector ${collector.name} registered twice`);
    }
    this.entries.set(collector.name, { collector, priority });
    return this;
  }

  list(): Collector[] {
    return [...this.entries.values()].map((entry) => entry.collector);
  }

  /** Lower wins score ties */
  priorities(): ReadonlyMap<string, number> {
    return new Map([...this.entries].map(([name, entry]): [string, number] => [name, entry.priority]));
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Instantiate the collectors a domain lists, in listing order
 */
export function buildRegistry(domain: DomainFile, options: RegistryOptions = {}): CollectorRegistry {
  const logger = options.logger ?? getLogger();
  const registry = new CollectorRegistry();

  for (const entry of domain.collectors) {
    if (!entry.enabled) {
      continue;
    }

    const factory = FACTORIES[entry.name];
    if (!factory) {
      logger.warn('Unknown collector in domain config, skipping', { domain: domain.domain, collector: entry.name });
      continue;
    }

    const init: Partial<CollectorInit> = {};
    if (entry.request_delay_ms !== undefined) init.requestDelayMs = entry.request_delay_ms;
    if (entry.http_retries !== undefined) init.httpRetries = entry.http_retries;

    registry.register(factory(init, options), entry.priority);
  }

  return registry;
}
