import type { ProfileContext } from '../types/collectors';
import type { DealActivity, DealDetails, NewsItem } from '../types/items';
import type { CollectorInit } from './base';
import { type NewsArticle, NewsCollector } from './news';

const DEAL_KEYWORDS = [
  'acquisition',
  'merger',
  'acquired',
  'buys',
  'acquires',
  'investment',
  'stake',
  'deal',
  'private equity'
];

const SECTOR_TERMS = ['advertising agency', 'marketing agency'];
const HOLDING_COMPANY_TERMS = 5;

const TARGET_STOP_WORDS = ['for', 'in', 'from', 'at'];

const VALUE_PATTERN = /\$(\d+(?:\.\d+)?)\s*(billion|million|b|m)\b/i;

function quoted(term: string): string {
  return term.includes(' ') ? `"${term}"` : term;
}

/**
 * Deal keywords AND (top holding companies OR agency sector terms)
 */
export function buildDealQuery(profile: ProfileContext): string {
  const holdingCompanies = profile.entities
    .filter((entity) => entity.type === 'holding_companies')
    .sort((a, b) => b.weight - a.weight)
    .slice(0, HOLDING_COMPANY_TERMS)
    .map((entity) => entity.name);
  const subjects = [...holdingCompanies, ...SECTOR_TERMS].map(quoted).join(' OR ');
  return `(${DEAL_KEYWORDS.map(quoted).join(' OR ')}) AND (${subjects})`;
}

function classify(text: string): DealActivity {
  if (/acquir|acquisition|buys|bought/.test(text)) return 'acquisition';
  if (text.includes('merger')) return 'merger';
  if (/invest|stake|funding/.test(text)) return 'investment';
  return 'unknown';
}

function dealValue(text: string): Pick<DealDetails, 'valueUsd' | 'valueLabel'> {
  const match = VALUE_PATTERN.exec(text);
  if (!match) return {};
  const amount = Number.parseFloat(match[1]);
  const billions = match[2].toLowerCase().startsWith('b');
  return {
    valueUsd: amount * (billions ? 1_000_000_000 : 1_000_000),
    valueLabel: `$${amount}${billions ? 'B' : 'M'}`
  };
}

// headline convention: "<acquirer> acquires <target>", "<acquirer> to acquire <target>"
function parties(title: string): Pick<DealDetails, 'acquirer' | 'target'> {
  const words = title.split(/\s+/);
  const verb = words.findIndex((word) => ['acquires', 'buys', 'acquire', 'to'].includes(word.toLowerCase()));
  const object = words.findIndex((word) => ['acquires', 'buys', 'acquire'].includes(word.toLowerCase()));
  const acquirer = verb > 0 ? words.slice(0, verb).join(' ') : '';
  const rest = object >= 0 ? words.slice(object + 1) : [];
  const clause = rest.findIndex((word) => TARGET_STOP_WORDS.includes(word.toLowerCase()));
  const target = (clause >= 0 ? rest.slice(0, clause) : rest).join(' ');
  return {
    ...(acquirer ? { acquirer } : {}),
    ...(target ? { target } : {})
  };
}

/**
 * Read deal details off an article, or undefined when it is not about a deal
 */
export function extractDeal(title: string, description: string): DealDetails | undefined {
  const text = `${title} ${description}`.toLowerCase();
  if (!DEAL_KEYWORDS.some((keyword) => text.includes(keyword))) {
    return undefined;
  }
  return { activity: classify(text), ...parties(title), ...dealValue(text) };
}

/**
 * Private equity and M&A activity around the profile's holding companies,
 * searched through the same news APIs as the headline collector
 */
export class PeActivityCollector extends NewsCollector {
  constructor(init: Partial<CollectorInit> = {}) {
    super({ name: 'pe_activity', ...init });
  }

  protected buildQuery(profile: ProfileContext): string {
    return buildDealQuery(profile);
  }

  protected toItem(article: NewsArticle): NewsItem | undefined {
    const deal = extractDeal(article.title, article.description);
    const item = super.toItem(article);
    if (!deal || !item) return undefined;
    return { ...item, payload: { ...item.payload, deal } };
  }
}
