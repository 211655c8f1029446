import crypto from 'node:crypto';
import { z } from 'zod';

// ============================================================================
// ITEM VARIANTS
// ============================================================================

export const ITEM_KINDS = ['news', 'financial', 'social', 'listing'] as const;
export type ItemKind = (typeof ITEM_KINDS)[number];

interface ItemBase {
  /** Stable across runs for the same logical item */
  readonly id: string;
  readonly title: string;
  /** Canonical URL, or a `symbol:` locator for quotes */
  readonly url: string;
  readonly sourceName: string;
  /** Name of the collector that produced the item */
  readonly collector: string;
  readonly publishedAt?: Date;
  readonly snippet: string;
  /** Platform engagement signal; absent when the source never reports one */
  readonly engagement?: number;
}

export const DEAL_ACTIVITIES = ['acquisition', 'merger', 'investment', 'unknown'] as const;
export type DealActivity = (typeof DEAL_ACTIVITIES)[number];

/**
 * M&A details read off a deal headline
 */
export interface DealDetails {
  readonly activity: DealActivity;
  readonly acquirer?: string;
  readonly target?: string;
  readonly valueUsd?: number;
  /** As written in the article, e.g. `$1.5B` */
  readonly valueLabel?: string;
}

export interface NewsPayload {
  readonly publisher?: string;
  readonly author?: string;
  readonly categories: readonly string[];
  readonly deal?: DealDetails;
}

export interface FinancialPayload {
  readonly symbol: string;
  readonly price: number;
  readonly changePercent?: number;
  readonly currency?: string;
}

export interface SocialPayload {
  readonly handle: string;
  readonly likes: number;
  readonly reposts: number;
  readonly replies: number;
  readonly quotes: number;
}

export interface ListingPayload {
  readonly site: string;
  readonly selector?: string;
}

export interface NewsItem extends ItemBase {
  readonly kind: 'news';
  readonly payload: NewsPayload;
}

export interface FinancialItem extends ItemBase {
  readonly kind: 'financial';
  readonly payload: FinancialPayload;
}

export interface SocialItem extends ItemBase {
  readonly kind: 'social';
  readonly payload: SocialPayload;
}

export interface ListingItem extends ItemBase {
  readonly kind: 'listing';
  readonly payload: ListingPayload;
}

export type Item = NewsItem | FinancialItem | SocialItem | ListingItem;

/**
 * Citation target. Many items may share one source.
 */
export interface Source {
  readonly name: string;
  readonly url: string;
}

export interface ScoreFields {
  readonly relevance: number;
  readonly recency: number;
  readonly engagementScore: number;
  readonly score: number;
}

export type ScoredItem = Item & ScoreFields;

// ============================================================================
// VALIDATION SCHEMAS
// ============================================================================

const ItemBaseSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  url: z.string().min(1),
  sourceName: z.string().min(1),
  collector: z.string().min(1),
  publishedAt: z.date().optional(),
  snippet: z.string(),
  engagement: z.number().nonnegative().finite().optional()
});

export const ItemSchema = z.discriminatedUnion('kind', [
  ItemBaseSchema.extend({
    kind: z.literal('news'),
    payload: z.object({
      publisher: z.string().optional(),
      author: z.string().optional(),
      categories: z.array(z.string()),
      deal: z
        .object({
          activity: z.enum(DEAL_ACTIVITIES),
          acquirer: z.string().optional(),
          target: z.string().optional(),
          valueUsd: z.number().nonnegative().finite().optional(),
          valueLabel: z.string().optional()
        })
        .optional()
    })
  }),
  ItemBaseSchema.extend({
    kind: z.literal('financial'),
    payload: z.object({
      symbol: z.string().min(1),
      price: z.number().finite(),
      changePercent: z.number().finite().optional(),
      currency: z.string().optional()
    })
  }),
  ItemBaseSchema.extend({
    kind: z.literal('social'),
    payload: z.object({
      handle: z.string(),
      likes: z.number().nonnegative(),
      reposts: z.number().nonnegative(),
      replies: z.number().nonnegative(),
      quotes: z.number().nonnegative()
    })
  }),
  ItemBaseSchema.extend({
    kind: z.literal('listing'),
    payload: z.object({
      site: z.string().min(1),
      selector: z.string().optional()
    })
  })
]);

/**
 * Validation issues for a collected item, empty when it is well formed
 */
export function validateItem(obj: unknown): string[] {
  const result = ItemSchema.safeParse(obj);
  if (result.success) {
    return [];
  }
  return result.error.errors.map((err) => `${err.path.join('.') || 'item'}: ${err.message}`);
}

// ============================================================================
// IDENTITY HELPERS
// ============================================================================

/**
 * Stable id from the item's canonical URL, shared by every collector that sees it
 */
export function generateItemId(url: string): string {
  return crypto.createHash('sha1').update(url).digest('hex').slice(0, 12);
}

/**
 * Stable id for items without a URL, derived from their content
 */
export function generateContentId(collector: string, ...parts: string[]): string {
  const seed = [collector, ...parts.map((part) => part.trim().toLowerCase())].join('|');
  return crypto.createHash('sha1').update(seed).digest('hex').slice(0, 12);
}

/**
 * Normalized-content key: lower-cased whitespace-collapsed title plus source
 */
export function fingerprint(item: Pick<Item, 'title' | 'sourceName'>): string {
  const collapse = (value: string) => value.replace(/\s+/g, ' ').trim().toLowerCase();
  return `${collapse(item.title)}|${collapse(item.sourceName)}`;
}

export function sourceKey(source: Source): string {
  return `${source.name}\u0000${source.url}`;
}

/**
 * Deduplicate sources by name and URL, keeping first-seen order
 */
export function uniqueSources(sources: Iterable<Source>): Source[] {
  const seen = new Map<string, Source>();
  for (const source of sources) {
    const key = sourceKey(source);
    if (!seen.has(key)) {
      seen.set(key, source);
    }
  }
  return [...seen.values()];
}
