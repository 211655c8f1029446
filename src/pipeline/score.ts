/**
 * Composite scoring: weighted relevance, recency and engagement, each in [0, 1]
 */

import type { ScoringFile } from '../config/yaml-types';
import type { ProfileContext } from '../types/collectors';
import type { Item, ItemKind, ScoreFields } from '../types/items';
import { daysBetween, endOfDayExclusive, startOfDay } from '../utils/dates';
import type { DateWindow } from './filter';

export interface ScoringOptions {
  readonly weights: { readonly relevance: number; readonly recency: number; readonly engagement: number };
  readonly relevance: { readonly base: number; readonly boostStep: number; readonly filterPenalty: number };
  readonly recency: { readonly halfLifeDays: number; readonly floor: number };
  /** Engagement score for items that carry no signal */
  readonly neutralEngagement: number;
}

export const DEFAULT_SCORING: ScoringOptions = {
  weights: { relevance: 0.45, recency: 0.25, engagement: 0.3 },
  relevance: { base: 0.3, boostStep: 0.1, filterPenalty: 0.25 },
  recency: { halfLifeDays: 30, floor: 0.05 },
  neutralEngagement: 0.35
};

export function scoringOptionsFrom(file: ScoringFile): ScoringOptions {
  return {
    weights: file.weights,
    relevance: {
      base: file.relevance.base,
      boostStep: file.relevance.boost_step,
      filterPenalty: file.relevance.filter_penalty
    },
    recency: { halfLifeDays: file.recency.half_life_days, floor: file.recency.floor },
    neutralEngagement: file.engagement.neutral
  };
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive term match: phrases by substring, single words on word boundaries
 */
export function matchesTerm(text: string, term: string): boolean {
  const needle = term.trim().toLowerCase();
  if (needle === '') {
    return false;
  }
  const haystack = text.toLowerCase();
  if (/\s/.test(needle)) {
    return haystack.includes(needle);
  }
  return new RegExp(`\\b${escapeRegExp(needle)}\\b`).test(haystack);
}

export function scoreRelevance(
  item: Pick<Item, 'title' | 'snippet'>,
  profile: Pick<ProfileContext, 'boostKeywords' | 'filterKeywords' | 'entities'>,
  options: ScoringOptions['relevance'] = DEFAULT_SCORING.relevance
): number {
  const text = `${item.title} ${item.snippet}`;

  const boostHits = profile.boostKeywords.filter((keyword) => matchesTerm(text, keyword)).length;
  const filterHits = profile.filterKeywords.filter((keyword) => matchesTerm(text, keyword)).length;

  let entityWeight = 0;
  for (const entity of profile.entities) {
    const terms = [entity.name, ...(entity.symbol ? [entity.symbol] : []), ...entity.aliases];
    if (terms.some((term) => matchesTerm(text, term))) {
      entityWeight += entity.weight;
    }
  }

  return clamp01(options.base + options.boostStep * boostHits + entityWeight - options.filterPenalty * filterHits);
}

/**
 * Half-life decay from the end of the window's last day, never below the floor
 */
export function scoreRecency(
  publishedAt: Date | undefined,
  window: DateWindow,
  options: ScoringOptions['recency'] = DEFAULT_SCORING.recency
): number {
  const floor = clamp01(options.floor);
  if (!publishedAt || Number.isNaN(publishedAt.getTime())) {
    return floor;
  }
  if (publishedAt.getTime() < startOfDay(window.fromDate).getTime()) {
    return floor;
  }
  const ageDays = Math.max(0, daysBetween(endOfDayExclusive(window.toDate), publishedAt));
  return clamp01(Math.max(floor, 0.5 ** (ageDays / options.halfLifeDays)));
}

/**
 * Engagement normalized per item kind: log1p, then min-max across the kind.
 * Items without a signal get the neutral score.
 */
export function scoreEngagement(items: readonly Item[], neutral: number = DEFAULT_SCORING.neutralEngagement): number[] {
  const ranges = new Map<ItemKind, { min: number; max: number }>();
  for (const item of items) {
    if (item.engagement === undefined) continue;
    const value = Math.log1p(Math.max(0, item.engagement));
    const range = ranges.get(item.kind);
    ranges.set(
      item.kind,
      range ? { min: Math.min(range.min, value), max: Math.max(range.max, value) } : { min: value, max: value }
    );
  }

  return items.map((item) => {
    const range = ranges.get(item.kind);
    if (item.engagement === undefined || !range) {
      return clamp01(neutral);
    }
    if (range.max === range.min) {
      return 0.5;
    }
    const value = Math.log1p(Math.max(0, item.engagement));
    return clamp01((value - range.min) / (range.max - range.min));
  });
}

export function scoreItems<T extends Item>(
  items: readonly T[],
  profile: Pick<ProfileContext, 'boostKeywords' | 'filterKeywords' | 'entities'>,
  window: DateWindow,
  options: ScoringOptions = DEFAULT_SCORING
): Array<T & ScoreFields> {
  const engagement = scoreEngagement(items, options.neutralEngagement);
  const { weights } = options;

  return items.map((item, index) => {
    const relevance = scoreRelevance(item, profile, options.relevance);
    const recency = scoreRecency(item.publishedAt, window, options.recency);
    const engagementScore = engagement[index];
    return {
      ...item,
      relevance,
      recency,
      engagementScore,
      score: weights.relevance * relevance + weights.recency * recency + weights.engagement * engagementScore
    };
  });
}
