import { DEFAULT_SOURCE_PRIORITY } from '../types/collectors';
import type { ScoredItem } from '../types/items';
import { dedupKey } from './deduplication';

export type SourcePriorities = ReadonlyMap<string, number>;

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Score desc, recency desc, source priority asc, identifier asc
 */
export function compareScored(a: ScoredItem, b: ScoredItem, priorities: SourcePriorities = new Map()): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.recency !== b.recency) {
    return b.recency - a.recency;
  }
  const priorityA = priorities.get(a.collector) ?? DEFAULT_SOURCE_PRIORITY;
  const priorityB = priorities.get(b.collector) ?? DEFAULT_SOURCE_PRIORITY;
  if (priorityA !== priorityB) {
    return priorityA - priorityB;
  }
  return compareStrings(dedupKey(a), dedupKey(b));
}

export function sortScored<T extends ScoredItem>(items: readonly T[], priorities?: SourcePriorities): T[] {
  return [...items].sort((a, b) => compareScored(a, b, priorities));
}
