/**
 * Deduplication of collected items.
 * Items are grouped by id (or by content fingerprint when the id is empty), then
 * survivors sharing a content fingerprint are grouped again. Each group keeps
 * exactly one survivor, chosen the same way on every run.
 */

import { type Item, fingerprint } from '../types/items';

/**
 * Key an item is grouped under
 */
export function dedupKey(item: Pick<Item, 'id' | 'title' | 'sourceName'>): string {
  const id = item.id.trim();
  return id !== '' ? id : `fp:${fingerprint(item)}`;
}

export interface DeduplicationStats {
  originalCount: number;
  deduplicatedCount: number;
  duplicatesRemoved: number;
  deduplicationRate: number;
}

interface Entry<T extends Item> {
  item: T;
  /** Position in the pipeline input */
  position: number;
}

export class DeduplicationService {
  /**
   * One survivor per group, in order of each group's first appearance
   */
  public deduplicate<T extends Item>(items: readonly T[]): T[] {
    const entries = items.map((item, position) => ({ item, position }));
    const byId = this.collapse(entries, (entry) => dedupKey(entry.item));
    return this.collapse(byId, (entry) => `fp:${fingerprint(entry.item)}`).map((entry) => entry.item);
  }

  private collapse<T extends Item>(entries: readonly Entry<T>[], keyOf: (entry: Entry<T>) => string): Entry<T>[] {
    const groups = new Map<string, Entry<T>>();
    for (const entry of entries) {
      const key = keyOf(entry);
      const current = groups.get(key);
      // Map keeps the slot of the first member when the survivor is replaced
      if (!current || this.prefer(entry, current)) {
        groups.set(key, entry);
      }
    }
    return [...groups.values()];
  }

  /**
   * Longest non-empty snippet, then earliest timestamp (missing last), then earliest input
   */
  private prefer(challenger: Entry<Item>, current: Entry<Item>): boolean {
    const lengthDiff = snippetLength(challenger.item) - snippetLength(current.item);
    if (lengthDiff !== 0) {
      return lengthDiff > 0;
    }
    const challengerTime = timestampRank(challenger.item);
    const currentTime = timestampRank(current.item);
    if (challengerTime !== currentTime) {
      return challengerTime < currentTime;
    }
    return challenger.position < current.position;
  }

  public getDeduplicationStats(originalCount: number, deduplicatedCount: number): DeduplicationStats {
    const duplicatesRemoved = originalCount - deduplicatedCount;
    return {
      originalCount,
      deduplicatedCount,
      duplicatesRemoved,
      deduplicationRate: originalCount > 0 ? duplicatesRemoved / originalCount : 0
    };
  }
}

function snippetLength(item: Item): number {
  return item.snippet.trim().length;
}

function timestampRank(item: Item): number {
  const time = item.publishedAt?.getTime();
  return time === undefined || Number.isNaN(time) ? Number.POSITIVE_INFINITY : time;
}
