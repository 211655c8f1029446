import type { Item } from '../types/items';
import { dayOf } from '../utils/dates';

export interface DateWindow {
  /** Inclusive, YYYY-MM-DD */
  readonly fromDate: string;
  /** Inclusive, YYYY-MM-DD */
  readonly toDate: string;
}

export interface FilterOptions extends DateWindow {
  /** Drop items without a usable timestamp instead of keeping them */
  readonly requireTimestamp?: boolean;
}

export function isWithinWindow(item: Item, options: FilterOptions): boolean {
  const day = dayOf(item.publishedAt);
  if (day === undefined) {
    return !options.requireTimestamp;
  }
  return day >= options.fromDate && day <= options.toDate;
}

/**
 * Keep items whose UTC day lies in the window. Order is preserved.
 */
export function filterByWindow<T extends Item>(items: readonly T[], options: FilterOptions): T[] {
  return items.filter((item) => isWithinWindow(item, options));
}
