/**
 * Date helpers. Window boundaries are UTC calendar days (YYYY-MM-DD).
 */

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;
// "2024-01-15 10:00:00" without a zone is UTC upstream
const SPACED_UTC = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}(:\d{2})?)$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export function isIsoDay(value: string): boolean {
  if (!ISO_DAY.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function toIsoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parse a timestamp from an upstream payload. Returns undefined for
 * missing or unparsable values; unix seconds are accepted.
 */
export function parseTimestamp(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    // treat small numbers as unix seconds
    return new Date(value < 1e12 ? value * 1000 : value);
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  const trimmed = value.trim();
  const spaced = SPACED_UTC.exec(trimmed);
  const normalized = ISO_DAY.test(trimmed)
    ? `${trimmed}T00:00:00Z`
    : spaced
      ? `${spaced[1]}T${spaced[2]}Z`
      : trimmed;
  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

/**
 * UTC day of a timestamp, or undefined when it is not a valid date
 */
export function dayOf(date: Date | undefined): string | undefined {
  if (!date || Number.isNaN(date.getTime())) return undefined;
  return toIsoDay(date);
}

/**
 * Window of `days` calendar days ending on `to` (inclusive)
 */
export function getDateRange(days: number, to: Date = new Date()): { fromDate: string; toDate: string } {
  const span = Math.max(1, Math.floor(days));
  const end = new Date(Date.UTC(to.getUTCFullYear(), to.getUTCMonth(), to.getUTCDate()));
  const start = new Date(end.getTime() - (span - 1) * DAY_MS);
  return { fromDate: toIsoDay(start), toDate: toIsoDay(end) };
}

/**
 * First instant after the inclusive end day
 */
export function endOfDayExclusive(isoDay: string): Date {
  return new Date(new Date(`${isoDay}T00:00:00Z`).getTime() + DAY_MS);
}

export function startOfDay(isoDay: string): Date {
  return new Date(`${isoDay}T00:00:00Z`);
}

export function daysBetween(later: Date, earlier: Date): number {
  return (later.getTime() - earlier.getTime()) / DAY_MS;
}
