import type { Collector } from '../types/collectors';

export interface AvailabilityEntry {
  readonly collector: Collector;
  readonly available: boolean;
  /** Declared keys that are not configured */
  readonly missingKeys: readonly string[];
  /** Why the collector cannot run; undefined when available */
  readonly reason?: string;
  /** Credential the collector will use: the first configured key in declaration order */
  readonly resolvedKey?: string;
}

/**
 * Decide which collectors can run with the configured credentials.
 * Pure: inspects declarations only, never the network.
 */
export function probeAvailability(
  collectors: readonly Collector[],
  configuredKeys: ReadonlySet<string>
): AvailabilityEntry[] {
  return collectors.map((collector) => probeOne(collector, configuredKeys));
}

function probeOne(collector: Collector, configuredKeys: ReadonlySet<string>): AvailabilityEntry {
  const disabled = collector.disabledReason?.();
  if (disabled) {
    return { collector, available: false, missingKeys: [], reason: disabled };
  }

  const declared = [...collector.requiredCredentials()];
  if (declared.length === 0) {
    return { collector, available: true, missingKeys: [] };
  }

  const present = declared.filter((key) => configuredKeys.has(key));
  const missingKeys = declared.filter((key) => !configuredKeys.has(key));

  if (collector.requiresAny()) {
    if (present.length > 0) {
      return { collector, available: true, missingKeys, resolvedKey: present[0] };
    }
    return {
      collector,
      available: false,
      missingKeys,
      reason: `needs one of: ${declared.join(', ')}`
    };
  }

  if (missingKeys.length === 0) {
    return { collector, available: true, missingKeys: [], resolvedKey: present[0] };
  }
  return {
    collector,
    available: false,
    missingKeys,
    reason: `missing ${missingKeys.join(', ')}`
  };
}

/**
 * Plain-text table for dry runs
 */
export function formatAvailability(entries: readonly AvailabilityEntry[]): string {
  const rows = entries.map((entry) => [
    entry.collector.name,
    entry.collector.type,
    entry.available ? 'yes' : 'no',
    entry.available ? (entry.resolvedKey ?? '-') : (entry.reason ?? '-')
  ]);
  const header = ['COLLECTOR', 'TYPE', 'AVAILABLE', 'KEY / REASON'];
  const widths = header.map((title, column) => Math.max(title.length, ...rows.map((row) => row[column].length)));
  const format = (row: string[]) => row.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd();
  return [format(header), ...rows.map(format)].join('\n');
}
