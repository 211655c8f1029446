/**
 * Command-line flags for a briefing run
 */

import { parseArgs as splitArgs } from 'node:util';
import type { DepthName } from '../types/collectors';
import { getDateRange, isIsoDay, startOfDay, toIsoDay } from '../utils/dates';
import { ValidationError } from '../utils/errors';

export const USAGE = `Usage: briefing-engine --domain <name> [options]

Options:
  --domain <name>              Domain configuration to run (required)
  --profile <name>             Profile within the domain (default: default)
  --report <type>              Report type (default: first enabled in the profile)
  --collectors a,b             Run only these collectors
  --exclude-collectors a,b     Never run these collectors
  --no-cache                   Skip cache reads (responses are still cached)
  --limit N                    Keep the top N items after sorting
  --retry N                    Extra attempts for a collector that reports an error
  --timeout S                  Per-collector timeout in seconds
  --quick | --deep             Depth profile (default: default)
  --trace                      Emit the execution trace
  --from-date YYYY-MM-DD       Window start (inclusive)
  --to-date YYYY-MM-DD         Window end (inclusive, default: today UTC)
  --days N                     Window length when --from-date is absent (default: 7)
  --dry-run                    Show collector availability and exit
  --output <path>              Write the report JSON to a file instead of stdout
  --help                       Show this message`;

export interface CliOptions {
  domain: string;
  profile: string;
  report?: string;
  collectors?: string[];
  excludeCollectors?: string[];
  noCache: boolean;
  limit?: number;
  retries: number;
  timeoutMs?: number;
  depth: DepthName;
  trace: boolean;
  fromDate?: string;
  toDate?: string;
  days: number;
  dryRun: boolean;
  output?: string;
  help: boolean;
}

// declarative flag table; every value flag is read as a string and validated below
const OPTIONS = {
  domain: { type: 'string' },
  profile: { type: 'string' },
  report: { type: 'string' },
  collectors: { type: 'string' },
  'exclude-collectors': { type: 'string' },
  'no-cache': { type: 'boolean' },
  limit: { type: 'string' },
  retry: { type: 'string' },
  timeout: { type: 'string' },
  quick: { type: 'boolean' },
  deep: { type: 'boolean' },
  trace: { type: 'boolean' },
  'from-date': { type: 'string' },
  'to-date': { type: 'string' },
  days: { type: 'string' },
  'dry-run': { type: 'boolean' },
  output: { type: 'string' },
  help: { type: 'boolean' }
} as const;

type OptionName = keyof typeof OPTIONS;

const OPTION_NAMES = new Set<string>(Object.keys(OPTIONS));

function isOptionName(name: string): name is OptionName {
  return OPTION_NAMES.has(name);
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part !== '');
}

function parseCount(flag: string, value: string, min: number): number {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`--${flag} expects a whole number, got "${value}"`);
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < min) {
    throw new ValidationError(`--${flag} must be at least ${min}`);
  }
  return parsed;
}

function parseDay(flag: string, value: string): string {
  if (!isIsoDay(value)) {
    throw new ValidationError(`--${flag} expects YYYY-MM-DD, got "${value}"`);
  }
  return value;
}

/**
 * Accepts `--flag value` and `--flag=value`
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const { tokens } = splitArgs({
    args: [...argv],
    options: OPTIONS,
    strict: false,
    allowPositionals: true,
    tokens: true
  });
  const values = new Map<OptionName, string>();
  const switches = new Set<OptionName>();

  for (const token of tokens) {
    if (token.kind === 'positional') {
      throw new ValidationError(`Unexpected argument "${token.value}"`);
    }
    if (token.kind === 'option-terminator') {
      throw new ValidationError('Unexpected argument "--"');
    }

    const { name } = token;
    if (!isOptionName(name)) {
      throw new ValidationError(`Unknown option ${token.rawName}`);
    }

    if (OPTIONS[name].type === 'boolean') {
      if (token.value !== undefined) {
        throw new ValidationError(`--${name} does not take a value`);
      }
      switches.add(name);
    } else {
      // a following flag is never taken as the value
      if (!token.value || (!token.inlineValue && token.value.startsWith('-'))) {
        throw new ValidationError(`--${name} requires a value`);
      }
      values.set(name, token.value);
    }
  }

  const help = switches.has('help');
  if (switches.has('quick') && switches.has('deep')) {
    throw new ValidationError('--quick and --deep cannot be combined');
  }

  const domain = values.get('domain');
  if (!domain && !help) {
    throw new ValidationError('--domain is required');
  }

  const optional = <T>(flag: OptionName, parse: (value: string) => T): T | undefined => {
    const value = values.get(flag);
    return value === undefined ? undefined : parse(value);
  };

  const timeoutSeconds = optional('timeout', (v) => parseCount('timeout', v, 1));

  return {
    domain: domain ?? '',
    profile: values.get('profile') ?? 'default',
    report: values.get('report'),
    collectors: optional('collectors', parseList),
    excludeCollectors: optional('exclude-collectors', parseList),
    noCache: switches.has('no-cache'),
    limit: optional('limit', (v) => parseCount('limit', v, 1)),
    retries: optional('retry', (v) => parseCount('retry', v, 0)) ?? 0,
    timeoutMs: timeoutSeconds === undefined ? undefined : timeoutSeconds * 1000,
    depth: switches.has('quick') ? 'quick' : switches.has('deep') ? 'deep' : 'default',
    trace: switches.has('trace'),
    fromDate: optional('from-date', (v) => parseDay('from-date', v)),
    toDate: optional('to-date', (v) => parseDay('to-date', v)),
    days: optional('days', (v) => parseCount('days', v, 1)) ?? 7,
    dryRun: switches.has('dry-run'),
    output: values.get('output'),
    help
  };
}

/**
 * Inclusive window from explicit dates, or `days` ending on the end date
 */
export function resolveWindow(
  options: Pick<CliOptions, 'fromDate' | 'toDate' | 'days'>,
  today: Date = new Date()
): { fromDate: string; toDate: string } {
  const toDate = options.toDate ?? toIsoDay(today);
  const fromDate = options.fromDate ?? getDateRange(options.days, startOfDay(toDate)).fromDate;
  if (fromDate > toDate) {
    throw new ValidationError(`Window start ${fromDate} is after its end ${toDate}`);
  }
  return { fromDate, toDate };
}
