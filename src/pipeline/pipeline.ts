/**
 * ProcessingPipeline - filter → dedupe → score → sort → limit
 */

import type { RunTrace } from '../trace/run-trace';
import type { ProcessingSummary } from '../trace/types';
import type { ProfileContext } from '../types/collectors';
import { type Item, type ScoredItem, type Source, uniqueSources } from '../types/items';
import { type Logger, getLogger } from '../utils/logger';
import { DeduplicationService } from './deduplication';
import { type DateWindow, filterByWindow } from './filter';
import { DEFAULT_SCORING, type ScoringOptions, scoreItems } from './score';
import { type SourcePriorities, sortScored } from './sort';

export interface PipelineOptions {
  scoring?: ScoringOptions;
  /** Collector name → source priority (lower wins ties) */
  priorities?: SourcePriorities;
  /** Receives the processing summary and per-collector filter counts */
  trace?: RunTrace;
  logger?: Logger;
}

export interface PipelineInput {
  items: readonly Item[];
  sources: readonly Source[];
  profile: ProfileContext;
  window: DateWindow;
  /** Truncate after sorting */
  limit?: number;
}

export interface PipelineOutput {
  items: ScoredItem[];
  sources: Source[];
  summary: ProcessingSummary;
}

export class ProcessingPipeline {
  private readonly scoring: ScoringOptions;
  private readonly priorities: SourcePriorities;
  private readonly trace?: RunTrace;
  private readonly logger: Logger;
  private readonly deduplicator = new DeduplicationService();

  constructor(options: PipelineOptions = {}) {
    this.scoring = options.scoring ?? DEFAULT_SCORING;
    this.priorities = options.priorities ?? new Map();
    this.trace = options.trace;
    this.logger = (options.logger ?? getLogger()).child({ service: 'pipeline' });
  }

  process(input: PipelineInput): PipelineOutput {
    const { profile, window } = input;

    const filtered = filterByWindow(input.items, {
      ...window,
      requireTimestamp: profile.requireTimestamp
    });
    const deduplicated = this.deduplicator.deduplicate(filtered);
    const scored = scoreItems(deduplicated, profile, window, this.scoring);
    const sorted = sortScored(scored, this.priorities);
    const limited = input.limit !== undefined && input.limit >= 0 ? sorted.slice(0, input.limit) : sorted;

    const scores = scored.map((item) => item.score);
    const summary: ProcessingSummary = {
      beforeFilter: input.items.length,
      afterFilter: filtered.length,
      afterDedup: deduplicated.length,
      scoreMin: scores.length > 0 ? Math.min(...scores) : null,
      scoreMax: scores.length > 0 ? Math.max(...scores) : null,
      returned: limited.length
    };

    if (this.trace) {
      this.trace.setItemsAfterFilter(countByCollector(filtered));
      this.trace.setProcessing(summary);
    }

    const stats = this.deduplicator.getDeduplicationStats(filtered.length, deduplicated.length);
    this.logger.info('Processed items', {
      ...summary,
      duplicatesRemoved: stats.duplicatesRemoved
    });

    return {
      items: limited,
      sources: uniqueSources(input.sources),
      summary
    };
  }
}

function countByCollector(items: readonly Item[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    counts.set(item.collector, (counts.get(item.collector) ?? 0) + 1);
  }
  return counts;
}
