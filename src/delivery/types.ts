import type { AvailabilityEntry } from '../availability/prober';
import type { DateWindow } from '../pipeline/filter';
import type { TraceDocument } from '../trace/types';
import type { ScoredItem, Source } from '../types/items';

/**
 * Everything a report layer needs from one run
 */
export interface BriefingReport {
  readonly runId: string;
  readonly domain: string;
  readonly profile: string;
  readonly reportType: string;
  readonly window: DateWindow;
  readonly generatedAt: Date;
  readonly items: readonly ScoredItem[];
  readonly sources: readonly Source[];
  readonly availability: readonly AvailabilityEntry[];
  /** Present when the trace was requested */
  readonly trace?: TraceDocument;
}

export interface DeliveryOutcome {
  readonly channel: string;
  readonly success: boolean;
  /** Where the report went, e.g. a file path */
  readonly location?: string;
  readonly error?: string;
}

/**
 * Downstream consumer of a finished report. Rendering and channels live behind it.
 */
export interface ReportConsumer {
  readonly channel: string;
  deliver(report: BriefingReport): Promise<DeliveryOutcome>;
}
