import { randomUUID } from 'node:crypto';
import type { DepthName } from '../types/collectors';
import type { ItemKind } from '../types/items';
import { ValidationError } from '../utils/errors';
import { type Clock, type CollectorOutcome, CollectorTrace } from './collector-trace';
import {
  type CollectorDocument,
  type DeliveryRecord,
  type ProcessingSummary,
  type TraceDocument,
  TraceDocumentSchema
} from './types';

export interface RunTraceInit {
  domain: string;
  profile: string;
  reportType: string;
  depth: DepthName;
  runId?: string;
  clock?: Clock;
}

/**
 * Append-only record of a single run
 */
export class RunTrace {
  readonly runId: string;
  readonly domain: string;
  readonly profile: string;
  readonly reportType: string;
  readonly depth: DepthName;
  readonly startedAt: Date;
  private endedAt?: Date;
  private readonly clock: Clock;
  private readonly collectors = new Map<string, CollectorTrace>();
  private processing?: ProcessingSummary;
  private readonly deliveries: DeliveryRecord[] = [];

  constructor(init: RunTraceInit) {
    this.clock = init.clock ?? (() => new Date());
    this.runId = init.runId ?? randomUUID();
    this.domain = init.domain;
    this.profile = init.profile;
    this.reportType = init.reportType;
    this.depth = init.depth;
    this.startedAt = this.clock();
  }

  /**
   * Register a collector. Registration order is preserved in the output.
   */
  openCollector(name: string, type: ItemKind): CollectorTrace {
    const existing = this.collectors.get(name);
    if (existing) {
      return existing;
    }
    const trace = new CollectorTrace(name, type, this.clock);
    this.collectors.set(name, trace);
    return trace;
  }

  recordSkipped(name: string, type: ItemKind, reason: string): void {
    this.openCollector(name, type).skip(reason);
  }

  getCollector(name: string): CollectorTrace | undefined {
    return this.collectors.get(name);
  }

  get outcomes(): CollectorOutcome[] {
    return [...this.collectors.values()].map((trace) => trace.outcome);
  }

  setItemsAfterFilter(counts: ReadonlyMap<string, number>): void {
    for (const trace of this.collectors.values()) {
      trace.setItemsAfterFilter(counts.get(trace.name) ?? 0);
    }
  }

  setProcessing(summary: ProcessingSummary): void {
    this.processing = summary;
  }

  addDelivery(record: DeliveryRecord): void {
    this.deliveries.push(record);
  }

  finalize(): void {
    this.endedAt ??= this.clock();
  }

  toJSON(): TraceDocument {
    const outcomes = this.outcomes;
    const collectors = outcomes.map(toCollectorDocument);
    const apiCalls = outcomes.flatMap((outcome) => outcome.apiCalls);

    return {
      run_id: this.runId,
      domain: this.domain,
      profile: this.profile,
      report_type: this.reportType,
      depth: this.depth,
      started_at: this.startedAt.toISOString(),
      ended_at: this.endedAt?.toISOString() ?? null,
      duration_ms: this.endedAt ? this.endedAt.getTime() - this.startedAt.getTime() : null,
      collectors,
      processing: this.processing
        ? {
            before_filter: this.processing.beforeFilter,
            after_filter: this.processing.afterFilter,
            after_dedup: this.processing.afterDedup,
            score_min: this.processing.scoreMin,
            score_max: this.processing.scoreMax,
            returned: this.processing.returned
          }
        : null,
      delivery: this.deliveries.map((record) => ({
        channel: record.channel,
        started_at: record.startedAt,
        ended_at: record.endedAt,
        duration_ms: record.durationMs,
        success: record.success,
        error: record.error ?? null
      })),
      totals: {
        collectors_run: outcomes.filter((o) => o.status !== 'skipped').length,
        collectors_succeeded: outcomes.filter((o) => o.status === 'success').length,
        collectors_skipped: outcomes.filter((o) => o.status === 'skipped').length,
        api_calls: apiCalls.length,
        cache_hits: apiCalls.filter((call) => call.cached).length
      }
    };
  }
}

function toCollectorDocument(outcome: CollectorOutcome): CollectorDocument {
  return {
    name: outcome.name,
    type: outcome.type,
    status: outcome.status,
    started_at: outcome.startedAt ?? null,
    ended_at: outcome.endedAt ?? null,
    duration_ms: outcome.durationMs,
    items_collected: outcome.itemsCollected,
    items_after_filter: outcome.itemsAfterFilter,
    attempts: outcome.attempts.map((attempt) => ({
      attempt: attempt.attempt,
      started_at: attempt.startedAt,
      ended_at: attempt.endedAt,
      duration_ms: attempt.durationMs,
      status: attempt.status,
      items_collected: attempt.itemsCollected,
      error: attempt.error ?? null
    })),
    api_calls: outcome.apiCalls.map((call) => ({
      endpoint: call.endpoint,
      method: call.method,
      status: call.status,
      latency_ms: call.latencyMs,
      cached: call.cached,
      error: call.error ?? null,
      attempt: call.attempt,
      timestamp: call.timestamp
    })),
    success: outcome.status === 'success',
    error: outcome.error ?? null,
    skipped_reason: outcome.skippedReason ?? null
  };
}

/**
 * Validate a serialized trace (e.g. read back from disk)
 */
export function parseTrace(value: unknown): TraceDocument {
  const result = TraceDocumentSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      'Invalid trace document',
      result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`)
    );
  }
  return result.data;
}
