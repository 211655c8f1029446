import { z } from 'zod';
import { ITEM_KINDS } from '../types/items';
import { DEPTH_NAMES } from '../types/collectors';

// ============================================================================
// IN-MEMORY RECORDS
// ============================================================================

/** What an HTTP helper reports for one upstream call */
export interface ApiCallInput {
  readonly endpoint: string;
  readonly method: string;
  /** null when no response arrived */
  readonly status: number | null;
  readonly latencyMs: number;
  readonly cached: boolean;
  readonly error?: string;
}

export interface ApiCallRecord extends ApiCallInput {
  readonly attempt: number;
  readonly timestamp: string;
}

export type AttemptStatus = 'success' | 'error' | 'timeout';
export type CollectorStatus = AttemptStatus | 'skipped';

export interface AttemptRecord {
  readonly attempt: number;
  readonly startedAt: string;
  readonly endedAt: string;
  readonly durationMs: number;
  readonly status: AttemptStatus;
  readonly itemsCollected: number;
  readonly error?: string;
}

export interface ProcessingSummary {
  readonly beforeFilter: number;
  readonly afterFilter: number;
  readonly afterDedup: number;
  readonly scoreMin: number | null;
  readonly scoreMax: number | null;
  readonly returned: number;
}

export interface DeliveryRecord {
  readonly channel: string;
  readonly startedAt: string;
  readonly endedAt: string;
  readonly durationMs: number;
  readonly success: boolean;
  readonly error?: string;
}

// ============================================================================
// SERIALIZED DOCUMENT
// ============================================================================

export const ApiCallDocumentSchema = z.object({
  endpoint: z.string(),
  method: z.string(),
  status: z.number().int().nullable(),
  latency_ms: z.number().nonnegative(),
  cached: z.boolean(),
  error: z.string().nullable(),
  attempt: z.number().int().positive(),
  timestamp: z.string()
});

export const AttemptDocumentSchema = z.object({
  attempt: z.number().int().positive(),
  started_at: z.string(),
  ended_at: z.string(),
  duration_ms: z.number().nonnegative(),
  status: z.enum(['success', 'error', 'timeout']),
  items_collected: z.number().int().nonnegative(),
  error: z.string().nullable()
});

export const CollectorDocumentSchema = z.object({
  name: z.string(),
  type: z.enum(ITEM_KINDS),
  status: z.enum(['success', 'error', 'timeout', 'skipped']),
  started_at: z.string().nullable(),
  ended_at: z.string().nullable(),
  duration_ms: z.number().nonnegative(),
  items_collected: z.number().int().nonnegative(),
  items_after_filter: z.number().int().nonnegative(),
  attempts: z.array(AttemptDocumentSchema),
  api_calls: z.array(ApiCallDocumentSchema),
  success: z.boolean(),
  error: z.string().nullable(),
  skipped_reason: z.string().nullable()
});

export const ProcessingDocumentSchema = z.object({
  before_filter: z.number().int().nonnegative(),
  after_filter: z.number().int().nonnegative(),
  after_dedup: z.number().int().nonnegative(),
  score_min: z.number().nullable(),
  score_max: z.number().nullable(),
  returned: z.number().int().nonnegative()
});

export const DeliveryDocumentSchema = z.object({
  channel: z.string(),
  started_at: z.string(),
  ended_at: z.string(),
  duration_ms: z.number().nonnegative(),
  success: z.boolean(),
  error: z.string().nullable()
});

export const TraceDocumentSchema = z.object({
  run_id: z.string().uuid(),
  domain: z.string(),
  profile: z.string(),
  report_type: z.string(),
  depth: z.enum(DEPTH_NAMES),
  started_at: z.string(),
  ended_at: z.string().nullable(),
  duration_ms: z.number().nonnegative().nullable(),
  collectors: z.array(CollectorDocumentSchema),
  processing: ProcessingDocumentSchema.nullable(),
  delivery: z.array(DeliveryDocumentSchema),
  totals: z.object({
    collectors_run: z.number().int().nonnegative(),
    collectors_succeeded: z.number().int().nonnegative(),
    collectors_skipped: z.number().int().nonnegative(),
    api_calls: z.number().int().nonnegative(),
    cache_hits: z.number().int().nonnegative()
  })
});

export type ApiCallDocument = z.infer<typeof ApiCallDocumentSchema>;
export type CollectorDocument = z.infer<typeof CollectorDocumentSchema>;
export type TraceDocument = z.infer<typeof TraceDocumentSchema>;
