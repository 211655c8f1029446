import type { ScoredItem } from '../types/items';
import type { BriefingReport } from './types';

const round = (value: number) => Math.round(value * 10000) / 10000;

function itemDocument(item: ScoredItem): Record<string, unknown> {
  return {
    id: item.id,
    kind: item.kind,
    title: item.title,
    url: item.url,
    source_name: item.sourceName,
    collector: item.collector,
    published_at: item.publishedAt?.toISOString() ?? null,
    snippet: item.snippet,
    engagement: item.engagement ?? null,
    payload: item.payload,
    relevance: round(item.relevance),
    recency: round(item.recency),
    engagement_score: round(item.engagementScore),
    score: round(item.score)
  };
}

/**
 * JSON shape written by the file and stdout consumers
 */
export function toReportDocument(report: BriefingReport): Record<string, unknown> {
  return {
    run_id: report.runId,
    domain: report.domain,
    profile: report.profile,
    report_type: report.reportType,
    generated_at: report.generatedAt.toISOString(),
    window: { from_date: report.window.fromDate, to_date: report.window.toDate },
    items: report.items.map(itemDocument),
    sources: report.sources.map((source) => ({ name: source.name, url: source.url })),
    availability: report.availability.map((entry) => ({
      collector: entry.collector.name,
      type: entry.collector.type,
      available: entry.available,
      reason: entry.reason ?? null,
      resolved_key: entry.resolvedKey ?? null
    })),
    ...(report.trace ? { trace: report.trace } : {})
  };
}
