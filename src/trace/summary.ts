import type { ApiCallDocument, CollectorDocument, TraceDocument } from './types';

function formatCall(call: ApiCallDocument): string {
  const status = call.status === null ? 'ERR' : String(call.status);
  const suffix = call.cached ? ' (cached)' : call.error ? ` - ${call.error}` : '';
  return `${call.method} ${call.endpoint} ${status} ${call.latency_ms}ms${suffix}`;
}

function formatCollector(collector: CollectorDocument): string {
  if (collector.status === 'skipped') {
    return `${collector.name} [skipped] ${collector.skipped_reason ?? ''}`.trimEnd();
  }
  const parts = [
    `${collector.name} [${collector.status}]`,
    `${collector.duration_ms}ms`,
    `items=${collector.items_collected}`,
    `after_filter=${collector.items_after_filter}`
  ];
  if (collector.attempts.length > 1) {
    parts.push(`attempts=${collector.attempts.length}`);
  }
  if (collector.error) {
    parts.push(`error: ${collector.error}`);
  }
  return parts.join(' ');
}

/**
 * Human readable tree of a run, for terminals and logs
 */
export function renderTraceSummary(trace: TraceDocument): string {
  const lines: string[] = [];
  lines.push(
    `Run ${trace.run_id} (${trace.domain}/${trace.profile}, report=${trace.report_type}, depth=${trace.depth})`
  );
  lines.push(`Duration: ${trace.duration_ms === null ? 'in progress' : `${trace.duration_ms}ms`}`);
  lines.push(
    `Collectors: ${trace.totals.collectors_run} run, ${trace.totals.collectors_succeeded} succeeded, ` +
      `${trace.totals.collectors_skipped} skipped | API calls: ${trace.totals.api_calls} (${trace.totals.cache_hits} cached)`
  );

  trace.collectors.forEach((collector, index) => {
    const last = index === trace.collectors.length - 1;
    lines.push(`${last ? '└──' : '├──'} ${formatCollector(collector)}`);
    const indent = last ? '    ' : '│   ';
    collector.api_calls.forEach((call, callIndex) => {
      const lastCall = callIndex === collector.api_calls.length - 1;
      lines.push(`${indent}${lastCall ? '└──' : '├──'} ${formatCall(call)}`);
    });
  });

  if (trace.processing) {
    const p = trace.processing;
    const range =
      p.score_min === null || p.score_max === null
        ? 'n/a'
        : `${p.score_min.toFixed(3)}..${p.score_max.toFixed(3)}`;
    lines.push(
      `Processing: before_filter=${p.before_filter} after_filter=${p.after_filter} ` +
        `after_dedup=${p.after_dedup} returned=${p.returned} score=${range}`
    );
  }

  for (const delivery of trace.delivery) {
    const result = delivery.success ? 'ok' : `failed: ${delivery.error ?? 'unknown error'}`;
    lines.push(`Delivery: ${delivery.channel} ${result} ${delivery.duration_ms}ms`);
  }

  return lines.join('\n');
}
