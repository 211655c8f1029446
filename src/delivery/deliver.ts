import type { Clock } from '../trace/collector-trace';
import type { RunTrace } from '../trace/run-trace';
import { describeError } from '../utils/errors';
import { type Logger, getLogger } from '../utils/logger';
import type { BriefingReport, DeliveryOutcome, ReportConsumer } from './types';

export interface DeliverOptions {
  trace?: RunTrace;
  logger?: Logger;
  clock?: Clock;
}

/**
 * Hand the report to a consumer and record the delivery in the trace.
 * A consumer that throws is reported as a failed delivery.
 */
export async function deliverReport(
  consumer: ReportConsumer,
  report: BriefingReport,
  options: DeliverOptions = {}
): Promise<DeliveryOutcome> {
  const clock = options.clock ?? (() => new Date());
  const logger = (options.logger ?? getLogger()).child({ service: 'delivery', runId: report.runId });
  const startedAt = clock();

  let outcome: DeliveryOutcome;
  try {
    outcome = await consumer.deliver(report);
  } catch (error) {
    outcome = { channel: consumer.channel, success: false, error: describeError(error) ?? 'Delivery failed' };
  }

  const endedAt = clock();
  options.trace?.addDelivery({
    channel: outcome.channel,
    startedAt: startedAt.toISOString(),
    endedAt: endedAt.toISOString(),
    durationMs: endedAt.getTime() - startedAt.getTime(),
    success: outcome.success,
    ...(outcome.error !== undefined ? { error: outcome.error } : {})
  });

  if (outcome.success) {
    logger.info('Report delivered', { channel: outcome.channel, location: outcome.location, items: report.items.length });
  } else {
    logger.error('Report delivery failed', undefined, { channel: outcome.channel, error: outcome.error });
  }
  return outcome;
}
