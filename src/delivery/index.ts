export { deliverReport } from './deliver';
export type { DeliverOptions } from './deliver';
export { JsonFileConsumer, JsonStreamConsumer, serializeReport } from './json-consumer';
export { toReportDocument } from './report-document';
export type { BriefingReport, DeliveryOutcome, ReportConsumer } from './types';
