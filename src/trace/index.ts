export { CollectorTrace } from './collector-trace';
export type { Clock, CollectorOutcome } from './collector-trace';
export { RunTrace, parseTrace } from './run-trace';
export type { RunTraceInit } from './run-trace';
export { renderTraceSummary } from './summary';
export { TraceDocumentSchema } from './types';
export type {
  ApiCallInput,
  ApiCallRecord,
  AttemptRecord,
  AttemptStatus,
  CollectorStatus,
  DeliveryRecord,
  ProcessingSummary,
  TraceDocument
} from './types';
