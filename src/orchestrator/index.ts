/**
 * Central export point for orchestrator modules
 */

export { BriefingRun, tracePathFor } from './briefing-run';
export type { BriefingDependencies, BriefingRequest, BriefingResult } from './briefing-run';
export {
  CollectorAttemptError,
  DEFAULT_MAX_CONCURRENCY,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_RUN_DEADLINE_MS,
  ExecutionCoordinator
} from './coordinator';
export type { CollectionResult, CoordinatorDependencies, CoordinatorRequest } from './coordinator';
