export { DeduplicationService, dedupKey } from './deduplication';
export type { DeduplicationStats } from './deduplication';
export { filterByWindow, isWithinWindow } from './filter';
export type { DateWindow, FilterOptions } from './filter';
export { ProcessingPipeline } from './pipeline';
export type { PipelineInput, PipelineOptions, PipelineOutput } from './pipeline';
export {
  DEFAULT_SCORING,
  clamp01,
  matchesTerm,
  scoreEngagement,
  scoreItems,
  scoreRecency,
  scoreRelevance,
  scoringOptionsFrom
} from './score';
export type { ScoringOptions } from './score';
export { compareScored, sortScored } from './sort';
export type { SourcePriorities } from './sort';
