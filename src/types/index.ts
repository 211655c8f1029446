/**
 * Central export for all type definitions
 */

// Item model
export {
  DEAL_ACTIVITIES,
  ITEM_KINDS,
  ItemSchema,
  fingerprint,
  generateContentId,
  generateItemId,
  sourceKey,
  uniqueSources,
  validateItem
} from './items';
export type {
  DealActivity,
  DealDetails,
  FinancialItem,
  FinancialPayload,
  Item,
  ItemKind,
  ListingItem,
  ListingPayload,
  NewsItem,
  NewsPayload,
  ScoreFields,
  ScoredItem,
  SocialItem,
  SocialPayload,
  Source
} from './items';

// Collector contract
export { DEFAULT_SOURCE_PRIORITY, DEPTH_NAMES } from './collectors';
export type {
  ApiCallRecorder,
  CollectContext,
  Collector,
  CollectorResult,
  DepthName,
  DepthProfile,
  FocusEntity,
  ProfileContext,
  Publication,
  ScrapeTarget,
  ThoughtLeader
} from './collectors';
