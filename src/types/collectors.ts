import type { ResponseCache } from '../cache/types';
import type { ApiCallInput } from '../trace/types';
import type { Logger } from '../utils/logger';
import type { Item, ItemKind, Source } from './items';

// ============================================================================
// DEPTH PROFILES
// ============================================================================

export const DEPTH_NAMES = ['quick', 'default', 'deep'] as const;
export type DepthName = (typeof DEPTH_NAMES)[number];

/** Source priority for collectors the domain config does not rank; lower wins ties */
export const DEFAULT_SOURCE_PRIORITY = 100;

export interface DepthProfile {
  readonly name: DepthName;
  readonly maxItems: number;
  readonly timeoutMs: number;
  readonly targetItems: number;
}

// ============================================================================
// PROFILE CONTEXT
// ============================================================================

export interface FocusEntity {
  readonly name: string;
  readonly type: string;
  readonly aliases: readonly string[];
  /** Relevance contribution when the entity is mentioned */
  readonly weight: number;
  readonly symbol?: string;
}

export interface ThoughtLeader {
  readonly name: string;
  readonly handle: string;
  readonly priority: number;
}

export interface Publication {
  readonly name: string;
  readonly url: string;
  readonly feedUrl?: string;
}

export interface ScrapeTarget {
  readonly name: string;
  readonly url: string;
  /** Container of one listing */
  readonly selector: string;
  readonly titleSelector?: string;
  readonly linkSelector?: string;
  readonly snippetSelector?: string;
  readonly dateSelector?: string;
}

/**
 * Read-only view of the active domain and profile handed to every collector
 */
export interface ProfileContext {
  readonly domain: string;
  readonly profile: string;
  readonly boostKeywords: readonly string[];
  readonly filterKeywords: readonly string[];
  readonly entities: readonly FocusEntity[];
  readonly thoughtLeaders: readonly ThoughtLeader[];
  readonly publications: readonly Publication[];
  readonly scrapeTargets: readonly ScrapeTarget[];
  /** Drop undated items during filtering */
  readonly requireTimestamp: boolean;
}

// ============================================================================
// COLLECTOR CONTRACT
// ============================================================================

export type ApiCallRecorder = (call: ApiCallInput) => void;

export interface CollectContext {
  readonly profile: ProfileContext;
  /** Inclusive window start, YYYY-MM-DD */
  readonly fromDate: string;
  /** Inclusive window end, YYYY-MM-DD */
  readonly toDate: string;
  readonly depth: DepthProfile;
  /** Values of the declared credential keys that are configured */
  readonly credentials: Readonly<Record<string, string>>;
  /** For requiresAny collectors: the key the prober chose */
  readonly resolvedKey?: string;
  /** Aborted on collector timeout or run deadline */
  readonly signal: AbortSignal;
  readonly cache: ResponseCache;
  /** Skip cache reads; responses are still written through */
  readonly noCache: boolean;
  readonly recordCall: ApiCallRecorder;
  readonly logger: Logger;
}

export interface CollectorResult {
  readonly items: readonly Item[];
  readonly sources: readonly Source[];
  /** Set on failure; items and sources then hold whatever was salvaged */
  readonly error?: string;
}

export interface Collector {
  readonly name: string;
  readonly type: ItemKind;
  requiredCredentials(): ReadonlySet<string>;
  /** true: any one declared key suffices; false: all are needed */
  requiresAny(): boolean;
  /** Reason the collector is switched off by configuration, if it is */
  disabledReason?(): string | undefined;
  /**
   * Fetch items for the window. Ordinary failures are reported through
   * `CollectorResult.error`, not thrown.
   */
  collect(context: CollectContext): Promise<CollectorResult>;
}
