/**
 * ExecutionCoordinator - runs the selected collectors concurrently under a run deadline
 */

import pLimit from 'p-limit';
import type { AvailabilityEntry } from '../availability/prober';
import type { ResponseCache } from '../cache/types';
import type { CollectorTrace } from '../trace/collector-trace';
import type { RunTrace } from '../trace/run-trace';
import type { CollectContext, Collector, CollectorResult, DepthProfile, ProfileContext } from '../types/collectors';
import { type Item, type Source, uniqueSources, validateItem } from '../types/items';
import { CollectorTimeoutError, CoordinatorError, describeError } from '../utils/errors';
import { type Logger, getLogger } from '../utils/logger';
import { RetryPolicies, retry } from '../utils/retry';

export const DEFAULT_MAX_CONCURRENCY = 5;
export const DEFAULT_RUN_DEADLINE_MS = 180_000;
export const DEFAULT_RETRY_DELAY_MS = 1000;

export interface CoordinatorDependencies {
  cache: ResponseCache;
  trace: RunTrace;
  logger?: Logger;
}

export interface CoordinatorRequest {
  /** Prober output for every registered collector, in registry order */
  availability: readonly AvailabilityEntry[];
  /** Run only these collectors (when given) */
  allowList?: readonly string[];
  /** Never run these collectors */
  denyList?: readonly string[];
  /** Extra attempts after a collector-reported error */
  retries?: number;
  retryDelayMs?: number;
  /** Per-attempt timeout; defaults to the depth profile's */
  timeoutMs?: number;
  depth: DepthProfile;
  profile: ProfileContext;
  fromDate: string;
  toDate: string;
  credentials: Readonly<Record<string, string>>;
  noCache?: boolean;
  deadlineMs?: number;
  maxConcurrency?: number;
  /** External cancellation (e.g. SIGINT); treated like the run deadline */
  signal?: AbortSignal;
}

export interface CollectionResult {
  /** Merged in selection order */
  items: Item[];
  sources: Source[];
  selected: string[];
  /** Collectors still unfinished when the run deadline elapsed */
  abandoned: string[];
}

/**
 * A collector attempt that came back with `error` set
 */
export class CollectorAttemptError extends Error {
  constructor(
    readonly collector: string,
    readonly result: CollectorResult
  ) {
    super(result.error ?? `Collector ${collector} failed`);
    this.name = 'CollectorAttemptError';
  }
}

interface SelectedCollector {
  entry: AvailabilityEntry;
  trace: CollectorTrace;
}

interface TaskSettings {
  request: CoordinatorRequest;
  runSignal: AbortSignal;
  timeoutMs: number;
}

export class ExecutionCoordinator {
  private readonly cache: ResponseCache;
  private readonly trace: RunTrace;
  private readonly logger: Logger;

  constructor(dependencies: CoordinatorDependencies) {
    this.cache = dependencies.cache;
    this.trace = dependencies.trace;
    this.logger = (dependencies.logger ?? getLogger()).child({ service: 'coordinator', runId: this.trace.runId });
  }

  async run(request: CoordinatorRequest): Promise<CollectionResult> {
    const selected = this.select(request);
    const deadlineMs = request.deadlineMs ?? DEFAULT_RUN_DEADLINE_MS;
    const runController = new AbortController();
    const settings: TaskSettings = {
      request,
      runSignal: runController.signal,
      timeoutMs: request.timeoutMs ?? request.depth.timeoutMs
    };
    const onExternalAbort = () => runController.abort(request.signal?.reason);
    if (request.signal?.aborted) {
      onExternalAbort();
    } else {
      request.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    this.logger.info('Starting collection', {
      collectors: selected.map((s) => s.entry.collector.name),
      depth: request.depth.name,
      timeoutMs: settings.timeoutMs,
      deadlineMs,
      retries: request.retries ?? 0
    });

    const limit = pLimit(Math.max(1, request.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY));
    const results: Array<CollectorResult | undefined> = selected.map(() => undefined);

    const tasks = selected.map((selection, index) =>
      limit(async () => {
        if (runController.signal.aborted) return;
        results[index] = await this.runCollector(selection, settings);
      })
    );

    let deadlineTimer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'deadline'>((resolve) => {
      deadlineTimer = setTimeout(() => resolve('deadline'), deadlineMs);
      if (runController.signal.aborted) resolve('deadline');
      runController.signal.addEventListener('abort', () => resolve('deadline'), { once: true });
    });
    const finished = Promise.allSettled(tasks).then(() => 'done' as const);

    const winner = await Promise.race([finished, deadline]);
    clearTimeout(deadlineTimer);
    request.signal?.removeEventListener('abort', onExternalAbort);

    // nothing that finishes after this point is merged
    const snapshot = [...results];
    const abandoned: string[] = [];

    if (winner === 'deadline') {
      limit.clearQueue();
      for (const { entry, trace } of selected) {
        if (!trace.isSealed()) {
          const timeout = new CollectorTimeoutError(entry.collector.name, deadlineMs, 'run_deadline');
          trace.complete('timeout', 0, timeout.message);
          abandoned.push(entry.collector.name);
        }
      }
      if (!runController.signal.aborted) {
        runController.abort(new CollectorTimeoutError('run', deadlineMs, 'run_deadline'));
      }
      this.logger.warn('Run deadline reached, abandoning unfinished collectors', { abandoned, deadlineMs });
    }

    const items: Item[] = [];
    const sources: Source[] = [];
    snapshot.forEach((result, index) => {
      const name = selected[index].entry.collector.name;
      if (!result || abandoned.includes(name)) return;
      items.push(...result.items);
      sources.push(...result.sources);
    });

    this.logger.info('Collection finished', {
      items: items.length,
      sources: sources.length,
      abandoned: abandoned.length
    });

    return {
      items,
      sources: uniqueSources(sources),
      selected: selected.map((s) => s.entry.collector.name),
      abandoned
    };
  }

  /**
   * available − excluded − (not allow-listed). Everything not selected is traced as skipped.
   */
  private select(request: CoordinatorRequest): SelectedCollector[] {
    const { availability } = request;
    if (availability.length === 0) {
      throw new CoordinatorError('No collectors registered', 'empty_registry');
    }

    const known = new Set(availability.map((entry) => entry.collector.name));
    const allow = request.allowList && request.allowList.length > 0 ? new Set(request.allowList) : undefined;
    const deny = new Set(request.denyList ?? []);
    for (const name of [...(allow ?? []), ...deny]) {
      if (!known.has(name)) {
        this.logger.warn('Unknown collector named in selection flags', { collector: name });
      }
    }

    const selected: SelectedCollector[] = [];
    for (const entry of availability) {
      const { name, type } = entry.collector;
      if (!entry.available) {
        this.trace.recordSkipped(name, type, `unavailable: ${entry.reason ?? 'missing credentials'}`);
      } else if (deny.has(name)) {
        this.trace.recordSkipped(name, type, 'excluded by --exclude-collectors');
      } else if (allow && !allow.has(name)) {
        this.trace.recordSkipped(name, type, 'not in --collectors');
      } else {
        selected.push({ entry, trace: this.trace.openCollector(name, type) });
      }
    }

    if (!availability.some((entry) => entry.available)) {
      throw new CoordinatorError('No collector is available with the configured credentials', 'none_available');
    }
    if (selected.length === 0) {
      throw new CoordinatorError('Collector selection is empty', 'none_selected');
    }
    return selected;
  }

  /**
   * One task: attempts with retry, then the final outcome. Never throws.
   */
  private async runCollector(
    { entry, trace }: SelectedCollector,
    settings: TaskSettings
  ): Promise<CollectorResult | undefined> {
    const { collector } = entry;
    const { request, runSignal } = settings;
    const logger = this.logger.child({ collector: collector.name });
    const retries = Math.max(0, request.retries ?? 0);

    try {
      const result = await retry((attempt) => this.attempt(entry, trace, attempt, settings, logger), {
        ...RetryPolicies.collector,
        maxAttempts: 1 + retries,
        initialDelay: request.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
        maxDelay: Number.MAX_SAFE_INTEGER,
        signal: runSignal,
        isRetryable: (error) => error instanceof CollectorAttemptError,
        onRetry: (attempt, error, delay) => {
          logger.warn('Retrying collector', { attempt, delay, error: describeError(error) });
        }
      });
      trace.complete('success', result.items.length);
      return result;
    } catch (error) {
      if (error instanceof CollectorTimeoutError) {
        trace.complete('timeout', 0, error.message);
        logger.warn('Collector timed out', { timeoutMs: error.timeoutMs, reason: error.reason });
        return undefined;
      }
      if (error instanceof CollectorAttemptError) {
        trace.complete('error', error.result.items.length, error.message);
        logger.warn('Collector failed', { error: error.message, salvaged: error.result.items.length });
        return error.result;
      }
      // e.g. the run was cancelled during a backoff pause
      const message = describeError(error) ?? 'Collector task failed';
      trace.complete('error', 0, message);
      logger.warn('Collector task ended early', { error: message });
      return undefined;
    }
  }

  private async attempt(
    entry: AvailabilityEntry,
    trace: CollectorTrace,
    attempt: number,
    settings: TaskSettings,
    logger: Logger
  ): Promise<CollectorResult> {
    const { collector } = entry;
    const { request, runSignal, timeoutMs } = settings;

    if (runSignal.aborted) {
      throw runSignal.reason instanceof CollectorTimeoutError
        ? new CollectorTimeoutError(collector.name, runSignal.reason.timeoutMs, 'run_deadline')
        : new CollectorTimeoutError(collector.name, timeoutMs, 'run_deadline');
    }

    trace.beginAttempt(attempt);
    const controller = new AbortController();
    const onRunAbort = () =>
      controller.abort(new CollectorTimeoutError(collector.name, timeoutMs, 'run_deadline'));
    runSignal.addEventListener('abort', onRunAbort, { once: true });
    const timer = setTimeout(
      () => controller.abort(new CollectorTimeoutError(collector.name, timeoutMs)),
      timeoutMs
    );

    const abandoned = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });

    const context: CollectContext = {
      profile: request.profile,
      fromDate: request.fromDate,
      toDate: request.toDate,
      depth: request.depth,
      credentials: this.credentialsFor(collector, request.credentials),
      resolvedKey: entry.resolvedKey,
      signal: controller.signal,
      cache: this.cache,
      noCache: request.noCache ?? false,
      recordCall: trace.recorderFor(attempt),
      logger
    };

    try {
      const pending = collector.collect(context);
      // a collector that ignores the signal may settle after we stop waiting
      pending.catch((error: unknown) => {
        if (controller.signal.aborted) {
          logger.debug('Abandoned collector settled with an error', { error: describeError(error) });
        }
      });

      const raw = await Promise.race([pending, abandoned]);
      const result = this.validated(collector, raw, logger);
      if (result.error !== undefined) {
        trace.endAttempt('error', result.items.length, result.error);
        throw new CollectorAttemptError(collector.name, result);
      }
      trace.endAttempt('success', result.items.length);
      return result;
    } catch (error) {
      if (error instanceof CollectorAttemptError) {
        throw error;
      }
      if (error instanceof CollectorTimeoutError) {
        trace.endAttempt('timeout', 0, error.message);
        throw error;
      }
      // a thrown fault counts as a reported error with nothing salvaged
      const message = describeError(error) ?? 'Unknown collector fault';
      logger.error('Collector raised an unexpected fault', error instanceof Error ? error : undefined, { attempt });
      trace.endAttempt('error', 0, message);
      throw new CollectorAttemptError(collector.name, { items: [], sources: [], error: message });
    } finally {
      clearTimeout(timer);
      runSignal.removeEventListener('abort', onRunAbort);
    }
  }

  private credentialsFor(
    collector: Collector,
    all: Readonly<Record<string, string>>
  ): Readonly<Record<string, string>> {
    const scoped: Record<string, string> = {};
    for (const key of collector.requiredCredentials()) {
      const value = all[key];
      if (value) scoped[key] = value;
    }
    return scoped;
  }

  /**
   * Drop malformed items rather than letting them reach the pipeline
   */
  private validated(collector: Collector, result: CollectorResult, logger: Logger): CollectorResult {
    const items: Item[] = [];
    for (const item of result.items) {
      const issues = validateItem(item);
      if (issues.length === 0) {
        items.push(item);
      } else {
        logger.warn('Dropping malformed item', { collector: collector.name, issues });
      }
    }
    if (items.length === result.items.length) {
      return result;
    }
    return { ...result, items };
  }
}
