/**
 * BriefingRun - wires configuration, collectors, coordinator, pipeline and delivery for one run
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { type AvailabilityEntry, probeAvailability } from '../availability/prober';
import { FileResponseCache } from '../cache/file-cache';
import type { ResponseCache } from '../cache/types';
import { type CollectorRegistry, buildRegistry } from '../collectors/registry';
import { type AppConfig, loadConfig } from '../config';
import { buildProfileContext, enabledReports, resolveDepthProfile } from '../config/profile-context';
import {
  loadDepthConfig,
  loadDomainConfig,
  loadProfileConfig,
  loadScoringConfig
} from '../config/yaml-loader';
import type { DomainFile, ProfileFile } from '../config/yaml-types';
import { deliverReport } from '../delivery/deliver';
import { JsonFileConsumer, JsonStreamConsumer } from '../delivery/json-consumer';
import type { BriefingReport, DeliveryOutcome, ReportConsumer } from '../delivery/types';
import type { DateWindow } from '../pipeline/filter';
import { ProcessingPipeline } from '../pipeline/pipeline';
import { scoringOptionsFrom } from '../pipeline/score';
import { RunTrace } from '../trace/run-trace';
import type { DepthName } from '../types/collectors';
import { ConfigurationError } from '../utils/errors';
import { type Logger, getLogger } from '../utils/logger';
import { ExecutionCoordinator } from './coordinator';

export interface BriefingRequest {
  domain: string;
  profile: string;
  reportType?: string;
  collectors?: readonly string[];
  excludeCollectors?: readonly string[];
  noCache: boolean;
  limit?: number;
  retries: number;
  timeoutMs?: number;
  depth: DepthName;
  /** Embed or write the execution trace */
  trace: boolean;
  window: DateWindow;
  /** Report file; stdout when absent */
  output?: string;
}

export interface BriefingDependencies {
  config?: AppConfig;
  cache?: ResponseCache;
  /** Replaces the collectors the domain config lists */
  registry?: CollectorRegistry;
  consumer?: ReportConsumer;
  logger?: Logger;
  /** Cancels collection, e.g. on SIGINT */
  signal?: AbortSignal;
}

export interface BriefingResult {
  report: BriefingReport;
  trace: RunTrace;
  delivery: DeliveryOutcome;
  /** Set when the trace was written beside the report file */
  tracePath?: string;
}

interface LoadedConfiguration {
  app: AppConfig;
  domain: DomainFile;
  profile: ProfileFile;
  registry: CollectorRegistry;
  availability: AvailabilityEntry[];
}

export function tracePathFor(output: string): string {
  return `${output.replace(/\.json$/i, '')}.trace.json`;
}

export class BriefingRun {
  private readonly logger: Logger;

  constructor(
    private readonly request: BriefingRequest,
    private readonly dependencies: BriefingDependencies = {}
  ) {
    this.logger = (dependencies.logger ?? getLogger()).forOperation('briefing-run', {
      domain: request.domain,
      profile: request.profile
    });
  }

  /**
   * Availability of every registered collector. No network.
   */
  async probe(): Promise<AvailabilityEntry[]> {
    const { availability } = await this.loadConfiguration();
    return availability;
  }

  async execute(): Promise<BriefingResult> {
    const { request } = this;
    const { app, domain, profile, registry, availability } = await this.loadConfiguration();
    const [depthFile, scoringFile] = await Promise.all([loadDepthConfig(), loadScoringConfig()]);

    const reportType = this.resolveReportType(domain, profile);
    const depth = resolveDepthProfile(depthFile, request.depth);
    const profileContext = buildProfileContext(domain, profile, scoringFile);
    const trace = new RunTrace({
      domain: domain.domain,
      profile: profile.profile_name,
      reportType,
      depth: depth.name
    });
    const logger = this.logger.child({ runId: trace.runId });

    logger.info('Starting briefing run', {
      reportType,
      depth: depth.name,
      fromDate: request.window.fromDate,
      toDate: request.window.toDate
    });

    const cache =
      this.dependencies.cache ??
      new FileResponseCache({ directory: app.cacheDir, ttlHours: app.cacheTtlHours, logger });

    const coordinator = new ExecutionCoordinator({ cache, trace, logger });
    const collected = await coordinator.run({
      availability,
      allowList: request.collectors,
      denyList: request.excludeCollectors,
      retries: request.retries,
      timeoutMs: request.timeoutMs,
      depth,
      profile: profileContext,
      fromDate: request.window.fromDate,
      toDate: request.window.toDate,
      credentials: app.credentials,
      noCache: request.noCache,
      deadlineMs: app.runDeadlineMs,
      maxConcurrency: app.maxConcurrency,
      signal: this.dependencies.signal
    });

    const pipeline = new ProcessingPipeline({
      scoring: scoringOptionsFrom(scoringFile),
      priorities: registry.priorities(),
      trace,
      logger
    });
    const processed = pipeline.process({
      items: collected.items,
      sources: collected.sources,
      profile: profileContext,
      window: request.window,
      limit: request.limit
    });

    const embedTrace = request.trace && request.output === undefined;
    if (embedTrace) {
      trace.finalize();
    }

    const report: BriefingReport = {
      runId: trace.runId,
      domain: domain.domain,
      profile: profile.profile_name,
      reportType,
      window: request.window,
      generatedAt: new Date(),
      items: processed.items,
      sources: processed.sources,
      availability,
      ...(embedTrace ? { trace: trace.toJSON() } : {})
    };

    const consumer =
      this.dependencies.consumer ??
      (request.output ? new JsonFileConsumer(request.output) : new JsonStreamConsumer());
    const delivery = await deliverReport(consumer, report, { trace, logger });
    trace.finalize();

    let tracePath: string | undefined;
    if (request.trace && request.output !== undefined) {
      tracePath = path.resolve(tracePathFor(request.output));
      await fs.mkdir(path.dirname(tracePath), { recursive: true });
      await fs.writeFile(tracePath, `${JSON.stringify(trace.toJSON(), null, 2)}\n`, 'utf-8');
      logger.info('Trace written', { tracePath });
    }

    return { report, trace, delivery, tracePath };
  }

  private async loadConfiguration(): Promise<LoadedConfiguration> {
    const { request } = this;
    const app = this.dependencies.config ?? loadConfig();
    const [domain, profile] = await Promise.all([
      loadDomainConfig(request.domain),
      loadProfileConfig(request.domain, request.profile)
    ]);

    const registry =
      this.dependencies.registry ??
      buildRegistry(domain, { enableScraping: app.enableScraping, logger: this.logger });
    const availability = probeAvailability(registry.list(), new Set(Object.keys(app.credentials)));

    return { app, domain, profile, registry, availability };
  }

  private resolveReportType(domain: DomainFile, profile: ProfileFile): string {
    const requested = this.request.reportType;
    if (requested === undefined) {
      return enabledReports(domain, profile)[0] ?? 'briefing';
    }
    const known = domain.reports.map((report) => report.type);
    if (known.length > 0 && !known.includes(requested)) {
      throw new ConfigurationError(
        `Unknown report type "${requested}" for domain ${domain.domain} (available: ${known.join(', ')})`
      );
    }
    return requested;
  }
}
