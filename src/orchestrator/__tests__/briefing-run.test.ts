import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ScriptedCollector, makeNewsItem, succeedWith } from '../../__tests__/factories';
import { MemoryResponseCache } from '../../cache/memory-cache';
import { CollectorRegistry } from '../../collectors/registry';
import type { AppConfig } from '../../config';
import { clearConfigCache } from '../../config/yaml-loader';
import type { BriefingReport, DeliveryOutcome, ReportConsumer } from '../../delivery/types';
import { parseTrace } from '../../trace/run-trace';
import { ConfigurationError, CoordinatorError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { type BriefingRequest, BriefingRun, tracePathFor } from '../briefing-run';

class CapturingConsumer implements ReportConsumer {
  readonly channel = 'memory';
  readonly reports: BriefingReport[] = [];

  async deliver(report: BriefingReport): Promise<DeliveryOutcome> {
    this.reports.push(report);
    return { channel: this.channel, success: true };
  }
}

const appConfig: AppConfig = {
  credentials: { NEWSDATA_API_KEY: 'test-secret' },
  cacheDir: '.cache/test',
  cacheTtlHours: 24,
  enableScraping: false,
  runDeadlineMs: 5000,
  maxConcurrency: 5,
  logLevel: 'error',
  nodeEnv: 'test'
};

const baseRequest: BriefingRequest = {
  domain: 'advertising',
  profile: 'default',
  noCache: false,
  retries: 0,
  depth: 'default',
  trace: false,
  window: { fromDate: '2024-01-01', toDate: '2024-01-07' }
};

const published = new Date('2024-01-05T10:00:00Z');
const strong = makeNewsItem({
  url: 'https://news.example.com/wpp',
  title: 'WPP completes acquisition',
  snippet: 'Deal closes',
  publishedAt: published
});
const weak = makeNewsItem({
  url: 'https://news.example.com/weather',
  title: 'Weather update',
  snippet: 'Rain',
  publishedAt: published,
  collector: 'rss'
});

function registry(): CollectorRegistry {
  return new CollectorRegistry()
    .register(new ScriptedCollector('news', succeedWith(strong), 'news', ['NEWSDATA_API_KEY']), 10)
    .register(new ScriptedCollector('rss', succeedWith(weak)), 20)
    .register(new ScriptedCollector('x_search', succeedWith(), 'social', ['XAI_API_KEY']), 50);
}

describe('BriefingRun', () => {
  const originalRoot = process.env.CONFIG_ROOT;

  beforeAll(() => {
    process.env.CONFIG_ROOT = path.resolve(__dirname, '../../..', 'config');
    clearConfigCache();
  });

  afterAll(() => {
    if (originalRoot === undefined) {
      delete process.env.CONFIG_ROOT;
    } else {
      process.env.CONFIG_ROOT = originalRoot;
    }
    clearConfigCache();
  });

  function run(request: Partial<BriefingRequest> = {}, consumer: ReportConsumer = new CapturingConsumer()) {
    return new BriefingRun(
      { ...baseRequest, ...request },
      {
        config: appConfig,
        cache: new MemoryResponseCache(),
        registry: registry(),
        consumer,
        logger: Logger.silent()
      }
    );
  }

  it('should collect, rank and deliver a report', async () => {
    const consumer = new CapturingConsumer();

    const result = await run({}, consumer).execute();

    expect(result.delivery).toEqual({ channel: 'memory', success: true });
    expect(consumer.reports).toEqual([result.report]);
    expect(result.report).toEqual(
      expect.objectContaining({ domain: 'advertising', profile: 'default', reportType: 'daily_brief' })
    );
    expect(result.report.items.map((item) => item.url)).toEqual([strong.url, weak.url]);
    expect(result.report.trace).toBeUndefined();
    expect(result.report.availability.map((entry) => [entry.collector.name, entry.available])).toEqual([
      ['news', true],
      ['rss', true],
      ['x_search', false]
    ]);
  });

  it('should apply the item limit', async () => {
    const result = await run({ limit: 1 }).execute();

    expect(result.report.items.map((item) => item.url)).toEqual([strong.url]);
  });

  it('should embed a finalized trace when requested without an output file', async () => {
    const result = await run({ trace: true }).execute();

    const embedded = result.report.trace;
    expect(embedded).toBeDefined();
    expect(embedded?.ended_at).not.toBeNull();
    expect(embedded?.collectors.map((c) => [c.name, c.status])).toEqual([
      ['news', 'success'],
      ['rss', 'success'],
      ['x_search', 'skipped']
    ]);
    expect(embedded?.processing).toEqual(expect.objectContaining({ before_filter: 2, returned: 2 }));
    expect(result.trace.toJSON().delivery.map((d) => d.channel)).toEqual(['memory']);
  });

  it('should honour collector selection flags', async () => {
    const result = await run({ collectors: ['rss'] }).execute();

    expect(result.report.items.map((item) => item.collector)).toEqual(['rss']);
    expect(result.trace.getCollector('news')?.outcome.skippedReason).toBe('not in --collectors');
  });

  it('should resolve the first enabled report of an inherited profile', async () => {
    const result = await run({ profile: 'holding-watch' }).execute();

    expect(result.report.reportType).toBe('weekly_digest');
    expect(result.report.profile).toBe('holding-watch');
  });

  it('should accept a report type the domain defines', async () => {
    const result = await run({ reportType: 'fundraising' }).execute();

    expect(result.report.reportType).toBe('fundraising');
  });

  it('should reject a report type the domain does not define', async () => {
    await expect(run({ reportType: 'horoscope' }).execute()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should fail when the registry is empty', async () => {
    const briefing = new BriefingRun(baseRequest, {
      config: appConfig,
      cache: new MemoryResponseCache(),
      registry: new CollectorRegistry(),
      consumer: new CapturingConsumer(),
      logger: Logger.silent()
    });

    await expect(briefing.execute()).rejects.toBeInstanceOf(CoordinatorError);
  });

  it('should probe availability without collecting', async () => {
    const briefing = run();

    const availability = await briefing.probe();

    expect(availability.map((entry) => [entry.collector.name, entry.reason])).toEqual([
      ['news', undefined],
      ['rss', undefined],
      ['x_search', 'missing XAI_API_KEY']
    ]);
  });

  describe('with an output file', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await fs.mkdtemp(path.join(os.tmpdir(), 'briefing-run-'));
    });

    afterEach(async () => {
      await fs.rm(directory, { recursive: true, force: true });
    });

    it('should write the report and a separate trace file', async () => {
      const output = path.join(directory, 'out', 'brief.json');
      const briefing = new BriefingRun(
        { ...baseRequest, trace: true, output },
        { config: appConfig, cache: new MemoryResponseCache(), registry: registry(), logger: Logger.silent() }
      );

      const result = await briefing.execute();

      expect(result.delivery).toEqual({ channel: 'file', success: true, location: output });
      expect(result.tracePath).toBe(path.join(directory, 'out', 'brief.trace.json'));

      const report: unknown = JSON.parse(await fs.readFile(output, 'utf-8'));
      expect(report).toEqual(expect.objectContaining({ run_id: result.report.runId, report_type: 'daily_brief' }));
      expect(report).not.toHaveProperty('trace');

      const trace = parseTrace(JSON.parse(await fs.readFile(path.join(directory, 'out', 'brief.trace.json'), 'utf-8')));
      expect(trace.run_id).toBe(result.report.runId);
      expect(trace.delivery.map((d) => [d.channel, d.success])).toEqual([['file', true]]);
    });
  });
});

describe('tracePathFor', () => {
  it('should place the trace beside the report', () => {
    expect(tracePathFor('reports/brief.json')).toBe('reports/brief.trace.json');
    expect(tracePathFor('reports/brief')).toBe('reports/brief.trace.json');
  });
});
