import { ConfigurationError } from '../../utils/errors';
import { type LogEntry, Logger } from '../../utils/logger';
import { Configuration, redactSecret } from '..';

describe('Configuration', () => {
  it('should apply defaults and keep only configured credentials', () => {
    const config = new Configuration({ NEWSAPI_API_KEY: 'test-secret', XAI_API_KEY: '   ' }).load();

    expect(config).toEqual({
      credentials: { NEWSAPI_API_KEY: 'test-secret' },
      cacheDir: '.cache/briefing',
      cacheTtlHours: 24,
      enableScraping: false,
      runDeadlineMs: 180000,
      maxConcurrency: 5,
      logLevel: 'info',
      nodeEnv: 'production'
    });
  });

  it('should parse overrides', () => {
    const config = new Configuration({
      ENABLE_SCRAPING: 'yes',
      RUN_DEADLINE_MS: '5000',
      MAX_CONCURRENCY: '2',
      LOG_LEVEL: 'debug'
    }).load();

    expect(config.enableScraping).toBe(true);
    expect(config.runDeadlineMs).toBe(5000);
    expect(config.maxConcurrency).toBe(2);
    expect(config.logLevel).toBe('debug');
  });

  it('should reject invalid values', () => {
    const configuration = new Configuration({ MAX_CONCURRENCY: '0' });

    expect(() => configuration.load()).toThrow(ConfigurationError);
    expect(configuration.validate().valid).toBe(false);
  });

  it('should redact secrets when logging', () => {
    const entries: LogEntry[] = [];
    const logger = Logger.withSink((entry) => entries.push(entry));

    new Configuration({ XAI_API_KEY: 'test-secret-value' }).logConfig(logger);

    expect(entries).toHaveLength(1);
    expect(entries[0].metadata).toEqual(expect.objectContaining({ credentials: { XAI_API_KEY: 'test...alue' } }));
  });
});

describe('redactSecret', () => {
  it('should hide short secrets entirely', () => {
    expect(redactSecret('short')).toBe('***');
    expect(redactSecret('abcdefghijkl')).toBe('abcd...ijkl');
  });
});
