/**
 * Unit tests for Logger
 */

import { type LogEntry, Logger, LogLevel } from '../logger';

describe('Logger', () => {
  let logger: Logger;
  let logEntries: LogEntry[];

  beforeEach(() => {
    logEntries = [];
    logger = Logger.withSink((entry) => {
      logEntries.push(entry);
    });
  });

  function logAll(): void {
    logger.error('Error message');
    logger.warn('Warning message');
    logger.info('Info message');
    logger.debug('Debug message');
  }

  describe('Log Levels', () => {
    it('should log at ERROR level', () => {
      logger.setLogLevel(LogLevel.ERROR);
      logAll();

      expect(logEntries).toHaveLength(1);
      expect(logEntries[0].level).toBe('ERROR');
      expect(logEntries[0].message).toBe('Error message');
    });

    it('should log at WARN level and above', () => {
      logger.setLogLevel(LogLevel.WARN);
      logAll();

      expect(logEntries.map((e) => e.level)).toEqual(['ERROR', 'WARN']);
    });

    it('should log at INFO level and above', () => {
      logger.setLogLevel(LogLevel.INFO);
      logAll();

      expect(logEntries.map((e) => e.level)).toEqual(['ERROR', 'WARN', 'INFO']);
    });

    it('should log at DEBUG level (all)', () => {
      logAll();

      expect(logEntries.map((e) => e.level)).toEqual(['ERROR', 'WARN', 'INFO', 'DEBUG']);
    });

    it('should give children the level set before they were created', () => {
      logger.setLogLevel(LogLevel.WARN);
      const child = logger.child({ collector: 'rss' });
      logger.setLogLevel(LogLevel.DEBUG);

      child.info('Child info');
      child.warn('Child warning');
      logger.debug('Parent debug');

      expect(logEntries.map((e) => e.message)).toEqual(['Child warning', 'Parent debug']);
    });

    it('should parse level names from the environment', () => {
      expect(Logger.parseLogLevel('WARN')).toBe(LogLevel.WARN);
      expect(Logger.parseLogLevel('verbose')).toBe(LogLevel.INFO);
      expect(Logger.parseLogLevel(undefined)).toBe(LogLevel.INFO);
    });
  });

  describe('Correlation IDs', () => {
    it('should share the correlation ID with child loggers', () => {
      const childLogger = logger.child({ service: 'coordinator' });

      logger.info('Parent message');
      childLogger.info('Child message');

      expect(logEntries[0].correlationId).toBeTruthy();
      expect(logEntries[0].correlationId).toBe(logEntries[1].correlationId);
      expect(logEntries[1].context?.service).toBe('coordinator');
    });

    it('should preserve custom correlation ID', () => {
      logger.child({ correlationId: 'custom-correlation-id' }).info('Message with custom ID');

      expect(logEntries[0].correlationId).toBe('custom-correlation-id');
    });
  });

  describe('Context', () => {
    it('should merge context in child loggers', () => {
      logger.child({ service: 'coordinator', runId: 'run-1' }).child({ collector: 'news' }).info('Nested context');

      expect(logEntries[0].context).toMatchObject({
        service: 'coordinator',
        runId: 'run-1',
        collector: 'news'
      });
    });

    it('should tag operation loggers with an operation id', () => {
      logger.forOperation('briefing-run', { domain: 'advertising' }).info('Starting');

      expect(logEntries[0].context).toMatchObject({ operation: 'briefing-run', domain: 'advertising' });
      expect(logEntries[0].context?.operationId).toBeTruthy();
    });
  });

  describe('Error Logging', () => {
    it('should include error details and metadata', () => {
      const error = new Error('Test error');
      error.stack = 'Error stack trace';

      logger.error('An error occurred', error, { collector: 'news' });

      expect(logEntries[0].error).toEqual({
        name: 'Error',
        message: 'Test error',
        stack: 'Error stack trace'
      });
      expect(logEntries[0].metadata).toEqual({ collector: 'news' });
    });
  });

  describe('silent', () => {
    it('should drop every entry', () => {
      const silent = Logger.silent();
      silent.setLogLevel(LogLevel.DEBUG);

      expect(() => silent.error('ignored')).not.toThrow();
    });
  });

  describe('Singleton', () => {
    it('should return same instance', () => {
      expect(Logger.getInstance()).toBe(Logger.getInstance());
    });
  });
});
