#!/usr/bin/env node

/**
 * Main entry point for the briefing-engine CLI
 */

import { formatAvailability } from './availability/prober';
import { USAGE, parseArgs, resolveWindow } from './cli/args';
import { config } from './config';
import { BriefingRun } from './orchestrator/briefing-run';
import { renderTraceSummary } from './trace/summary';
import { ConfigurationError, CoordinatorError, ValidationError } from './utils/errors';
import { Logger, getLogger } from './utils/logger';

/**
 * Run the CLI and return the process exit code
 */
async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let options: ReturnType<typeof parseArgs>;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(`❌ ${error.message}\n`);
      console.error(USAGE);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const abort = new AbortController();
  const onSigint = () => abort.abort(new Error('Interrupted'));
  process.once('SIGINT', onSigint);

  try {
    const appConfig = config.load();
    const logger = getLogger();
    logger.setLogLevel(Logger.parseLogLevel(appConfig.logLevel));
    if (appConfig.logLevel === 'debug') {
      config.logConfig(logger);
    }

    const run = new BriefingRun(
      {
        domain: options.domain,
        profile: options.profile,
        reportType: options.report,
        collectors: options.collectors,
        excludeCollectors: options.excludeCollectors,
        noCache: options.noCache,
        limit: options.limit,
        retries: options.retries,
        timeoutMs: options.timeoutMs,
        depth: options.depth,
        trace: options.trace,
        window: resolveWindow(options),
        output: options.output
      },
      { config: appConfig, logger, signal: abort.signal }
    );

    if (options.dryRun) {
      const availability = await run.probe();
      console.log(formatAvailability(availability));
      return 0;
    }

    const result = await run.execute();
    if (options.trace) {
      console.error(renderTraceSummary(result.trace.toJSON()));
    }
    if (result.tracePath) {
      console.error(`📝 Trace written to ${result.tracePath}`);
    }
    if (!result.delivery.success) {
      console.error(`❌ Delivery via ${result.delivery.channel} failed: ${result.delivery.error ?? 'unknown error'}`);
      return 1;
    }
    return 0;
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(`❌ ${error.message}`);
      return 2;
    }
    if (error instanceof CoordinatorError || error instanceof ConfigurationError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

// Run if this is the main module
if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    console.error('❌ Unhandled Rejection:', reason);
    process.exit(1);
  });

  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('❌ Unexpected error:', error);
      process.exit(1);
    });
}

export { main };
export * from './availability';
export * from './cache';
export * from './collectors';
export * from './delivery';
export * from './orchestrator';
export * from './pipeline';
export * from './trace';
export * from './types';
