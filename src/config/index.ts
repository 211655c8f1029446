/**
 * Configuration management with environment variable validation
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { type Logger, getLogger } from '../utils/logger';

// Load .env file if it exists
dotenv.config();

/** Environment variables that hold collector credentials */
export const CREDENTIAL_KEYS = [
  'NEWSDATA_API_KEY',
  'NEWSAPI_API_KEY',
  'ALPHA_VANTAGE_API_KEY',
  'XAI_API_KEY'
] as const;

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

/**
 * Environment variable schema
 */
const EnvSchema = z.object({
  NEWSDATA_API_KEY: optionalSecret,
  NEWSAPI_API_KEY: optionalSecret,
  ALPHA_VANTAGE_API_KEY: optionalSecret,
  XAI_API_KEY: optionalSecret,

  CACHE_DIR: z.string().default('.cache/briefing'),
  CACHE_TTL_HOURS: z.string().default('24').transform(Number).pipe(z.number().positive()),
  ENABLE_SCRAPING: booleanFlag.default('false'),
  RUN_DEADLINE_MS: z.string().default('180000').transform(Number).pipe(z.number().int().positive()),
  MAX_CONCURRENCY: z.string().default('5').transform(Number).pipe(z.number().int().min(1).max(32)),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  NODE_ENV: z.enum(['development', 'test', 'production']).default('production')
});

export interface AppConfig {
  /** Credential values keyed by environment variable name */
  credentials: Readonly<Record<string, string>>;
  cacheDir: string;
  cacheTtlHours: number;
  enableScraping: boolean;
  runDeadlineMs: number;
  maxConcurrency: number;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  nodeEnv: 'development' | 'test' | 'production';
}

export function redactSecret(secret: string): string {
  if (secret.length <= 8) {
    return '***';
  }
  return `${secret.substring(0, 4)}...${secret.substring(secret.length - 4)}`;
}

export class Configuration {
  private config?: AppConfig;

  constructor(private readonly source: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load and validate configuration
   */
  load(): AppConfig {
    if (this.config) {
      return this.config;
    }

    const result = EnvSchema.safeParse(this.source);
    if (!result.success) {
      const invalid = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new ConfigurationError(`Invalid environment: ${invalid.join('; ')}`);
    }

    const env = result.data;
    const credentials: Record<string, string> = {};
    for (const key of CREDENTIAL_KEYS) {
      const value = env[key];
      if (value) {
        credentials[key] = value;
      }
    }

    this.config = {
      credentials,
      cacheDir: env.CACHE_DIR,
      cacheTtlHours: env.CACHE_TTL_HOURS,
      enableScraping: env.ENABLE_SCRAPING,
      runDeadlineMs: env.RUN_DEADLINE_MS,
      maxConcurrency: env.MAX_CONCURRENCY,
      logLevel: env.LOG_LEVEL,
      nodeEnv: env.NODE_ENV
    };
    return this.config;
  }

  validate(): { valid: boolean; errors?: string[] } {
    try {
      this.load();
      return { valid: true };
    } catch (error) {
      return { valid: false, errors: [error instanceof Error ? error.message : String(error)] };
    }
  }

  /**
   * Log configuration (with secrets redacted)
   */
  logConfig(logger: Logger = getLogger()): void {
    const config = this.load();
    const credentials = Object.fromEntries(
      Object.entries(config.credentials).map(([key, value]) => [key, redactSecret(value)])
    );
    logger.info('Configuration loaded', { ...config, credentials });
  }
}

// Export singleton instance
export const config = new Configuration();

export function loadConfig(): AppConfig {
  return config.load();
}

export * from './profile-context';
export * from './yaml-loader';
export * from './yaml-types';
