/**
 * Custom error classes and error handling utilities
 */

import { randomUUID } from 'node:crypto';

/**
 * Base error class for all custom errors
 */
export class BaseError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly id: string;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
    this.id = randomUUID();
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack
    };
  }
}

/**
 * Error raised by a collector for an ordinary failure (network, payload, upstream status)
 */
export class CollectorError extends BaseError {
  constructor(
    public readonly collector: string,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(`Collector ${collector} error: ${message}`, {
      collector,
      originalError: describeError(originalError)
    });
  }
}

/**
 * A collector attempt exceeded its allotted time or the run deadline
 */
export class CollectorTimeoutError extends BaseError {
  constructor(
    public readonly collector: string,
    public readonly timeoutMs: number,
    public readonly reason: 'collector_timeout' | 'run_deadline' = 'collector_timeout'
  ) {
    super(
      reason === 'run_deadline'
        ? `Collector ${collector} abandoned at run deadline`
        : `Collector ${collector} timed out after ${timeoutMs}ms`,
      { collector, timeoutMs, reason }
    );
  }
}

/**
 * Fault that prevents the coordinator from running at all
 */
export class CoordinatorError extends BaseError {
  constructor(
    message: string,
    public readonly reason: 'empty_registry' | 'none_available' | 'none_selected'
  ) {
    super(message, { reason });
  }
}

/**
 * Error thrown when API rate limit is exceeded
 */
export class RateLimitError extends BaseError {
  public readonly retryAfterSeconds?: number;

  constructor(
    public readonly service: string,
    retryAfterSeconds?: number
  ) {
    super(`Rate limit exceeded for ${service}`, {
      service,
      retryAfterSeconds
    });
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * Error thrown when a payload or document fails validation
 */
export class ValidationError extends BaseError {
  constructor(
    message: string,
    public readonly validationErrors: string[] = []
  ) {
    super(message, { validationErrors });
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends BaseError {
  constructor(
    message: string,
    public readonly missingFields?: string[]
  ) {
    super(`Configuration error: ${message}`, {
      missingFields
    });
  }
}

/**
 * Human readable message for anything that was thrown
 */
export function describeError(error: unknown): string | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
