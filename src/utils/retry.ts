/**
 * Retry utility with configurable backoff
 */

export type BackoffStrategy = 'exponential' | 'linear' | 'fixed';

export interface RetryConfig {
  /** Total attempts including the first one */
  maxAttempts?: number;
  /** Delay before the first retry in milliseconds */
  initialDelay?: number;
  maxDelay?: number;
  backoff?: BackoffStrategy;
  /** Multiplier for exponential backoff */
  factor?: number;
  /** 0 = no jitter, 1 = up to 100% jitter */
  jitter?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, nextDelay: number) => void;
  /** Aborting stops further attempts and interrupts the backoff wait */
  signal?: AbortSignal;
}

interface RetryableShape {
  code?: unknown;
  status?: unknown;
  message?: unknown;
}

function readShape(error: unknown): RetryableShape {
  if (typeof error !== 'object' || error === null) {
    return {};
  }
  return {
    code: 'code' in error ? error.code : undefined,
    status: 'status' in error ? error.status : undefined,
    message: 'message' in error ? error.message : undefined
  };
}

/**
 * Network failures, 429 and gateway errors are worth another attempt
 */
export function defaultIsRetryable(error: unknown): boolean {
  const { code, status, message } = readShape(error);

  if (code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'ENOTFOUND') {
    return true;
  }

  if (status === 429 || status === 502 || status === 503 || status === 504) {
    return true;
  }

  return typeof message === 'string' && message.toLowerCase().includes('rate limit');
}

export function calculateDelay(
  attempt: number,
  config: Pick<Required<RetryConfig>, 'initialDelay' | 'maxDelay' | 'backoff' | 'factor' | 'jitter'>
): number {
  let delay: number;
  switch (config.backoff) {
    case 'fixed':
      delay = config.initialDelay;
      break;
    case 'linear':
      delay = config.initialDelay * attempt;
      break;
    default:
      delay = config.initialDelay * config.factor ** (attempt - 1);
  }
  delay = Math.min(delay, config.maxDelay);

  if (config.jitter > 0) {
    const jitterAmount = delay * config.jitter * Math.random();
    delay = delay - jitterAmount / 2 + jitterAmount;
  }

  return Math.round(delay);
}

/**
 * Sleep for the given milliseconds; rejects early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Retry a function according to the configured backoff
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = {}
): Promise<T> {
  const maxAttempts = Math.max(1, config.maxAttempts ?? 3);
  const delayConfig: Parameters<typeof calculateDelay>[1] = {
    initialDelay: config.initialDelay ?? 1000,
    maxDelay: config.maxDelay ?? 60000,
    backoff: config.backoff ?? 'exponential',
    factor: config.factor ?? 2,
    jitter: config.jitter ?? 0.2
  };
  const isRetryable = config.isRetryable ?? defaultIsRetryable;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || config.signal?.aborted || !isRetryable(error)) {
        throw error;
      }

      const delay = calculateDelay(attempt, delayConfig);
      config.onRetry?.(attempt, error, delay);
      await sleep(delay, config.signal);
    }
  }
}

/**
 * Pre-configured retry policies
 */
export const RetryPolicies = {
  /** Collector re-runs: short linearly increasing pauses */
  collector: {
    initialDelay: 1000,
    maxDelay: 10000,
    backoff: 'linear',
    jitter: 0
  } satisfies RetryConfig
};
