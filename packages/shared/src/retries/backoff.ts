import { setTimeout as delay } from 'node:timers/promises';

export type BackoffOptions = {
  baseMs?: number;
  factor?: number;
  maxMs?: number;
  jitterRatio?: number;
  random?: () => number;
};

const DEFAULT_BACKOFF: Required<Omit<BackoffOptions, 'random'>> = {
  baseMs: 4_000,
  factor: 2,
  maxMs: 60_000,
  jitterRatio: 0
};

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

/**
 * Delay before retry number `attempt` (1-based): `baseMs * factor^(attempt - 1)`,
 * capped at `maxMs`, optionally spread by `jitterRatio`.
 */
export function computeExponentialBackoff(attempt: number, options: BackoffOptions = {}): number {
  const normalizedAttempt = Math.max(1, Math.floor(attempt));
  const {
    baseMs = DEFAULT_BACKOFF.baseMs,
    factor = DEFAULT_BACKOFF.factor,
    maxMs = DEFAULT_BACKOFF.maxMs,
    jitterRatio = DEFAULT_BACKOFF.jitterRatio,
    random = Math.random
  } = options;

  const cappedDelay = clamp(baseMs * Math.pow(factor, normalizedAttempt - 1), baseMs, maxMs);
  if (jitterRatio <= 0) {
    return Math.round(cappedDelay);
  }

  const jitter = (random() * 2 - 1) * cappedDelay * jitterRatio;
  return Math.round(clamp(cappedDelay + jitter, baseMs, maxMs));
}

export type RetryAttemptInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
};

export type RetryOptions<T> = {
  maxAttempts: number;
  backoff?: BackoffOptions;
  /** Treat a successful but unusable result as a failure worth retrying. */
  shouldRetryResult?: (result: T) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
  sleep?: (ms: number) => Promise<void>;
};

export class RetryExhaustedError extends Error {
  readonly code = 'RETRY_EXHAUSTED';
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Gave up after ${attempts} attempt(s): ${reason}`, { cause });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

export class UnusableResultError extends Error {
  constructor() {
    super('Result rejected by retry predicate');
    this.name = 'UnusableResultError';
  }
}

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions<T>
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      const result = await operation(attempt);
      if (!options.shouldRetryResult?.(result)) {
        return result;
      }
      lastError = new UnusableResultError();
    } catch (error) {
      lastError = error;
    }

    if (attempt < maxAttempts) {
      const delayMs = computeExponentialBackoff(attempt, options.backoff);
      options.onRetry?.({ attempt, maxAttempts, delayMs, error: lastError });
      await sleep(delayMs);
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
}
