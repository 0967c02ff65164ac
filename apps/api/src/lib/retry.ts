import { getContextLogger } from './logger';
import { isRetryable } from './errors';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before retry number `attempt` (1-based): initial * multiplier^(attempt - 1), capped.
 */
export function backoffDelay(
  attempt: number,
  config: Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>
): number {
  const delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
  return Math.min(delay, config.maxDelayMs);
}

/**
 * Run `fn` until it succeeds, an error is not retryable, or attempts run out.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  context?: string
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  const shouldRetry = cfg.shouldRetry ?? isRetryable;

  let lastError: unknown;

  for (let attempt = 1; attempt <= cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === cfg.maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      const delay = backoffDelay(attempt, cfg);
      getContextLogger().warn(
        {
          attempt,
          maxAttempts: cfg.maxAttempts,
          delay,
          context,
          error: error instanceof Error ? error.message : String(error),
        },
        'Retrying after transient error'
      );
      cfg.onRetry?.(error, attempt);

      await sleep(delay);
    }
  }

  throw lastError;
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number, label: string) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Reject after `timeoutMs`. The underlying promise keeps running; only the
 * caller stops waiting for it.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label = 'Operation'): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs, label)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
