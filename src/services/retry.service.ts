import { logger } from '../utils/logger';

/**
 * RetryService
 *
 * Bounded retries with exponential backoff for calls to external services:
 * - delay after failed attempt n is baseDelay * exponentialBase^(n-1), capped at maxDelay
 * - only transient errors are retried; anything else fails immediately
 * - exhaustion surfaces as RetryExhaustedError carrying the attempt count
 */

export interface RetryOptions {
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
  exponentialBase: number;
  jitter: boolean;
  retryCondition?: (error: unknown) => boolean;
  onRetry?: (context: RetryContext) => void;
}

export interface RetryContext {
  operation: string;
  attempt: number;
  maxAttempts: number;
  delay: number;
  error: unknown;
}

export class RetryExhaustedError extends Error {
  readonly operation: string;
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(operation: string, attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Operation "${operation}" failed after ${attempts} attempts: ${reason}`);
    this.name = 'RetryExhaustedError';
    this.operation = operation;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'EPIPE',
]);

function readCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') return response.status;
  }
  return undefined;
}

/**
 * Transient: socket-level failures, timeouts, HTTP 5xx, 408 and 429.
 * Everything else (404, other 4xx, malformed responses) is permanent.
 */
export function isTransientError(error: unknown): boolean {
  const code = readCode(error);
  if (code && TRANSIENT_CODES.has(code)) return true;

  const status = readStatus(error);
  if (status !== undefined) {
    if (status >= 500 && status < 600) return true;
    if (status === 408 || status === 429) return true;
    return false;
  }

  const message = error instanceof Error ? error.message.toLowerCase() : '';
  if (message.includes('timeout') || message.includes('timed out')) return true;
  if (message.includes('socket hang up')) return true;

  return false;
}

export class RetryService {
  static readonly DEFAULT_OPTIONS: RetryOptions = {
    maxAttempts: 3,
    baseDelay: 1000,
    maxDelay: 30000,
    exponentialBase: 2,
    jitter: false,
  };

  static async withRetry<T>(
    operation: () => Promise<T>,
    operationName: string,
    options: Partial<RetryOptions> = {}
  ): Promise<T> {
    const config: RetryOptions = { ...this.DEFAULT_OPTIONS, ...options };
    const shouldRetry = config.retryCondition ?? isTransientError;
    const maxAttempts = Math.max(1, Math.floor(config.maxAttempts));
    const startTime = Date.now();

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await operation();
        if (attempt > 1) {
          logger.info('retry-succeeded', { operation: operationName, attempt, durationMs: Date.now() - startTime });
        }
        return result;
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';

        if (!shouldRetry(error)) {
          logger.debug('retry-non-retryable', { operation: operationName, attempt, error: errorMessage });
          throw error;
        }

        if (attempt >= maxAttempts) {
          logger.error('retry-exhausted', {
            operation: operationName,
            attempts: attempt,
            durationMs: Date.now() - startTime,
            error: errorMessage,
          });
          throw new RetryExhaustedError(operationName, attempt, error);
        }

        const delay = this.calculateDelay(attempt, config);
        logger.warn('retry-scheduled', { operation: operationName, attempt, maxAttempts, delay, error: errorMessage });
        config.onRetry?.({ operation: operationName, attempt, maxAttempts, delay, error });
        await this.sleep(delay);
      }
    }
  }

  /** Delay to wait after failed attempt `attempt` (1-based). */
  static calculateDelay(attempt: number, options: RetryOptions): number {
    const exponentialDelay = options.baseDelay * Math.pow(options.exponentialBase, attempt - 1);
    const delayWithCap = Math.min(exponentialDelay, options.maxDelay);

    if (options.jitter) {
      const jitterRange = delayWithCap * 0.1;
      const jitter = (Math.random() * 2 - 1) * jitterRange;
      return Math.max(0, Math.round(delayWithCap + jitter));
    }

    return delayWithCap;
  }

  private static sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
