/**
 * Error Handling Module
 *
 * Layered error handling with retry, exponential backoff and per-operation
 * degradation.
 */

import { Logger, createLogger } from '../logger';
import { isRetryableError, toError } from './errors';

export * from './errors';

export interface ErrorContext {
  operation: string;
  module: string;
  data?: Record<string, unknown>;
}

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Wait before the second attempt, doubled for each further attempt (ms) */
  baseDelay: number;
  minDelay: number;
  maxDelay: number;
  backoffFactor?: number;
  shouldRetry?: (error: Error, attempt: number) => boolean;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelay: 1000,
  minDelay: 4000,
  maxDelay: 10000,
  backoffFactor: 2
};

/**
 * Wait before the attempt following `attempt` (1-based).
 */
export function calculateBackoffDelay(attempt: number, options: RetryOptions): number {
  const factor = options.backoffFactor ?? 2;
  const delay = options.baseDelay * factor ** (attempt - 1);
  return Math.min(Math.max(delay, options.minDelay), options.maxDelay);
}

export abstract class BaseErrorHandler<TFallback = never> {
  protected readonly context: ErrorContext;
  protected readonly logger: Logger;

  constructor(context: ErrorContext, logger?: Logger) {
    this.context = context;
    this.logger = logger ?? createLogger(context.module);
  }

  /**
   * Run an operation, retrying retryable failures, and degrade after the
   * last attempt.
   */
  async handle<T>(
    operation: () => Promise<T>,
    retryOptions: RetryOptions = DEFAULT_RETRY_OPTIONS
  ): Promise<T | TFallback> {
    const maxAttempts = Math.max(1, retryOptions.maxAttempts);
    const shouldRetry = retryOptions.shouldRetry ?? ((error: Error) => isRetryableError(error));

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (caught) {
        const error = toError(caught);
        this.logError(attempt, maxAttempts, error);

        if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
          return this.degrade(error, attempt);
        }

        const delay = calculateBackoffDelay(attempt, retryOptions);
        this.logger.info(`Retrying in ${delay}ms (attempt ${attempt + 1}/${maxAttempts})`, undefined, this.context.operation);
        await this.wait(delay);
      }
    }
  }

  protected logError(attempt: number, maxAttempts: number, error: Error): void {
    this.logger.warn(
      `${this.context.module}.${this.context.operation} failed (attempt ${attempt}/${maxAttempts}): ${error.message}`,
      this.context.data,
      this.context.operation
    );
  }

  protected abstract degrade(error: Error, attempts: number): Promise<TFallback>;

  protected wait(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

/**
 * Weather data is best effort: a failed fetch yields no forecast for this
 * cycle.
 */
export class WeatherFetchErrorHandler extends BaseErrorHandler<null> {
  protected async degrade(error: Error, attempts: number): Promise<null> {
    this.logger.error(
      `Error fetching weather data after ${attempts} attempt(s): ${error.message}`,
      error,
      this.context.data,
      this.context.operation
    );
    return null;
  }
}

/**
 * Notification failures are surfaced to the caller.
 */
export class NotificationErrorHandler extends BaseErrorHandler {
  protected async degrade(error: Error, attempts: number): Promise<never> {
    this.logger.error(
      `Notification failed after ${attempts} attempt(s): ${error.message}`,
      error,
      this.context.data,
      this.context.operation
    );
    throw error;
  }
}
