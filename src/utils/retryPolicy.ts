import { createLogger } from './logger';
import { errorMessage, isRetryableLookup } from './errors';

const logger = createLogger('retry');

export interface RetryOptions {
  maxAttempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  factor?: number;
  jitter?: boolean;
  retryCondition?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export class RetryPolicy {
  private readonly maxAttempts: number;
  private readonly initialDelay: number;
  private readonly maxDelay: number;
  private readonly factor: number;
  private readonly jitter: boolean;
  private readonly retryCondition: (error: unknown, attempt: number) => boolean;
  private readonly onRetry?: (error: unknown, attempt: number, delay: number) => void;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.initialDelay = options.initialDelay ?? 500;
    this.maxDelay = options.maxDelay ?? 5000;
    this.factor = options.factor ?? 2;
    this.jitter = options.jitter !== false; // Default true
    this.retryCondition = options.retryCondition ?? ((error) => isRetryableLookup(error));
    this.onRetry = options.onRetry;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  calculateDelay(attempt: number): number {
    let delay = this.initialDelay * Math.pow(this.factor, attempt - 1);
    delay = Math.min(delay, this.maxDelay);

    if (this.jitter) {
      const jitterAmount = delay * 0.2; // +/- 20%
      delay = delay + (Math.random() * jitterAmount * 2 - jitterAmount);
    }

    return Math.max(0, Math.round(delay));
  }

  async execute<T>(fn: () => Promise<T>, context?: string): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const result = await fn();

        if (attempt > 1) {
          logger.info({ context, attempt }, 'Retry succeeded');
        }

        return result;
      } catch (error) {
        lastError = error;

        if (!this.retryCondition(error, attempt)) {
          logger.debug({ context, attempt, error: errorMessage(error) }, 'Error is not retryable');
          throw error;
        }

        if (attempt < this.maxAttempts) {
          const delay = this.calculateDelay(attempt);

          logger.warn(
            { context, attempt, nextAttempt: attempt + 1, delay, error: errorMessage(error) },
            'Operation failed, retrying',
          );

          this.onRetry?.(error, attempt, delay);
          await this.sleep(delay);
        }
      }
    }

    logger.error(
      { context, maxAttempts: this.maxAttempts, error: errorMessage(lastError) },
      'All retry attempts exhausted',
    );

    throw lastError;
  }
}
