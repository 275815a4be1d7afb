import { Logger } from '../logger';
import { RetryOptions } from '../types';

/**
 * Retries an async operation with a linearly growing delay.
 * Errors for which shouldRetry returns false are rethrown immediately.
 */
export class RetryRunner {
  private readonly logger: Logger;
  private readonly retry: number;
  private readonly throttle: number;

  constructor(logger: Logger, options: RetryOptions = {}) {
    this.logger = logger;
    this.retry = options.retry ?? 3;
    this.throttle = options.throttle ?? 1000;
  }

  private async sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  async run<T>(
    description: string,
    operation: () => Promise<T>,
    shouldRetry: (error: unknown) => boolean = () => true
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.retry; attempt++) {
      if (attempt > 0) {
        const delay = this.throttle * attempt;
        this.logger.debug(`Retrying ${description} after ${delay}ms (attempt ${attempt + 1}/${this.retry + 1})`);
        await this.sleep(delay);
      }

      try {
        return await operation();
      } catch (error) {
        lastError = error;
        if (!shouldRetry(error)) {
          throw error;
        }
        this.logger.debug(`${description} failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    throw lastError;
  }
}
