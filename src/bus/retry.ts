import { PublishError } from '../errors';

export interface RetryOptions {
  /** Total attempts, including the first */
  attempts: number;
  baseDelayMs: number;
  /** Called before each retry with the attempt about to run */
  onRetry?: (attempt: number, error: PublishError) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  attempts: 3,
  baseDelayMs: 200
};

/**
 * Run a publish, retrying Timeout and ConnectionLost failures with
 * exponential backoff. SchemaInvalid and non-publish errors are rethrown
 * immediately.
 */
export async function publishWithRetry<T>(
  publish: () => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS
): Promise<T> {
  let attempt = 1;

  for (;;) {
    try {
      return await publish();
    } catch (error) {
      if (!(error instanceof PublishError) || !error.retryable || attempt >= options.attempts) {
        throw error;
      }
      const delay = options.baseDelayMs * 2 ** (attempt - 1);
      attempt++;
      options.onRetry?.(attempt, error);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}
