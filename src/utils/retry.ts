import { SummarizerError, errorMessage } from './errors.js';
import type { StageLogger } from './logger.js';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Total attempts, first one included */
  attempts: number;
  /** Seconds; transient failures wait backoff^(attempt-1), others wait backoff */
  backoff: number;
  /** Failures worth an exponential wait (timeouts, HTTP and connection errors) */
  isTransient: (error: unknown) => boolean;
  logger: StageLogger;
  sleep?: Sleep;
  /** Used in log lines and the final error */
  label?: string;
}

/**
 * Run fn until it succeeds or attempts run out.
 * After the last failed attempt a SummarizerError carrying the last error is thrown.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const label = options.label ?? 'Model call';
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === options.attempts) {
        break;
      }

      if (options.isTransient(error)) {
        const waitSeconds = Math.pow(options.backoff, attempt - 1);
        options.logger.warn(`${label} failed, backing off`, {
          attempt,
          attempts: options.attempts,
          waitSeconds,
          error: errorMessage(error),
        });
        await wait(waitSeconds * 1000);
      } else {
        options.logger.error(`${label} failed with an unexpected error`, error, {
          attempt,
          attempts: options.attempts,
        });
        await wait(options.backoff * 1000);
      }
    }
  }

  throw new SummarizerError(
    `${label} failed after ${options.attempts} attempts. Last error: ${errorMessage(lastError)}`,
    { cause: lastError }
  );
}
