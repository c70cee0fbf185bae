/**
 * Configuration options for the retry mechanism.
 */
export interface RetryOptions {
  /** Total number of attempts, including the first. */
  maxRetries: number;
  /** Delay in milliseconds before the first retry. */
  initialDelay: number;
  /** Upper bound for the delay between attempts. */
  maxDelay: number;
  /** Multiplier applied to the delay after each retry. */
  factor: number;
  /** Called before each retry with the error that triggered it. */
  onRetry?: (error: Error, attempt: number) => void;
  /** Sleep function, replaceable in tests. */
  wait?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelay: 200,
  maxDelay: 5000,
  factor: 2,
  onRetry: (error, attempt) => {
    console.warn(`Retry attempt ${attempt} after error: ${error.message}`);
  },
};
