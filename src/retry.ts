import { RetryOptions, DEFAULT_RETRY_OPTIONS } from "./retryOptions.js";
import { sleep } from "./utilities.js";

/**
 * Runs an async operation, retrying failures with exponential backoff and jitter.
 * @throws The last error once all attempts are used.
 */
export async function retry<T>(
    operation: () => Promise<T>,
    options: Partial<RetryOptions> = {}
): Promise<T> {
    const config: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
    const wait = config.wait ?? sleep;
    const attempts = Math.max(1, config.maxRetries);

    let delay = config.initialDelay;
    for (let attempt = 1; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            const lastError = error instanceof Error ? error : new Error(String(error));
            if (attempt >= attempts) {
                throw lastError;
            }

            config.onRetry?.(lastError, attempt);

            const jitter = delay * 0.2 * (Math.random() - 0.5);
            await wait(Math.max(0, delay + jitter));
            delay = Math.min(delay * config.factor, config.maxDelay);
        }
    }
}
