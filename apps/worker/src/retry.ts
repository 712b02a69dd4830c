// Retry policy shared by every remote call site: fixed delay, bounded attempts
import type { Logger } from 'pino';

export interface RetryPolicy {
    /** Attempts per endpoint (first try included) */
    maxAttempts: number;
    /** Fixed wait between attempts */
    delayMs: number;
    /** Move to the next endpoint once attempts run out, instead of failing the call */
    rotateOnExhaustion: boolean;
}

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export interface RetryOptions {
    logger: Logger;
    /** Errors this returns false for are rethrown at once */
    shouldRetry?: (error: unknown) => boolean;
    sleep?: Sleep;
    /** Extra fields for every log line */
    context?: Record<string, unknown>;
}

/**
 * Run `fn` until it succeeds or the policy's attempts are used up.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    label: string,
    policy: Pick<RetryPolicy, 'maxAttempts' | 'delayMs'>,
    options: RetryOptions,
): Promise<T> {
    const wait = options.sleep ?? sleep;
    const shouldRetry = options.shouldRetry ?? (() => true);
    const attempts = Math.max(1, policy.maxAttempts);
    let lastError: unknown = new Error(`${label}: no attempt made`);

    for (let attempt = 1; attempt <= attempts; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            lastError = error;
            if (!shouldRetry(error)) throw error;

            if (attempt < attempts) {
                options.logger.warn({
                    ...options.context,
                    label,
                    attempt,
                    maxAttempts: attempts,
                    delayMs: policy.delayMs,
                    error: error instanceof Error ? error.message : String(error),
                }, 'Retrying after error');

                await wait(policy.delayMs);
            }
        }
    }

    options.logger.error({
        ...options.context,
        label,
        maxAttempts: attempts,
        error: lastError instanceof Error ? lastError.message : String(lastError),
    }, 'All retries exhausted');

    throw lastError;
}
