import logger from './logger';

export interface RetryOptions {
    /** Total attempts, including the first. */
    retries?: number;
    /** Delay before the first retry; doubles on every further retry. */
    delay?: number;
    maxDelay?: number;
    /** Errors for which this returns false are rethrown at once. */
    shouldRetry?: (error: unknown) => boolean;
    /** Server-requested wait (e.g. Retry-After), used when longer than the backoff. */
    retryAfter?: (error: unknown) => number | undefined;
    /** Stops retrying once aborted; the last error is rethrown. */
    signal?: AbortSignal;
}

export function backoffDelay(attempt: number, delay: number, maxDelay: number): number {
    return Math.min(maxDelay, delay * 2 ** (attempt - 1));
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (ms <= 0 || signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Runs `operation` until it succeeds, a non-retryable error occurs or `retries` attempts are used.
 * The operation receives the 1-based attempt number.
 */
export async function retryOperation<T>(
    operation: (attempt: number) => Promise<T>,
    name: string,
    options: RetryOptions = {}
): Promise<T> {
    const {
        retries = 5,
        delay = 2000,
        maxDelay = 60000,
        shouldRetry = () => true,
        retryAfter = () => undefined,
        signal,
    } = options;

    for (let attempt = 1; attempt <= retries; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            if (attempt === retries || !shouldRetry(error) || signal?.aborted) throw error;

            const wait = Math.min(maxDelay, Math.max(backoffDelay(attempt, delay, maxDelay), retryAfter(error) ?? 0));
            logger.warn(`Failed to ${name}, retrying in ${wait / 1000}s... (${attempt}/${retries})`);
            await sleep(wait, signal);

            if (signal?.aborted) throw error;
        }
    }
    throw new Error(`Failed to ${name} after ${retries} retries`);
}
