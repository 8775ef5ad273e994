/**
 * Categories of a failed fetch, as reported in failure records.
 */
export type FetchErrorKind = 'not_found' | 'http' | 'network' | 'timeout' | 'parse';

/**
 * Missing or invalid configuration: bad config file, bad IDs, bad arguments.
 */
export class ConfigError extends Error {
    readonly name = 'ConfigError';

    constructor(message: string, readonly issues: string[] = []) {
        super(message);
    }
}

/**
 * A failed request or page. `transient` failures are worth retrying.
 */
export class FetchError extends Error {
    readonly name = 'FetchError';

    constructor(
        message: string,
        readonly kind: FetchErrorKind,
        readonly transient: boolean,
        readonly status?: number,
        readonly retryAfterMs?: number,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }

    static fromStatus(url: string, status: number, statusText: string, retryAfterMs?: number): FetchError {
        if (status === 404) {
            return new FetchError(`Not found: ${url}`, 'not_found', false, status);
        }
        const transient = status === 408 || status === 429 || status >= 500;
        return new FetchError(`Failed to fetch ${url}: ${status} ${statusText}`.trim(), 'http', transient, status, retryAfterMs);
    }
}

/**
 * Output could not be written. Aborts the run.
 */
export class SinkError extends Error {
    readonly name = 'SinkError';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
