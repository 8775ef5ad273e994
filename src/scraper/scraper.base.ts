import Scraper, { FetchResult } from './scraper.interface';
import { FetchFn, malFetch } from '../util/queues';
import { retryOperation } from '../util/retry';
import { FetchError, errorMessage } from '../util/errors';
import logger from '../util/logger';
import env from '../util/env';

export interface ScraperOptions {
    fetch?: FetchFn;
    maxAttempts?: number;
    retryDelayMs?: number;
    retryMaxDelayMs?: number;
    userAgent?: string;
}

function parseRetryAfter(header: string | null): number | undefined {
    if (!header || !/^\d+$/.test(header.trim())) return undefined;
    return Number(header.trim()) * 1000;
}

export function toFetchError(error: unknown, url: string): FetchError {
    if (error instanceof FetchError) return error;
    if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
        return new FetchError(`Timeout fetching page: ${url}`, 'timeout', true, undefined, undefined, { cause: error });
    }
    return new FetchError(`Network error fetching ${url}: ${errorMessage(error)}`, 'network', true, undefined, undefined, { cause: error });
}

export abstract class BaseScraper<T> implements Scraper<T> {
    protected readonly fetchFn: FetchFn;
    protected readonly maxAttempts: number;
    protected readonly retryDelayMs: number;
    protected readonly retryMaxDelayMs: number;
    protected readonly userAgent: string;

    constructor(options: ScraperOptions = {}) {
        this.fetchFn = options.fetch ?? malFetch;
        this.maxAttempts = options.maxAttempts ?? env.SCRAPE_MAX_ATTEMPTS;
        this.retryDelayMs = options.retryDelayMs ?? env.SCRAPE_RETRY_DELAY_MS;
        this.retryMaxDelayMs = options.retryMaxDelayMs ?? env.SCRAPE_RETRY_MAX_DELAY_MS;
        this.userAgent = options.userAgent ?? env.USER_AGENT;
    }

    protected abstract buildUrl(id: number): string;
    protected abstract extract(id: number, html: string, url: string, signal?: AbortSignal): Promise<T>;

    async fetch(id: number, signal?: AbortSignal): Promise<FetchResult<T>> {
        const url = this.buildUrl(id);
        let attempts = 0;

        try {
            const html = await this.fetchPageWithRetry(url, `fetch ${url}`, signal, attempt => {
                attempts = attempt;
            });
            const record = await this.extract(id, html, url, signal).catch((e: unknown) => {
                throw e instanceof FetchError
                    ? e
                    : new FetchError(`Failed to parse ${url}: ${errorMessage(e)}`, 'parse', false, undefined, undefined, { cause: e });
            });
            return { ok: true, id, attempts, record };
        } catch (e) {
            const error = toFetchError(e, url);
            logger.warn(`Failed to scrape ${id} after ${attempts} attempt(s): ${error.message}`);
            return {
                ok: false,
                id,
                attempts,
                kind: error.kind,
                message: error.message,
                ...(error.status !== undefined ? { status: error.status } : {}),
            };
        }
    }

    protected async fetchPageWithRetry(
        url: string,
        name: string,
        signal?: AbortSignal,
        onAttempt?: (attempt: number) => void
    ): Promise<string> {
        return await retryOperation(async attempt => {
            onAttempt?.(attempt);
            return this.fetchPage(url);
        }, name, {
            retries: this.maxAttempts,
            delay: this.retryDelayMs,
            maxDelay: this.retryMaxDelayMs,
            shouldRetry: error => toFetchError(error, url).transient,
            retryAfter: error => (error instanceof FetchError ? error.retryAfterMs : undefined),
            signal,
        });
    }

    protected async fetchPage(url: string): Promise<string> {
        try {
            // Rate-limited and timed out by the fetch function
            const response = await this.fetchFn(url, { headers: { 'User-Agent': this.userAgent } });

            if (!response.ok) {
                throw FetchError.fromStatus(url, response.status, response.statusText, parseRetryAfter(response.headers.get('retry-after')));
            }

            return await response.text();
        } catch (e) {
            throw toFetchError(e, url);
        }
    }
}
