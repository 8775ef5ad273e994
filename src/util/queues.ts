import PQueue from 'p-queue';
import Bottleneck from 'bottleneck';
import logger from './logger';
import env from './env';

// ============================================================================
// BOTTLENECK: HTTP Rate Limiting
// ============================================================================

/**
 * MyAnimeList Rate Limiter
 * Every outbound page request goes through here, whichever job issued it.
 * Defaults: 1000ms between request starts, at most SCRAPE_CONCURRENCY in flight.
 */
export const malLimiter = new Bottleneck({
    maxConcurrent: env.SCRAPE_CONCURRENCY,
    minTime: env.SCRAPE_MIN_TIME_MS
});

// ============================================================================
// ERROR HANDLERS - Prevent queue hangs from unhandled rejections
// ============================================================================

malLimiter.on('error', (err: unknown) => {
    logger.error({ err }, '[MAL Limiter] Unhandled error in queue');
});

// Retry logic lives in retryOperation, not in Bottleneck
malLimiter.on('failed', (err: Error) => {
    logger.debug(`[MAL] Request failed: ${err.message}`);
    return null;
});

// ============================================================================
// P-QUEUE: Work Concurrency Control
// ============================================================================

/**
 * Queue bounding how many identifiers are processed at once within one run.
 */
export function createItemQueue(concurrency: number = env.SCRAPE_CONCURRENCY): PQueue {
    return new PQueue({ concurrency });
}

/**
 * Queue with a single slot. Tasks run strictly one after another in submission order.
 */
export function createSerialQueue(): PQueue {
    return new PQueue({ concurrency: 1 });
}

/**
 * One serial queue per key, dropped once it drains. Tasks sharing a key run one
 * after another; tasks under different keys run independently.
 */
export class KeyedSerialQueue {
    private readonly queues = new Map<string, PQueue>();

    async add<T>(key: string, task: () => Promise<T>): Promise<T> {
        let queue = this.queues.get(key);
        if (!queue) {
            queue = createSerialQueue();
            this.queues.set(key, queue);
        }

        try {
            return await queue.add(task);
        } finally {
            if (queue.size === 0 && queue.pending === 0) {
                this.queues.delete(key);
            }
        }
    }

    get activeKeys(): number {
        return this.queues.size;
    }
}

/**
 * Requests are capped by the shared limiter, whatever concurrency a run asks for.
 */
export function warnIfAboveRequestLimit(concurrency: number): void {
    if (concurrency > env.SCRAPE_CONCURRENCY) {
        logger.warn(
            `Concurrency ${concurrency} exceeds SCRAPE_CONCURRENCY=${env.SCRAPE_CONCURRENCY}; ` +
            `at most ${env.SCRAPE_CONCURRENCY} requests will be in flight`
        );
    }
}

// ============================================================================
// RATE-LIMITED FETCH
// ============================================================================

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface RateLimitedFetchOptions {
    /** Per-request timeout, counted from when the limiter lets the request start. */
    timeoutMs?: number;
    baseFetch?: FetchFn;
}

/**
 * Creates a rate-limited fetch function for scrapers.
 * All fetch calls through this will be queued through Bottleneck.
 */
export function createRateLimitedFetch(limiter: Bottleneck, serviceName: string, options: RateLimitedFetchOptions = {}): FetchFn {
    const { timeoutMs = env.SCRAPE_TIMEOUT_MS, baseFetch = (url: string, init?: RequestInit) => fetch(url, init) } = options;

    return (url: string, init?: RequestInit): Promise<Response> => {
        logger.debug(`[${serviceName}] Scheduling fetch ${url}`);
        return limiter.schedule(async () => {
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
            try {
                return await baseFetch(url, { ...init, signal: controller.signal });
            } finally {
                clearTimeout(timeoutId);
            }
        });
    };
}

// Pre-configured for the MAL scrapers
export const malFetch = createRateLimitedFetch(malLimiter, 'MAL');
