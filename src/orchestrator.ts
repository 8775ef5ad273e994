import { randomUUID } from 'crypto';
import Scraper, { FetchResult } from './scraper/scraper.interface';
import { ResultSink } from './output/sink';
import { toOutputRecord } from './output/record';
import { Checkpoint } from './util/checkpoint';
import { createItemQueue } from './util/queues';
import { runWithJobContext } from './util/context';
import { SinkError, errorMessage } from './util/errors';
import logger from './util/logger';

export interface ScrapeOptions {
    scraper: Scraper<object>;
    sink: ResultSink;
    /** Identifiers fetched at once. */
    concurrency: number;
    /** Stops new fetches once aborted; fetches already started still get written. */
    signal?: AbortSignal;
    checkpoint?: Checkpoint;
    /** Tag for log lines; one is generated when omitted. */
    jobId?: string;
}

export interface RunSummary {
    requested: number;
    written: number;
    succeeded: number;
    failed: number;
    skipped: number;
    cancelled: number;
    failedIds: number[];
}

function toSinkError(error: unknown): SinkError {
    return error instanceof SinkError ? error : new SinkError(errorMessage(error), { cause: error });
}

async function fetchOne<T extends object>(scraper: Scraper<T>, id: number, signal?: AbortSignal): Promise<FetchResult<T>> {
    try {
        return await scraper.fetch(id, signal);
    } catch (e) {
        // Scrapers report failures as values; anything thrown is unexpected
        logger.error({ err: e }, `Scraper threw for ID ${id}`);
        return { ok: false, id, attempts: 0, kind: 'network', message: errorMessage(e) };
    }
}

/**
 * Fetches every id with at most `concurrency` in flight and writes each
 * result as soon as it arrives. Fetch failures become failure records; an
 * output failure stops the run and is rethrown once started fetches settle.
 * The sink is closed before returning, in both cases.
 */
export async function scrapeAll(ids: number[], options: ScrapeOptions): Promise<RunSummary> {
    const { scraper, sink, concurrency, signal, checkpoint } = options;
    const jobId = options.jobId ?? randomUUID().slice(0, 8);
    const queue = createItemQueue(concurrency);

    const summary: RunSummary = {
        requested: ids.length,
        written: 0,
        succeeded: 0,
        failed: 0,
        skipped: 0,
        cancelled: 0,
        failedIds: [],
    };
    let sinkFailure: SinkError | null = null;

    // A checkpoint that cannot be saved costs a re-fetch on resume, not the run
    const markCompleted = async (id: number): Promise<void> => {
        try {
            await checkpoint?.markCompleted(id);
        } catch (e) {
            logger.error({ err: e }, `[${jobId}] Failed to save checkpoint after ID ${id}`);
        }
    };

    const processId = async (id: number, index: number): Promise<void> => {
        // Queued work left after a stop settles here without fetching
        if (sinkFailure || signal?.aborted) {
            summary.cancelled++;
            return;
        }

        const result = await fetchOne(scraper, id, signal);
        try {
            await sink.write(toOutputRecord(result), index);
        } catch (e) {
            sinkFailure ??= toSinkError(e);
            return;
        }

        summary.written++;
        if (result.ok) {
            summary.succeeded++;
            await markCompleted(id);
        } else {
            summary.failed++;
            summary.failedIds.push(id);
        }
    };

    logger.info(`[${jobId}] Scraping ${ids.length} IDs with concurrency ${concurrency}`);

    const seen = new Set<number>();
    const tasks: Array<Promise<void>> = [];
    ids.forEach((id, index) => {
        if (seen.has(id)) return;
        seen.add(id);

        if (checkpoint?.isCompleted(id)) {
            logger.debug(`[${jobId}] Skipping already processed ID ${id}`);
            summary.skipped++;
            return;
        }

        tasks.push(queue.add(() => runWithJobContext({ jobId, malId: id }, () => processId(id, index))));
    });

    try {
        await Promise.all(tasks);
    } finally {
        try {
            await sink.close();
        } catch (e) {
            sinkFailure ??= toSinkError(e);
        }
        try {
            await checkpoint?.save();
        } catch (e) {
            logger.error({ err: e }, `[${jobId}] Failed to save checkpoint`);
        }
    }

    if (sinkFailure) {
        logger.error(`[${jobId}] Aborted: ${sinkFailure.message}`);
        throw sinkFailure;
    }

    if (summary.cancelled > 0) {
        logger.warn(`[${jobId}] Interrupted: ${summary.cancelled} IDs were not fetched`);
    }
    logger.info(
        `[${jobId}] Done: ${summary.succeeded} succeeded, ${summary.failed} failed, ` +
        `${summary.skipped} skipped -> ${sink.path}`
    );
    return summary;
}
