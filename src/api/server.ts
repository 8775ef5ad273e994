import path from 'path';
import Fastify, { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RunSummary, scrapeAll } from '../orchestrator';
import { createSink, inferFormat } from '../output/sink';
import { PeopleDirectory, PeopleScraper } from '../scraper/people';
import { TargetKind, createScraper as createTargetScraper } from '../scraper/targets';
import Scraper from '../scraper/scraper.interface';
import { OutputFormat, OutputFormatSchema } from '../util/config';
import { SinkError } from '../util/errors';
import { KeyedSerialQueue } from '../util/queues';
import { HealthTracker } from './health';
import { JobRegistry } from './jobs';
import logger from '../util/logger';
import env from '../util/env';

export const DEFAULT_API_OUTPUT_PATH = 'mal_titles.jsonl';
export const DEFAULT_PEOPLE_OUTPUT_PATH = 'mal_people.jsonl';

const IdSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);

const outputPathSchema = (fallback: string) => z.string().min(1)
    .refine(p => !path.isAbsolute(p) && !p.split(/[\\/]/).includes('..'), {
        message: 'output_path must be a relative path inside the output directory',
    })
    .default(fallback);

const ScrapeRequestSchema = z.object({
    mal_ids: z.array(IdSchema).min(1),
    output_path: outputPathSchema(DEFAULT_API_OUTPUT_PATH),
    format: OutputFormatSchema.optional(),
});

const PeopleRequestSchema = z.object({
    /** Omitted: crawl the people directory. */
    people_ids: z.array(IdSchema).min(1).optional(),
    letters: z.array(z.string().regex(/^[A-Za-z]$/).transform(letter => letter.toUpperCase())).min(1).optional(),
    output_path: outputPathSchema(DEFAULT_PEOPLE_OUTPUT_PATH),
    format: OutputFormatSchema.optional(),
});

export type ScrapeRequest = z.infer<typeof ScrapeRequestSchema>;
export type PeopleRequest = z.infer<typeof PeopleRequestSchema>;

interface ScrapeTarget {
    kind: TargetKind;
    /** Null for a people directory crawl. */
    ids: number[] | null;
    letters?: string[];
    outputPath: string;
    format?: OutputFormat;
}

export interface ServerDependencies {
    createScraper?: (kind: TargetKind) => Scraper<object>;
    createPeopleDirectory?: () => PeopleDirectory;
    health?: HealthTracker;
    jobs?: JobRegistry;
    concurrency?: number;
    /** Directory that request output paths are resolved against. Defaults to $OUTPUT_DIR. */
    outputDir?: string;
}

/**
 * HTTP front for the scraper:
 *   GET  /health          run status
 *   POST /scrape-anime    scrape and respond when the output is written
 *   POST /scrape-people   queue a people scrape, respond with a job id
 *   POST /jobs            queue an anime scrape, respond with a job id
 *   GET  /jobs/:jobId     job status
 *
 * Runs append to their output file. Runs that share a file take turns.
 */
export function buildServer(deps: ServerDependencies = {}): FastifyInstance {
    const health = deps.health ?? new HealthTracker();
    const jobs = deps.jobs ?? new JobRegistry();
    const concurrency = deps.concurrency ?? env.SCRAPE_CONCURRENCY;
    const createScraper = deps.createScraper ?? createTargetScraper;
    const createPeopleDirectory = deps.createPeopleDirectory ?? (() => new PeopleScraper());
    const outputDir = path.resolve(deps.outputDir ?? path.resolve(process.cwd(), env.OUTPUT_DIR));
    const outputs = new KeyedSerialQueue();

    const runScrape = (target: ScrapeTarget, jobId?: string): Promise<RunSummary> => {
        const outputPath = path.resolve(outputDir, target.outputPath);

        return health.track(async () => {
            const ids = target.ids ?? await createPeopleDirectory().listPeopleIds(target.letters);
            return outputs.add(outputPath, () => scrapeAll(ids, {
                scraper: createScraper(target.kind),
                sink: createSink(outputPath, target.format ?? inferFormat(outputPath), 'append'),
                concurrency,
                jobId,
            }));
        });
    };

    const app = Fastify({ logger: false });

    app.get('/health', async (_request, reply) => {
        const state = health.snapshot();
        return reply.status(state.status === 'ok' ? 200 : 500).send(state);
    });

    app.post('/scrape-anime', async (request, reply) => {
        const parsed = ScrapeRequestSchema.safeParse(request.body);
        if (!parsed.success) {
            return reply.status(400).send({ error: 'Invalid request', issues: parsed.error.issues });
        }

        try {
            const summary = await runScrape({
                kind: 'anime',
                ids: parsed.data.mal_ids,
                outputPath: parsed.data.output_path,
                format: parsed.data.format,
            });
            return reply.send({
                message: 'Anime scraping completed',
                output_path: parsed.data.output_path,
                summary,
            });
        } catch (e) {
            if (e instanceof SinkError) {
                return reply.status(500).send({ error: e.message });
            }
            throw e;
        }
    });

    app.post('/scrape-people', async (request, reply) => {
        const parsed = PeopleRequestSchema.safeParse(request.body);
        if (!parsed.success) {
            return reply.status(400).send({ error: 'Invalid request', issues: parsed.error.issues });
        }

        const { people_ids, letters, output_path, format } = parsed.data;
        const job = jobs.submit(
            { kind: 'people', ids: people_ids ?? [], outputPath: output_path },
            queued => runScrape({ kind: 'people', ids: people_ids ?? null, letters, outputPath: output_path, format }, queued.jobId)
        );
        logger.info(people_ids
            ? `Queued job ${job.jobId} for ${people_ids.length} people`
            : `Queued job ${job.jobId} to crawl the people directory`);
        return reply.status(202).send({
            message: 'People scraping started',
            jobId: job.jobId,
            status: job.status,
            output_path: job.outputPath,
        });
    });

    app.post('/jobs', async (request, reply) => {
        const parsed = ScrapeRequestSchema.safeParse(request.body);
        if (!parsed.success) {
            return reply.status(400).send({ error: 'Invalid request', issues: parsed.error.issues });
        }

        const { mal_ids, output_path, format } = parsed.data;
        const job = jobs.submit(
            { kind: 'anime', ids: mal_ids, outputPath: output_path },
            queued => runScrape({ kind: 'anime', ids: mal_ids, outputPath: output_path, format }, queued.jobId)
        );
        logger.info(`Queued job ${job.jobId} for ${mal_ids.length} MAL IDs`);
        return reply.status(202).send({ jobId: job.jobId, status: job.status, output_path: job.outputPath });
    });

    app.get<{ Params: { jobId: string } }>('/jobs/:jobId', async (request, reply) => {
        const job = jobs.get(request.params.jobId);
        if (!job) {
            return reply.status(404).send({ error: `Unknown job ${request.params.jobId}` });
        }
        return reply.send(job);
    });

    app.setErrorHandler((error, _request, reply) => {
        const statusCode = error.statusCode ?? 500;
        if (statusCode >= 500) {
            logger.error({ err: error }, 'Request failed');
        }
        return reply.status(statusCode).send({ error: error.message });
    });

    return app;
}
