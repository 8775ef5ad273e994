import { randomUUID } from 'crypto';
import PQueue from 'p-queue';
import { RunSummary } from '../orchestrator';
import { TargetKind } from '../scraper/targets';
import { createSerialQueue } from '../util/queues';
import { errorMessage } from '../util/errors';
import logger from '../util/logger';

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed';

export interface Job {
    jobId: string;
    status: JobStatus;
    kind: TargetKind;
    /** Requested ids; empty for a people directory crawl. */
    ids: number[];
    outputPath: string;
    createdAt: string;
    startedAt?: string;
    finishedAt?: string;
    summary?: RunSummary;
    error?: string;
}

export type JobRunner = (job: Job) => Promise<RunSummary>;

export interface JobRequest {
    kind: TargetKind;
    ids: number[];
    outputPath: string;
}

/**
 * In-memory background jobs, executed one at a time in submission order.
 * Finished jobs beyond `retain` are forgotten, oldest first.
 */
export class JobRegistry {
    private readonly jobs = new Map<string, Job>();
    private readonly settled = new Map<string, Promise<void>>();

    constructor(
        private readonly queue: PQueue = createSerialQueue(),
        private readonly retain: number = 100
    ) { }

    submit(request: JobRequest, runner: JobRunner): Job {
        const job: Job = {
            jobId: randomUUID(),
            status: 'queued',
            ...request,
            createdAt: new Date().toISOString(),
        };
        this.jobs.set(job.jobId, job);

        const done = this.queue.add(async () => {
            job.status = 'running';
            job.startedAt = new Date().toISOString();
            try {
                job.summary = await runner(job);
                job.status = 'completed';
            } catch (e) {
                job.status = 'failed';
                job.error = errorMessage(e);
                logger.error({ err: e, jobId: job.jobId }, 'Background job failed');
            } finally {
                job.finishedAt = new Date().toISOString();
                this.settled.delete(job.jobId);
                this.prune();
            }
        });
        this.settled.set(job.jobId, done);

        return job;
    }

    get(jobId: string): Job | undefined {
        return this.jobs.get(jobId);
    }

    /** Resolves once the job has finished, successfully or not. */
    async wait(jobId: string): Promise<Job | undefined> {
        await this.settled.get(jobId);
        return this.jobs.get(jobId);
    }

    async idle(): Promise<void> {
        await this.queue.onIdle();
    }

    private prune(): void {
        const finished = [...this.jobs.values()].filter(job => job.status === 'completed' || job.status === 'failed');
        for (const job of finished.slice(0, Math.max(0, finished.length - this.retain))) {
            this.jobs.delete(job.jobId);
        }
    }
}
