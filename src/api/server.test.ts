import fs from 'fs';
import os from 'os';
import path from 'path';
import { FastifyInstance } from 'fastify';
import { buildServer } from './server';
import { HealthTracker } from './health';
import { JobRegistry } from './jobs';
import { FakePeopleDirectory, FakeScraper } from '../../tests/fakes';
import env from '../util/env';

jest.mock('../util/logger', () => ({
    __esModule: true,
    default: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

describe('HTTP service', () => {
    let dir: string;
    let app: FastifyInstance;
    let jobs: JobRegistry;
    let directory: FakePeopleDirectory;

    const readLines = (relative: string) =>
        fs.readFileSync(path.join(dir, relative), 'utf8').trimEnd().split('\n').map(line => JSON.parse(line));

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'server-'));
        jobs = new JobRegistry();
        directory = new FakePeopleDirectory([7001, 7002, 7003]);
        app = buildServer({
            createScraper: () => new FakeScraper([999999999]),
            createPeopleDirectory: () => directory,
            health: new HealthTracker(),
            jobs,
            concurrency: 2,
            outputDir: dir,
        });
    });

    afterEach(async () => {
        await app.close();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('GET /health', () => {
        it('should report an idle, healthy service', async () => {
            const response = await app.inject({ method: 'GET', url: '/health' });

            expect(response.statusCode).toBe(200);
            expect(response.json()).toMatchObject({ status: 'ok', appStatus: 'idle', lastError: null });
        });
    });

    describe('POST /scrape-anime', () => {
        it('should scrape the ids into the default output file', async () => {
            const response = await app.inject({
                method: 'POST',
                url: '/scrape-anime',
                payload: { mal_ids: [52034, 58259] },
            });

            expect(response.statusCode).toBe(200);
            expect(response.json()).toMatchObject({
                message: 'Anime scraping completed',
                output_path: 'mal_titles.jsonl',
                summary: { requested: 2, written: 2, succeeded: 2, failed: 0 },
            });
            const malIds = readLines('mal_titles.jsonl').map(record => record.malId).sort();
            expect(malIds).toEqual([52034, 58259]);
        });

        it('should count every requested id, duplicates included', async () => {
            const response = await app.inject({
                method: 'POST',
                url: '/scrape-anime',
                payload: { mal_ids: [1, 1, 2], output_path: 'dupes.jsonl' },
            });

            expect(response.json().summary).toMatchObject({ requested: 3, written: 2, succeeded: 2 });
            expect(readLines('dupes.jsonl').map(record => record.malId).sort()).toEqual([1, 2]);
        });

        it('should append a later run to an existing output file', async () => {
            await app.inject({ method: 'POST', url: '/scrape-anime', payload: { mal_ids: [1], output_path: 'again.jsonl' } });
            await app.inject({ method: 'POST', url: '/scrape-anime', payload: { mal_ids: [2], output_path: 'again.jsonl' } });

            expect(readLines('again.jsonl').map(record => record.malId)).toEqual([1, 2]);
        });

        it('should keep every record when concurrent runs share an output file', async () => {
            const [first, second] = await Promise.all([
                app.inject({ method: 'POST', url: '/scrape-anime', payload: { mal_ids: [1, 2, 3], output_path: 'shared.jsonl' } }),
                app.inject({ method: 'POST', url: '/scrape-anime', payload: { mal_ids: [100000, 200000, 300000], output_path: 'shared.jsonl' } }),
            ]);

            expect(first.statusCode).toBe(200);
            expect(second.statusCode).toBe(200);
            const malIds = readLines('shared.jsonl').map(record => record.malId).sort((a, b) => a - b);
            expect(malIds).toEqual([1, 2, 3, 100000, 200000, 300000]);
        });

        it('should write failure records for missing ids', async () => {
            const response = await app.inject({
                method: 'POST',
                url: '/scrape-anime',
                payload: { mal_ids: [999999999], output_path: 'runs/missing.jsonl' },
            });

            expect(response.statusCode).toBe(200);
            expect(response.json().summary.failedIds).toEqual([999999999]);
            expect(readLines('runs/missing.jsonl')).toEqual([{
                status: 'failed',
                malId: 999999999,
                error: { kind: 'not_found', message: 'Not found: 999999999', attempts: 1, httpStatus: 404 },
            }]);
        });

        it('should write a JSON array when asked', async () => {
            const response = await app.inject({
                method: 'POST',
                url: '/scrape-anime',
                payload: { mal_ids: [3, 1, 2], output_path: 'out.json' },
            });

            expect(response.statusCode).toBe(200);
            const records = JSON.parse(fs.readFileSync(path.join(dir, 'out.json'), 'utf8'));
            expect(records.map((record: { malId: number }) => record.malId)).toEqual([3, 1, 2]);
        });

        it.each([
            [{}],
            [{ mal_ids: [] }],
            [{ mal_ids: ['52034'] }],
            [{ mal_ids: [0] }],
            [{ mal_ids: [1], output_path: '../escape.jsonl' }],
            [{ mal_ids: [1], output_path: '/tmp/abs.jsonl' }],
            [{ mal_ids: [1], format: 'csv' }],
        ])('should reject %j', async payload => {
            const response = await app.inject({ method: 'POST', url: '/scrape-anime', payload });

            expect(response.statusCode).toBe(400);
            expect(response.json().error).toBe('Invalid request');
        });

        it('should reject a malformed body', async () => {
            const response = await app.inject({
                method: 'POST',
                url: '/scrape-anime',
                headers: { 'content-type': 'application/json' },
                payload: '{"mal_ids": [1',
            });

            expect(response.statusCode).toBe(400);
        });

        it('should fail with 500 and turn unhealthy when the output cannot be written', async () => {
            fs.writeFileSync(path.join(dir, 'blocker'), 'not a directory');

            const response = await app.inject({
                method: 'POST',
                url: '/scrape-anime',
                payload: { mal_ids: [1], output_path: 'blocker/out.jsonl' },
            });

            expect(response.statusCode).toBe(500);
            expect(response.json().error).toMatch(/^Failed to write /);

            const health = await app.inject({ method: 'GET', url: '/health' });
            expect(health.statusCode).toBe(500);
            expect(health.json().status).toBe('error');
        });
    });

    describe('POST /scrape-people', () => {
        it('should queue a scrape of the given people', async () => {
            const submitted = await app.inject({
                method: 'POST',
                url: '/scrape-people',
                payload: { people_ids: [7001, 7002] },
            });

            expect(submitted.statusCode).toBe(202);
            expect(submitted.json()).toMatchObject({ message: 'People scraping started', output_path: 'mal_people.jsonl' });

            const finished = await jobs.wait(submitted.json().jobId);
            expect(finished).toMatchObject({ status: 'completed', kind: 'people', ids: [7001, 7002] });
            expect(readLines('mal_people.jsonl').map(record => record.malId).sort()).toEqual([7001, 7002]);
            expect(directory.requests).toEqual([]);
        });

        it('should crawl the people directory when no ids are given', async () => {
            const submitted = await app.inject({
                method: 'POST',
                url: '/scrape-people',
                payload: { letters: ['a', 'B'], output_path: 'people/crawl.jsonl' },
            });

            const finished = await jobs.wait(submitted.json().jobId);

            expect(directory.requests).toEqual([['A', 'B']]);
            expect(finished?.summary).toMatchObject({ requested: 3, written: 3 });
            expect(readLines('people/crawl.jsonl')).toHaveLength(3);
        });

        it.each([
            [{ people_ids: [] }],
            [{ people_ids: [-1] }],
            [{ letters: ['AB'] }],
            [{ letters: [] }],
            [{ output_path: '../people.jsonl' }],
        ])('should reject %j', async payload => {
            const response = await app.inject({ method: 'POST', url: '/scrape-people', payload });

            expect(response.statusCode).toBe(400);
        });
    });

    describe('output directory', () => {
        it('should confine output paths to $OUTPUT_DIR below the working directory by default', async () => {
            const cwd = jest.spyOn(process, 'cwd').mockReturnValue(dir);
            const confined = buildServer({ createScraper: () => new FakeScraper(), jobs: new JobRegistry() });

            try {
                const response = await confined.inject({
                    method: 'POST',
                    url: '/scrape-anime',
                    payload: { mal_ids: [1], output_path: 'package.json' },
                });

                expect(response.statusCode).toBe(200);
                expect(fs.existsSync(path.join(dir, 'package.json'))).toBe(false);
                const written = JSON.parse(fs.readFileSync(path.join(dir, env.OUTPUT_DIR, 'package.json'), 'utf8'));
                expect(written.map((record: { malId: number }) => record.malId)).toEqual([1]);
            } finally {
                cwd.mockRestore();
                await confined.close();
            }
        });
    });

    describe('jobs', () => {
        it('should accept a job and report it once finished', async () => {
            const submitted = await app.inject({
                method: 'POST',
                url: '/jobs',
                payload: { mal_ids: [52034], output_path: 'jobs/one.jsonl' },
            });

            expect(submitted.statusCode).toBe(202);
            const { jobId, status, output_path } = submitted.json();
            expect(['queued', 'running']).toContain(status);
            expect(output_path).toBe('jobs/one.jsonl');

            await jobs.wait(jobId);

            const polled = await app.inject({ method: 'GET', url: `/jobs/${jobId}` });
            expect(polled.statusCode).toBe(200);
            expect(polled.json()).toMatchObject({
                jobId,
                status: 'completed',
                kind: 'anime',
                ids: [52034],
                summary: { written: 1, succeeded: 1 },
            });
            expect(readLines('jobs/one.jsonl')).toHaveLength(1);
        });

        it('should validate job requests', async () => {
            const response = await app.inject({ method: 'POST', url: '/jobs', payload: { mal_ids: 'all' } });

            expect(response.statusCode).toBe(400);
        });

        it('should return 404 for an unknown job', async () => {
            const response = await app.inject({ method: 'GET', url: '/jobs/nope' });

            expect(response.statusCode).toBe(404);
            expect(response.json()).toEqual({ error: 'Unknown job nope' });
        });
    });
});
