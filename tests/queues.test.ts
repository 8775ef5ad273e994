// Mock the dependencies BEFORE import
jest.mock('p-queue', () => {
    return jest.fn().mockImplementation((options) => {
        return { concurrency: options?.concurrency || 1, add: jest.fn() };
    });
});

jest.mock('bottleneck', () => {
    return jest.fn().mockImplementation((options) => {
        return {
            maxConcurrent: options?.maxConcurrent,
            minTime: options?.minTime,
            on: jest.fn(),
            schedule: jest.fn((job: () => Promise<unknown>) => job()),
        };
    });
});

jest.mock('../src/util/logger', () => ({
    __esModule: true,
    default: {
        debug: jest.fn(),
        error: jest.fn(),
    },
}));

// Import AFTER mocking
import { createItemQueue, createRateLimitedFetch, createSerialQueue, malLimiter } from '../src/util/queues';
import PQueue from 'p-queue';
import Bottleneck from 'bottleneck';

describe('Global Queue Configuration', () => {

    describe('malLimiter (Bottleneck)', () => {
        it('should space requests by the configured defaults', () => {
            expect(Bottleneck).toHaveBeenCalledWith({ maxConcurrent: 3, minTime: 1000 });
        });

        it('should register error handlers so failures never hang the queue', () => {
            expect(malLimiter.on).toHaveBeenCalledWith('error', expect.any(Function));
            expect(malLimiter.on).toHaveBeenCalledWith('failed', expect.any(Function));
        });
    });

    describe('item queues (P-Queue)', () => {
        it('should bound a run by the requested concurrency', () => {
            const queue = createItemQueue(5);
            expect(PQueue).toHaveBeenLastCalledWith({ concurrency: 5 });
            expect(queue.concurrency).toBe(5);
        });

        it('should default to the configured concurrency', () => {
            createItemQueue();
            expect(PQueue).toHaveBeenLastCalledWith({ concurrency: 3 });
        });

        it('should make single-slot writer queues', () => {
            expect(createSerialQueue().concurrency).toBe(1);
        });
    });

    describe('createRateLimitedFetch', () => {
        it('should schedule every request through the limiter', async () => {
            const limiter = new Bottleneck();
            const baseFetch = jest.fn(async () => new Response('page'));
            const rateLimited = createRateLimitedFetch(limiter, 'Test', { baseFetch, timeoutMs: 1000 });

            const response = await rateLimited('https://myanimelist.net/anime/1', { headers: { 'User-Agent': 'test-agent' } });

            expect(await response.text()).toBe('page');
            expect(limiter.schedule).toHaveBeenCalledTimes(1);
            expect(baseFetch).toHaveBeenCalledWith('https://myanimelist.net/anime/1', {
                headers: { 'User-Agent': 'test-agent' },
                signal: expect.any(AbortSignal),
            });
        });

        it('should abort a request that outlives the timeout', async () => {
            const limiter = new Bottleneck();
            const baseFetch = jest.fn((_url: string, init?: RequestInit) => new Promise<Response>((_resolve, reject) => {
                init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
            }));
            const rateLimited = createRateLimitedFetch(limiter, 'Test', { baseFetch, timeoutMs: 10 });

            await expect(rateLimited('https://myanimelist.net/anime/2')).rejects.toThrow('aborted');
        });
    });
});
