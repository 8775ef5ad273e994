export type AppStatus = 'idle' | 'scraping';

export interface HealthState {
    status: 'ok' | 'error';
    appStatus: AppStatus;
    activeRuns: number;
    lastRunStr: string | null;
    lastRunTime: number | null;
    lastError: string | null;
    uptimeSeconds: number;
}

/**
 * Tracks scrape runs for the /health endpoint.
 * Unhealthy while the most recent finished run ended with an output failure.
 */
export class HealthTracker {
    private activeRuns = 0;
    private lastRunTime: number | null = null;
    private lastError: string | null = null;
    private readonly startTime: number;

    constructor(private readonly now: () => number = Date.now) {
        this.startTime = now();
    }

    runStarted(): void {
        this.activeRuns++;
    }

    runFinished(error?: Error): void {
        this.activeRuns = Math.max(0, this.activeRuns - 1);
        this.lastRunTime = this.now();
        this.lastError = error ? error.message : null;
    }

    /**
     * Wraps a run so it is always reported as started and finished.
     */
    async track<T>(run: () => Promise<T>): Promise<T> {
        this.runStarted();
        try {
            const result = await run();
            this.runFinished();
            return result;
        } catch (e) {
            this.runFinished(e instanceof Error ? e : new Error(String(e)));
            throw e;
        }
    }

    snapshot(): HealthState {
        const now = this.now();
        return {
            status: this.lastError ? 'error' : 'ok',
            appStatus: this.activeRuns > 0 ? 'scraping' : 'idle',
            activeRuns: this.activeRuns,
            lastRunStr: this.lastRunTime ? new Date(this.lastRunTime).toISOString() : null,
            lastRunTime: this.lastRunTime,
            lastError: this.lastError,
            uptimeSeconds: Math.floor((now - this.startTime) / 1000),
        };
    }
}
