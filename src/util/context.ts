import { AsyncLocalStorage } from 'async_hooks';

interface JobContext {
    jobId?: string;
    malId?: number;
}

const jobContext = new AsyncLocalStorage<JobContext>();

export function getJobContext(): JobContext {
    return jobContext.getStore() ?? {};
}

/**
 * Runs `callback` with the given ids attached to every log line written inside it.
 * Ids already set by an enclosing context are kept unless overridden.
 */
export function runWithJobContext<T>(context: JobContext, callback: () => T): T {
    return jobContext.run({ ...getJobContext(), ...context }, callback);
}
