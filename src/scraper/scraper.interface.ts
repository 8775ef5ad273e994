import { FetchErrorKind } from '../util/errors';

export interface FetchSuccess<T> {
    ok: true;
    id: number;
    attempts: number;
    record: T;
}

export interface FetchFailure {
    ok: false;
    id: number;
    attempts: number;
    kind: FetchErrorKind;
    message: string;
    status?: number;
}

export type FetchResult<T> = FetchSuccess<T> | FetchFailure;

interface Scraper<T> {
    /**
     * Retrieves and parses one entity by its MAL id.
     *
     * Transient failures are retried up to the configured attempt limit; the
     * outcome is always returned as a value, never thrown.
     *
     * @param signal once aborted, no further retries are started
     */
    fetch(id: number, signal?: AbortSignal): Promise<FetchResult<T>>;
}

export default Scraper;
export type { Scraper };
