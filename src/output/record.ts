import { FetchResult } from '../scraper/scraper.interface';
import { FetchErrorKind } from '../util/errors';

/**
 * A scraped record tagged with its outcome. `malId` is the anime or person id.
 */
export type SuccessRecord<T extends object = object> = T & {
    status: 'ok';
    malId: number;
};

export interface FailureRecord {
    status: 'failed';
    malId: number;
    error: {
        kind: FetchErrorKind;
        message: string;
        attempts: number;
        httpStatus?: number;
    };
}

export type OutputRecord<T extends object = object> = SuccessRecord<T> | FailureRecord;

export function toOutputRecord<T extends object>(result: FetchResult<T>): OutputRecord<T> {
    if (result.ok) {
        return { status: 'ok' as const, malId: result.id, ...result.record };
    }

    return {
        status: 'failed',
        malId: result.id,
        error: {
            kind: result.kind,
            message: result.message,
            attempts: result.attempts,
            ...(result.status !== undefined ? { httpStatus: result.status } : {}),
        },
    };
}
