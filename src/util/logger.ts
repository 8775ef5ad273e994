import pino from 'pino';
import env from './env';

import { getJobContext } from './context';

const pinoLogger = pino({
    level: env.LOG_LEVEL,
    // pino-pretty runs in a worker thread; keep test runs free of it
    transport: env.NODE_ENV === 'test' ? undefined : {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    }
});

type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface Logger {
    trace(msg: string, ...args: unknown[]): void;
    trace(obj: object, msg?: string, ...args: unknown[]): void;
    debug(msg: string, ...args: unknown[]): void;
    debug(obj: object, msg?: string, ...args: unknown[]): void;
    info(msg: string, ...args: unknown[]): void;
    info(obj: object, msg?: string, ...args: unknown[]): void;
    warn(msg: string, ...args: unknown[]): void;
    warn(obj: object, msg?: string, ...args: unknown[]): void;
    error(msg: string, ...args: unknown[]): void;
    error(obj: object, msg?: string, ...args: unknown[]): void;
    fatal(msg: string, ...args: unknown[]): void;
    fatal(obj: object, msg?: string, ...args: unknown[]): void;
}

/**
 * Adds the current job and MAL ids (if any) as bindings on the log line.
 */
function wrapLogMethod(level: Level) {
    return (msgOrObj: string | object, ...args: unknown[]): void => {
        const { jobId, malId } = getJobContext();
        const bindings = {
            ...(jobId !== undefined ? { jobId } : {}),
            ...(malId !== undefined ? { malId } : {}),
        };

        if (typeof msgOrObj === 'string') {
            pinoLogger[level](bindings, msgOrObj, ...args);
            return;
        }

        const [msg, ...rest] = args;
        pinoLogger[level]({ ...msgOrObj, ...bindings }, typeof msg === 'string' ? msg : undefined, ...rest);
    };
}

const logger: Logger = {
    trace: wrapLogMethod('trace'),
    debug: wrapLogMethod('debug'),
    info: wrapLogMethod('info'),
    warn: wrapLogMethod('warn'),
    error: wrapLogMethod('error'),
    fatal: wrapLogMethod('fatal'),
};

export default logger;
