import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { OutputRecord } from './record';
import { OutputFormat } from '../util/config';
import { SinkError, errorMessage } from '../util/errors';
import { createSerialQueue } from '../util/queues';
import logger from '../util/logger';

export interface ResultSink {
    readonly path: string;
    readonly format: OutputFormat;
    /**
     * Persist one record. `index` is the identifier's position in the input,
     * used by formats that write in input order.
     */
    write(record: OutputRecord, index: number): Promise<void>;
    /** Flush whatever is buffered and release the file. Idempotent. */
    close(): Promise<void>;
}

/**
 * Single-writer base: every write and the final close run one at a time in
 * submission order. After the first I/O failure every call rejects with it.
 */
abstract class FileSink implements ResultSink {
    abstract readonly format: OutputFormat;
    private readonly writer = createSerialQueue();
    private failure: SinkError | null = null;
    private closing: Promise<void> | null = null;

    constructor(readonly path: string) { }

    write(record: OutputRecord, index: number): Promise<void> {
        if (this.failure) return Promise.reject(this.failure);
        if (this.closing) return Promise.reject(new SinkError(`Output ${this.path} is already closed`));
        return this.enqueue(() => this.append(record, index));
    }

    close(): Promise<void> {
        if (!this.closing) {
            this.closing = this.enqueue(() => this.finish());
        }
        return this.closing;
    }

    protected abstract append(record: OutputRecord, index: number): Promise<void>;
    protected abstract finish(): Promise<void>;

    protected async ensureDirectory(): Promise<void> {
        await fs.promises.mkdir(path.dirname(path.resolve(this.path)), { recursive: true });
    }

    private enqueue(task: () => Promise<void>): Promise<void> {
        return this.writer.add(async () => {
            if (this.failure) throw this.failure;
            try {
                await task();
            } catch (e) {
                this.failure = e instanceof SinkError
                    ? e
                    : new SinkError(`Failed to write ${this.path}: ${errorMessage(e)}`, { cause: e });
                logger.error({ err: e }, `Output ${this.path} failed`);
                throw this.failure;
            }
        });
    }
}

export type WriteMode = 'truncate' | 'append';

/**
 * One compact JSON object per line, synced to disk after every record.
 * Any prefix of complete lines is a valid partial result.
 */
export class JsonLinesSink extends FileSink {
    readonly format = 'jsonl';
    private handle: FileHandle | null = null;

    constructor(filePath: string, private readonly mode: WriteMode = 'truncate') {
        super(filePath);
    }

    private async open(): Promise<FileHandle> {
        if (!this.handle) {
            await this.ensureDirectory();
            this.handle = await fs.promises.open(this.path, this.mode === 'append' ? 'a' : 'w');
        }
        return this.handle;
    }

    protected async append(record: OutputRecord): Promise<void> {
        const handle = await this.open();
        await handle.write(JSON.stringify(record) + '\n');
        await handle.datasync();
    }

    protected async finish(): Promise<void> {
        const handle = await this.open();
        this.handle = null;
        await handle.close();
        logger.debug(`Closed ${this.path}`);
    }
}

/**
 * A single JSON array, written in input order once the run is over.
 * Replaces the target atomically through a temporary file. In append mode the
 * records of an existing array come first.
 */
export class JsonArraySink extends FileSink {
    readonly format = 'json';
    private readonly buffered: Array<{ index: number; record: OutputRecord }> = [];

    constructor(filePath: string, private readonly mode: WriteMode = 'truncate') {
        super(filePath);
    }

    protected async append(record: OutputRecord, index: number): Promise<void> {
        this.buffered.push({ index, record });
    }

    protected async finish(): Promise<void> {
        await this.ensureDirectory();
        const records = [...this.buffered].sort((a, b) => a.index - b.index).map(entry => entry.record);
        const existing = this.mode === 'append' ? await this.readExisting() : [];
        const tempPath = `${this.path}.tmp`;
        await fs.promises.writeFile(tempPath, JSON.stringify([...existing, ...records], null, 2) + '\n', 'utf8');
        await fs.promises.rename(tempPath, this.path);
        logger.debug(`Wrote ${records.length} records to ${this.path}`);
    }

    private async readExisting(): Promise<unknown[]> {
        if (!fs.existsSync(this.path)) return [];

        const content = (await fs.promises.readFile(this.path, 'utf8')).trim();
        if (!content) return [];

        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (e) {
            throw new SinkError(`Cannot append to ${this.path}: ${errorMessage(e)}`, { cause: e });
        }
        if (!Array.isArray(parsed)) {
            throw new SinkError(`Cannot append to ${this.path}: it does not hold a JSON array`);
        }
        return parsed;
    }
}

export function inferFormat(filePath: string): OutputFormat {
    return path.extname(filePath).toLowerCase() === '.json' ? 'json' : 'jsonl';
}

export function createSink(filePath: string, format: OutputFormat = inferFormat(filePath), mode: WriteMode = 'truncate'): ResultSink {
    return format === 'json' ? new JsonArraySink(filePath, mode) : new JsonLinesSink(filePath, mode);
}
