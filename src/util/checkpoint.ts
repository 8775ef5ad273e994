import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import logger from './logger';
import { errorMessage } from './errors';
import { createSerialQueue } from './queues';

const CheckpointFileSchema = z.object({
    completedIds: z.array(z.number().int().positive()).optional(),
    completed_ids: z.array(z.number().int().positive()).optional(),
});

/**
 * Tracks which MAL ids have been scraped successfully, so an interrupted run can resume.
 */
export class Checkpoint {
    private readonly completed = new Set<number>();
    private pendingSaves = 0;
    private readonly writer = createSerialQueue();

    constructor(readonly filePath: string, readonly saveInterval: number = 10) { }

    /**
     * Reads the checkpoint file. With `resume` off, any existing file is discarded.
     * An unreadable file is reported and treated as empty.
     */
    static async load(filePath: string, options: { saveInterval?: number; resume?: boolean } = {}): Promise<Checkpoint> {
        const checkpoint = new Checkpoint(filePath, options.saveInterval);

        if (options.resume === false) {
            await fs.promises.rm(filePath, { force: true });
            logger.info(`Deleted old checkpoint ${filePath} to start fresh`);
            return checkpoint;
        }

        if (!fs.existsSync(filePath)) {
            logger.info('No checkpoint file found, starting fresh');
            return checkpoint;
        }

        try {
            const parsed = CheckpointFileSchema.parse(JSON.parse(await fs.promises.readFile(filePath, 'utf8')));
            for (const id of parsed.completedIds ?? parsed.completed_ids ?? []) {
                checkpoint.completed.add(id);
            }
            logger.info(`Loaded checkpoint with ${checkpoint.completed.size} completed IDs`);
        } catch (e) {
            logger.error(`Error loading checkpoint ${filePath}, starting fresh: ${errorMessage(e)}`);
        }

        return checkpoint;
    }

    isCompleted(id: number): boolean {
        return this.completed.has(id);
    }

    /**
     * Records a success; saves once every `saveInterval` calls.
     */
    async markCompleted(id: number): Promise<void> {
        this.completed.add(id);
        this.pendingSaves++;
        if (this.pendingSaves >= this.saveInterval) {
            await this.save();
        }
    }

    get completedCount(): number {
        return this.completed.size;
    }

    async save(): Promise<void> {
        this.pendingSaves = 0;
        const snapshot = [...this.completed];
        // Saves never overlap; they share one temporary file
        await this.writer.add(async () => {
            await fs.promises.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
            const tempPath = `${this.filePath}.tmp`;
            await fs.promises.writeFile(tempPath, JSON.stringify({
                completedIds: snapshot,
                updatedAt: new Date().toISOString(),
            }));
            await fs.promises.rename(tempPath, this.filePath);
            logger.debug(`Checkpoint saved: ${snapshot.length} IDs`);
        });
    }
}
