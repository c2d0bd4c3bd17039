import { readFile, rename, rm } from 'fs/promises';
import { isMissingFileError, writeFileAtomic } from '../lib/atomic-file';
import type { RenameFn } from '../lib/atomic-file';
import { serviceLoggers } from '../lib/logger';
import { CheckpointCorruptError } from '../lib/sync-errors';
import { checkpointDocumentSchema } from '../types/checkpoint';
import type { CheckpointDocument } from '../types/checkpoint';

const log = serviceLoggers.checkpoint;

export interface CheckpointStoreOptions {
    inputPath: string;
    outputPath: string;
    rename?: RenameFn;
}

export interface LoadedCheckpoint {
    document: CheckpointDocument;
    // True when an interrupted job's <output>.part was picked up
    resumed: boolean;
}

export async function readCheckpointFile(path: string): Promise<CheckpointDocument> {
    const raw = await readFile(path, 'utf8');
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new CheckpointCorruptError(path, { cause: error });
    }

    const result = checkpointDocumentSchema.safeParse(parsed);
    if (!result.success) {
        throw new CheckpointCorruptError(path, { cause: result.error });
    }
    return result.data;
}

export class CheckpointStore {
    readonly inputPath: string;
    readonly outputPath: string;
    private readonly rename: RenameFn | undefined;

    constructor(options: CheckpointStoreOptions) {
        this.inputPath = options.inputPath;
        this.outputPath = options.outputPath;
        this.rename = options.rename;
    }

    get partPath(): string {
        return `${this.outputPath}.part`;
    }

    async load(options: { fresh?: boolean } = {}): Promise<LoadedCheckpoint> {
        if (options.fresh) {
            await rm(this.partPath, { force: true });
        } else {
            try {
                const document = await readCheckpointFile(this.partPath);
                log.info({ path: this.partPath }, 'Resuming from checkpoint');
                return { document, resumed: true };
            } catch (error) {
                if (!isMissingFileError(error)) {
                    throw error;
                }
            }
        }

        const document = await readCheckpointFile(this.inputPath);
        log.info({ path: this.inputPath, playlists: document.playlists.length }, 'Loaded job document');
        return { document, resumed: false };
    }

    async save(document: CheckpointDocument): Promise<void> {
        await writeFileAtomic(this.partPath, serialize(document), { rename: this.rename });
    }

    async finalize(document: CheckpointDocument): Promise<void> {
        await this.save(document);
        await rename(this.partPath, this.outputPath);
        log.info({ path: this.outputPath }, 'Checkpoint finalized');
    }
}

export function serialize(document: CheckpointDocument): string {
    return `${JSON.stringify(document, null, 2)}\n`;
}
