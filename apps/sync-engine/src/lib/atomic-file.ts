import { mkdir, open, rename as fsRename, rm } from 'fs/promises';
import { dirname } from 'path';

export type RenameFn = (from: string, to: string) => Promise<void>;

export interface AtomicWriteOptions {
    rename?: RenameFn;
}

let tempCounter = 0;

/**
 * Writes `content` to a unique temporary file beside `path`, flushes it, then
 * renames it over `path`. Readers see either the old file or the new one.
 */
export async function writeFileAtomic(
    path: string,
    content: string,
    options: AtomicWriteOptions = {}
): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    tempCounter += 1;
    const tempPath = `${path}.${process.pid}.${tempCounter}.tmp`;

    const handle = await open(tempPath, 'w');
    try {
        await handle.writeFile(content, 'utf8');
        await handle.sync();
    } finally {
        await handle.close();
    }

    const rename = options.rename ?? fsRename;
    try {
        await rename(tempPath, path);
    } catch (error) {
        await rm(tempPath, { force: true });
        throw error;
    }
}

// fs errors may come from another realm, so match on shape rather than instanceof Error
export function isMissingFileError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
