import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CheckpointStore, readCheckpointFile, serialize } from '../../../src/services/checkpoint-store';
import { CheckpointCorruptError } from '../../../src/lib/sync-errors';
import type { CheckpointDocument } from '../../../src/types/checkpoint';

const document = (name: string): CheckpointDocument => ({
    version: 1,
    playlists: [{ name, catalogs: {}, tracks: [] }],
});

describe('readCheckpointFile', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'checkpoint-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should fill defaults for a minimal job document', async () => {
        const path = join(dir, 'job.json');
        await writeFile(path, JSON.stringify({ playlists: [{ name: 'Road Trip', tracks: [{ title: 'Song' }] }] }));

        await expect(readCheckpointFile(path)).resolves.toEqual({
            version: 1,
            playlists: [
                {
                    name: 'Road Trip',
                    catalogs: {},
                    tracks: [{ title: 'Song', artist: '', album: '', source: '', refs: {}, provenance: {} }],
                },
            ],
        });
    });

    it('should reject invalid JSON as corrupt', async () => {
        const path = join(dir, 'job.json');
        await writeFile(path, '{"playlists": [');

        await expect(readCheckpointFile(path)).rejects.toBeInstanceOf(CheckpointCorruptError);
    });

    it('should reject documents with the wrong shape', async () => {
        const path = join(dir, 'job.json');
        await writeFile(path, JSON.stringify({ playlists: [{ tracks: [] }] }));

        await expect(readCheckpointFile(path)).rejects.toBeInstanceOf(CheckpointCorruptError);
    });
});

describe('CheckpointStore', () => {
    let dir: string;
    let store: CheckpointStore;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'checkpoint-'));
        store = new CheckpointStore({ inputPath: join(dir, 'in.json'), outputPath: join(dir, 'out.json') });
        await writeFile(store.inputPath, serialize(document('input')));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should load the input when no partial checkpoint exists', async () => {
        await expect(store.load()).resolves.toEqual({ document: document('input'), resumed: false });
    });

    it('should resume from the partial checkpoint', async () => {
        await store.save(document('partial'));

        await expect(store.load()).resolves.toEqual({ document: document('partial'), resumed: true });
    });

    it('should discard the partial checkpoint on a fresh start', async () => {
        await store.save(document('partial'));

        await expect(store.load({ fresh: true })).resolves.toEqual({ document: document('input'), resumed: false });
        await expect(readdir(dir)).resolves.toEqual(['in.json']);
    });

    it('should refuse to resume from a corrupt partial checkpoint', async () => {
        await writeFile(store.partPath, 'garbage');

        await expect(store.load()).rejects.toBeInstanceOf(CheckpointCorruptError);
    });

    it('should move the checkpoint to the output on finalize', async () => {
        await store.save(document('partial'));
        await store.finalize(document('done'));

        await expect(readFile(store.outputPath, 'utf8')).resolves.toBe(serialize(document('done')));
        expect((await readdir(dir)).sort()).toEqual(['in.json', 'out.json']);
    });

    it('should keep the previous checkpoint when a save is interrupted', async () => {
        await store.save(document('first'));
        const failing = new CheckpointStore({
            inputPath: store.inputPath,
            outputPath: store.outputPath,
            rename: async () => {
                throw new Error('interrupted');
            },
        });

        await expect(failing.save(document('second'))).rejects.toThrow('interrupted');
        await expect(readCheckpointFile(store.partPath)).resolves.toEqual(document('first'));
    });
});
