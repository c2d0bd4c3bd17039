import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { AuthenticationUnavailableError, ExhaustedRetriesError, TransientNetworkError } from '../../../src/lib/sync-errors';
import { CheckpointStore, readCheckpointFile } from '../../../src/services/checkpoint-store';
import { EntityResolver } from '../../../src/services/entity-resolver';
import { JobContext } from '../../../src/services/job-context';
import { ReconciliationEngine } from '../../../src/services/reconciliation-engine';
import type { CatalogClient } from '../../../src/types/catalog';
import type { CheckpointDocument, PlaylistEntry, TrackEntry } from '../../../src/types/checkpoint';
import { createSyncSummary } from '../../../src/types/sync';
import { FakeIndexedCatalog, FakeSearchCatalog, track } from '../../mocks/fake-catalog';

function entry(title: string, source: string, refs: TrackEntry['refs'] = {}, artist = ''): TrackEntry {
    return { title, artist, album: '', source, refs, provenance: {} };
}

function roadTrip(): PlaylistEntry {
    return {
        name: 'Road Trip',
        catalogs: {},
        tracks: [
            entry('Song One', '/music/a.mp3'),
            entry('Song Two', '/music/b.mp3'),
            entry('Unknown Thing', '/music/c.mp3'),
            // Same recording under another path
            entry('Song One', '/music/d.mp3'),
        ],
    };
}

describe('ReconciliationEngine', () => {
    let dir: string;
    let store: CheckpointStore;
    let plex: FakeIndexedCatalog;

    const setup = (
        playlists: PlaylistEntry[],
        client: CatalogClient = plex,
        options: { resumed?: boolean; forceReplace?: boolean } = {}
    ) => {
        const document: CheckpointDocument = { version: 1, playlists };
        const context = new JobContext({ document, store, resumed: options.resumed ?? false });
        const summary = createSyncSummary();
        const engine = new ReconciliationEngine(client, new EntityResolver(), context, summary, {
            forceReplace: options.forceReplace ?? false,
        });
        return { document, context, summary, engine };
    };

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'reconcile-'));
        store = new CheckpointStore({ inputPath: join(dir, 'in.json'), outputPath: join(dir, 'out.json') });
        plex = new FakeIndexedCatalog([
            track('p1', 'Song One', 'Artist A'),
            track('p2', 'Song Two', 'Artist B'),
            track('p3', 'Song Three', 'Artist C'),
        ]);
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should create a missing playlist and add the resolved tracks', async () => {
        const playlist = roadTrip();
        const { engine, summary } = setup([playlist]);

        await expect(engine.reconcilePlaylist(playlist)).resolves.toBe('complete');

        expect(plex.calls.createPlaylist).toEqual(['Road Trip']);
        expect(plex.membership('plex-pl-1')).toEqual(['p1', 'p2']);
        expect(playlist.catalogs.plex).toEqual({
            playlistId: 'plex-pl-1',
            status: 'complete',
            replaced: false,
            added: 2,
            lastError: null,
        });
        expect(playlist.tracks.map(t => t.refs.plex)).toEqual(['p1', 'p2', null, 'p1']);
        expect(playlist.tracks.map(t => t.provenance.plex)).toEqual(['index', 'index', null, 'reused']);
        expect(summary).toEqual({
            playlistsProcessed: 1,
            playlistsFailed: 0,
            tracksResolved: {
                existing: 0,
                reused: 1,
                index: 2,
                level0: 0,
                level1: 0,
                level2: 0,
                level3: 0,
                level4: 0,
            },
            tracksUnresolved: 1,
            tracksAdded: 2,
            batchesApplied: 1,
            batchesFailed: 0,
        });
    });

    it('should write every change to the checkpoint', async () => {
        const playlist = roadTrip();
        const { engine, document } = setup([playlist]);

        await engine.reconcilePlaylist(playlist);

        await expect(readCheckpointFile(store.partPath)).resolves.toEqual(document);
    });

    it('should add only the missing tracks to an existing playlist', async () => {
        const existingId = plex.seedPlaylist('road  trip', ['p1']);
        const playlist = roadTrip();
        const { engine } = setup([playlist]);

        await engine.reconcilePlaylist(playlist);

        expect(plex.calls.createPlaylist).toEqual([]);
        expect(plex.calls.addTracks).toEqual([{ playlistId: existingId, trackIds: ['p2'] }]);
        expect(playlist.catalogs.plex?.added).toBe(1);
    });

    it('should not touch a playlist that is already up to date', async () => {
        const playlist = roadTrip();
        const { engine, context, summary } = setup([playlist]);
        await engine.reconcilePlaylist(playlist);

        const secondSummary = createSyncSummary();
        const secondEngine = new ReconciliationEngine(plex, new EntityResolver(), context, secondSummary, {
            forceReplace: false,
        });
        await expect(secondEngine.reconcilePlaylist(playlist)).resolves.toBe('complete');

        expect(plex.calls.addTracks).toHaveLength(1);
        expect(summary.tracksAdded).toBe(2);
        expect(secondSummary.tracksAdded).toBe(0);
        expect(secondSummary.tracksResolved.existing).toBe(3);
    });

    it('should add tracks in batches no larger than the catalog allows', async () => {
        const titles = ['Alpha', 'Bravo', 'Charlie', 'Delta', 'Echo'];
        const catalog = new FakeIndexedCatalog(
            titles.map(title => track(title.toLowerCase(), title)),
            2
        );
        const playlist: PlaylistEntry = {
            name: 'Phonetic',
            catalogs: {},
            tracks: titles.map(title => entry(title, `/music/${title}.mp3`)),
        };
        const { engine, summary } = setup([playlist], catalog);

        await engine.reconcilePlaylist(playlist);

        expect(catalog.calls.addTracks.map(call => call.trackIds)).toEqual([
            ['alpha', 'bravo'],
            ['charlie', 'delta'],
            ['echo'],
        ]);
        expect(playlist.catalogs.plex?.added).toBe(5);
        expect(summary.batchesApplied).toBe(3);
    });

    it('should delete and recreate the playlist on force replace', async () => {
        const oldId = plex.seedPlaylist('Road Trip', ['p3']);
        const playlist = roadTrip();
        const { engine } = setup([playlist], plex, { forceReplace: true });

        await engine.reconcilePlaylist(playlist);

        expect(plex.calls.deletePlaylist).toEqual([oldId]);
        expect([...plex.playlists.keys()]).toEqual(['plex-pl-2']);
        expect(plex.membership('plex-pl-2')).toEqual(['p1', 'p2']);
        expect(plex.calls.listPlaylistTracks).toBe(0);
        expect(playlist.catalogs.plex).toMatchObject({ playlistId: 'plex-pl-2', replaced: true });
    });

    it('should replace a playlist recorded by an earlier run on force replace', async () => {
        const storedId = plex.seedPlaylist('Road Trip', ['p3']);
        const playlist = roadTrip();
        playlist.catalogs.plex = { playlistId: storedId, status: 'complete', replaced: false, added: 1, lastError: null };
        const { engine } = setup([playlist], plex, { forceReplace: true });

        await expect(engine.reconcilePlaylist(playlist)).resolves.toBe('complete');

        expect(plex.calls.deletePlaylist).toEqual([storedId]);
        expect([...plex.playlists.keys()]).toEqual(['plex-pl-2']);
        expect(plex.membership('plex-pl-2')).toEqual(['p1', 'p2']);
        expect(plex.calls.listPlaylistTracks).toBe(0);
        expect(playlist.catalogs.plex).toMatchObject({ playlistId: 'plex-pl-2', replaced: true });
    });

    it('should recreate a recorded playlist that was deleted remotely', async () => {
        const playlist = roadTrip();
        playlist.catalogs.plex = { playlistId: 'plex-pl-9', status: 'complete', replaced: false, added: 2, lastError: null };
        const { engine } = setup([playlist], plex, { forceReplace: true });

        await expect(engine.reconcilePlaylist(playlist)).resolves.toBe('complete');

        expect(plex.calls.deletePlaylist).toEqual(['plex-pl-9']);
        expect(plex.membership('plex-pl-1')).toEqual(['p1', 'p2']);
        expect(playlist.catalogs.plex?.playlistId).toBe('plex-pl-1');
    });

    it('should create playlists under their sanitized name', async () => {
        const playlist: PlaylistEntry = { name: 'Rock & Roll!', catalogs: {}, tracks: [entry('Song One', '/music/a.mp3')] };
        const { engine } = setup([playlist]);

        await engine.reconcilePlaylist(playlist);

        expect(plex.calls.createPlaylist).toEqual(['Rock Roll']);
    });

    it('should reuse a playlist created earlier in the job with the same name', async () => {
        const first: PlaylistEntry = { name: 'Mix', catalogs: {}, tracks: [entry('Song One', '/music/a.mp3')] };
        const second: PlaylistEntry = { name: 'Mix', catalogs: {}, tracks: [entry('Song Two', '/music/b.mp3')] };
        const { engine } = setup([first, second]);

        await engine.reconcilePlaylist(first);
        await engine.reconcilePlaylist(second);

        expect(plex.calls.listPlaylists).toBe(1);
        expect(plex.calls.createPlaylist).toEqual(['Mix']);
        expect(second.catalogs.plex?.playlistId).toBe('plex-pl-1');
        expect(plex.membership('plex-pl-1')).toEqual(['p1', 'p2']);
    });

    it('should mark the playlist failed when a batch exhausts its retries', async () => {
        plex.beforeAddTracks = () => {
            throw new ExhaustedRetriesError('attempts', 3, new TransientNetworkError('Server returned 503', 503));
        };
        const playlist = roadTrip();
        const { engine, summary, document } = setup([playlist]);

        await expect(engine.reconcilePlaylist(playlist)).resolves.toBe('failed');

        expect(playlist.catalogs.plex).toMatchObject({
            status: 'failed',
            added: 0,
            lastError: 'ExhaustedRetriesError: Gave up after 3 attempts: Server returned 503',
        });
        expect(summary).toMatchObject({ playlistsFailed: 1, batchesFailed: 1, batchesApplied: 0 });
        // Resolved references survive for the retry
        await expect(readCheckpointFile(store.partPath)).resolves.toEqual(document);
        expect(playlist.tracks.map(t => t.refs.plex)).toEqual(['p1', 'p2', null, 'p1']);
    });

    it('should propagate errors that stop the whole job', async () => {
        jest.spyOn(plex, 'listPlaylists').mockRejectedValue(new AuthenticationUnavailableError('plex'));
        const playlist = roadTrip();
        const { engine } = setup([playlist]);

        await expect(engine.reconcilePlaylist(playlist)).rejects.toBeInstanceOf(AuthenticationUnavailableError);
        expect(playlist.catalogs.plex?.status).toBe('in_progress');
    });

    describe('when resuming', () => {
        it('should skip playlists already completed', async () => {
            const playlist = roadTrip();
            playlist.catalogs.plex = { playlistId: 'x', status: 'complete', replaced: false, added: 2, lastError: null };
            const { engine } = setup([playlist], plex, { resumed: true });

            await expect(engine.reconcilePlaylist(playlist)).resolves.toBe('skipped');
            expect(plex.calls.listPlaylists).toBe(0);
            expect(plex.calls.fetchTrackIndex).toBe(0);
        });

        it('should search again for tracks an earlier run left unresolved', async () => {
            const playlistId = plex.seedPlaylist('Road Trip', ['p1']);
            const playlist: PlaylistEntry = {
                name: 'Road Trip',
                catalogs: { plex: { playlistId, status: 'in_progress', replaced: false, added: 1, lastError: null } },
                tracks: [entry('Song One', '/music/a.mp3', { plex: 'p1' }), entry('Song Two', '/music/b.mp3', { plex: null })],
            };
            const { engine, summary } = setup([playlist], plex, { resumed: true });

            await engine.reconcilePlaylist(playlist);

            expect(plex.calls.fetchTrackIndex).toBe(1);
            expect(plex.membership(playlistId)).toEqual(['p1', 'p2']);
            expect(playlist.tracks[1].refs.plex).toBe('p2');
            expect(playlist.tracks[1].provenance.plex).toBe('index');
            expect(summary.tracksUnresolved).toBe(0);
        });

        it('should keep a playlist this job already recreated', async () => {
            const playlistId = plex.seedPlaylist('Road Trip', ['p1']);
            const playlist = roadTrip();
            playlist.catalogs.plex = { playlistId, status: 'in_progress', replaced: true, added: 1, lastError: null };
            const { engine } = setup([playlist], plex, { resumed: true, forceReplace: true });

            await engine.reconcilePlaylist(playlist);

            expect(plex.calls.deletePlaylist).toEqual([]);
            expect(plex.calls.createPlaylist).toEqual([]);
            expect(plex.membership(playlistId)).toEqual(['p1', 'p2']);
        });
    });

    describe('with a search catalog', () => {
        it('should resolve a track shared by two playlists once', async () => {
            const spotify = new FakeSearchCatalog([track('spotify:track:1', 'Song', 'Artist')]);
            const first: PlaylistEntry = { name: 'A', catalogs: {}, tracks: [entry('Song', '/music/song.mp3', {}, 'Artist')] };
            const second: PlaylistEntry = { name: 'B', catalogs: {}, tracks: [entry('Song', '/music/song.mp3', {}, 'Artist')] };
            const { engine, summary } = setup([first, second], spotify);

            await engine.reconcilePlaylist(first);
            await engine.reconcilePlaylist(second);

            expect(spotify.calls.searchTracks).toEqual(['Song Artist']);
            expect(first.tracks[0].provenance.spotify).toBe(0);
            expect(second.tracks[0].provenance.spotify).toBe('reused');
            expect(summary.tracksResolved).toMatchObject({ existing: 0, reused: 1, index: 0, level0: 1, level1: 0 });
        });

        it('should count matches by the search level that found them', async () => {
            const spotify = new FakeSearchCatalog([track('spotify:track:7', 'Song', 'Artist')]);
            // Only the bare title finds it, which is level 4
            spotify.search = query => (query === 'Song' ? [track('spotify:track:7', 'Song', 'Artist')] : []);
            const playlist: PlaylistEntry = {
                name: 'Levels',
                catalogs: {},
                tracks: [entry('Song', '/music/song.mp3', {}, 'Artist')],
            };
            const { engine, summary } = setup([playlist], spotify);

            await engine.reconcilePlaylist(playlist);

            expect(playlist.tracks[0].provenance.spotify).toBe(4);
            expect(summary.tracksResolved).toMatchObject({ level0: 0, level3: 0, level4: 1 });
        });
    });
});
