import type { Logger } from 'pino';
import { serviceLoggers } from '../lib/logger';
import { chunk } from '../lib/pagination';
import { playlistNamesMatch, sanitizePlaylistName } from '../lib/playlist-identity';
import { FatalClientError, describeError, isJobFatalError } from '../lib/sync-errors';
import type { CatalogClient, RemotePlaylist } from '../types/catalog';
import { createPlaylistSyncState } from '../types/checkpoint';
import type { PlaylistEntry, PlaylistSyncState, TrackEntry } from '../types/checkpoint';
import { SEARCH_CATEGORIES } from '../types/sync';
import type { SyncSummary } from '../types/sync';
import type { EntityResolver } from './entity-resolver';
import type { JobContext } from './job-context';
import { generateCacheKey } from './track-matcher';

export interface ReconcileOptions {
    forceReplace: boolean;
}

export type PlaylistOutcome = 'complete' | 'failed' | 'skipped';

/**
 * Brings one catalog's playlists in line with the job document: find or
 * create each playlist, resolve every track, add the missing ones in
 * batches. Every unit of work is committed to the checkpoint.
 */
export class ReconciliationEngine {
    private playlistListing: Promise<RemotePlaylist[]> | null = null;
    private readonly playlistIdsByName = new Map<string, string>();
    private readonly unresolvable = new Set<string>();
    private readonly log: Logger;

    constructor(
        private readonly client: CatalogClient,
        private readonly resolver: EntityResolver,
        private readonly context: JobContext,
        private readonly summary: SyncSummary,
        private readonly options: ReconcileOptions
    ) {
        this.log = serviceLoggers.reconcile.child({ catalog: client.name });
    }

    async reconcilePlaylist(playlist: PlaylistEntry): Promise<PlaylistOutcome> {
        const catalog = this.client.name;
        const state = await this.context.commit(() => {
            const existing = playlist.catalogs[catalog] ?? createPlaylistSyncState();
            playlist.catalogs[catalog] = existing;
            return existing;
        });

        if (state.status === 'complete' && this.context.resumed) {
            this.log.debug({ playlist: playlist.name }, 'Already complete in checkpoint, skipping');
            return 'skipped';
        }

        try {
            await this.context.commit(() => {
                state.status = 'in_progress';
            });

            const { playlistId, created } = await this.resolvePlaylistId(playlist, state);
            const membership = created
                ? new Set<string>()
                : new Set((await this.client.listPlaylistTracks(playlistId)).map(track => track.id));

            const desired: string[] = [];
            const seen = new Set<string>();
            for (const track of playlist.tracks) {
                this.context.throwIfCancelled();
                const id = await this.resolveTrack(track);
                if (id && !seen.has(id)) {
                    seen.add(id);
                    desired.push(id);
                }
            }

            const delta = desired.filter(id => !membership.has(id));
            if (delta.length === 0) {
                this.log.info({ playlist: playlist.name, playlistId }, 'Playlist already up to date');
            }

            for (const batch of chunk(delta, this.client.batchSize)) {
                this.context.throwIfCancelled();
                try {
                    await this.client.addTracks(playlistId, batch);
                } catch (error) {
                    this.summary.batchesFailed++;
                    throw error;
                }
                this.summary.batchesApplied++;
                this.summary.tracksAdded += batch.length;
                await this.context.commit(() => {
                    state.added += batch.length;
                });
                this.log.info({ playlist: playlist.name, added: batch.length }, 'Applied batch');
            }

            await this.context.commit(() => {
                state.status = 'complete';
                state.lastError = null;
            });
            this.summary.playlistsProcessed++;
            return 'complete';
        } catch (error) {
            if (isJobFatalError(error)) {
                throw error;
            }
            this.log.error({ playlist: playlist.name, err: error }, 'Playlist sync failed');
            await this.context.commit(() => {
                state.status = 'failed';
                state.lastError = describeError(error);
            });
            this.summary.playlistsFailed++;
            return 'failed';
        }
    }

    private async resolvePlaylistId(
        playlist: PlaylistEntry,
        state: PlaylistSyncState
    ): Promise<{ playlistId: string; created: boolean }> {
        const { forceReplace } = this.options;
        const stored = state.playlistId;
        // `replaced` is only ever set by this job, so a resume keeps its own recreation
        if (stored && (!forceReplace || state.replaced)) {
            return { playlistId: stored, created: false };
        }

        const cached = this.playlistIdsByName.get(playlist.name);
        if (cached) {
            await this.context.commit(() => {
                state.playlistId = cached;
                state.replaced = forceReplace;
            });
            return { playlistId: cached, created: false };
        }

        if (stored) {
            await this.replacePlaylist(playlist, stored);
            return this.createPlaylist(playlist, state);
        }

        const listing = await this.listPlaylists();
        const existing = listing.find(remote => playlistNamesMatch(remote.name, playlist.name));

        if (existing && !forceReplace) {
            this.playlistIdsByName.set(playlist.name, existing.id);
            await this.context.commit(() => {
                state.playlistId = existing.id;
            });
            return { playlistId: existing.id, created: false };
        }

        if (existing) {
            await this.replacePlaylist(playlist, existing.id);
        }
        return this.createPlaylist(playlist, state);
    }

    private async replacePlaylist(playlist: PlaylistEntry, playlistId: string): Promise<void> {
        this.log.info({ playlist: playlist.name, playlistId }, 'Replacing existing playlist');
        try {
            await this.client.deletePlaylist(playlistId);
        } catch (error) {
            if (!(error instanceof FatalClientError && error.statusCode === 404)) {
                throw error;
            }
            this.log.warn({ playlist: playlist.name, playlistId }, 'Playlist to replace no longer exists');
        }
        if (this.playlistListing) {
            const listing = await this.playlistListing;
            const index = listing.findIndex(remote => remote.id === playlistId);
            if (index >= 0) {
                listing.splice(index, 1);
            }
        }
    }

    private async createPlaylist(
        playlist: PlaylistEntry,
        state: PlaylistSyncState
    ): Promise<{ playlistId: string; created: boolean }> {
        const created = await this.client.createPlaylist(sanitizePlaylistName(playlist.name), playlist.description);
        if (this.playlistListing) {
            (await this.playlistListing).push(created);
        }
        this.playlistIdsByName.set(playlist.name, created.id);
        await this.context.commit(() => {
            state.playlistId = created.id;
            state.replaced = this.options.forceReplace;
        });
        this.log.info({ playlist: playlist.name, playlistId: created.id }, 'Created playlist');
        return { playlistId: created.id, created: true };
    }

    private listPlaylists(): Promise<RemotePlaylist[]> {
        if (!this.playlistListing) {
            this.playlistListing = this.client.listPlaylists().catch(error => {
                this.playlistListing = null;
                throw error;
            });
        }
        return this.playlistListing;
    }

    private async resolveTrack(track: TrackEntry): Promise<string | null> {
        const catalog = this.client.name;
        const existing = track.refs[catalog];
        if (existing) {
            this.summary.tracksResolved.existing++;
            return existing;
        }

        const reused = this.context.crossReference.lookup(track, catalog);
        if (reused) {
            await this.context.commit(() => {
                track.refs[catalog] = reused;
                track.provenance[catalog] = 'reused';
            });
            this.summary.tracksResolved.reused++;
            return reused;
        }

        // A null reference from an earlier run is searched again; only this job's failures are remembered
        const textKey = generateCacheKey(track.title, track.artist, track.album);
        if (this.unresolvable.has(textKey)) {
            this.summary.tracksUnresolved++;
            return null;
        }

        const result = await this.resolver.resolve(track, this.client);
        if (result.status === 'matched') {
            await this.context.commit(() => {
                track.refs[catalog] = result.catalogId;
                track.provenance[catalog] = result.level ?? 'index';
                this.context.crossReference.record(track);
            });
            if (result.level === undefined) {
                this.summary.tracksResolved.index++;
            } else {
                this.summary.tracksResolved[SEARCH_CATEGORIES[result.level]]++;
            }
            return result.catalogId;
        }

        this.unresolvable.add(textKey);
        await this.context.commit(() => {
            track.refs[catalog] = null;
            track.provenance[catalog] = null;
        });
        this.summary.tracksUnresolved++;
        this.log.debug(
            { title: track.title, artist: track.artist, bestScore: result.bestScore },
            'Track unresolved'
        );
        return null;
    }
}
