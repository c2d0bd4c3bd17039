import { writeFileAtomic } from '../lib/atomic-file';
import { serviceLoggers } from '../lib/logger';
import type { CatalogClient, RemotePlaylist } from '../types/catalog';
import { CHECKPOINT_VERSION } from '../types/checkpoint';
import type { CheckpointDocument, PlaylistEntry, TrackEntry } from '../types/checkpoint';
import { serialize } from './checkpoint-store';

const log = serviceLoggers.catalog;

export interface ExportOptions {
    // Restrict to these playlist ids; all playlists when omitted
    playlistIds?: string[];
}

async function exportPlaylist(client: CatalogClient, playlist: RemotePlaylist): Promise<PlaylistEntry> {
    const catalog = client.name;
    const tracks = await client.listPlaylistTracks(playlist.id);

    const entry: PlaylistEntry = { name: playlist.name, catalogs: {}, tracks: [] };
    entry.catalogs[catalog] = {
        playlistId: playlist.id,
        status: 'complete',
        replaced: false,
        added: 0,
        lastError: null,
    };

    for (const track of tracks) {
        const exported: TrackEntry = {
            title: track.title,
            artist: track.artist,
            album: track.album,
            source: `${catalog}:${track.id}`,
            refs: {},
            provenance: {},
        };
        exported.refs[catalog] = track.id;
        exported.provenance[catalog] = 'source';
        entry.tracks.push(exported);
    }
    return entry;
}

// Reads a catalog's playlists into a job document that other catalogs can be synced from
export async function exportPlaylists(
    client: CatalogClient,
    options: ExportOptions = {}
): Promise<CheckpointDocument> {
    const listing = await client.listPlaylists();
    const selected = options.playlistIds
        ? listing.filter(playlist => options.playlistIds?.includes(playlist.id))
        : listing;

    const playlists: PlaylistEntry[] = [];
    for (const playlist of selected) {
        playlists.push(await exportPlaylist(client, playlist));
        log.info({ catalog: client.name, playlist: playlist.name }, 'Exported playlist');
    }

    return { version: CHECKPOINT_VERSION, playlists };
}

export async function writeExport(path: string, document: CheckpointDocument): Promise<void> {
    await writeFileAtomic(path, serialize(document));
}
