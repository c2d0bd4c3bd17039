import { playlistNamesMatch } from '../lib/playlist-identity';
import type { CatalogClient } from '../types/catalog';
import type { CheckpointDocument } from '../types/checkpoint';

export interface PlaylistVerification {
    name: string;
    playlistId: string | null;
    exists: boolean;
    // Resolved locally but absent remotely
    missing: string[];
    // Present remotely but not in the job document
    extra: string[];
    unresolved: number;
}

export async function verifyPlaylists(
    document: CheckpointDocument,
    client: CatalogClient
): Promise<PlaylistVerification[]> {
    const listing = await client.listPlaylists();
    const report: PlaylistVerification[] = [];

    for (const playlist of document.playlists) {
        const storedId = playlist.catalogs[client.name]?.playlistId ?? null;
        const remote =
            listing.find(candidate => candidate.id === storedId) ??
            listing.find(candidate => playlistNamesMatch(candidate.name, playlist.name));

        const expected = new Set<string>();
        let unresolved = 0;
        for (const track of playlist.tracks) {
            const ref = track.refs[client.name];
            if (ref) {
                expected.add(ref);
            } else {
                unresolved++;
            }
        }

        if (!remote) {
            report.push({ name: playlist.name, playlistId: null, exists: false, missing: [...expected], extra: [], unresolved });
            continue;
        }

        const actual = new Set((await client.listPlaylistTracks(remote.id)).map(track => track.id));
        report.push({
            name: playlist.name,
            playlistId: remote.id,
            exists: true,
            missing: [...expected].filter(id => !actual.has(id)),
            extra: [...actual].filter(id => !expected.has(id)),
            unresolved,
        });
    }

    return report;
}
