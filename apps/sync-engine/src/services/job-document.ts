import { basename, extname } from 'path';
import { CHECKPOINT_VERSION } from '../types/checkpoint';
import type { CheckpointDocument, TrackEntry } from '../types/checkpoint';

export interface ScannedEntry {
    path: string;
    title: string;
    durationSeconds: number;
}

export interface ScannedGroup {
    name: string;
    entries: ScannedEntry[];
}

// Tags are optional in scanner output; fall back to "Artist - Title" file names
function describeEntry(entry: ScannedEntry): TrackEntry {
    const title = entry.title.trim() || basename(entry.path, extname(entry.path));
    const separator = title.indexOf(' - ');
    const hasArtist = separator > 0 && !/^\d+$/.test(title.slice(0, separator).trim());

    return {
        title: hasArtist ? title.slice(separator + 3).trim() : title,
        artist: hasArtist ? title.slice(0, separator).trim() : '',
        album: '',
        source: entry.path,
        durationSeconds: entry.durationSeconds > 0 ? entry.durationSeconds : undefined,
        refs: {},
        provenance: {},
    };
}

/**
 * Builds a job document from scanner output: one playlist per named group,
 * entries kept in scan order.
 */
export function createJobDocument(groups: readonly ScannedGroup[]): CheckpointDocument {
    return {
        version: CHECKPOINT_VERSION,
        playlists: groups
            .filter(group => group.name.trim() !== '')
            .map(group => ({
                name: group.name.trim(),
                catalogs: {},
                tracks: group.entries.map(describeEntry),
            })),
    };
}
