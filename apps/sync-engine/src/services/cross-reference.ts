import type { CatalogName } from '../types/catalog';
import { catalogNameSchema } from '../types/catalog';
import type { CheckpointDocument, TrackEntry } from '../types/checkpoint';
import { generateCacheKey } from './track-matcher';

type CatalogRefs = Partial<Record<CatalogName, string>>;

// Every key under which a track can be recognised again: its source, its known references and its text
export function identityKeys(track: TrackEntry): string[] {
    const keys: string[] = [];
    if (track.source) {
        keys.push(`source:${track.source}`);
    }
    for (const catalog of catalogNameSchema.options) {
        const ref = track.refs[catalog];
        if (ref) {
            keys.push(`${catalog}:${ref}`);
        }
    }
    keys.push(`text:${generateCacheKey(track.title, track.artist, track.album)}`);
    return keys;
}

export class CrossReferenceMap {
    private readonly entries = new Map<string, CatalogRefs>();

    static fromDocument(document: CheckpointDocument): CrossReferenceMap {
        const map = new CrossReferenceMap();
        for (const playlist of document.playlists) {
            for (const track of playlist.tracks) {
                map.record(track);
            }
        }
        return map;
    }

    get size(): number {
        return this.entries.size;
    }

    // Merges the track's references with everything already known under any of its keys
    record(track: TrackEntry): void {
        const keys = identityKeys(track);
        const merged: CatalogRefs = {};

        for (const key of keys) {
            Object.assign(merged, this.entries.get(key));
        }
        for (const catalog of catalogNameSchema.options) {
            const ref = track.refs[catalog];
            if (ref) {
                merged[catalog] = ref;
            }
        }

        if (Object.keys(merged).length === 0) {
            return;
        }
        for (const key of keys) {
            this.entries.set(key, merged);
        }
    }

    lookup(track: TrackEntry, catalog: CatalogName): string | undefined {
        for (const key of identityKeys(track)) {
            const ref = this.entries.get(key)?.[catalog];
            if (ref) {
                return ref;
            }
        }
        return undefined;
    }
}
