import { z } from 'zod';

export const catalogNameSchema = z.enum(['plex', 'spotify', 'tidal']);
export type CatalogName = z.infer<typeof catalogNameSchema>;

export const CATALOG_NAMES: readonly CatalogName[] = catalogNameSchema.options;

export interface RemotePlaylist {
    id: string;
    name: string;
    trackCount?: number;
}

export interface RemoteTrack {
    id: string;
    title: string;
    artist: string;
    album: string;
}

export interface TrackDescriptor {
    title: string;
    artist: string;
    album: string;
    source: string;
}

interface CatalogClientBase {
    readonly name: CatalogName;
    readonly batchSize: number;
    listPlaylists(): Promise<RemotePlaylist[]>;
    listPlaylistTracks(playlistId: string): Promise<RemoteTrack[]>;
    createPlaylist(name: string, description?: string): Promise<RemotePlaylist>;
    // At most batchSize ids per call
    addTracks(playlistId: string, trackIds: string[]): Promise<void>;
    deletePlaylist(playlistId: string): Promise<void>;
}

// Catalogs whose whole track library can be listed and matched locally
export interface IndexedCatalogClient extends CatalogClientBase {
    readonly matching: 'local-index';
    fetchTrackIndex(): Promise<RemoteTrack[]>;
}

// Catalogs only reachable through a search endpoint
export interface SearchableCatalogClient extends CatalogClientBase {
    readonly matching: 'remote-search';
    searchTracks(query: string, limit?: number): Promise<RemoteTrack[]>;
}

export type CatalogClient = IndexedCatalogClient | SearchableCatalogClient;
