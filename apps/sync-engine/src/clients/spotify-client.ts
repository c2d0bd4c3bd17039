import { z } from 'zod';
import { collectLinkedPages } from '../lib/pagination';
import type { AuthProvider, ExecuteRequest, ResilientExecutor } from '../lib/resilient-executor';
import type { RemotePlaylist, RemoteTrack, SearchableCatalogClient } from '../types/catalog';
import type { OAuthEndpoints } from '../types/session';
import { CATALOG_POLICIES } from '../workers/worker-config';
import type { CatalogPolicy } from '../workers/worker-config';

export const SPOTIFY_API_URL = 'https://api.spotify.com/v1';

export const SPOTIFY_OAUTH: OAuthEndpoints = {
    authorizeUrl: 'https://accounts.spotify.com/authorize',
    tokenUrl: 'https://accounts.spotify.com/api/token',
    scopes: ['playlist-read-private', 'playlist-modify-private', 'playlist-modify-public'],
};

const spotifyTrackSchema = z.object({
    uri: z.string(),
    name: z.string(),
    is_local: z.boolean().optional(),
    artists: z.array(z.object({ name: z.string() })).default([]),
    album: z.object({ name: z.string() }).nullable().optional(),
});

type SpotifyTrack = z.infer<typeof spotifyTrackSchema>;

const userProfileSchema = z.object({ id: z.string() });

const playlistSchema = z.object({
    id: z.string(),
    name: z.string(),
    tracks: z.object({ total: z.number() }).optional(),
});

const playlistPageSchema = z.object({
    items: z.array(playlistSchema),
    next: z.string().nullable(),
});

const playlistTracksPageSchema = z.object({
    items: z.array(z.object({ track: spotifyTrackSchema.nullable() })),
    next: z.string().nullable(),
});

const searchResponseSchema = z.object({
    tracks: z.object({ items: z.array(spotifyTrackSchema) }),
});

const snapshotSchema = z.object({ snapshot_id: z.string() });

function toRemoteTrack(track: SpotifyTrack): RemoteTrack {
    return {
        id: track.uri,
        title: track.name,
        artist: track.artists.map(artist => artist.name).join(', '),
        album: track.album?.name ?? '',
    };
}

// Track identifiers are URIs (spotify:track:<id>), the form the add endpoint takes
export class SpotifyClient implements SearchableCatalogClient {
    readonly name = 'spotify';
    readonly matching = 'remote-search';
    readonly batchSize: number;
    private userId: string | null = null;

    constructor(
        private readonly executor: ResilientExecutor,
        private readonly auth: AuthProvider,
        private readonly policy: CatalogPolicy = CATALOG_POLICIES.spotify,
        private readonly baseUrl: string = SPOTIFY_API_URL
    ) {
        this.batchSize = policy.batchSize;
    }

    async listPlaylists(): Promise<RemotePlaylist[]> {
        const url = `${this.baseUrl}/me/playlists?limit=${this.policy.pageSize ?? 50}`;
        return collectLinkedPages(url, async pageUrl => {
            const page = await this.get(pageUrl, playlistPageSchema);
            return {
                items: page.items.map(playlist => ({
                    id: playlist.id,
                    name: playlist.name,
                    trackCount: playlist.tracks?.total,
                })),
                next: page.next,
            };
        });
    }

    async listPlaylistTracks(playlistId: string): Promise<RemoteTrack[]> {
        const url = `${this.baseUrl}/playlists/${encodeURIComponent(playlistId)}/tracks?limit=100`;
        return collectLinkedPages(url, async pageUrl => {
            const page = await this.get(pageUrl, playlistTracksPageSchema);
            const items: RemoteTrack[] = [];
            for (const item of page.items) {
                // Local files and removed tracks have no usable URI
                if (item.track && !item.track.is_local) {
                    items.push(toRemoteTrack(item.track));
                }
            }
            return { items, next: page.next };
        });
    }

    async createPlaylist(name: string, description = ''): Promise<RemotePlaylist> {
        const userId = await this.currentUserId();
        const created = await this.executor.executeJson(
            this.request('POST', `/users/${encodeURIComponent(userId)}/playlists`, {
                name,
                description,
                public: false,
            }),
            playlistSchema
        );
        return { id: created.id, name: created.name, trackCount: 0 };
    }

    async addTracks(playlistId: string, trackIds: string[]): Promise<void> {
        if (trackIds.length === 0) return;
        await this.executor.executeJson(
            this.request('POST', `/playlists/${encodeURIComponent(playlistId)}/tracks`, { uris: trackIds }),
            snapshotSchema
        );
    }

    // Spotify has no playlist deletion; unfollowing removes it from the library
    async deletePlaylist(playlistId: string): Promise<void> {
        await this.executor.execute(this.request('DELETE', `/playlists/${encodeURIComponent(playlistId)}/followers`));
    }

    async searchTracks(query: string, limit = 1): Promise<RemoteTrack[]> {
        const params = new URLSearchParams({ q: query, type: 'track', limit: String(limit) });
        const response = await this.get(`${this.baseUrl}/search?${params.toString()}`, searchResponseSchema);
        return response.tracks.items.map(toRemoteTrack);
    }

    private async currentUserId(): Promise<string> {
        if (!this.userId) {
            const profile = await this.get(`${this.baseUrl}/me`, userProfileSchema);
            this.userId = profile.id;
        }
        return this.userId;
    }

    private get<S extends z.ZodTypeAny>(url: string, schema: S): Promise<z.output<S>> {
        return this.executor.executeJson({ url, authProvider: this.auth }, schema);
    }

    private request(method: 'POST' | 'DELETE', path: string, body?: unknown): ExecuteRequest {
        return {
            method,
            url: `${this.baseUrl}${path}`,
            headers: body === undefined ? {} : { 'Content-Type': 'application/json' },
            body: body === undefined ? undefined : JSON.stringify(body),
            authProvider: this.auth,
        };
    }
}
