import { z } from 'zod';
import { collectLinkedPages } from '../lib/pagination';
import type { AuthProvider, ExecuteRequest, ResilientExecutor } from '../lib/resilient-executor';
import type { RemotePlaylist, RemoteTrack, SearchableCatalogClient } from '../types/catalog';
import type { OAuthEndpoints } from '../types/session';
import { CATALOG_POLICIES } from '../workers/worker-config';
import type { CatalogPolicy } from '../workers/worker-config';

export const TIDAL_API_URL = 'https://openapi.tidal.com/v2';

export const TIDAL_OAUTH: OAuthEndpoints = {
    authorizeUrl: 'https://login.tidal.com/authorize',
    tokenUrl: 'https://auth.tidal.com/v1/oauth2/token',
    scopes: ['playlists.read', 'playlists.write', 'search.read', 'user.read'],
};

const JSON_API = 'application/vnd.api+json';

const resourceRefSchema = z.object({ id: z.string(), type: z.string() });

const trackResourceSchema = z.object({
    id: z.string(),
    type: z.string(),
    attributes: z.object({ title: z.string().default('') }).passthrough().optional(),
});

const linksSchema = z.object({ next: z.string().nullable().optional() }).optional();

const userSchema = z.object({ data: z.object({ id: z.string() }) });

const playlistResourceSchema = z.object({
    id: z.string(),
    attributes: z.object({
        name: z.string(),
        numberOfItems: z.number().optional(),
    }),
});

const playlistPageSchema = z.object({
    data: z.array(playlistResourceSchema),
    links: linksSchema,
});

const playlistDocumentSchema = z.object({ data: playlistResourceSchema });

const playlistItemsPageSchema = z.object({
    data: z.array(resourceRefSchema),
    included: z.array(trackResourceSchema).default([]),
    links: linksSchema,
});

const searchResponseSchema = z.object({
    included: z.array(trackResourceSchema).default([]),
});

export interface TidalClientOptions {
    countryCode: string;
    policy?: CatalogPolicy;
    baseUrl?: string;
}

// JSON:API service; playlist and track ids are plain resource ids
export class TidalClient implements SearchableCatalogClient {
    readonly name = 'tidal';
    readonly matching = 'remote-search';
    readonly batchSize: number;
    private readonly countryCode: string;
    private readonly baseUrl: string;
    private userId: string | null = null;

    constructor(
        private readonly executor: ResilientExecutor,
        private readonly auth: AuthProvider,
        options: TidalClientOptions
    ) {
        this.countryCode = options.countryCode;
        this.baseUrl = options.baseUrl ?? TIDAL_API_URL;
        this.batchSize = (options.policy ?? CATALOG_POLICIES.tidal).batchSize;
    }

    async listPlaylists(): Promise<RemotePlaylist[]> {
        const ownerId = await this.currentUserId();
        const params = new URLSearchParams({ countryCode: this.countryCode, 'filter[r.owners.id]': ownerId });
        return collectLinkedPages(`${this.baseUrl}/playlists?${params.toString()}`, async url => {
            const page = await this.get(url, playlistPageSchema);
            return {
                items: page.data.map(playlist => ({
                    id: playlist.id,
                    name: playlist.attributes.name,
                    trackCount: playlist.attributes.numberOfItems,
                })),
                next: this.resolveLink(page.links?.next),
            };
        });
    }

    async listPlaylistTracks(playlistId: string): Promise<RemoteTrack[]> {
        const params = new URLSearchParams({ countryCode: this.countryCode, include: 'items' });
        const firstUrl = `${this.baseUrl}/playlists/${encodeURIComponent(playlistId)}/relationships/items?${params.toString()}`;

        return collectLinkedPages(firstUrl, async url => {
            const page = await this.get(url, playlistItemsPageSchema);
            const titles = new Map(page.included.map(track => [track.id, track.attributes?.title ?? ''] as const));
            return {
                items: page.data
                    .filter(item => item.type === 'tracks')
                    .map(item => ({ id: item.id, title: titles.get(item.id) ?? '', artist: '', album: '' })),
                next: this.resolveLink(page.links?.next),
            };
        });
    }

    async createPlaylist(name: string, description = ''): Promise<RemotePlaylist> {
        const params = new URLSearchParams({ countryCode: this.countryCode });
        const created = await this.executor.executeJson(
            this.request('POST', `/playlists?${params.toString()}`, {
                data: { type: 'playlists', attributes: { name, description, privacy: 'PRIVATE' } },
            }),
            playlistDocumentSchema
        );
        return { id: created.data.id, name: created.data.attributes.name, trackCount: 0 };
    }

    async addTracks(playlistId: string, trackIds: string[]): Promise<void> {
        if (trackIds.length === 0) return;
        await this.executor.execute(
            this.request('POST', `/playlists/${encodeURIComponent(playlistId)}/relationships/items`, {
                data: trackIds.map(id => ({ type: 'tracks', id })),
            })
        );
    }

    async deletePlaylist(playlistId: string): Promise<void> {
        await this.executor.execute(this.request('DELETE', `/playlists/${encodeURIComponent(playlistId)}`));
    }

    async searchTracks(query: string, limit = 1): Promise<RemoteTrack[]> {
        const params = new URLSearchParams({
            countryCode: this.countryCode,
            explicitFilter: 'include,exclude',
            include: 'directHits',
        });
        const url = `${this.baseUrl}/searchSuggestions/${encodeURIComponent(query)}/relationships/directHits?${params.toString()}`;
        const response = await this.get(url, searchResponseSchema);

        return response.included
            .filter(resource => resource.type === 'tracks')
            .slice(0, limit)
            .map(track => ({ id: track.id, title: track.attributes?.title ?? '', artist: '', album: '' }));
    }

    private async currentUserId(): Promise<string> {
        if (!this.userId) {
            const user = await this.get(`${this.baseUrl}/users/me`, userSchema);
            this.userId = user.data.id;
        }
        return this.userId;
    }

    // Pagination links are relative to the API root
    private resolveLink(next: string | null | undefined): string | null {
        if (!next) return null;
        return /^https?:\/\//.test(next) ? next : `${this.baseUrl}${next.startsWith('/') ? '' : '/'}${next}`;
    }

    private get<S extends z.ZodTypeAny>(url: string, schema: S): Promise<z.output<S>> {
        return this.executor.executeJson({ url, headers: { Accept: JSON_API }, authProvider: this.auth }, schema);
    }

    private request(method: 'POST' | 'DELETE', path: string, body?: unknown): ExecuteRequest {
        return {
            method,
            url: `${this.baseUrl}${path}`,
            headers:
                body === undefined ? { Accept: JSON_API } : { Accept: JSON_API, 'Content-Type': JSON_API },
            body: body === undefined ? undefined : JSON.stringify(body),
            authProvider: this.auth,
        };
    }
}
