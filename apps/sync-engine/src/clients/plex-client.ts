import { z } from 'zod';
import { collectOffsetPages } from '../lib/pagination';
import type { AuthProvider, ExecuteRequest, HttpMethod, ResilientExecutor } from '../lib/resilient-executor';
import { FatalClientError } from '../lib/sync-errors';
import type { IndexedCatalogClient, RemotePlaylist, RemoteTrack } from '../types/catalog';
import { CATALOG_POLICIES } from '../workers/worker-config';
import type { CatalogPolicy } from '../workers/worker-config';

const CLIENT_IDENTIFIER = 'playlist-reconciler';
// Plex metadata type for music tracks
const TRACK_TYPE = 10;

const trackMetadataSchema = z.object({
    ratingKey: z.string(),
    title: z.string().default(''),
    grandparentTitle: z.string().optional(),
    originalTitle: z.string().optional(),
    parentTitle: z.string().optional(),
});

type TrackMetadata = z.infer<typeof trackMetadataSchema>;

const tracksContainerSchema = z.object({
    MediaContainer: z.object({
        totalSize: z.number().optional(),
        Metadata: z.array(trackMetadataSchema).default([]),
    }),
});

const sectionsSchema = z.object({
    MediaContainer: z.object({
        Directory: z.array(z.object({ key: z.string(), title: z.string(), type: z.string() })).default([]),
    }),
});

const identitySchema = z.object({
    MediaContainer: z.object({ machineIdentifier: z.string() }),
});

const playlistsSchema = z.object({
    MediaContainer: z.object({
        Metadata: z
            .array(
                z.object({
                    ratingKey: z.string(),
                    title: z.string(),
                    playlistType: z.string().optional(),
                    leafCount: z.number().optional(),
                })
            )
            .default([]),
    }),
});

function toRemoteTrack(item: TrackMetadata): RemoteTrack {
    return {
        id: item.ratingKey,
        title: item.title,
        // originalTitle carries the track artist on compilations
        artist: item.originalTitle ?? item.grandparentTitle ?? '',
        album: item.parentTitle ?? '',
    };
}

export interface PlexClientOptions {
    baseUrl: string;
    libraryName: string;
    policy?: CatalogPolicy;
}

/**
 * Self-hosted media server. Identifiers are library ratingKeys; the whole
 * music section is listed for local matching.
 */
export class PlexClient implements IndexedCatalogClient {
    readonly name = 'plex';
    readonly matching = 'local-index';
    readonly batchSize: number;
    private readonly baseUrl: string;
    private readonly libraryName: string;
    private readonly policy: CatalogPolicy;
    private sectionId: string | null = null;
    private machineId: string | null = null;

    constructor(
        private readonly executor: ResilientExecutor,
        private readonly auth: AuthProvider,
        options: PlexClientOptions
    ) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.libraryName = options.libraryName;
        this.policy = options.policy ?? CATALOG_POLICIES.plex;
        this.batchSize = this.policy.batchSize;
    }

    async findSectionId(): Promise<string> {
        if (this.sectionId) return this.sectionId;

        const response = await this.get('/library/sections', sectionsSchema);
        const wanted = this.libraryName.toLowerCase();
        const section = response.MediaContainer.Directory.find(
            directory => directory.type === 'artist' && directory.title.toLowerCase() === wanted
        );
        if (!section) {
            throw new FatalClientError(`Music library "${this.libraryName}" not found on media server`, 404);
        }

        this.sectionId = section.key;
        return section.key;
    }

    async fetchTrackIndex(): Promise<RemoteTrack[]> {
        const sectionId = await this.findSectionId();
        return this.collectTracks(`/library/sections/${sectionId}/all`, { type: String(TRACK_TYPE) });
    }

    async listPlaylists(): Promise<RemotePlaylist[]> {
        const response = await this.get('/playlists', playlistsSchema, { playlistType: 'audio' });
        return response.MediaContainer.Metadata.map(playlist => ({
            id: playlist.ratingKey,
            name: playlist.title,
            trackCount: playlist.leafCount,
        }));
    }

    async listPlaylistTracks(playlistId: string): Promise<RemoteTrack[]> {
        return this.collectTracks(`/playlists/${encodeURIComponent(playlistId)}/items`);
    }

    async createPlaylist(name: string): Promise<RemotePlaylist> {
        const response = await this.executor.executeJson(
            this.request('POST', '/playlists', { title: name, type: 'audio', smart: '0', uri: 'library://all' }),
            playlistsSchema
        );
        const [created] = response.MediaContainer.Metadata;
        if (!created) {
            throw new FatalClientError(`Media server did not return the created playlist "${name}"`, 500);
        }
        return { id: created.ratingKey, name: created.title, trackCount: 0 };
    }

    async addTracks(playlistId: string, trackIds: string[]): Promise<void> {
        if (trackIds.length === 0) return;
        const machineId = await this.machineIdentifier();
        const uri = `server://${machineId}/com.plexapp.plugins.library/library/metadata/${trackIds.join(',')}`;
        await this.executor.execute(this.request('PUT', `/playlists/${encodeURIComponent(playlistId)}/items`, { uri }));
    }

    async deletePlaylist(playlistId: string): Promise<void> {
        await this.executor.execute(this.request('DELETE', `/playlists/${encodeURIComponent(playlistId)}`));
    }

    private async machineIdentifier(): Promise<string> {
        if (!this.machineId) {
            const identity = await this.get('/identity', identitySchema);
            this.machineId = identity.MediaContainer.machineIdentifier;
        }
        return this.machineId;
    }

    private collectTracks(path: string, query: Record<string, string> = {}): Promise<RemoteTrack[]> {
        return collectOffsetPages(this.policy.pageSize ?? 100, async (offset, limit) => {
            const response = await this.get(path, tracksContainerSchema, {
                ...query,
                'X-Plex-Container-Start': String(offset),
                'X-Plex-Container-Size': String(limit),
            });
            return {
                items: response.MediaContainer.Metadata.map(toRemoteTrack),
                total: response.MediaContainer.totalSize,
            };
        });
    }

    private get<S extends z.ZodTypeAny>(
        path: string,
        schema: S,
        query: Record<string, string> = {}
    ): Promise<z.output<S>> {
        return this.executor.executeJson(this.request('GET', path, query), schema);
    }

    private request(method: HttpMethod, path: string, query: Record<string, string> = {}): ExecuteRequest {
        const url = new URL(`${this.baseUrl}${path}`);
        for (const [key, value] of Object.entries(query)) {
            url.searchParams.append(key, value);
        }
        return {
            method,
            url: url.toString(),
            headers: { Accept: 'application/json', 'X-Plex-Client-Identifier': CLIENT_IDENTIFIER },
            authProvider: this.auth,
        };
    }
}
