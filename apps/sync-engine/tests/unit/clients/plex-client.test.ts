import { PlexClient } from '../../../src/clients/plex-client';
import { ResilientExecutor } from '../../../src/lib/resilient-executor';
import { SessionManager } from '../../../src/lib/session-manager';
import { FatalClientError } from '../../../src/lib/sync-errors';
import { CATALOG_POLICIES } from '../../../src/workers/worker-config';
import { emptyResponse, jsonResponse, mockFetch, restoreFetch } from '../../mocks/fetch.mock';

const SERVER = 'http://plex.local:32400';

const sections = {
    MediaContainer: {
        Directory: [
            { key: '1', title: 'Movies', type: 'movie' },
            { key: '3', title: 'music', type: 'artist' },
        ],
    },
};

describe('PlexClient', () => {
    let client: PlexClient;

    beforeEach(() => {
        const session = new SessionManager({
            service: 'plex',
            credentials: { staticToken: 'test-token' },
            headerFormat: { name: 'X-Plex-Token', scheme: null },
        });
        client = new PlexClient(new ResilientExecutor({ service: 'plex', policy: { maxRetries: 0 } }), session, {
            baseUrl: `${SERVER}/`,
            libraryName: 'Music',
            policy: { ...CATALOG_POLICIES.plex, pageSize: 2 },
        });
    });

    afterEach(() => {
        restoreFetch();
    });

    it('should page through the music library', async () => {
        const calls = mockFetch(request => {
            const url = new URL(request.url);
            if (url.pathname === '/library/sections') {
                return jsonResponse(200, sections);
            }
            const start = url.searchParams.get('X-Plex-Container-Start');
            const items =
                start === '0'
                    ? [
                          { ratingKey: '10', title: 'Song One', grandparentTitle: 'Artist A', parentTitle: 'Album A' },
                          {
                              ratingKey: '11',
                              title: 'Song Two',
                              grandparentTitle: 'Various Artists',
                              originalTitle: 'Artist B',
                          },
                      ]
                    : [{ ratingKey: '12', title: 'Song Three' }];
            return jsonResponse(200, { MediaContainer: { totalSize: 3, Metadata: items } });
        });

        await expect(client.fetchTrackIndex()).resolves.toEqual([
            { id: '10', title: 'Song One', artist: 'Artist A', album: 'Album A' },
            { id: '11', title: 'Song Two', artist: 'Artist B', album: '' },
            { id: '12', title: 'Song Three', artist: '', album: '' },
        ]);
        expect(calls.map(call => call.url)).toEqual([
            `${SERVER}/library/sections`,
            `${SERVER}/library/sections/3/all?type=10&X-Plex-Container-Start=0&X-Plex-Container-Size=2`,
            `${SERVER}/library/sections/3/all?type=10&X-Plex-Container-Start=2&X-Plex-Container-Size=2`,
        ]);
        expect(calls[0].headers).toMatchObject({
            'x-plex-token': 'test-token',
            'x-plex-client-identifier': 'playlist-reconciler',
            accept: 'application/json',
        });
    });

    it('should fail when the music library does not exist', async () => {
        mockFetch(() => jsonResponse(200, { MediaContainer: { Directory: [{ key: '1', title: 'Movies', type: 'movie' }] } }));

        const error = await client.fetchTrackIndex().catch((err: unknown) => err);

        expect(error).toBeInstanceOf(FatalClientError);
        expect(error).toMatchObject({ statusCode: 404 });
    });

    it('should list audio playlists', async () => {
        const calls = mockFetch(() =>
            jsonResponse(200, { MediaContainer: { Metadata: [{ ratingKey: '77', title: 'Road Trip', leafCount: 12 }] } })
        );

        await expect(client.listPlaylists()).resolves.toEqual([{ id: '77', name: 'Road Trip', trackCount: 12 }]);
        expect(calls[0].url).toBe(`${SERVER}/playlists?playlistType=audio`);
    });

    it('should create an empty audio playlist', async () => {
        const calls = mockFetch(() =>
            jsonResponse(200, { MediaContainer: { Metadata: [{ ratingKey: '78', title: 'Road Trip' }] } })
        );

        await expect(client.createPlaylist('Road Trip')).resolves.toEqual({ id: '78', name: 'Road Trip', trackCount: 0 });

        const url = new URL(calls[0].url);
        expect(calls[0].method).toBe('POST');
        expect(Object.fromEntries(url.searchParams)).toEqual({
            title: 'Road Trip',
            type: 'audio',
            smart: '0',
            uri: 'library://all',
        });
    });

    it('should add tracks through a server URI', async () => {
        const calls = mockFetch(request =>
            request.url.endsWith('/identity')
                ? jsonResponse(200, { MediaContainer: { machineIdentifier: 'machine-1' } })
                : emptyResponse(200)
        );

        await client.addTracks('78', ['10', '11']);
        await client.addTracks('78', ['12']);

        expect(calls.map(call => call.method)).toEqual(['GET', 'PUT', 'PUT']);
        const uri = new URL(calls[1].url).searchParams.get('uri');
        expect(uri).toBe('server://machine-1/com.plexapp.plugins.library/library/metadata/10,11');
    });

    it('should delete playlists by rating key', async () => {
        const calls = mockFetch(() => emptyResponse(200));

        await client.deletePlaylist('78');

        expect(`${calls[0].method} ${calls[0].url}`).toBe(`DELETE ${SERVER}/playlists/78`);
    });
});
