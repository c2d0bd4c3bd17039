import { createJobDocument } from '../../../src/services/job-document';

describe('createJobDocument', () => {
    it('should create one playlist per group in scan order', () => {
        const document = createJobDocument([
            {
                name: ' Road Trip ',
                entries: [
                    { path: '/music/road/01.mp3', title: 'Queen - Bohemian Rhapsody', durationSeconds: 354 },
                    { path: '/music/road/02.mp3', title: 'Interlude', durationSeconds: 0 },
                ],
            },
            { name: 'Empty', entries: [] },
        ]);

        expect(document).toEqual({
            version: 1,
            playlists: [
                {
                    name: 'Road Trip',
                    catalogs: {},
                    tracks: [
                        {
                            title: 'Bohemian Rhapsody',
                            artist: 'Queen',
                            album: '',
                            source: '/music/road/01.mp3',
                            durationSeconds: 354,
                            refs: {},
                            provenance: {},
                        },
                        {
                            title: 'Interlude',
                            artist: '',
                            album: '',
                            source: '/music/road/02.mp3',
                            refs: {},
                            provenance: {},
                        },
                    ],
                },
                { name: 'Empty', catalogs: {}, tracks: [] },
            ],
        });
    });

    it('should fall back to the file name when the title is blank', () => {
        const [playlist] = createJobDocument([
            { name: 'Mix', entries: [{ path: '/music/Artist X - Song Y.flac', title: '  ', durationSeconds: 200 }] },
        ]).playlists;

        expect(playlist.tracks[0]).toMatchObject({ title: 'Song Y', artist: 'Artist X' });
    });

    it('should not treat a track number as the artist', () => {
        const [playlist] = createJobDocument([
            { name: 'Mix', entries: [{ path: '/music/07 - Song Z.mp3', title: '', durationSeconds: 10 }] },
        ]).playlists;

        expect(playlist.tracks[0]).toMatchObject({ title: '07 - Song Z', artist: '' });
    });

    it('should drop groups without a name', () => {
        expect(createJobDocument([{ name: '  ', entries: [] }]).playlists).toEqual([]);
    });
});
