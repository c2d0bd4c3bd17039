import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { TokenCache } from '../../../src/lib/token-cache';
import type { SessionToken } from '../../../src/types/session';

const KEY = '0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef';

const token = (accessToken: string): SessionToken => ({
    accessToken,
    refreshToken: 'refresh-1',
    expiresAt: 1_700_000_000_000,
    scope: 'playlist-read-private',
});

describe('TokenCache', () => {
    let dir: string;
    let path: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'token-cache-'));
        path = join(dir, 'tokens.json');
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should return null when the file does not exist', async () => {
        await expect(new TokenCache({ path }).load('spotify')).resolves.toBeNull();
    });

    it('should keep each service under its own key', async () => {
        const cache = new TokenCache({ path });
        await cache.save('spotify', token('spotify-token'));
        await cache.save('tidal', token('tidal-token'));

        await expect(cache.load('spotify')).resolves.toEqual(token('spotify-token'));
        await expect(cache.load('tidal')).resolves.toEqual(token('tidal-token'));

        const stored: unknown = JSON.parse(await readFile(path, 'utf8'));
        expect(stored).toEqual({
            version: 1,
            services: { spotify: token('spotify-token'), tidal: token('tidal-token') },
        });
    });

    it('should not lose writes issued concurrently', async () => {
        const cache = new TokenCache({ path });
        await Promise.all([cache.save('spotify', token('a')), cache.save('tidal', token('b')), cache.save('plex', token('c'))]);

        const reread = new TokenCache({ path });
        await expect(reread.load('spotify')).resolves.toMatchObject({ accessToken: 'a' });
        await expect(reread.load('tidal')).resolves.toMatchObject({ accessToken: 'b' });
        await expect(reread.load('plex')).resolves.toMatchObject({ accessToken: 'c' });
    });

    it('should clear one service and leave the others', async () => {
        const cache = new TokenCache({ path });
        await cache.save('spotify', token('spotify-token'));
        await cache.save('tidal', token('tidal-token'));

        await cache.clear('spotify');

        await expect(cache.load('spotify')).resolves.toBeNull();
        await expect(cache.load('tidal')).resolves.toEqual(token('tidal-token'));
    });

    it('should treat a corrupt file as empty', async () => {
        await writeFile(path, '{not json', 'utf8');

        await expect(new TokenCache({ path }).load('spotify')).resolves.toBeNull();
    });

    describe('with an encryption key', () => {
        it('should not store tokens in plain text', async () => {
            const cache = new TokenCache({ path, encryptionKey: KEY });
            await cache.save('spotify', token('test-token'));

            const raw = await readFile(path, 'utf8');
            expect(raw).not.toContain('test-token');
            expect(raw.split(':')).toHaveLength(3);
            await expect(cache.load('spotify')).resolves.toEqual(token('test-token'));
        });

        it('should ignore a file sealed with another key', async () => {
            await new TokenCache({ path, encryptionKey: KEY }).save('spotify', token('test-token'));

            const otherKey = 'f'.repeat(64);
            await expect(new TokenCache({ path, encryptionKey: otherKey }).load('spotify')).resolves.toBeNull();
        });
    });
});
