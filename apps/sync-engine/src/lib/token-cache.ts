import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { SessionToken } from '../types/session';
import { isMissingFileError, writeFileAtomic } from './atomic-file';
import { decrypt, encrypt, parseEncryptionKey } from './encryption';
import { serviceLoggers } from './logger';
import { Mutex } from './mutex';

const log = serviceLoggers.session;

const sessionTokenSchema = z.object({
    accessToken: z.string().min(1),
    refreshToken: z.string().nullable(),
    expiresAt: z.number().nullable(),
    scope: z.string().nullable(),
});

const tokenCacheFileSchema = z.object({
    version: z.literal(1),
    services: z.record(z.string(), sessionTokenSchema),
});

type TokenCacheFile = z.infer<typeof tokenCacheFileSchema>;

export interface TokenCacheOptions {
    path: string;
    // 64 hex chars; when set the file is AES-256-GCM sealed
    encryptionKey?: string;
}

// One cache file shared by every service; writes go through a single mutex
export class TokenCache {
    private readonly path: string;
    private readonly key: Buffer | null;
    private readonly mutex = new Mutex();

    constructor(options: TokenCacheOptions) {
        this.path = options.path;
        this.key = options.encryptionKey ? parseEncryptionKey(options.encryptionKey) : null;
    }

    async load(service: string): Promise<SessionToken | null> {
        const file = await this.readAll();
        return file.services[service] ?? null;
    }

    async save(service: string, token: SessionToken): Promise<void> {
        await this.mutex.runExclusive(async () => {
            const file = await this.readAll();
            file.services[service] = token;
            await this.writeAll(file);
        });
    }

    async clear(service: string): Promise<void> {
        await this.mutex.runExclusive(async () => {
            const file = await this.readAll();
            if (!(service in file.services)) {
                return;
            }
            delete file.services[service];
            await this.writeAll(file);
        });
    }

    private async readAll(): Promise<TokenCacheFile> {
        let raw: string;
        try {
            raw = await readFile(this.path, 'utf8');
        } catch (error) {
            if (isMissingFileError(error)) {
                return { version: 1, services: {} };
            }
            throw error;
        }

        try {
            const plaintext = this.key ? decrypt(raw, this.key) : raw;
            return tokenCacheFileSchema.parse(JSON.parse(plaintext));
        } catch (error) {
            log.warn({ err: error, path: this.path }, 'Token cache unreadable, ignoring it');
            return { version: 1, services: {} };
        }
    }

    private async writeAll(file: TokenCacheFile): Promise<void> {
        const json = JSON.stringify(file, null, 2);
        await writeFileAtomic(this.path, this.key ? encrypt(json, this.key) : json);
    }
}
