import { z } from 'zod';
import { config } from 'dotenv';
import { resolve } from 'path';
import { CATALOG_NAMES, catalogNameSchema } from './types/catalog';

// Load .env from project root
// This ensures env vars are present before validation
config({ path: resolve(__dirname, '../../../.env') });

const booleanFlag = (fallback: 'true' | 'false') =>
    z
        .enum(['true', 'false', '1', '0', 'yes', 'no'])
        .default(fallback)
        .transform(value => value === 'true' || value === '1' || value === 'yes');

const optionalString = z
    .string()
    .optional()
    .transform(value => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const similarityThreshold = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    SYNC_INPUT_PATH: z.string().min(1).default('playlists.json'),
    SYNC_OUTPUT_PATH: z.string().min(1).default('playlists.synced.json'),
    SYNC_TARGETS: z
        .string()
        .default(CATALOG_NAMES.join(','))
        .transform(value => value.split(',').map(target => target.trim()).filter(Boolean))
        .pipe(z.array(catalogNameSchema).min(1, 'SYNC_TARGETS must name at least one catalog')),
    SYNC_FORCE_REPLACE: booleanFlag('false'),
    SYNC_FRESH_START: booleanFlag('false'),
    SYNC_CONCURRENCY: positiveInt(1),

    TOKEN_CACHE_PATH: z.string().min(1).default('.tokens.json'),
    TOKEN_CACHE_KEY: optionalString.pipe(
        z.string().regex(/^[0-9a-fA-F]{64}$/, 'TOKEN_CACHE_KEY must be 64 hex characters (32 bytes)').optional()
    ),

    HTTP_TIMEOUT_MS: positiveInt(20_000),
    HTTP_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
    HTTP_MAX_TOTAL_WAIT_MS: positiveInt(600_000),
    AUTHORIZATION_TIMEOUT_MS: positiveInt(300_000),

    MATCH_MIN_SIMILARITY: similarityThreshold(0.6),
    MATCH_ARTIST_TITLE_SIMILARITY: similarityThreshold(0.8),

    PLEX_URL: optionalString.pipe(z.string().url().optional()),
    PLEX_TOKEN: optionalString,
    PLEX_LIBRARY_NAME: z.string().min(1).default('Music'),

    SPOTIFY_CLIENT_ID: optionalString,
    SPOTIFY_CLIENT_SECRET: optionalString,
    SPOTIFY_REDIRECT_URI: z.string().url().default('http://127.0.0.1:8888/callback'),
    SPOTIFY_USER_AUTHORIZATION: booleanFlag('true'),

    TIDAL_CLIENT_ID: optionalString,
    TIDAL_CLIENT_SECRET: optionalString,
    TIDAL_PERSONAL_ACCESS_TOKEN: optionalString,
    TIDAL_REDIRECT_URI: z.string().url().default('http://127.0.0.1:8889/callback'),
    TIDAL_COUNTRY_CODE: z.string().length(2).default('US'),
});

// Type inference
export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv) {
    return envSchema.safeParse(source);
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const _env = parseEnv(source);

    if (!_env.success) {
        console.error('Invalid environment variables:');
        console.error(JSON.stringify(_env.error.format(), null, 2));
        process.exit(1);
    }

    return _env.data;
}
