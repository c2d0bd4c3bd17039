import type { Env } from '../env';
import { AdaptiveRateLimiter } from '../lib/rate-limiter';
import { ResilientExecutor } from '../lib/resilient-executor';
import type { RetryPolicy } from '../lib/resilient-executor';
import { LoopbackAuthorizer, SessionManager } from '../lib/session-manager';
import type { InteractiveAuthorizer } from '../lib/session-manager';
import { AuthenticationUnavailableError } from '../lib/sync-errors';
import { TokenCache } from '../lib/token-cache';
import type { CatalogClient, CatalogName } from '../types/catalog';
import { CATALOG_POLICIES } from '../workers/worker-config';
import { PlexClient } from './plex-client';
import { SPOTIFY_OAUTH, SpotifyClient } from './spotify-client';
import { TIDAL_OAUTH, TidalClient } from './tidal-client';

export { PlexClient } from './plex-client';
export { SpotifyClient } from './spotify-client';
export { TidalClient } from './tidal-client';

export interface ClientFactoryOptions {
    signal?: AbortSignal;
    authorizer?: InteractiveAuthorizer;
}

// Wires one executor (with its pacing limiter) and one session per catalog
export class CatalogClientFactory {
    private readonly tokenCache: TokenCache;
    private readonly authorizer: InteractiveAuthorizer;

    constructor(private readonly env: Env, private readonly options: ClientFactoryOptions = {}) {
        this.tokenCache = new TokenCache({ path: env.TOKEN_CACHE_PATH, encryptionKey: env.TOKEN_CACHE_KEY });
        this.authorizer = options.authorizer ?? new LoopbackAuthorizer();
    }

    create(name: CatalogName): CatalogClient {
        switch (name) {
            case 'plex':
                return this.createPlex();
            case 'spotify':
                return this.createSpotify();
            case 'tidal':
                return this.createTidal();
        }
    }

    private createPlex(): PlexClient {
        const { PLEX_URL, PLEX_TOKEN, PLEX_LIBRARY_NAME } = this.env;
        if (!PLEX_URL || !PLEX_TOKEN) {
            throw new AuthenticationUnavailableError('plex');
        }
        const session = new SessionManager({
            service: 'plex',
            credentials: { staticToken: PLEX_TOKEN },
            headerFormat: { name: 'X-Plex-Token', scheme: null },
            signal: this.options.signal,
        });
        return new PlexClient(this.executorFor('plex'), session, {
            baseUrl: PLEX_URL,
            libraryName: PLEX_LIBRARY_NAME,
        });
    }

    private createSpotify(): SpotifyClient {
        const session = new SessionManager({
            service: 'spotify',
            credentials: {
                clientId: this.env.SPOTIFY_CLIENT_ID,
                clientSecret: this.env.SPOTIFY_CLIENT_SECRET,
                redirectUri: this.env.SPOTIFY_REDIRECT_URI,
                useAuthorizationCode: this.env.SPOTIFY_USER_AUTHORIZATION,
            },
            endpoints: SPOTIFY_OAUTH,
            tokenCache: this.tokenCache,
            authorizer: this.authorizer,
            authorizationTimeoutMs: this.env.AUTHORIZATION_TIMEOUT_MS,
            executor: this.executorFor('spotify', 'spotify-auth'),
            signal: this.options.signal,
        });
        return new SpotifyClient(this.executorFor('spotify'), session);
    }

    private createTidal(): TidalClient {
        const session = new SessionManager({
            service: 'tidal',
            credentials: {
                staticToken: this.env.TIDAL_PERSONAL_ACCESS_TOKEN,
                clientId: this.env.TIDAL_CLIENT_ID,
                clientSecret: this.env.TIDAL_CLIENT_SECRET,
                redirectUri: this.env.TIDAL_REDIRECT_URI,
                // Playlist writes need a user token
                useAuthorizationCode: true,
            },
            endpoints: TIDAL_OAUTH,
            tokenCache: this.tokenCache,
            authorizer: this.authorizer,
            authorizationTimeoutMs: this.env.AUTHORIZATION_TIMEOUT_MS,
            executor: this.executorFor('tidal', 'tidal-auth'),
            signal: this.options.signal,
        });
        return new TidalClient(this.executorFor('tidal'), session, { countryCode: this.env.TIDAL_COUNTRY_CODE });
    }

    private executorFor(catalog: CatalogName, service: string = catalog): ResilientExecutor {
        const policy = CATALOG_POLICIES[catalog];
        const retry: Partial<RetryPolicy> = {
            ...policy.retry,
            maxRetries: this.env.HTTP_MAX_RETRIES,
            requestTimeoutMs: this.env.HTTP_TIMEOUT_MS,
            maxTotalWaitMs: this.env.HTTP_MAX_TOTAL_WAIT_MS,
        };
        return new ResilientExecutor({
            service,
            policy: retry,
            signal: this.options.signal,
            // Token endpoints are not paced with the catalog API
            rateLimiter: service === catalog ? new AdaptiveRateLimiter({ name: catalog, config: policy.rateLimit }) : undefined,
        });
    }
}
