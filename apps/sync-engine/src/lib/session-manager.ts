import type { Logger } from 'pino';
import { z } from 'zod';
import type {
    AuthHeaderFormat,
    OAuthEndpoints,
    SessionCredentials,
    SessionState,
    SessionToken,
} from '../types/session';
import { openBrowser } from './browser';
import { CallbackListener } from './callback-listener';
import type { AuthorizationCallback } from './callback-listener';
import { serviceLoggers } from './logger';
import { buildAuthorizationUrl, createPkcePair, generateState } from './pkce';
import { ResilientExecutor } from './resilient-executor';
import type { AuthProvider } from './resilient-executor';
import {
    AuthenticationUnavailableError,
    AuthorizationStateMismatchError,
    FatalClientError,
    JobCancelledError,
    describeError,
} from './sync-errors';
import type { TokenCache } from './token-cache';

// Tokens within this margin of expiry are treated as expired
export const EXPIRY_MARGIN_MS = 60_000;
export const DEFAULT_AUTHORIZATION_TIMEOUT_MS = 300_000;

const BEARER: AuthHeaderFormat = { name: 'Authorization', scheme: 'Bearer' };

const tokenResponseSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.number().optional(),
    refresh_token: z.string().optional(),
    scope: z.string().optional(),
});

type TokenResponse = z.infer<typeof tokenResponseSchema>;

export interface AuthorizationRequest {
    url: string;
    redirectUri: string;
    timeoutMs: number;
    signal?: AbortSignal;
}

export interface InteractiveAuthorizer {
    authorize(request: AuthorizationRequest): Promise<AuthorizationCallback>;
}

// Starts a loopback listener on the redirect URI, then sends the user to the consent page
export class LoopbackAuthorizer implements InteractiveAuthorizer {
    constructor(private readonly openUrl: (url: string) => void = openBrowser) {}

    async authorize(request: AuthorizationRequest): Promise<AuthorizationCallback> {
        const redirect = new URL(request.redirectUri);
        const listener = new CallbackListener(redirect.pathname || '/callback');
        const port = Number(redirect.port) || 80;

        try {
            await listener.listen(port, redirect.hostname);
        } catch (error) {
            await listener.close();
            throw error;
        }

        serviceLoggers.session.info({ url: request.url }, 'Open this URL in a browser to authorize access');
        this.openUrl(request.url);

        return listener.waitForCallback({ timeoutMs: request.timeoutMs, signal: request.signal });
    }
}

export interface SessionManagerOptions {
    service: string;
    credentials: SessionCredentials;
    endpoints?: OAuthEndpoints;
    tokenCache?: TokenCache;
    authorizer?: InteractiveAuthorizer;
    executor?: ResilientExecutor;
    headerFormat?: AuthHeaderFormat;
    authorizationTimeoutMs?: number;
    now?: () => number;
    signal?: AbortSignal;
}

/**
 * Credential lifecycle for one service. Acquisition order: static token,
 * client credentials, cached token, refresh token, interactive authorization.
 * Concurrent callers share a single in-flight acquisition.
 */
export class SessionManager implements AuthProvider {
    readonly service: string;
    private token: SessionToken | null = null;
    private currentState: SessionState = 'unauthenticated';
    private inFlight: Promise<SessionToken> | null = null;
    private readonly executor: ResilientExecutor;
    private readonly headerFormat: AuthHeaderFormat;
    private readonly now: () => number;
    private readonly log: Logger;

    constructor(private readonly options: SessionManagerOptions) {
        this.service = options.service;
        this.executor = options.executor ?? new ResilientExecutor({ service: `${options.service}-auth` });
        this.headerFormat = options.headerFormat ?? BEARER;
        this.now = options.now ?? Date.now;
        this.log = serviceLoggers.session.child({ service: options.service });
    }

    get state(): SessionState {
        return this.currentState;
    }

    async getAccessToken(): Promise<string> {
        if (this.token && this.isUsable(this.token)) {
            return this.token.accessToken;
        }
        if (this.token) {
            this.transition('expired');
        }
        const token = await this.acquire(null);
        return token.accessToken;
    }

    async getAuthHeaders(): Promise<Record<string, string>> {
        const accessToken = await this.getAccessToken();
        const { name, scheme } = this.headerFormat;
        return { [name]: scheme ? `${scheme} ${accessToken}` : accessToken };
    }

    async onAuthenticationExpired(): Promise<void> {
        const rejected = this.token?.accessToken ?? null;
        if (this.inFlight === null) {
            this.transition('expired');
        }
        await this.acquire(rejected);
    }

    private acquire(rejectedAccessToken: string | null): Promise<SessionToken> {
        if (this.inFlight === null) {
            this.inFlight = this.runAcquisition(rejectedAccessToken).finally(() => {
                this.inFlight = null;
            });
        }
        return this.inFlight;
    }

    private async runAcquisition(rejectedAccessToken: string | null): Promise<SessionToken> {
        const previous = this.token;
        this.transition('authenticating');

        try {
            const token = await this.obtainToken(previous, rejectedAccessToken);
            this.token = token;
            this.transition('authenticated');
            return token;
        } catch (error) {
            this.token = null;
            this.transition('unauthenticated');
            throw error;
        }
    }

    private async obtainToken(previous: SessionToken | null, rejectedAccessToken: string | null): Promise<SessionToken> {
        const { credentials, endpoints } = this.options;
        const failures: unknown[] = [];

        if (credentials.staticToken) {
            return { accessToken: credentials.staticToken, refreshToken: null, expiresAt: null, scope: null };
        }

        if (endpoints && credentials.clientId && credentials.clientSecret && !credentials.useAuthorizationCode) {
            try {
                return await this.persist(await this.clientCredentialsGrant(endpoints));
            } catch (error) {
                this.recordFailure('client credentials', error, failures);
            }
        }

        const cached = await this.loadCached();
        if (cached && cached.accessToken !== rejectedAccessToken && this.isUsable(cached)) {
            this.log.debug('Using cached token');
            return cached;
        }

        const refreshToken = previous?.refreshToken ?? cached?.refreshToken ?? null;
        if (endpoints && credentials.clientId && refreshToken) {
            try {
                return await this.persist(await this.refreshGrant(endpoints, refreshToken));
            } catch (error) {
                this.recordFailure('refresh token', error, failures);
                if (error instanceof FatalClientError) {
                    // Refresh token revoked or invalid
                    await this.options.tokenCache?.clear(this.service);
                }
            }
        }

        if (endpoints && credentials.clientId && credentials.redirectUri && this.options.authorizer) {
            try {
                return await this.persist(await this.authorizationCodeGrant(endpoints));
            } catch (error) {
                this.recordFailure('authorization code', error, failures);
            }
        }

        throw new AuthenticationUnavailableError(this.service, { cause: failures.at(-1) });
    }

    private recordFailure(strategy: string, error: unknown, failures: unknown[]): void {
        if (error instanceof JobCancelledError) {
            throw error;
        }
        this.log.warn({ strategy, err: error }, `Token acquisition failed: ${describeError(error)}`);
        failures.push(error);
    }

    private async clientCredentialsGrant(endpoints: OAuthEndpoints): Promise<SessionToken> {
        const { clientId = '', clientSecret = '' } = this.options.credentials;
        const response = await this.requestToken(endpoints, {
            grant_type: 'client_credentials',
            client_id: clientId,
            client_secret: clientSecret,
        });
        this.log.info('Obtained client credentials token');
        return this.toSessionToken(response, null);
    }

    private async refreshGrant(endpoints: OAuthEndpoints, refreshToken: string): Promise<SessionToken> {
        const { clientId = '', clientSecret } = this.options.credentials;
        const params: Record<string, string> = {
            grant_type: 'refresh_token',
            refresh_token: refreshToken,
            client_id: clientId,
        };
        if (clientSecret) {
            params.client_secret = clientSecret;
        }

        const response = await this.requestToken(endpoints, params);
        this.log.info('Refreshed access token');
        // Providers may omit the refresh token when it is unchanged
        return this.toSessionToken(response, refreshToken);
    }

    private async authorizationCodeGrant(endpoints: OAuthEndpoints): Promise<SessionToken> {
        const { clientId = '', clientSecret, redirectUri = '' } = this.options.credentials;
        const authorizer = this.options.authorizer;
        if (!authorizer) {
            throw new AuthenticationUnavailableError(this.service);
        }

        const pkce = createPkcePair();
        const state = generateState();
        const url = buildAuthorizationUrl({
            authorizeUrl: endpoints.authorizeUrl,
            clientId,
            redirectUri,
            scopes: endpoints.scopes,
            state,
            codeChallenge: pkce.challenge,
        });

        const callback = await authorizer.authorize({
            url,
            redirectUri,
            timeoutMs: this.options.authorizationTimeoutMs ?? DEFAULT_AUTHORIZATION_TIMEOUT_MS,
            signal: this.options.signal,
        });
        if (callback.state !== state) {
            throw new AuthorizationStateMismatchError();
        }

        const params: Record<string, string> = {
            grant_type: 'authorization_code',
            client_id: clientId,
            code: callback.code,
            redirect_uri: redirectUri,
            code_verifier: pkce.verifier,
        };
        if (clientSecret) {
            params.client_secret = clientSecret;
        }

        const response = await this.requestToken(endpoints, params);
        this.log.info('Authorization code exchanged for tokens');
        return this.toSessionToken(response, null);
    }

    private requestToken(endpoints: OAuthEndpoints, params: Record<string, string>): Promise<TokenResponse> {
        return this.executor.executeJson(
            {
                method: 'POST',
                url: endpoints.tokenUrl,
                headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
                body: new URLSearchParams(params).toString(),
                signal: this.options.signal,
            },
            tokenResponseSchema
        );
    }

    private toSessionToken(response: TokenResponse, fallbackRefreshToken: string | null): SessionToken {
        return {
            accessToken: response.access_token,
            refreshToken: response.refresh_token ?? fallbackRefreshToken,
            expiresAt: response.expires_in === undefined ? null : this.now() + response.expires_in * 1000,
            scope: response.scope ?? null,
        };
    }

    private async loadCached(): Promise<SessionToken | null> {
        if (!this.options.tokenCache) {
            return null;
        }
        return this.options.tokenCache.load(this.service);
    }

    private async persist(token: SessionToken): Promise<SessionToken> {
        if (this.options.tokenCache) {
            try {
                await this.options.tokenCache.save(this.service, token);
            } catch (error) {
                this.log.warn({ err: error }, 'Could not write token cache');
            }
        }
        return token;
    }

    private isUsable(token: SessionToken): boolean {
        return token.expiresAt === null || this.now() < token.expiresAt - EXPIRY_MARGIN_MS;
    }

    private transition(next: SessionState): void {
        if (next !== this.currentState) {
            this.log.debug({ from: this.currentState, to: next }, 'Session state change');
            this.currentState = next;
        }
    }
}
