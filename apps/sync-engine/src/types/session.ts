export type SessionState = 'unauthenticated' | 'authenticating' | 'authenticated' | 'expired';

export interface SessionToken {
    accessToken: string;
    refreshToken: string | null;
    // Epoch ms; null means the token never expires
    expiresAt: number | null;
    scope: string | null;
}

export interface SessionCredentials {
    staticToken?: string;
    clientId?: string;
    clientSecret?: string;
    redirectUri?: string;
    // Skip client credentials; user playlists need a user token
    useAuthorizationCode?: boolean;
}

export interface OAuthEndpoints {
    authorizeUrl: string;
    tokenUrl: string;
    scopes: string[];
}

export interface AuthHeaderFormat {
    name: string;
    scheme: string | null;
}
