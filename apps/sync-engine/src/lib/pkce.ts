import { createHash, randomBytes } from 'crypto';

export interface PkcePair {
    verifier: string;
    challenge: string;
}

export function generateCodeVerifier(): string {
    return randomBytes(64).toString('base64url');
}

export function generateCodeChallenge(verifier: string): string {
    return createHash('sha256').update(verifier).digest('base64url');
}

export function generateState(): string {
    return randomBytes(16).toString('hex');
}

export function createPkcePair(): PkcePair {
    const verifier = generateCodeVerifier();
    return { verifier, challenge: generateCodeChallenge(verifier) };
}

export interface AuthorizationUrlParams {
    authorizeUrl: string;
    clientId: string;
    redirectUri: string;
    scopes: string[];
    state: string;
    codeChallenge: string;
}

export function buildAuthorizationUrl(params: AuthorizationUrlParams): string {
    const query = new URLSearchParams({
        client_id: params.clientId,
        response_type: 'code',
        redirect_uri: params.redirectUri,
        scope: params.scopes.join(' '),
        state: params.state,
        code_challenge_method: 'S256',
        code_challenge: params.codeChallenge,
    });

    return `${params.authorizeUrl}?${query.toString()}`;
}
