import type { AuthConfig } from './config.js';

/** Supplies the authentication headers added to every request. */
export type AuthHeaderProvider = () => Promise<Record<string, string>> | Record<string, string>;

export function noAuth(): AuthHeaderProvider {
    return () => ({});
}

export function basicAuth(clientId: string, clientSecret: string): AuthHeaderProvider {
    const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
    return () => ({ Authorization: `Basic ${credentials}` });
}

export function bearerToken(token: string): AuthHeaderProvider {
    return () => ({ Authorization: `Bearer ${token}` });
}

export function authFromConfig(auth: AuthConfig): AuthHeaderProvider {
    switch (auth.type) {
        case 'basic':
            return basicAuth(auth.clientId, auth.clientSecret);
        case 'bearer':
            return bearerToken(auth.token);
        case 'none':
            return noAuth();
    }
}
