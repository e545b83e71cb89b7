import { RemoteError, TransportError, toError } from './errors.js';
import type { AuthHeaderProvider } from './auth.js';

/**
 * Resolves a FHIR URL from a relative or absolute path and base URL.
 */
export function resolveFhirUrl(relativeOrAbsolutePath: string, fhirBaseUrl: string): URL {
    if (relativeOrAbsolutePath.startsWith('http')) {
        return new URL(relativeOrAbsolutePath);
    }

    // Handle paths with or without leading slash
    const cleanPath = relativeOrAbsolutePath.startsWith('/')
        ? relativeOrAbsolutePath.substring(1)
        : relativeOrAbsolutePath;

    // Create URL, ensuring the base ends with a slash
    const baseWithSlash = fhirBaseUrl.endsWith('/')
        ? fhirBaseUrl
        : `${fhirBaseUrl}/`;

    return new URL(cleanPath, baseWithSlash);
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FhirRequestOptions {
    method?: 'GET' | 'POST' | 'PUT';
    body?: unknown;
    auth: AuthHeaderProvider;
    fetchImpl: FetchLike;
}

export interface FhirResponse {
    status: number;
    body: string;
    json: unknown;
}

/**
 * Sends one request to a FHIR server and returns the parsed JSON body.
 * Every request asks for the full representation back.
 *
 * Throws `TransportError` when no response arrives, `RemoteError` for a
 * non-2xx status or a body that is not JSON.
 */
export async function fhirRequest(url: string, options: FhirRequestOptions): Promise<FhirResponse> {
    const method = options.method ?? 'GET';
    const headers: Record<string, string> = {
        'Accept': 'application/fhir+json',
        'Prefer': 'return=representation',
        ...(await options.auth()),
    };
    let body: string | undefined;
    if (options.body !== undefined) {
        headers['Content-Type'] = 'application/fhir+json';
        body = JSON.stringify(options.body);
    }

    console.log(`[FHIR Fetch] ${method} ${url}`);
    let response: Response;
    try {
        response = await options.fetchImpl(url, { method, headers, body });
    } catch (error) {
        console.error(`[FHIR Fetch] ${method} ${url} failed before a response: ${toError(error).message}`);
        throw new TransportError(`${method} ${url} failed: ${toError(error).message}`, error);
    }

    let text: string;
    try {
        text = await response.text();
    } catch (error) {
        throw new TransportError(`${method} ${url}: reading the response body failed: ${toError(error).message}`, error);
    }

    if (!response.ok) {
        console.warn(`[FHIR Fetch] ${method} ${url} returned status ${response.status}`);
        throw new RemoteError(response.status, text);
    }

    try {
        return { status: response.status, body: text, json: JSON.parse(text) };
    } catch {
        throw new RemoteError(response.status, text, `${method} ${url}: response body is not JSON`);
    }
}
