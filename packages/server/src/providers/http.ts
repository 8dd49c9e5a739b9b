import { type ProviderError, errorMessage, providerError } from '@code-inquiry/shared';
import { okAsync, ResultAsync } from 'neverthrow';
import type { z } from 'zod';

export interface HttpGet {
    url: string;
    headers: Record<string, string>;
    timeoutMs: number;
    /** Log and error prefix, e.g. `github`. */
    tag: string;
}

function isTimeout(e: unknown): boolean {
    return typeof e === 'object' && e !== null && 'name' in e && e.name === 'TimeoutError';
}

function describeFailure(request: HttpGet, e: unknown): ProviderError {
    if (isTimeout(e)) {
        return providerError(`${request.tag} request timed out after ${request.timeoutMs}ms: ${request.url}`, e);
    }
    return providerError(`${request.tag} request failed: ${errorMessage(e)}`, e);
}

async function send(request: HttpGet): Promise<Response> {
    return fetch(request.url, { headers: request.headers, signal: AbortSignal.timeout(request.timeoutMs) });
}

/** GET a JSON document and validate it. Non-2xx responses and schema mismatches are errors. */
export function getJson<T>(request: HttpGet, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ResultAsync<T, ProviderError> {
    return ResultAsync.fromPromise(
        send(request).then(async (response) => {
            if (!response.ok) {
                throw new Error(`HTTP ${response.status} for ${request.url}`);
            }
            const parsed = schema.safeParse(await response.json());
            if (!parsed.success) {
                throw new Error(`Unexpected response shape from ${request.url}: ${parsed.error.issues[0]?.message}`);
            }
            return parsed.data;
        }),
        (e) => describeFailure(request, e),
    );
}

/** GET a raw text body. A non-2xx response means the file is absent and yields null. */
export function getText(request: HttpGet): ResultAsync<string | null, ProviderError> {
    return ResultAsync.fromPromise(
        send(request).then(async (response) => {
            if (!response.ok) {
                if (response.status !== 404) {
                    console.error(`[provider:${request.tag}] HTTP ${response.status} for ${request.url}`);
                }
                return null;
            }
            return response.text();
        }),
        (e) => describeFailure(request, e),
    );
}

/** Run an enrichment call whose failure must not fail the load. */
export function optional<T>(result: ResultAsync<T[], ProviderError>, tag: string, what: string): ResultAsync<T[], never> {
    return result.orElse((error) => {
        console.error(`[provider:${tag}] Could not load ${what}:`, error.message);
        return okAsync<T[], never>([]);
    });
}
