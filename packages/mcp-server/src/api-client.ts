import type {
    AnswerResponse,
    CodebaseSession,
    ListTracesResponse,
    OpenCodebaseRequest,
    ReviewInfo,
    Trace,
} from '@code-inquiry/shared';
import { z } from 'zod';

const errorBodySchema = z.object({
    error: z.object({ code: z.string().optional(), message: z.string() }),
});

export interface ListTracesQuery {
    limit?: number;
    session_ref?: string;
}

function jsonBody(body: unknown): RequestInit {
    return {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
    };
}

/** Thin client over the inquiry HTTP API. Failures throw with the server's error message. */
export class ApiClient {
    constructor(private baseUrl: string) {}

    loadReview(url: string): Promise<ReviewInfo> {
        return this.request('/api/reviews', jsonBody({ url }));
    }

    askReview(reviewId: string, question: string): Promise<AnswerResponse> {
        return this.request(`/api/reviews/${encodeURIComponent(reviewId)}/ask`, jsonBody({ question }));
    }

    openCodebase(params: OpenCodebaseRequest): Promise<CodebaseSession> {
        return this.request('/api/codebase/sessions', jsonBody(params));
    }

    askCodebase(sessionId: string, question: string): Promise<AnswerResponse> {
        return this.request(`/api/codebase/sessions/${encodeURIComponent(sessionId)}/ask`, jsonBody({ question }));
    }

    listTraces(query: ListTracesQuery): Promise<ListTracesResponse> {
        const params = new URLSearchParams();
        if (query.limit !== undefined) params.set('limit', String(query.limit));
        if (query.session_ref) params.set('session_ref', query.session_ref);
        const search = params.toString();
        return this.request(search ? `/api/traces?${search}` : '/api/traces');
    }

    getTrace(traceId: string): Promise<Trace> {
        return this.request(`/api/traces/${encodeURIComponent(traceId)}`);
    }

    private async request<T>(path: string, init?: RequestInit): Promise<T> {
        const res = await fetch(new URL(path, this.baseUrl), init);
        if (!res.ok) {
            const body = errorBodySchema.safeParse(await res.json().catch(() => null));
            throw new Error(body.success ? body.data.error.message : `HTTP ${res.status}`);
        }
        return res.json() as Promise<T>;
    }
}
