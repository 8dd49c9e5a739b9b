import {
    type CodebaseSession,
    type CodebaseSnapshot,
    type FileContentsResponse,
    type HistoryTurn,
    type NotFoundError,
    type ReviewInfo,
    generateId,
    notFound,
} from '@code-inquiry/shared';
import { err, ok, type Result } from 'neverthrow';
import { toCodebaseSummary } from './snapshot.service.js';

export interface SessionStoreOptions {
    ttlMs: number;
    maxSessions: number;
    now?: () => number;
}

/** What VCS providers need from the session store. */
export interface ReviewStore {
    putReview(info: ReviewInfo): void;
    findReview(reviewId: string): ReviewInfo | null;
    findContent(reviewId: string, path: string): FileContentsResponse | null;
    putContent(reviewId: string, path: string, contents: FileContentsResponse): void;
}

export interface ReviewSession {
    info: ReviewInfo;
    contents: Map<string, FileContentsResponse>;
}

export interface CodebaseSessionState {
    id: string;
    snapshot: CodebaseSnapshot;
    history: HistoryTurn[];
    created_at: string;
}

interface Entry<V> {
    value: V;
    touchedAt: number;
}

/** Keyed entries with idle expiry and oldest-first eviction. Map order doubles as recency order. */
class ExpiringMap<V> {
    private entries = new Map<string, Entry<V>>();

    constructor(
        private ttlMs: number,
        private maxSize: number,
        private now: () => number,
    ) {}

    get size(): number {
        return this.entries.size;
    }

    get(key: string): V | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        if (this.now() - entry.touchedAt > this.ttlMs) {
            this.entries.delete(key);
            return undefined;
        }
        this.entries.delete(key);
        entry.touchedAt = this.now();
        this.entries.set(key, entry);
        return entry.value;
    }

    set(key: string, value: V): void {
        this.entries.delete(key);
        this.entries.set(key, { value, touchedAt: this.now() });
        while (this.entries.size > this.maxSize) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
        }
    }

    sweep(): number {
        const cutoff = this.now() - this.ttlMs;
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (entry.touchedAt < cutoff) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }
}

/**
 * In-memory review and codebase sessions, keyed by id. Each id is written by one flow only,
 * so no locking is needed. Idle sessions expire after `ttlMs`; past `maxSessions` the least
 * recently used entry of that kind is dropped.
 */
export class SessionService implements ReviewStore {
    private reviews: ExpiringMap<ReviewSession>;
    private codebases: ExpiringMap<CodebaseSessionState>;

    constructor(options: SessionStoreOptions) {
        const now = options.now ?? Date.now;
        this.reviews = new ExpiringMap(options.ttlMs, options.maxSessions, now);
        this.codebases = new ExpiringMap(options.ttlMs, options.maxSessions, now);
    }

    get size(): { reviews: number; codebases: number } {
        return { reviews: this.reviews.size, codebases: this.codebases.size };
    }

    // --- Reviews ---

    putReview(info: ReviewInfo): void {
        this.reviews.set(info.review_id, { info, contents: new Map() });
    }

    findReview(reviewId: string): ReviewInfo | null {
        return this.reviews.get(reviewId)?.info ?? null;
    }

    getReview(reviewId: string): Result<ReviewInfo, NotFoundError> {
        const info = this.findReview(reviewId);
        return info ? ok(info) : err(notFound(`Review not found: ${reviewId}`));
    }

    findContent(reviewId: string, path: string): FileContentsResponse | null {
        return this.reviews.get(reviewId)?.contents.get(path) ?? null;
    }

    putContent(reviewId: string, path: string, contents: FileContentsResponse): void {
        this.reviews.get(reviewId)?.contents.set(path, contents);
    }

    // --- Codebases ---

    createCodebase(snapshot: CodebaseSnapshot): CodebaseSessionState {
        const state: CodebaseSessionState = {
            id: generateId(),
            snapshot,
            history: [],
            created_at: new Date().toISOString(),
        };
        this.codebases.set(state.id, state);
        return state;
    }

    getCodebase(id: string): Result<CodebaseSessionState, NotFoundError> {
        const state = this.codebases.get(id);
        return state ? ok(state) : err(notFound(`Codebase session not found: ${id}`));
    }

    appendHistory(id: string, turn: HistoryTurn): Result<void, NotFoundError> {
        return this.getCodebase(id).map((state) => {
            state.history.push(turn);
        });
    }

    sweep(): number {
        const removed = this.reviews.sweep() + this.codebases.sweep();
        if (removed > 0) {
            console.log(`[sessions] Expired ${removed} idle session(s)`);
        }
        return removed;
    }
}

export function toCodebaseSession(state: CodebaseSessionState): CodebaseSession {
    return {
        id: state.id,
        summary: toCodebaseSummary(state.snapshot),
        history: [...state.history],
        created_at: state.created_at,
    };
}
