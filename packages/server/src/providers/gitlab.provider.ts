import {
    type AppError,
    type DiffFileStatus,
    type FileContents,
    type FileContentsResponse,
    type ReviewFile,
    type ReviewInfo,
    generateId,
    invalidInput,
    notFound,
} from '@code-inquiry/shared';
import { errAsync, okAsync, ResultAsync } from 'neverthrow';
import { z } from 'zod';
import { countDiffLines } from '../lib/diff-hunks.js';
import type { ReviewStore } from '../services/session.service.js';
import { getJson, getText, type HttpGet, optional } from './http.js';
import type { VcsProvider } from './vcs-provider.js';

export interface GitLabProviderConfig {
    apiBase: string;
    token?: string;
    timeoutMs: number;
}

const URL_PATTERN = /([^/]+\.[^/]+)\/(.+?)\/-\/merge_requests\/(\d+)/;

const mergeRequestSchema = z.object({
    title: z.string().default(''),
    description: z.string().nullable().optional(),
    state: z.string().default('opened'),
    draft: z.boolean().optional(),
    work_in_progress: z.boolean().optional(),
    author: z.object({ username: z.string(), avatar_url: z.string().nullable().optional() }).nullable().optional(),
    source_branch: z.string().default(''),
    target_branch: z.string().default(''),
    diff_refs: z.object({ base_sha: z.string(), head_sha: z.string() }),
});

const changesSchema = z.object({
    changes: z
        .array(
            z.object({
                old_path: z.string(),
                new_path: z.string(),
                new_file: z.boolean().default(false),
                deleted_file: z.boolean().default(false),
                renamed_file: z.boolean().default(false),
                diff: z.string().default(''),
            }),
        )
        .default([]),
});

const commitsSchema = z.array(
    z.object({
        id: z.string(),
        message: z.string(),
        author_name: z.string().nullable().optional(),
        created_at: z.string().nullable().optional(),
    }),
);

const notesSchema = z.array(
    z.object({
        id: z.number(),
        body: z.string(),
        author: z.object({ username: z.string() }).nullable().optional(),
        created_at: z.string().nullable().optional(),
        system: z.boolean().default(false),
    }),
);

export interface MergeRequestRef {
    host: string;
    projectPath: string;
    iid: number;
}

export function parseMergeRequestUrl(url: string): MergeRequestRef | null {
    const match = URL_PATTERN.exec(url);
    if (!match) return null;
    return { host: match[1], projectPath: match[2], iid: Number.parseInt(match[3], 10) };
}

function changeStatus(change: { new_file: boolean; deleted_file: boolean; renamed_file: boolean }): DiffFileStatus {
    if (change.new_file) return 'added';
    if (change.deleted_file) return 'removed';
    if (change.renamed_file) return 'renamed';
    return 'modified';
}

/** Merge requests on gitlab.com and self-hosted instances, through the v4 API. */
export class GitLabProvider implements VcsProvider {
    readonly name = 'gitlab';

    constructor(
        private config: GitLabProviderConfig,
        private store: ReviewStore,
    ) {}

    canHandle(url: string): boolean {
        return url.includes('/-/merge_requests/');
    }

    load(url: string): ResultAsync<ReviewInfo, AppError> {
        const ref = parseMergeRequestUrl(url);
        if (!ref) return errAsync(invalidInput(`Invalid GitLab merge request URL: ${url}`));

        const base = `${this.apiBase(ref.host)}/projects/${encodeURIComponent(ref.projectPath)}/merge_requests/${ref.iid}`;

        return ResultAsync.combine([
            getJson(this.request(base), mergeRequestSchema),
            getJson(this.request(`${base}/changes`), changesSchema),
            optional(getJson(this.request(`${base}/commits?per_page=100`), commitsSchema), this.name, 'commits'),
            optional(getJson(this.request(`${base}/notes?per_page=100`), notesSchema), this.name, 'notes'),
        ]).map(([mr, changes, commits, notes]) => {
            const files: ReviewFile[] = changes.changes.map((change) => ({
                path: change.new_path || change.old_path,
                status: changeStatus(change),
                ...countDiffLines(change.diff),
                patch: change.diff,
            }));

            const segments = ref.projectPath.split('/');
            const repo = segments.pop() ?? ref.projectPath;

            const info: ReviewInfo = {
                review_id: generateId(),
                provider: this.name,
                url,
                owner: segments.join('/'),
                repo,
                number: ref.iid,
                title: mr.title,
                body: mr.description ?? '',
                base_sha: mr.diff_refs.base_sha,
                head_sha: mr.diff_refs.head_sha,
                base_ref: mr.target_branch,
                head_ref: mr.source_branch,
                state: mr.state,
                draft: Boolean(mr.draft || mr.work_in_progress),
                user: mr.author ? { login: mr.author.username, avatar_url: mr.author.avatar_url ?? null } : null,
                files,
                commits_list: commits.map((c) => ({
                    sha: c.id,
                    message: c.message,
                    author_name: c.author_name ?? null,
                    authored_at: c.created_at ?? null,
                })),
                comments: notes
                    .filter((note) => !note.system)
                    .map((note) => ({
                        id: String(note.id),
                        author: note.author?.username ?? null,
                        body: note.body,
                        created_at: note.created_at ?? null,
                    })),
                additions: files.reduce((sum, f) => sum + f.additions, 0),
                deletions: files.reduce((sum, f) => sum + f.deletions, 0),
                changed_files: files.length,
                created_at: new Date().toISOString(),
            };

            this.store.putReview(info);
            console.log(`[provider:gitlab] Loaded ${ref.projectPath}!${ref.iid} (${files.length} files)`);
            return info;
        });
    }

    fetchContent(reviewId: string, path: string): ResultAsync<FileContentsResponse, AppError> {
        const info = this.getCached(reviewId);
        if (!info) return errAsync(notFound(`Review not found: ${reviewId}`));

        const ref = parseMergeRequestUrl(info.url);
        if (!ref) return errAsync(invalidInput(`Invalid GitLab merge request URL: ${info.url}`));

        const cached = this.store.findContent(reviewId, path);
        if (cached) return okAsync(cached);

        return ResultAsync.combine([
            this.fetchAt(ref, path, info.base_sha),
            this.fetchAt(ref, path, info.head_sha),
        ]).map(([oldFile, newFile]) => {
            const contents = { old_file: oldFile, new_file: newFile };
            this.store.putContent(reviewId, path, contents);
            return contents;
        });
    }

    getCached(reviewId: string): ReviewInfo | null {
        const info = this.store.findReview(reviewId);
        return info?.provider === this.name ? info : null;
    }

    /** The configured API base when it points at the same host, otherwise the host's own v4 API. */
    private apiBase(host: string): string {
        return this.config.apiBase.includes(host) ? this.config.apiBase : `https://${host}/api/v4`;
    }

    private fetchAt(ref: MergeRequestRef, path: string, sha: string): ResultAsync<FileContents | null, AppError> {
        const url =
            `${this.apiBase(ref.host)}/projects/${encodeURIComponent(ref.projectPath)}` +
            `/repository/files/${encodeURIComponent(path)}/raw?ref=${sha}`;
        return getText(this.request(url)).map((text) =>
            text === null ? null : { name: path, contents: text, hash: `${ref.projectPath}/${sha}/${path}` },
        );
    }

    private request(url: string): HttpGet {
        const headers: Record<string, string> = { 'user-agent': 'code-inquiry' };
        if (this.config.token) {
            headers['private-token'] = this.config.token;
        }
        return { url, headers, timeoutMs: this.config.timeoutMs, tag: this.name };
    }
}
