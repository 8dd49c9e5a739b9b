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
import type { ReviewStore } from '../services/session.service.js';
import { getJson, getText, type HttpGet, optional } from './http.js';
import type { VcsProvider } from './vcs-provider.js';

export interface GitHubProviderConfig {
    apiBase: string;
    token?: string;
    timeoutMs: number;
}

const URL_PATTERN = /github[^/]*\/([^/]+)\/([^/]+)\/pull\/(\d+)/;

const userSchema = z.object({ login: z.string(), avatar_url: z.string().nullable().optional() });

const pullSchema = z.object({
    title: z.string().default(''),
    body: z.string().nullable().optional(),
    state: z.string().default('open'),
    draft: z.boolean().default(false),
    user: userSchema.nullable().optional(),
    base: z.object({ sha: z.string(), ref: z.string() }),
    head: z.object({ sha: z.string(), ref: z.string() }),
    additions: z.number().default(0),
    deletions: z.number().default(0),
    changed_files: z.number().default(0),
});

const filesSchema = z.array(
    z.object({
        filename: z.string(),
        status: z.string().default('modified'),
        additions: z.number().default(0),
        deletions: z.number().default(0),
        patch: z.string().optional(),
    }),
);

const commitsSchema = z.array(
    z.object({
        sha: z.string(),
        commit: z.object({
            message: z.string(),
            author: z.object({ name: z.string().nullable().optional(), date: z.string().nullable().optional() }).nullable(),
        }),
    }),
);

const commentsSchema = z.array(
    z.object({
        id: z.number(),
        user: userSchema.nullable(),
        body: z.string().nullable(),
        created_at: z.string().nullable().optional(),
    }),
);

function toStatus(status: string): DiffFileStatus {
    switch (status) {
        case 'added':
        case 'removed':
        case 'renamed':
            return status;
        default:
            return 'modified';
    }
}

export function parsePullUrl(url: string): { owner: string; repo: string; number: number } | null {
    const match = URL_PATTERN.exec(url);
    if (!match) return null;
    return { owner: match[1], repo: match[2], number: Number.parseInt(match[3], 10) };
}

/** Pull requests on github.com and GitHub Enterprise, through the REST v3 API. */
export class GitHubProvider implements VcsProvider {
    readonly name = 'github';

    constructor(
        private config: GitHubProviderConfig,
        private store: ReviewStore,
    ) {}

    canHandle(url: string): boolean {
        return URL_PATTERN.test(url);
    }

    load(url: string): ResultAsync<ReviewInfo, AppError> {
        const parsed = parsePullUrl(url);
        if (!parsed) return errAsync(invalidInput(`Invalid GitHub pull request URL: ${url}`));

        const { owner, repo, number } = parsed;
        const base = `${this.config.apiBase}/repos/${owner}/${repo}`;

        return ResultAsync.combine([
            getJson(this.request(`${base}/pulls/${number}`), pullSchema),
            getJson(this.request(`${base}/pulls/${number}/files?per_page=100`), filesSchema),
            optional(getJson(this.request(`${base}/pulls/${number}/commits?per_page=100`), commitsSchema), this.name, 'commits'),
            optional(getJson(this.request(`${base}/issues/${number}/comments?per_page=100`), commentsSchema), this.name, 'comments'),
        ]).map(([pull, files, commits, comments]) => {
            const reviewFiles: ReviewFile[] = files.map((file) => ({
                path: file.filename,
                status: toStatus(file.status),
                additions: file.additions,
                deletions: file.deletions,
                ...(file.patch !== undefined ? { patch: file.patch } : {}),
            }));

            const info: ReviewInfo = {
                review_id: generateId(),
                provider: this.name,
                url,
                owner,
                repo,
                number,
                title: pull.title,
                body: pull.body ?? '',
                base_sha: pull.base.sha,
                head_sha: pull.head.sha,
                base_ref: pull.base.ref,
                head_ref: pull.head.ref,
                state: pull.state,
                draft: pull.draft,
                user: pull.user ? { login: pull.user.login, avatar_url: pull.user.avatar_url ?? null } : null,
                files: reviewFiles,
                commits_list: commits.map((c) => ({
                    sha: c.sha,
                    message: c.commit.message,
                    author_name: c.commit.author?.name ?? null,
                    authored_at: c.commit.author?.date ?? null,
                })),
                comments: comments.map((c) => ({
                    id: String(c.id),
                    author: c.user?.login ?? null,
                    body: c.body ?? '',
                    created_at: c.created_at ?? null,
                })),
                additions: pull.additions,
                deletions: pull.deletions,
                changed_files: pull.changed_files,
                created_at: new Date().toISOString(),
            };

            this.store.putReview(info);
            console.log(`[provider:github] Loaded ${owner}/${repo}#${number} (${reviewFiles.length} files)`);
            return info;
        });
    }

    fetchContent(reviewId: string, path: string): ResultAsync<FileContentsResponse, AppError> {
        const info = this.getCached(reviewId);
        if (!info) return errAsync(notFound(`Review not found: ${reviewId}`));

        const cached = this.store.findContent(reviewId, path);
        if (cached) return okAsync(cached);

        return ResultAsync.combine([this.fetchAt(info, path, info.base_sha), this.fetchAt(info, path, info.head_sha)]).map(
            ([oldFile, newFile]) => {
                const contents = { old_file: oldFile, new_file: newFile };
                this.store.putContent(reviewId, path, contents);
                return contents;
            },
        );
    }

    getCached(reviewId: string): ReviewInfo | null {
        const info = this.store.findReview(reviewId);
        return info?.provider === this.name ? info : null;
    }

    private fetchAt(info: ReviewInfo, path: string, sha: string): ResultAsync<FileContents | null, AppError> {
        const encodedPath = path.split('/').map(encodeURIComponent).join('/');
        const request = this.request(
            `${this.config.apiBase}/repos/${info.owner}/${info.repo}/contents/${encodedPath}?ref=${sha}`,
            'application/vnd.github.v3.raw',
        );
        return getText(request).map((text) =>
            text === null ? null : { name: path, contents: text, hash: `${info.owner}/${info.repo}/${sha}/${path}` },
        );
    }

    private request(url: string, accept = 'application/vnd.github.v3+json'): HttpGet {
        const headers: Record<string, string> = { accept, 'user-agent': 'code-inquiry' };
        if (this.config.token) {
            headers['authorization'] = `token ${this.config.token}`;
        }
        return { url, headers, timeoutMs: this.config.timeoutMs, tag: this.name };
    }
}
