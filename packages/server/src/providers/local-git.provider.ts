import {
    type AppError,
    type DiffFileStatus,
    type FileContents,
    type FileContentsResponse,
    type ProviderError,
    type ReviewCommit,
    type ReviewFile,
    type ReviewInfo,
    errorMessage,
    generateId,
    invalidInput,
    notFound,
    providerError,
} from '@code-inquiry/shared';
import { errAsync, okAsync, ResultAsync } from 'neverthrow';
import { readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { simpleGit } from 'simple-git';
import { countDiffLines } from '../lib/diff-hunks.js';
import type { ReviewStore } from '../services/session.service.js';
import type { VcsProvider } from './vcs-provider.js';

const SCHEME = 'git+file://';

export interface LocalGitRef {
    root: string;
    base: string | null;
}

/** `git+file:///abs/path[?base=<branch>]` */
export function parseLocalGitUrl(url: string): LocalGitRef | null {
    if (!url.startsWith(SCHEME)) return null;
    try {
        const parsed = new URL(url.slice('git+'.length));
        return { root: fileURLToPath(parsed), base: parsed.searchParams.get('base') };
    } catch (e) {
        console.error(`[provider:local] Unparseable URL ${url}:`, errorMessage(e));
        return null;
    }
}

/** Per-file hunks of a `git diff` output, keyed by the new path (the old path for deletions). */
export function splitUnifiedDiff(raw: string): Map<string, string> {
    const patches = new Map<string, string>();
    const sections = raw.split(/^diff --git /m).slice(1);

    for (const section of sections) {
        const lines = section.split('\n');
        const newPath = lines.find((line) => line.startsWith('+++ b/'))?.slice('+++ b/'.length);
        const oldPath = lines.find((line) => line.startsWith('--- a/'))?.slice('--- a/'.length);
        const headerPath = /^a\/.* b\/(.*)$/.exec(lines[0])?.[1];
        const path = newPath ?? oldPath ?? headerPath;
        if (!path) continue;

        const firstHunk = lines.findIndex((line) => line.startsWith('@@'));
        const hunks = firstHunk === -1 ? [] : lines.slice(firstHunk);
        while (hunks.length > 0 && hunks[hunks.length - 1] === '') hunks.pop();
        patches.set(path, hunks.join('\n'));
    }
    return patches;
}

interface NameStatus {
    path: string;
    status: DiffFileStatus;
}

/** `git diff --name-status -M` lines: `M\tpath`, `A\tpath`, `D\tpath`, `R087\told\tnew`. */
export function parseNameStatus(raw: string): NameStatus[] {
    const entries: NameStatus[] = [];
    for (const line of raw.split('\n')) {
        const [code, first, second] = line.split('\t');
        if (!code || !first) continue;
        switch (code.charAt(0)) {
            case 'A':
                entries.push({ path: first, status: 'added' });
                break;
            case 'D':
                entries.push({ path: first, status: 'removed' });
                break;
            case 'R':
                entries.push({ path: second ?? first, status: 'renamed' });
                break;
            default:
                entries.push({ path: second ?? first, status: 'modified' });
        }
    }
    return entries;
}

function gitFailure(e: unknown): ProviderError {
    return providerError(`local git failed: ${errorMessage(e)}`, e);
}

/** Detect main/master the same way for every repository: origin/HEAD first, then local branches. */
async function defaultBranch(root: string): Promise<string> {
    const git = simpleGit(root);
    try {
        const ref = (await git.raw(['symbolic-ref', '--short', 'refs/remotes/origin/HEAD'])).trim();
        const name = ref.split('/').pop();
        if (name) return name;
    } catch (e) {
        console.log(`[provider:local] No origin/HEAD in ${root}, falling back to local branches: ${errorMessage(e)}`);
    }
    const branches = await git.branch();
    return branches.all.includes('master') && !branches.all.includes('main') ? 'master' : 'main';
}

/** Working tree of a local repository compared with a base branch. */
export class LocalGitProvider implements VcsProvider {
    readonly name = 'local';

    constructor(private store: ReviewStore) {}

    canHandle(url: string): boolean {
        return url.startsWith(SCHEME);
    }

    load(url: string): ResultAsync<ReviewInfo, AppError> {
        const ref = parseLocalGitUrl(url);
        if (!ref) return errAsync(invalidInput(`Invalid local git URL: ${url}`));

        return ResultAsync.fromPromise(simpleGit(ref.root).checkIsRepo(), gitFailure)
            .orElse((error) => {
                console.error(`[provider:local] isRepo check failed for ${ref.root}:`, error.message);
                return okAsync(false);
            })
            .andThen((isRepo) =>
                isRepo
                    ? ResultAsync.fromPromise(this.describe(url, ref), gitFailure)
                    : errAsync(invalidInput(`Not a git repository: ${ref.root}`)),
            )
            .map((info) => {
                this.store.putReview(info);
                console.log(`[provider:local] Loaded ${ref.root} against ${info.base_ref} (${info.files.length} files)`);
                return info;
            });
    }

    fetchContent(reviewId: string, path: string): ResultAsync<FileContentsResponse, AppError> {
        const info = this.getCached(reviewId);
        if (!info) return errAsync(notFound(`Review not found: ${reviewId}`));
        const ref = parseLocalGitUrl(info.url);
        if (!ref) return errAsync(invalidInput(`Invalid local git URL: ${info.url}`));

        const cached = this.store.findContent(reviewId, path);
        if (cached) return okAsync(cached);

        return ResultAsync.fromPromise(
            Promise.all([this.readBase(ref.root, info.base_sha, path), this.readWorkingTree(ref.root, path)]),
            gitFailure,
        ).map(([oldFile, newFile]) => {
            const contents = { old_file: oldFile, new_file: newFile };
            this.store.putContent(reviewId, path, contents);
            return contents;
        });
    }

    getCached(reviewId: string): ReviewInfo | null {
        const info = this.store.findReview(reviewId);
        return info?.provider === this.name ? info : null;
    }

    private async describe(url: string, ref: LocalGitRef): Promise<ReviewInfo> {
        const git = simpleGit(ref.root);
        const baseRef = ref.base ?? (await defaultBranch(ref.root));
        const [baseSha, headSha, headRef, nameStatus, rawDiff] = await Promise.all([
            git.revparse([baseRef]),
            git.revparse(['HEAD']),
            git.revparse(['--abbrev-ref', 'HEAD']),
            git.raw(['diff', '--name-status', '-M', baseRef]),
            git.diff(['-M', baseRef]),
        ]);
        const commits = await this.commitsSince(ref.root, baseRef);

        const patches = splitUnifiedDiff(rawDiff);
        const files: ReviewFile[] = parseNameStatus(nameStatus).map(({ path, status }) => {
            const patch = patches.get(path) ?? '';
            return { path, status, ...countDiffLines(patch), patch };
        });

        return {
            review_id: generateId(),
            provider: this.name,
            url,
            owner: '',
            repo: basename(ref.root),
            number: 0,
            title: `${headRef.trim()} against ${baseRef}`,
            body: '',
            base_sha: baseSha.trim(),
            head_sha: headSha.trim(),
            base_ref: baseRef,
            head_ref: headRef.trim(),
            state: 'local',
            draft: false,
            user: null,
            files,
            commits_list: commits,
            comments: [],
            additions: files.reduce((sum, f) => sum + f.additions, 0),
            deletions: files.reduce((sum, f) => sum + f.deletions, 0),
            changed_files: files.length,
            created_at: new Date().toISOString(),
        };
    }

    private async commitsSince(root: string, baseRef: string): Promise<ReviewCommit[]> {
        try {
            const log = await simpleGit(root).log({ from: baseRef, to: 'HEAD' });
            return log.all.map((entry) => ({
                sha: entry.hash,
                message: entry.message,
                author_name: entry.author_name || null,
                authored_at: entry.date || null,
            }));
        } catch (e) {
            console.error(`[provider:local] Could not load commits:`, errorMessage(e));
            return [];
        }
    }

    private async readBase(root: string, sha: string, path: string): Promise<FileContents | null> {
        try {
            const contents = await simpleGit(root).show([`${sha}:${path}`]);
            return { name: path, contents, hash: `${sha}/${path}` };
        } catch (e) {
            console.log(`[provider:local] ${path} is absent at ${sha}: ${errorMessage(e)}`);
            return null;
        }
    }

    private async readWorkingTree(root: string, path: string): Promise<FileContents | null> {
        try {
            const contents = await readFile(join(root, path), 'utf-8');
            return { name: path, contents, hash: `worktree/${path}` };
        } catch (e) {
            if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return null;
            throw e;
        }
    }
}
