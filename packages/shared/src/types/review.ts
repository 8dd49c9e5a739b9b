import type { Citation } from './answer.js';
import type { DiffFileStatus } from './diff.js';

export interface ReviewFile {
    path: string;
    status: DiffFileStatus;
    additions: number;
    deletions: number;
    patch?: string;
}

export interface ReviewUser {
    login: string;
    avatar_url: string | null;
}

export interface ReviewCommit {
    sha: string;
    message: string;
    author_name: string | null;
    authored_at: string | null;
}

export interface ReviewComment {
    id: string;
    author: string | null;
    body: string;
    created_at: string | null;
}

export interface ReviewInfo {
    review_id: string;
    provider: string;
    /** The URL the review was loaded from. */
    url: string;
    owner: string;
    repo: string;
    number: number;
    title: string;
    body: string;
    base_sha: string;
    head_sha: string;
    base_ref: string;
    head_ref: string;
    state: string;
    draft: boolean;
    user: ReviewUser | null;
    files: ReviewFile[];
    commits_list: ReviewCommit[];
    comments: ReviewComment[];
    additions: number;
    deletions: number;
    changed_files: number;
    created_at: string;
}

export type IssueSeverity = 'low' | 'medium' | 'high' | 'critical';

export type IssueCategory = 'bug' | 'investigation' | 'informational';

export interface ReviewIssue {
    title: string;
    severity: IssueSeverity;
    category: IssueCategory;
    explanation_markdown: string;
    citations: Citation[];
    fix_suggestions: string[];
    tests_to_add: string[];
}

export interface ReviewResult {
    issues: ReviewIssue[];
    summary: string;
}
