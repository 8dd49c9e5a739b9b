import type { AppError, FileContentsResponse, ReviewInfo } from '@code-inquiry/shared';
import type { ResultAsync } from 'neverthrow';

/**
 * One hosting backend. Providers are tried in registry order and the first whose
 * `canHandle` accepts the URL loads it.
 */
export interface VcsProvider {
    readonly name: string;
    canHandle(url: string): boolean;
    /** Fetch metadata and the changed-file list, and cache them under a new review id. */
    load(url: string): ResultAsync<ReviewInfo, AppError>;
    /** Base and head versions of one file. A side is null when the file does not exist there. */
    fetchContent(reviewId: string, path: string): ResultAsync<FileContentsResponse, AppError>;
    getCached(reviewId: string): ReviewInfo | null;
}
