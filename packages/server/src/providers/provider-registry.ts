import { type InvalidInputError, type NotFoundError, invalidInput, notFound } from '@code-inquiry/shared';
import { err, ok, type Result } from 'neverthrow';
import type { ReviewStore } from '../services/session.service.js';
import type { VcsProvider } from './vcs-provider.js';

/** Ordered providers; the first that accepts a URL wins. */
export class ProviderRegistry {
    constructor(
        private providers: VcsProvider[],
        private store: ReviewStore,
    ) {}

    get names(): string[] {
        return this.providers.map((provider) => provider.name);
    }

    forUrl(url: string): Result<VcsProvider, InvalidInputError> {
        const provider = this.providers.find((candidate) => candidate.canHandle(url));
        return provider ? ok(provider) : err(invalidInput(`No provider found for URL: ${url}`));
    }

    /** The provider that loaded a cached review. */
    forReview(reviewId: string): Result<VcsProvider, NotFoundError> {
        const info = this.store.findReview(reviewId);
        const provider = info ? this.providers.find((candidate) => candidate.name === info.provider) : undefined;
        return provider ? ok(provider) : err(notFound(`Review not found: ${reviewId}`));
    }
}
