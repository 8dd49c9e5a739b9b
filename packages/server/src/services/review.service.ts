import {
    type AppError,
    type ConversationMessage,
    type FileContentsResponse,
    type NotFoundError,
    type ReviewInfo,
    type ReviewIssue,
    type ReviewResult,
    formatReviewHeader,
    notFound,
    parseCitations,
    parseError,
} from '@code-inquiry/shared';
import { errAsync, okAsync, type Result, type ResultAsync } from 'neverthrow';
import { z } from 'zod';
import { groundDiffCitations } from '../lib/grounding.js';
import { parseJsonObject } from '../loop/action-parser.js';
import type { ChatModel } from '../model/chat-model.js';
import type { ProviderRegistry } from '../providers/provider-registry.js';
import type { DiffContextService } from './diff-context.service.js';
import { REVIEW_INSTRUCTIONS, SUGGESTION_INSTRUCTIONS } from './instructions.js';
import type { SessionService } from './session.service.js';

/** Files rendered into the fast-review prompt. */
export const MAX_REVIEW_FILES = 100;

export const FALLBACK_SUGGESTIONS = ['Explain changes', 'Identify bugs', 'Suggest tests', 'Performance check'];

const stringList = z.array(z.string()).catch([]);

const issueSchema = z.object({
    title: z.string().min(1).catch('Review Note'),
    severity: z.enum(['low', 'medium', 'high', 'critical']).catch('medium'),
    category: z.enum(['bug', 'investigation', 'informational']).catch('informational'),
    explanation: z.string().catch(''),
    citations: z.unknown(),
    fixSuggestions: stringList,
    testsToAdd: stringList,
});

const reviewReplySchema = z.object({
    summary: z.string().catch(''),
    issues: z.array(z.unknown()).catch([]),
});

const suggestionsReplySchema = z.object({
    suggestions: z.array(z.string().min(1)).min(1),
});

function truncate(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Review lookups plus the single-pass tasks on a loaded change: a fast review and follow-up
 * suggestions. Both use the sub-model without the reasoning loop.
 */
export class ReviewService {
    constructor(
        private sessions: SessionService,
        private registry: ProviderRegistry,
        private diffContext: DiffContextService,
        private subModel: ChatModel,
    ) {}

    load(url: string): ResultAsync<ReviewInfo, AppError> {
        return this.registry
            .forUrl(url)
            .asyncAndThen((provider) => provider.load(url))
            .map((info) => {
                console.log(`[review] Loaded ${info.provider} review ${info.review_id} (${info.files.length} files)`);
                return info;
            });
    }

    get(reviewId: string): Result<ReviewInfo, NotFoundError> {
        return this.sessions.getReview(reviewId);
    }

    getFileContents(reviewId: string, path: string): ResultAsync<FileContentsResponse, AppError> {
        const info = this.sessions.getReview(reviewId);
        if (info.isErr()) return errAsync(info.error);
        if (!info.value.files.some((file) => file.path === path)) {
            return errAsync(notFound(`File not in review ${reviewId}: ${path}`));
        }
        return this.registry.forReview(reviewId).asyncAndThen((provider) => provider.fetchContent(reviewId, path));
    }

    review(reviewId: string): ResultAsync<ReviewResult, AppError> {
        const info = this.sessions.getReview(reviewId);
        if (info.isErr()) return errAsync(info.error);

        const context = this.diffContext.buildPatchContext(info.value.files.slice(0, MAX_REVIEW_FILES));
        const prompt = [REVIEW_INSTRUCTIONS, '', formatReviewHeader(info.value), '', context.text].join('\n');

        return this.subModel
            .complete({ messages: [{ role: 'user', content: prompt }], json: true })
            .andThen((reply) => {
                const parsed = reviewReplySchema.safeParse(parseJsonObject(reply));
                if (!parsed.success) {
                    return errAsync(parseError('Review reply is not a JSON object', parsed.error));
                }

                let dropped = 0;
                const issues: ReviewIssue[] = [];
                for (const raw of parsed.data.issues) {
                    const issue = issueSchema.safeParse(raw);
                    if (!issue.success) continue;

                    const grounding = groundDiffCitations(parseCitations(issue.data.citations), context.visible);
                    dropped += grounding.rejected.length;
                    issues.push({
                        title: issue.data.title,
                        severity: issue.data.severity,
                        category: issue.data.category,
                        explanation_markdown: issue.data.explanation,
                        citations: grounding.grounded,
                        fix_suggestions: issue.data.fixSuggestions,
                        tests_to_add: issue.data.testsToAdd,
                    });
                }

                if (dropped > 0) {
                    console.log(`[review] Dropped ${dropped} ungrounded citation(s) from review ${reviewId}`);
                }
                return okAsync({ issues, summary: parsed.data.summary });
            });
    }

    /** Never fails: any lookup, model or parse problem yields {@link FALLBACK_SUGGESTIONS}. */
    async suggest(reviewId: string, conversation: ConversationMessage[], lastAnswer: string): Promise<string[]> {
        const info = this.sessions.getReview(reviewId);
        if (info.isErr()) return FALLBACK_SUGGESTIONS;

        const recent = conversation
            .slice(-3)
            .map((message) => `${message.role.toUpperCase()}: ${truncate(message.content, 200)}`);
        const prompt = [
            SUGGESTION_INSTRUCTIONS,
            '',
            `Change: ${info.value.title}`,
            truncate(info.value.body, 500),
            '',
            'Recent conversation:',
            ...(recent.length > 0 ? recent : ['(none)']),
            '',
            `Last answer: ${truncate(lastAnswer, 500) || '(none)'}`,
        ].join('\n');

        const reply = await this.subModel.complete({ messages: [{ role: 'user', content: prompt }], json: true });
        if (reply.isErr()) {
            console.error('[review] Suggestion request failed:', reply.error.message);
            return FALLBACK_SUGGESTIONS;
        }

        const parsed = suggestionsReplySchema.safeParse(parseJsonObject(reply.value));
        if (!parsed.success) {
            console.error('[review] Suggestion reply did not parse');
            return FALLBACK_SUGGESTIONS;
        }
        return parsed.data.suggestions.slice(0, 5);
    }
}
