import { z } from 'zod';
import type { AnswerResponse } from './answer.js';
import type { CodebaseSession, CodebaseSummary } from './codebase.js';
import type { FileContents } from './diff.js';
import type { ReviewInfo, ReviewResult } from './review.js';
import type { Trace, TraceSummary } from './trace.js';

// --- Shared pieces ---
export const diffSideSchema = z.enum(['additions', 'deletions', 'unified']);
export const selectionModeSchema = z.enum(['range', 'single-line', 'hunk', 'file', 'changeset']);

export const conversationMessageSchema = z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
});

export const diffSelectionSchema = z
    .object({
        path: z.string().min(1),
        side: diffSideSchema.default('unified'),
        start_line: z.number().int().positive(),
        end_line: z.number().int().positive(),
        mode: selectionModeSchema.default('range'),
    })
    .refine((selection) => selection.start_line <= selection.end_line, {
        message: 'start_line must not exceed end_line',
        path: ['end_line'],
    });

// --- Reviews ---
export const loadReviewSchema = z.object({
    url: z.string().min(1),
});
export type LoadReviewRequest = z.infer<typeof loadReviewSchema>;
export type LoadReviewResponse = ReviewInfo;

export const fileQuerySchema = z.object({
    path: z.string().min(1),
});
export interface FileContentsResponse {
    old_file: FileContents | null;
    new_file: FileContents | null;
}

export const askReviewSchema = z.object({
    question: z.string().min(1),
    conversation: z.array(conversationMessageSchema).default([]),
    selection: diffSelectionSchema.optional(),
});
export type AskReviewRequest = z.infer<typeof askReviewSchema>;
export type AskResponse = AnswerResponse;

export type ReviewResponse = ReviewResult;

export const suggestionsSchema = z.object({
    conversation: z.array(conversationMessageSchema).default([]),
    last_answer: z.string().default(''),
});
export type SuggestionsRequest = z.infer<typeof suggestionsSchema>;
export interface SuggestionsResponse {
    suggestions: string[];
}

// --- Codebase sessions ---
export const openCodebaseSchema = z.object({
    path: z.string().min(1),
    include_globs: z.array(z.string().min(1)).optional(),
    exclude_globs: z.array(z.string().min(1)).optional(),
});
export type OpenCodebaseRequest = z.infer<typeof openCodebaseSchema>;
export type OpenCodebaseResponse = CodebaseSession;
export type CodebaseSummaryResponse = CodebaseSummary;

export const askCodebaseSchema = z.object({
    question: z.string().min(1),
});
export type AskCodebaseRequest = z.infer<typeof askCodebaseSchema>;

// --- Traces ---
export const listTracesQuerySchema = z.object({
    limit: z.string().regex(/^\d+$/).optional(),
    session_ref: z.string().optional(),
});
export type ListTracesParams = z.infer<typeof listTracesQuerySchema>;
export interface ListTracesResponse {
    traces: TraceSummary[];
}
export type TraceResponse = Trace;
