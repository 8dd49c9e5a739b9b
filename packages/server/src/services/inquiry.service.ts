import {
    type AnswerResponse,
    type AppError,
    type AskReviewRequest,
    type AskStreamEvent,
    type Citation,
    type DiffFileContext,
    type ReviewInfo,
    formatConversation,
    formatHistory,
    formatReviewHeader,
    formatSelection,
    modelError,
    parseAnswerBlocks,
    parseCitations,
} from '@code-inquiry/shared';
import { err, ok, type Result } from 'neverthrow';
import { mapInBatches } from '../lib/batch.js';
import { groundCodebaseCitations, groundDiffCitations, type GroundingResult } from '../lib/grounding.js';
import type { LoopTask } from '../loop/prompts.js';
import type { ReasoningLoop } from '../loop/reasoning-loop.js';
import type { ProviderRegistry } from '../providers/provider-registry.js';
import type { DiffContextService } from './diff-context.service.js';
import {
    CODEBASE_QA_INSTRUCTIONS,
    CODEBASE_QA_OUTPUTS,
    DIFF_QA_INSTRUCTIONS,
    DIFF_QA_OUTPUTS,
} from './instructions.js';
import type { SessionService } from './session.service.js';
import { renderSnapshotOverview, toCodebaseData } from './snapshot.service.js';
import type { TraceRecorder, TraceService } from './trace.service.js';

type DataEvent = Exclude<AskStreamEvent, { type: 'error' }>;

/** Stream of one question. A failure ends the stream with a single `error` event. */
export type InquiryEvent = DataEvent | { type: 'error'; error: AppError };

interface FinalAnswer {
    answer: string;
    sources: string[];
    citations: Citation[];
}

export interface InquiryServiceOptions {
    fetchConcurrency: number;
}

function asText(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value === undefined || value === null) return '';
    return JSON.stringify(value, null, 2);
}

/** Source references from a loop result: a comma-separated string or a list of strings or `{ path }` records. */
export function toSourceList(raw: unknown): string[] {
    const items: unknown[] = typeof raw === 'string' ? raw.split(',') : Array.isArray(raw) ? raw : [];
    const sources: string[] = [];
    for (const item of items) {
        if (typeof item === 'string' && item.trim()) {
            sources.push(item.trim());
        } else if (typeof item === 'object' && item !== null && 'path' in item && typeof item.path === 'string') {
            sources.push(item.path);
        }
    }
    return sources;
}

function logRejected(kind: string, grounding: GroundingResult): Citation[] {
    if (grounding.rejected.length > 0) {
        const refs = grounding.rejected.map((c) => `${c.path}:${c.start_line}-${c.end_line}`).join(', ');
        console.log(`[inquiry] Dropped ${grounding.rejected.length} ungrounded ${kind} citation(s): ${refs}`);
    }
    return grounding.grounded;
}

/**
 * Runs one question end to end: session lookup, context assembly, the reasoning loop, answer
 * parsing with grounding, and the trace. Yields events as the loop progresses.
 */
export class InquiryService {
    constructor(
        private sessions: SessionService,
        private registry: ProviderRegistry,
        private diffContext: DiffContextService,
        private traces: TraceService,
        private loop: ReasoningLoop,
        private options: InquiryServiceOptions,
    ) {}

    async *askDiff(reviewId: string, request: AskReviewRequest, signal?: AbortSignal): AsyncGenerator<InquiryEvent> {
        const info = this.sessions.getReview(reviewId);
        if (info.isErr()) {
            yield { type: 'error', error: info.error };
            return;
        }

        const recorder = this.traces.start('diff', reviewId, request.question);
        yield { type: 'start', data: { question: request.question, trace_id: recorder.id } };

        const contexts = await this.fetchContexts(info.value);
        if (contexts.isErr()) {
            recorder.finish({ error: contexts.error.message });
            yield { type: 'error', error: contexts.error };
            return;
        }

        const assembled = this.diffContext.buildContentContext(contexts.value);
        const task: LoopTask = {
            instructions: DIFF_QA_INSTRUCTIONS,
            inputs: {
                question: request.question,
                diff_context: assembled.text,
                pr_info: formatReviewHeader(info.value),
                selection: formatSelection(request.selection),
                conversation: formatConversation(request.conversation),
            },
            data: { file_data: this.diffContext.buildFileData(contexts.value) },
            outputFields: DIFF_QA_OUTPUTS,
        };

        yield* this.drive(task, recorder, signal, (fields) => {
            const parsed = parseCitations(fields['citations']);
            return {
                answer: asText(fields['answer']),
                sources: [],
                citations: logRejected('diff', groundDiffCitations(parsed, assembled.visible)),
            };
        });
    }

    async *askCodebase(sessionId: string, question: string, signal?: AbortSignal): AsyncGenerator<InquiryEvent> {
        const session = this.sessions.getCodebase(sessionId);
        if (session.isErr()) {
            yield { type: 'error', error: session.error };
            return;
        }

        const { snapshot, history } = session.value;
        const recorder = this.traces.start('codebase', sessionId, question);
        yield { type: 'start', data: { question, trace_id: recorder.id } };

        const task: LoopTask = {
            instructions: CODEBASE_QA_INSTRUCTIONS,
            inputs: {
                question,
                conversation_history: formatHistory(history),
                codebase_overview: renderSnapshotOverview(snapshot),
            },
            data: { codebase: toCodebaseData(snapshot) },
            outputFields: CODEBASE_QA_OUTPUTS,
        };

        yield* this.drive(task, recorder, signal, (fields) => {
            const sources = toSourceList(fields['sources']);
            const answer = asText(fields['answer']);
            const appended = this.sessions.appendHistory(sessionId, { question, answer });
            if (appended.isErr()) {
                console.error(`[inquiry] Session ${sessionId} expired before its history was updated`);
            }
            return {
                answer,
                sources,
                citations: logRejected('codebase', groundCodebaseCitations(parseCitations(sources), snapshot)),
            };
        });
    }

    /** Contents of every changed file; the prompt caps what it shows, `file_data` keeps them all. */
    private async fetchContexts(info: ReviewInfo): Promise<Result<DiffFileContext[], AppError>> {
        const provider = this.registry.forReview(info.review_id);
        if (provider.isErr()) return err(provider.error);

        return mapInBatches(info.files, this.options.fetchConcurrency, (file) =>
            provider.value.fetchContent(info.review_id, file.path).map(
                (contents): DiffFileContext => ({
                    path: file.path,
                    status: file.status,
                    additions: file.additions,
                    deletions: file.deletions,
                    ...(file.patch !== undefined ? { patch: file.patch } : {}),
                    ...(contents.old_file ? { old_file: contents.old_file } : {}),
                    ...(contents.new_file ? { new_file: contents.new_file } : {}),
                }),
            ),
        );
    }

    private async *drive(
        task: LoopTask,
        recorder: TraceRecorder,
        signal: AbortSignal | undefined,
        finalize: (fields: Record<string, unknown>) => FinalAnswer,
    ): AsyncGenerator<InquiryEvent> {
        try {
            for await (const event of this.loop.run(task, signal)) {
                switch (event.type) {
                    case 'iteration': {
                        recorder.append(event.record);
                        const { index, max_iterations, reasoning, code, output } = event.record;
                        yield { type: 'iteration', data: { index, max_iterations, reasoning, code, output } };
                        break;
                    }
                    case 'final': {
                        const result = finalize(event.fields);
                        recorder.finish(result);
                        const blocks = parseAnswerBlocks(result.answer);
                        for (const [index, block] of blocks.entries()) {
                            yield { type: 'block', data: { index, block } };
                        }
                        yield { type: 'citations', data: { citations: result.citations } };
                        yield { type: 'complete', data: { trace_id: recorder.id } };
                        break;
                    }
                    case 'cancelled':
                        console.log(`[inquiry] Run ${recorder.id} cancelled after ${event.usage.iterations} iteration(s)`);
                        recorder.finish({ error: 'Cancelled by client' });
                        break;
                    case 'error':
                        console.error(`[inquiry] Run ${recorder.id} failed:`, event.error.message);
                        recorder.finish({ error: event.error.message });
                        yield { type: 'error', error: event.error };
                        break;
                }
            }
        } finally {
            // A consumer that stops reading still leaves a persisted trace.
            if (!recorder.isFinished) {
                recorder.finish({ error: 'Stream closed before the run finished' });
            }
        }
    }
}

/** Fold a question stream into one response. */
export async function collect(stream: AsyncIterable<InquiryEvent>): Promise<Result<AnswerResponse, AppError>> {
    const response: AnswerResponse = { answer_blocks: [], citations: [], trace_id: '' };
    let completed = false;

    for await (const event of stream) {
        switch (event.type) {
            case 'start':
                response.trace_id = event.data.trace_id;
                break;
            case 'block':
                response.answer_blocks.push(event.data.block);
                break;
            case 'citations':
                response.citations = event.data.citations;
                break;
            case 'complete':
                completed = true;
                break;
            case 'error':
                return err(event.error);
            case 'iteration':
                break;
        }
    }

    return completed ? ok(response) : err(modelError('Run ended before an answer was produced'));
}
