import {
    type AppError,
    type Citation,
    type DatabaseError,
    type IterationRecord,
    type Trace,
    type TraceKind,
    type TraceSummary,
    generateId,
    notFound,
} from '@code-inquiry/shared';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import type { DbService } from './db.service.js';

interface TraceRow {
    id: string;
    kind: TraceKind;
    session_ref: string;
    question: string;
    iterations: string;
    iteration_count: number;
    answer: string;
    sources: string;
    citations: string;
    error: string | null;
    started_at: string;
    ended_at: string | null;
}

type TraceSummaryRow = Omit<TraceRow, 'iterations' | 'sources' | 'citations'>;

const iterationsSchema = z.array(
    z.object({
        index: z.number(),
        max_iterations: z.number(),
        reasoning: z.string(),
        code: z.string(),
        output: z.string(),
        artifacts: z.record(z.unknown()),
    }),
);

const citationsSchema = z.array(
    z.object({
        path: z.string(),
        side: z.enum(['additions', 'deletions', 'unified']),
        start_line: z.number(),
        end_line: z.number(),
        label: z.string().optional(),
        reason: z.string().optional(),
    }),
);

const sourcesSchema = z.array(z.string());

function parseColumn<T>(raw: string, schema: z.ZodType<T>, fallback: T): T {
    try {
        const parsed = schema.safeParse(JSON.parse(raw));
        return parsed.success ? parsed.data : fallback;
    } catch (e) {
        console.error('[trace] Unreadable JSON column:', e);
        return fallback;
    }
}

function castTrace(row: TraceRow): Trace {
    return {
        id: row.id,
        kind: row.kind,
        session_ref: row.session_ref,
        question: row.question,
        iterations: parseColumn<IterationRecord[]>(row.iterations, iterationsSchema, []),
        answer: row.answer,
        sources: parseColumn(row.sources, sourcesSchema, []),
        citations: parseColumn<Citation[]>(row.citations, citationsSchema, []),
        error: row.error,
        started_at: row.started_at,
        ended_at: row.ended_at,
    };
}

export interface ListTracesOptions {
    limit?: number;
    sessionRef?: string;
}

export type TraceOutcome = { answer: string; sources: string[]; citations: Citation[] } | { error: string };

/**
 * Collects one run. Iterations are appended as they happen; `finish` closes the trace and
 * persists it. Later `finish` calls are no-ops, so every run is written exactly once.
 */
export class TraceRecorder {
    private trace: Trace;
    private finished = false;

    constructor(
        private traceService: TraceService,
        kind: TraceKind,
        sessionRef: string,
        question: string,
    ) {
        this.trace = {
            id: generateId(),
            kind,
            session_ref: sessionRef,
            question,
            iterations: [],
            answer: '',
            sources: [],
            citations: [],
            error: null,
            started_at: new Date().toISOString(),
            ended_at: null,
        };
    }

    get id(): string {
        return this.trace.id;
    }

    get isFinished(): boolean {
        return this.finished;
    }

    append(record: IterationRecord): void {
        if (this.finished) return;
        this.trace.iterations.push(record);
    }

    finish(outcome: TraceOutcome): Trace {
        if (this.finished) return this.snapshot();
        this.finished = true;

        if ('error' in outcome) {
            this.trace.error = outcome.error;
        } else {
            this.trace.answer = outcome.answer;
            this.trace.sources = outcome.sources;
            this.trace.citations = outcome.citations;
        }
        this.trace.ended_at = new Date().toISOString();

        const saved = this.traceService.save(this.trace);
        if (saved.isErr()) {
            console.error(`[trace] Failed to persist trace ${this.trace.id}:`, saved.error.message);
        }
        return this.snapshot();
    }

    snapshot(): Trace {
        return { ...this.trace, iterations: [...this.trace.iterations] };
    }
}

export class TraceService {
    constructor(private dbService: DbService) {}

    start(kind: TraceKind, sessionRef: string, question: string): TraceRecorder {
        return new TraceRecorder(this, kind, sessionRef, question);
    }

    save(trace: Trace): Result<void, DatabaseError> {
        return this.dbService
            .execute(
                `INSERT INTO traces (id, kind, session_ref, question, iterations, iteration_count, answer,
                    sources, citations, error, started_at, ended_at)
                 VALUES ($id, $kind, $sessionRef, $question, $iterations, $count, $answer,
                    $sources, $citations, $error, $startedAt, $endedAt)`,
                {
                    $id: trace.id,
                    $kind: trace.kind,
                    $sessionRef: trace.session_ref,
                    $question: trace.question,
                    $iterations: JSON.stringify(trace.iterations),
                    $count: trace.iterations.length,
                    $answer: trace.answer,
                    $sources: JSON.stringify(trace.sources),
                    $citations: JSON.stringify(trace.citations),
                    $error: trace.error,
                    $startedAt: trace.started_at,
                    $endedAt: trace.ended_at,
                },
            )
            .andThen(() => this.dbService.save());
    }

    list(options: ListTracesOptions = {}): Result<TraceSummary[], DatabaseError> {
        const limit = Math.min(Math.max(options.limit ?? 50, 1), 500);
        const columns =
            'id, kind, session_ref, question, iteration_count, answer, error, started_at, ended_at';
        const result = options.sessionRef
            ? this.dbService.query<TraceSummaryRow>(
                  `SELECT ${columns} FROM traces WHERE session_ref = $ref ORDER BY started_at DESC, rowid DESC LIMIT $limit`,
                  { $ref: options.sessionRef, $limit: limit },
              )
            : this.dbService.query<TraceSummaryRow>(
                  `SELECT ${columns} FROM traces ORDER BY started_at DESC, rowid DESC LIMIT $limit`,
                  { $limit: limit },
              );
        return result;
    }

    get(id: string): Result<Trace, AppError> {
        return this.dbService.queryOne<TraceRow>('SELECT * FROM traces WHERE id = $id', { $id: id }).andThen((row) => {
            if (!row) return err(notFound(`Trace not found: ${id}`));
            return ok(castTrace(row));
        });
    }
}
