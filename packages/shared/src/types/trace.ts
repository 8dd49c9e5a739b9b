import type { Citation } from './answer.js';

export interface IterationRecord {
    index: number;
    max_iterations: number;
    reasoning: string;
    code: string;
    output: string;
    artifacts: Record<string, unknown>;
}

export type TraceKind = 'codebase' | 'diff';

export interface Trace {
    id: string;
    kind: TraceKind;
    session_ref: string;
    question: string;
    iterations: IterationRecord[];
    answer: string;
    sources: string[];
    citations: Citation[];
    error: string | null;
    started_at: string;
    ended_at: string | null;
}

export type TraceSummary = Omit<Trace, 'iterations' | 'sources' | 'citations'> & { iteration_count: number };
