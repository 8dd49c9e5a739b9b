import type { DiffSide } from './diff.js';

export interface AnswerBlock {
    type: 'markdown' | 'code';
    content: string;
    language?: string;
}

export interface Citation {
    path: string;
    side: DiffSide;
    start_line: number;
    end_line: number;
    label?: string;
    reason?: string;
}

export interface ConversationMessage {
    role: 'user' | 'assistant';
    content: string;
}

export interface AnswerResponse {
    answer_blocks: AnswerBlock[];
    citations: Citation[];
    trace_id: string;
}
