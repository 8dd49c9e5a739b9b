import type { AnswerBlock, Citation } from './answer.js';

export type AskStreamEvent =
    | { type: 'start'; data: { question: string; trace_id: string } }
    | {
          type: 'iteration';
          data: { index: number; max_iterations: number; reasoning: string; code: string; output: string };
      }
    | { type: 'block'; data: { index: number; block: AnswerBlock } }
    | { type: 'citations'; data: { citations: Citation[] } }
    | { type: 'complete'; data: { trace_id: string } }
    | { type: 'error'; data: { code: string; message: string } };
