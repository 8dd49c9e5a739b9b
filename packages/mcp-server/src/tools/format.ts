import { type AnswerResponse, errorMessage, formatCitation, renderAnswerBlocks } from '@code-inquiry/shared';

export interface ToolResult {
    [key: string]: unknown;
    content: { type: 'text'; text: string }[];
    isError?: boolean;
}

export function textResult(text: string): ToolResult {
    return { content: [{ type: 'text', text }] };
}

export function errorResult(tool: string, e: unknown): ToolResult {
    console.error(`[mcp-server] ${tool} error:`, e);
    return { content: [{ type: 'text', text: `Error: ${errorMessage(e)}` }], isError: true };
}

/** Answer text, then its citations and the trace id to inspect the run with. */
export function formatAnswer(answer: AnswerResponse): string {
    const lines = [renderAnswerBlocks(answer.answer_blocks) || '(empty answer)'];
    if (answer.citations.length > 0) {
        lines.push('', 'Citations:');
        for (const citation of answer.citations) {
            const reason = citation.reason ? ` (${citation.reason})` : '';
            lines.push(`  - ${formatCitation(citation)} [${citation.side}]${reason}`);
        }
    }
    lines.push('', `Trace: ${answer.trace_id}`);
    return lines.join('\n');
}
