import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ApiClient } from '../api-client.js';
import { errorResult, textResult, type ToolResult } from './format.js';

const OUTPUT_PREVIEW_CHARS = 500;

export async function listTraces(
    client: ApiClient,
    args: { limit?: number; session_ref?: string },
): Promise<ToolResult> {
    try {
        const { traces } = await client.listTraces(args);
        if (traces.length === 0) {
            return textResult('No traces recorded.');
        }

        const lines = [`${traces.length} trace(s), newest first:`];
        for (const trace of traces) {
            const outcome = trace.error ? `failed: ${trace.error}` : 'answered';
            lines.push(
                `  [${trace.id}] ${trace.kind} ${trace.session_ref}: "${trace.question}" ` +
                    `(${trace.iteration_count} iterations, ${outcome})`,
            );
        }
        return textResult(lines.join('\n'));
    } catch (e) {
        return errorResult('list_traces', e);
    }
}

export async function getTrace(client: ApiClient, args: { trace_id: string }): Promise<ToolResult> {
    try {
        const trace = await client.getTrace(args.trace_id);
        const lines = [
            `Trace [${trace.id}] (${trace.kind}, session ${trace.session_ref}):`,
            `  Question: ${trace.question}`,
            `  Started: ${trace.started_at}`,
            `  Ended: ${trace.ended_at ?? 'running'}`,
        ];
        if (trace.error) lines.push(`  Error: ${trace.error}`);

        for (const iteration of trace.iterations) {
            const output =
                iteration.output.length > OUTPUT_PREVIEW_CHARS
                    ? `${iteration.output.slice(0, OUTPUT_PREVIEW_CHARS)}...`
                    : iteration.output;
            lines.push(
                '',
                `Step ${iteration.index}/${iteration.max_iterations}: ${iteration.reasoning}`,
                iteration.code,
                `Output: ${output || '(none)'}`,
            );
        }

        if (!trace.error) {
            lines.push('', 'Answer:', trace.answer);
            if (trace.sources.length > 0) lines.push(`Sources: ${trace.sources.join(', ')}`);
        }
        return textResult(lines.join('\n'));
    } catch (e) {
        return errorResult('get_trace', e);
    }
}

export function registerTraceTools(server: McpServer, client: ApiClient): void {
    server.registerTool(
        'list_traces',
        {
            description: 'List recorded question runs, newest first',
            inputSchema: {
                limit: z.number().int().min(1).max(500).optional().describe('Maximum number of traces (default 50)'),
                session_ref: z.string().optional().describe('Only traces of this review or codebase session'),
            },
        },
        (args) => listTraces(client, args),
    );

    server.registerTool(
        'get_trace',
        {
            description: 'Show every reasoning step, code cell and output of one recorded run',
            inputSchema: {
                trace_id: z.string().describe('Trace ID returned with an answer or by list_traces'),
            },
        },
        (args) => getTrace(client, args),
    );
}
