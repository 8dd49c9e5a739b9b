import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ApiClient } from '../api-client.js';
import { errorResult, formatAnswer, textResult, type ToolResult } from './format.js';

export async function openCodebase(
    client: ApiClient,
    args: { path: string; include_globs?: string[]; exclude_globs?: string[] },
): Promise<ToolResult> {
    try {
        const session = await client.openCodebase(args);
        const { summary } = session;
        const languages = Object.entries(summary.languages)
            .map(([language, count]) => `${language} (${count})`)
            .join(', ');
        const lines = [
            `Opened codebase session [${session.id}]:`,
            `  Root: ${summary.root}`,
            `  Files included: ${summary.total_files} of ${summary.file_tree.length} matched (${summary.total_bytes} bytes)`,
            `  Languages: ${languages || 'none'}`,
        ];
        return textResult(lines.join('\n'));
    } catch (e) {
        return errorResult('open_codebase', e);
    }
}

export async function askCodebase(
    client: ApiClient,
    args: { session_id: string; question: string },
): Promise<ToolResult> {
    try {
        return textResult(formatAnswer(await client.askCodebase(args.session_id, args.question)));
    } catch (e) {
        return errorResult('ask_codebase', e);
    }
}

export function registerCodebaseTools(server: McpServer, client: ApiClient): void {
    server.registerTool(
        'open_codebase',
        {
            description: 'Snapshot a local directory within the byte budget and open a question session on it',
            inputSchema: {
                path: z.string().describe('Absolute path of the repository root'),
                include_globs: z.array(z.string()).optional().describe('Only include paths matching these globs'),
                exclude_globs: z.array(z.string()).optional().describe('Additionally exclude paths matching these globs'),
            },
        },
        (args) => openCodebase(client, args),
    );

    server.registerTool(
        'ask_codebase',
        {
            description: 'Ask a question about an open codebase session; earlier answers in the session are remembered',
            inputSchema: {
                session_id: z.string().describe('Session ID returned by open_codebase'),
                question: z.string().min(1).describe('The question to answer'),
            },
        },
        (args) => askCodebase(client, args),
    );
}
