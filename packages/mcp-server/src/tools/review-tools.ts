import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ApiClient } from '../api-client.js';
import { errorResult, formatAnswer, textResult, type ToolResult } from './format.js';

const MAX_LISTED_FILES = 30;

export async function loadReview(client: ApiClient, args: { url: string }): Promise<ToolResult> {
    try {
        const info = await client.loadReview(args.url);
        const lines = [
            `Loaded review [${info.review_id}] from ${info.provider}:`,
            `  PR #${info.number}: ${info.title}`,
            `  Branches: ${info.head_ref} -> ${info.base_ref} (${info.state}${info.draft ? ', draft' : ''})`,
            `  Changes: ${info.changed_files} files, +${info.additions} -${info.deletions}`,
        ];
        if (info.files.length > 0) {
            lines.push('', `Files (${info.files.length}):`);
            for (const file of info.files.slice(0, MAX_LISTED_FILES)) {
                lines.push(`  ${file.path} (${file.status}) +${file.additions} -${file.deletions}`);
            }
            if (info.files.length > MAX_LISTED_FILES) {
                lines.push(`  ... and ${info.files.length - MAX_LISTED_FILES} more`);
            }
        }
        return textResult(lines.join('\n'));
    } catch (e) {
        return errorResult('load_review', e);
    }
}

export async function askReview(
    client: ApiClient,
    args: { review_id: string; question: string },
): Promise<ToolResult> {
    try {
        return textResult(formatAnswer(await client.askReview(args.review_id, args.question)));
    } catch (e) {
        return errorResult('ask_review', e);
    }
}

export function registerReviewTools(server: McpServer, client: ApiClient): void {
    server.registerTool(
        'load_review',
        {
            description: 'Load a pull request, merge request or local branch diff so questions can be asked about it',
            inputSchema: {
                url: z
                    .string()
                    .describe('GitHub PR URL, GitLab MR URL, or git+file:///path/to/repo[?base=branch] for a local diff'),
            },
        },
        (args) => loadReview(client, args),
    );

    server.registerTool(
        'ask_review',
        {
            description: 'Ask a question about a loaded review; the answer cites lines of the diff',
            inputSchema: {
                review_id: z.string().describe('Review ID returned by load_review'),
                question: z.string().min(1).describe('The question to answer'),
            },
        },
        (args) => askReview(client, args),
    );
}
