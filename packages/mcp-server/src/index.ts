import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ApiClient } from './api-client.js';
import { registerCodebaseTools } from './tools/codebase-tools.js';
import { registerReviewTools } from './tools/review-tools.js';
import { registerTraceTools } from './tools/trace-tools.js';

async function main(): Promise<void> {
    const apiUrl = process.env['INQUIRY_API_URL'] ?? 'http://localhost:3848';

    // stdout carries the protocol; logs go to stderr
    console.error(`[mcp-server] Using inquiry API at ${apiUrl}`);

    const client = new ApiClient(apiUrl);
    const server = new McpServer({
        name: 'code-inquiry',
        version: '0.1.0',
    });

    registerReviewTools(server, client);
    registerCodebaseTools(server, client);
    registerTraceTools(server, client);

    const transport = new StdioServerTransport();
    await server.connect(transport);

    console.error('[mcp-server] Connected via stdio');
}

main().catch((e) => {
    console.error('[mcp-server] Fatal error:', e);
    process.exit(1);
});
