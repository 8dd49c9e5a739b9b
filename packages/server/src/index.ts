import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { initDatabase } from './db/client.js';
import { loadConfig } from './lib/config.js';
import { ReasoningLoop } from './loop/reasoning-loop.js';
import { OpenAiCompatibleModel } from './model/openai-compatible.model.js';
import { GitHubProvider } from './providers/github.provider.js';
import { GitLabProvider } from './providers/gitlab.provider.js';
import { LocalGitProvider } from './providers/local-git.provider.js';
import { ProviderRegistry } from './providers/provider-registry.js';
import { VmSandbox } from './sandbox/vm.sandbox.js';
import { DbService } from './services/db.service.js';
import { DiffContextService } from './services/diff-context.service.js';
import { InquiryService } from './services/inquiry.service.js';
import { ReviewService } from './services/review.service.js';
import { SessionService } from './services/session.service.js';
import { SnapshotService } from './services/snapshot.service.js';
import { TraceService } from './services/trace.service.js';

const SWEEP_INTERVAL_MS = 60_000;

async function main() {
    const config = loadConfig();

    console.log(`[server] Initializing database at ${config.dbPath}`);
    const dbResult = await initDatabase(config.dbPath);

    if (dbResult.isErr()) {
        console.error('[server] Failed to initialize database:', dbResult.error);
        process.exit(1);
    }

    // Infrastructure; DbService saves and closes on SIGINT/SIGTERM
    const dbService = new DbService(dbResult.value, config.dbPath);
    const sessionService = new SessionService({ ttlMs: config.sessionTtlMs, maxSessions: config.maxSessions });
    const traceService = new TraceService(dbService);

    // Providers, checked in order
    const registry = new ProviderRegistry(
        [
            new GitLabProvider(
                { apiBase: config.gitlabApiBase, token: config.gitlabToken, timeoutMs: config.vcsTimeoutMs },
                sessionService,
            ),
            new GitHubProvider(
                { apiBase: config.githubApiBase, token: config.githubToken, timeoutMs: config.vcsTimeoutMs },
                sessionService,
            ),
            new LocalGitProvider(sessionService),
        ],
        sessionService,
    );

    // Models
    const modelConfig = { baseUrl: config.modelBaseUrl, apiKey: config.modelApiKey, timeoutMs: config.modelTimeoutMs };
    const mainModel = new OpenAiCompatibleModel({ ...modelConfig, model: config.mainModel });
    const subModel = new OpenAiCompatibleModel({ ...modelConfig, model: config.subModel });

    const loop = new ReasoningLoop(
        { model: mainModel, subModel, createSandbox: () => new VmSandbox(config.sandboxTimeoutMs) },
        {
            maxIterations: config.maxIterations,
            maxLlmCalls: config.maxLlmCalls,
            maxOutputChars: config.maxOutputChars,
        },
    );

    // Domain services
    const diffContext = new DiffContextService();
    const snapshotService = new SnapshotService({
        includeGlobs: config.includeGlobs,
        excludeGlobs: config.excludeGlobs,
        maxFileBytes: config.maxFileBytes,
        maxTotalBytes: config.maxTotalBytes,
    });
    const reviewService = new ReviewService(sessionService, registry, diffContext, subModel);
    const inquiryService = new InquiryService(sessionService, registry, diffContext, traceService, loop, {
        fetchConcurrency: config.fetchConcurrency,
    });

    const app = createApp({
        sessionService,
        snapshotService,
        reviewService,
        inquiryService,
        traceService,
        providers: registry.names,
    });

    const sweeper = setInterval(() => sessionService.sweep(), SWEEP_INTERVAL_MS);
    sweeper.unref();

    console.log(`[server] Models: main=${mainModel.name} sub=${subModel.name}; providers: ${registry.names.join(', ')}`);
    serve({ fetch: app.fetch, port: config.port }, (info) => {
        console.log(`[server] Listening on http://localhost:${info.port}`);
    });
}

main().catch((e) => {
    console.error('[server] Fatal error:', e);
    process.exit(1);
});
