import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { errorHandler } from './middleware/error-handler.js';
import { createCodebaseRoutes } from './routes/codebase.routes.js';
import { createReviewRoutes } from './routes/reviews.routes.js';
import { createTraceRoutes } from './routes/traces.routes.js';
import type { InquiryService } from './services/inquiry.service.js';
import type { ReviewService } from './services/review.service.js';
import type { SessionService } from './services/session.service.js';
import type { SnapshotService } from './services/snapshot.service.js';
import type { TraceService } from './services/trace.service.js';

export interface AppDependencies {
    sessionService: SessionService;
    snapshotService: SnapshotService;
    reviewService: ReviewService;
    inquiryService: InquiryService;
    traceService: TraceService;
    providers: string[];
}

export function createApp(deps: AppDependencies): Hono {
    const app = new Hono();

    // Middleware
    app.use('*', cors());
    app.use('*', logger());

    // Error handler
    app.onError(errorHandler);

    // Health check
    app.get('/api/health', (c) => {
        return c.json({ status: 'ok', providers: deps.providers, sessions: deps.sessionService.size });
    });

    // API routes
    app.route('/api/reviews', createReviewRoutes(deps.reviewService, deps.inquiryService));
    app.route('/api/codebase', createCodebaseRoutes(deps.snapshotService, deps.sessionService, deps.inquiryService));
    app.route('/api/traces', createTraceRoutes(deps.traceService));

    return app;
}
