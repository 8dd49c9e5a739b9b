import { askCodebaseSchema, openCodebaseSchema } from '@code-inquiry/shared';
import { Hono } from 'hono';
import { asyncResultToResponse, resultToResponse } from '../lib/result-to-response.js';
import { validate } from '../middleware/validate.js';
import { collect, type InquiryService } from '../services/inquiry.service.js';
import { type SessionService, toCodebaseSession } from '../services/session.service.js';
import type { SnapshotOptions, SnapshotService } from '../services/snapshot.service.js';
import { idParamSchema } from './params.js';
import { streamInquiry } from './stream.js';

export function createCodebaseRoutes(
    snapshotService: SnapshotService,
    sessionService: SessionService,
    inquiryService: InquiryService,
): Hono {
    const app = new Hono();

    // POST /sessions — Snapshot a directory and open a session on it
    app.post('/sessions', validate('json', openCodebaseSchema), (c) => {
        const { path, include_globs, exclude_globs } = c.req.valid('json');
        const overrides: Partial<SnapshotOptions> = {};
        if (include_globs) overrides.includeGlobs = include_globs;
        if (exclude_globs) overrides.excludeGlobs = exclude_globs;

        const pipeline = snapshotService.build(path, overrides).map((snapshot) => {
            const session = sessionService.createCodebase(snapshot);
            console.log(`[codebase] Opened session ${session.id} on ${snapshot.root} (${snapshot.files.size} files)`);
            return toCodebaseSession(session);
        });
        return asyncResultToResponse(c, pipeline, 201);
    });

    app.get('/sessions/:id', validate('param', idParamSchema), (c) => {
        const { id } = c.req.valid('param');
        return resultToResponse(c, sessionService.getCodebase(id).map(toCodebaseSession));
    });

    app.post('/sessions/:id/ask', validate('param', idParamSchema), validate('json', askCodebaseSchema), async (c) => {
        const { id } = c.req.valid('param');
        const { question } = c.req.valid('json');
        return resultToResponse(c, await collect(inquiryService.askCodebase(id, question, c.req.raw.signal)));
    });

    app.post(
        '/sessions/:id/ask/stream',
        validate('param', idParamSchema),
        validate('json', askCodebaseSchema),
        (c) => {
            const { id } = c.req.valid('param');
            const { question } = c.req.valid('json');
            return streamInquiry(c, (signal) => inquiryService.askCodebase(id, question, signal));
        },
    );

    return app;
}
