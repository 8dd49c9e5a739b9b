import { listTracesQuerySchema } from '@code-inquiry/shared';
import { Hono } from 'hono';
import { resultToResponse } from '../lib/result-to-response.js';
import { validate } from '../middleware/validate.js';
import type { TraceService } from '../services/trace.service.js';
import { idParamSchema } from './params.js';

export function createTraceRoutes(traceService: TraceService): Hono {
    const app = new Hono();

    // GET /?limit=&session_ref= — Newest first
    app.get('/', validate('query', listTracesQuerySchema), (c) => {
        const { limit, session_ref } = c.req.valid('query');
        const result = traceService
            .list({ limit: limit ? Number(limit) : undefined, sessionRef: session_ref })
            .map((traces) => ({ traces }));
        return resultToResponse(c, result);
    });

    app.get('/:id', validate('param', idParamSchema), (c) => {
        const { id } = c.req.valid('param');
        return resultToResponse(c, traceService.get(id));
    });

    return app;
}
