import { databaseError, invalidInput, notFound } from '@code-inquiry/shared';
import { Hono } from 'hono';
import { err, errAsync, ok, okAsync } from 'neverthrow';
import { vi } from 'vitest';
import { asyncResultToResponse, resultToResponse } from '../result-to-response.js';

describe('resultToResponse', () => {
    it('returns 200 with ok value', async () => {
        const app = new Hono();
        app.get('/test', (c) => resultToResponse(c, ok({ id: '1', root: '/repo' })));

        const res = await app.request('/test');
        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ id: '1', root: '/repo' });
    });

    it('returns custom status with ok value', async () => {
        const app = new Hono();
        app.get('/test', (c) => resultToResponse(c, ok({ id: '1' }), 201));

        const res = await app.request('/test');
        expect(res.status).toBe(201);
    });

    it('returns 404 for notFound error', async () => {
        const app = new Hono();
        app.get('/test', (c) => resultToResponse(c, err(notFound('Session not found'))));

        const res = await app.request('/test');
        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Session not found' } });
    });

    it('returns 400 for invalidInput error', async () => {
        const app = new Hono();
        app.get('/test', (c) => resultToResponse(c, err(invalidInput('Unsupported URL'))));

        const res = await app.request('/test');
        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: { code: 'INVALID_INPUT', message: 'Unsupported URL' } });
    });

    it('returns 500 for databaseError', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        const app = new Hono();
        app.get('/test', (c) => resultToResponse(c, err(databaseError('DB failure'))));

        const res = await app.request('/test');
        expect(res.status).toBe(500);
        vi.restoreAllMocks();
    });
});

describe('asyncResultToResponse', () => {
    it('works with ResultAsync', async () => {
        const app = new Hono();
        app.get('/test', (c) => asyncResultToResponse(c, okAsync({ data: 'test' })));

        const res = await app.request('/test');
        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ data: 'test' });
    });

    it('maps an errored ResultAsync', async () => {
        const app = new Hono();
        app.get('/test', (c) => asyncResultToResponse(c, errAsync(notFound('Trace not found'))));

        const res = await app.request('/test');
        expect(res.status).toBe(404);
    });
});
