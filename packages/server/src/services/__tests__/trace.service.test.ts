import { databaseError, type IterationRecord } from '@code-inquiry/shared';
import { err } from 'neverthrow';
import { vi } from 'vitest';
import { expectErr, expectOk } from '../../__tests__/helpers.js';
import { initInMemoryDatabase } from '../../db/client.js';
import { DbService } from '../db.service.js';
import { TraceService } from '../trace.service.js';

const record: IterationRecord = {
    index: 1,
    max_iterations: 20,
    reasoning: 'list files',
    code: 'print(Object.keys(codebase))',
    output: "[ 'a.ts' ]",
    artifacts: { sub_queries: 0 },
};

describe('TraceService', () => {
    let dbService: DbService;
    let service: TraceService;

    beforeEach(async () => {
        const db = expectOk(await initInMemoryDatabase());
        dbService = new DbService(db, ':memory:', { shutdownHooks: false });
        service = new TraceService(dbService);
    });

    afterEach(() => {
        dbService.close();
    });

    describe('TraceRecorder', () => {
        it('persists a successful run with its iterations', () => {
            const recorder = service.start('codebase', 'session-1', 'What is a.ts?');
            recorder.append(record);
            const trace = recorder.finish({
                answer: 'It exports a.',
                sources: ['a.ts'],
                citations: [{ path: 'a.ts', side: 'unified', start_line: 1, end_line: 1 }],
            });

            expect(trace.ended_at).not.toBeNull();
            const stored = expectOk(service.get(recorder.id));
            expect(stored).toEqual(trace);
            expect(stored).toMatchObject({
                kind: 'codebase',
                session_ref: 'session-1',
                question: 'What is a.ts?',
                iterations: [record],
                answer: 'It exports a.',
                sources: ['a.ts'],
                error: null,
            });
        });

        it('persists a failed run with the iterations completed so far', () => {
            const recorder = service.start('diff', 'review-1', 'Why?');
            recorder.append(record);
            recorder.finish({ error: 'Model gpt timed out after 10ms' });

            const stored = expectOk(service.get(recorder.id));
            expect(stored.error).toBe('Model gpt timed out after 10ms');
            expect(stored.answer).toBe('');
            expect(stored.iterations).toHaveLength(1);
        });

        it('writes exactly once', () => {
            const save = vi.spyOn(service, 'save');
            const recorder = service.start('diff', 'review-1', 'Why?');

            recorder.finish({ error: 'cancelled' });
            recorder.finish({ answer: 'late', sources: [], citations: [] });
            recorder.append(record);

            expect(save).toHaveBeenCalledTimes(1);
            expect(expectOk(service.get(recorder.id))).toMatchObject({ error: 'cancelled', answer: '', iterations: [] });
            expect(recorder.isFinished).toBe(true);
        });

        it('logs a persistence failure and still returns the trace', () => {
            vi.spyOn(service, 'save').mockReturnValue(err(databaseError('disk full')));
            const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
            const recorder = service.start('codebase', 's', 'q');

            const trace = recorder.finish({ answer: 'a', sources: [], citations: [] });

            expect(trace.answer).toBe('a');
            expect(consoleError).toHaveBeenCalledWith(`[trace] Failed to persist trace ${recorder.id}:`, 'disk full');
            consoleError.mockRestore();
        });
    });

    describe('list', () => {
        it('returns summaries newest first, filtered by session', () => {
            const first = service.start('codebase', 's1', 'one');
            first.append(record);
            first.finish({ answer: 'a', sources: [], citations: [] });
            service.start('codebase', 's2', 'two').finish({ answer: 'b', sources: [], citations: [] });
            service.start('codebase', 's1', 'three').finish({ answer: 'c', sources: [], citations: [] });

            const all = expectOk(service.list());
            expect(all.map((t) => t.question)).toEqual(['three', 'two', 'one']);
            expect(all[2].iteration_count).toBe(1);
            expect(all[2]).not.toHaveProperty('iterations');

            const s1 = expectOk(service.list({ sessionRef: 's1', limit: 1 }));
            expect(s1.map((t) => t.question)).toEqual(['three']);
        });
    });

    describe('get', () => {
        it('returns NOT_FOUND for an unknown id', () => {
            const error = expectErr(service.get('missing'));
            expect(error).toEqual({ type: 'NOT_FOUND', message: 'Trace not found: missing' });
        });
    });
});
