import { type CodebaseSnapshot, type FileContentsResponse, providerError } from '@code-inquiry/shared';
import { drain, FakeProvider, makeReview, ScriptedModel, step } from '../../__tests__/fakes.js';
import { expectErr, expectOk } from '../../__tests__/helpers.js';
import { initInMemoryDatabase } from '../../db/client.js';
import { ReasoningLoop } from '../../loop/reasoning-loop.js';
import { ProviderRegistry } from '../../providers/provider-registry.js';
import { VmSandbox } from '../../sandbox/vm.sandbox.js';
import { DbService } from '../db.service.js';
import { DiffContextService } from '../diff-context.service.js';
import { collect, InquiryService, type InquiryEvent, toSourceList } from '../inquiry.service.js';
import { SessionService } from '../session.service.js';
import { TraceService } from '../trace.service.js';

const widget: FileContentsResponse = {
    old_file: { name: 'src/widget.ts', contents: 'a\nb', hash: 'h1' },
    new_file: { name: 'src/widget.ts', contents: 'a\nc\nd', hash: 'h2' },
};

const review = makeReview({
    files: [{ path: 'src/widget.ts', status: 'modified', additions: 2, deletions: 1, patch: '@@ -1,2 +1,3 @@\n a\n-b\n+c\n+d' }],
});

const snapshot: CodebaseSnapshot = {
    root: '/repo',
    file_tree: ['a.ts'],
    files: new Map([
        [
            'a.ts',
            {
                path: 'a.ts',
                language: 'typescript',
                size_bytes: 40,
                sha1: 'x',
                text_lines: ['export const a = 1;', 'export const b = 2;'],
                symbols: [],
            },
        ],
    ]),
    languages: { typescript: 1 },
    total_bytes: 40,
};

function types(events: InquiryEvent[]): string[] {
    return events.map((event) => event.type);
}

describe('InquiryService', () => {
    let dbService: DbService;
    let traces: TraceService;
    let sessions: SessionService;

    beforeEach(async () => {
        const db = expectOk(await initInMemoryDatabase());
        dbService = new DbService(db, ':memory:', { shutdownHooks: false });
        traces = new TraceService(dbService);
        sessions = new SessionService({ ttlMs: 60_000, maxSessions: 10 });
        sessions.putReview(review);
    });

    afterEach(() => {
        dbService.close();
    });

    function createService(model: ScriptedModel, contents: ConstructorParameters<typeof FakeProvider>[2] = {}) {
        const provider = new FakeProvider(sessions, review, { 'src/widget.ts': widget, ...contents });
        const loop = new ReasoningLoop(
            { model, subModel: new ScriptedModel([]), createSandbox: () => new VmSandbox(1000) },
            { maxIterations: 3, maxLlmCalls: 10, maxOutputChars: 2000 },
        );
        const service = new InquiryService(
            sessions,
            new ProviderRegistry([provider], sessions),
            new DiffContextService(),
            traces,
            loop,
            { fetchConcurrency: 4 },
        );
        return { service, provider };
    }

    describe('askDiff', () => {
        const submitDiff = step(
            'answer directly',
            "SUBMIT({ answer: 'b became c.\\n```ts\\nconst c = 1;\\n```', citations: ['src/widget.ts:2-3', 'src/widget.ts:9'] })",
        );

        it('streams start, iterations, blocks, citations and complete in order', async () => {
            const { service } = createService(new ScriptedModel([submitDiff]));
            const events = await drain(service.askDiff('r1', { question: 'What changed?', conversation: [] }));

            expect(types(events)).toEqual(['start', 'iteration', 'block', 'block', 'citations', 'complete']);
            expect(events[2]).toEqual({
                type: 'block',
                data: { index: 0, block: { type: 'markdown', content: 'b became c.' } },
            });
            expect(events[3]).toEqual({
                type: 'block',
                data: { index: 1, block: { type: 'code', content: 'const c = 1;', language: 'ts' } },
            });
        });

        it('keeps only citations on visible lines', async () => {
            const { service } = createService(new ScriptedModel([submitDiff]));
            const result = expectOk(await collect(service.askDiff('r1', { question: 'What changed?', conversation: [] })));

            expect(result.citations).toEqual([{ path: 'src/widget.ts', side: 'unified', start_line: 2, end_line: 3 }]);
        });

        it('persists the trace of the run', async () => {
            const { service } = createService(new ScriptedModel([submitDiff]));
            const result = expectOk(await collect(service.askDiff('r1', { question: 'What changed?', conversation: [] })));

            const trace = expectOk(traces.get(result.trace_id));
            expect(trace.kind).toBe('diff');
            expect(trace.session_ref).toBe('r1');
            expect(trace.iterations).toHaveLength(1);
            expect(trace.answer).toBe('b became c.\n```ts\nconst c = 1;\n```');
            expect(trace.error).toBeNull();
        });

        it('sends the change header, context and selection to the model', async () => {
            const model = new ScriptedModel([submitDiff]);
            const { service, provider } = createService(model);
            await drain(
                service.askDiff('r1', {
                    question: 'Why d?',
                    conversation: [{ role: 'user', content: 'hello' }],
                    selection: { path: 'src/widget.ts', side: 'additions', start_line: 3, end_line: 3, mode: 'single-line' },
                }),
            );

            expect(provider.fetched).toEqual(['src/widget.ts']);
            const prompt = model.requests[0].messages[1].content;
            expect(prompt).toContain('### pr_info\nPR #7: Add widget\nAdds the widget module.');
            expect(prompt).toContain('### conversation\nUSER: hello');
            expect(prompt).toContain('### New Version:\na\nc\nd');
        });

        it('lists every file and keeps all contents in file_data past the visible cap', async () => {
            const files = Array.from({ length: 55 }, (_, i) => ({
                path: `f${i}.ts`,
                status: 'added' as const,
                additions: 1,
                deletions: 0,
            }));
            sessions.putReview(makeReview({ files }));
            const model = new ScriptedModel([
                step(
                    'count files',
                    "SUBMIT({ answer: Object.keys(file_data).length + ' ' + file_data['f54.ts'].new, citations: [] })",
                ),
            ]);
            const { service, provider } = createService(model, {
                'f54.ts': { old_file: null, new_file: { name: 'f54.ts', contents: 'tail', hash: 'h54' } },
            });

            const result = expectOk(await collect(service.askDiff('r1', { question: 'How many?', conversation: [] })));

            expect(provider.fetched).toHaveLength(55);
            expect(result.answer_blocks).toEqual([{ type: 'markdown', content: '55 tail' }]);
            const prompt = model.requests[0].messages[1].content;
            expect(prompt).toContain('## Metadata: Found 55 files in this change (listing all):');
            expect(prompt).toContain('- f54.ts (added) +1 -0');
            expect(prompt).toContain('## File: f54.ts (added)\n(Content truncated in prompt. Use `print(file_data["f54.ts"].new)` to read)');
        });

        it('yields a single error for an unknown review without recording a trace', async () => {
            const { service } = createService(new ScriptedModel([]));
            const events = await drain(service.askDiff('missing', { question: 'q', conversation: [] }));

            expect(events).toEqual([
                { type: 'error', error: { type: 'NOT_FOUND', message: 'Review not found: missing' } },
            ]);
            expect(expectOk(traces.list())).toEqual([]);
        });

        it('fails the run when file contents cannot be fetched', async () => {
            const { service } = createService(new ScriptedModel([submitDiff]), {
                'src/widget.ts': providerError('GitHub request failed: HTTP 500'),
            });
            const events = await drain(service.askDiff('r1', { question: 'q', conversation: [] }));

            expect(types(events)).toEqual(['start', 'error']);
            const [summary] = expectOk(traces.list());
            expect(summary.error).toBe('GitHub request failed: HTTP 500');
        });

        it('ends with an error event when the model fails', async () => {
            const { service } = createService(new ScriptedModel([{ type: 'MODEL_ERROR', message: 'HTTP 503' }]));
            const events = await drain(service.askDiff('r1', { question: 'q', conversation: [] }));

            expect(types(events)).toEqual(['start', 'error']);
            expect(events[1]).toEqual({ type: 'error', error: { type: 'MODEL_ERROR', message: 'HTTP 503' } });
            expect(expectOk(traces.list())[0].error).toBe('HTTP 503');
        });

        it('stops without an answer when the request is aborted', async () => {
            const { service } = createService(new ScriptedModel([submitDiff]));
            const controller = new AbortController();
            controller.abort();

            const result = await collect(service.askDiff('r1', { question: 'q', conversation: [] }, controller.signal));

            expect(expectErr(result)).toEqual({ type: 'MODEL_ERROR', message: 'Run ended before an answer was produced' });
            expect(expectOk(traces.list())[0].error).toBe('Cancelled by client');
        });
    });

    describe('askCodebase', () => {
        const submitCodebase = step(
            'read a.ts',
            "SUBMIT({ answer: 'a.ts exports a and b.', sources: 'a.ts:1-2, b.ts:1' })",
        );

        it('answers, grounds sources against the snapshot and records history', async () => {
            const { service } = createService(new ScriptedModel([submitCodebase]));
            const session = sessions.createCodebase(snapshot);

            const result = expectOk(await collect(service.askCodebase(session.id, 'What does a.ts export?')));

            expect(result.answer_blocks).toEqual([{ type: 'markdown', content: 'a.ts exports a and b.' }]);
            expect(result.citations).toEqual([{ path: 'a.ts', side: 'unified', start_line: 1, end_line: 2 }]);
            expect(expectOk(sessions.getCodebase(session.id)).history).toEqual([
                { question: 'What does a.ts export?', answer: 'a.ts exports a and b.' },
            ]);
            expect(expectOk(traces.get(result.trace_id)).sources).toEqual(['a.ts:1-2', 'b.ts:1']);
        });

        it('passes earlier turns to the next question', async () => {
            const model = new ScriptedModel([submitCodebase, submitCodebase]);
            const { service } = createService(model);
            const session = sessions.createCodebase(snapshot);

            await drain(service.askCodebase(session.id, 'First?'));
            await drain(service.askCodebase(session.id, 'Second?'));

            expect(model.requests[1].messages[1].content).toContain('Q1: First?\nA1: a.ts exports a and b.');
        });

        it('leaves history untouched when the run fails', async () => {
            const { service } = createService(new ScriptedModel([{ type: 'MODEL_ERROR', message: 'timeout' }]));
            const session = sessions.createCodebase(snapshot);

            const result = await collect(service.askCodebase(session.id, 'q'));

            expect(expectErr(result).message).toBe('timeout');
            expect(expectOk(sessions.getCodebase(session.id)).history).toEqual([]);
        });

        it('rejects an unknown session', async () => {
            const { service } = createService(new ScriptedModel([]));
            const events = await drain(service.askCodebase('nope', 'q'));

            expect(events).toEqual([
                { type: 'error', error: { type: 'NOT_FOUND', message: 'Codebase session not found: nope' } },
            ]);
        });
    });
});

describe('toSourceList', () => {
    it('accepts comma-separated strings, lists and path records', () => {
        expect(toSourceList('a.ts:1, b.ts')).toEqual(['a.ts:1', 'b.ts']);
        expect(toSourceList(['a.ts', { path: 'b.ts' }, 3, ''])).toEqual(['a.ts', 'b.ts']);
        expect(toSourceList(undefined)).toEqual([]);
    });
});
