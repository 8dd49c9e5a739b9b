import { vi } from 'vitest';
import { expectErr, expectOk } from '../../__tests__/helpers.js';
import { OpenAiCompatibleModel } from '../openai-compatible.model.js';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

describe('OpenAiCompatibleModel', () => {
    const fetchMock = vi.fn<typeof fetch>();

    beforeEach(() => {
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    const model = new OpenAiCompatibleModel({
        baseUrl: 'http://models.test/v1',
        apiKey: 'test-secret',
        model: 'test-model',
        timeoutMs: 50,
    });

    it('posts the chat request and returns the message content', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: 'hello' } }] }));

        const reply = expectOk(
            await model.complete({ messages: [{ role: 'user', content: 'hi' }], json: true, temperature: 0 }),
        );

        expect(reply).toBe('hello');
        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('http://models.test/v1/chat/completions');
        expect(init?.method).toBe('POST');
        expect(init?.headers).toEqual({
            'content-type': 'application/json',
            authorization: 'Bearer test-secret',
        });
        expect(JSON.parse(String(init?.body))).toEqual({
            model: 'test-model',
            messages: [{ role: 'user', content: 'hi' }],
            temperature: 0,
            response_format: { type: 'json_object' },
        });
    });

    it('treats null content as an empty reply', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: null } }] }));
        expect(expectOk(await model.complete({ messages: [] }))).toBe('');
    });

    it('maps HTTP failures to a model error', async () => {
        fetchMock.mockResolvedValue(new Response('rate limited', { status: 429 }));

        const error = expectErr(await model.complete({ messages: [] }));
        expect(error.type).toBe('MODEL_ERROR');
        expect(error.message).toBe('Model test-model request failed: HTTP 429: rate limited');
    });

    it('rejects malformed completions', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ choices: [] }));

        const error = expectErr(await model.complete({ messages: [] }));
        expect(error.message).toBe('Model test-model request failed: Malformed completion response');
    });

    it('reports a timeout when the request is aborted', async () => {
        fetchMock.mockImplementation(
            (_url, init) =>
                new Promise((_resolve, reject) => {
                    init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
                }),
        );

        const error = expectErr(await model.complete({ messages: [] }));
        expect(error.message).toBe('Model test-model timed out after 50ms');
    });
});
