import type { AskStreamEvent } from '@code-inquiry/shared';
import type { Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import { toHttpError } from '../lib/http-error.js';
import type { InquiryEvent } from '../services/inquiry.service.js';

export function toWireEvent(event: InquiryEvent): AskStreamEvent {
    if (event.type !== 'error') return event;
    const httpError = toHttpError(event.error);
    return { type: 'error', data: { code: httpError.code, message: httpError.message } };
}

/**
 * Write a question stream as SSE (`event:` = type, `data:` = JSON). A client disconnect aborts
 * the run through the signal handed to `run`.
 */
export function streamInquiry(c: Context, run: (signal: AbortSignal) => AsyncIterable<InquiryEvent>): Response {
    return streamSSE(c, async (stream) => {
        const controller = new AbortController();
        stream.onAbort(() => {
            controller.abort();
        });

        for await (const event of run(controller.signal)) {
            if (stream.aborted) break;
            const wire = toWireEvent(event);
            await stream.writeSSE({ event: wire.type, data: JSON.stringify(wire.data) });
        }
    });
}
