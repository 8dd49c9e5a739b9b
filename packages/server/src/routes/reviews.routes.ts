import { askReviewSchema, fileQuerySchema, loadReviewSchema, suggestionsSchema } from '@code-inquiry/shared';
import { Hono } from 'hono';
import { asyncResultToResponse, resultToResponse } from '../lib/result-to-response.js';
import { validate } from '../middleware/validate.js';
import { collect, type InquiryService } from '../services/inquiry.service.js';
import type { ReviewService } from '../services/review.service.js';
import { idParamSchema } from './params.js';
import { streamInquiry } from './stream.js';

export function createReviewRoutes(reviewService: ReviewService, inquiryService: InquiryService): Hono {
    const app = new Hono();

    // POST / — Load a change request by URL
    app.post('/', validate('json', loadReviewSchema), (c) => {
        const { url } = c.req.valid('json');
        return asyncResultToResponse(c, reviewService.load(url), 201);
    });

    app.get('/:id', validate('param', idParamSchema), (c) => {
        const { id } = c.req.valid('param');
        return resultToResponse(c, reviewService.get(id));
    });

    // GET /:id/file?path= — Base and head versions of one changed file
    app.get('/:id/file', validate('param', idParamSchema), validate('query', fileQuerySchema), (c) => {
        const { id } = c.req.valid('param');
        const { path } = c.req.valid('query');
        return asyncResultToResponse(c, reviewService.getFileContents(id, path));
    });

    app.post('/:id/ask', validate('param', idParamSchema), validate('json', askReviewSchema), async (c) => {
        const { id } = c.req.valid('param');
        const body = c.req.valid('json');
        return resultToResponse(c, await collect(inquiryService.askDiff(id, body, c.req.raw.signal)));
    });

    app.post('/:id/ask/stream', validate('param', idParamSchema), validate('json', askReviewSchema), (c) => {
        const { id } = c.req.valid('param');
        const body = c.req.valid('json');
        return streamInquiry(c, (signal) => inquiryService.askDiff(id, body, signal));
    });

    // POST /:id/review — Single-pass review of the whole change
    app.post('/:id/review', validate('param', idParamSchema), (c) => {
        const { id } = c.req.valid('param');
        return asyncResultToResponse(c, reviewService.review(id));
    });

    app.post('/:id/suggestions', validate('param', idParamSchema), validate('json', suggestionsSchema), async (c) => {
        const { id } = c.req.valid('param');
        const found = reviewService.get(id);
        if (found.isErr()) {
            return resultToResponse(c, found);
        }
        const { conversation, last_answer } = c.req.valid('json');
        const suggestions = await reviewService.suggest(id, conversation, last_answer);
        return c.json({ suggestions });
    });

    return app;
}
