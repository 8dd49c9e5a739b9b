import { isAppError } from '@code-inquiry/shared';
import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { toHttpError } from '../lib/http-error.js';

/**
 * Catch-all Hono error handler.
 * - AppError-shaped values go through toHttpError
 * - Anything else is a 500 with a generic message
 * - Always logs to stderr
 */
export function errorHandler(error: Error, c: Context): Response {
    console.error('[error-handler]', error);

    if (isAppError(error)) {
        const httpError = toHttpError(error);
        return c.json(
            { error: { code: httpError.code, message: httpError.message } },
            httpError.status as ContentfulStatusCode,
        );
    }

    return c.json({ error: { code: 'INTERNAL', message: 'Internal server error' } }, 500);
}
