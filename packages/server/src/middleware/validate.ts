import { zValidator } from '@hono/zod-validator';
import type { ValidationTargets } from 'hono';
import type { ZodSchema } from 'zod';

/**
 * Validation middleware wrapper around @hono/zod-validator.
 * Returns validation errors in the same envelope as other failures:
 * { error: { code: 'INVALID_INPUT', message, details } }
 */
export function validate<Target extends keyof ValidationTargets, T extends ZodSchema>(target: Target, schema: T) {
    return zValidator(target, schema, (result, c) => {
        if (!result.success) {
            return c.json(
                {
                    error: {
                        code: 'INVALID_INPUT' as const,
                        message: 'Validation failed',
                        details: result.error.flatten().fieldErrors,
                    },
                },
                400,
            );
        }
        return undefined;
    });
}
