import {
    databaseError,
    invalidInput,
    invalidRepository,
    modelError,
    notFound,
    parseError,
    providerError,
    sandboxError,
} from '@code-inquiry/shared';
import { vi } from 'vitest';
import { toHttpError } from '../http-error.js';

describe('toHttpError', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('maps NOT_FOUND → 404', () => {
        expect(toHttpError(notFound('gone'))).toEqual({ status: 404, code: 'NOT_FOUND', message: 'gone' });
    });

    it('maps INVALID_INPUT → 400', () => {
        expect(toHttpError(invalidInput('bad url'))).toEqual({ status: 400, code: 'INVALID_INPUT', message: 'bad url' });
    });

    it('maps INVALID_REPOSITORY → 400', () => {
        expect(toHttpError(invalidRepository('/nope'))).toEqual({
            status: 400,
            code: 'INVALID_REPOSITORY',
            message: 'Not a readable directory: /nope',
        });
    });

    it('maps PARSE_ERROR → 422', () => {
        expect(toHttpError(parseError('bad json'))).toEqual({ status: 422, code: 'PARSE_ERROR', message: 'bad json' });
    });

    it('maps PROVIDER_ERROR → 502 and keeps the message', () => {
        expect(toHttpError(providerError('GitHub returned 404'))).toEqual({
            status: 502,
            code: 'PROVIDER_ERROR',
            message: 'GitHub returned 404',
        });
        expect(console.error).toHaveBeenCalled();
    });

    it('maps MODEL_ERROR → 502 and hides the message', () => {
        expect(toHttpError(modelError('upstream said 401 for key test-secret'))).toEqual({
            status: 502,
            code: 'MODEL_ERROR',
            message: 'Model request failed',
        });
    });

    it('maps SANDBOX_ERROR and DATABASE_ERROR → 500', () => {
        expect(toHttpError(sandboxError('vm died'))).toEqual({
            status: 500,
            code: 'SANDBOX_ERROR',
            message: 'Internal server error',
        });
        expect(toHttpError(databaseError('db failed'))).toEqual({
            status: 500,
            code: 'DATABASE_ERROR',
            message: 'Internal server error',
        });
        expect(console.error).toHaveBeenCalledTimes(2);
    });
});
