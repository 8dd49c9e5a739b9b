import {
    databaseError,
    errorToStatus,
    invalidInput,
    invalidRepository,
    isAppError,
    modelError,
    notFound,
    parseError,
    providerError,
    sandboxError,
} from '../errors.js';

describe('error constructors', () => {
    it('notFound produces correct type and message', () => {
        const err = notFound('Review not found');
        expect(err).toEqual({ type: 'NOT_FOUND', message: 'Review not found' });
    });

    it('invalidInput produces correct type and message', () => {
        const err = invalidInput('Unsupported URL');
        expect(err).toEqual({ type: 'INVALID_INPUT', message: 'Unsupported URL' });
    });

    it('invalidRepository includes path in message', () => {
        const err = invalidRepository('/tmp/missing');
        expect(err).toEqual({ type: 'INVALID_REPOSITORY', message: 'Not a readable directory: /tmp/missing' });
    });

    it('providerError keeps the cause', () => {
        const cause = new Error('socket hang up');
        const err = providerError('GitHub request failed', cause);
        expect(err).toEqual({ type: 'PROVIDER_ERROR', message: 'GitHub request failed', cause });
    });

    it('modelError without cause leaves it undefined', () => {
        const err = modelError('timed out');
        expect(err).toEqual({ type: 'MODEL_ERROR', message: 'timed out', cause: undefined });
    });

    it('sandboxError, parseError and databaseError carry their type', () => {
        expect(sandboxError('boom').type).toBe('SANDBOX_ERROR');
        expect(parseError('bad token').type).toBe('PARSE_ERROR');
        expect(databaseError('locked').type).toBe('DATABASE_ERROR');
    });
});

describe('isAppError', () => {
    it('accepts values shaped like an AppError', () => {
        expect(isAppError({ type: 'MODEL_ERROR', message: 'x' })).toBe(true);
    });

    it('rejects unknown types and non-objects', () => {
        expect(isAppError({ type: 'SOMETHING_ELSE', message: 'x' })).toBe(false);
        expect(isAppError(new Error('plain'))).toBe(false);
        expect(isAppError('MODEL_ERROR')).toBe(false);
        expect(isAppError(null)).toBe(false);
    });
});

describe('errorToStatus', () => {
    it('maps each type to its status', () => {
        expect(errorToStatus(notFound('x'))).toBe(404);
        expect(errorToStatus(invalidInput('x'))).toBe(400);
        expect(errorToStatus(invalidRepository('/x'))).toBe(400);
        expect(errorToStatus(providerError('x'))).toBe(502);
        expect(errorToStatus(modelError('x'))).toBe(502);
        expect(errorToStatus(parseError('x'))).toBe(422);
        expect(errorToStatus(sandboxError('x'))).toBe(500);
        expect(errorToStatus(databaseError('x'))).toBe(500);
    });
});
