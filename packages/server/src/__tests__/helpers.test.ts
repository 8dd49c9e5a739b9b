import { modelError, notFound } from '@code-inquiry/shared';
import { err, ok } from 'neverthrow';
import { expectErr, expectOk } from './helpers.js';

describe('test helpers', () => {
    describe('expectOk', () => {
        it('returns the value of an Ok result', () => {
            expect(expectOk(ok({ trace_id: 't1' }))).toEqual({ trace_id: 't1' });
        });

        it('fails for an Err result', () => {
            expect(() => expectOk(err(notFound('Session not found')))).toThrow(/Expected Ok but got Err/);
        });
    });

    describe('expectErr', () => {
        it('returns the error of an Err result', () => {
            const error = modelError('timed out');
            expect(expectErr(err(error))).toBe(error);
        });

        it('fails for an Ok result', () => {
            expect(() => expectErr(ok(42))).toThrow(/Expected Err but got Ok: 42/);
        });
    });
});
