import type { Result } from 'neverthrow';
import { expect } from 'vitest';

export function expectOk<T, E>(result: Result<T, E>): T {
    if (result.isErr()) {
        return expect.unreachable(`Expected Ok but got Err: ${JSON.stringify(result.error)}`);
    }
    return result.value;
}

export function expectErr<T, E>(result: Result<T, E>): E {
    if (result.isOk()) {
        return expect.unreachable(`Expected Err but got Ok: ${JSON.stringify(result.value)}`);
    }
    return result.error;
}
