export const APP_ERROR_TYPES = [
    'NOT_FOUND',
    'INVALID_INPUT',
    'INVALID_REPOSITORY',
    'PROVIDER_ERROR',
    'MODEL_ERROR',
    'SANDBOX_ERROR',
    'PARSE_ERROR',
    'DATABASE_ERROR',
] as const;

export type AppErrorType = (typeof APP_ERROR_TYPES)[number];

export interface TypedError<T extends AppErrorType> {
    type: T;
    message: string;
    cause?: unknown;
}

export type NotFoundError = TypedError<'NOT_FOUND'>;
export type InvalidInputError = TypedError<'INVALID_INPUT'>;
export type InvalidRepositoryError = TypedError<'INVALID_REPOSITORY'>;
export type ProviderError = TypedError<'PROVIDER_ERROR'>;
export type ModelError = TypedError<'MODEL_ERROR'>;
export type SandboxError = TypedError<'SANDBOX_ERROR'>;
export type ParseError = TypedError<'PARSE_ERROR'>;
export type DatabaseError = TypedError<'DATABASE_ERROR'>;

export type AppError =
    | NotFoundError
    | InvalidInputError
    | InvalidRepositoryError
    | ProviderError
    | ModelError
    | SandboxError
    | ParseError
    | DatabaseError;

export const notFound = (message: string): NotFoundError => ({ type: 'NOT_FOUND', message });

export const invalidInput = (message: string): InvalidInputError => ({ type: 'INVALID_INPUT', message });

export const invalidRepository = (path: string): InvalidRepositoryError => ({
    type: 'INVALID_REPOSITORY',
    message: `Not a readable directory: ${path}`,
});

export const providerError = (message: string, cause?: unknown): ProviderError => ({
    type: 'PROVIDER_ERROR',
    message,
    cause,
});

export const modelError = (message: string, cause?: unknown): ModelError => ({ type: 'MODEL_ERROR', message, cause });

export const sandboxError = (message: string, cause?: unknown): SandboxError => ({
    type: 'SANDBOX_ERROR',
    message,
    cause,
});

export const parseError = (message: string, cause?: unknown): ParseError => ({ type: 'PARSE_ERROR', message, cause });

export const databaseError = (message: string, cause?: unknown): DatabaseError => ({
    type: 'DATABASE_ERROR',
    message,
    cause,
});

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export function isAppError(value: unknown): value is AppError {
    if (typeof value !== 'object' || value === null) return false;
    if (!('type' in value) || !('message' in value)) return false;
    const { type, message } = value;
    return typeof message === 'string' && APP_ERROR_TYPES.some((known) => known === type);
}

export function errorToStatus(error: AppError): number {
    switch (error.type) {
        case 'NOT_FOUND':
            return 404;
        case 'INVALID_INPUT':
        case 'INVALID_REPOSITORY':
            return 400;
        case 'PROVIDER_ERROR':
        case 'MODEL_ERROR':
            return 502;
        case 'PARSE_ERROR':
            return 422;
        default:
            return 500;
    }
}
