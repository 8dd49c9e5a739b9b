import { type AppError, errorToStatus } from '@code-inquiry/shared';

export interface HttpError {
    readonly status: number;
    readonly code: string;
    readonly message: string;
}

export function toHttpError(error: AppError): HttpError {
    const status = errorToStatus(error);
    switch (error.type) {
        case 'NOT_FOUND':
        case 'INVALID_INPUT':
        case 'INVALID_REPOSITORY':
        case 'PARSE_ERROR':
            return { status, code: error.type, message: error.message };
        case 'PROVIDER_ERROR':
            console.error('[toHttpError] ProviderError:', error);
            return { status, code: error.type, message: error.message };
        case 'MODEL_ERROR':
            console.error('[toHttpError] ModelError:', error);
            return { status, code: error.type, message: 'Model request failed' };
        case 'SANDBOX_ERROR':
            console.error('[toHttpError] SandboxError:', error);
            return { status, code: error.type, message: 'Internal server error' };
        case 'DATABASE_ERROR':
            console.error('[toHttpError] DatabaseError:', error);
            return { status, code: error.type, message: 'Internal server error' };
    }
}
