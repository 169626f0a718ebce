import { ERROR_CODES, ErrorCode } from '../../../shared/errorCodes';

export class AppError extends Error {
    public readonly errorCode: ErrorCode;
    public readonly isOperational: boolean;
    public readonly details?: Record<string, unknown>;

    constructor(errorCode: ErrorCode, message?: string, details?: Record<string, unknown>, isOperational = true) {
        super(message ?? ERROR_CODES[errorCode].message);
        this.name = 'AppError';
        this.errorCode = errorCode;
        this.isOperational = isOperational;
        this.details = details;

        Object.setPrototypeOf(this, new.target.prototype);
        Error.captureStackTrace(this);
    }
}

export const describeError = (err: unknown): string =>
    err instanceof Error ? err.message : String(err);

export const errnoCode = (err: unknown): string | undefined =>
    err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
