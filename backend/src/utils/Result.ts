import { AppError } from './AppError';
import { ErrorCode } from '../../../shared/errorCodes';

export type Result<T, E = AppError> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const fail = (code: ErrorCode, message?: string, details?: Record<string, unknown>): Result<never, AppError> => ({
    ok: false,
    error: new AppError(code, message, details)
});
