import { afterEach, describe, expect, it, vi } from 'vitest';
import { handleUnhandledRejection } from './cliErrors';

describe('handleUnhandledRejection', () => {
    afterEach(() => {
        vi.restoreAllMocks();
        process.exitCode = undefined;
    });

    it('should log the reason and mark the run as failed', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        handleUnhandledRejection(new Error('disk full'));

        expect(process.exitCode).toBe(1);
        expect(error).toHaveBeenCalledTimes(1);
        expect(String(error.mock.calls[0][0])).toContain('[CLI] Unhandled rejection: disk full');
    });

    it('should describe non-Error reasons', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        handleUnhandledRejection('lost connection');

        expect(process.exitCode).toBe(1);
        expect(String(error.mock.calls[0][0])).toContain('[CLI] Unhandled rejection: lost connection');
    });
});
