export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class TimeoutError extends Error {
    constructor(public readonly label: string, public readonly timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

/**
 * Races `task` against a timer. The task keeps running after a timeout; callers that
 * can cancel it should do so via `onTimeout`.
 */
export async function withTimeout<T>(task: Promise<T>, timeoutMs: number, label: string, onTimeout?: () => void): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            onTimeout?.();
            reject(new TimeoutError(label, timeoutMs));
        }, timeoutMs);
    });
    try {
        return await Promise.race([task, timeout]);
    } finally {
        if (timer) clearTimeout(timer);
    }
}

export interface Clock {
    /** Wall-clock epoch milliseconds (records, audit). */
    now(): number;
    /** Monotonic milliseconds (scheduling, elapsed time). */
    monotonic(): number;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    monotonic: () => performance.now()
};
