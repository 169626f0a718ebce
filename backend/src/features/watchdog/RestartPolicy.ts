import { RestartRecord } from '../../../../shared/types';
import { RestartHistory } from './RestartHistory';

/** Operator-requested restarts are logged but never count against the crash window. */
export const MANUAL_RESTART_REASON = 'manual';

export interface RestartLimits {
    maxRestarts: number;
    windowSeconds: number;
    cooldownSeconds: number;
}

export type RestartDecision =
    | { allowed: true }
    | { allowed: false; reason: 'window-exhausted' | 'cooldown'; retryAt: number };

/**
 * Sliding-window restart limiter with an independent cooldown between attempts.
 * Every recorded attempt counts regardless of its outcome, so a crash during the
 * restart itself is still charged.
 */
export class RestartPolicy {
    constructor(private readonly limits: RestartLimits, private readonly history: RestartHistory) {}

    check(now: number): RestartDecision {
        const counted = this.countedAttempts();
        const windowStart = now - this.limits.windowSeconds * 1000;
        const inWindow = counted.filter(r => r.timestamp >= windowStart && r.timestamp <= now);

        if (inWindow.length >= this.limits.maxRestarts) {
            const oldest = Math.min(...inWindow.map(r => r.timestamp));
            return { allowed: false, reason: 'window-exhausted', retryAt: oldest + this.limits.windowSeconds * 1000 + 1 };
        }

        const last = counted[counted.length - 1];
        if (last) {
            const readyAt = last.timestamp + this.limits.cooldownSeconds * 1000;
            if (now < readyAt) return { allowed: false, reason: 'cooldown', retryAt: readyAt };
        }

        return { allowed: true };
    }

    canRestart(now: number): boolean {
        return this.check(now).allowed;
    }

    countInWindow(now: number): number {
        const windowStart = now - this.limits.windowSeconds * 1000;
        return this.countedAttempts().filter(r => r.timestamp >= windowStart && r.timestamp <= now).length;
    }

    /** Appended before the restart is attempted. */
    recordAttempt(now: number, reason: string, cooldownAppliedSeconds = 0): Promise<RestartRecord> {
        return this.history.appendAttempt(now, reason, cooldownAppliedSeconds);
    }

    recordOutcome(now: number, success: boolean): Promise<void> {
        return this.history.appendOutcome(now, success ? 'SUCCESS' : 'FAILED');
    }

    reset(now: number): Promise<void> {
        return this.history.appendReset(now);
    }

    /** Most recent first. */
    recent(limit: number): RestartRecord[] {
        return this.history.entries.slice(-limit).reverse();
    }

    private countedAttempts(): RestartRecord[] {
        return this.history.sinceReset.filter(r => r.reason !== MANUAL_RESTART_REASON);
    }
}
