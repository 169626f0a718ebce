import { beforeEach, describe, expect, it } from 'vitest';
import { MANUAL_RESTART_REASON, RestartPolicy } from './RestartPolicy';
import { RestartHistory } from './RestartHistory';
import { createSilentLogger } from '../../utils/logger';
import { T0 } from '../../test/fakes';

const at = (seconds: number) => T0 + seconds * 1000;

describe('RestartPolicy', () => {
    let history: RestartHistory;
    let policy: RestartPolicy;

    beforeEach(() => {
        history = new RestartHistory(null, createSilentLogger());
        policy = new RestartPolicy({ maxRestarts: 3, windowSeconds: 600, cooldownSeconds: 60 }, history);
    });

    it('should allow the first restart', () => {
        expect(policy.check(at(0))).toEqual({ allowed: true });
        expect(policy.canRestart(at(0))).toBe(true);
    });

    it('should refuse a fourth crash at t=250 and accept one at t=650', async () => {
        for (const t of [0, 100, 200]) {
            expect(policy.canRestart(at(t))).toBe(true);
            await policy.recordAttempt(at(t), 'process-gone');
            await policy.recordOutcome(at(t), true);
        }

        expect(policy.check(at(250))).toEqual({ allowed: false, reason: 'window-exhausted', retryAt: at(600) + 1 });
        expect(policy.countInWindow(at(250))).toBe(3);

        expect(policy.check(at(650))).toEqual({ allowed: true });
        expect(policy.countInWindow(at(650))).toBe(2);
    });

    it('should enforce the cooldown independently of the window', async () => {
        await policy.recordAttempt(at(0), 'process-gone');

        expect(policy.check(at(30))).toEqual({ allowed: false, reason: 'cooldown', retryAt: at(60) });
        expect(policy.canRestart(at(60))).toBe(true);
    });

    it('should count failed attempts too', async () => {
        await policy.recordAttempt(at(0), 'process-gone');
        await policy.recordOutcome(at(1), false);
        await policy.recordAttempt(at(100), 'process-gone');
        await policy.recordOutcome(at(101), false);
        await policy.recordAttempt(at(200), 'process-gone');

        expect(policy.canRestart(at(300))).toBe(false);
        expect(history.entries.map(r => r.outcome)).toEqual(['FAILED', 'FAILED', 'PENDING']);
    });

    it('should forget earlier attempts after an operator reset', async () => {
        for (const t of [0, 100, 200]) await policy.recordAttempt(at(t), 'process-gone');

        await policy.reset(at(250));

        expect(policy.check(at(250))).toEqual({ allowed: true });
        expect(policy.countInWindow(at(250))).toBe(0);
        expect(history.entries).toHaveLength(3);
    });

    it('should not charge manual restarts to the window', async () => {
        for (const t of [0, 100, 200]) await policy.recordAttempt(at(t), MANUAL_RESTART_REASON);

        expect(policy.check(at(210))).toEqual({ allowed: true });
    });

    it('should list recent records newest first', async () => {
        await policy.recordAttempt(at(0), 'first');
        await policy.recordAttempt(at(100), 'second');
        await policy.recordAttempt(at(200), 'third');

        expect(policy.recent(2).map(r => r.reason)).toEqual(['third', 'second']);
    });
});
