import { EventEmitter } from 'events';
import {
    BackupOutcome,
    ControlRequest,
    HealthReport,
    HealthVerdict,
    ServerProcess,
    StatusSnapshot,
    WatchdogCounters,
    WatchdogState
} from '../../../../shared/types';
import { ERROR_CODES } from '../../../../shared/errorCodes';
import { SupervisorContext } from '../../context';
import { ProcessExitEvent, ProcessHandle, StopOutcome } from '../processes/ProcessHandle';
import { MetricsSampler } from '../metrics/MetricsSampler';
import { HealthScorer } from '../health/HealthScorer';
import { PerformanceAlerts } from '../health/PerformanceAlerts';
import { buildHealthReport } from '../health/HealthReport';
import { RestartPolicy, MANUAL_RESTART_REASON } from './RestartPolicy';
import { BackupHook } from '../backups/BackupHook';
import { ControlInbox } from './ControlInbox';
import { StatusStore } from './StatusStore';
import { Result, ok, fail } from '../../utils/Result';
import { describeError } from '../../utils/AppError';
import { withTimeout } from '../../utils/timing';

// Extra time the hook gets beyond its own timeout before we stop waiting on it
const BACKUP_GRACE_MS = 5000;
const STATUS_ALERT_LIMIT = 20;

export interface WatchdogDeps {
    handle: ProcessHandle;
    sampler: MetricsSampler;
    scorer: HealthScorer;
    policy: RestartPolicy;
    backups: BackupHook;
    inbox?: ControlInbox;
    status?: StatusStore;
}

export interface StateChangeEvent {
    from: WatchdogState;
    to: WatchdogState;
}

/**
 * Supervisory loop and state machine. The loop is the only writer of watchdog state,
 * restart records and the process handle while it runs; other invocations reach it
 * through the control inbox and read it through the status store.
 */
export class Watchdog extends EventEmitter {
    private state: WatchdogState = 'STOPPED';
    private looping = false;
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private finished: Promise<void> = Promise.resolve();
    private resolveFinished: () => void = () => undefined;

    private readonly alerts: PerformanceAlerts;
    private lastVerdict: HealthVerdict | null = null;
    private lastBackup: BackupOutcome | null = null;
    private lastBackupAt: number | null = null; // monotonic
    private cooldownEnteredAt: number | null = null;
    private cooldownUntil: number | null = null;
    private counters: WatchdogCounters = {
        checksPerformed: 0,
        restartsAttempted: 0,
        restartsSucceeded: 0,
        monitoringSince: null
    };

    constructor(private readonly ctx: SupervisorContext, private readonly deps: WatchdogDeps) {
        super();
        this.alerts = new PerformanceAlerts(ctx.config.health);
        this.deps.handle.on('exit', (event: ProcessExitEvent) => this.onProcessExit(event));
    }

    get currentState(): WatchdogState {
        return this.state;
    }

    get isLooping(): boolean {
        return this.looping;
    }

    /** Resolves once the loop has ended, by shutdown() or an inbox stop request. */
    whenStopped(): Promise<void> {
        return this.finished;
    }

    /**
     * Brings the server up (adopting a child left by a previous supervisor when possible)
     * and starts the loop.
     */
    async start(): Promise<Result<ServerProcess>> {
        const adopted = await this.deps.handle.adopt();
        const launched = adopted ? ok(adopted) : await this.deps.handle.launch();
        if (!launched.ok) {
            this.ctx.logger.error(`[Watchdog] Start failed: ${launched.error.message}`);
            return launched;
        }

        this.enterMonitoring();
        this.lastBackupAt = this.ctx.clock.monotonic();
        this.startLoop();
        return launched;
    }

    /**
     * Ends the loop after the in-flight tick completes. With `stopServer` the child is
     * stopped the same way an explicit stop command would.
     */
    async shutdown(options: { stopServer?: boolean } = {}): Promise<void> {
        const wasLooping = this.looping;
        this.looping = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.inFlight) await this.inFlight;

        if (options.stopServer && this.deps.handle.current) {
            const stopped = await this.stopServer(true);
            if (!stopped.ok) this.ctx.logger.error(`[Watchdog] Stop during shutdown failed: ${stopped.error.message}`);
        }

        await this.publishStatus();
        if (wasLooping) this.ctx.logger.info('[Watchdog] Supervisor loop stopped.');
        this.resolveFinished();
    }

    /** One supervisory step. Exposed so callers and tests can drive the loop directly. */
    async tick(): Promise<void> {
        await this.processInbox();
        await this.supervise();
        await this.runScheduledBackup();
    }

    /**
     * Explicit stop from any state: snapshot first (when enabled), then a graceful stop.
     */
    async stopServer(graceful = true, timeoutSeconds?: number): Promise<Result<StopOutcome>> {
        const { stopTimeoutSeconds } = this.ctx.config.watchdog;
        if (!this.deps.handle.current) {
            this.setState('STOPPED');
            return fail('E_NOT_RUNNING');
        }

        if (this.ctx.config.backups.onStop) await this.runBackup('stop');

        const result = await this.deps.handle.stop(graceful, (timeoutSeconds ?? stopTimeoutSeconds) * 1000);
        if (result.ok) {
            if (result.value.softError) {
                this.ctx.logger.warn(`[Watchdog] ${ERROR_CODES.E_STOP_TIMED_OUT.message}`);
            }
            this.counters.monitoringSince = null;
            this.clearCooldown();
            this.setState('STOPPED');
        } else if (result.error.errorCode === 'E_NOT_RUNNING') {
            this.setState('STOPPED');
        }
        return result;
    }

    /** Operator reset: clears the restart window and leaves FAILED/COOLING_DOWN. */
    async reset(): Promise<void> {
        const now = this.ctx.clock.now();
        await this.deps.policy.reset(now);
        this.ctx.logger.info('[Watchdog] Restart history reset by operator.');

        if (this.state !== 'FAILED' && this.state !== 'COOLING_DOWN') return;
        this.clearCooldown();

        if (await this.deps.handle.reconcile()) {
            this.enterMonitoring();
            return;
        }
        await this.attemptRestart('reset');
    }

    /** Operator restart. Logged in the history but never charged to the crash window. */
    async restartNow(note?: string): Promise<Result<ServerProcess>> {
        const now = this.ctx.clock.now();
        this.ctx.logger.info(`[Watchdog] Manual restart requested${note ? ` (${note})` : ''}.`);
        this.setState('RESTARTING');

        const launched = await this.guardRestart({ now, reason: MANUAL_RESTART_REASON, cooldownApplied: 0 }, async () => {
            if (this.deps.handle.current) {
                await this.runBackup(MANUAL_RESTART_REASON);
                const stopped = await this.deps.handle.stop(true, this.ctx.config.watchdog.stopTimeoutSeconds * 1000);
                if (!stopped.ok && stopped.error.errorCode !== 'E_NOT_RUNNING') {
                    return fail(stopped.error.errorCode, `Could not stop the server: ${stopped.error.message}`);
                }
            }
            await this.deps.policy.recordAttempt(now, MANUAL_RESTART_REASON);
            this.counters.restartsAttempted++;
            return this.relaunchAndRecord();
        });

        if (launched.ok) {
            this.counters.restartsSucceeded++;
            this.enterMonitoring();
            return launched;
        }
        this.ctx.logger.error(`[Watchdog] Manual restart failed: ${launched.error.message}`);
        if (await this.deps.handle.reconcile()) {
            this.enterMonitoring();
        } else {
            this.counters.monitoringSince = null;
            this.setState('STOPPED');
        }
        return launched;
    }

    /** Scored summary of the current status with issues and recommendations. */
    healthReport(): HealthReport {
        return buildHealthReport(this.status(), {
            autoBackup: this.ctx.config.backups.autoBackup,
            memoryMaxBytes: this.ctx.config.health.memoryMaxBytes,
            now: this.ctx.clock.now()
        });
    }

    /** Lock-free snapshot of the last known state. */
    status(): StatusSnapshot {
        const now = this.ctx.clock.now();
        const proc = this.deps.handle.current;
        const lastSample = this.deps.sampler.latest();
        return {
            running: proc !== null,
            pid: proc?.pid ?? null,
            uptimeSeconds: this.deps.handle.uptimeSeconds(now),
            health: this.lastVerdict,
            watchdogState: this.state,
            restartCountInWindow: this.deps.policy.countInWindow(now),
            lastBackupOutcome: this.lastBackup,
            lastSample,
            trend5m: lastSample ? this.deps.sampler.trend('5m') : null,
            counters: { ...this.counters },
            supervisorPid: process.pid,
            supervising: this.looping,
            alerts: this.alerts.recent(STATUS_ALERT_LIMIT),
            updatedAt: now
        };
    }

    // --- Loop ---

    private startLoop() {
        if (this.looping) return;
        this.looping = true;
        this.finished = new Promise<void>(resolve => {
            this.resolveFinished = resolve;
        });
        this.ctx.logger.info(`[Watchdog] Monitoring every ${this.ctx.config.watchdog.intervalSeconds}s.`);
        this.scheduleNext(0);
    }

    private scheduleNext(delayMs: number) {
        if (!this.looping) return;
        this.timer = setTimeout(() => {
            this.timer = null;
            const startedAt = this.ctx.clock.monotonic();
            this.inFlight = this.runTick().finally(() => {
                this.inFlight = null;
                if (!this.looping) {
                    this.resolveFinished();
                    return;
                }
                const intervalMs = this.ctx.config.watchdog.intervalSeconds * 1000;
                const elapsed = this.ctx.clock.monotonic() - startedAt;
                this.scheduleNext(Math.max(0, intervalMs - elapsed));
            });
        }, delayMs);
    }

    private async runTick() {
        try {
            await this.tick();
        } catch (e) {
            this.ctx.logger.error(`[Watchdog] Tick failed: ${describeError(e)}`);
        }
        await this.publishStatus();
    }

    private onProcessExit(event: ProcessExitEvent) {
        if (event.planned || !this.looping || this.inFlight || !this.timer) return;
        // Check on the crash now instead of waiting out the interval
        clearTimeout(this.timer);
        this.timer = null;
        this.scheduleNext(0);
    }

    private async publishStatus() {
        if (!this.deps.status) return;
        try {
            await this.deps.status.write(this.status());
        } catch (e) {
            this.ctx.logger.warn(`[Watchdog] Could not publish status: ${describeError(e)}`);
        }
    }

    // --- Inbox ---

    private async processInbox() {
        if (!this.deps.inbox) return;
        const requests = await this.deps.inbox.drain();
        for (const request of requests) {
            await this.handleRequest(request);
        }
    }

    private async handleRequest(request: ControlRequest) {
        this.ctx.logger.debug(`[Watchdog] Control request: ${request.type}`);
        switch (request.type) {
            case 'stop': {
                const result = await this.stopServer(request.graceful, request.timeoutSeconds);
                if (!result.ok && result.error.errorCode !== 'E_NOT_RUNNING') {
                    this.ctx.logger.error(`[Watchdog] Stop failed: ${result.error.message}`);
                    return;
                }
                this.looping = false;
                return;
            }
            case 'restart':
                await this.restartNow(request.reason);
                return;
            case 'reset':
                await this.reset();
                return;
            case 'command': {
                const sent = this.deps.handle.sendCommand(request.text);
                if (!sent.ok) this.ctx.logger.warn(`[Watchdog] Command not delivered: ${sent.error.message}`);
                return;
            }
            case 'backup':
                await this.runBackup('manual', request.name);
                return;
        }
    }

    // --- Supervision ---

    private async supervise() {
        if (!this.ctx.config.watchdog.enabled) return;

        switch (this.state) {
            case 'MONITORING':
                await this.monitor();
                return;
            case 'COOLING_DOWN':
                await this.continueCooldown();
                return;
            default:
                // STOPPED and FAILED wait for the operator; RESTARTING never spans ticks
                return;
        }
    }

    private async monitor() {
        const verdict = await this.evaluate();
        if (!verdict) return;

        this.counters.checksPerformed++;
        this.lastVerdict = verdict;

        switch (verdict.state) {
            case 'ALIVE':
                this.ctx.logger.debug(`[Watchdog] Health ${verdict.score}/100.`);
                return;
            case 'DEGRADED':
                this.ctx.logger.warn(`[Watchdog] Server degraded (score ${verdict.score}: ${verdict.reasons.join(', ')}).`);
                return;
            case 'DEAD':
                await this.handleDead(verdict);
                return;
        }
    }

    /** Null when the sample failed for a reason that says nothing about the child. */
    private async evaluate(): Promise<HealthVerdict | null> {
        if (!(await this.deps.handle.reconcile())) return this.deps.scorer.processGone();

        const sample = await this.deps.sampler.sample();
        if (sample.ok) {
            const trend = this.deps.sampler.trend('5m');
            const earlier = this.deps.sampler.history('5m').filter(s => s.timestamp < sample.value.timestamp);
            for (const alert of this.alerts.check(sample.value, trend, earlier)) {
                if (alert.severity === 'critical') this.ctx.logger.warn(`[Watchdog] ${alert.message}`);
                else this.ctx.logger.debug(`[Watchdog] ${alert.message}`);
            }
            return this.deps.scorer.evaluate(sample.value, trend);
        }

        if (sample.error.errorCode === 'E_PROCESS_GONE') {
            // A hung sample on a live PID is a failed check, not an exit
            if (await this.deps.handle.reconcile()) {
                this.ctx.logger.warn(`[Watchdog] Health check did not complete: ${sample.error.message}`);
                return this.deps.scorer.checkTimedOut();
            }
            return this.deps.scorer.processGone();
        }

        this.ctx.logger.warn(`[Watchdog] Health check skipped: ${sample.error.message}`);
        return null;
    }

    private async handleDead(verdict: HealthVerdict) {
        const reason = verdict.reasons.join(',') || 'dead';

        if (!this.ctx.config.watchdog.restartOnCrash) {
            if (await this.deps.handle.isAlive()) {
                this.ctx.logger.warn(`[Watchdog] Server unresponsive (${reason}); automatic restart is disabled.`);
                return;
            }
            this.ctx.logger.warn('[Watchdog] Server process is gone and automatic restart is disabled.');
            this.counters.monitoringSince = null;
            this.setState('STOPPED');
            return;
        }

        this.ctx.logger.error(`[Watchdog] Server is DEAD (${reason}).`);
        await this.attemptRestart(reason);
    }

    private async continueCooldown() {
        if (this.cooldownUntil !== null && this.ctx.clock.now() < this.cooldownUntil) {
            const remaining = Math.ceil((this.cooldownUntil - this.ctx.clock.now()) / 1000);
            this.ctx.logger.debug(`[Watchdog] Cooling down, ${remaining}s before the next attempt.`);
            return;
        }

        if (await this.deps.handle.reconcile()) {
            this.ctx.logger.info('[Watchdog] Server is running again. Resuming monitoring.');
            this.enterMonitoring();
            return;
        }
        await this.attemptRestart('retry after cooldown');
    }

    private async attemptRestart(reason: string) {
        const now = this.ctx.clock.now();
        const decision = this.deps.policy.check(now);

        if (!decision.allowed) {
            if (decision.reason === 'window-exhausted') {
                this.enterFailed();
            } else {
                this.enterCooldown(decision.retryAt);
            }
            return;
        }

        const cooldownApplied = this.cooldownEnteredAt !== null ? Math.round((now - this.cooldownEnteredAt) / 1000) : 0;
        this.setState('RESTARTING');

        const launched = await this.guardRestart({ now, reason, cooldownApplied }, async () => {
            await this.runBackup(`pre-restart (${reason})`);

            if (this.deps.handle.current) {
                // Presumed unresponsive: no graceful attempt
                const stopped = await this.deps.handle.stop(false, this.ctx.config.watchdog.stopTimeoutSeconds * 1000);
                if (!stopped.ok && stopped.error.errorCode !== 'E_NOT_RUNNING') {
                    this.ctx.logger.error(`[Watchdog] Could not terminate the old process: ${stopped.error.message}`);
                }
            }

            const record = await this.deps.policy.recordAttempt(now, reason, cooldownApplied);
            this.counters.restartsAttempted++;
            const attemptNo = this.deps.policy.countInWindow(now);
            this.ctx.logger.info(`[Watchdog] Restarting server (attempt ${attemptNo}/${this.ctx.config.watchdog.maxRestarts}, reason: ${record.reason}).`);
            return this.relaunchAndRecord();
        });

        if (launched.ok) {
            this.counters.restartsSucceeded++;
            this.ctx.logger.success(`[Watchdog] Server restarted (PID ${launched.value.pid}).`);
            this.enterMonitoring();
            return;
        }

        this.ctx.logger.error(`[Watchdog] Restart failed: ${launched.error.message}`);
        const next = this.deps.policy.check(this.ctx.clock.now());
        if (!next.allowed && next.reason === 'window-exhausted') {
            this.enterFailed();
            return;
        }
        this.enterCooldown(next.allowed ? this.ctx.clock.now() : next.retryAt);
    }

    /**
     * Runs a restart sequence so that a throw anywhere in it still ends with a settled
     * record: the attempt is logged (if the throw came before it) and closed as FAILED.
     */
    private async guardRestart(
        attempt: { now: number; reason: string; cooldownApplied: number },
        sequence: () => Promise<Result<ServerProcess>>
    ): Promise<Result<ServerProcess>> {
        const [before] = this.deps.policy.recent(1);
        try {
            return await sequence();
        } catch (e) {
            const [last] = this.deps.policy.recent(1);
            if (last === before) {
                await this.deps.policy.recordAttempt(attempt.now, attempt.reason, attempt.cooldownApplied);
                this.counters.restartsAttempted++;
            }
            await this.deps.policy.recordOutcome(this.ctx.clock.now(), false);
            return fail('E_LAUNCH_FAILED', `Restart aborted: ${describeError(e)}`);
        }
    }

    private async relaunchAndRecord(): Promise<Result<ServerProcess>> {
        this.deps.sampler.clear();
        this.deps.scorer.reset();
        this.lastVerdict = null;
        const launched = await this.deps.handle.launch();
        await this.deps.policy.recordOutcome(this.ctx.clock.now(), launched.ok);
        return launched;
    }

    // --- Backups ---

    private async runScheduledBackup() {
        const { autoBackup, intervalSeconds } = this.ctx.config.backups;
        if (!autoBackup || this.state !== 'MONITORING' || !this.deps.handle.current) return;

        const now = this.ctx.clock.monotonic();
        if (this.lastBackupAt !== null && now - this.lastBackupAt < intervalSeconds * 1000) return;
        await this.runBackup('scheduled');
    }

    /** Best effort: failures are recorded and logged, never thrown. */
    private async runBackup(reason: string, name?: string): Promise<BackupOutcome> {
        const { timeoutSeconds, maxBackups } = this.ctx.config.backups;
        const timeoutMs = timeoutSeconds * 1000;
        this.lastBackupAt = this.ctx.clock.monotonic();

        let outcome: BackupOutcome;
        try {
            const snapshot = await withTimeout(
                this.deps.backups.createSnapshot(reason, timeoutMs, name),
                timeoutMs + BACKUP_GRACE_MS,
                'Backup snapshot'
            );
            if (snapshot.ok) {
                outcome = { result: 'SUCCESS', reason, timestamp: this.ctx.clock.now(), archive: snapshot.value.filename };
            } else {
                const timedOut = snapshot.error.details?.timedOut === true;
                outcome = {
                    result: timedOut ? 'TIMED_OUT' : 'FAILED',
                    reason,
                    timestamp: this.ctx.clock.now(),
                    message: snapshot.error.message
                };
            }
        } catch (e) {
            outcome = { result: 'TIMED_OUT', reason, timestamp: this.ctx.clock.now(), message: describeError(e) };
        }

        this.lastBackup = outcome;
        if (outcome.result !== 'SUCCESS') {
            this.ctx.logger.error(`[Watchdog] ${ERROR_CODES.E_BACKUP_FAILED.message} (${reason}): ${outcome.message ?? outcome.result}`);
            return outcome;
        }

        try {
            const pruned = await withTimeout(this.deps.backups.pruneOld(maxBackups, timeoutMs), timeoutMs + BACKUP_GRACE_MS, 'Backup pruning');
            if (!pruned.ok) this.ctx.logger.warn(`[Watchdog] ${pruned.error.message}`);
        } catch (e) {
            this.ctx.logger.warn(`[Watchdog] Backup pruning abandoned: ${describeError(e)}`);
        }
        return outcome;
    }

    // --- State ---

    private setState(next: WatchdogState) {
        if (next === this.state) return;
        const event: StateChangeEvent = { from: this.state, to: next };
        this.state = next;
        this.ctx.logger.debug(`[Watchdog] ${event.from} -> ${event.to}`);
        this.emit('state', event);
    }

    private enterMonitoring() {
        this.clearCooldown();
        if (this.counters.monitoringSince === null) this.counters.monitoringSince = this.ctx.clock.now();
        this.setState('MONITORING');
    }

    private enterCooldown(until: number) {
        if (this.cooldownEnteredAt === null) this.cooldownEnteredAt = this.ctx.clock.now();
        this.cooldownUntil = until;
        const waitSeconds = Math.max(0, Math.ceil((until - this.ctx.clock.now()) / 1000));
        this.ctx.logger.warn(`[Watchdog] Cooling down for ${waitSeconds}s before the next restart attempt.`);
        this.setState('COOLING_DOWN');
    }

    private enterFailed() {
        const { maxRestarts, windowSeconds } = this.ctx.config.watchdog;
        this.clearCooldown();
        this.counters.monitoringSince = null;
        this.ctx.logger.error(
            `[Watchdog] E_RESTART_LIMIT: ${maxRestarts} restarts within ${windowSeconds}s. ${ERROR_CODES.E_RESTART_LIMIT.message}`
        );
        this.setState('FAILED');
        this.emit('failed');
    }

    private clearCooldown() {
        this.cooldownEnteredAt = null;
        this.cooldownUntil = null;
    }
}
