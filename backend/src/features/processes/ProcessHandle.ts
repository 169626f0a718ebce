import { EventEmitter } from 'events';
import { ServerProcess } from '../../../../shared/types';
import { SupervisorContext } from '../../context';
import { LaunchSpec } from '../../config/SupervisorConfig';
import { IServerRunner, RunnerCloseEvent, RunnerLogEvent } from './runners/IServerRunner';
import { IProcessInspector, matchesIdentity } from './ProcessInspector';
import { ProcessLock } from './ProcessLock';
import { RingBuffer } from '../../utils/RingBuffer';
import { Result, ok, fail } from '../../utils/Result';
import { describeError } from '../../utils/AppError';
import { sleep } from '../../utils/timing';

const MAX_CONSOLE_HISTORY = 1000;
const STOP_POLL_MS = 500;
const FORCE_KILL_WAIT_MS = 5000;

export interface StopOutcome {
    forced: boolean;
    /** Set when a graceful stop overran its timeout and was escalated. */
    softError?: 'E_STOP_TIMED_OUT';
}

export interface ProcessExitEvent {
    pid: number;
    code: number | null;
    signal: NodeJS.Signals | null;
    /** True when the exit followed a stop we asked for. */
    planned: boolean;
}

/**
 * Owns the supervised child: launch under the exclusive lock, identity-checked liveness,
 * graceful stop with forced escalation, and the stdin control channel.
 */
export class ProcessHandle extends EventEmitter {
    private process: ServerProcess | null = null;
    private launchedCommand: string | null = null;
    private stopRequested = false;
    private releasing: Promise<void> | null = null;
    private readonly consoleHistory = new RingBuffer<string>(MAX_CONSOLE_HISTORY);
    private readonly lock: ProcessLock;

    constructor(
        private readonly ctx: SupervisorContext,
        private readonly runner: IServerRunner,
        private readonly inspector: IProcessInspector,
        lock?: ProcessLock
    ) {
        super();
        this.lock = lock ?? new ProcessLock(ctx.config.paths.lockFile, inspector);
        this.runner.on('log', (data) => this.handleLog(data));
        this.runner.on('close', (data) => this.handleClose(data));
    }

    get current(): ServerProcess | null {
        return this.process;
    }

    /** True between a planned stop request and the confirmed exit. */
    get stopping(): boolean {
        return this.stopRequested;
    }

    uptimeSeconds(now = this.ctx.clock.now()): number {
        if (!this.process) return 0;
        return Math.max(0, Math.floor((now - this.process.startedAt) / 1000));
    }

    tail(lines: number): string[] {
        const all = this.consoleHistory.toArray();
        return all.slice(Math.max(0, all.length - lines));
    }

    /**
     * Takes over a child recorded by a previous supervisor run. Adopted children have no
     * control channel, so commands cannot be sent and graceful stops use SIGTERM.
     */
    async adopt(): Promise<ServerProcess | null> {
        if (this.process) return this.process;

        const record = await this.lock.read();
        if (!record?.pid || record.startedAt === null) return null;

        const alive = await matchesIdentity(this.inspector, record.pid, record.startedAt, record.command);
        if (!alive) return null;

        const claimed = await this.lock.takeOver(record);
        if (!claimed) return null;

        this.process = { pid: record.pid, startedAt: record.startedAt, lockOwned: true, adopted: true };
        this.launchedCommand = record.command;
        this.ctx.logger.warn(`[ProcessHandle] Adopted running server (PID ${record.pid}). Console commands are unavailable until the next restart.`);
        return this.process;
    }

    async launch(spec: LaunchSpec = this.ctx.config.launch): Promise<Result<ServerProcess>> {
        if (this.process && await this.isAlive()) {
            return fail('E_ALREADY_RUNNING', `Server is already running (PID ${this.process.pid})`, { pid: this.process.pid });
        }
        if (this.process) await this.confirmExit(this.process.pid, null, null);
        // A release still in flight from the previous exit would delete the new lock
        if (this.releasing) await this.releasing;

        const locked = await this.lock.acquire();
        if (!locked.ok) return locked;

        let pid: number;
        try {
            pid = await this.runner.start(spec);
        } catch (e) {
            await this.releaseLock();
            return fail('E_LAUNCH_FAILED', `Failed to launch ${spec.command}: ${describeError(e)}`);
        }

        const startedAt = this.ctx.clock.now();
        try {
            await this.lock.record(pid, startedAt, spec.command);
        } catch (e) {
            // The child is up; losing the durable record only weakens relaunch detection
            this.ctx.logger.error(`[ProcessHandle] Failed to persist process record: ${describeError(e)}`);
        }

        this.consoleHistory.clear();
        this.stopRequested = false;
        this.launchedCommand = spec.command;
        this.process = { pid, startedAt, lockOwned: true, adopted: false };
        this.ctx.logger.success(`[ProcessHandle] Server process launched (PID ${pid}).`);
        return ok(this.process);
    }

    async isAlive(): Promise<boolean> {
        if (!this.process) return false;
        return matchesIdentity(this.inspector, this.process.pid, this.process.startedAt, this.launchedCommand);
    }

    /**
     * Stale-PID detection: clears the record if the child has gone away without us
     * seeing its exit. Returns whether a live child remains.
     */
    async reconcile(): Promise<boolean> {
        if (!this.process) return false;
        if (await this.isAlive()) return true;
        await this.confirmExit(this.process.pid, null, null);
        return false;
    }

    async stop(graceful: boolean, timeoutMs: number): Promise<Result<StopOutcome>> {
        const target = this.process;
        if (!target) return fail('E_NOT_RUNNING');
        if (!(await this.isAlive())) {
            await this.confirmExit(target.pid, null, null);
            return fail('E_NOT_RUNNING');
        }

        this.stopRequested = true;

        if (graceful) {
            const asked = !target.adopted && this.runner.write('stop');
            if (!asked) this.inspector.kill(target.pid, 'SIGTERM');
            this.ctx.logger.info(`[ProcessHandle] Stop requested (${asked ? 'console' : 'SIGTERM'}), waiting up to ${Math.round(timeoutMs / 1000)}s...`);

            if (await this.waitForExit(timeoutMs)) {
                await this.confirmExit(target.pid, null, null);
                this.ctx.logger.success('[ProcessHandle] Server stopped gracefully.');
                return ok({ forced: false });
            }
            this.ctx.logger.warn(`[ProcessHandle] Server ignored the stop request for ${Math.round(timeoutMs / 1000)}s. Escalating to SIGKILL...`);
        }

        try {
            await this.inspector.killTree(target.pid, 'SIGKILL');
        } catch (e) {
            this.ctx.logger.warn(`[ProcessHandle] Tree kill failed (${describeError(e)}), signalling PID ${target.pid} directly.`);
            this.inspector.kill(target.pid, 'SIGKILL');
        }

        if (!(await this.waitForExit(FORCE_KILL_WAIT_MS))) {
            this.stopRequested = false;
            return fail('E_STOP_TIMED_OUT', `PID ${target.pid} survived forced termination`, { pid: target.pid, hard: true });
        }

        await this.confirmExit(target.pid, null, 'SIGKILL');
        this.ctx.logger.warn('[ProcessHandle] Server force stopped.');
        return ok(graceful ? { forced: true, softError: 'E_STOP_TIMED_OUT' } : { forced: true });
    }

    /** Fire-and-forget write to the control channel. */
    sendCommand(text: string): Result<void> {
        if (!this.process) return fail('E_NOT_RUNNING');
        if (this.process.adopted) {
            return fail('E_WRITE_FAILED', 'Adopted server has no console channel');
        }
        if (!this.runner.write(text)) return fail('E_WRITE_FAILED');
        this.ctx.logger.debug(`[ProcessHandle] Command sent: ${text}`);
        return ok(undefined);
    }

    private async waitForExit(timeoutMs: number): Promise<boolean> {
        const deadline = this.ctx.clock.monotonic() + timeoutMs;
        while (this.ctx.clock.monotonic() < deadline) {
            if (!this.process || !(await this.isAlive())) return true;
            await sleep(STOP_POLL_MS);
        }
        return !this.process || !(await this.isAlive());
    }

    private handleLog(data: RunnerLogEvent) {
        this.consoleHistory.push(data.line);
        this.ctx.logger.debug(`[Server:${data.type}] ${data.line}`);
    }

    private handleClose(data: RunnerCloseEvent) {
        this.confirmExit(data.pid, data.code, data.signal).catch(err => {
            this.ctx.logger.error(`[ProcessHandle] Failed to finalize exit of PID ${data.pid}: ${describeError(err)}`);
        });
    }

    private async confirmExit(pid: number, code: number | null, signal: NodeJS.Signals | null) {
        if (!this.process || this.process.pid !== pid) return;

        const planned = this.stopRequested;
        this.process = null;
        this.launchedCommand = null;
        this.stopRequested = false;
        const releasing = this.releaseLock();
        this.releasing = releasing;
        await releasing;
        if (this.releasing === releasing) this.releasing = null;

        const how = signal ? `signal ${signal}` : `code ${code ?? 'unknown'}`;
        if (planned) {
            this.ctx.logger.info(`[ProcessHandle] Server PID ${pid} exited (${how}).`);
        } else {
            this.ctx.logger.warn(`[ProcessHandle] Server PID ${pid} exited unexpectedly (${how}).`);
        }
        const event: ProcessExitEvent = { pid, code, signal, planned };
        this.emit('exit', event);
    }

    private async releaseLock() {
        try {
            await this.lock.release();
        } catch (e) {
            this.ctx.logger.error(`[ProcessHandle] Failed to release process lock: ${describeError(e)}`);
        }
    }
}
