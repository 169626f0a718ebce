import fs from 'fs-extra';
import path from 'path';
import { BackupStats, HealthReport, ServerProcess, StatusSnapshot } from '../../shared/types';
import { SupervisorContext } from './context';
import { NativeRunner } from './features/processes/runners/NativeRunner';
import { IServerRunner } from './features/processes/runners/IServerRunner';
import { IProcessInspector, SystemProcessInspector } from './features/processes/ProcessInspector';
import { ProcessLock } from './features/processes/ProcessLock';
import { ProcessHandle } from './features/processes/ProcessHandle';
import { IMetricsSource, SystemMetricsSource } from './features/metrics/MetricsSource';
import { MetricsSampler } from './features/metrics/MetricsSampler';
import { HealthScorer } from './features/health/HealthScorer';
import { RestartHistory } from './features/watchdog/RestartHistory';
import { RestartPolicy } from './features/watchdog/RestartPolicy';
import { ControlInbox } from './features/watchdog/ControlInbox';
import { StatusStore } from './features/watchdog/StatusStore';
import { Watchdog } from './features/watchdog/Watchdog';
import { BackupService } from './features/backups/BackupService';
import { buildHealthReport } from './features/health/HealthReport';
import { Result, ok, fail } from './utils/Result';
import { describeError } from './utils/AppError';

export interface Supervisor {
    ctx: SupervisorContext;
    inspector: IProcessInspector;
    lock: ProcessLock;
    handle: ProcessHandle;
    sampler: MetricsSampler;
    policy: RestartPolicy;
    backups: BackupService;
    inbox: ControlInbox;
    status: StatusStore;
    watchdog: Watchdog;
}

export interface SupervisorOverrides {
    runner?: IServerRunner;
    inspector?: IProcessInspector;
    metrics?: IMetricsSource;
}

/**
 * Wires every component against one context. The restart history is loaded before
 * anything can consult the policy.
 */
export async function createSupervisor(ctx: SupervisorContext, overrides: SupervisorOverrides = {}): Promise<Supervisor> {
    const { config, logger } = ctx;
    const inspector = overrides.inspector ?? new SystemProcessInspector();
    const lock = new ProcessLock(config.paths.lockFile, inspector);
    const handle = new ProcessHandle(ctx, overrides.runner ?? new NativeRunner(), inspector, lock);
    const sampler = new MetricsSampler(ctx, handle, overrides.metrics ?? new SystemMetricsSource());

    const history = new RestartHistory(config.paths.historyFile, logger);
    await history.load();
    const policy = new RestartPolicy({
        maxRestarts: config.watchdog.maxRestarts,
        windowSeconds: config.watchdog.windowSeconds,
        cooldownSeconds: config.watchdog.cooldownSeconds
    }, history);

    const backups = new BackupService(ctx);
    const inbox = new ControlInbox(config.paths.inboxDir, logger);
    const status = new StatusStore(config.paths.statusFile);

    const watchdog = new Watchdog(ctx, {
        handle,
        sampler,
        scorer: new HealthScorer(config.health),
        policy,
        backups,
        inbox,
        status
    });

    return { ctx, inspector, lock, handle, sampler, policy, backups, inbox, status, watchdog };
}

/** True when another live supervisor loop has published its status. */
export async function findRunningSupervisor(supervisor: Supervisor): Promise<number | null> {
    const snapshot = await supervisor.status.read();
    if (!snapshot?.supervising || snapshot.supervisorPid === process.pid) return null;
    return supervisor.inspector.exists(snapshot.supervisorPid) ? snapshot.supervisorPid : null;
}

/** Launches and supervises unless another supervisor loop is already alive. */
export async function startSupervisor(supervisor: Supervisor): Promise<Result<ServerProcess>> {
    const owner = await findRunningSupervisor(supervisor);
    if (owner !== null) {
        return fail('E_ALREADY_RUNNING', `Supervisor PID ${owner} is already running`, { supervisorPid: owner });
    }
    return supervisor.watchdog.start();
}

/** The published snapshot, or this process's idle view when nothing has been published. */
export async function currentSnapshot(supervisor: Supervisor): Promise<StatusSnapshot> {
    return (await supervisor.status.read()) ?? supervisor.watchdog.status();
}

export function reportFor(supervisor: Supervisor, snapshot: StatusSnapshot): HealthReport {
    const { config, clock } = supervisor.ctx;
    return buildHealthReport(snapshot, {
        autoBackup: config.backups.autoBackup,
        memoryMaxBytes: config.health.memoryMaxBytes,
        now: clock.now()
    });
}

export interface MonitoringExport {
    exportedAt: string;
    status: StatusSnapshot;
    healthReport: HealthReport;
    backups: BackupStats;
}

/** `craftwatch-export-YYYYMMDD_HHMMSS.json`, UTC. */
export function defaultExportName(now: number): string {
    const stamp = new Date(now).toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
    return `craftwatch-export-${stamp}.json`;
}

/** Writes status, health report and backup stats as one JSON document. Returns the path written. */
export async function exportMonitoringData(supervisor: Supervisor, file?: string): Promise<Result<string>> {
    const now = supervisor.ctx.clock.now();
    const target = path.resolve(file ?? defaultExportName(now));
    try {
        const status = await currentSnapshot(supervisor);
        const data: MonitoringExport = {
            exportedAt: new Date(now).toISOString(),
            status,
            healthReport: reportFor(supervisor, status),
            backups: await supervisor.backups.stats()
        };
        await fs.ensureDir(path.dirname(target));
        await fs.writeJSON(target, data, { spaces: 2 });
    } catch (e) {
        return fail('E_EXPORT_FAILED', `Could not export monitoring data to ${target}: ${describeError(e)}`);
    }
    supervisor.ctx.logger.info(`[Supervisor] Monitoring data exported to ${target}`);
    return ok(target);
}
