#!/usr/bin/env node
/**
 * craftwatch: supervises a single game server process.
 *
 * Usage:
 *   craftwatch start                 launch the server and run the watchdog in the foreground
 *   craftwatch stop [--no-graceful]  stop via the running supervisor, or directly
 *   craftwatch status [--json]
 *   craftwatch report [--json]       health score, issues and recommendations
 *   craftwatch export [file]         write status, health report and backup stats as JSON
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { ControlRequest, HealthBand, HealthReport, StatusSnapshot, WatchdogState } from '../../shared/types';
import { DEFAULT_CONFIG_FILE, loadConfig } from './config/SupervisorConfig';
import { createContext, SupervisorContext } from './context';
import {
    Supervisor,
    createSupervisor,
    currentSnapshot,
    exportMonitoringData,
    findRunningSupervisor,
    reportFor,
    startSupervisor
} from './supervisor';
import { describeError } from './utils/AppError';
import { handleUnhandledRejection } from './utils/cliErrors';
import { formatBytes, formatUptime } from './utils/format';

const VERSION = '1.0.0';

interface GlobalOptions {
    config: string;
    verbose?: boolean;
}

const program = new Command();

function positiveInt(value: string): number {
    const parsed = parseInt(value, 10);
    if (Number.isNaN(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function buildContext(echoLogs = true): SupervisorContext {
    const opts = program.opts<GlobalOptions>();
    const config = loadConfig(opts.config);
    if (!config.ok) {
        console.error(chalk.red(`[CLI] ✗ ${config.error.message}`));
        process.exit(1);
    }
    return createContext(config.value, { verbose: opts.verbose, console: echoLogs });
}

async function withSupervisor(task: (sup: Supervisor) => Promise<void>, echoLogs = true): Promise<void> {
    const ctx = buildContext(echoLogs);
    try {
        await task(await createSupervisor(ctx));
    } finally {
        ctx.logger.close();
    }
}

/**
 * Hands the request to a running supervisor. Returns false when there is none.
 */
async function submitToRunning(sup: Supervisor, request: ControlRequest): Promise<boolean> {
    const owner = await findRunningSupervisor(sup);
    if (owner === null) return false;
    await sup.inbox.submit(request);
    console.log(chalk.cyan(`[CLI] '${request.type}' request queued for supervisor PID ${owner}.`));
    return true;
}

const STATE_COLORS: Record<WatchdogState, (s: string) => string> = {
    STOPPED: chalk.gray,
    MONITORING: chalk.green,
    RESTARTING: chalk.yellow,
    COOLING_DOWN: chalk.yellow,
    FAILED: chalk.red
};

function printStatus(snapshot: StatusSnapshot, stale: boolean) {
    const health = snapshot.health
        ? `${snapshot.health.state} (${snapshot.health.score}/100${snapshot.health.reasons.length ? `: ${snapshot.health.reasons.join(', ')}` : ''})`
        : 'n/a';

    console.log(`Server:     ${snapshot.running ? chalk.green(`running (PID ${snapshot.pid})`) : chalk.gray('stopped')}`);
    console.log(`Uptime:     ${formatUptime(snapshot.uptimeSeconds)}`);
    console.log(`Watchdog:   ${STATE_COLORS[snapshot.watchdogState](snapshot.watchdogState)}${stale ? chalk.gray(' (supervisor not running)') : ''}`);
    console.log(`Health:     ${health}`);
    console.log(`Restarts:   ${snapshot.restartCountInWindow} in window`);
    if (snapshot.lastSample) {
        const s = snapshot.lastSample;
        console.log(`CPU/Memory: ${s.cpuPercent.toFixed(1)}% / ${formatBytes(s.memoryBytes)}, ${s.connectionCount} connection(s)`);
    }
    if (snapshot.trend5m && snapshot.trend5m.samples > 0) {
        const t = snapshot.trend5m;
        console.log(`5m trend:   avg ${t.avgCpu.toFixed(1)}% CPU, peak ${formatBytes(t.peakMemory)}`);
    }
    if (snapshot.lastBackupOutcome) {
        const b = snapshot.lastBackupOutcome;
        console.log(`Backup:     ${b.result} (${b.reason}) at ${new Date(b.timestamp).toLocaleString('en-GB')}`);
    }
    console.log(`Checks:     ${snapshot.counters.checksPerformed}, restarts ${snapshot.counters.restartsSucceeded}/${snapshot.counters.restartsAttempted}`);
}

program
    .name('craftwatch')
    .description('Game server process supervisor and watchdog')
    .version(VERSION)
    .option('-c, --config <path>', 'Path to the configuration file', DEFAULT_CONFIG_FILE)
    .option('-v, --verbose', 'Enable debug logging');

const BAND_COLORS: Record<HealthBand, (s: string) => string> = {
    excellent: chalk.green,
    good: chalk.green,
    fair: chalk.yellow,
    poor: chalk.red,
    critical: chalk.red
};

function printReport(report: HealthReport) {
    console.log(`Health:     ${BAND_COLORS[report.band](`${report.score}/100 (${report.band})`)}`);
    console.log(`Server:     ${report.running ? 'running' : 'stopped'}, uptime ${formatUptime(report.uptimeSeconds)}`);
    console.log(`Watchdog:   ${report.watchdogState}${report.monitoring ? '' : chalk.gray(' (supervisor not running)')}`);
    console.log(`Restarts:   ${report.restartCountInWindow} in window, ${report.restartSuccessRate}% succeeded`);
    if (report.issues.length > 0) {
        console.log('Issues:');
        for (const issue of report.issues) console.log(chalk.yellow(`  - ${issue}`));
    }
    console.log('Recommendations:');
    for (const rec of report.recommendations) console.log(`  - ${rec}`);
    if (report.alerts.length > 0) {
        console.log('Recent alerts:');
        for (const alert of report.alerts) {
            const color = alert.severity === 'critical' ? chalk.red : alert.severity === 'warning' ? chalk.yellow : chalk.cyan;
            console.log(color(`  ${new Date(alert.timestamp).toLocaleString('en-GB')}  ${alert.message}`));
        }
    }
}

program
    .command('start')
    .description('Launch the server and supervise it until stopped')
    .action(async () => {
        const ctx = buildContext();
        const sup = await createSupervisor(ctx);
        const { watchdog } = sup;

        const started = await startSupervisor(sup);
        if (!started.ok) {
            if (started.error.errorCode === 'E_ALREADY_RUNNING') {
                console.error(chalk.red(`[CLI] ✗ ${started.error.message}`));
            }
            ctx.logger.close();
            process.exitCode = 1;
            return;
        }

        let shuttingDown = false;
        const onSignal = (signal: NodeJS.Signals) => {
            if (shuttingDown) return;
            shuttingDown = true;
            ctx.logger.info(`[CLI] ${signal} received. Stopping server...`);
            watchdog.shutdown({ stopServer: true }).catch(err => {
                ctx.logger.error(`[CLI] Shutdown failed: ${describeError(err)}`);
                process.exitCode = 1;
            });
        };
        process.on('SIGINT', onSignal);
        process.on('SIGTERM', onSignal);

        await watchdog.whenStopped();
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        ctx.logger.close();
    });

program
    .command('stop')
    .description('Stop the server (backup first when backup_on_stop is set)')
    .option('--no-graceful', 'Terminate immediately instead of asking the server to stop')
    .option('-t, --timeout <seconds>', 'Graceful stop timeout', positiveInt)
    .action(async (options: { graceful: boolean; timeout?: number }) => {
        await withSupervisor(async (sup) => {
            const request: ControlRequest = { type: 'stop', graceful: options.graceful, timeoutSeconds: options.timeout };
            if (await submitToRunning(sup, request)) return;

            if (!(await sup.handle.adopt())) {
                console.log(chalk.gray('[CLI] Server is not running.'));
                process.exitCode = 1;
                return;
            }
            const result = await sup.watchdog.stopServer(options.graceful, options.timeout);
            if (!result.ok) {
                console.error(chalk.red(`[CLI] ✗ ${result.error.message}`));
                process.exitCode = 1;
            }
        });
    });

program
    .command('restart')
    .description('Ask the running supervisor for a manual restart')
    .option('-r, --reason <text>', 'Note recorded with the restart')
    .action(async (options: { reason?: string }) => {
        await withSupervisor(async (sup) => {
            if (await submitToRunning(sup, { type: 'restart', reason: options.reason })) return;
            console.error(chalk.red('[CLI] ✗ No supervisor is running. Use `craftwatch start`.'));
            process.exitCode = 1;
        }, false);
    });

program
    .command('status')
    .description('Show the last published status')
    .option('--json', 'Print the raw snapshot')
    .action(async (options: { json?: boolean }) => {
        await withSupervisor(async (sup) => {
            const snapshot = await sup.status.read();
            if (!snapshot) {
                console.log(chalk.gray('[CLI] No status has been published yet.'));
                return;
            }
            if (options.json) {
                console.log(JSON.stringify(snapshot, null, 2));
                return;
            }
            const owner = await findRunningSupervisor(sup);
            printStatus(snapshot, owner === null);
        }, false);
    });

program
    .command('report')
    .description('Score the last published status and suggest fixes')
    .option('--json', 'Print the raw report')
    .action(async (options: { json?: boolean }) => {
        await withSupervisor(async (sup) => {
            const report = reportFor(sup, await currentSnapshot(sup));
            if (options.json) {
                console.log(JSON.stringify(report, null, 2));
                return;
            }
            printReport(report);
        }, false);
    });

program
    .command('export')
    .description('Write status, health report and backup stats to a JSON file')
    .argument('[file]', 'Output path (default: craftwatch-export-<timestamp>.json)')
    .action(async (file: string | undefined) => {
        await withSupervisor(async (sup) => {
            const result = await exportMonitoringData(sup, file);
            if (!result.ok) {
                console.error(chalk.red(`[CLI] ✗ ${result.error.message}`));
                process.exitCode = 1;
                return;
            }
            console.log(chalk.green(`[CLI] Monitoring data exported to ${result.value}`));
        }, false);
    });

program
    .command('command')
    .description('Send a console command to the server (no reply is awaited)')
    .argument('<text...>', 'Command text')
    .action(async (words: string[]) => {
        await withSupervisor(async (sup) => {
            if (await submitToRunning(sup, { type: 'command', text: words.join(' ') })) return;
            console.error(chalk.red('[CLI] ✗ Commands need a running supervisor.'));
            process.exitCode = 1;
        }, false);
    });

program
    .command('backup')
    .description('Create a backup snapshot now')
    .option('-n, --name <name>', 'Label added to the archive name')
    .action(async (options: { name?: string }) => {
        await withSupervisor(async (sup) => {
            if (await submitToRunning(sup, { type: 'backup', name: options.name })) return;

            const { timeoutSeconds, maxBackups } = sup.ctx.config.backups;
            const created = await sup.backups.createSnapshot('manual', timeoutSeconds * 1000, options.name);
            if (!created.ok) {
                console.error(chalk.red(`[CLI] ✗ ${created.error.message}`));
                process.exitCode = 1;
                return;
            }
            const pruned = await sup.backups.pruneOld(maxBackups, timeoutSeconds * 1000);
            if (!pruned.ok) console.warn(chalk.yellow(`[CLI] ${pruned.error.message}`));
        });
    });

program
    .command('list-backups')
    .description('List backup archives, newest first')
    .action(async () => {
        await withSupervisor(async (sup) => {
            const backups = await sup.backups.list();
            if (backups.length === 0) {
                console.log(chalk.gray('[CLI] No backups found.'));
                return;
            }
            for (const b of backups) {
                const lock = b.locked ? chalk.yellow(' [locked]') : '';
                console.log(`${b.id}  ${formatBytes(b.size)}  ${new Date(b.createdAt).toLocaleString('en-GB')}  ${b.reason}${lock}`);
            }
        }, false);
    });

program
    .command('lock-backup')
    .description('Protect a backup from pruning')
    .argument('<id>', 'Backup id as shown by list-backups')
    .option('--unlock', 'Remove the protection instead')
    .action(async (id: string, options: { unlock?: boolean }) => {
        await withSupervisor(async (sup) => {
            const result = await sup.backups.setLocked(id, !options.unlock);
            if (!result.ok) {
                console.error(chalk.red(`[CLI] ✗ ${result.error.message}`));
                process.exitCode = 1;
                return;
            }
            console.log(`[CLI] ${id} ${result.value.locked ? 'locked' : 'unlocked'}.`);
        }, false);
    });

program
    .command('history')
    .description('Show recent restart attempts')
    .option('-l, --limit <count>', 'Number of records', positiveInt, 20)
    .action(async (options: { limit: number }) => {
        await withSupervisor(async (sup) => {
            const records = sup.policy.recent(options.limit);
            if (records.length === 0) {
                console.log(chalk.gray('[CLI] No restarts recorded.'));
                return;
            }
            for (const r of records) {
                const cooldown = r.cooldownAppliedSeconds > 0 ? ` after ${r.cooldownAppliedSeconds}s cooldown` : '';
                console.log(`${new Date(r.timestamp).toLocaleString('en-GB')}  ${r.outcome.padEnd(7)}  ${r.reason}${cooldown}`);
            }
            const inWindow = sup.policy.countInWindow(sup.ctx.clock.now());
            console.log(chalk.gray(`${inWindow}/${sup.ctx.config.watchdog.maxRestarts} restarts in the current window.`));
        }, false);
    });

const watchdogCmd = program.command('watchdog').description('Watchdog controls');

watchdogCmd
    .command('reset')
    .description('Clear the restart window and leave the FAILED state')
    .action(async () => {
        await withSupervisor(async (sup) => {
            if (await submitToRunning(sup, { type: 'reset' })) return;
            await sup.policy.reset(sup.ctx.clock.now());
            console.log('[CLI] Restart history reset.');
        }, false);
    });

process.on('unhandledRejection', handleUnhandledRejection);

process.on('uncaughtException', (err) => {
    console.error(chalk.red(`[CLI] Uncaught exception: ${err.message}`));
    process.exit(1);
});

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(chalk.red(`[CLI] ✗ ${describeError(err)}`));
    process.exitCode = 1;
});
