import { HealthBand, HealthReport, StatusSnapshot } from '../../../../shared/types';

export const REPORT_ALERT_LIMIT = 10;

type IssueKind = 'restarts' | 'failed' | 'not-running' | 'memory' | 'memory-elevated' | 'cpu' | 'backup';

interface Issue {
    kind: IssueKind;
    penalty: number;
    message: string;
}

const RECOMMENDATIONS: Partial<Record<IssueKind, string[]>> = {
    restarts: ['Investigate the cause of frequent crashes', 'Review recent server changes'],
    failed: ['Run `craftwatch watchdog reset` once the crash cause is fixed'],
    memory: ['Increase server memory allocation (memory_max)', 'Check for memory leaks in plugins or mods'],
    cpu: ['Optimize server performance settings', 'Consider upgrading hardware'],
    backup: ['Check the backup directory and free disk space', 'Create a manual backup with `craftwatch backup`']
};

export function healthBand(score: number): HealthBand {
    if (score >= 90) return 'excellent';
    if (score >= 75) return 'good';
    if (score >= 50) return 'fair';
    if (score >= 25) return 'poor';
    return 'critical';
}

/** Percentage with one decimal; 100 before any attempt. */
export function restartSuccessRate(attempted: number, succeeded: number): number {
    if (attempted === 0) return 100;
    return Math.round((succeeded / attempted) * 1000) / 10;
}

function findIssues(snapshot: StatusSnapshot, autoBackup: boolean, memoryMaxBytes: number): Issue[] {
    const issues: Issue[] = [];

    if (snapshot.restartCountInWindow > 3) {
        issues.push({ kind: 'restarts', penalty: 20, message: `High restart count: ${snapshot.restartCountInWindow} in the current window` });
    }
    if (snapshot.watchdogState === 'FAILED') {
        issues.push({ kind: 'failed', penalty: 20, message: 'Restart limit reached; automatic restarts are suspended' });
    }

    if (!snapshot.running) {
        issues.push({ kind: 'not-running', penalty: 30, message: 'Server is not running' });
    } else if (snapshot.lastSample) {
        const { cpuPercent, memoryBytes } = snapshot.lastSample;
        const memoryPercent = memoryMaxBytes > 0 ? (memoryBytes / memoryMaxBytes) * 100 : 0;
        if (memoryPercent > 90) {
            issues.push({ kind: 'memory', penalty: 15, message: `High memory usage: ${memoryPercent.toFixed(1)}%` });
        } else if (memoryPercent > 80) {
            issues.push({ kind: 'memory-elevated', penalty: 5, message: `Elevated memory usage: ${memoryPercent.toFixed(1)}%` });
        }
        if (cpuPercent > 85) {
            issues.push({ kind: 'cpu', penalty: 10, message: `High CPU usage: ${cpuPercent.toFixed(1)}%` });
        }
    }

    if (autoBackup) {
        const last = snapshot.lastBackupOutcome;
        if (!snapshot.supervising) {
            issues.push({ kind: 'backup', penalty: 10, message: 'Auto-backup not running' });
        } else if (last && last.result !== 'SUCCESS') {
            issues.push({ kind: 'backup', penalty: 10, message: `Last backup ${last.result === 'TIMED_OUT' ? 'timed out' : 'failed'} (${last.reason})` });
        }
    }

    return issues;
}

/**
 * Operator-facing summary of a status snapshot: a 0..100 score in five bands, the issues
 * that cost points and what to do about them.
 */
export function buildHealthReport(
    snapshot: StatusSnapshot,
    options: { autoBackup: boolean; memoryMaxBytes: number; now: number }
): HealthReport {
    const issues = findIssues(snapshot, options.autoBackup, options.memoryMaxBytes);
    const score = Math.max(0, issues.reduce((total, issue) => total - issue.penalty, 100));

    const recommendations: string[] = [];
    if (score < 50) {
        recommendations.push('Consider reviewing server configuration', 'Check server logs for errors');
    }
    for (const kind of new Set(issues.map(i => i.kind))) {
        recommendations.push(...(RECOMMENDATIONS[kind] ?? []));
    }
    if (recommendations.length === 0) {
        recommendations.push('Server health is good', 'Continue regular monitoring');
    }

    return {
        score,
        band: healthBand(score),
        issues: issues.map(i => i.message),
        recommendations,
        running: snapshot.running,
        uptimeSeconds: snapshot.uptimeSeconds,
        monitoring: snapshot.supervising,
        watchdogState: snapshot.watchdogState,
        restartCountInWindow: snapshot.restartCountInWindow,
        restartSuccessRate: restartSuccessRate(snapshot.counters.restartsAttempted, snapshot.counters.restartsSucceeded),
        alerts: snapshot.alerts.slice(-REPORT_ALERT_LIMIT),
        generatedAt: options.now
    };
}
