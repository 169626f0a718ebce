import { describe, expect, it } from 'vitest';
import { REPORT_ALERT_LIMIT, buildHealthReport, healthBand, restartSuccessRate } from './HealthReport';
import { MetricsSample, PerformanceAlert, StatusSnapshot } from '../../../../shared/types';
import { T0 } from '../../test/fakes';

const GB = 1024 ** 3;
const options = { autoBackup: false, memoryMaxBytes: 4 * GB, now: T0 + 5000 };

const sample = (overrides: Partial<MetricsSample> = {}): MetricsSample => ({
    timestamp: T0,
    cpuPercent: 10,
    memoryBytes: 1 * GB,
    uptimeSeconds: 600,
    portOpen: true,
    connectionCount: 2,
    ...overrides
});

const snapshot = (overrides: Partial<StatusSnapshot> = {}): StatusSnapshot => ({
    running: true,
    pid: 4000,
    uptimeSeconds: 600,
    health: { score: 100, state: 'ALIVE', reasons: [] },
    watchdogState: 'MONITORING',
    restartCountInWindow: 0,
    lastBackupOutcome: null,
    lastSample: sample(),
    trend5m: null,
    counters: { checksPerformed: 20, restartsAttempted: 0, restartsSucceeded: 0, monitoringSince: T0 },
    supervisorPid: 3000,
    supervising: true,
    alerts: [],
    updatedAt: T0,
    ...overrides
});

describe('healthBand', () => {
    it('should band scores at 90, 75, 50 and 25', () => {
        expect([100, 90, 89, 75, 74, 50, 49, 25, 24, 0].map(healthBand)).toEqual([
            'excellent', 'excellent', 'good', 'good', 'fair', 'fair', 'poor', 'poor', 'critical', 'critical'
        ]);
    });
});

describe('restartSuccessRate', () => {
    it('should be 100 before any restart', () => {
        expect(restartSuccessRate(0, 0)).toBe(100);
    });

    it('should round to one decimal', () => {
        expect(restartSuccessRate(3, 2)).toBe(66.7);
        expect(restartSuccessRate(4, 1)).toBe(25);
    });
});

describe('buildHealthReport', () => {
    it('should report a healthy server as excellent', () => {
        expect(buildHealthReport(snapshot(), options)).toEqual({
            score: 100,
            band: 'excellent',
            issues: [],
            recommendations: ['Server health is good', 'Continue regular monitoring'],
            running: true,
            uptimeSeconds: 600,
            monitoring: true,
            watchdogState: 'MONITORING',
            restartCountInWindow: 0,
            restartSuccessRate: 100,
            alerts: [],
            generatedAt: T0 + 5000
        });
    });

    it('should deduct for restarts and resource pressure', () => {
        const report = buildHealthReport(snapshot({
            restartCountInWindow: 4,
            lastSample: sample({ cpuPercent: 90, memoryBytes: 3.75 * GB }),
            counters: { checksPerformed: 20, restartsAttempted: 4, restartsSucceeded: 3, monitoringSince: T0 }
        }), options);

        expect(report.score).toBe(55);
        expect(report.band).toBe('fair');
        expect(report.issues).toEqual([
            'High restart count: 4 in the current window',
            'High memory usage: 93.8%',
            'High CPU usage: 90.0%'
        ]);
        expect(report.recommendations).toEqual([
            'Investigate the cause of frequent crashes',
            'Review recent server changes',
            'Increase server memory allocation (memory_max)',
            'Check for memory leaks in plugins or mods',
            'Optimize server performance settings',
            'Consider upgrading hardware'
        ]);
        expect(report.restartSuccessRate).toBe(75);
    });

    it('should only note elevated memory', () => {
        const report = buildHealthReport(snapshot({ lastSample: sample({ memoryBytes: 3.5 * GB }) }), options);

        expect(report.score).toBe(95);
        expect(report.issues).toEqual(['Elevated memory usage: 87.5%']);
        expect(report.recommendations).toEqual(['Server health is good', 'Continue regular monitoring']);
    });

    it('should add general advice once the score drops below 50', () => {
        const report = buildHealthReport(snapshot({
            running: false,
            pid: null,
            uptimeSeconds: 0,
            watchdogState: 'FAILED',
            restartCountInWindow: 5,
            lastSample: null,
            lastBackupOutcome: { result: 'FAILED', reason: 'pre-restart', timestamp: T0, message: 'disk full' }
        }), { ...options, autoBackup: true });

        expect(report.score).toBe(20);
        expect(report.band).toBe('critical');
        expect(report.issues).toEqual([
            'High restart count: 5 in the current window',
            'Restart limit reached; automatic restarts are suspended',
            'Server is not running',
            'Last backup failed (pre-restart)'
        ]);
        expect(report.recommendations).toEqual([
            'Consider reviewing server configuration',
            'Check server logs for errors',
            'Investigate the cause of frequent crashes',
            'Review recent server changes',
            'Run `craftwatch watchdog reset` once the crash cause is fixed',
            'Check the backup directory and free disk space',
            'Create a manual backup with `craftwatch backup`'
        ]);
    });

    it('should flag auto-backup when no supervisor is looping', () => {
        const report = buildHealthReport(snapshot({ supervising: false }), { ...options, autoBackup: true });

        expect(report.score).toBe(90);
        expect(report.monitoring).toBe(false);
        expect(report.issues).toEqual(['Auto-backup not running']);
    });

    it('should describe a timed out backup', () => {
        const report = buildHealthReport(snapshot({
            lastBackupOutcome: { result: 'TIMED_OUT', reason: 'scheduled', timestamp: T0 }
        }), { ...options, autoBackup: true });

        expect(report.issues).toEqual(['Last backup timed out (scheduled)']);
    });

    it('should carry only the most recent alerts', () => {
        const alerts: PerformanceAlert[] = Array.from({ length: REPORT_ALERT_LIMIT + 2 }, (_, i) => ({
            type: 'cpu_high',
            severity: 'warning',
            message: 'High CPU usage: 90.0%',
            value: 90,
            threshold: 85,
            timestamp: T0 + i
        }));

        const report = buildHealthReport(snapshot({ alerts }), options);

        expect(report.alerts).toHaveLength(REPORT_ALERT_LIMIT);
        expect(report.alerts[0].timestamp).toBe(T0 + 2);
    });
});
