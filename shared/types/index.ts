// --- Shared / Supervisor Types ---

export * from './health';

import type { HealthBand, HealthVerdict, MetricsSample, MetricsTrend, PerformanceAlert } from './health';

export interface ServerProcess {
    pid: number;
    startedAt: number;
    lockOwned: boolean;
    adopted: boolean; // true when taken over from a previous supervisor run (no control channel)
}

export type WatchdogState = 'STOPPED' | 'MONITORING' | 'RESTARTING' | 'COOLING_DOWN' | 'FAILED';

export type RestartOutcome = 'PENDING' | 'SUCCESS' | 'FAILED';

export interface RestartRecord {
    timestamp: number;
    reason: string;
    outcome: RestartOutcome;
    cooldownAppliedSeconds: number;
}

export type BackupResult = 'SUCCESS' | 'FAILED' | 'TIMED_OUT';

export interface BackupOutcome {
    result: BackupResult;
    reason: string;
    timestamp: number;
    archive?: string;
    message?: string;
}

export interface WatchdogCounters {
    checksPerformed: number;
    restartsAttempted: number;
    restartsSucceeded: number;
    monitoringSince: number | null;
}

export interface StatusSnapshot {
    running: boolean;
    pid: number | null;
    uptimeSeconds: number;
    health: HealthVerdict | null;
    watchdogState: WatchdogState;
    restartCountInWindow: number;
    lastBackupOutcome: BackupOutcome | null;
    lastSample: MetricsSample | null;
    trend5m: MetricsTrend | null;
    counters: WatchdogCounters;
    supervisorPid: number;
    supervising: boolean; // false once the loop has shut down
    alerts: PerformanceAlert[]; // most recent last
    updatedAt: number;
}

export interface HealthReport {
    score: number; // 0 to 100
    band: HealthBand;
    issues: string[];
    recommendations: string[];
    running: boolean;
    uptimeSeconds: number;
    monitoring: boolean;
    watchdogState: WatchdogState;
    restartCountInWindow: number;
    restartSuccessRate: number; // percent; 100 before any attempt
    alerts: PerformanceAlert[];
    generatedAt: number;
}

export interface BackupStats {
    count: number;
    totalBytes: number;
    locked: number;
    newest: string | null; // ISO timestamp
    oldest: string | null;
}

// --- Control inbox ---

export type ControlRequest =
    | { type: 'stop'; graceful: boolean; timeoutSeconds?: number }
    | { type: 'restart'; reason?: string }
    | { type: 'reset' }
    | { type: 'command'; text: string }
    | { type: 'backup'; name?: string };
