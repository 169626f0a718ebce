export * from '../../shared/types';
export { ERROR_CODES } from '../../shared/errorCodes';
export type { ErrorCode } from '../../shared/errorCodes';

export { loadConfig, parseConfig, RawConfigSchema, DEFAULT_CONFIG_FILE } from './config/SupervisorConfig';
export type { SupervisorConfig, LaunchSpec, HealthThresholds, SupervisorPaths } from './config/SupervisorConfig';
export { createContext } from './context';
export type { SupervisorContext } from './context';
export {
    createSupervisor,
    findRunningSupervisor,
    startSupervisor,
    currentSnapshot,
    reportFor,
    exportMonitoringData,
    defaultExportName
} from './supervisor';
export type { Supervisor, SupervisorOverrides, MonitoringExport } from './supervisor';

export { ProcessHandle } from './features/processes/ProcessHandle';
export type { StopOutcome, ProcessExitEvent } from './features/processes/ProcessHandle';
export { ProcessLock } from './features/processes/ProcessLock';
export { SystemProcessInspector, matchesIdentity } from './features/processes/ProcessInspector';
export type { IProcessInspector } from './features/processes/ProcessInspector';
export { NativeRunner } from './features/processes/runners/NativeRunner';
export type { IServerRunner } from './features/processes/runners/IServerRunner';
export { MetricsSampler } from './features/metrics/MetricsSampler';
export { SystemMetricsSource } from './features/metrics/MetricsSource';
export type { IMetricsSource } from './features/metrics/MetricsSource';
export { HealthScorer, assessHealth, checkTimeoutAssessment } from './features/health/HealthScorer';
export { PerformanceAlerts, checkAlerts } from './features/health/PerformanceAlerts';
export { buildHealthReport, healthBand, restartSuccessRate } from './features/health/HealthReport';
export { RestartPolicy } from './features/watchdog/RestartPolicy';
export type { RestartDecision } from './features/watchdog/RestartPolicy';
export { RestartHistory } from './features/watchdog/RestartHistory';
export { Watchdog } from './features/watchdog/Watchdog';
export { ControlInbox } from './features/watchdog/ControlInbox';
export { StatusStore } from './features/watchdog/StatusStore';
export { BackupService } from './features/backups/BackupService';
export type { BackupHook, BackupEntry } from './features/backups/BackupHook';

export { AppError } from './utils/AppError';
export { Logger } from './utils/logger';
export type { Result } from './utils/Result';
