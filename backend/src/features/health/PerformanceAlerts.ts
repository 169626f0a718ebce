import { MetricsSample, MetricsTrend, PerformanceAlert } from '../../../../shared/types';
import { HealthThresholds } from '../../config/SupervisorConfig';

export const CRITICAL_PERCENT = 95;
export const CONNECTION_SPIKE_MULTIPLIER = 2;
export const CONNECTION_SPIKE_MINIMUM = 10;
export const SPIKE_BASELINE_SAMPLES = 10;
export const MAX_ALERT_HISTORY = 100;

const pct = (value: number) => `${value.toFixed(1)}%`;

/**
 * Threshold alerts for one sample. Pure: `earlier` holds the samples taken before it,
 * oldest first, and is only used as the connection baseline.
 */
export function checkAlerts(
    sample: MetricsSample,
    trend5m: MetricsTrend,
    earlier: readonly MetricsSample[],
    thresholds: HealthThresholds
): PerformanceAlert[] {
    const alerts: PerformanceAlert[] = [];
    const at = sample.timestamp;

    if (thresholds.memoryMaxBytes > 0) {
        const memoryPercent = (sample.memoryBytes / thresholds.memoryMaxBytes) * 100;
        const warnPercent = thresholds.memoryWarnRatio * 100;
        if (memoryPercent > CRITICAL_PERCENT) {
            alerts.push({ type: 'memory_critical', severity: 'critical', message: `Critical memory usage: ${pct(memoryPercent)}`, value: memoryPercent, threshold: CRITICAL_PERCENT, timestamp: at });
        } else if (memoryPercent > warnPercent) {
            alerts.push({ type: 'memory_high', severity: 'warning', message: `High memory usage: ${pct(memoryPercent)}`, value: memoryPercent, threshold: warnPercent, timestamp: at });
        }
    }

    const { cpuHighWater } = thresholds;
    if (sample.cpuPercent > CRITICAL_PERCENT) {
        alerts.push({ type: 'cpu_critical', severity: 'critical', message: `Critical CPU usage: ${pct(sample.cpuPercent)}`, value: sample.cpuPercent, threshold: CRITICAL_PERCENT, timestamp: at });
    } else if (sample.cpuPercent > cpuHighWater) {
        alerts.push({ type: 'cpu_high', severity: 'warning', message: `High CPU usage: ${pct(sample.cpuPercent)}`, value: sample.cpuPercent, threshold: cpuHighWater, timestamp: at });
    }
    if (trend5m.samples > 0 && trend5m.avgCpu > cpuHighWater) {
        alerts.push({ type: 'cpu_sustained', severity: 'warning', message: `Sustained high CPU usage (5min avg): ${pct(trend5m.avgCpu)}`, value: trend5m.avgCpu, threshold: cpuHighWater, timestamp: at });
    }

    const baseline = earlier.slice(-SPIKE_BASELINE_SAMPLES);
    if (baseline.length === SPIKE_BASELINE_SAMPLES) {
        const average = baseline.reduce((sum, s) => sum + s.connectionCount, 0) / baseline.length;
        const spikeAt = average * CONNECTION_SPIKE_MULTIPLIER;
        if (sample.connectionCount > spikeAt && sample.connectionCount > CONNECTION_SPIKE_MINIMUM) {
            alerts.push({
                type: 'connection_spike',
                severity: 'info',
                message: `Connection spike detected: ${sample.connectionCount} (avg: ${average.toFixed(1)})`,
                value: sample.connectionCount,
                threshold: spikeAt,
                timestamp: at
            });
        }
    }

    return alerts;
}

/** Keeps the most recent alerts for the status snapshot and health report. */
export class PerformanceAlerts {
    private history: PerformanceAlert[] = [];

    constructor(private readonly thresholds: HealthThresholds) {}

    check(sample: MetricsSample, trend5m: MetricsTrend, earlier: readonly MetricsSample[]): PerformanceAlert[] {
        const alerts = checkAlerts(sample, trend5m, earlier, this.thresholds);
        if (alerts.length > 0) {
            this.history = [...this.history, ...alerts].slice(-MAX_ALERT_HISTORY);
        }
        return alerts;
    }

    recent(limit = MAX_ALERT_HISTORY): PerformanceAlert[] {
        return this.history.slice(-limit);
    }
}
