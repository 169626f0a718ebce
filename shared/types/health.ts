export type HealthState = 'ALIVE' | 'DEGRADED' | 'DEAD';

export type HealthReason =
    | 'port-closed'
    | 'port-closed-consecutive'
    | 'cpu-sustained'
    | 'memory-high'
    | 'check-timeout'
    | 'process-gone';

export interface HealthVerdict {
    score: number; // 0 to 100
    state: HealthState;
    reasons: HealthReason[];
}

export interface MetricsSample {
    timestamp: number;
    cpuPercent: number;
    memoryBytes: number;
    uptimeSeconds: number;
    portOpen: boolean;
    connectionCount: number;
}

export type TrendWindow = '5m' | '1h';

export interface MetricsTrend {
    window: TrendWindow;
    samples: number;
    avgCpu: number;
    avgMemory: number;
    peakCpu: number;
    peakMemory: number;
}

export type AlertSeverity = 'info' | 'warning' | 'critical';

export type AlertType =
    | 'memory_critical'
    | 'memory_high'
    | 'cpu_critical'
    | 'cpu_high'
    | 'cpu_sustained'
    | 'connection_spike';

export interface PerformanceAlert {
    type: AlertType;
    severity: AlertSeverity;
    message: string;
    value: number;
    threshold: number;
    timestamp: number;
}

export type HealthBand = 'excellent' | 'good' | 'fair' | 'poor' | 'critical';
