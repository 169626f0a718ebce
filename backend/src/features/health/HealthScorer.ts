import { HealthReason, HealthState, HealthVerdict, MetricsSample, MetricsTrend } from '../../../../shared/types';
import { HealthThresholds } from '../../config/SupervisorConfig';

export const PORT_CLOSED_PENALTY = 50;
export const MAX_CPU_PENALTY = 30;
export const MAX_MEMORY_PENALTY = 40;

export const ALIVE_THRESHOLD = 70;
export const DEAD_THRESHOLD = 30;
export const PORT_FAILURES_FOR_DEAD = 2;

export interface HealthAssessment {
    verdict: HealthVerdict;
    /** Consecutive failed port checks including this sample. */
    portFailures: number;
}

export function cpuPenalty(avgCpu: number, highWater: number): number {
    if (avgCpu <= highWater) return 0;
    const span = 100 - highWater;
    if (span <= 0) return MAX_CPU_PENALTY;
    return Math.min(MAX_CPU_PENALTY, ((avgCpu - highWater) / span) * MAX_CPU_PENALTY);
}

export function memoryPenalty(memoryBytes: number, memoryMaxBytes: number, warnRatio: number): number {
    if (memoryMaxBytes <= 0) return 0;
    const ratio = memoryBytes / memoryMaxBytes;
    if (ratio <= warnRatio) return 0;
    return Math.min(MAX_MEMORY_PENALTY, ((ratio - warnRatio) / (1 - warnRatio)) * MAX_MEMORY_PENALTY);
}

const stateForScore = (score: number): HealthState =>
    score >= ALIVE_THRESHOLD ? 'ALIVE' : score >= DEAD_THRESHOLD ? 'DEGRADED' : 'DEAD';

/**
 * Pure scoring of one sample against the 5-minute trend. Checks run in a fixed order:
 * port reachability, sustained CPU, memory pressure. Resource penalties alone bottom
 * out at DEAD_THRESHOLD, so only the port check can produce a DEAD verdict, and only
 * after PORT_FAILURES_FOR_DEAD consecutive failures.
 */
export function assessHealth(
    sample: MetricsSample,
    trend5m: MetricsTrend,
    thresholds: HealthThresholds,
    previousPortFailures: number
): HealthAssessment {
    const reasons: HealthReason[] = [];
    let score = 100;

    const portFailures = sample.portOpen ? 0 : previousPortFailures + 1;
    if (!sample.portOpen) {
        score -= PORT_CLOSED_PENALTY;
        reasons.push(portFailures >= PORT_FAILURES_FOR_DEAD ? 'port-closed-consecutive' : 'port-closed');
    }

    const cpu = cpuPenalty(trend5m.samples > 0 ? trend5m.avgCpu : sample.cpuPercent, thresholds.cpuHighWater);
    if (cpu > 0) {
        score -= cpu;
        reasons.push('cpu-sustained');
    }

    const memory = memoryPenalty(sample.memoryBytes, thresholds.memoryMaxBytes, thresholds.memoryWarnRatio);
    if (memory > 0) {
        score -= memory;
        reasons.push('memory-high');
    }

    score = Math.max(0, Math.min(100, Math.floor(score)));

    let state = stateForScore(score);
    if (portFailures >= PORT_FAILURES_FOR_DEAD) {
        state = 'DEAD';
    } else if (state === 'DEAD') {
        // An isolated port failure is never enough on its own
        state = 'DEGRADED';
    }

    return { verdict: { score, state, reasons }, portFailures };
}

export const processGoneVerdict = (): HealthVerdict => ({ score: 0, state: 'DEAD', reasons: ['process-gone'] });

/**
 * A sample that never completed while the PID is still alive. It counts against the
 * same streak as a closed port, so only a repeat makes the server DEAD.
 */
export function checkTimeoutAssessment(previousPortFailures: number): HealthAssessment {
    const portFailures = previousPortFailures + 1;
    const state: HealthState = portFailures >= PORT_FAILURES_FOR_DEAD ? 'DEAD' : 'DEGRADED';
    return { verdict: { score: 100 - PORT_CLOSED_PENALTY, state, reasons: ['check-timeout'] }, portFailures };
}

/**
 * Carries the consecutive port-failure streak between ticks.
 */
export class HealthScorer {
    private portFailures = 0;

    constructor(private readonly thresholds: HealthThresholds) {}

    evaluate(sample: MetricsSample, trend5m: MetricsTrend): HealthVerdict {
        const assessment = assessHealth(sample, trend5m, this.thresholds, this.portFailures);
        this.portFailures = assessment.portFailures;
        return assessment.verdict;
    }

    checkTimedOut(): HealthVerdict {
        const assessment = checkTimeoutAssessment(this.portFailures);
        this.portFailures = assessment.portFailures;
        return assessment.verdict;
    }

    processGone(): HealthVerdict {
        this.portFailures = 0;
        return processGoneVerdict();
    }

    reset() {
        this.portFailures = 0;
    }
}
