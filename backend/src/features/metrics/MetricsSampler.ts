import { MetricsSample, MetricsTrend, ServerProcess, TrendWindow } from '../../../../shared/types';
import { SupervisorContext } from '../../context';
import { IMetricsSource } from './MetricsSource';
import { RingBuffer } from '../../utils/RingBuffer';
import { Result, ok, fail } from '../../utils/Result';
import { describeError } from '../../utils/AppError';
import { TimeoutError, withTimeout } from '../../utils/timing';

const FIVE_MINUTES_MS = 5 * 60_000;
const ONE_HOUR_MS = 60 * 60_000;
const HOURLY_RESOLUTION_MS = 60_000;
const HOURLY_CAPACITY = ONE_HOUR_MS / HOURLY_RESOLUTION_MS;
const SAMPLE_GRACE_MS = 1000;

export interface SampledProcess {
    readonly current: ServerProcess | null;
}

const WINDOW_MS: Record<TrendWindow, number> = {
    '5m': FIVE_MINUTES_MS,
    '1h': ONE_HOUR_MS
};

class ProcessVanished extends Error {
    constructor(pid: number) {
        super(`PID ${pid} is no longer in the process table`);
    }
}

export class MetricsSampler {
    private readonly recent: RingBuffer<MetricsSample>;
    private readonly hourly = new RingBuffer<MetricsSample>(HOURLY_CAPACITY);

    constructor(
        private readonly ctx: SupervisorContext,
        private readonly target: SampledProcess,
        private readonly source: IMetricsSource
    ) {
        const intervalMs = ctx.config.watchdog.intervalSeconds * 1000;
        this.recent = new RingBuffer<MetricsSample>(Math.max(1, Math.ceil(FIVE_MINUTES_MS / intervalMs)));
    }

    async sample(): Promise<Result<MetricsSample>> {
        const proc = this.target.current;
        if (!proc) return fail('E_PROCESS_GONE', 'No server process to sample');

        const { probeTimeoutSeconds } = this.ctx.config.watchdog;
        const budgetMs = probeTimeoutSeconds * 1000 + SAMPLE_GRACE_MS;

        try {
            const sample = await withTimeout(this.collect(proc), budgetMs, `Sampling PID ${proc.pid}`);
            this.record(sample);
            return ok(sample);
        } catch (e) {
            if (e instanceof ProcessVanished || e instanceof TimeoutError) {
                return fail('E_PROCESS_GONE', e.message, { pid: proc.pid });
            }
            return fail('E_UNKNOWN', `Metrics collection failed: ${describeError(e)}`);
        }
    }

    latest(): MetricsSample | null {
        return this.recent.last() ?? null;
    }

    history(window: TrendWindow): MetricsSample[] {
        const buffer = window === '5m' ? this.recent : this.hourly;
        const samples = buffer.toArray();
        const newest = samples[samples.length - 1];
        if (!newest) return [];
        const cutoff = newest.timestamp - WINDOW_MS[window];
        return samples.filter(s => s.timestamp > cutoff);
    }

    trend(window: TrendWindow): MetricsTrend {
        const samples = this.history(window);
        if (samples.length === 0) {
            return { window, samples: 0, avgCpu: 0, avgMemory: 0, peakCpu: 0, peakMemory: 0 };
        }

        let cpuTotal = 0;
        let memoryTotal = 0;
        let peakCpu = 0;
        let peakMemory = 0;
        for (const s of samples) {
            cpuTotal += s.cpuPercent;
            memoryTotal += s.memoryBytes;
            peakCpu = Math.max(peakCpu, s.cpuPercent);
            peakMemory = Math.max(peakMemory, s.memoryBytes);
        }

        return {
            window,
            samples: samples.length,
            avgCpu: cpuTotal / samples.length,
            avgMemory: memoryTotal / samples.length,
            peakCpu,
            peakMemory
        };
    }

    /** Drops all history, e.g. when a new process is launched. */
    clear() {
        this.recent.clear();
        this.hourly.clear();
    }

    private async collect(proc: ServerProcess): Promise<MetricsSample> {
        const { serverHost, serverPort, watchdog } = this.ctx.config;

        const [usage, portOpen, connectionCount] = await Promise.all([
            this.source.readProcess(proc.pid),
            this.source.probePort(serverHost, serverPort, watchdog.probeTimeoutSeconds * 1000),
            this.source.countConnections(proc.pid, serverPort).catch((err: unknown) => {
                this.ctx.logger.debug(`[MetricsSampler] Connection count unavailable: ${describeError(err)}`);
                return 0;
            })
        ]);

        if (!usage) throw new ProcessVanished(proc.pid);

        const timestamp = this.ctx.clock.now();
        return {
            timestamp,
            cpuPercent: usage.cpuPercent,
            memoryBytes: usage.memoryBytes,
            uptimeSeconds: Math.max(0, Math.floor((timestamp - proc.startedAt) / 1000)),
            portOpen,
            connectionCount
        };
    }

    private record(sample: MetricsSample) {
        this.recent.push(sample);
        const lastHourly = this.hourly.last();
        if (!lastHourly || sample.timestamp - lastHourly.timestamp >= HOURLY_RESOLUTION_MS) {
            this.hourly.push(sample);
        }
    }
}
