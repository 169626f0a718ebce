import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { StatusSnapshot } from '../../../../shared/types';

const HealthVerdictSchema = z.object({
    score: z.number(),
    state: z.enum(['ALIVE', 'DEGRADED', 'DEAD']),
    reasons: z.array(z.enum(['port-closed', 'port-closed-consecutive', 'cpu-sustained', 'memory-high', 'check-timeout', 'process-gone']))
});

const PerformanceAlertSchema = z.object({
    type: z.enum(['memory_critical', 'memory_high', 'cpu_critical', 'cpu_high', 'cpu_sustained', 'connection_spike']),
    severity: z.enum(['info', 'warning', 'critical']),
    message: z.string(),
    value: z.number(),
    threshold: z.number(),
    timestamp: z.number()
});

const StatusSnapshotSchema: z.ZodType<StatusSnapshot> = z.object({
    running: z.boolean(),
    pid: z.number().nullable(),
    uptimeSeconds: z.number(),
    health: HealthVerdictSchema.nullable(),
    watchdogState: z.enum(['STOPPED', 'MONITORING', 'RESTARTING', 'COOLING_DOWN', 'FAILED']),
    restartCountInWindow: z.number(),
    lastBackupOutcome: z.object({
        result: z.enum(['SUCCESS', 'FAILED', 'TIMED_OUT']),
        reason: z.string(),
        timestamp: z.number(),
        archive: z.string().optional(),
        message: z.string().optional()
    }).nullable(),
    lastSample: z.object({
        timestamp: z.number(),
        cpuPercent: z.number(),
        memoryBytes: z.number(),
        uptimeSeconds: z.number(),
        portOpen: z.boolean(),
        connectionCount: z.number()
    }).nullable(),
    trend5m: z.object({
        window: z.enum(['5m', '1h']),
        samples: z.number(),
        avgCpu: z.number(),
        avgMemory: z.number(),
        peakCpu: z.number(),
        peakMemory: z.number()
    }).nullable(),
    counters: z.object({
        checksPerformed: z.number(),
        restartsAttempted: z.number(),
        restartsSucceeded: z.number(),
        monitoringSince: z.number().nullable()
    }),
    supervisorPid: z.number(),
    supervising: z.boolean(),
    alerts: z.array(PerformanceAlertSchema),
    updatedAt: z.number()
});

/**
 * Last published snapshot, readable by other processes without touching the loop.
 */
export class StatusStore {
    constructor(private readonly file: string) {}

    async write(snapshot: StatusSnapshot): Promise<void> {
        await fs.ensureDir(path.dirname(this.file));
        const tmp = `${this.file}.${process.pid}.tmp`;
        await fs.writeJSON(tmp, snapshot, { spaces: 2 });
        await fs.rename(tmp, this.file);
    }

    async read(): Promise<StatusSnapshot | null> {
        try {
            const raw: unknown = await fs.readJSON(this.file);
            const parsed = StatusSnapshotSchema.safeParse(raw);
            return parsed.success ? parsed.data : null;
        } catch {
            // Not published yet
            return null;
        }
    }
}
