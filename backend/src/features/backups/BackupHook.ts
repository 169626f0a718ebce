import { Result } from '../../utils/Result';

export interface BackupEntry {
    id: string;
    filename: string;
    size: number;
    createdAt: string;
    reason: string;
    name?: string;
    locked?: boolean; // locked archives are never pruned
}

/**
 * Snapshot seam used by the watchdog before restarts and stops. Implementations report
 * failures through the Result and must give up once `timeoutMs` has elapsed.
 * A timed-out snapshot fails with `details.timedOut = true`.
 */
export interface BackupHook {
    createSnapshot(reason: string, timeoutMs: number, name?: string): Promise<Result<BackupEntry>>;
    pruneOld(retentionCount: number, timeoutMs: number): Promise<Result<number>>;
}
