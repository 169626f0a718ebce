import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { IProcessInspector, matchesIdentity } from './ProcessInspector';
import { Result, ok, fail } from '../../utils/Result';
import { describeError, errnoCode } from '../../utils/AppError';

const ProcessRecordSchema = z.object({
    ownerPid: z.number().int().positive(),
    pid: z.number().int().positive().nullable(),
    startedAt: z.number().nullable(),
    command: z.string().nullable()
});

/** Durable record of the supervised child, stored in the lock file itself. */
export type ProcessRecord = z.infer<typeof ProcessRecordSchema>;

const sameRecord = (a: ProcessRecord | null, b: ProcessRecord | null) =>
    a === null || b === null
        ? a === b
        : a.ownerPid === b.ownerPid && a.pid === b.pid && a.startedAt === b.startedAt && a.command === b.command;

/**
 * Exclusive single-instance lock backed by a file that appears atomically with its full
 * contents (hard link of a fully written temp file). Held for the child's lifetime.
 */
export class ProcessLock {
    private owned = false;

    constructor(
        private readonly lockFile: string,
        private readonly inspector: IProcessInspector,
        private readonly selfPid: number = process.pid
    ) {}

    get isOwned(): boolean {
        return this.owned;
    }

    read(): Promise<ProcessRecord | null> {
        return this.readRecord(this.lockFile);
    }

    private async readRecord(file: string): Promise<ProcessRecord | null> {
        try {
            const raw: unknown = await fs.readJSON(file);
            const parsed = ProcessRecordSchema.safeParse(raw);
            return parsed.success ? parsed.data : null;
        } catch {
            // Missing or unreadable: nobody can prove ownership
            return null;
        }
    }

    async acquire(): Promise<Result<void>> {
        if (this.owned) return ok(undefined);

        try {
            await fs.ensureDir(path.dirname(this.lockFile));
        } catch (e) {
            return fail('E_LOCK_UNAVAILABLE', `Cannot prepare ${path.dirname(this.lockFile)}: ${describeError(e)}`);
        }

        for (let attempt = 0; attempt < 2; attempt++) {
            try {
                await this.createExclusive({ ownerPid: this.selfPid, pid: null, startedAt: null, command: null });
                this.owned = true;
                return ok(undefined);
            } catch (e) {
                if (errnoCode(e) !== 'EEXIST') {
                    return fail('E_LOCK_UNAVAILABLE', `Cannot create ${this.lockFile}: ${describeError(e)}`);
                }
            }

            const holder = await this.read();
            if (holder?.pid && await matchesIdentity(this.inspector, holder.pid, holder.startedAt, holder.command)) {
                return fail('E_ALREADY_RUNNING', `Server is already running (PID ${holder.pid})`, {
                    pid: holder.pid,
                    ownerPid: holder.ownerPid
                });
            }
            if (holder && holder.ownerPid !== this.selfPid && this.inspector.exists(holder.ownerPid)) {
                return fail('E_LOCK_UNAVAILABLE', `Lock is held by supervisor PID ${holder.ownerPid}`, {
                    ownerPid: holder.ownerPid
                });
            }

            // Owner and child are both gone
            const reclaimed = await this.reclaimStale(holder);
            if (!reclaimed.ok) return reclaimed;
        }

        return fail('E_LOCK_UNAVAILABLE', `Lock ${this.lockFile} is contended`);
    }

    /** Records the launched child. Only the owner may write. */
    async record(pid: number, startedAt: number, command: string): Promise<void> {
        if (!this.owned) throw new Error('Cannot record a process without owning the lock');
        await this.replace({ ownerPid: this.selfPid, pid, startedAt, command });
    }

    /**
     * Claims a lock left behind by a supervisor that exited while its child kept running.
     */
    async takeOver(holder: ProcessRecord): Promise<boolean> {
        if (holder.ownerPid !== this.selfPid && this.inspector.exists(holder.ownerPid)) return false;
        await this.replace({ ...holder, ownerPid: this.selfPid });
        this.owned = true;
        return true;
    }

    async release(): Promise<void> {
        if (!this.owned) return;
        this.owned = false;
        const current = await this.read();
        if (current && current.ownerPid !== this.selfPid) return;
        await fs.remove(this.lockFile);
    }

    /**
     * Moves the stale file aside under a name only this process uses, then checks that
     * what was moved is still the record judged stale. A lock another supervisor created
     * in between is linked back into place.
     */
    private async reclaimStale(holder: ProcessRecord | null): Promise<Result<void>> {
        const moved = `${this.lockFile}.stale.${this.selfPid}.${Date.now()}`;
        try {
            await fs.rename(this.lockFile, moved);
        } catch (e) {
            // Already reclaimed by someone else
            if (errnoCode(e) === 'ENOENT') return ok(undefined);
            return fail('E_LOCK_UNAVAILABLE', `Cannot reclaim stale lock ${this.lockFile}: ${describeError(e)}`);
        }

        try {
            if (!sameRecord(await this.readRecord(moved), holder)) {
                await this.restore(moved);
            }
            await fs.remove(moved);
        } catch (e) {
            return fail('E_LOCK_UNAVAILABLE', `Cannot reclaim stale lock ${this.lockFile}: ${describeError(e)}`);
        }
        return ok(undefined);
    }

    private async restore(moved: string): Promise<void> {
        try {
            await fs.link(moved, this.lockFile);
        } catch (e) {
            // A newer lock is already in place
            if (errnoCode(e) !== 'EEXIST') throw e;
        }
    }

    private tempPath() {
        return `${this.lockFile}.${this.selfPid}.${Date.now()}.tmp`;
    }

    private async createExclusive(record: ProcessRecord): Promise<void> {
        const tmp = this.tempPath();
        await fs.writeJSON(tmp, record);
        try {
            await fs.link(tmp, this.lockFile);
        } catch (e) {
            const code = errnoCode(e);
            if (code === 'EEXIST') throw e;
            // Filesystems without hard links: fall back to exclusive create
            await fs.writeFile(this.lockFile, JSON.stringify(record), { flag: 'wx' });
        } finally {
            await fs.remove(tmp);
        }
    }

    private async replace(record: ProcessRecord): Promise<void> {
        const tmp = this.tempPath();
        await fs.writeJSON(tmp, record);
        await fs.rename(tmp, this.lockFile);
    }
}
