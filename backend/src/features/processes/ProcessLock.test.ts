import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ProcessLock, ProcessRecord } from './ProcessLock';
import { FakeInspector, T0, makeTempDir } from '../../test/fakes';

const SELF = 1000;
const OTHER_SUPERVISOR = 2000;
const RIVAL_SUPERVISOR = 3000;

/** Simulates a rival supervisor creating its lock right after this one read the stale file. */
class InterleavedLock extends ProcessLock {
    private raced = false;

    constructor(private readonly file: string, inspector: FakeInspector, selfPid: number) {
        super(file, inspector, selfPid);
    }

    async read(): Promise<ProcessRecord | null> {
        const holder = await super.read();
        if (!this.raced) {
            this.raced = true;
            await fs.writeJSON(this.file, { ownerPid: RIVAL_SUPERVISOR, pid: null, startedAt: null, command: null });
        }
        return holder;
    }
}

describe('ProcessLock', () => {
    let dir: string;
    let lockFile: string;
    let inspector: FakeInspector;

    beforeEach(async () => {
        dir = await makeTempDir();
        lockFile = path.join(dir, 'state', 'server.lock');
        inspector = new FakeInspector();
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.remove(dir);
    });

    it('should create the lock file with an empty record', async () => {
        const lock = new ProcessLock(lockFile, inspector, SELF);

        const result = await lock.acquire();

        expect(result.ok).toBe(true);
        expect(lock.isOwned).toBe(true);
        expect(await fs.readJSON(lockFile)).toEqual({ ownerPid: SELF, pid: null, startedAt: null, command: null });
    });

    it('should record the child and release the file', async () => {
        const lock = new ProcessLock(lockFile, inspector, SELF);
        await lock.acquire();

        await lock.record(4000, T0, 'java');
        expect(await lock.read()).toEqual({ ownerPid: SELF, pid: 4000, startedAt: T0, command: 'java' });

        await lock.release();
        expect(await fs.pathExists(lockFile)).toBe(false);
    });

    it('should refuse with E_ALREADY_RUNNING while the recorded child is alive', async () => {
        inspector.spawn(OTHER_SUPERVISOR, 'node', T0);
        inspector.spawn(4000, 'java -jar server.jar', T0);
        await fs.ensureDir(path.dirname(lockFile));
        await fs.writeJSON(lockFile, { ownerPid: OTHER_SUPERVISOR, pid: 4000, startedAt: T0, command: 'java' });

        const lock = new ProcessLock(lockFile, inspector, SELF);
        const result = await lock.acquire();

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.errorCode).toBe('E_ALREADY_RUNNING');
        expect(result.error.details).toEqual({ pid: 4000, ownerPid: OTHER_SUPERVISOR });
        expect(lock.isOwned).toBe(false);
    });

    it('should refuse with E_LOCK_UNAVAILABLE while another supervisor holds it', async () => {
        inspector.spawn(OTHER_SUPERVISOR, 'node', T0);
        await fs.ensureDir(path.dirname(lockFile));
        await fs.writeJSON(lockFile, { ownerPid: OTHER_SUPERVISOR, pid: null, startedAt: null, command: null });

        const result = await new ProcessLock(lockFile, inspector, SELF).acquire();

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.errorCode).toBe('E_LOCK_UNAVAILABLE');
    });

    it('should replace a stale lock whose owner and child are gone', async () => {
        await fs.ensureDir(path.dirname(lockFile));
        await fs.writeJSON(lockFile, { ownerPid: OTHER_SUPERVISOR, pid: 4000, startedAt: T0, command: 'java' });

        const lock = new ProcessLock(lockFile, inspector, SELF);
        const result = await lock.acquire();

        expect(result.ok).toBe(true);
        expect((await lock.read())?.ownerPid).toBe(SELF);
    });

    it('should let a new supervisor take over a live child of a dead one', async () => {
        inspector.spawn(4000, 'java', T0);
        await fs.ensureDir(path.dirname(lockFile));
        await fs.writeJSON(lockFile, { ownerPid: OTHER_SUPERVISOR, pid: 4000, startedAt: T0, command: 'java' });

        const lock = new ProcessLock(lockFile, inspector, SELF);
        const holder = await lock.read();
        expect(holder).not.toBeNull();
        if (!holder) return;

        expect(await lock.takeOver(holder)).toBe(true);
        expect(await lock.read()).toEqual({ ownerPid: SELF, pid: 4000, startedAt: T0, command: 'java' });
    });

    it('should not delete a lock it does not own on release', async () => {
        const lock = new ProcessLock(lockFile, inspector, SELF);
        await lock.acquire();
        await fs.writeJSON(lockFile, { ownerPid: OTHER_SUPERVISOR, pid: null, startedAt: null, command: null });

        await lock.release();

        expect(await fs.pathExists(lockFile)).toBe(true);
    });

    it('should put back a lock that a rival created between the stale check and the reclaim', async () => {
        inspector.spawn(RIVAL_SUPERVISOR, 'node', T0);
        await fs.ensureDir(path.dirname(lockFile));
        await fs.writeJSON(lockFile, { ownerPid: OTHER_SUPERVISOR, pid: null, startedAt: null, command: null });

        const lock = new InterleavedLock(lockFile, inspector, SELF);
        const result = await lock.acquire();

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.errorCode).toBe('E_LOCK_UNAVAILABLE');
        expect(await fs.readJSON(lockFile)).toEqual({ ownerPid: RIVAL_SUPERVISOR, pid: null, startedAt: null, command: null });
        expect(await fs.readdir(path.dirname(lockFile))).toEqual(['server.lock']);
        expect(lock.isOwned).toBe(false);
    });

    it('should report E_LOCK_UNAVAILABLE when the stale lock cannot be moved aside', async () => {
        await fs.ensureDir(path.dirname(lockFile));
        await fs.writeJSON(lockFile, { ownerPid: OTHER_SUPERVISOR, pid: null, startedAt: null, command: null });
        vi.spyOn(fs, 'rename').mockRejectedValueOnce(Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }));

        const lock = new ProcessLock(lockFile, inspector, SELF);
        const result = await lock.acquire();

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.errorCode).toBe('E_LOCK_UNAVAILABLE');
        expect(result.error.message).toBe(`Cannot reclaim stale lock ${lockFile}: EACCES: permission denied`);
        expect(lock.isOwned).toBe(false);
    });
});
