import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BackupService } from './BackupService';
import { SupervisorContext } from '../../context';
import { FakeClock, T0, makeConfig, makeContext, makeTempDir } from '../../test/fakes';

describe('BackupService', () => {
    let dir: string;
    let clock: FakeClock;
    let ctx: SupervisorContext;
    let service: BackupService;

    beforeEach(async () => {
        dir = await makeTempDir();
        clock = new FakeClock();
        ctx = makeContext(makeConfig(dir), clock);
        service = new BackupService(ctx);

        const serverDir = ctx.config.paths.serverDir;
        await fs.outputFile(path.join(serverDir, 'server.properties'), 'server-port=25565\n');
        await fs.outputFile(path.join(serverDir, 'world', 'level.dat'), 'level');
        await fs.outputFile(path.join(serverDir, 'world', 'session.lock'), 'lock');
        await fs.outputFile(path.join(serverDir, 'logs', 'latest.log'), 'log');
    });

    afterEach(async () => {
        await fs.remove(dir);
    });

    it('should archive the server directory and record it in the manifest', async () => {
        const result = await service.createSnapshot('manual', 30_000, 'before update!');

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value).toMatchObject({
            id: `backup-${T0}-before-update`,
            filename: `backup-${T0}-before-update.zip`,
            createdAt: new Date(T0).toISOString(),
            reason: 'manual',
            name: 'before update!'
        });
        expect(result.value.size).toBeGreaterThan(0);

        const archive = path.join(ctx.config.paths.backupDir, result.value.filename);
        expect(await fs.pathExists(archive)).toBe(true);
        const manifest = await fs.readJSON(path.join(ctx.config.paths.backupDir, 'manifest.json'));
        expect(manifest.backups).toHaveLength(1);
    });

    it('should fail with E_BACKUP_FAILED when the server directory is missing', async () => {
        await fs.remove(ctx.config.paths.serverDir);

        const result = await service.createSnapshot('scheduled', 30_000);

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.errorCode).toBe('E_BACKUP_FAILED');
    });

    it('should list newest first', async () => {
        await service.createSnapshot('scheduled', 30_000);
        clock.advance(60_000);
        await service.createSnapshot('stop', 30_000);

        const backups = await service.list();
        expect(backups.map(b => b.reason)).toEqual(['stop', 'scheduled']);
    });

    it('should prune the oldest unlocked archives beyond the retention count', async () => {
        const ids: string[] = [];
        for (let i = 0; i < 4; i++) {
            const created = await service.createSnapshot('scheduled', 30_000);
            if (created.ok) ids.push(created.value.id);
            clock.advance(60_000);
        }
        await service.setLocked(ids[0], true);

        const pruned = await service.pruneOld(2, 30_000);

        expect(pruned).toEqual({ ok: true, value: 1 });
        const remaining = (await service.list()).map(b => b.id);
        expect(remaining).toEqual([ids[3], ids[2], ids[0]]);
        expect(await fs.pathExists(path.join(ctx.config.paths.backupDir, `${ids[1]}.zip`))).toBe(false);
    });

    it('should recover archives missing from the manifest', async () => {
        await fs.ensureDir(ctx.config.paths.backupDir);
        await fs.writeFile(path.join(ctx.config.paths.backupDir, `backup-${T0}.zip`), 'zip');

        const backups = await service.list();

        expect(backups).toEqual([{
            id: `backup-${T0}`,
            filename: `backup-${T0}.zip`,
            size: 3,
            createdAt: new Date(T0).toISOString(),
            reason: 'recovered'
        }]);
    });

    it('should drop manifest entries whose archive was deleted', async () => {
        const created = await service.createSnapshot('manual', 30_000);
        expect(created.ok).toBe(true);
        if (!created.ok) return;
        await fs.remove(path.join(ctx.config.paths.backupDir, created.value.filename));

        expect(await service.list()).toEqual([]);
    });

    it('should summarise the archives on disk', async () => {
        await fs.ensureDir(ctx.config.paths.backupDir);
        await fs.writeFile(path.join(ctx.config.paths.backupDir, `backup-${T0}.zip`), 'zip');
        await fs.writeFile(path.join(ctx.config.paths.backupDir, `backup-${T0 + 60_000}.zip`), 'zipzip');
        const locked = await service.setLocked(`backup-${T0}`, true);
        expect(locked.ok).toBe(true);

        expect(await service.stats()).toEqual({
            count: 2,
            totalBytes: 9,
            locked: 1,
            newest: new Date(T0 + 60_000).toISOString(),
            oldest: new Date(T0).toISOString()
        });
    });

    it('should report empty stats without a backup directory', async () => {
        expect(await service.stats()).toEqual({ count: 0, totalBytes: 0, locked: 0, newest: null, oldest: null });
    });

    it('should report an unknown id when locking', async () => {
        const result = await service.setLocked('backup-0', true);
        expect(result.ok).toBe(false);
    });
});
