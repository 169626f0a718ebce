import fs from 'fs-extra';
import path from 'path';
import archiver from 'archiver';
import { z } from 'zod';
import { BackupStats } from '../../../../shared/types';
import { SupervisorContext } from '../../context';
import { BackupEntry, BackupHook } from './BackupHook';
import { Result, ok, fail } from '../../utils/Result';
import { describeError } from '../../utils/AppError';
import { TimeoutError, withTimeout } from '../../utils/timing';

const MANIFEST_FILE = 'manifest.json';

const BackupEntrySchema = z.object({
    id: z.string(),
    filename: z.string(),
    size: z.number(),
    createdAt: z.string(),
    reason: z.string(),
    name: z.string().optional(),
    locked: z.boolean().optional()
});

const ManifestSchema = z.object({ backups: z.array(BackupEntrySchema) });

const ARCHIVE_IGNORES = ['session.lock', '**/session.lock', '*.lck', '**/*.lck', 'logs/**', '*.zip', '**/*.zip'];

const byNewest = (a: BackupEntry, b: BackupEntry) => Date.parse(b.createdAt) - Date.parse(a.createdAt);

const slug = (name: string) => name.trim().replace(/[^A-Za-z0-9_-]+/g, '-').replace(/^-+|-+$/g, '');

export class BackupService implements BackupHook {
    private readonly serverDir: string;
    private readonly backupsDir: string;

    constructor(private readonly ctx: SupervisorContext) {
        this.serverDir = ctx.config.paths.serverDir;
        this.backupsDir = ctx.config.paths.backupDir;
    }

    async createSnapshot(reason: string, timeoutMs: number, name?: string): Promise<Result<BackupEntry>> {
        if (!(await fs.pathExists(this.serverDir))) {
            return fail('E_BACKUP_FAILED', `Server directory ${this.serverDir} does not exist`);
        }

        const timestamp = this.ctx.clock.now();
        const suffix = name ? slug(name) : '';
        const id = suffix ? `backup-${timestamp}-${suffix}` : `backup-${timestamp}`;
        const filename = `${id}.zip`;
        const outputPath = path.join(this.backupsDir, filename);

        this.ctx.logger.info(`[BackupService] Creating backup archive (${reason})...`);

        try {
            await fs.ensureDir(this.backupsDir);
            await this.writeArchive(outputPath, timeoutMs);
        } catch (e) {
            await fs.remove(outputPath).catch((err: unknown) => {
                this.ctx.logger.warn(`[BackupService] Could not remove partial archive: ${describeError(err)}`);
            });
            if (e instanceof TimeoutError) {
                this.ctx.logger.error(`[BackupService] Backup aborted after ${Math.round(timeoutMs / 1000)}s.`);
                return fail('E_BACKUP_FAILED', e.message, { timedOut: true });
            }
            this.ctx.logger.error(`[BackupService] Archive Error: ${describeError(e)}`);
            return fail('E_BACKUP_FAILED', `Backup failed: ${describeError(e)}`);
        }

        try {
            const stats = await fs.stat(outputPath);
            const entry: BackupEntry = {
                id,
                filename,
                size: stats.size,
                createdAt: new Date(timestamp).toISOString(),
                reason,
                ...(name ? { name } : {})
            };

            const backups = await this.list();
            const rest = backups.filter(b => b.id !== id);
            await this.saveManifest([entry, ...rest]);

            this.ctx.logger.success(`[BackupService] Backup created: ${filename}`);
            return ok(entry);
        } catch (e) {
            return fail('E_BACKUP_FAILED', `Backup metadata could not be saved: ${describeError(e)}`);
        }
    }

    async pruneOld(retentionCount: number, timeoutMs: number): Promise<Result<number>> {
        try {
            const removed = await withTimeout(this.cleanupOldBackups(retentionCount), timeoutMs, 'Backup pruning');
            return ok(removed);
        } catch (e) {
            return fail('E_BACKUP_FAILED', `Pruning failed: ${describeError(e)}`, { timedOut: e instanceof TimeoutError });
        }
    }

    /**
     * Manifest entries newest first. The manifest is reconciled with the archives
     * actually on disk: missing files are dropped and orphaned zips are recovered.
     */
    async list(): Promise<BackupEntry[]> {
        if (!(await fs.pathExists(this.backupsDir))) return [];

        let backups = await this.readManifest();
        const files = await fs.readdir(this.backupsDir);
        const zipFiles = files.filter(f => f.endsWith('.zip'));

        const before = backups.length;
        backups = backups.filter(b => zipFiles.includes(b.filename));
        let changed = backups.length !== before;

        for (const filename of zipFiles) {
            if (backups.some(b => b.filename === filename)) continue;
            try {
                const stats = await fs.stat(path.join(this.backupsDir, filename));
                const idMatch = filename.match(/^backup-(\d+)/);
                const timestamp = idMatch ? parseInt(idMatch[1], 10) : stats.mtimeMs;
                backups.push({
                    id: filename.replace(/\.zip$/, ''),
                    filename,
                    size: stats.size,
                    createdAt: new Date(timestamp).toISOString(),
                    reason: 'recovered'
                });
                changed = true;
            } catch (e) {
                this.ctx.logger.error(`[BackupService] Failed to recover backup metadata for ${filename}: ${describeError(e)}`);
            }
        }

        backups.sort(byNewest);
        if (changed) {
            this.ctx.logger.info(`[BackupService] Manifest synced. ${backups.length} snapshot(s) on disk.`);
            await this.saveManifest(backups);
        }
        return backups;
    }

    async stats(): Promise<BackupStats> {
        const backups = await this.list();
        return {
            count: backups.length,
            totalBytes: backups.reduce((sum, b) => sum + b.size, 0),
            locked: backups.filter(b => b.locked).length,
            newest: backups.length > 0 ? backups[0].createdAt : null,
            oldest: backups.length > 0 ? backups[backups.length - 1].createdAt : null
        };
    }

    async setLocked(backupId: string, locked: boolean): Promise<Result<BackupEntry>> {
        const backups = await this.list();
        const backup = backups.find(b => b.id === backupId);
        if (!backup) return fail('E_BACKUP_FAILED', `Backup ${backupId} not found`);

        backup.locked = locked;
        await this.saveManifest(backups);
        return ok(backup);
    }

    private writeArchive(outputPath: string, timeoutMs: number): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const output = fs.createWriteStream(outputPath);
            const archive = archiver('zip', { zlib: { level: 9 } });
            let settled = false;

            const settle = (err?: Error) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                if (err) reject(err);
                else resolve();
            };

            const timer = setTimeout(() => {
                archive.abort();
                output.destroy();
                settle(new TimeoutError('Backup archive', timeoutMs));
            }, timeoutMs);

            output.on('close', () => settle());
            output.on('error', (err) => settle(err));
            archive.on('warning', (err) => {
                this.ctx.logger.warn(`[BackupService] Archive warning: ${err.message}`);
            });
            archive.on('error', (err) => settle(err));

            archive.pipe(output);
            archive.glob('**/*', {
                cwd: this.serverDir,
                dot: true,
                ignore: [...ARCHIVE_IGNORES, ...this.nestedBackupIgnore()]
            });
            archive.finalize().catch((err: unknown) => settle(err instanceof Error ? err : new Error(String(err))));
        });
    }

    /** Keeps the archive from swallowing itself when backups live under the server directory. */
    private nestedBackupIgnore(): string[] {
        const relative = path.relative(this.serverDir, this.backupsDir);
        if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) return [];
        return [`${relative.split(path.sep).join('/')}/**`];
    }

    private async cleanupOldBackups(keepCount: number): Promise<number> {
        const backups = await this.list();

        // Locked backups are immune to auto-cleanup
        const candidates = backups.filter(b => !b.locked);
        if (candidates.length <= keepCount) return 0;

        const toDelete = candidates.slice(keepCount);
        for (const backup of toDelete) {
            this.ctx.logger.info(`[BackupService] Auto-cleaning old backup: ${backup.id}`);
            await fs.remove(path.join(this.backupsDir, backup.filename));
        }

        const deleted = new Set(toDelete.map(b => b.id));
        await this.saveManifest(backups.filter(b => !deleted.has(b.id)));
        return toDelete.length;
    }

    private async readManifest(): Promise<BackupEntry[]> {
        const manifestPath = path.join(this.backupsDir, MANIFEST_FILE);
        if (!(await fs.pathExists(manifestPath))) return [];
        try {
            const raw: unknown = await fs.readJSON(manifestPath);
            const parsed = ManifestSchema.safeParse(raw);
            if (parsed.success) return parsed.data.backups;
            this.ctx.logger.error('[BackupService] Manifest has an unexpected shape. Rebuilding from disk.');
        } catch (e) {
            this.ctx.logger.error(`[BackupService] Corrupt manifest: ${describeError(e)}`);
        }
        return [];
    }

    private async saveManifest(backups: BackupEntry[]): Promise<void> {
        await fs.writeJSON(path.join(this.backupsDir, MANIFEST_FILE), { backups }, { spaces: 2 });
    }
}
