import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Logger } from './logger';
import { makeTempDir } from '../test/fakes';

describe('Logger', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await fs.remove(dir);
    });

    const readLines = async () =>
        (await fs.readFile(path.join(dir, 'supervisor.log'), 'utf-8')).trim().split('\n');

    it('should write prefixed lines to supervisor.log', async () => {
        const logger = new Logger({ logDir: dir, console: false, name: 'Test' });
        logger.info('[Watchdog] Monitoring every 30s.');
        logger.error('[Watchdog] Server is DEAD (process-gone).');
        logger.close();

        const lines = await readLines();
        expect(lines).toHaveLength(2);
        expect(lines[0]).toMatch(/^\[\+\] Test: \d{2}\/\d{2}\/\d{4} \d{2}:\d{2}:\d{2} - INFO: \[Watchdog\] Monitoring every 30s\.$/);
        expect(lines[1]).toMatch(/ - ERROR: \[Watchdog\] Server is DEAD \(process-gone\)\.$/);
    });

    it('should collapse repeated messages into one summary line', async () => {
        const logger = new Logger({ logDir: dir, console: false });
        logger.warn('Server degraded');
        logger.warn('Server degraded');
        logger.warn('Server degraded');
        logger.close();

        const lines = await readLines();
        expect(lines).toHaveLength(2);
        expect(lines[0]).toMatch(/ - WARNING: Server degraded$/);
        expect(lines[1]).toMatch(/ - STABILITY: \(Previous message repeated 2 times\)$/);
    });

    it('should drop debug output unless verbose', async () => {
        const logger = new Logger({ logDir: dir, console: false, verbose: false });
        logger.debug('hidden');
        logger.info('shown');
        logger.close();

        const lines = await readLines();
        expect(lines).toHaveLength(1);
        expect(lines[0]).toMatch(/ - INFO: shown$/);
    });

    it('should rotate an oversized log and keep only the newest rotations', async () => {
        await fs.writeFile(path.join(dir, 'supervisor.log'), Buffer.alloc(10 * 1024 * 1024 + 1));
        for (const stamp of ['0101', '0102', '0103', '0104', '0105']) {
            await fs.writeFile(path.join(dir, `supervisor-${stamp}.log`), 'old\n');
        }

        const logger = new Logger({ logDir: dir, console: false, now: () => 1000 });
        logger.info('after rotation');
        logger.close();

        expect(await readLines()).toHaveLength(1);
        expect((await fs.readdir(dir)).sort()).toEqual([
            'supervisor-0102.log',
            'supervisor-0103.log',
            'supervisor-0104.log',
            'supervisor-0105.log',
            'supervisor-1000.log',
            'supervisor.log'
        ]);
    });
});
