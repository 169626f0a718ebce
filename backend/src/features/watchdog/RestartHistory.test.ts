import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { RestartHistory } from './RestartHistory';
import { createSilentLogger } from '../../utils/logger';
import { T0, makeTempDir } from '../../test/fakes';

describe('RestartHistory', () => {
    let dir: string;
    let file: string;

    beforeEach(async () => {
        dir = await makeTempDir();
        file = path.join(dir, 'state', 'restarts.jsonl');
    });

    afterEach(async () => {
        await fs.remove(dir);
    });

    it('should append one JSON line per event', async () => {
        const history = new RestartHistory(file, createSilentLogger());
        await history.appendAttempt(T0, 'process-gone', 0);
        await history.appendOutcome(T0 + 5000, 'SUCCESS');

        const lines = (await fs.readFile(file, 'utf-8')).trim().split('\n');
        expect(lines.map(l => JSON.parse(l))).toEqual([
            { event: 'attempt', timestamp: T0, reason: 'process-gone', cooldownAppliedSeconds: 0 },
            { event: 'outcome', timestamp: T0 + 5000, outcome: 'SUCCESS' }
        ]);
    });

    it('should rebuild records, outcomes and resets on load', async () => {
        const writer = new RestartHistory(file, createSilentLogger());
        await writer.appendAttempt(T0, 'process-gone', 0);
        await writer.appendOutcome(T0 + 1000, 'FAILED');
        await writer.appendAttempt(T0 + 60_000, 'retry after cooldown', 59);
        await writer.appendReset(T0 + 120_000);
        await writer.appendAttempt(T0 + 180_000, 'port-closed-consecutive', 0);

        const reader = new RestartHistory(file, createSilentLogger());
        await reader.load();

        expect(reader.entries).toEqual([
            { timestamp: T0, reason: 'process-gone', outcome: 'FAILED', cooldownAppliedSeconds: 0 },
            { timestamp: T0 + 60_000, reason: 'retry after cooldown', outcome: 'PENDING', cooldownAppliedSeconds: 59 },
            { timestamp: T0 + 180_000, reason: 'port-closed-consecutive', outcome: 'PENDING', cooldownAppliedSeconds: 0 }
        ]);
        expect(reader.sinceReset).toEqual([
            { timestamp: T0 + 180_000, reason: 'port-closed-consecutive', outcome: 'PENDING', cooldownAppliedSeconds: 0 }
        ]);
    });

    it('should skip corrupt lines', async () => {
        await fs.ensureDir(path.dirname(file));
        await fs.writeFile(file, [
            JSON.stringify({ event: 'attempt', timestamp: T0, reason: 'process-gone', cooldownAppliedSeconds: 0 }),
            '{"event":"attempt","timest',
            JSON.stringify({ event: 'explode' }),
            ''
        ].join('\n'));

        const history = new RestartHistory(file, createSilentLogger());
        await history.load();

        expect(history.entries).toHaveLength(1);
    });

    it('should start empty without a file', async () => {
        const history = new RestartHistory(file, createSilentLogger());
        await history.load();

        expect(history.entries).toEqual([]);
        expect(history.sinceReset).toEqual([]);
    });
});
