import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ControlInbox } from './ControlInbox';
import { createSilentLogger } from '../../utils/logger';
import { T0, makeTempDir } from '../../test/fakes';

describe('ControlInbox', () => {
    let dir: string;
    let inbox: ControlInbox;

    beforeEach(async () => {
        dir = await makeTempDir();
        inbox = new ControlInbox(path.join(dir, 'inbox'), createSilentLogger());
    });

    afterEach(async () => {
        await fs.remove(dir);
    });

    it('should return requests in arrival order and empty the inbox', async () => {
        await inbox.submit({ type: 'command', text: 'say restarting soon' }, T0);
        await inbox.submit({ type: 'backup', name: 'before-update' }, T0 + 1);
        await inbox.submit({ type: 'stop', graceful: true, timeoutSeconds: 20 }, T0 + 1);

        expect(await inbox.drain()).toEqual([
            { type: 'command', text: 'say restarting soon' },
            { type: 'backup', name: 'before-update' },
            { type: 'stop', graceful: true, timeoutSeconds: 20 }
        ]);
        expect(await inbox.drain()).toEqual([]);
    });

    it('should discard malformed requests', async () => {
        await fs.ensureDir(path.join(dir, 'inbox'));
        await fs.writeFile(path.join(dir, 'inbox', '000000000000001-1-0000.json'), '{ broken');
        await fs.writeJSON(path.join(dir, 'inbox', '000000000000002-1-0000.json'), { type: 'launch-missiles' });
        await inbox.submit({ type: 'reset' }, T0);

        expect(await inbox.drain()).toEqual([{ type: 'reset' }]);
        expect(await fs.readdir(path.join(dir, 'inbox'))).toEqual([]);
    });

    it('should ignore files still being written', async () => {
        await fs.ensureDir(path.join(dir, 'inbox'));
        await fs.writeFile(path.join(dir, 'inbox', '000000000000001-1-0000.tmp'), '{"type":');

        expect(await inbox.drain()).toEqual([]);
    });

    it('should drain nothing before the directory exists', async () => {
        expect(await inbox.drain()).toEqual([]);
    });
});
