import net from 'net';
import { afterEach, describe, expect, it } from 'vitest';
import { NetUtils } from './NetUtils';

describe('NetUtils', () => {
    let server: net.Server | null = null;

    afterEach(async () => {
        if (server) await new Promise<void>(resolve => server?.close(() => resolve()));
        server = null;
    });

    async function listen(): Promise<number> {
        const s = net.createServer(socket => socket.destroy());
        server = s;
        await new Promise<void>(resolve => s.listen(0, '127.0.0.1', () => resolve()));
        const address = s.address();
        if (address === null || typeof address === 'string') throw new Error('unexpected server address');
        return address.port;
    }

    it('should report an accepting port as open', async () => {
        const port = await listen();
        expect(await NetUtils.probePort('127.0.0.1', port, 1000)).toBe(true);
    });

    it('should report a closed port as not open', async () => {
        const port = await listen();
        await new Promise<void>(resolve => server?.close(() => resolve()));
        server = null;

        expect(await NetUtils.probePort('127.0.0.1', port, 1000)).toBe(false);
    });

    it('should count only established connections of the server process on its port', () => {
        const connections = [
            { pid: 4000, localPort: '25565', state: 'ESTABLISHED' },
            { pid: 4000, localPort: '25565', state: 'ESTABLISHED' },
            { pid: 4000, localPort: '25565', state: 'LISTEN' },
            { pid: 4000, localPort: '25575', state: 'ESTABLISHED' },
            { pid: 5000, localPort: '25565', state: 'ESTABLISHED' }
        ];

        expect(NetUtils.countEstablished(connections, 4000, 25565)).toBe(2);
    });
});
