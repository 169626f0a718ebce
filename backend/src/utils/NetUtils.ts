import net from 'net';
import si from 'systeminformation';
import type { Systeminformation } from 'systeminformation';

type Connection = Pick<Systeminformation.NetworkConnectionsData, 'pid' | 'localPort' | 'state'>;

export class NetUtils {
    /**
     * Resolves true once a TCP connection to host:port is accepted. Refusal, any socket
     * error or silence past `timeoutMs` resolve false.
     */
    static probePort(host: string, port: number, timeoutMs: number): Promise<boolean> {
        return new Promise((resolve) => {
            const socket = net.createConnection({ host, port });
            const finish = (open: boolean) => {
                socket.destroy();
                resolve(open);
            };
            socket.setTimeout(timeoutMs);
            socket.once('connect', () => finish(true));
            socket.once('timeout', () => finish(false));
            socket.once('error', () => finish(false));
        });
    }

    /** Established connections owned by `pid` on local `port`. */
    static countEstablished(connections: readonly Connection[], pid: number, port: number): number {
        const local = String(port);
        return connections.filter(c => c.pid === pid && c.localPort === local && c.state === 'ESTABLISHED').length;
    }

    static async countConnections(pid: number, port: number): Promise<number> {
        return NetUtils.countEstablished(await si.networkConnections(), pid, port);
    }
}
