import si from 'systeminformation';
import { NetUtils } from '../../utils/NetUtils';

export interface ProcessUsage {
    cpuPercent: number;
    memoryBytes: number;
}

/** OS-facing reads behind the sampler. */
export interface IMetricsSource {
    /** Null when the PID is not in the process table. */
    readProcess(pid: number): Promise<ProcessUsage | null>;
    countConnections(pid: number, port: number): Promise<number>;
    probePort(host: string, port: number, timeoutMs: number): Promise<boolean>;
}

export class SystemMetricsSource implements IMetricsSource {
    async readProcess(pid: number): Promise<ProcessUsage | null> {
        const procs = await si.processes();
        const target = procs.list.find(p => p.pid === pid);
        if (!target) return null;
        return {
            cpuPercent: target.cpu,
            memoryBytes: target.memRss * 1024 // memRss is KB
        };
    }

    countConnections(pid: number, port: number): Promise<number> {
        return NetUtils.countConnections(pid, port);
    }

    probePort(host: string, port: number, timeoutMs: number): Promise<boolean> {
        return NetUtils.probePort(host, port, timeoutMs);
    }
}
