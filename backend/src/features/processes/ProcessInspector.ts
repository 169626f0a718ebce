import path from 'path';
import si from 'systeminformation';
import treeKill from 'tree-kill';
import { errnoCode } from '../../utils/AppError';

export interface ProcessIdentity {
    pid: number;
    command: string;
    startedAt: number | null;
}

export interface IProcessInspector {
    exists(pid: number): boolean;
    describe(pid: number): Promise<ProcessIdentity | null>;
    kill(pid: number, signal: NodeJS.Signals): boolean;
    killTree(pid: number, signal: NodeJS.Signals): Promise<void>;
}

// systeminformation reports start times with one-second resolution in local time
const START_TIME_TOLERANCE_MS = 30_000;

export class SystemProcessInspector implements IProcessInspector {
    exists(pid: number): boolean {
        try {
            process.kill(pid, 0);
            return true;
        } catch (e) {
            // EPERM: the process exists but belongs to another user
            return errnoCode(e) === 'EPERM';
        }
    }

    async describe(pid: number): Promise<ProcessIdentity | null> {
        const procs = await si.processes();
        const proc = procs.list.find(p => p.pid === pid);
        if (!proc) return null;

        const started = Date.parse(proc.started);
        return {
            pid,
            command: `${proc.command} ${proc.params}`.trim(),
            startedAt: Number.isNaN(started) ? null : started
        };
    }

    kill(pid: number, signal: NodeJS.Signals): boolean {
        try {
            process.kill(pid, signal);
            return true;
        } catch {
            return false;
        }
    }

    killTree(pid: number, signal: NodeJS.Signals): Promise<void> {
        return new Promise((resolve, reject) => {
            treeKill(pid, signal, (err) => (err ? reject(err) : resolve()));
        });
    }
}

/**
 * True when `pid` is alive AND still the process we launched. Guards against PID reuse
 * after a crash: the command line must mention the launched executable, and a known
 * start time must agree with the recorded one.
 */
export async function matchesIdentity(
    inspector: IProcessInspector,
    pid: number,
    startedAt: number | null,
    command: string | null
): Promise<boolean> {
    if (!inspector.exists(pid)) return false;

    let identity: ProcessIdentity | null;
    try {
        identity = await inspector.describe(pid);
    } catch {
        // Process table unavailable; existence is the best signal left
        return true;
    }
    if (!identity) return false;

    if (command) {
        const executable = path.basename(command).toLowerCase();
        if (!identity.command.toLowerCase().includes(executable)) return false;
    }

    if (startedAt !== null && identity.startedAt !== null) {
        return Math.abs(identity.startedAt - startedAt) <= START_TIME_TOLERANCE_MS;
    }
    return true;
}
