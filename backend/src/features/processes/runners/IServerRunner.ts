import { LaunchSpec } from '../../../config/SupervisorConfig';

export interface RunnerLogEvent {
    line: string;
    type: 'stdout' | 'stderr';
}

export interface RunnerCloseEvent {
    pid: number;
    code: number | null;
    signal: NodeJS.Signals | null;
}

/**
 * Owns at most one child at a time. `start` resolves with the PID once the OS
 * reports the process as spawned.
 */
export interface IServerRunner {
    start(spec: LaunchSpec): Promise<number>;
    /** Writes one line to the child's stdin. False when the channel is closed. */
    write(line: string): boolean;

    on(event: 'log', listener: (data: RunnerLogEvent) => void): this;
    on(event: 'close', listener: (data: RunnerCloseEvent) => void): this;
}
