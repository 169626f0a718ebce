import { spawn, ChildProcess } from 'child_process';
import { EventEmitter } from 'events';
import { IServerRunner } from './IServerRunner';
import { LaunchSpec } from '../../../config/SupervisorConfig';

export class NativeRunner extends EventEmitter implements IServerRunner {
    private child: ChildProcess | null = null;

    async start(spec: LaunchSpec): Promise<number> {
        // An exited child whose stdio has not closed yet no longer counts
        if (this.child && (this.child.exitCode !== null || this.child.signalCode !== null)) {
            this.child = null;
        }
        if (this.child) {
            throw new Error(`Process ${this.child.pid} is already running.`);
        }

        return new Promise<number>((resolve, reject) => {
            const child = spawn(spec.command, spec.args, {
                cwd: spec.cwd,
                stdio: ['pipe', 'pipe', 'pipe'],
                env: { ...process.env, ...spec.env }
            });

            let spawned = false;

            child.once('spawn', () => {
                if (child.pid === undefined) {
                    reject(new Error('Process spawned without a PID'));
                    return;
                }
                spawned = true;
                this.child = child;
                resolve(child.pid);
            });

            child.on('error', (err) => {
                if (!spawned) {
                    reject(err);
                    return;
                }
                this.emit('log', { line: `[runner] ${err.message}`, type: 'stderr' });
            });

            this.pipeLines(child, 'stdout');
            this.pipeLines(child, 'stderr');

            child.on('close', (code, signal) => {
                if (!spawned || child.pid === undefined) return;
                if (this.child === child) this.child = null;
                this.emit('close', { pid: child.pid, code, signal });
            });
        });
    }

    private pipeLines(child: ChildProcess, type: 'stdout' | 'stderr') {
        const stream = type === 'stdout' ? child.stdout : child.stderr;
        let pending = '';
        stream?.on('data', (data: Buffer) => {
            const lines = (pending + data.toString()).split(/\r?\n/);
            pending = lines.pop() ?? '';
            for (const line of lines) {
                if (line.trim()) this.emit('log', { line, type });
            }
        });
        stream?.on('end', () => {
            if (pending.trim()) this.emit('log', { line: pending, type });
            pending = '';
        });
    }

    write(line: string): boolean {
        const stdin = this.child?.stdin;
        if (!stdin || !stdin.writable) return false;
        try {
            stdin.write(line + '\n');
            return true;
        } catch {
            return false;
        }
    }
}
