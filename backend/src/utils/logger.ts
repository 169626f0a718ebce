import chalk from 'chalk';
import fs from 'fs-extra';
import path from 'path';

const MAX_LOG_SIZE = 10 * 1024 * 1024; // 10MB
const MAX_ROTATED_FILES = 5;
const REPEAT_FLUSH_MS = 2000;
const LOG_FILE_NAME = 'supervisor.log';

export type LogLevel = 'INFO' | 'SUCCESS' | 'WARNING' | 'ERROR' | 'DEBUG' | 'STABILITY';

const LEVEL_COLORS: Record<LogLevel, (s: string) => string> = {
    INFO: chalk.white,
    SUCCESS: chalk.green,
    WARNING: chalk.yellow,
    ERROR: chalk.red,
    DEBUG: chalk.gray,
    STABILITY: chalk.gray
};

export interface LoggerOptions {
    /** Directory for supervisor.log; null disables file output. */
    logDir: string | null;
    /** Echo to the terminal. */
    console?: boolean;
    verbose?: boolean;
    name?: string;
    /** Source of the timestamps printed on each line. */
    now?: () => number;
}

/**
 * Line logger for the supervisor. Identical consecutive lines are collapsed into a
 * single "repeated N times" entry so a flapping check cannot flood the file.
 */
export class Logger {
    private lastLine = '';
    private repeats = 0;
    private repeatTimer: NodeJS.Timeout | null = null;
    private readonly file: string | null;
    private readonly echo: boolean;
    private readonly verbose: boolean;
    private readonly name: string;
    private readonly now: () => number;

    constructor(options: LoggerOptions) {
        this.echo = options.console ?? true;
        this.verbose = options.verbose ?? process.env.VERBOSE === 'true';
        this.name = options.name ?? 'craftwatch';
        this.now = options.now ?? Date.now;
        this.file = options.logDir ? path.join(options.logDir, LOG_FILE_NAME) : null;
        if (options.logDir) fs.ensureDirSync(options.logDir);
    }

    info(message: string) {
        this.log('INFO', message);
    }

    success(message: string) {
        this.log('SUCCESS', message);
    }

    warn(message: string) {
        this.log('WARNING', message);
    }

    error(message: string) {
        this.log('ERROR', message);
    }

    debug(message: string) {
        if (this.verbose) this.log('DEBUG', message);
    }

    /** Flushes a pending repeat counter, e.g. before exit. */
    close() {
        if (this.repeatTimer) clearTimeout(this.repeatTimer);
        this.repeatTimer = null;
        this.flushRepeats();
        this.lastLine = '';
    }

    private log(level: LogLevel, message: string) {
        const key = `${level}:${message}`;
        if (key === this.lastLine) {
            this.repeats++;
            if (this.repeatTimer) clearTimeout(this.repeatTimer);
            this.repeatTimer = setTimeout(() => {
                this.flushRepeats();
                this.lastLine = '';
            }, REPEAT_FLUSH_MS);
            this.repeatTimer.unref();
            return;
        }

        this.flushRepeats();
        this.lastLine = key;
        this.emit(level, message);
    }

    private flushRepeats() {
        if (this.repeats === 0) return;
        this.emit('STABILITY', `(Previous message repeated ${this.repeats} times)`);
        this.repeats = 0;
    }

    private emit(level: LogLevel, message: string) {
        const stamp = new Date(this.now());
        const line = `[+] ${this.name}: ${stamp.toLocaleDateString('en-GB')} ${stamp.toLocaleTimeString('en-GB', { hour12: false })} - ${level}: ${message}`;
        if (this.echo) console.log(LEVEL_COLORS[level](line));
        this.append(line);
    }

    private append(line: string) {
        if (!this.file) return;
        try {
            if (fs.existsSync(this.file) && fs.statSync(this.file).size > MAX_LOG_SIZE) {
                this.rotate(this.file);
            }
            fs.appendFileSync(this.file, line + '\n');
        } catch (e) {
            console.error(chalk.red(`[Logger] Could not write ${this.file}:`), e);
        }
    }

    private rotate(file: string) {
        const dir = path.dirname(file);
        fs.moveSync(file, path.join(dir, `supervisor-${this.now()}.log`));

        const rotated = fs.readdirSync(dir)
            .filter(f => /^supervisor-\d+\.log$/.test(f))
            .sort()
            .reverse();
        for (const old of rotated.slice(MAX_ROTATED_FILES)) {
            fs.removeSync(path.join(dir, old));
        }
    }
}

export const createSilentLogger = () => new Logger({ logDir: null, console: false, verbose: true });
