import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { parseMemorySetting } from '../utils/format';
import { Result, ok, fail } from '../utils/Result';
import { describeError } from '../utils/AppError';

export const DEFAULT_CONFIG_FILE = 'craftwatch.json';

export const DEFAULT_JAVA_ARGS =
    '-XX:+UseG1GC -XX:+UnlockExperimentalVMOptions -XX:MaxGCPauseMillis=100 ' +
    '-XX:G1NewSizePercent=20 -XX:G1ReservePercent=20 -XX:G1HeapRegionSize=32M';

const MIN_MEMORY_BYTES = 512 * 1024 ** 2;
const MAX_MEMORY_BYTES = 64 * 1024 ** 3;

const memorySetting = z.string().refine(value => {
    const bytes = parseMemorySetting(value);
    return bytes !== null && bytes >= MIN_MEMORY_BYTES && bytes <= MAX_MEMORY_BYTES;
}, { message: 'Expected a JVM memory size between 512M and 64G (e.g. "4G")' });

const seconds = (min: number, max: number, fallback: number) => z.number().int().min(min).max(max).default(fallback);

export const RawConfigSchema = z.object({
    server_dir: z.string().min(1).default('server'),
    jar_name: z.string().min(1).default('server.jar'),
    java_path: z.string().min(1).default('java'),
    memory_min: memorySetting.default('2G'),
    memory_max: memorySetting.default('4G'),
    java_args: z.string().default(DEFAULT_JAVA_ARGS),
    server_host: z.string().min(1).default('127.0.0.1'),
    server_port: z.number().int().min(1).max(65535).default(25565),

    backup_dir: z.string().min(1).default('backups'),
    max_backups: z.number().int().min(1).max(100).default(10),
    auto_backup: z.boolean().default(true),
    backup_interval: seconds(300, 86400, 3600),
    backup_on_stop: z.boolean().default(true),
    backup_timeout: seconds(5, 3600, 120),

    watchdog_enabled: z.boolean().default(true),
    watchdog_interval: seconds(5, 300, 30),
    restart_on_crash: z.boolean().default(true),
    max_restarts: z.number().int().min(1).max(20).default(5),
    restart_window: seconds(60, 86400, 3600),
    restart_cooldown: seconds(0, 3600, 300),
    stop_timeout: seconds(5, 120, 10),
    probe_timeout: seconds(1, 30, 2),

    cpu_high_water: z.number().min(1).max(100).default(85),
    memory_warn_ratio: z.number().min(0.1).max(0.99).default(0.8),

    state_dir: z.string().min(1).default('.craftwatch'),
    log_dir: z.string().min(1).default('logs')
}).superRefine((raw, ctx) => {
    const min = parseMemorySetting(raw.memory_min);
    const max = parseMemorySetting(raw.memory_max);
    if (min !== null && max !== null && min > max) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['memory_min'],
            message: `memory_min (${raw.memory_min}) exceeds memory_max (${raw.memory_max})`
        });
    }
});

export type RawConfig = z.output<typeof RawConfigSchema>;

export interface LaunchSpec {
    command: string;
    args: string[];
    cwd: string;
    env?: NodeJS.ProcessEnv;
}

export interface SupervisorPaths {
    configFile: string;
    serverDir: string;
    backupDir: string;
    stateDir: string;
    logDir: string;
    lockFile: string;
    historyFile: string;
    statusFile: string;
    inboxDir: string;
}

export interface HealthThresholds {
    cpuHighWater: number;
    memoryWarnRatio: number;
    memoryMaxBytes: number;
}

export interface SupervisorConfig {
    launch: LaunchSpec;
    serverHost: string;
    serverPort: number;
    memoryMaxBytes: number;

    watchdog: {
        enabled: boolean;
        intervalSeconds: number;
        restartOnCrash: boolean;
        maxRestarts: number;
        windowSeconds: number;
        cooldownSeconds: number;
        stopTimeoutSeconds: number;
        probeTimeoutSeconds: number;
    };

    backups: {
        autoBackup: boolean;
        intervalSeconds: number;
        onStop: boolean;
        maxBackups: number;
        timeoutSeconds: number;
    };

    health: HealthThresholds;
    paths: SupervisorPaths;
}

export function buildLaunchSpec(raw: RawConfig, serverDir: string): LaunchSpec {
    const extra = raw.java_args.split(/\s+/).filter(Boolean);
    return {
        command: raw.java_path,
        args: [`-Xms${raw.memory_min}`, `-Xmx${raw.memory_max}`, ...extra, '-jar', raw.jar_name, 'nogui'],
        cwd: serverDir
    };
}

/**
 * Maps the validated snake_case file onto the typed snapshot. Relative paths resolve
 * against the directory holding the config file.
 */
export function toSupervisorConfig(raw: RawConfig, configFile: string): SupervisorConfig {
    const base = path.dirname(path.resolve(configFile));
    const resolve = (p: string) => path.resolve(base, p);
    const stateDir = resolve(raw.state_dir);
    const serverDir = resolve(raw.server_dir);
    // Validated by the schema above
    const memoryMaxBytes = parseMemorySetting(raw.memory_max) ?? MAX_MEMORY_BYTES;

    return {
        launch: buildLaunchSpec(raw, serverDir),
        serverHost: raw.server_host,
        serverPort: raw.server_port,
        memoryMaxBytes,
        watchdog: {
            enabled: raw.watchdog_enabled,
            intervalSeconds: raw.watchdog_interval,
            restartOnCrash: raw.restart_on_crash,
            maxRestarts: raw.max_restarts,
            windowSeconds: raw.restart_window,
            cooldownSeconds: raw.restart_cooldown,
            stopTimeoutSeconds: raw.stop_timeout,
            probeTimeoutSeconds: raw.probe_timeout
        },
        backups: {
            autoBackup: raw.auto_backup,
            intervalSeconds: raw.backup_interval,
            onStop: raw.backup_on_stop,
            maxBackups: raw.max_backups,
            timeoutSeconds: raw.backup_timeout
        },
        health: {
            cpuHighWater: raw.cpu_high_water,
            memoryWarnRatio: raw.memory_warn_ratio,
            memoryMaxBytes
        },
        paths: {
            configFile: path.resolve(configFile),
            serverDir,
            backupDir: resolve(raw.backup_dir),
            stateDir,
            logDir: resolve(raw.log_dir),
            lockFile: path.join(stateDir, 'server.lock'),
            historyFile: path.join(stateDir, 'restarts.jsonl'),
            statusFile: path.join(stateDir, 'status.json'),
            inboxDir: path.join(stateDir, 'inbox')
        }
    };
}

export function parseConfig(input: unknown, configFile: string): Result<SupervisorConfig> {
    const parsed = RawConfigSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        return fail('E_CONFIG_INVALID', `Invalid ${path.basename(configFile)}: ${issues.join('; ')}`, { issues });
    }
    return ok(toSupervisorConfig(parsed.data, configFile));
}

/**
 * Loads the config file once at startup. A missing file is created with defaults.
 */
export function loadConfig(configFile: string = DEFAULT_CONFIG_FILE): Result<SupervisorConfig> {
    try {
        if (!fs.existsSync(configFile)) {
            const defaults = RawConfigSchema.parse({});
            fs.ensureDirSync(path.dirname(path.resolve(configFile)));
            fs.writeJSONSync(configFile, defaults, { spaces: 4 });
            return ok(toSupervisorConfig(defaults, configFile));
        }
        const loaded: unknown = fs.readJSONSync(configFile);
        return parseConfig(loaded, configFile);
    } catch (e) {
        return fail('E_CONFIG_INVALID', `Failed to read ${configFile}: ${describeError(e)}`);
    }
}
