export const ERROR_CODES = {
    // System / Generic
    E_UNKNOWN: { code: 'E_UNKNOWN', message: 'An unknown error occurred.' },
    E_CONFIG_INVALID: { code: 'E_CONFIG_INVALID', message: 'Configuration file is invalid.' },

    // Process lifecycle
    E_ALREADY_RUNNING: { code: 'E_ALREADY_RUNNING', message: 'A supervised server process is already running.' },
    E_LOCK_UNAVAILABLE: { code: 'E_LOCK_UNAVAILABLE', message: 'The process lock could not be acquired.' },
    E_LAUNCH_FAILED: { code: 'E_LAUNCH_FAILED', message: 'The server process failed to launch.' },
    E_NOT_RUNNING: { code: 'E_NOT_RUNNING', message: 'Server is not running.' },
    E_STOP_TIMED_OUT: { code: 'E_STOP_TIMED_OUT', message: 'Graceful stop timed out; the process was force-terminated.' },
    E_PROCESS_GONE: { code: 'E_PROCESS_GONE', message: 'The server process disappeared while sampling.' },
    E_WRITE_FAILED: { code: 'E_WRITE_FAILED', message: 'Could not write to the server control channel.' },

    // Watchdog
    E_BACKUP_FAILED: { code: 'E_BACKUP_FAILED', message: 'Backup snapshot failed.' },
    E_RESTART_LIMIT: { code: 'E_RESTART_LIMIT', message: 'Restart limit reached. Manual intervention required.' },
    E_EXPORT_FAILED: { code: 'E_EXPORT_FAILED', message: 'Monitoring data could not be exported.' },
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;
