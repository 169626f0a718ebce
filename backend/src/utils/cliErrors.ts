import chalk from 'chalk';
import { describeError } from './AppError';

/** Logs a stray rejection and sets a failing exit code. The process keeps running. */
export function handleUnhandledRejection(reason: unknown) {
    console.error(chalk.red(`[CLI] Unhandled rejection: ${describeError(reason)}`));
    process.exitCode = 1;
}
