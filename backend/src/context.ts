import { SupervisorConfig } from './config/SupervisorConfig';
import { Logger } from './utils/logger';
import { Clock, systemClock } from './utils/timing';

/**
 * Everything a component needs from its surroundings. Built once by the CLI and
 * handed to each constructor.
 */
export interface SupervisorContext {
    config: SupervisorConfig;
    logger: Logger;
    clock: Clock;
}

export function createContext(config: SupervisorConfig, options: { verbose?: boolean; console?: boolean } = {}): SupervisorContext {
    const clock = systemClock;
    const logger = new Logger({
        logDir: config.paths.logDir,
        console: options.console ?? true,
        verbose: options.verbose,
        now: () => clock.now()
    });
    return { config, logger, clock };
}
