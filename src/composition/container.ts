import { logContractViolations } from '../application/log-contract-violations.js';
import { Logger } from '../application/ports/logger.js';
import { PinoLogger } from '../infrastructure/observability/pino-logger.js';
import { Config } from './config.js';

export interface Container {
    config: Config;
    logger: Logger;

    // Detaches everything the container installed
    dispose(): void;
}

/**
 * Wires the logger and, when enabled, contract-violation reporting.
 * A logger passed in replaces the pino one built from `config.logging`.
 */
export function buildContainer(config: Config, logger?: Logger): Container {
    const rootLogger = logger ?? PinoLogger.fromOptions(config.logging);

    const stopReporting = config.reportContractViolations
        ? logContractViolations(rootLogger)
        : undefined;

    rootLogger.debug('Container built', {
        environment: config.environment,
        reportContractViolations: config.reportContractViolations,
    });

    return {
        config,
        logger: rootLogger,
        dispose: () => {
            stopReporting?.();
        },
    };
}
