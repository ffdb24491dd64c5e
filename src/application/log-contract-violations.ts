import { onContractViolation } from '../shared/contract.js';
import { Logger } from './ports/logger.js';

/**
 * Writes one error line per contract violation, before the violation is thrown.
 * Returns the function that stops reporting.
 */
export function logContractViolations(logger: Logger): () => void {
    const violationLogger = logger.child({ component: 'contract' });

    return onContractViolation(({ operation, message }) => {
        violationLogger.child({ operation }).error(message);
    });
}
