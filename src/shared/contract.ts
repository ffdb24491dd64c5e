import { AppError } from './errors.js';

export interface ContractViolation {
    readonly operation: string;
    readonly message: string;
}

export type ContractViolationListener = (violation: ContractViolation) => void;

const listeners = new Set<ContractViolationListener>();

/**
 * Registers a listener notified synchronously, before the throw, whenever
 * an `expect`/`unwrap` call hits a container in the wrong state.
 * Returns a function that removes the listener.
 */
export function onContractViolation(listener: ContractViolationListener): () => void {
    listeners.add(listener);
    return () => {
        listeners.delete(listener);
    };
}

export function violateContract(operation: string, message: string, payload?: unknown): never {
    const error = AppError.contractViolation(operation, message, payload);

    for (const listener of [...listeners]) {
        try {
            listener({ operation, message });
        } catch (listenerError) {
            error.listenerFailures.push(listenerError);
        }
    }

    throw error;
}
