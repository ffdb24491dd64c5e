export type AppErrorType = 'contractViolation' | 'configuration';

export class AppError extends Error {
    constructor(
        message: string,
        public readonly type: AppErrorType,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'AppError';
    }

    static contractViolation(operation: string, message: string, payload?: unknown): UnwrapError {
        return new UnwrapError(operation, message, payload);
    }

    static configuration(issues: readonly string[]): ConfigurationError {
        return new ConfigurationError(issues);
    }
}

/**
 * Thrown when a value is extracted from a container in the wrong state.
 * This is a programmer error: correct code never catches it to recover.
 */
export class UnwrapError extends AppError {
    readonly listenerFailures: unknown[] = [];

    constructor(
        public readonly operation: string,
        message: string,
        payload?: unknown
    ) {
        super(message, 'contractViolation', payload === undefined ? undefined : { cause: payload });
        this.name = 'UnwrapError';
    }
}

export class ConfigurationError extends AppError {
    constructor(public readonly issues: readonly string[]) {
        super(`Configuration validation failed:\n${issues.join('\n')}`, 'configuration');
        this.name = 'ConfigurationError';
    }
}
