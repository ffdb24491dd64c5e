import { z } from 'zod';
import { config as loadEnv, type DotenvParseOutput } from 'dotenv';
import { ConfigurationError } from '../shared/errors.js';
import { fromOutcome } from '../shared/outcome.js';
import { Result } from '../shared/result.js';
import { andThenResult, mapResultErr } from '../shared/transform.js';

// Environment validation schema
const environmentSchema = z.enum(['development', 'test', 'production']).default('development');

const booleanFlag = (defaultValue: boolean) =>
    z.preprocess((val) => val === 'true' || val === true, z.boolean()).default(defaultValue);

// Logging configuration schema
const loggingSchema = z.object({
    name: z.string().min(1, 'Logger name cannot be empty').default('outcome-kit'),
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    prettyLogs: booleanFlag(false),
});

// Complete configuration schema
const configSchema = z.object({
    environment: environmentSchema,
    logging: loggingSchema,
    reportContractViolations: booleanFlag(true),
});

// Type inference from schema
export type Config = z.infer<typeof configSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;
export type Environment = z.infer<typeof environmentSchema>;

export interface LoadConfigOptions {
    /** Path of the `.env` file; dotenv's default when omitted. */
    path?: string;
    /**
     * Variables to read. The file fills in keys not already set here, as dotenv
     * does for `process.env`, which is the default.
     */
    env?: Record<string, string | undefined>;
}

/**
 * Validates environment variables into a typed configuration object.
 */
export function parseConfig(env: Record<string, string | undefined>): Result<Config, ConfigurationError> {
    const parsed = configSchema.safeParse({
        environment: env.NODE_ENV,
        logging: {
            name: env.LOGGER_NAME,
            level: env.LOG_LEVEL,
            prettyLogs: env.PRETTY_LOGS,
        },
        reportContractViolations: env.REPORT_CONTRACT_VIOLATIONS,
    });

    if (parsed.success) {
        return Result.success(parsed.data);
    }

    const issues = parsed.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    return Result.failure(new ConfigurationError(issues));
}

/**
 * Loads a `.env` file with dotenv into `env` and parses the result.
 * A missing file is not an error; an unreadable or invalid one is.
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<Config, Error> {
    const env = options.env ?? process.env;
    // dotenv populates a scratch object; env is filled below without overriding
    const output = loadEnv({ path: options.path, processEnv: {} });

    const loaded = fromOutcome<DotenvParseOutput, Error>(output.parsed ?? {}, output.error)
        .orElse(error => isMissingFile(error)
            ? Result.success<DotenvParseOutput, Error>({})
            : Result.failure<DotenvParseOutput, Error>(error));

    return andThenResult(loaded, fileEnv => {
        fillMissing(env, fileEnv);
        return mapResultErr(parseConfig(env), (error): Error => error);
    });
}

function fillMissing(env: Record<string, string | undefined>, fileEnv: DotenvParseOutput): void {
    for (const [key, value] of Object.entries(fileEnv)) {
        if (env[key] === undefined) {
            env[key] = value;
        }
    }
}

function isMissingFile(error: Error): boolean {
    return 'code' in error && error.code === 'ENOENT';
}

/**
 * Checks if the application is running in production environment
 */
export function isProduction(config: Config): boolean {
    return config.environment === 'production';
}

/**
 * Checks if the application is running in development environment
 */
export function isDevelopment(config: Config): boolean {
    return config.environment === 'development';
}

/**
 * Checks if the application is running in test environment
 */
export function isTest(config: Config): boolean {
    return config.environment === 'test';
}
