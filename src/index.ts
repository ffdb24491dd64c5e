export { Optional, present, absent } from './shared/optional.js';
export type { OptionalState, Present, Absent } from './shared/optional.js';
export { Result, success, failure } from './shared/result.js';
export type { ResultState, Success, Failure } from './shared/result.js';
export { fromOutcome, fromOutcomeTuple } from './shared/outcome.js';
export type { OutcomeTuple } from './shared/outcome.js';
export { mapResult, mapResultErr, andThenResult, mapOptional, andThenOptional } from './shared/transform.js';
export { isDeepEqual, isEquatable } from './shared/equality.js';
export type { Equatable } from './shared/equality.js';
export { AppError, UnwrapError, ConfigurationError } from './shared/errors.js';
export type { AppErrorType } from './shared/errors.js';
export { onContractViolation } from './shared/contract.js';
export type { ContractViolation, ContractViolationListener } from './shared/contract.js';

export type { Logger, LoggerContext } from './application/ports/logger.js';
export { logContractViolations } from './application/log-contract-violations.js';
export { PinoLogger } from './infrastructure/observability/pino-logger.js';
export type { PinoLoggerOptions } from './infrastructure/observability/pino-logger.js';

export { parseConfig, loadConfig, isProduction, isDevelopment, isTest } from './composition/config.js';
export type { Config, LoggingConfig, Environment, LoadConfigOptions } from './composition/config.js';
export { buildContainer } from './composition/container.js';
export type { Container } from './composition/container.js';
