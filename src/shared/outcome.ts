import { Result } from './result.js';

export type OutcomeTuple<T, E> = readonly [value: T, error: E | null | undefined];

/**
 * Absorbs a `(value, error)` pair into a Result: any error other than
 * `null` or `undefined` wins over the value.
 *
 * ```typescript
 * const { parsed, error } = dotenv.config();
 * const env = fromOutcome(parsed ?? {}, error);
 * ```
 */
export function fromOutcome<T, E>(value: T, error: E | null | undefined): Result<T, E> {
    if (error !== null && error !== undefined) {
        return Result.failure<T, E>(error);
    }
    return Result.success<T, E>(value);
}

export function fromOutcomeTuple<T, E>([value, error]: OutcomeTuple<T, E>): Result<T, E> {
    return fromOutcome(value, error);
}
