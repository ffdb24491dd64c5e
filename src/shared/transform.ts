import { Optional } from './optional.js';
import { Result } from './result.js';

// Type-changing counterparts of the container methods, which keep the carried type.

export function mapResult<T, E, U>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
    return result.match(
        (value) => Result.success<U, E>(fn(value)),
        (error) => Result.failure<U, E>(error)
    );
}

export function mapResultErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
    return result.match(
        (value) => Result.success<T, F>(value),
        (error) => Result.failure<T, F>(fn(error))
    );
}

export function andThenResult<T, E, U>(
    result: Result<T, E>,
    fn: (value: T) => Result<U, E>
): Result<U, E> {
    return result.match(fn, (error) => Result.failure<U, E>(error));
}

export function mapOptional<T, U>(optional: Optional<T>, fn: (value: T) => U): Optional<U> {
    return optional.match(
        (value) => Optional.present(fn(value)),
        () => Optional.absent<U>()
    );
}

export function andThenOptional<T, U>(
    optional: Optional<T>,
    fn: (value: T) => Optional<U>
): Optional<U> {
    return optional.match(fn, () => Optional.absent<U>());
}
