import { violateContract } from './contract.js';
import { isDeepEqual } from './equality.js';
import { Optional } from './optional.js';

export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

export interface Failure<E> {
    readonly ok: false;
    readonly error: E;
}

export type ResultState<T, E> = Success<T> | Failure<E>;

/**
 * The outcome of an operation that can succeed with a `T` or fail with an `E`.
 *
 * Combinators return either the receiver or a new instance, so a chain of
 * steps can be written on the happy path and inspected once at the end:
 *
 * ```typescript
 * const port = parsePort(input)
 *     .andThen(checkRange)
 *     .map((value) => value + 1)
 *     .mapOr(8080, (value) => value * 2);
 * ```
 */
export class Result<T, E> {
    private constructor(private readonly state: ResultState<T, E>) {}

    static success<T, E = never>(value: T): Result<T, E> {
        return new Result<T, E>({ ok: true, value });
    }

    static failure<T = never, E = unknown>(error: E): Result<T, E> {
        return new Result<T, E>({ ok: false, error });
    }

    isSuccess(): boolean {
        return this.state.ok;
    }

    isFailure(): boolean {
        return !this.state.ok;
    }

    isSuccessAnd(fn: (value: T) => boolean): boolean {
        return this.state.ok && fn(this.state.value);
    }

    isFailureAnd(fn: (error: E) => boolean): boolean {
        return !this.state.ok && fn(this.state.error);
    }

    /**
     * Returns `other` when the receiver succeeded; a failure is kept as is.
     */
    and(other: Result<T, E>): Result<T, E> {
        return this.state.ok ? other : this;
    }

    andThen(fn: (value: T) => Result<T, E>): Result<T, E> {
        return this.state.ok ? fn(this.state.value) : this;
    }

    or(other: Result<T, E>): Result<T, E> {
        return this.state.ok ? this : other;
    }

    orElse(fn: (error: E) => Result<T, E>): Result<T, E> {
        return this.state.ok ? this : fn(this.state.error);
    }

    /**
     * Same-type transform of the success value. `fn` is not called on a failure.
     * Use `mapResult` to change the success type.
     */
    map(fn: (value: T) => T): Result<T, E> {
        return this.state.ok ? Result.success<T, E>(fn(this.state.value)) : this;
    }

    mapErr(fn: (error: E) => E): Result<T, E> {
        return this.state.ok ? this : Result.failure<T, E>(fn(this.state.error));
    }

    mapOr(defaultValue: T, fn: (value: T) => T): T {
        return this.state.ok ? fn(this.state.value) : defaultValue;
    }

    match<R>(onSuccess: (value: T) => R, onFailure: (error: E) => R): R {
        return this.state.ok ? onSuccess(this.state.value) : onFailure(this.state.error);
    }

    contains(value: T): boolean {
        return this.state.ok && isDeepEqual(this.state.value, value);
    }

    containsFailure(error: E): boolean {
        return !this.state.ok && isDeepEqual(this.state.error, error);
    }

    equals(other: Result<T, E>): boolean {
        if (!(other instanceof Result)) {
            return false;
        }
        if (this.state.ok && other.state.ok) {
            return isDeepEqual(this.state.value, other.state.value);
        }
        if (!this.state.ok && !other.state.ok) {
            return isDeepEqual(this.state.error, other.state.error);
        }
        return false;
    }

    toSuccessOptional(): Optional<T> {
        return this.state.ok ? Optional.present(this.state.value) : Optional.absent<T>();
    }

    toFailureOptional(): Optional<E> {
        return this.state.ok ? Optional.absent<E>() : Optional.present(this.state.error);
    }

    unwrapOr(defaultValue: T): T {
        return this.state.ok ? this.state.value : defaultValue;
    }

    unwrapOrElse(fn: (error: E) => T): T {
        return this.state.ok ? this.state.value : fn(this.state.error);
    }

    expect(message: string): T {
        return this.extractValue('Result.expect', message);
    }

    unwrap(): T {
        return this.extractValue('Result.unwrap', 'called unwrap on a failed Result');
    }

    expectFailure(message: string): E {
        return this.extractError('Result.expectFailure', message);
    }

    unwrapFailure(): E {
        return this.extractError('Result.unwrapFailure', 'called unwrapFailure on a successful Result');
    }

    private extractValue(operation: string, message: string): T {
        if (!this.state.ok) {
            return violateContract(operation, message, this.state.error);
        }
        return this.state.value;
    }

    private extractError(operation: string, message: string): E {
        if (this.state.ok) {
            return violateContract(operation, message, this.state.value);
        }
        return this.state.error;
    }
}

export function success<T, E = never>(value: T): Result<T, E> {
    return Result.success<T, E>(value);
}

export function failure<T = never, E = unknown>(error: E): Result<T, E> {
    return Result.failure<T, E>(error);
}
