import { violateContract } from './contract.js';
import { isDeepEqual } from './equality.js';

export interface Present<T> {
    readonly kind: 'present';
    readonly value: T;
}

export interface Absent {
    readonly kind: 'absent';
}

export type OptionalState<T> = Present<T> | Absent;

const ABSENT: Absent = { kind: 'absent' };

/**
 * A value of type `T`, or nothing.
 *
 * Instances are immutable: every combinator returns either the receiver
 * or a new instance.
 */
export class Optional<T> {
    private constructor(private readonly state: OptionalState<T>) {}

    static present<T>(value: T): Optional<T> {
        return new Optional<T>({ kind: 'present', value });
    }

    static absent<T>(): Optional<T> {
        return new Optional<T>(ABSENT);
    }

    /**
     * Present unless `value` is `null` or `undefined`.
     */
    static fromNullable<T>(value: T | null | undefined): Optional<T> {
        if (value === null || value === undefined) {
            return Optional.absent<T>();
        }
        return Optional.present(value);
    }

    isPresent(): boolean {
        return this.state.kind === 'present';
    }

    isAbsent(): boolean {
        return this.state.kind === 'absent';
    }

    /**
     * Returns the receiver when present, otherwise `other`.
     *
     * Unlike `Result.and`, this keeps the first present value rather than
     * moving on to `other`.
     *
     * @deprecated Same behaviour as {@link Optional.or}, which names it accurately.
     */
    and(other: Optional<T>): Optional<T> {
        return this.or(other);
    }

    or(other: Optional<T>): Optional<T> {
        return this.state.kind === 'present' ? this : other;
    }

    andThen(fn: (value: T) => Optional<T>): Optional<T> {
        return this.state.kind === 'present' ? fn(this.state.value) : this;
    }

    /**
     * Same-type transform. Use `mapOptional` to change the payload type.
     */
    map(fn: (value: T) => T): Optional<T> {
        return this.state.kind === 'present' ? Optional.present(fn(this.state.value)) : this;
    }

    match<R>(onPresent: (value: T) => R, onAbsent: () => R): R {
        return this.state.kind === 'present' ? onPresent(this.state.value) : onAbsent();
    }

    contains(value: T): boolean {
        return this.state.kind === 'present' && isDeepEqual(this.state.value, value);
    }

    equals(other: Optional<T>): boolean {
        if (!(other instanceof Optional)) {
            return false;
        }
        if (this.state.kind === 'absent' || other.state.kind === 'absent') {
            return this.state.kind === other.state.kind;
        }
        return isDeepEqual(this.state.value, other.state.value);
    }

    unwrapOr(defaultValue: T): T {
        return this.state.kind === 'present' ? this.state.value : defaultValue;
    }

    expect(message: string): T {
        return this.extract('Optional.expect', message);
    }

    unwrap(): T {
        return this.extract('Optional.unwrap', 'called unwrap on an absent Optional');
    }

    private extract(operation: string, message: string): T {
        if (this.state.kind === 'absent') {
            return violateContract(operation, message);
        }
        return this.state.value;
    }
}

export function present<T>(value: T): Optional<T> {
    return Optional.present(value);
}

export function absent<T>(): Optional<T> {
    return Optional.absent<T>();
}
