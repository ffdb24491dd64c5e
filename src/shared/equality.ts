import { isDeepStrictEqual } from 'node:util';

export interface Equatable<T> {
    equals(other: T): boolean;
}

export function isEquatable(value: unknown): value is Equatable<unknown> {
    return typeof value === 'object'
        && value !== null
        && 'equals' in value
        && typeof value.equals === 'function';
}

/**
 * Structural equality used for membership tests.
 * Two values of the same class that define `equals` (value objects, containers)
 * compare themselves; anything else is compared recursively, never by identity.
 */
export function isDeepEqual<T>(left: T, right: T): boolean {
    if (isEquatable(left) && isEquatable(right) && left.constructor === right.constructor) {
        return left.equals(right);
    }
    return isDeepStrictEqual(left, right);
}
