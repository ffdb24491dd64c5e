import { describe, it, expect } from 'vitest';
import { Result, failure, success } from '@shared/result.js';
import { Optional, absent, present } from '@shared/optional.js';
import {
    andThenOptional,
    andThenResult,
    mapOptional,
    mapResult,
    mapResultErr,
} from '@shared/transform.js';

describe('transformers', () => {
    describe('mapResult', () => {
        it('should change the success type', () => {
            const result = mapResult(success<number, string>(42), (value) => `#${value}`);

            expect(result.unwrap()).toBe('#42');
        });

        it('should keep the failure', () => {
            const result = mapResult(failure<number, string>('boom'), (value) => `#${value}`);

            expect(result.unwrapFailure()).toBe('boom');
        });
    });

    describe('mapResultErr', () => {
        it('should change the failure type', () => {
            const result = mapResultErr(failure<number, string>('boom'), (error) => new Error(error));

            expect(result.unwrapFailure()).toBeInstanceOf(Error);
            expect(result.unwrapFailure().message).toBe('boom');
        });

        it('should keep the success', () => {
            expect(mapResultErr(success<number, string>(1), (error) => error.length).unwrap()).toBe(1);
        });
    });

    describe('andThenResult', () => {
        const parse = (raw: string): Result<number, string> => {
            const value = Number.parseInt(raw, 10);
            return Number.isNaN(value) ? failure(`not a number: ${raw}`) : success(value);
        };

        it('should chain into a different success type', () => {
            expect(andThenResult(success<string, string>('12'), parse).unwrap()).toBe(12);
            expect(andThenResult(success<string, string>('x'), parse).unwrapFailure()).toBe('not a number: x');
        });

        it('should not call the function on failure', () => {
            let calls = 0;

            const result = andThenResult(failure<string, string>('boom'), (raw) => {
                calls++;
                return parse(raw);
            });

            expect(result.unwrapFailure()).toBe('boom');
            expect(calls).toBe(0);
        });
    });

    describe('mapOptional', () => {
        it('should change the payload type', () => {
            expect(mapOptional(present('api.local'), (host) => host.length).unwrap()).toBe(9);
            expect(mapOptional(absent<string>(), (host) => host.length).isAbsent()).toBe(true);
        });
    });

    describe('andThenOptional', () => {
        const firstChar = (value: string): Optional<string> =>
            value.length > 0 ? present(value[0]) : absent();

        it('should chain into a different optional', () => {
            expect(andThenOptional(present('eu-west-1'), firstChar).unwrap()).toBe('e');
            expect(andThenOptional(present(''), firstChar).isAbsent()).toBe(true);
            expect(andThenOptional(absent<string>(), firstChar).isAbsent()).toBe(true);
        });
    });
});
