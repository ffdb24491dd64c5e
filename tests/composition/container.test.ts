import { describe, it, expect } from 'vitest';
import { buildContainer } from '@composition/container.js';
import { parseConfig } from '@composition/config.js';
import { absent } from '@shared/optional.js';
import { UnwrapError } from '@shared/errors.js';
import { PinoLogger } from '@infrastructure/observability/pino-logger.js';
import { RecordingLogger } from '@tests/support/recording-logger.js';

describe('buildContainer', () => {
    it('should report contract violations through the given logger', () => {
        const logger = new RecordingLogger();
        const container = buildContainer(parseConfig({ NODE_ENV: 'test' }).unwrap(), logger);

        try {
            expect(() => absent<number>().expect('quantity is required')).toThrow(UnwrapError);
        } finally {
            container.dispose();
        }

        const errors = logger.entries.filter((entry) => entry.level === 'error');
        expect(errors).toHaveLength(1);
        expect(errors[0].message).toBe('quantity is required');
        expect(errors[0].context).toEqual({ component: 'contract', operation: 'Optional.expect' });
    });

    it('should log the built configuration at debug level', () => {
        const logger = new RecordingLogger();
        const container = buildContainer(parseConfig({ NODE_ENV: 'test' }).unwrap(), logger);
        container.dispose();

        expect(logger.entries).toEqual([
            {
                level: 'debug',
                message: 'Container built',
                context: {},
                obj: { environment: 'test', reportContractViolations: true },
            },
        ]);
    });

    it('should not report when reporting is disabled', () => {
        const logger = new RecordingLogger();
        const config = parseConfig({ REPORT_CONTRACT_VIOLATIONS: 'false' }).unwrap();
        const container = buildContainer(config, logger);

        expect(() => absent<number>().unwrap()).toThrow(UnwrapError);
        container.dispose();

        expect(logger.entries.filter((entry) => entry.level === 'error')).toEqual([]);
    });

    it('should stop reporting after dispose', () => {
        const logger = new RecordingLogger();
        const container = buildContainer(parseConfig({}).unwrap(), logger);
        container.dispose();

        expect(() => absent<number>().unwrap()).toThrow(UnwrapError);

        expect(logger.entries.filter((entry) => entry.level === 'error')).toEqual([]);
    });

    it('should build a pino logger from the configuration', () => {
        const config = parseConfig({ LOG_LEVEL: 'silent' }).unwrap();
        const container = buildContainer(config);

        expect(container.logger).toBeInstanceOf(PinoLogger);
        expect(container.config).toBe(config);
        container.dispose();
    });
});
