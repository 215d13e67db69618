import { createLogger } from '../../src/utils/logger.js';

describe('Logger', () => {
    test('should create a logger with default level', () => {
        const logger = createLogger();
        expect(logger).toBeDefined();
        expect(logger.level).toBe('info');
    });

    test('should create a logger with custom level', () => {
        const logger = createLogger('debug');
        expect(logger.level).toBe('debug');
    });

    test('is silent under the test environment', () => {
        expect(createLogger('info', 'supply').silent).toBe(true);
    });

    test('accepts bigint metadata without throwing', () => {
        const logger = createLogger('debug', 'test-label');
        expect(() => logger.info('minted', { amount: 10n })).not.toThrow();
        expect(() => logger.debug('debug message')).not.toThrow();
    });
});
