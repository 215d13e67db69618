import { InvalidInputError } from '../../src/errors/MiningError.js';
import { assertTimestamp, nowSeconds } from '../../src/utils/timestamp.js';

describe('Timestamp', () => {
    test('should return whole seconds bracketing Date.now()', () => {
        const before = Math.floor(Date.now() / 1000);
        const ts = nowSeconds();
        const after = Math.floor(Date.now() / 1000);
        expect(Number.isInteger(ts)).toBe(true);
        expect(ts).toBeGreaterThanOrEqual(before);
        expect(ts).toBeLessThanOrEqual(after);
    });
});

describe('assertTimestamp', () => {
    test('accepts whole seconds, including zero and negatives', () => {
        expect(() => assertTimestamp(0)).not.toThrow();
        expect(() => assertTimestamp(-5)).not.toThrow();
        expect(() => assertTimestamp(1_700_000_000)).not.toThrow();
    });

    test.each([NaN, Infinity, -Infinity, 10.5, Number.MAX_SAFE_INTEGER + 1])('rejects %p', (value) => {
        expect(() => assertTimestamp(value)).toThrow(InvalidInputError);
    });

    test('names the offending field', () => {
        expect(() => assertTimestamp(1.5, 'until')).toThrow('until must be a whole number of seconds');
    });
});
