import {
    bpsOf,
    formatUnits,
    minBigInt,
    mulDiv,
    parseUnits,
    RATE_SCALE,
} from '../../src/utils/fixedPoint.js';
import { toJson } from '../../src/utils/json.js';

describe('fixedPoint', () => {
    test('parseUnits scales whole and fractional parts', () => {
        expect(parseUnits('27000000', 9)).toBe(27_000_000_000_000_000n);
        expect(parseUnits('1.5', 9)).toBe(1_500_000_000n);
        expect(parseUnits('0.000001', 6)).toBe(1n);
        expect(parseUnits('1', 18)).toBe(RATE_SCALE);
    });

    test('parseUnits rejects malformed or over-precise input', () => {
        expect(() => parseUnits('1.2345', 2)).toThrow('more than 2 fractional digits');
        expect(() => parseUnits('-1', 2)).toThrow('Invalid decimal amount');
        expect(() => parseUnits('1e6', 2)).toThrow('Invalid decimal amount');
    });

    test('formatUnits trims trailing zeros', () => {
        expect(formatUnits(1_500_000_000n, 9)).toBe('1.5');
        expect(formatUnits(2_000_000_000n, 9)).toBe('2');
        expect(formatUnits(-25n, 2)).toBe('-0.25');
        expect(formatUnits(7n, 0)).toBe('7');
    });

    test('mulDiv and bpsOf floor', () => {
        expect(mulDiv(10n, 3n, 4n)).toBe(7n);
        expect(bpsOf(1234n, 1000)).toBe(123n);
        expect(bpsOf(9999n, 1)).toBe(0n);
        expect(() => mulDiv(1n, 1n, 0n)).toThrow('division by zero');
    });

    test('minBigInt', () => {
        expect(minBigInt(5n, 3n, 9n)).toBe(3n);
        expect(minBigInt(4n)).toBe(4n);
    });

    test('toJson writes bigint as decimal strings', () => {
        expect(toJson({ amount: 12n, nested: [1n] })).toBe('{"amount":"12","nested":["1"]}');
    });
});
