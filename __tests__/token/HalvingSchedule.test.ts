/**
 * HalvingSchedule
 *
 * 1. rateAt per epoch, zero before genesis and after underflow
 * 2. Non-increasing rate that reaches exactly zero
 * 3. Slicing at genesis-relative boundaries
 * 4. Integration across partial epochs
 * 5. Configuration validation
 */
import { InvalidInputError } from '../../src/errors/MiningError.js';
import { HalvingSchedule } from '../../src/token/HalvingSchedule.js';
import { RATE_SCALE } from '../../src/utils/fixedPoint.js';

const schedule = new HalvingSchedule({
    genesisTime: 0,
    epochLengthSeconds: 1000,
    baseRate: '1',
    halvingDivisor: 2,
});

describe('HalvingSchedule', () => {

    test('rate halves at each epoch boundary', () => {
        expect(schedule.rateAt(0)).toBe(RATE_SCALE);
        expect(schedule.rateAt(999)).toBe(RATE_SCALE);
        expect(schedule.rateAt(1000)).toBe(RATE_SCALE / 2n);
        expect(schedule.rateAt(2500)).toBe(RATE_SCALE / 4n);
        expect(schedule.epochAt(2500)).toBe(2);
    });

    test('rate is zero before genesis', () => {
        expect(schedule.epochAt(-1)).toBe(-1);
        expect(schedule.rateAt(-1)).toBe(0n);
    });

    test('rate is non-increasing and reaches exactly zero at a finite epoch', () => {
        // 10^18 survives 59 halvings: 2^59 < 10^18 < 2^60
        expect(schedule.zeroEpoch).toBe(60);
        expect(schedule.rateForEpoch(59)).toBe(1n);
        expect(schedule.rateForEpoch(60)).toBe(0n);
        expect(schedule.rateForEpoch(500)).toBe(0n);

        let previous = schedule.rateAt(0);
        for (let elapsed = 0; elapsed <= 70_000; elapsed += 250) {
            const rate = schedule.rateAt(elapsed);
            expect(rate <= previous).toBe(true);
            previous = rate;
        }
        expect(previous).toBe(0n);
    });

    test('same input always yields the same rate', () => {
        const twin = new HalvingSchedule({ genesisTime: 0, epochLengthSeconds: 1000, baseRate: '1', halvingDivisor: 2 });
        for (const elapsed of [0, 1, 999, 1000, 12_345, 59_999]) {
            expect(twin.rateAt(elapsed)).toBe(schedule.rateAt(elapsed));
        }
    });

    test('slices split at boundaries measured from genesis', () => {
        const shifted = new HalvingSchedule({ genesisTime: 500, epochLengthSeconds: 1000, baseRate: '1', halvingDivisor: 2 });
        expect(shifted.slices(0, 2000)).toEqual([
            { epoch: 0, from: 500, to: 1500, rate: RATE_SCALE },
            { epoch: 1, from: 1500, to: 2000, rate: RATE_SCALE / 2n },
        ]);
    });

    test('accrue integrates across three epochs, the last one partial', () => {
        const accrual = schedule.accrue(0, 2500, 100);
        // 100·1·1000 + 100·0.5·1000 + 100·0.25·500
        expect(accrual.scaled / RATE_SCALE).toBe(162_500n);
        expect(accrual.scaled % RATE_SCALE).toBe(0n);
        expect(accrual.slices.map((s) => s.epoch)).toEqual([0, 1, 2]);
    });

    test('accrue over an interval inside one epoch', () => {
        expect(schedule.accrue(1200, 1300, 10).scaled).toBe(10n * 100n * (RATE_SCALE / 2n));
    });

    test('zero hash power accrues nothing', () => {
        expect(schedule.accrue(0, 5000, 0).scaled).toBe(0n);
    });

    test('fractional base rates keep their precision', () => {
        const slow = new HalvingSchedule({ genesisTime: 0, epochLengthSeconds: 100, baseRate: '0.001', halvingDivisor: 10 });
        expect(slow.rateAt(0)).toBe(RATE_SCALE / 1000n);
        expect(slow.rateAt(150)).toBe(RATE_SCALE / 10_000n);
        expect(slow.accrue(0, 100, 1).scaled).toBe(RATE_SCALE / 10n);
    });

    test('describe lists the first epochs', () => {
        expect(schedule.describe(3)).toEqual([
            { epoch: 0, startsAt: 0, rate: RATE_SCALE },
            { epoch: 1, startsAt: 1000, rate: RATE_SCALE / 2n },
            { epoch: 2, startsAt: 2000, rate: RATE_SCALE / 4n },
        ]);
    });

    test.each([
        [{ genesisTime: 0, epochLengthSeconds: 0, baseRate: '1', halvingDivisor: 2 }],
        [{ genesisTime: 0, epochLengthSeconds: 10, baseRate: '1', halvingDivisor: 1 }],
        [{ genesisTime: 0, epochLengthSeconds: 10, baseRate: '0', halvingDivisor: 2 }],
        [{ genesisTime: 0, epochLengthSeconds: 10, baseRate: 'fast', halvingDivisor: 2 }],
        [{ genesisTime: -5, epochLengthSeconds: 10, baseRate: '1', halvingDivisor: 2 }],
    ])('rejects invalid configuration %#', (config) => {
        expect(() => new HalvingSchedule(config)).toThrow(InvalidInputError);
    });
});
