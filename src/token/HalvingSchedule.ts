/**
 * HalvingSchedule: reward rate per hash power per second, by epoch.
 *
 * Epochs are fixed-length windows counted from `genesisTime`; the rate is
 * divided by `halvingDivisor` at every boundary, like Bitcoin's block reward:
 *
 *   epoch = floor(elapsed / epochLengthSeconds)
 *   rate  = floor(baseRate / halvingDivisor ^ epoch)      (RATE_SCALE fixed point)
 *
 * Once the integer rate underflows to zero it stays zero. No hidden state:
 * the same input always yields the same rate.
 */

import { InvalidInputError } from '../errors/MiningError.js';
import type { EpochSlice, HalvingScheduleConfig } from '../types/index.js';
import { parseUnits, RATE_DECIMALS } from '../utils/fixedPoint.js';

export interface EpochInfo {
    epoch: number;
    startsAt: number;
    rate: bigint;
}

export interface Accrual {
    /** Reward scaled by RATE_SCALE; divide to get base units. */
    scaled: bigint;
    slices: EpochSlice[];
}

export class HalvingSchedule {
    readonly genesisTime: number;
    readonly epochLengthSeconds: number;
    readonly halvingDivisor: number;
    /** Epoch-0 rate scaled by RATE_SCALE. */
    readonly baseRate: bigint;
    /** First epoch whose integer rate is zero. */
    readonly zeroEpoch: number;

    constructor(config: HalvingScheduleConfig) {
        if (!Number.isSafeInteger(config.genesisTime) || config.genesisTime < 0) {
            throw new InvalidInputError('genesisTime must be a non-negative integer', { genesisTime: config.genesisTime });
        }
        if (!Number.isSafeInteger(config.epochLengthSeconds) || config.epochLengthSeconds <= 0) {
            throw new InvalidInputError('epochLengthSeconds must be a positive integer', {
                epochLengthSeconds: config.epochLengthSeconds,
            });
        }
        if (!Number.isSafeInteger(config.halvingDivisor) || config.halvingDivisor < 2) {
            throw new InvalidInputError('halvingDivisor must be an integer ≥ 2', { halvingDivisor: config.halvingDivisor });
        }
        let baseRate: bigint;
        try {
            baseRate = parseUnits(config.baseRate, RATE_DECIMALS);
        } catch (error) {
            throw new InvalidInputError(`baseRate "${config.baseRate}" is not a decimal number`, { cause: String(error) });
        }
        if (baseRate <= 0n) {
            throw new InvalidInputError('baseRate must be positive', { baseRate: config.baseRate });
        }

        this.genesisTime = config.genesisTime;
        this.epochLengthSeconds = config.epochLengthSeconds;
        this.halvingDivisor = config.halvingDivisor;
        this.baseRate = baseRate;

        let epoch = 0;
        let rate = baseRate;
        const divisor = BigInt(config.halvingDivisor);
        while (rate > 0n) {
            rate /= divisor;
            epoch++;
        }
        this.zeroEpoch = epoch;
    }

    /**
     * Epoch containing `elapsedSeconds` after genesis; -1 before genesis.
     */
    epochAt(elapsedSeconds: number): number {
        if (elapsedSeconds < 0) return -1;
        return Math.floor(elapsedSeconds / this.epochLengthSeconds);
    }

    rateForEpoch(epoch: number): bigint {
        if (epoch < 0 || epoch >= this.zeroEpoch) return 0n;
        return this.baseRate / BigInt(this.halvingDivisor) ** BigInt(epoch);
    }

    /**
     * Scaled rate in force `elapsedSeconds` after genesis. Zero before genesis.
     */
    rateAt(elapsedSeconds: number): bigint {
        return this.rateForEpoch(this.epochAt(elapsedSeconds));
    }

    /**
     * Split [from, to) (absolute seconds) at epoch boundaries.
     * Boundaries come from genesis, never from `from`, so every miner sees the
     * same rate for the same second. Slices at zero rate are omitted.
     */
    slices(from: number, to: number): EpochSlice[] {
        const result: EpochSlice[] = [];
        let cursor = Math.max(from, this.genesisTime);
        while (cursor < to) {
            const epoch = this.epochAt(cursor - this.genesisTime);
            if (epoch >= this.zeroEpoch) break;
            const epochEnd = this.genesisTime + (epoch + 1) * this.epochLengthSeconds;
            const end = Math.min(epochEnd, to);
            result.push({ epoch, from: cursor, to: end, rate: this.rateForEpoch(epoch) });
            cursor = end;
        }
        return result;
    }

    /**
     * Integrate rate × hashPower over [from, to): one term per epoch spanned.
     */
    accrue(from: number, to: number, hashPower: number): Accrual {
        const slices = this.slices(from, to);
        if (hashPower === 0) {
            return { scaled: 0n, slices };
        }
        const power = BigInt(hashPower);
        const scaled = slices.reduce(
            (sum, slice) => sum + slice.rate * power * BigInt(slice.to - slice.from),
            0n,
        );
        return { scaled, slices };
    }

    /**
     * The first `count` epochs, for display.
     */
    describe(count: number): EpochInfo[] {
        return Array.from({ length: Math.max(0, count) }, (_, epoch) => ({
            epoch,
            startsAt: this.genesisTime + epoch * this.epochLengthSeconds,
            rate: this.rateForEpoch(epoch),
        }));
    }
}
