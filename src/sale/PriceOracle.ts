/**
 * PriceOracle: stable-asset amount to reward-token amount.
 *
 * The host's exchange-rate feed sits behind `ExchangeRateOracle`. The
 * fixed-rate implementation is what the engine runs with out of the box:
 *
 *   tokens = floor(stable × tokensPerStable × 10^tokenDecimals / 10^stableDecimals)
 */

import { InvalidInputError } from '../errors/MiningError.js';
import { parseUnits, RATE_DECIMALS, RATE_SCALE } from '../utils/fixedPoint.js';

export interface ExchangeRateOracle {
    /** Token base units bought by `stableAmount` stable base units. */
    quote(stableAmount: bigint): bigint;
}

export interface FixedRateConfig {
    /** Whole tokens per whole stable unit, as a decimal string */
    tokensPerStable: string;
    tokenDecimals: number;
    stableDecimals: number;
}

const DEFAULT_FIXED_RATE: FixedRateConfig = {
    tokensPerStable: '10',
    tokenDecimals: 9,
    stableDecimals: 6,
};

export class FixedRateOracle implements ExchangeRateOracle {
    private readonly config: FixedRateConfig;
    private readonly rateScaled: bigint;

    constructor(config: Partial<FixedRateConfig> = {}) {
        this.config = { ...DEFAULT_FIXED_RATE, ...config };
        try {
            this.rateScaled = parseUnits(this.config.tokensPerStable, RATE_DECIMALS);
        } catch (error) {
            throw new InvalidInputError(`tokensPerStable "${this.config.tokensPerStable}" is not a decimal number`, {
                cause: String(error),
            });
        }
        if (this.rateScaled <= 0n) {
            throw new InvalidInputError('tokensPerStable must be positive', { tokensPerStable: this.config.tokensPerStable });
        }
    }

    quote(stableAmount: bigint): bigint {
        if (stableAmount < 0n) {
            throw new InvalidInputError('Stable amount must not be negative', { stableAmount });
        }
        const numerator = stableAmount * this.rateScaled * 10n ** BigInt(this.config.tokenDecimals);
        const denominator = 10n ** BigInt(this.config.stableDecimals) * RATE_SCALE;
        return numerator / denominator;
    }
}
