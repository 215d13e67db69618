/**
 * BoxOpener: turns a box purchase into a hash-power draw.
 *
 * Tiers are picked by weight, then hash power is uniform within the tier's
 * inclusive range. The random integer source is injectable; production uses
 * node:crypto's CSPRNG.
 */

import { randomInt } from 'node:crypto';
import { InvalidInputError } from '../errors/MiningError.js';
import type { BoxTier } from '../types/index.js';

export interface BoxDraw {
    tier: string;
    hashPower: number;
}

/** Randomness collaborator: the only non-deterministic input to equipment creation. */
export interface HashPowerSource {
    draw(): BoxDraw;
}

/** Uniform integer in [0, maxExclusive). */
export type RandomInt = (maxExclusive: number) => number;

export const DEFAULT_BOX_TIERS: BoxTier[] = [
    { name: 'entry', minHashPower: 10, maxHashPower: 30, weight: 60 },
    { name: 'mid', minHashPower: 31, maxHashPower: 80, weight: 28 },
    { name: 'high', minHashPower: 81, maxHashPower: 180, weight: 10 },
    { name: 'flagship', minHashPower: 181, maxHashPower: 400, weight: 2 },
];

export class WeightedBoxSource implements HashPowerSource {
    private readonly totalWeight: number;

    constructor(
        private readonly tiers: BoxTier[] = DEFAULT_BOX_TIERS,
        private readonly random: RandomInt = (maxExclusive) => randomInt(maxExclusive),
    ) {
        if (tiers.length === 0) {
            throw new InvalidInputError('At least one box tier is required');
        }
        for (const tier of tiers) {
            if (!Number.isSafeInteger(tier.weight) || tier.weight <= 0) {
                throw new InvalidInputError(`Tier ${tier.name} needs a positive integer weight`, { tier: tier.name });
            }
            if (!Number.isSafeInteger(tier.minHashPower) || tier.minHashPower < 0 || tier.maxHashPower < tier.minHashPower) {
                throw new InvalidInputError(`Tier ${tier.name} has an invalid hash power range`, { tier: tier.name });
            }
        }
        this.totalWeight = tiers.reduce((sum, tier) => sum + tier.weight, 0);
    }

    draw(): BoxDraw {
        let ticket = this.random(this.totalWeight);
        const tier = this.tiers.find((candidate) => {
            if (ticket < candidate.weight) return true;
            ticket -= candidate.weight;
            return false;
        }) ?? this.tiers[this.tiers.length - 1];

        const span = tier.maxHashPower - tier.minHashPower + 1;
        return { tier: tier.name, hashPower: tier.minHashPower + this.random(span) };
    }
}
