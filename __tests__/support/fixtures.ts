import { DEFAULT_CONFIG } from '../../src/config/EngineConfig.js';
import type { EngineConfig } from '../../src/config/EngineConfig.js';
import type { HashPowerSource } from '../../src/equipment/BoxOpener.js';
import { MiningEngine } from '../../src/engine/MiningEngine.js';
import type { EngineDependencies } from '../../src/engine/MiningEngine.js';
import { equipmentKey } from '../../src/store/keys.js';
import type { Equipment, Identity } from '../../src/types/index.js';

/**
 * Whole-unit amounts: 0 decimals on both sides, 10 tokens per stable unit,
 * 1 token per hash power per second in epoch 0, halving every 1000 s.
 */
export function testConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
    return {
        ...DEFAULT_CONFIG,
        tokenDecimals: 0,
        stableDecimals: 0,
        admin: 'admin',
        treasury: 'treasury',
        schedule: { genesisTime: 0, epochLengthSeconds: 1000, baseRate: '1', halvingDivisor: 2 },
        sale: {
            burnRateBps: 1000,
            referralRatesBps: [500, 300, 200],
            maxReferralDepth: 3,
            unpaidReferralTo: 'treasury',
            tokensPerStable: '10',
            boxPriceStable: '100',
        },
        adminActionDelaySeconds: 86_400,
        dataFile: null,
        ...overrides,
    };
}

export function fixedBox(hashPower: number, tier = 'test'): HashPowerSource {
    return { draw: () => ({ tier, hashPower }) };
}

export class ManualClock {
    constructor(public current = 0) { }

    readonly now = (): number => this.current;

    advance(seconds: number): number {
        this.current += seconds;
        return this.current;
    }
}

export async function createTestEngine(
    overrides: Partial<EngineConfig> = {},
    deps: EngineDependencies = {},
): Promise<MiningEngine> {
    return MiningEngine.create(testConfig(overrides), { boxSource: fixedBox(100), clock: () => 0, ...deps });
}

/**
 * Put an unregistered unit straight into the registry, skipping the sale.
 */
export async function giveEquipment(
    engine: MiningEngine,
    owner: Identity,
    hashPower: number,
    id = `rig-${owner}-${hashPower}`,
    now = 0,
): Promise<Equipment> {
    return engine.context.transact([equipmentKey(id)], (tx) =>
        engine.registry.createWithin(tx, id, owner, { tier: 'test', hashPower }, now));
}
