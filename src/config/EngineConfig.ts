/**
 * Engine configuration.
 *
 * Every key has a default in the schema, so a config file only lists what it
 * changes. Amounts are decimal strings of whole units; they are turned into
 * base units with the matching decimals.
 *
 * Environment overrides (applied over the file):
 *   LOG_LEVEL  logLevel
 *   API_PORT   apiPort
 *   DATA_FILE  dataFile
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DEFAULT_BOX_TIERS } from '../equipment/BoxOpener.js';
import { InvalidInputError } from '../errors/MiningError.js';
import { DEFAULT_SUPPLY_CAP_TOKENS, supplyCap } from '../token/SupplyLedger.js';
import type { ClaimLimits } from '../types/index.js';
import { parseUnits } from '../utils/fixedPoint.js';

const decimalString = z.string().regex(/^\d+(\.\d+)?$/, 'expected a non-negative decimal string');
const bps = z.number().int().min(0).max(10_000);

const scheduleSchema = z.object({
    genesisTime: z.number().int().nonnegative().default(1_767_225_600),
    epochLengthSeconds: z.number().int().positive().default(126_144_000),
    baseRate: decimalString.default('100000'),
    halvingDivisor: z.number().int().min(2).default(2),
});

const saleSchema = z.object({
    burnRateBps: bps.default(1_000),
    referralRatesBps: z.array(bps).default([500, 300, 200]),
    maxReferralDepth: z.number().int().min(0).max(16).default(3),
    unpaidReferralTo: z.enum(['buyer', 'treasury']).default('treasury'),
    tokensPerStable: decimalString.default('10'),
    boxPriceStable: decimalString.default('100'),
});

const boxTierSchema = z.object({
    name: z.string().min(1),
    minHashPower: z.number().int().nonnegative(),
    maxHashPower: z.number().int().nonnegative(),
    weight: z.number().int().positive(),
});

export const engineConfigSchema = z.object({
    tokenSymbol: z.string().min(1).default('RIG'),
    tokenDecimals: z.number().int().min(0).max(18).default(9),
    stableDecimals: z.number().int().min(0).max(18).default(6),
    supplyCapTokens: z.string().regex(/^\d+$/, 'expected a whole number of tokens')
        .default(DEFAULT_SUPPLY_CAP_TOKENS.toString()),
    admin: z.string().min(1).default('admin'),
    treasury: z.string().min(1).default('treasury'),
    schedule: scheduleSchema.default({}),
    sale: saleSchema.default({}),
    boxes: z.array(boxTierSchema).min(1).default(DEFAULT_BOX_TIERS),
    claimLimits: z.object({ maxPerDay: decimalString }).optional(),
    adminActionDelaySeconds: z.number().int().nonnegative().default(86_400),
    apiPort: z.number().int().min(0).max(65_535).default(3000),
    logLevel: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    dataFile: z.string().min(1).nullable().default(null),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export const DEFAULT_CONFIG: EngineConfig = engineConfigSchema.parse({});

export function supplyCapOf(config: EngineConfig): bigint {
    return supplyCap(config.tokenDecimals, BigInt(config.supplyCapTokens));
}

export function boxPriceOf(config: EngineConfig): bigint {
    return parseUnits(config.sale.boxPriceStable, config.stableDecimals);
}

export function claimLimitsOf(config: EngineConfig): ClaimLimits | undefined {
    if (!config.claimLimits) return undefined;
    return { maxPerDay: parseUnits(config.claimLimits.maxPerDay, config.tokenDecimals) };
}

/**
 * Validate a raw config object with environment overrides applied.
 * @throws InvalidInputError naming the first offending path
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): EngineConfig {
    let base: object = {};
    if (raw !== undefined) {
        if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
            throw new InvalidInputError('Configuration must be a JSON object', { path: '' });
        }
        base = raw;
    }
    const overrides: Record<string, unknown> = {};
    if (env.LOG_LEVEL) overrides.logLevel = env.LOG_LEVEL;
    if (env.API_PORT) overrides.apiPort = Number(env.API_PORT);
    if (env.DATA_FILE) overrides.dataFile = env.DATA_FILE;

    const result = engineConfigSchema.safeParse({ ...base, ...overrides });
    if (!result.success) {
        const issue = result.error.issues[0];
        const path = issue.path.join('.');
        throw new InvalidInputError(`Invalid configuration at "${path}": ${issue.message}`, {
            path,
            issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        });
    }

    const config = result.data;
    checkAmount('sale.boxPriceStable', () => boxPriceOf(config));
    checkAmount('claimLimits.maxPerDay', () => claimLimitsOf(config));
    for (const tier of config.boxes) {
        if (tier.maxHashPower < tier.minHashPower) {
            throw new InvalidInputError(`Invalid configuration at "boxes": tier ${tier.name} has max below min`, {
                path: 'boxes',
            });
        }
    }
    if (config.sale.referralRatesBps.length > config.sale.maxReferralDepth) {
        throw new InvalidInputError('Invalid configuration at "sale.referralRatesBps": more levels than maxReferralDepth', {
            path: 'sale.referralRatesBps',
        });
    }
    return config;
}

/**
 * Read a JSON config file (or only the defaults and environment when no path is given).
 */
export function loadConfig(path?: string, env: NodeJS.ProcessEnv = process.env): EngineConfig {
    if (!path) return parseConfig({}, env);
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
        throw new InvalidInputError(`Cannot read configuration file ${path}`, {
            path,
            cause: error instanceof Error ? error.message : String(error),
        });
    }
    return parseConfig(raw, env);
}

function checkAmount(path: string, convert: () => unknown): void {
    try {
        convert();
    } catch (error) {
        throw new InvalidInputError(`Invalid configuration at "${path}": ${error instanceof Error ? error.message : String(error)}`, {
            path,
        });
    }
}
