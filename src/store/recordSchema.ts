import { z } from 'zod';
import type { LedgerRecord } from '../types/index.js';
import type { BalanceEntry } from '../token/TokenLedger.js';

/** Amounts persist as decimal strings; in memory they are bigint. */
export const amountSchema = z.union([
    z.bigint(),
    z.string().regex(/^-?\d+$/, 'expected an integer string').transform((value) => BigInt(value)),
]);

const seconds = z.number().int();
const identity = z.string().min(1);

const supplySchema = z.object({
    _id: z.string(),
    kind: z.literal('supply'),
    cap: amountSchema,
    totalMinted: amountSchema,
    totalBurned: amountSchema,
});

const minerSchema = z.object({
    _id: z.string(),
    kind: z.literal('miner'),
    owner: identity,
    registeredHashPower: z.number().int().nonnegative(),
    equipmentIds: z.array(z.string()),
    lastSettlement: seconds,
    pendingReward: amountSchema,
    rewardDust: amountSchema,
    totalClaimed: amountSchema,
    claimNonce: z.number().int().nonnegative(),
    dailyClaimed: amountSchema,
    dailyWindowStart: seconds,
    hourlyClaimed: amountSchema,
    hourlyWindowStart: seconds,
    createdAt: seconds,
});

const equipmentSchema = z.object({
    _id: z.string(),
    kind: z.literal('equipment'),
    id: z.string().min(1),
    tier: z.string(),
    hashPower: z.number().int().nonnegative(),
    owner: identity,
    active: z.boolean(),
    createdAt: seconds,
});

const referralSchema = z.object({
    _id: z.string(),
    kind: z.literal('referral'),
    referred: identity,
    referrer: identity.nullable(),
    linkedAt: seconds.nullable(),
    heightBelow: z.number().int().nonnegative(),
});

const saleStatsSchema = z.object({
    _id: z.string(),
    kind: z.literal('sale-stats'),
    purchases: z.number().int().nonnegative(),
    boxesSold: z.number().int().nonnegative(),
    tokenVolume: amountSchema,
    burned: amountSchema,
    referralPaid: amountSchema,
    unpaidReferral: amountSchema,
});

const controlSchema = z.object({
    _id: z.string(),
    kind: z.literal('control'),
    admin: identity,
    treasury: identity,
    paused: z.boolean(),
    pauseReason: z.string().optional(),
    blacklist: z.array(identity),
});

const adminActionSchema = z.object({
    _id: z.string(),
    kind: z.literal('admin-action'),
    admin: identity,
    action: z.enum(['change-admin', 'change-treasury', 'resume']),
    newValue: z.string(),
    requestedAt: seconds,
    executed: z.boolean(),
});

export const ledgerRecordSchema = z.discriminatedUnion('kind', [
    supplySchema,
    minerSchema,
    equipmentSchema,
    referralSchema,
    saleStatsSchema,
    controlSchema,
    adminActionSchema,
]);

export function parseLedgerRecord(value: unknown): LedgerRecord {
    return ledgerRecordSchema.parse(value);
}

const tokenTransactionSchema = z.object({
    txId: z.string(),
    holder: identity,
    amount: amountSchema,
    type: z.enum(['mint', 'burn']),
    timestamp: z.number(),
    memo: z.string(),
});

const balanceEntrySchema = z.object({
    _id: identity,
    balance: amountSchema,
    transactions: z.array(tokenTransactionSchema),
});

export function parseBalanceEntry(value: unknown): BalanceEntry {
    return balanceEntrySchema.parse(value);
}
