/**
 * RewardEngine: settles time-based mining rewards and mints claims.
 *
 * settle: integrate the halving schedule over [lastSettlement, now) at the
 *         miner's registered hash power, add the result to pendingReward and
 *         move lastSettlement to now (even at zero hash power).
 * claim:  settle, then mint as much of pendingReward as the supply cap and
 *         the claim limits allow. Anything left stays pending and is reported
 *         as a shortfall.
 *
 * Sub-unit remainders are carried in `rewardDust`, so settling an interval
 * in several steps yields exactly what one settlement would.
 */

import type winston from 'winston';
import { ensureOperational } from '../admin/guards.js';
import type { RecordContext, Transaction } from '../concurrency/RecordContext.js';
import { NonMonotonicTimeError, UnknownMinerError } from '../errors/MiningError.js';
import { minerKey, SUPPLY_KEY } from '../store/keys.js';
import type {
    ClaimLimitReason,
    ClaimLimits,
    ClaimResult,
    Identity,
    MinerAccount,
    SettlementResult,
} from '../types/index.js';
import { minBigInt, RATE_SCALE } from '../utils/fixedPoint.js';
import { createLogger } from '../utils/logger.js';
import { assertTimestamp } from '../utils/timestamp.js';
import type { HalvingSchedule } from './HalvingSchedule.js';
import { headroom } from './SupplyLedger.js';
import type { SupplyLedger } from './SupplyLedger.js';
import type { FungibleToken } from './TokenLedger.js';

export const DAY_SECONDS = 24 * 60 * 60;
export const HOUR_SECONDS = 60 * 60;

/**
 * 'strict' rejects now ≤ lastSettlement (explicit settle and claim).
 * 'forced' treats now == lastSettlement as a no-op (settlement ahead of a
 * hash-power change in the same second).
 */
export type SettleMode = 'strict' | 'forced';

export function createMinerAccount(owner: Identity, now: number): MinerAccount {
    assertTimestamp(now);
    return {
        _id: minerKey(owner),
        kind: 'miner',
        owner,
        registeredHashPower: 0,
        equipmentIds: [],
        lastSettlement: now,
        pendingReward: 0n,
        rewardDust: 0n,
        totalClaimed: 0n,
        claimNonce: 0,
        dailyClaimed: 0n,
        dailyWindowStart: now,
        hourlyClaimed: 0n,
        hourlyWindowStart: now,
        createdAt: now,
    };
}

/**
 * Pure settlement step. Returns the updated account; the input is untouched.
 * @throws InvalidInputError if `now` is not a whole number of seconds
 * @throws NonMonotonicTimeError if `now` goes backwards (or stands still in strict mode)
 */
export function settleAccount(
    account: MinerAccount,
    schedule: HalvingSchedule,
    now: number,
    mode: SettleMode,
): { account: MinerAccount; result: SettlementResult } {
    assertTimestamp(now);
    const from = account.lastSettlement;
    if (now < from || (mode === 'strict' && now === from)) {
        throw new NonMonotonicTimeError(account.owner, now, from);
    }

    const accrual = schedule.accrue(from, now, account.registeredHashPower);
    const total = accrual.scaled + account.rewardDust;
    const accrued = total / RATE_SCALE;

    const next: MinerAccount = {
        ...account,
        pendingReward: account.pendingReward + accrued,
        rewardDust: total % RATE_SCALE,
        lastSettlement: now,
    };

    return {
        account: next,
        result: {
            owner: account.owner,
            from,
            to: now,
            hashPower: account.registeredHashPower,
            accrued,
            pendingReward: next.pendingReward,
            slices: accrual.slices,
        },
    };
}

/**
 * Roll the daily/hourly windows forward and return the remaining allowance.
 */
export function claimAllowance(
    account: MinerAccount,
    limits: ClaimLimits,
    now: number,
): { account: MinerAccount; allowance: bigint } {
    const next = { ...account };
    if (now - next.dailyWindowStart >= DAY_SECONDS) {
        next.dailyClaimed = 0n;
        next.dailyWindowStart = now;
    }
    if (now - next.hourlyWindowStart >= HOUR_SECONDS) {
        next.hourlyClaimed = 0n;
        next.hourlyWindowStart = now;
    }
    const hourlyMax = limits.maxPerDay / 24n;
    const daily = limits.maxPerDay - next.dailyClaimed;
    const hourly = hourlyMax - next.hourlyClaimed;
    const allowance = minBigInt(daily, hourly);
    return { account: next, allowance: allowance > 0n ? allowance : 0n };
}

export interface RewardEngineOptions {
    claimLimits?: ClaimLimits;
    logger?: winston.Logger;
}

export class RewardEngine {
    private readonly claimLimits?: ClaimLimits;
    private readonly logger: winston.Logger;

    constructor(
        private readonly context: RecordContext,
        readonly schedule: HalvingSchedule,
        private readonly supply: SupplyLedger,
        private readonly token: FungibleToken,
        options: RewardEngineOptions = {},
    ) {
        this.claimLimits = options.claimLimits;
        this.logger = options.logger ?? createLogger('info', 'reward');
    }

    /**
     * Crystallize accrued reward into pendingReward up to `now`.
     */
    async settle(owner: Identity, now: number): Promise<SettlementResult> {
        return this.context.transact([minerKey(owner)], async (tx) => {
            const account = await this.requireMiner(tx, owner);
            const settled = settleAccount(account, this.schedule, now, 'strict');
            tx.put(settled.account);
            this.logger.debug('Settled', {
                owner,
                from: settled.result.from,
                to: now,
                accrued: settled.result.accrued,
            });
            return settled.result;
        });
    }

    /**
     * Settle and mint the pending reward. Partial when the cap or a claim
     * limit binds; the remainder stays pending and is reported as shortfall.
     */
    async claim(owner: Identity, now: number): Promise<ClaimResult> {
        return this.context.transact([minerKey(owner), SUPPLY_KEY], async (tx) => {
            await ensureOperational(this.context, owner);

            const account = await this.requireMiner(tx, owner);
            const settled = settleAccount(account, this.schedule, now, 'strict');
            let next = settled.account;

            const supply = await this.supply.load(tx);
            const room = headroom(supply);
            let mintable = minBigInt(next.pendingReward, room);
            let limitedBy: ClaimLimitReason | undefined = mintable < next.pendingReward ? 'supply-cap' : undefined;

            if (this.claimLimits) {
                const windowed = claimAllowance(next, this.claimLimits, now);
                next = windowed.account;
                if (windowed.allowance < mintable) {
                    mintable = windowed.allowance;
                    limitedBy = 'claim-limit';
                }
            }

            if (mintable > 0n) {
                await this.supply.mintWithin(tx, mintable);
                next = {
                    ...next,
                    pendingReward: next.pendingReward - mintable,
                    totalClaimed: next.totalClaimed + mintable,
                    claimNonce: next.claimNonce + 1,
                    dailyClaimed: next.dailyClaimed + mintable,
                    hourlyClaimed: next.hourlyClaimed + mintable,
                };
                const memo = `claim:${owner}:${next.claimNonce}`;
                tx.effect({
                    name: memo,
                    run: async () => { await this.token.mint(owner, mintable, memo); },
                    undo: async () => { await this.token.burn(owner, mintable, `revert-${memo}`); },
                });
            }
            tx.put(next);

            const result: ClaimResult = {
                owner,
                minted: mintable,
                shortfall: next.pendingReward,
                pendingReward: next.pendingReward,
                limitedBy: next.pendingReward > 0n ? limitedBy : undefined,
                settlement: settled.result,
            };

            if (result.shortfall > 0n) {
                this.logger.warn('Partial claim', { owner, minted: mintable, shortfall: result.shortfall, limitedBy });
            } else {
                this.logger.info('Claimed', { owner, minted: mintable });
            }
            return result;
        });
    }

    /**
     * What a settlement at `now` would accrue, without touching state.
     */
    async preview(owner: Identity, now: number): Promise<SettlementResult> {
        const account = await this.getMiner(owner);
        if (!account) throw new UnknownMinerError(owner);
        return settleAccount(account, this.schedule, now, 'forced').result;
    }

    async getMiner(owner: Identity): Promise<MinerAccount | null> {
        return this.context.read(minerKey(owner), 'miner');
    }

    private async requireMiner(tx: Transaction, owner: Identity): Promise<MinerAccount> {
        return tx.require(minerKey(owner), 'miner', () => new UnknownMinerError(owner));
    }
}
