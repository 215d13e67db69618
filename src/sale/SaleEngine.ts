/**
 * SaleEngine: stable-for-token purchases and equipment boxes.
 *
 * Split of a purchase of `amount` tokens (all floors):
 *
 *   burn      = amount × burnRateBps / 10000          never minted
 *   payable   = amount − burn
 *   share[i]  = payable × referralRatesBps[i] / 10000  level i+1 referrer
 *   unpaid    = shares of levels the chain does not reach
 *   net       = payable − Σ shares − unpaid           includes all rounding dust
 *
 * burn + Σ paid + unpaid + net == amount, exactly. Everything but the burn is
 * minted, and must fit the supply headroom as a whole.
 */

import type winston from 'winston';
import { ensureOperational } from '../admin/guards.js';
import type { Transaction } from '../concurrency/RecordContext.js';
import type { HashPowerSource } from '../equipment/BoxOpener.js';
import type { EquipmentRegistry } from '../equipment/EquipmentRegistry.js';
import { InvalidInputError } from '../errors/MiningError.js';
import { equipmentKey, minerKey, SALE_STATS_KEY, SUPPLY_KEY } from '../store/keys.js';
import type { SupplyLedger } from '../token/SupplyLedger.js';
import type { FungibleToken } from '../token/TokenLedger.js';
import type {
    BoxPurchaseResult,
    ControlState,
    Identity,
    PurchaseResult,
    PurchaseSplit,
    ReferralPayout,
    SaleConfig,
    SaleStats,
} from '../types/index.js';
import { BPS_DENOMINATOR, bpsOf } from '../utils/fixedPoint.js';
import { createLogger } from '../utils/logger.js';
import { assertTimestamp } from '../utils/timestamp.js';
import { generateId } from '../utils/uuid.js';
import type { ExchangeRateOracle } from './PriceOracle.js';
import type { ReferralGraph } from './ReferralGraph.js';

export function validateSaleConfig(config: SaleConfig): void {
    const isBps = (value: number): boolean =>
        Number.isSafeInteger(value) && value >= 0 && BigInt(value) <= BPS_DENOMINATOR;

    if (!isBps(config.burnRateBps)) {
        throw new InvalidInputError('burnRateBps must be an integer in [0, 10000]', { burnRateBps: config.burnRateBps });
    }
    if (!config.referralRatesBps.every(isBps)) {
        throw new InvalidInputError('Every referral rate must be an integer in [0, 10000]', {
            referralRatesBps: config.referralRatesBps,
        });
    }
    const total = config.referralRatesBps.reduce((sum, rate) => sum + rate, 0);
    if (BigInt(total) > BPS_DENOMINATOR) {
        throw new InvalidInputError('Referral rates must not add up to more than 10000 bps', { total });
    }
    if (config.referralRatesBps.length > config.maxReferralDepth) {
        throw new InvalidInputError('More referral rates than the maximum referral depth', {
            levels: config.referralRatesBps.length,
            maxReferralDepth: config.maxReferralDepth,
        });
    }
}

/**
 * Pure split of `tokenAmount` over the burn, the buyer's chain and the remainder.
 */
export function splitPurchase(tokenAmount: bigint, chain: Identity[], config: SaleConfig): PurchaseSplit {
    if (tokenAmount < 0n) {
        throw new InvalidInputError('Token amount must not be negative', { tokenAmount });
    }
    const burnAmount = bpsOf(tokenAmount, config.burnRateBps);
    const payable = tokenAmount - burnAmount;

    const payouts: ReferralPayout[] = [];
    let unpaidReferral = 0n;
    config.referralRatesBps.forEach((rate, index) => {
        const share = bpsOf(payable, rate);
        const referrer = chain[index];
        if (referrer === undefined) {
            unpaidReferral += share;
        } else {
            payouts.push({ level: index + 1, referrer, amount: share });
        }
    });

    const paid = payouts.reduce((sum, payout) => sum + payout.amount, 0n);
    return {
        tokenAmount,
        burnAmount,
        payouts,
        unpaidReferral,
        net: payable - paid - unpaidReferral,
    };
}

export function createSaleStats(): SaleStats {
    return {
        _id: SALE_STATS_KEY,
        kind: 'sale-stats',
        purchases: 0,
        boxesSold: 0,
        tokenVolume: 0n,
        burned: 0n,
        referralPaid: 0n,
        unpaidReferral: 0n,
    };
}

export interface SaleEngineOptions {
    config: SaleConfig;
    /** Price of one box in stable base units. */
    boxPriceStable: bigint;
    logger?: winston.Logger;
}

export interface BoxOptions {
    autoRegister?: boolean;
}

type SaleKind = 'tokens' | 'box';

export class SaleEngine {
    private readonly config: SaleConfig;
    private readonly boxPriceStable: bigint;
    private readonly logger: winston.Logger;

    constructor(
        private readonly supply: SupplyLedger,
        private readonly token: FungibleToken,
        private readonly oracle: ExchangeRateOracle,
        private readonly referrals: ReferralGraph,
        private readonly registry: EquipmentRegistry,
        private readonly boxes: HashPowerSource,
        options: SaleEngineOptions,
    ) {
        validateSaleConfig(options.config);
        if (options.config.maxReferralDepth !== referrals.maxDepth) {
            throw new InvalidInputError('Sale and referral graph disagree on the maximum referral depth', {
                sale: options.config.maxReferralDepth,
                graph: referrals.maxDepth,
            });
        }
        if (options.boxPriceStable <= 0n) {
            throw new InvalidInputError('Box price must be positive', { boxPriceStable: options.boxPriceStable });
        }
        this.config = options.config;
        this.boxPriceStable = options.boxPriceStable;
        this.logger = options.logger ?? createLogger('info', 'sale');
    }

    /**
     * Buy tokens with a stable amount. The net remainder goes to the buyer.
     */
    async purchase(buyer: Identity, stableAmountIn: bigint): Promise<PurchaseResult> {
        const tokenAmount = this.quoteTokens(buyer, stableAmountIn);

        const result = await this.referrals.withChain(buyer, [SUPPLY_KEY, SALE_STATS_KEY], async (tx, chain) => {
            const control = await ensureOperational(this.supply.context, buyer);
            return this.executeSale(tx, 'tokens', buyer, stableAmountIn, tokenAmount, chain, buyer, control);
        });
        this.logger.info('Purchase completed', {
            buyer,
            stableAmountIn,
            tokenAmount,
            burned: result.burnAmount,
            referrals: result.payouts.length,
            net: result.net,
        });
        return result;
    }

    /**
     * Buy an equipment box. The sale's net remainder goes to the treasury;
     * the buyer receives a freshly drawn, unregistered unit, registered in
     * the same step when `autoRegister` is set.
     */
    async buyBox(buyer: Identity, options: BoxOptions, now: number): Promise<BoxPurchaseResult> {
        assertTimestamp(now);
        const tokenAmount = this.quoteTokens(buyer, this.boxPriceStable);
        const equipmentId = this.registry.newEquipmentId();
        const draw = this.boxes.draw();

        const keys = [SUPPLY_KEY, SALE_STATS_KEY, equipmentKey(equipmentId)];
        if (options.autoRegister) keys.push(minerKey(buyer));

        const result = await this.referrals.withChain(buyer, keys, async (tx, chain) => {
            const control = await ensureOperational(this.supply.context, buyer);
            const sale = await this.executeSale(
                tx, 'box', buyer, this.boxPriceStable, tokenAmount, chain, control.treasury, control,
            );
            const created = await this.registry.createWithin(tx, equipmentId, buyer, draw, now);
            const equipment = options.autoRegister
                ? (await this.registry.registerWithin(tx, created, now)).equipment
                : created;
            return { sale, equipment, registered: equipment.active };
        });
        this.logger.info('Box sold', {
            buyer,
            equipmentId,
            tier: draw.tier,
            hashPower: draw.hashPower,
            registered: result.registered,
        });
        return result;
    }

    async getStats(): Promise<SaleStats> {
        return (await this.supply.context.read(SALE_STATS_KEY, 'sale-stats')) ?? createSaleStats();
    }

    private quoteTokens(buyer: Identity, stableAmountIn: bigint): bigint {
        if (stableAmountIn <= 0n) {
            throw new InvalidInputError('Purchase amount must be positive', { buyer, stableAmountIn });
        }
        const tokenAmount = this.oracle.quote(stableAmountIn);
        if (tokenAmount <= 0n) {
            throw new InvalidInputError('Purchase amount buys no tokens at the current rate', { buyer, stableAmountIn });
        }
        return tokenAmount;
    }

    /**
     * Stage the supply mint, the sale tallies and one token mint per recipient.
     */
    private async executeSale(
        tx: Transaction,
        kind: SaleKind,
        buyer: Identity,
        stableAmountIn: bigint,
        tokenAmount: bigint,
        chain: Identity[],
        netRecipient: Identity,
        control: ControlState,
    ): Promise<PurchaseResult> {
        const split = splitPurchase(tokenAmount, chain, this.config);
        const unpaidRecipient = this.config.unpaidReferralTo === 'buyer' ? buyer : control.treasury;
        const minted = split.tokenAmount - split.burnAmount;
        await this.supply.mintWithin(tx, minted);

        const saleId = generateId();
        const credits: Array<[Identity, bigint, string]> = [
            ...split.payouts.map((p): [Identity, bigint, string] => [p.referrer, p.amount, `referral-l${p.level}`]),
            [unpaidRecipient, split.unpaidReferral, 'unpaid-referral'],
            [netRecipient, split.net, kind === 'box' ? 'box-proceeds' : 'purchase'],
        ];
        for (const [recipient, amount, label] of credits) {
            if (amount === 0n) continue;
            const memo = `sale:${saleId}:${label}`;
            tx.effect({
                name: memo,
                run: async () => { await this.token.mint(recipient, amount, memo); },
                undo: async () => { await this.token.burn(recipient, amount, `revert-${memo}`); },
            });
        }

        const stats = (await tx.read(SALE_STATS_KEY, 'sale-stats')) ?? createSaleStats();
        const paid = split.payouts.reduce((sum, payout) => sum + payout.amount, 0n);
        tx.put({
            ...stats,
            purchases: stats.purchases + (kind === 'tokens' ? 1 : 0),
            boxesSold: stats.boxesSold + (kind === 'box' ? 1 : 0),
            tokenVolume: stats.tokenVolume + split.tokenAmount,
            burned: stats.burned + split.burnAmount,
            referralPaid: stats.referralPaid + paid,
            unpaidReferral: stats.unpaidReferral + split.unpaidReferral,
        });

        return { ...split, buyer, stableAmountIn, netRecipient, unpaidRecipient };
    }
}
