import type winston from 'winston';
import { AdminControl } from '../admin/AdminControl.js';
import { KeyedMutex } from '../concurrency/KeyedMutex.js';
import { RecordContext } from '../concurrency/RecordContext.js';
import {
    boxPriceOf,
    claimLimitsOf,
    DEFAULT_CONFIG,
    supplyCapOf,
} from '../config/EngineConfig.js';
import type { EngineConfig } from '../config/EngineConfig.js';
import { WeightedBoxSource } from '../equipment/BoxOpener.js';
import type { HashPowerSource } from '../equipment/BoxOpener.js';
import { EquipmentNft } from '../equipment/EquipmentNft.js';
import type { NonFungibleAsset } from '../equipment/EquipmentNft.js';
import { EquipmentRegistry } from '../equipment/EquipmentRegistry.js';
import type { RegistrationChange } from '../equipment/EquipmentRegistry.js';
import { describeError, isMiningError } from '../errors/MiningError.js';
import { FixedRateOracle } from '../sale/PriceOracle.js';
import type { ExchangeRateOracle } from '../sale/PriceOracle.js';
import { ReferralGraph } from '../sale/ReferralGraph.js';
import { SaleEngine } from '../sale/SaleEngine.js';
import type { BoxOptions } from '../sale/SaleEngine.js';
import { JsonFileStore } from '../store/JsonFileStore.js';
import { parseBalanceEntry, parseLedgerRecord } from '../store/recordSchema.js';
import { InMemoryStore } from '../store/RecordStore.js';
import type { RecordStore } from '../store/RecordStore.js';
import { HalvingSchedule } from '../token/HalvingSchedule.js';
import type { EpochInfo } from '../token/HalvingSchedule.js';
import { RewardEngine } from '../token/RewardEngine.js';
import { SupplyLedger } from '../token/SupplyLedger.js';
import { TokenLedger } from '../token/TokenLedger.js';
import type { FungibleToken } from '../token/TokenLedger.js';
import type {
    AdminActionType,
    BoxPurchaseResult,
    ClaimResult,
    ControlState,
    Equipment,
    Identity,
    LedgerRecord,
    MinerAccount,
    PendingAdminAction,
    PurchaseResult,
    ReferralLink,
    SaleStats,
    SettlementResult,
    SupplyRecord,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { nowSeconds } from '../utils/timestamp.js';
import { MiningEventBus } from './MiningEventBus.js';

/** Collaborators that can be swapped out, mostly by tests. */
export interface EngineDependencies {
    store?: RecordStore<LedgerRecord>;
    token?: FungibleToken;
    nft?: NonFungibleAsset;
    oracle?: ExchangeRateOracle;
    boxSource?: HashPowerSource;
    /** Current time in unix seconds */
    clock?: () => number;
    logger?: winston.Logger;
}

/**
 * MiningEngine: wires the ledgers, the reward engine, the equipment registry,
 * the sale logic and the admin controls into one object.
 *
 * Every entry point that depends on time takes an optional `now`; without it
 * the engine clock is used. Events fire only after an operation, external
 * effects included, has fully succeeded.
 */
export class MiningEngine {
    readonly events = new MiningEventBus();

    private constructor(
        readonly config: EngineConfig,
        readonly context: RecordContext,
        readonly supply: SupplyLedger,
        readonly schedule: HalvingSchedule,
        readonly rewards: RewardEngine,
        readonly registry: EquipmentRegistry,
        readonly referrals: ReferralGraph,
        readonly sales: SaleEngine,
        readonly admin: AdminControl,
        readonly token: FungibleToken,
        private readonly clock: () => number,
        private readonly logger: winston.Logger,
    ) { }

    /**
     * Factory: builds every component and initializes the well-known records.
     */
    static async create(config: EngineConfig = DEFAULT_CONFIG, deps: EngineDependencies = {}): Promise<MiningEngine> {
        const level = config.logLevel;
        const logger = deps.logger ?? createLogger(level, 'engine');

        // 1. Records and balances
        const store = deps.store ?? (config.dataFile
            ? await JsonFileStore.open(config.dataFile, parseLedgerRecord, createLogger(level, 'store'))
            : new InMemoryStore<LedgerRecord>());
        const token = deps.token ?? new TokenLedger(config.dataFile
            ? await JsonFileStore.open(balanceFileFor(config.dataFile), parseBalanceEntry, createLogger(level, 'store'))
            : undefined);
        const context = new RecordContext(store, new KeyedMutex(), createLogger(level, 'store'));

        // 2. Supply and schedule
        const supply = new SupplyLedger(context, createLogger(level, 'supply'));
        await supply.initialize(supplyCapOf(config));
        const schedule = new HalvingSchedule(config.schedule);

        // 3. Control plane
        const admin = new AdminControl(context, supply, token, {
            actionDelaySeconds: config.adminActionDelaySeconds,
            logger: createLogger(level, 'admin'),
        });
        await admin.initialize(config.admin, config.treasury);

        // 4. Rewards and equipment
        const rewards = new RewardEngine(context, schedule, supply, token, {
            claimLimits: claimLimitsOf(config),
            logger: createLogger(level, 'reward'),
        });
        const registry = new EquipmentRegistry(
            context,
            schedule,
            deps.nft ?? new EquipmentNft(),
            createLogger(level, 'registry'),
        );

        // 5. Sales
        const referrals = new ReferralGraph(context, config.sale.maxReferralDepth, createLogger(level, 'referral'));
        const oracle = deps.oracle ?? new FixedRateOracle({
            tokensPerStable: config.sale.tokensPerStable,
            tokenDecimals: config.tokenDecimals,
            stableDecimals: config.stableDecimals,
        });
        const sales = new SaleEngine(
            supply,
            token,
            oracle,
            referrals,
            registry,
            deps.boxSource ?? new WeightedBoxSource(config.boxes),
            {
                config: config.sale,
                boxPriceStable: boxPriceOf(config),
                logger: createLogger(level, 'sale'),
            },
        );

        logger.info('Mining engine ready', {
            token: config.tokenSymbol,
            cap: supplyCapOf(config),
            genesisTime: config.schedule.genesisTime,
            persistent: config.dataFile !== null,
        });

        return new MiningEngine(
            config,
            context,
            supply,
            schedule,
            rewards,
            registry,
            referrals,
            sales,
            admin,
            token,
            deps.clock ?? nowSeconds,
            logger,
        );
    }

    now(): number {
        return this.clock();
    }

    // ── Rewards ──────────────────────────────────────────────

    async settle(owner: Identity, now: number = this.now()): Promise<SettlementResult> {
        const result = await this.track('settle', () => this.rewards.settle(owner, now));
        this.events.emit('reward:settled', result);
        return result;
    }

    async claim(owner: Identity, now: number = this.now()): Promise<ClaimResult> {
        const result = await this.track('claim', () => this.rewards.claim(owner, now));
        if (result.minted > 0n) {
            this.events.emit('supply:minted', owner, result.minted, 'claim');
        }
        this.events.emit('reward:claimed', result);
        return result;
    }

    // ── Equipment ────────────────────────────────────────────

    async register(equipmentId: string, caller: Identity, now: number = this.now()): Promise<RegistrationChange> {
        const change = await this.track('register', () => this.registry.register(equipmentId, caller, now));
        this.events.emit('equipment:registered', change.equipment, change.miner);
        return change;
    }

    async deregister(equipmentId: string, caller: Identity, now: number = this.now()): Promise<RegistrationChange> {
        const change = await this.track('deregister', () => this.registry.deregister(equipmentId, caller, now));
        this.events.emit('equipment:deregistered', change.equipment, change.miner);
        return change;
    }

    async transfer(equipmentId: string, from: Identity, to: Identity): Promise<Equipment> {
        const equipment = await this.track('transfer', () => this.registry.transfer(equipmentId, from, to));
        this.events.emit('equipment:transferred', equipment, from);
        return equipment;
    }

    async retire(equipmentId: string, caller: Identity, now: number = this.now()): Promise<void> {
        const change = await this.track('retire', () => this.registry.retire(equipmentId, caller, now));
        if (change) {
            this.events.emit('equipment:deregistered', change.equipment, change.miner);
        }
        this.events.emit('equipment:retired', equipmentId, caller);
    }

    // ── Sales ────────────────────────────────────────────────

    async setReferrer(referred: Identity, referrer: Identity, now: number = this.now()): Promise<ReferralLink> {
        const link = await this.track('setReferrer', () => this.referrals.setReferrer(referred, referrer, now));
        this.events.emit('referral:linked', link);
        return link;
    }

    async purchase(buyer: Identity, stableAmountIn: bigint): Promise<PurchaseResult> {
        const result = await this.track('purchase', () => this.sales.purchase(buyer, stableAmountIn));
        this.emitSale(result);
        return result;
    }

    async buyBox(buyer: Identity, options: BoxOptions = {}, now: number = this.now()): Promise<BoxPurchaseResult> {
        const result = await this.track('buyBox', () => this.sales.buyBox(buyer, options, now));
        this.emitSale(result.sale);
        this.events.emit('equipment:created', result.equipment);
        if (result.registered) {
            const miner = await this.rewards.getMiner(buyer);
            if (miner) this.events.emit('equipment:registered', result.equipment, miner);
        }
        return result;
    }

    // ── Admin ────────────────────────────────────────────────

    async pause(admin: Identity, reason: string): Promise<ControlState> {
        const control = await this.track('pause', () => this.admin.pause(admin, reason));
        this.events.emit('security', 'pause', admin, reason);
        this.events.emit('admin:action', admin, 'pause', reason);
        return control;
    }

    async addToBlacklist(admin: Identity, identity: Identity): Promise<boolean> {
        const changed = await this.track('addToBlacklist', () => this.admin.addToBlacklist(admin, identity));
        if (changed) {
            this.events.emit('security', 'blacklist-add', identity, `blacklisted by ${admin}`);
            this.events.emit('admin:action', admin, 'blacklist-add', identity);
        }
        return changed;
    }

    async removeFromBlacklist(admin: Identity, identity: Identity): Promise<boolean> {
        const changed = await this.track('removeFromBlacklist', () => this.admin.removeFromBlacklist(admin, identity));
        if (changed) {
            this.events.emit('security', 'blacklist-remove', identity, `removed by ${admin}`);
            this.events.emit('admin:action', admin, 'blacklist-remove', identity);
        }
        return changed;
    }

    async requestAdminAction(
        admin: Identity,
        action: AdminActionType,
        newValue: string = '',
        now: number = this.now(),
    ): Promise<PendingAdminAction> {
        const pending = await this.track('requestAdminAction', () =>
            this.admin.requestAdminAction(admin, action, newValue, now));
        this.events.emit('admin:action', admin, `request-${action}`, pending.newValue);
        return pending;
    }

    async executeAdminAction(admin: Identity, now: number = this.now()): Promise<PendingAdminAction> {
        const executed = await this.track('executeAdminAction', () => this.admin.executeAdminAction(admin, now));
        this.events.emit('admin:action', admin, `execute-${executed.action}`, executed.newValue);
        if (executed.action === 'resume') {
            this.events.emit('security', 'resume', admin, 'timelocked resume executed');
        }
        return executed;
    }

    async adminMint(admin: Identity, to: Identity, amount: bigint): Promise<bigint> {
        const minted = await this.track('adminMint', () => this.admin.adminMint(admin, to, amount));
        this.events.emit('supply:minted', to, minted, 'admin-mint');
        this.events.emit('admin:action', admin, 'mint', `${minted} to ${to}`);
        return minted;
    }

    async burnTokens(holder: Identity, amount: bigint, description: string): Promise<bigint> {
        const burned = await this.track('burnTokens', () => this.admin.burnTokens(holder, amount, description));
        this.events.emit('supply:burned', holder, burned, description);
        return burned;
    }

    // ── Queries ──────────────────────────────────────────────

    async getSupply(): Promise<SupplyRecord> {
        return this.supply.snapshot();
    }

    async getMiner(owner: Identity): Promise<MinerAccount | null> {
        return this.rewards.getMiner(owner);
    }

    async previewReward(owner: Identity, now: number = this.now()): Promise<SettlementResult> {
        return this.rewards.preview(owner, now);
    }

    async getEquipment(equipmentId: string): Promise<Equipment | null> {
        return this.registry.getEquipment(equipmentId);
    }

    async getSaleStats(): Promise<SaleStats> {
        return this.sales.getStats();
    }

    async getControl(): Promise<ControlState> {
        return this.admin.getControl();
    }

    async getPendingAction(admin: Identity): Promise<PendingAdminAction | null> {
        return this.admin.getPendingAction(admin);
    }

    async referrerOf(identity: Identity): Promise<Identity | null> {
        return this.referrals.referrerOf(identity);
    }

    async chainOf(identity: Identity): Promise<Identity[]> {
        return this.referrals.chainOf(identity);
    }

    async balanceOf(holder: Identity): Promise<bigint> {
        return this.token.balanceOf(holder);
    }

    scheduleTable(epochs: number): EpochInfo[] {
        return this.schedule.describe(epochs);
    }

    /**
     * Detach listeners. Records are already durable after every commit.
     */
    async shutdown(): Promise<void> {
        this.events.removeAllListeners();
        this.logger.info('Mining engine stopped');
    }

    private emitSale(result: PurchaseResult): void {
        const minted = result.tokenAmount - result.burnAmount;
        if (minted > 0n) {
            this.events.emit('supply:minted', result.netRecipient, minted, 'sale');
        }
        this.events.emit('sale:completed', result);
    }

    /**
     * Run an operation and log its rejection with the error code.
     */
    private async track<T>(operation: string, run: () => Promise<T>): Promise<T> {
        try {
            return await run();
        } catch (error) {
            if (isMiningError(error)) {
                this.logger.warn(`${operation} rejected`, { code: error.code, error: error.message });
            } else {
                this.logger.error(`${operation} failed`, { error: describeError(error) });
            }
            throw error;
        }
    }
}

export function balanceFileFor(dataFile: string): string {
    return dataFile.endsWith('.json')
        ? `${dataFile.slice(0, -'.json'.length)}.balances.json`
        : `${dataFile}.balances.json`;
}
