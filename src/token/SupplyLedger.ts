/**
 * SupplyLedger: minted/burned totals against the immutable cap.
 *
 * One well-known record (`supply`). Every minting path in the engine goes
 * through `mintWithin` inside its own transaction, so the cap check and the
 * total update are a single step relative to every other mint or burn.
 *
 * Invariant: 0 ≤ totalMinted − totalBurned ≤ cap.
 */

import type winston from 'winston';
import {
    InsufficientBurnableError,
    InvalidInputError,
    MiningError,
    SupplyCapExceededError,
} from '../errors/MiningError.js';
import type { RecordContext, Transaction } from '../concurrency/RecordContext.js';
import { SUPPLY_KEY } from '../store/keys.js';
import type { SupplyRecord } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

export const DEFAULT_SUPPLY_CAP_TOKENS = 27_000_000n;

export function supplyCap(decimals: number, wholeTokens: bigint = DEFAULT_SUPPLY_CAP_TOKENS): bigint {
    return wholeTokens * 10n ** BigInt(decimals);
}

export function createSupplyRecord(cap: bigint): SupplyRecord {
    if (cap <= 0n) {
        throw new InvalidInputError('Supply cap must be positive', { cap });
    }
    return { _id: SUPPLY_KEY, kind: 'supply', cap, totalMinted: 0n, totalBurned: 0n };
}

export function circulating(record: SupplyRecord): bigint {
    return record.totalMinted - record.totalBurned;
}

export function headroom(record: SupplyRecord): bigint {
    return record.cap - circulating(record);
}

/**
 * All-or-nothing: either the whole amount fits under the cap or nothing changes.
 */
export function applyMint(record: SupplyRecord, amount: bigint): SupplyRecord {
    if (amount < 0n) {
        throw new InvalidInputError(`Mint amount must not be negative, got ${amount}`, { amount });
    }
    const room = headroom(record);
    if (amount > room) {
        throw new SupplyCapExceededError(amount, room);
    }
    return { ...record, totalMinted: record.totalMinted + amount };
}

export function applyBurn(record: SupplyRecord, amount: bigint): SupplyRecord {
    if (amount < 0n) {
        throw new InvalidInputError(`Burn amount must not be negative, got ${amount}`, { amount });
    }
    const available = circulating(record);
    if (amount > available) {
        throw new InsufficientBurnableError(amount, available);
    }
    return { ...record, totalBurned: record.totalBurned + amount };
}

export class SupplyLedger {
    constructor(
        readonly context: RecordContext,
        private readonly logger: winston.Logger = createLogger('info', 'supply'),
    ) { }

    /**
     * Create the supply record on first start. Later starts must agree on the cap.
     */
    async initialize(cap: bigint): Promise<SupplyRecord> {
        return this.context.transact([SUPPLY_KEY], async (tx) => {
            const existing = await tx.read(SUPPLY_KEY, 'supply');
            if (existing) {
                if (existing.cap !== cap) {
                    throw new InvalidInputError('Configured supply cap differs from the persisted cap', {
                        configured: cap,
                        persisted: existing.cap,
                    });
                }
                return existing;
            }
            const record = createSupplyRecord(cap);
            tx.put(record);
            this.logger.info('Supply ledger initialized', { cap });
            return record;
        });
    }

    /**
     * Standalone bookkeeping mint. Returns the minted amount.
     * @throws SupplyCapExceededError when the amount does not fit the remaining headroom
     */
    async mint(amount: bigint): Promise<bigint> {
        return this.context.transact([SUPPLY_KEY], async (tx) => {
            await this.mintWithin(tx, amount);
            return amount;
        });
    }

    /**
     * @throws InsufficientBurnableError when the amount exceeds circulating supply
     */
    async burn(amount: bigint): Promise<void> {
        await this.context.transact([SUPPLY_KEY], async (tx) => {
            await this.burnWithin(tx, amount);
        });
    }

    async mintWithin(tx: Transaction, amount: bigint): Promise<SupplyRecord> {
        const current = await this.load(tx);
        const next = applyMint(current, amount);
        tx.put(next);
        this.logger.debug('Supply minted', { amount, totalMinted: next.totalMinted });
        return next;
    }

    async burnWithin(tx: Transaction, amount: bigint): Promise<SupplyRecord> {
        const current = await this.load(tx);
        const next = applyBurn(current, amount);
        tx.put(next);
        this.logger.debug('Supply burned', { amount, totalBurned: next.totalBurned });
        return next;
    }

    async load(tx: Transaction): Promise<SupplyRecord> {
        return tx.require(SUPPLY_KEY, 'supply', () => new MiningError(
            'CORRUPT_RECORD',
            'Supply ledger is not initialized',
            { key: SUPPLY_KEY },
        ));
    }

    async snapshot(): Promise<SupplyRecord> {
        const record = await this.context.read(SUPPLY_KEY, 'supply');
        if (!record) {
            throw new MiningError('CORRUPT_RECORD', 'Supply ledger is not initialized', { key: SUPPLY_KEY });
        }
        return record;
    }
}
