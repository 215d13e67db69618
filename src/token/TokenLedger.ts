/**
 * TokenLedger: in-process fungible token primitive.
 *
 * Stands in for the host runtime's token program: per-holder balances with a
 * transaction history. Each mint or burn is atomic for its holder. Supply
 * accounting and the cap live in the SupplyLedger, not here.
 */

import { InsufficientBalanceError, InvalidInputError } from '../errors/MiningError.js';
import { KeyedMutex } from '../concurrency/KeyedMutex.js';
import { InMemoryStore } from '../store/RecordStore.js';
import type { RecordStore } from '../store/RecordStore.js';
import type { Identity } from '../types/index.js';
import { generateId } from '../utils/uuid.js';

export type TransactionType = 'mint' | 'burn';

export interface TokenTransaction {
    txId: string;
    holder: Identity;
    amount: bigint;
    type: TransactionType;
    timestamp: number;
    memo: string;
}

export interface BalanceEntry {
    _id: string;
    balance: bigint;
    transactions: TokenTransaction[];
}

/**
 * Contract the engine consumes. Both calls either apply in full or throw.
 */
export interface FungibleToken {
    mint(to: Identity, amount: bigint, memo: string): Promise<TokenTransaction>;
    burn(from: Identity, amount: bigint, memo: string): Promise<TokenTransaction>;
    balanceOf(holder: Identity): Promise<bigint>;
}

export class TokenLedger implements FungibleToken {
    private readonly locks = new KeyedMutex();

    constructor(
        private readonly store: RecordStore<BalanceEntry> = new InMemoryStore<BalanceEntry>(),
        private readonly clock: () => number = Date.now,
    ) { }

    /**
     * Credit newly minted tokens to a holder.
     */
    async mint(to: Identity, amount: bigint, memo: string): Promise<TokenTransaction> {
        this.assertPositive(amount);
        return this.withHolder(to, async (entry) => {
            const tx = this.record(to, amount, 'mint', memo);
            entry.balance += amount;
            entry.transactions.push(tx);
            return tx;
        });
    }

    /**
     * Destroy tokens held by `from`. Throws if the holder lacks the balance.
     */
    async burn(from: Identity, amount: bigint, memo: string): Promise<TokenTransaction> {
        this.assertPositive(amount);
        return this.withHolder(from, async (entry) => {
            if (entry.balance < amount) {
                throw new InsufficientBalanceError(from, entry.balance, amount);
            }
            const tx = this.record(from, amount, 'burn', memo);
            entry.balance -= amount;
            entry.transactions.push(tx);
            return tx;
        });
    }

    async balanceOf(holder: Identity): Promise<bigint> {
        const entry = await this.store.get(holder);
        return entry ? entry.balance : 0n;
    }

    async getTransactionHistory(holder: Identity): Promise<TokenTransaction[]> {
        const entry = await this.store.get(holder);
        return entry ? entry.transactions : [];
    }

    private async withHolder<T>(holder: Identity, apply: (entry: BalanceEntry) => Promise<T>): Promise<T> {
        const release = await this.locks.acquire([holder]);
        try {
            const entry = (await this.store.get(holder)) ?? { _id: holder, balance: 0n, transactions: [] };
            const result = await apply(entry);
            await this.store.put(entry);
            return result;
        } finally {
            release();
        }
    }

    private record(holder: Identity, amount: bigint, type: TransactionType, memo: string): TokenTransaction {
        return {
            txId: `tx-${type}-${generateId()}`,
            holder,
            amount,
            type,
            timestamp: this.clock(),
            memo,
        };
    }

    private assertPositive(amount: bigint): void {
        if (amount <= 0n) {
            throw new InvalidInputError(`Token amount must be positive, got ${amount}`, { amount });
        }
    }
}
