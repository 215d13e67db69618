/**
 * RecordContext: the only path through which engine components mutate records.
 *
 * `transact(keys, work)` locks the named records, lets `work` stage reads,
 * writes and external effects on a Transaction, then:
 *   1. commits every staged write as one atomic batch,
 *   2. runs the external effects (token mint/burn, NFT calls) in order,
 *   3. on an effect failure, undoes the completed effects in reverse and
 *      restores the pre-transaction images before rethrowing.
 * Locks are held until all three steps finish, so no other caller observes
 * an intermediate state.
 */

import type winston from 'winston';
import {
    CompensationFailedError,
    CorruptRecordError,
    describeError,
} from '../errors/MiningError.js';
import type { RecordBatch, RecordStore } from '../store/RecordStore.js';
import type { LedgerRecord, LedgerRecordKind, RecordOfKind } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { KeyedMutex } from './KeyedMutex.js';

export interface TransactionEffect {
    name: string;
    run(): Promise<void>;
    undo?: () => Promise<void>;
}

export function isRecordOfKind<K extends LedgerRecordKind>(
    record: LedgerRecord,
    kind: K,
): record is RecordOfKind<K> {
    return record.kind === kind;
}

export class Transaction {
    /** Staged writes; `null` marks a delete. */
    private readonly staged = new Map<string, LedgerRecord | null>();
    private readonly effects: TransactionEffect[] = [];

    constructor(
        private readonly store: RecordStore<LedgerRecord>,
        private readonly held: ReadonlySet<string>,
    ) { }

    /**
     * Read a record as this transaction currently sees it.
     * @throws CorruptRecordError if the key holds a different kind of record
     */
    async read<K extends LedgerRecordKind>(key: string, kind: K): Promise<RecordOfKind<K> | null> {
        const record = this.staged.has(key)
            ? this.staged.get(key) ?? null
            : await this.store.get(key);
        if (!record) return null;
        if (!isRecordOfKind(record, kind)) {
            throw new CorruptRecordError(key, kind, record.kind);
        }
        return structuredClone(record);
    }

    /**
     * Like `read`, but a missing record is an error built by `onMissing`.
     */
    async require<K extends LedgerRecordKind>(
        key: string,
        kind: K,
        onMissing: () => Error,
    ): Promise<RecordOfKind<K>> {
        const record = await this.read(key, kind);
        if (!record) throw onMissing();
        return record;
    }

    put(record: LedgerRecord): void {
        this.assertHeld(record._id);
        this.staged.set(record._id, structuredClone(record));
    }

    delete(key: string): void {
        this.assertHeld(key);
        this.staged.set(key, null);
    }

    /**
     * Queue an external call to run after the staged writes are committed.
     */
    effect(effect: TransactionEffect): void {
        this.effects.push(effect);
    }

    get pendingEffects(): readonly TransactionEffect[] {
        return this.effects;
    }

    batch(): RecordBatch<LedgerRecord> {
        const puts: LedgerRecord[] = [];
        const deletes: string[] = [];
        for (const [key, record] of this.staged) {
            if (record) puts.push(record);
            else deletes.push(key);
        }
        return { puts, deletes };
    }

    /**
     * Batch that puts every staged key back the way the store holds it now.
     * Must be taken before `batch()` is committed.
     */
    async undoBatch(): Promise<RecordBatch<LedgerRecord>> {
        const puts: LedgerRecord[] = [];
        const deletes: string[] = [];
        for (const key of this.staged.keys()) {
            const original = await this.store.get(key);
            if (original) puts.push(original);
            else deletes.push(key);
        }
        return { puts, deletes };
    }

    private assertHeld(key: string): void {
        if (!this.held.has(key)) {
            throw new Error(`Write to record "${key}" outside the transaction's lock set`);
        }
    }
}

export class RecordContext {
    constructor(
        readonly store: RecordStore<LedgerRecord>,
        private readonly mutex: KeyedMutex = new KeyedMutex(),
        private readonly logger: winston.Logger = createLogger('info', 'store'),
    ) { }

    async transact<T>(keys: Iterable<string>, work: (tx: Transaction) => Promise<T>): Promise<T> {
        const held = new Set(keys);
        const release = await this.mutex.acquire(held);
        try {
            const tx = new Transaction(this.store, held);
            const result = await work(tx);
            await this.commit(tx);
            return result;
        } finally {
            release();
        }
    }

    /**
     * Unlocked point-in-time read, for queries only.
     */
    async read<K extends LedgerRecordKind>(key: string, kind: K): Promise<RecordOfKind<K> | null> {
        const record = await this.store.get(key);
        if (!record) return null;
        if (!isRecordOfKind(record, kind)) {
            throw new CorruptRecordError(key, kind, record.kind);
        }
        return record;
    }

    isLocked(key: string): boolean {
        return this.mutex.isLocked(key);
    }

    private async commit(tx: Transaction): Promise<void> {
        const undo = await tx.undoBatch();
        const batch = tx.batch();
        if (batch.puts.length > 0 || batch.deletes.length > 0) {
            await this.store.commit(batch);
        }

        const completed: TransactionEffect[] = [];
        try {
            for (const effect of tx.pendingEffects) {
                await effect.run();
                completed.push(effect);
            }
        } catch (error) {
            this.logger.warn('Effect failed, compensating', {
                failed: tx.pendingEffects[completed.length]?.name,
                completed: completed.map((e) => e.name),
                error: describeError(error),
            });
            const failures: unknown[] = [];
            for (const effect of completed.reverse()) {
                if (!effect.undo) continue;
                try {
                    await effect.undo();
                } catch (undoError) {
                    this.logger.error('Compensation step failed', { effect: effect.name, error: describeError(undoError) });
                    failures.push(undoError);
                }
            }
            try {
                await this.store.commit(undo);
            } catch (restoreError) {
                this.logger.error('Record restore failed', { error: describeError(restoreError) });
                failures.push(restoreError);
            }
            if (failures.length > 0) {
                throw new CompensationFailedError(error, failures);
            }
            throw error;
        }
    }
}
