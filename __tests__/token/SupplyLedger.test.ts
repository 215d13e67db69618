/**
 * SupplyLedger
 *
 * 1. Cap derived from decimals
 * 2. Mint and burn bookkeeping
 * 3. All-or-nothing cap check, also under concurrent callers
 * 4. Persisted cap must match the configured one
 */
import { RecordContext } from '../../src/concurrency/RecordContext.js';
import {
    InsufficientBurnableError,
    InvalidInputError,
    SupplyCapExceededError,
} from '../../src/errors/MiningError.js';
import { InMemoryStore } from '../../src/store/RecordStore.js';
import {
    applyBurn,
    applyMint,
    circulating,
    createSupplyRecord,
    headroom,
    SupplyLedger,
    supplyCap,
} from '../../src/token/SupplyLedger.js';
import type { LedgerRecord } from '../../src/types/index.js';

async function createLedger(cap: bigint): Promise<SupplyLedger> {
    const ledger = new SupplyLedger(new RecordContext(new InMemoryStore<LedgerRecord>()));
    await ledger.initialize(cap);
    return ledger;
}

describe('SupplyLedger', () => {

    test('cap is 27M whole tokens in base units', () => {
        expect(supplyCap(9)).toBe(27_000_000_000_000_000n);
        expect(supplyCap(0)).toBe(27_000_000n);
        expect(supplyCap(2, 5n)).toBe(500n);
    });

    test('pure helpers track circulating supply and headroom', () => {
        let record = createSupplyRecord(1000n);
        record = applyMint(record, 600n);
        record = applyBurn(record, 100n);
        expect(circulating(record)).toBe(500n);
        expect(headroom(record)).toBe(500n);
        expect(() => createSupplyRecord(0n)).toThrow(InvalidInputError);
    });

    test('mint returns the amount and burn frees headroom', async () => {
        const ledger = await createLedger(1000n);

        expect(await ledger.mint(400n)).toBe(400n);
        await ledger.burn(150n);

        const snapshot = await ledger.snapshot();
        expect(snapshot.totalMinted).toBe(400n);
        expect(snapshot.totalBurned).toBe(150n);
        expect(headroom(snapshot)).toBe(750n);
    });

    test('a mint reaching cap + 1 fails entirely and leaves totals unchanged', async () => {
        const ledger = await createLedger(1000n);
        await ledger.mint(900n);

        await expect(ledger.mint(101n)).rejects.toBeInstanceOf(SupplyCapExceededError);

        const snapshot = await ledger.snapshot();
        expect(snapshot.totalMinted).toBe(900n);
        expect(await ledger.mint(100n)).toBe(100n);
    });

    test('cap errors report the remaining headroom and are retryable', async () => {
        const ledger = await createLedger(10n);
        const error = await ledger.mint(11n).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(SupplyCapExceededError);
        if (error instanceof SupplyCapExceededError) {
            expect(error.code).toBe('SUPPLY_CAP_EXCEEDED');
            expect(error.retryable).toBe(true);
            expect(error.details).toEqual({ requested: 11n, headroom: 10n });
        }
    });

    test('burning more than circulating supply fails', async () => {
        const ledger = await createLedger(1000n);
        await ledger.mint(50n);

        await expect(ledger.burn(51n)).rejects.toBeInstanceOf(InsufficientBurnableError);
        expect((await ledger.snapshot()).totalBurned).toBe(0n);
    });

    test('negative amounts are rejected', async () => {
        const ledger = await createLedger(1000n);
        await expect(ledger.mint(-1n)).rejects.toBeInstanceOf(InvalidInputError);
        await expect(ledger.burn(-1n)).rejects.toBeInstanceOf(InvalidInputError);
    });

    test('two concurrent mints that jointly exceed the cap: exactly one succeeds', async () => {
        const ledger = await createLedger(1000n);

        const results = await Promise.allSettled([ledger.mint(600n), ledger.mint(600n)]);

        expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
        const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
        expect(rejected).toHaveLength(1);
        expect(rejected[0].reason).toBeInstanceOf(SupplyCapExceededError);
        expect((await ledger.snapshot()).totalMinted).toBe(600n);
    });

    test('cap invariant holds across a mixed sequence', async () => {
        const ledger = await createLedger(500n);
        const amounts = [120n, 300n, 90n, 200n, 80n, 10n];
        for (const [index, amount] of amounts.entries()) {
            if (index % 2 === 0) {
                await ledger.mint(amount).catch(() => 0n);
            } else {
                await ledger.burn(amount).catch(() => undefined);
            }
            const snapshot = await ledger.snapshot();
            expect(circulating(snapshot) <= snapshot.cap).toBe(true);
            expect(circulating(snapshot) >= 0n).toBe(true);
        }
    });

    test('initialize keeps the persisted record and rejects a different cap', async () => {
        const context = new RecordContext(new InMemoryStore<LedgerRecord>());
        const ledger = new SupplyLedger(context);
        await ledger.initialize(1000n);
        await ledger.mint(10n);

        const again = await ledger.initialize(1000n);
        expect(again.totalMinted).toBe(10n);
        await expect(ledger.initialize(2000n)).rejects.toBeInstanceOf(InvalidInputError);
    });

    test('snapshot before initialization is a corrupt-record error', async () => {
        const ledger = new SupplyLedger(new RecordContext(new InMemoryStore<LedgerRecord>()));
        await expect(ledger.snapshot()).rejects.toMatchObject({ code: 'CORRUPT_RECORD' });
    });
});
