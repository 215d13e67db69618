/**
 * AdminControl
 *
 * 1. Pause is immediate; resume waits out the timelock
 * 2. Only the current admin may act; a changed admin takes over
 * 3. Blacklisted identities are refused; the list is editable while paused
 * 4. Admin mints respect the cap; burns restore the supply on a short balance
 */
import {
    BlacklistedError,
    InsufficientBalanceError,
    InsufficientBurnableError,
    InvalidInputError,
    NoPendingActionError,
    SupplyCapExceededError,
    SystemPausedError,
    TimelockPendingError,
    UnauthorizedError,
} from '../../src/errors/MiningError.js';
import { createTestEngine } from '../support/fixtures.js';

const DAY = 86_400;

describe('AdminControl', () => {

    test('pause stops mutating operations until a timelocked resume executes', async () => {
        const engine = await createTestEngine();
        await engine.pause('admin', 'incident 7');

        await expect(engine.purchase('buyer', 10n)).rejects.toBeInstanceOf(SystemPausedError);
        await expect(engine.setReferrer('b', 'a', 0)).rejects.toThrow('incident 7');

        await engine.requestAdminAction('admin', 'resume', '', 100);
        await expect(engine.executeAdminAction('admin', 100 + DAY - 1)).rejects.toBeInstanceOf(TimelockPendingError);

        const executed = await engine.executeAdminAction('admin', 100 + DAY);
        expect(executed).toMatchObject({ action: 'resume', executed: true });
        expect(await engine.getControl()).toEqual({
            _id: 'control', kind: 'control', admin: 'admin', treasury: 'treasury', paused: false, blacklist: [],
        });
        await expect(engine.purchase('buyer', 10n)).resolves.toMatchObject({ tokenAmount: 100n });
    });

    test('an executed action cannot run twice', async () => {
        const engine = await createTestEngine();
        await expect(engine.executeAdminAction('admin', 0)).rejects.toBeInstanceOf(NoPendingActionError);

        await engine.requestAdminAction('admin', 'change-treasury', 'vault', 0);
        await engine.executeAdminAction('admin', DAY);
        await expect(engine.executeAdminAction('admin', 2 * DAY)).rejects.toBeInstanceOf(NoPendingActionError);
        expect((await engine.getControl()).treasury).toBe('vault');
    });

    test('a new request replaces the pending one and restarts its clock', async () => {
        const engine = await createTestEngine();
        await engine.requestAdminAction('admin', 'change-treasury', 'vault-a', 0);
        await engine.requestAdminAction('admin', 'change-treasury', 'vault-b', 500);

        expect(await engine.getPendingAction('admin')).toMatchObject({ newValue: 'vault-b', requestedAt: 500 });
        await expect(engine.executeAdminAction('admin', DAY)).rejects.toBeInstanceOf(TimelockPendingError);
        await engine.executeAdminAction('admin', DAY + 500);
        expect((await engine.getControl()).treasury).toBe('vault-b');
    });

    test('changing the admin hands over every admin right', async () => {
        const engine = await createTestEngine();
        await engine.requestAdminAction('admin', 'change-admin', 'ops', 0);
        await engine.executeAdminAction('admin', DAY);

        await expect(engine.pause('admin', 'old key')).rejects.toBeInstanceOf(UnauthorizedError);
        await expect(engine.adminMint('admin', 'x', 1n)).rejects.toBeInstanceOf(UnauthorizedError);
        await expect(engine.pause('ops', 'new key')).resolves.toMatchObject({ paused: true, pauseReason: 'new key' });
    });

    test('non-admins and malformed requests are refused', async () => {
        const engine = await createTestEngine();
        await expect(engine.pause('mallory', 'x')).rejects.toBeInstanceOf(UnauthorizedError);
        await expect(engine.addToBlacklist('mallory', 'alice')).rejects.toBeInstanceOf(UnauthorizedError);
        await expect(engine.requestAdminAction('mallory', 'resume', '', 0)).rejects.toBeInstanceOf(UnauthorizedError);
        await expect(engine.requestAdminAction('admin', 'change-admin', '', 0)).rejects.toBeInstanceOf(InvalidInputError);
        await expect(engine.executeAdminAction('mallory', 0)).rejects.toBeInstanceOf(UnauthorizedError);
    });

    test('request and execute times must be whole seconds', async () => {
        const engine = await createTestEngine();
        await expect(engine.requestAdminAction('admin', 'change-treasury', 'vault', NaN)).rejects.toBeInstanceOf(InvalidInputError);
        expect(await engine.getPendingAction('admin')).toBeNull();

        await engine.requestAdminAction('admin', 'change-treasury', 'vault', 0);
        await expect(engine.executeAdminAction('admin', Infinity)).rejects.toBeInstanceOf(InvalidInputError);
        expect((await engine.getControl()).treasury).toBe('treasury');
        expect(await engine.getPendingAction('admin')).toMatchObject({ executed: false });
    });

    test('the blacklist can be edited while paused and reports whether it changed', async () => {
        const engine = await createTestEngine();
        await engine.pause('admin', 'maintenance');

        expect(await engine.addToBlacklist('admin', 'bot')).toBe(true);
        expect(await engine.addToBlacklist('admin', 'bot')).toBe(false);
        expect((await engine.getControl()).blacklist).toEqual(['bot']);
        expect(await engine.removeFromBlacklist('admin', 'bot')).toBe(true);
        expect(await engine.removeFromBlacklist('admin', 'bot')).toBe(false);
    });

    test('admin mints are cap-checked and refuse blacklisted recipients', async () => {
        const engine = await createTestEngine({ supplyCapTokens: '100' });

        expect(await engine.adminMint('admin', 'alice', 60n)).toBe(60n);
        await expect(engine.adminMint('admin', 'alice', 41n)).rejects.toBeInstanceOf(SupplyCapExceededError);
        expect(await engine.balanceOf('alice')).toBe(60n);

        await engine.addToBlacklist('admin', 'bob');
        await expect(engine.adminMint('admin', 'bob', 1n)).rejects.toBeInstanceOf(BlacklistedError);
        expect((await engine.getSupply()).totalMinted).toBe(60n);
    });

    test('burns lower circulation and free headroom for later mints', async () => {
        const engine = await createTestEngine({ supplyCapTokens: '100' });
        await engine.adminMint('admin', 'alice', 100n);

        expect(await engine.burnTokens('alice', 40n, 'fee sink')).toBe(40n);

        expect(await engine.balanceOf('alice')).toBe(60n);
        expect(await engine.getSupply()).toMatchObject({ totalMinted: 100n, totalBurned: 40n });
        await expect(engine.adminMint('admin', 'bob', 40n)).resolves.toBe(40n);
    });

    test('a burn beyond circulation or beyond the holder balance changes nothing', async () => {
        const engine = await createTestEngine();
        await engine.adminMint('admin', 'alice', 100n);
        await engine.adminMint('admin', 'bob', 100n);

        await expect(engine.burnTokens('alice', 201n, 'too much')).rejects.toBeInstanceOf(InsufficientBurnableError);
        await expect(engine.burnTokens('alice', 150n, 'not hers')).rejects.toBeInstanceOf(InsufficientBalanceError);
        await expect(engine.burnTokens('alice', 5n, '  ')).rejects.toBeInstanceOf(InvalidInputError);

        expect(await engine.balanceOf('alice')).toBe(100n);
        expect((await engine.getSupply()).totalBurned).toBe(0n);
    });

    test('an existing control record wins over a later initialize', async () => {
        const engine = await createTestEngine();
        const control = await engine.admin.initialize('someone-else', 'elsewhere');
        expect(control.admin).toBe('admin');
        expect(control.treasury).toBe('treasury');
    });
});
