/**
 * ApiServer
 *
 * Requests go through `handle`, so no socket is opened.
 *
 * 1. Read endpoints render bigint amounts as decimal strings
 * 2. Mutations go through the engine and answer with its results
 * 3. Schema failures are 400; engine errors map to their status and code
 */
import { z } from 'zod';
import { ApiServer } from '../../src/api/ApiServer.js';
import type { MiningEngine } from '../../src/engine/MiningEngine.js';
import { createTestEngine } from '../support/fixtures.js';

const boxBody = z.object({ equipment: z.object({ id: z.string() }) });

describe('ApiServer', () => {
    let engine: MiningEngine;
    let api: ApiServer;

    beforeEach(async () => {
        engine = await createTestEngine();
        api = new ApiServer(engine);
    });

    test('GET /health', async () => {
        const response = await api.handle({ method: 'GET', path: '/health' });
        expect(response.status).toBe(200);
        expect(response.body).toMatchObject({ status: 'ok', token: 'RIG' });
    });

    test('GET /supply reports circulation and headroom', async () => {
        await engine.adminMint('admin', 'alice', 100n);
        await engine.burnTokens('alice', 30n, 'sink');

        const response = await api.handle({ method: 'GET', path: '/supply' });
        expect(response).toEqual({
            status: 200,
            body: {
                cap: '27000000',
                totalMinted: '100',
                totalBurned: '30',
                circulating: '70',
                headroom: '26999930',
                decimals: 0,
            },
        });
    });

    test('GET /schedule lists the requested epochs', async () => {
        const response = await api.handle({
            method: 'GET', path: '/schedule', query: new URLSearchParams({ epochs: '2' }),
        });
        expect(response.body).toEqual({
            genesisTime: 0,
            epochLengthSeconds: 1000,
            halvingDivisor: 2,
            epochs: [
                { epoch: 0, startsAt: 0, rate: '1000000000000000000' },
                { epoch: 1, startsAt: 1000, rate: '500000000000000000' },
            ],
        });

        const tooMany = await api.handle({
            method: 'GET', path: '/schedule', query: new URLSearchParams({ epochs: '999' }),
        });
        expect(tooMany).toEqual({
            status: 400,
            body: { error: 'epochs must be an integer in [0, 256]', code: 'INVALID_INPUT' },
        });
    });

    test('POST /purchase credits the buyer', async () => {
        const response = await api.handle({
            method: 'POST', path: '/purchase', body: { buyer: 'alice', stableAmount: '1000' },
        });
        expect(response.status).toBe(201);
        expect(response.body).toMatchObject({
            tokenAmount: '10000', burnAmount: '1000', unpaidReferral: '900', net: '8100', netRecipient: 'alice',
        });

        const balance = await api.handle({ method: 'GET', path: '/balances/alice' });
        expect(balance.body).toEqual({ holder: 'alice', balance: '8100' });
    });

    test('a body that fails its schema is a 400 naming the field', async () => {
        const response = await api.handle({
            method: 'POST', path: '/purchase', body: { buyer: 'alice', stableAmount: 1000 },
        });
        expect(response).toEqual({
            status: 400,
            body: { error: 'stableAmount: Expected string, received number', code: 'INVALID_INPUT' },
        });
    });

    test('box, register, claim over the API', async () => {
        const box = await api.handle({ method: 'POST', path: '/boxes', body: { buyer: 'bob', now: 0 } });
        expect(box.status).toBe(201);
        const { id } = boxBody.parse(box.body).equipment;

        const stranger = await api.handle({
            method: 'POST', path: `/equipment/${id}/register`, body: { owner: 'eve', now: 0 },
        });
        expect(stranger.status).toBe(403);
        expect(stranger.body).toMatchObject({ code: 'NOT_OWNER', retryable: false });

        const registered = await api.handle({
            method: 'POST', path: `/equipment/${id}/register`, body: { owner: 'bob', now: 0 },
        });
        expect(registered.status).toBe(200);
        expect(registered.body).toMatchObject({ miner: { registeredHashPower: 100, equipmentIds: [id] } });

        const claim = await api.handle({ method: 'POST', path: '/miners/bob/claim', body: { now: 10 } });
        expect(claim.body).toMatchObject({ owner: 'bob', minted: '1000', pendingReward: '0' });

        const again = await api.handle({
            method: 'POST', path: `/equipment/${id}/register`, body: { owner: 'bob', now: 10 },
        });
        expect(again.status).toBe(409);
        expect(again.body).toMatchObject({ code: 'ALREADY_REGISTERED' });
    });

    test('missing resources are 404 with a code', async () => {
        expect(await api.handle({ method: 'GET', path: '/equipment/nope' })).toEqual({
            status: 404, body: { error: 'equipment nope not found', code: 'EQUIPMENT_NOT_FOUND' },
        });
        expect(await api.handle({ method: 'GET', path: '/miners/nobody' })).toEqual({
            status: 404, body: { error: 'no miner account for nobody', code: 'UNKNOWN_MINER' },
        });
        expect(await api.handle({ method: 'GET', path: '/purchase' })).toEqual({
            status: 404, body: { error: 'not found' },
        });
    });

    test('a malformed percent escape in the path is a 400', async () => {
        expect(await api.handle({ method: 'GET', path: '/miners/%E0%A4' })).toEqual({
            status: 400, body: { error: 'malformed path segment "%E0%A4"', code: 'INVALID_INPUT' },
        });
        expect(await api.handle({ method: 'POST', path: '/equipment/%ZZ/register', body: {} })).toMatchObject({
            status: 400, body: { code: 'INVALID_INPUT' },
        });
    });

    test('referrals can be set once and read back', async () => {
        const created = await api.handle({
            method: 'POST', path: '/referrals', body: { referred: 'b', referrer: 'a', now: 1 },
        });
        expect(created.status).toBe(201);

        const chain = await api.handle({ method: 'GET', path: '/referrals/b' });
        expect(chain.body).toEqual({ identity: 'b', referrer: 'a', chain: ['a'] });

        const duplicate = await api.handle({
            method: 'POST', path: '/referrals', body: { referred: 'b', referrer: 'c' },
        });
        expect(duplicate.status).toBe(409);
        expect(duplicate.body).toMatchObject({ code: 'REFERRER_ALREADY_SET' });
    });

    test('admin endpoints: pause, timelock and cap errors', async () => {
        const pending = await api.handle({
            method: 'POST', path: '/admin/actions',
            body: { admin: 'admin', action: 'change-treasury', value: 'vault', now: 0 },
        });
        expect(pending.status).toBe(202);

        const early = await api.handle({ method: 'POST', path: '/admin/actions/execute', body: { admin: 'admin', now: 10 } });
        expect(early.status).toBe(409);
        expect(early.body).toMatchObject({ code: 'TIMELOCK_PENDING', retryable: false });

        const overCap = await api.handle({
            method: 'POST', path: '/admin/mint', body: { admin: 'admin', to: 'alice', amount: '27000001' },
        });
        expect(overCap.status).toBe(409);
        expect(overCap.body).toMatchObject({ code: 'SUPPLY_CAP_EXCEEDED', retryable: true });

        const paused = await api.handle({ method: 'POST', path: '/admin/pause', body: { admin: 'admin', reason: 'drill' } });
        expect(paused.body).toMatchObject({ paused: true, pauseReason: 'drill' });

        const refused = await api.handle({
            method: 'POST', path: '/purchase', body: { buyer: 'alice', stableAmount: '10' },
        });
        expect(refused).toEqual({
            status: 503,
            body: { error: 'System is paused: drill', code: 'SYSTEM_PAUSED', retryable: false },
        });

        const blacklisted = await api.handle({
            method: 'POST', path: '/admin/blacklist', body: { admin: 'admin', identity: 'bot' },
        });
        expect(blacklisted.body).toEqual({ changed: true });
    });
});
