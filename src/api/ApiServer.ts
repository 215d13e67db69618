import http from 'node:http';
import type winston from 'winston';
import { z } from 'zod';
import type { MiningEngine } from '../engine/MiningEngine.js';
import { describeError, isMiningError } from '../errors/MiningError.js';
import type { MiningErrorCode } from '../errors/MiningError.js';
import { circulating, headroom } from '../token/SupplyLedger.js';
import { createLogger } from '../utils/logger.js';
import { toJson } from '../utils/json.js';

/**
 * ApiServer: JSON API over a MiningEngine.
 *
 * Endpoints:
 *   GET  /health                        → { status: 'ok', token, uptime }
 *   GET  /supply                        → { cap, totalMinted, totalBurned, circulating, headroom }
 *   GET  /schedule?epochs=n             → { genesisTime, epochLengthSeconds, halvingDivisor, epochs }
 *   GET  /miners/:owner                 → miner account
 *   POST /miners/:owner/settle          → settlement        { now? }
 *   POST /miners/:owner/claim           → claim result      { now? }
 *   GET  /equipment/:id                 → equipment
 *   POST /equipment/:id/register        → { equipment, miner }   { owner, now? }
 *   POST /equipment/:id/deregister      → { equipment, miner }   { owner, now? }
 *   POST /equipment/:id/transfer        → equipment         { from, to }
 *   POST /equipment/:id/retire          → { retired }       { owner, now? }
 *   POST /purchase                      → purchase result   { buyer, stableAmount }
 *   POST /boxes                         → box result        { buyer, autoRegister? }
 *   POST /referrals                     → link              { referred, referrer }
 *   GET  /referrals/:identity           → { identity, referrer, chain }
 *   GET  /balances/:holder              → { holder, balance }
 *   GET  /sales/stats                   → sale tallies
 *   POST /admin/pause                   → control           { admin, reason }
 *   POST /admin/blacklist               → { changed }       { admin, identity, remove? }
 *   POST /admin/actions                 → pending action    { admin, action, value? }
 *   POST /admin/actions/execute         → executed action   { admin }
 *   POST /admin/mint                    → { minted }        { admin, to, amount }
 *   POST /burn                          → { burned }        { holder, amount, description }
 *
 * Amounts travel as decimal strings of base units. Caller authentication is
 * the host's job; identities in bodies are taken as authenticated.
 */

export interface ApiRequest {
    method: string;
    path: string;
    query?: URLSearchParams;
    body?: unknown;
}

export interface ApiResponse {
    status: number;
    body: unknown;
}

const STATUS_BY_CODE = {
    INVALID_INPUT: 400,
    NON_MONOTONIC_TIME: 400,
    CHAIN_TOO_DEEP: 400,
    INSUFFICIENT_BURNABLE: 400,
    INSUFFICIENT_BALANCE: 400,
    NOT_OWNER: 403,
    UNAUTHORIZED: 403,
    BLACKLISTED: 403,
    EQUIPMENT_NOT_FOUND: 404,
    UNKNOWN_MINER: 404,
    NO_PENDING_ACTION: 404,
    ALREADY_REGISTERED: 409,
    NOT_REGISTERED: 409,
    EQUIPMENT_ACTIVE: 409,
    REFERRER_ALREADY_SET: 409,
    REFERRAL_CYCLE: 409,
    SUPPLY_CAP_EXCEEDED: 409,
    TIMELOCK_PENDING: 409,
    CONCURRENCY_CONFLICT: 409,
    SYSTEM_PAUSED: 503,
    CORRUPT_RECORD: 500,
    COMPENSATION_FAILED: 500,
} satisfies Record<MiningErrorCode, number>;

const identity = z.string().min(1);
const amount = z.string().regex(/^\d+$/, 'expected an integer amount in base units').transform((v) => BigInt(v));
const timestamp = z.number().int().nonnegative().optional();

const timedSchema = z.object({ now: timestamp }).default({});
const ownerSchema = z.object({ owner: identity, now: timestamp });
const transferSchema = z.object({ from: identity, to: identity });
const purchaseSchema = z.object({ buyer: identity, stableAmount: amount });
const boxSchema = z.object({ buyer: identity, autoRegister: z.boolean().optional(), now: timestamp });
const referralSchema = z.object({ referred: identity, referrer: identity, now: timestamp });
const pauseSchema = z.object({ admin: identity, reason: z.string().min(1) });
const blacklistSchema = z.object({ admin: identity, identity, remove: z.boolean().optional() });
const actionSchema = z.object({
    admin: identity,
    action: z.enum(['change-admin', 'change-treasury', 'resume']),
    value: z.string().optional(),
    now: timestamp,
});
const executeSchema = z.object({ admin: identity, now: timestamp });
const mintSchema = z.object({ admin: identity, to: identity, amount });
const burnSchema = z.object({ holder: identity, amount, description: z.string().min(1) });

type Handler = (params: string[], request: ApiRequest) => Promise<ApiResponse>;

interface Route {
    method: string;
    pattern: RegExp;
    handler: Handler;
}

class BadRequest extends Error { }

function decodeParam(raw: string): string {
    try {
        return decodeURIComponent(raw);
    } catch (error) {
        if (error instanceof URIError) throw new BadRequest(`malformed path segment "${raw}"`);
        throw error;
    }
}

export class ApiServer {
    private server: http.Server | null = null;
    private readonly routes: Route[];
    private readonly startedAt = Date.now();

    constructor(
        private readonly engine: MiningEngine,
        private readonly logger: winston.Logger = createLogger('info', 'api'),
    ) {
        this.routes = this.buildRoutes();
    }

    start(port: number = 3000): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server = http.createServer((req, res) => {
                this.serve(req, res).catch((error: unknown) => {
                    this.logger.error('Request failed', { url: req.url, error: describeError(error) });
                    if (!res.headersSent) this.sendJson(res, 500, { error: 'internal error' });
                });
            });
            this.server.once('error', reject);
            this.server.listen(port, () => {
                this.logger.info(`API server listening on :${port}`);
                resolve();
            });
        });
    }

    stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.server) {
                resolve();
                return;
            }
            this.server.close((error) => (error ? reject(error) : resolve()));
            this.server = null;
        });
    }

    /**
     * Route one request. Never throws; failures become error responses.
     */
    async handle(request: ApiRequest): Promise<ApiResponse> {
        try {
            const route = this.match(request);
            if (!route) {
                return { status: 404, body: { error: 'not found' } };
            }
            const response = await route.handler(route.params, request);
            return { status: response.status, body: JSON.parse(toJson(response.body)) };
        } catch (error) {
            return this.errorResponse(error);
        }
    }

    private async serve(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
        const url = new URL(req.url ?? '/', 'http://localhost');
        const method = req.method ?? 'GET';

        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
        if (method === 'OPTIONS') { res.writeHead(204).end(); return; }

        let body: unknown;
        if (method === 'POST') {
            const raw = await this.readBody(req);
            try {
                body = raw.length > 0 ? JSON.parse(raw) : undefined;
            } catch {
                this.sendJson(res, 400, { error: 'invalid JSON body', code: 'INVALID_INPUT' });
                return;
            }
        }
        const response = await this.handle({ method, path: url.pathname, query: url.searchParams, body });
        this.sendJson(res, response.status, response.body);
    }

    private match(request: ApiRequest): { handler: Handler; params: string[] } | null {
        for (const route of this.routes) {
            if (route.method !== request.method) continue;
            const found = route.pattern.exec(request.path);
            if (found) {
                return { handler: route.handler, params: found.slice(1).map(decodeParam) };
            }
        }
        return null;
    }

    private buildRoutes(): Route[] {
        const engine = this.engine;
        const ok = (body: unknown, status = 200): ApiResponse => ({ status, body });

        return [
            {
                method: 'GET', pattern: /^\/health$/, handler: async () => ok({
                    status: 'ok',
                    token: engine.config.tokenSymbol,
                    uptime: Math.floor((Date.now() - this.startedAt) / 1000),
                }),
            },
            {
                method: 'GET', pattern: /^\/supply$/, handler: async () => {
                    const supply = await engine.getSupply();
                    return ok({
                        cap: supply.cap,
                        totalMinted: supply.totalMinted,
                        totalBurned: supply.totalBurned,
                        circulating: circulating(supply),
                        headroom: headroom(supply),
                        decimals: engine.config.tokenDecimals,
                    });
                },
            },
            {
                method: 'GET', pattern: /^\/schedule$/, handler: async (_params, request) => {
                    const epochs = Number(request.query?.get('epochs') ?? '8');
                    if (!Number.isSafeInteger(epochs) || epochs < 0 || epochs > 256) {
                        throw new BadRequest('epochs must be an integer in [0, 256]');
                    }
                    return ok({
                        genesisTime: engine.schedule.genesisTime,
                        epochLengthSeconds: engine.schedule.epochLengthSeconds,
                        halvingDivisor: engine.schedule.halvingDivisor,
                        epochs: engine.scheduleTable(epochs),
                    });
                },
            },
            {
                method: 'GET', pattern: /^\/miners\/([^/]+)$/, handler: async ([owner]) => {
                    const miner = await engine.getMiner(owner);
                    return miner ? ok(miner) : { status: 404, body: { error: `no miner account for ${owner}`, code: 'UNKNOWN_MINER' } };
                },
            },
            {
                method: 'POST', pattern: /^\/miners\/([^/]+)\/settle$/, handler: async ([owner], request) => {
                    const { now } = parse(timedSchema, request.body);
                    return ok(await engine.settle(owner, now));
                },
            },
            {
                method: 'POST', pattern: /^\/miners\/([^/]+)\/claim$/, handler: async ([owner], request) => {
                    const { now } = parse(timedSchema, request.body);
                    return ok(await engine.claim(owner, now));
                },
            },
            {
                method: 'GET', pattern: /^\/equipment\/([^/]+)$/, handler: async ([id]) => {
                    const equipment = await engine.getEquipment(id);
                    return equipment
                        ? ok(equipment)
                        : { status: 404, body: { error: `equipment ${id} not found`, code: 'EQUIPMENT_NOT_FOUND' } };
                },
            },
            {
                method: 'POST', pattern: /^\/equipment\/([^/]+)\/register$/, handler: async ([id], request) => {
                    const { owner, now } = parse(ownerSchema, request.body);
                    return ok(await engine.register(id, owner, now));
                },
            },
            {
                method: 'POST', pattern: /^\/equipment\/([^/]+)\/deregister$/, handler: async ([id], request) => {
                    const { owner, now } = parse(ownerSchema, request.body);
                    return ok(await engine.deregister(id, owner, now));
                },
            },
            {
                method: 'POST', pattern: /^\/equipment\/([^/]+)\/transfer$/, handler: async ([id], request) => {
                    const { from, to } = parse(transferSchema, request.body);
                    return ok(await engine.transfer(id, from, to));
                },
            },
            {
                method: 'POST', pattern: /^\/equipment\/([^/]+)\/retire$/, handler: async ([id], request) => {
                    const { owner, now } = parse(ownerSchema, request.body);
                    await engine.retire(id, owner, now);
                    return ok({ retired: id });
                },
            },
            {
                method: 'POST', pattern: /^\/purchase$/, handler: async (_params, request) => {
                    const { buyer, stableAmount } = parse(purchaseSchema, request.body);
                    return ok(await engine.purchase(buyer, stableAmount), 201);
                },
            },
            {
                method: 'POST', pattern: /^\/boxes$/, handler: async (_params, request) => {
                    const { buyer, autoRegister, now } = parse(boxSchema, request.body);
                    return ok(await engine.buyBox(buyer, { autoRegister }, now), 201);
                },
            },
            {
                method: 'POST', pattern: /^\/referrals$/, handler: async (_params, request) => {
                    const { referred, referrer, now } = parse(referralSchema, request.body);
                    return ok(await engine.setReferrer(referred, referrer, now), 201);
                },
            },
            {
                method: 'GET', pattern: /^\/referrals\/([^/]+)$/, handler: async ([id]) => ok({
                    identity: id,
                    referrer: await engine.referrerOf(id),
                    chain: await engine.chainOf(id),
                }),
            },
            {
                method: 'GET', pattern: /^\/balances\/([^/]+)$/, handler: async ([holder]) => ok({
                    holder,
                    balance: await engine.balanceOf(holder),
                }),
            },
            {
                method: 'GET', pattern: /^\/sales\/stats$/, handler: async () => ok(await engine.getSaleStats()),
            },
            {
                method: 'POST', pattern: /^\/admin\/pause$/, handler: async (_params, request) => {
                    const { admin, reason } = parse(pauseSchema, request.body);
                    return ok(await engine.pause(admin, reason));
                },
            },
            {
                method: 'POST', pattern: /^\/admin\/blacklist$/, handler: async (_params, request) => {
                    const body = parse(blacklistSchema, request.body);
                    const changed = body.remove
                        ? await engine.removeFromBlacklist(body.admin, body.identity)
                        : await engine.addToBlacklist(body.admin, body.identity);
                    return ok({ changed });
                },
            },
            {
                method: 'POST', pattern: /^\/admin\/actions$/, handler: async (_params, request) => {
                    const { admin, action, value, now } = parse(actionSchema, request.body);
                    return ok(await engine.requestAdminAction(admin, action, value, now), 202);
                },
            },
            {
                method: 'POST', pattern: /^\/admin\/actions\/execute$/, handler: async (_params, request) => {
                    const { admin, now } = parse(executeSchema, request.body);
                    return ok(await engine.executeAdminAction(admin, now));
                },
            },
            {
                method: 'POST', pattern: /^\/admin\/mint$/, handler: async (_params, request) => {
                    const { admin, to, amount: value } = parse(mintSchema, request.body);
                    return ok({ minted: await engine.adminMint(admin, to, value) });
                },
            },
            {
                method: 'POST', pattern: /^\/burn$/, handler: async (_params, request) => {
                    const { holder, amount: value, description } = parse(burnSchema, request.body);
                    return ok({ burned: await engine.burnTokens(holder, value, description) });
                },
            },
        ];
    }

    private errorResponse(error: unknown): ApiResponse {
        if (error instanceof BadRequest) {
            return { status: 400, body: { error: error.message, code: 'INVALID_INPUT' } };
        }
        if (isMiningError(error)) {
            return {
                status: STATUS_BY_CODE[error.code],
                body: { error: error.message, code: error.code, retryable: error.retryable },
            };
        }
        this.logger.error('Unhandled error', { error: describeError(error) });
        return { status: 500, body: { error: 'internal error' } };
    }

    private sendJson(res: http.ServerResponse, status: number, data: unknown): void {
        res.writeHead(status, { 'Content-Type': 'application/json' });
        res.end(toJson(data));
    }

    private readBody(req: http.IncomingMessage): Promise<string> {
        return new Promise((resolve, reject) => {
            const chunks: Buffer[] = [];
            req.on('data', (chunk: Buffer) => chunks.push(chunk));
            req.on('end', () => resolve(Buffer.concat(chunks).toString()));
            req.on('error', reject);
        });
    }
}

function parse<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
        const issue = result.error.issues[0];
        const path = issue.path.join('.');
        throw new BadRequest(path ? `${path}: ${issue.message}` : issue.message);
    }
    return result.data;
}
