/**
 * AdminControl: pause switch, blacklist, timelocked admin changes,
 * admin mints and holder burns.
 *
 * Pausing takes effect at once; resuming, changing the admin and changing
 * the treasury only after `actionDelaySeconds` have passed since the request.
 * Each admin holds at most one pending action, and a new request replaces it.
 */

import type winston from 'winston';
import type { RecordContext } from '../concurrency/RecordContext.js';
import {
    InvalidInputError,
    NoPendingActionError,
    TimelockPendingError,
    UnauthorizedError,
} from '../errors/MiningError.js';
import { adminActionKey, CONTROL_KEY, SUPPLY_KEY } from '../store/keys.js';
import type { SupplyLedger } from '../token/SupplyLedger.js';
import type { FungibleToken } from '../token/TokenLedger.js';
import type { AdminActionType, ControlState, Identity, PendingAdminAction } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { assertTimestamp } from '../utils/timestamp.js';
import { generateId } from '../utils/uuid.js';
import { ensureOperational, readControl } from './guards.js';

export const DEFAULT_ACTION_DELAY_SECONDS = 24 * 60 * 60;

export interface AdminControlOptions {
    actionDelaySeconds?: number;
    logger?: winston.Logger;
}

export class AdminControl {
    readonly actionDelaySeconds: number;
    private readonly logger: winston.Logger;

    constructor(
        private readonly context: RecordContext,
        private readonly supply: SupplyLedger,
        private readonly token: FungibleToken,
        options: AdminControlOptions = {},
    ) {
        this.actionDelaySeconds = options.actionDelaySeconds ?? DEFAULT_ACTION_DELAY_SECONDS;
        if (!Number.isSafeInteger(this.actionDelaySeconds) || this.actionDelaySeconds < 0) {
            throw new InvalidInputError('adminActionDelaySeconds must be a non-negative integer', {
                actionDelaySeconds: this.actionDelaySeconds,
            });
        }
        this.logger = options.logger ?? createLogger('info', 'admin');
    }

    /**
     * Create the control record on first start. A persisted record wins over
     * the configured admin and treasury.
     */
    async initialize(admin: Identity, treasury: Identity): Promise<ControlState> {
        if (!admin || !treasury) {
            throw new InvalidInputError('Admin and treasury identities are required', { admin, treasury });
        }
        return this.context.transact([CONTROL_KEY], async (tx) => {
            const existing = await tx.read(CONTROL_KEY, 'control');
            if (existing) return existing;
            const control: ControlState = {
                _id: CONTROL_KEY,
                kind: 'control',
                admin,
                treasury,
                paused: false,
                blacklist: [],
            };
            tx.put(control);
            this.logger.info('Control state initialized', { admin, treasury });
            return control;
        });
    }

    async getControl(): Promise<ControlState> {
        return readControl(this.context);
    }

    async pause(admin: Identity, reason: string): Promise<ControlState> {
        return this.updateControl(admin, 'pause', (control) => {
            this.logger.warn('System paused', { admin, reason });
            return { ...control, paused: true, pauseReason: reason };
        });
    }

    /**
     * @returns whether the blacklist changed
     */
    async addToBlacklist(admin: Identity, identity: Identity): Promise<boolean> {
        if (!identity) throw new InvalidInputError('Identity is required');
        let changed = false;
        await this.updateControl(admin, 'blacklist', (control) => {
            if (control.blacklist.includes(identity)) return control;
            changed = true;
            this.logger.warn('Identity blacklisted', { admin, identity });
            return { ...control, blacklist: [...control.blacklist, identity] };
        });
        return changed;
    }

    async removeFromBlacklist(admin: Identity, identity: Identity): Promise<boolean> {
        let changed = false;
        await this.updateControl(admin, 'blacklist', (control) => {
            if (!control.blacklist.includes(identity)) return control;
            changed = true;
            this.logger.info('Identity removed from blacklist', { admin, identity });
            return { ...control, blacklist: control.blacklist.filter((entry) => entry !== identity) };
        });
        return changed;
    }

    /**
     * Queue a timelocked change, replacing any earlier unexecuted request.
     */
    async requestAdminAction(
        admin: Identity,
        action: AdminActionType,
        newValue: string,
        now: number,
    ): Promise<PendingAdminAction> {
        assertTimestamp(now);
        if (action !== 'resume' && !newValue) {
            throw new InvalidInputError(`${action} needs a new value`, { action });
        }
        return this.context.transact([adminActionKey(admin)], async (tx) => {
            await this.requireAdmin(admin, `request ${action}`);
            const pending: PendingAdminAction = {
                _id: adminActionKey(admin),
                kind: 'admin-action',
                admin,
                action,
                newValue: action === 'resume' ? '' : newValue,
                requestedAt: now,
                executed: false,
            };
            tx.put(pending);
            this.logger.info('Admin action requested', {
                admin,
                action,
                executableAt: now + this.actionDelaySeconds,
            });
            return pending;
        });
    }

    /**
     * Apply the admin's pending action once its delay has elapsed.
     */
    async executeAdminAction(admin: Identity, now: number): Promise<PendingAdminAction> {
        assertTimestamp(now);
        return this.context.transact([adminActionKey(admin), CONTROL_KEY], async (tx) => {
            const control = await tx.require(CONTROL_KEY, 'control', () => new InvalidInputError('Control state is not initialized'));
            if (control.admin !== admin) {
                throw new UnauthorizedError(admin, 'execute admin actions');
            }
            const pending = await tx.read(adminActionKey(admin), 'admin-action');
            if (!pending || pending.executed) {
                throw new NoPendingActionError(admin);
            }
            const executableAt = pending.requestedAt + this.actionDelaySeconds;
            if (now < executableAt) {
                throw new TimelockPendingError(executableAt, now);
            }

            const next: ControlState = { ...control };
            switch (pending.action) {
                case 'resume':
                    next.paused = false;
                    delete next.pauseReason;
                    break;
                case 'change-admin':
                    next.admin = pending.newValue;
                    break;
                case 'change-treasury':
                    next.treasury = pending.newValue;
                    break;
            }
            tx.put(next);
            const executed: PendingAdminAction = { ...pending, executed: true };
            tx.put(executed);
            this.logger.info('Admin action executed', { admin, action: pending.action, newValue: pending.newValue });
            return executed;
        });
    }

    async getPendingAction(admin: Identity): Promise<PendingAdminAction | null> {
        return this.context.read(adminActionKey(admin), 'admin-action');
    }

    /**
     * Mint outside the reward and sale paths. Cap-checked, all-or-nothing.
     */
    async adminMint(admin: Identity, to: Identity, amount: bigint): Promise<bigint> {
        if (amount <= 0n) {
            throw new InvalidInputError('Mint amount must be positive', { amount });
        }
        if (!to) throw new InvalidInputError('Mint recipient is required');
        return this.context.transact([SUPPLY_KEY], async (tx) => {
            const control = await ensureOperational(this.context, to);
            if (control.admin !== admin) {
                throw new UnauthorizedError(admin, 'mint');
            }
            await this.supply.mintWithin(tx, amount);
            const memo = `admin-mint:${generateId()}`;
            tx.effect({
                name: memo,
                run: async () => { await this.token.mint(to, amount, memo); },
                undo: async () => { await this.token.burn(to, amount, `revert-${memo}`); },
            });
            this.logger.info('Admin mint', { admin, to, amount });
            return amount;
        });
    }

    /**
     * Burn tokens held by `holder`. The supply record is restored if the
     * holder's balance cannot cover the burn.
     */
    async burnTokens(holder: Identity, amount: bigint, description: string): Promise<bigint> {
        if (amount <= 0n) {
            throw new InvalidInputError('Burn amount must be positive', { amount });
        }
        if (!description.trim()) {
            throw new InvalidInputError('Burn description is required');
        }
        return this.context.transact([SUPPLY_KEY], async (tx) => {
            await ensureOperational(this.context, holder);
            await this.supply.burnWithin(tx, amount);
            const memo = `burn:${description}`;
            tx.effect({
                name: memo,
                run: async () => { await this.token.burn(holder, amount, memo); },
            });
            this.logger.info('Tokens burned', { holder, amount, description });
            return amount;
        });
    }

    private async requireAdmin(caller: Identity, action: string): Promise<ControlState> {
        const control = await readControl(this.context);
        if (control.admin !== caller) {
            throw new UnauthorizedError(caller, action);
        }
        return control;
    }

    private async updateControl(
        admin: Identity,
        action: string,
        update: (control: ControlState) => ControlState,
    ): Promise<ControlState> {
        return this.context.transact([CONTROL_KEY], async (tx) => {
            const control = await tx.require(CONTROL_KEY, 'control', () => new InvalidInputError('Control state is not initialized'));
            if (control.admin !== admin) {
                throw new UnauthorizedError(admin, action);
            }
            const next = update(control);
            if (next !== control) tx.put(next);
            return next;
        });
    }
}
