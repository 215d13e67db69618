/**
 * EquipmentRegistry: equipment units, their hash power and registration state.
 *
 * Registering or deregistering a unit changes its owner's hash power, so the
 * owner's account is settled at the old hash power first; the interval before
 * the change never sees the new value. A registered unit cannot change hands:
 * transfer and retirement require (or perform) deregistration first.
 */

import type winston from 'winston';
import { ensureOperational } from '../admin/guards.js';
import type { RecordContext, Transaction } from '../concurrency/RecordContext.js';
import {
    AlreadyRegisteredError,
    EquipmentActiveError,
    EquipmentNotFoundError,
    InvalidInputError,
    NotOwnerError,
    NotRegisteredError,
    UnknownMinerError,
} from '../errors/MiningError.js';
import type { HalvingSchedule } from '../token/HalvingSchedule.js';
import { createMinerAccount, settleAccount } from '../token/RewardEngine.js';
import { equipmentKey, minerKey } from '../store/keys.js';
import type { Equipment, Identity, MinerAccount } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { generateEquipmentId } from '../utils/uuid.js';
import type { BoxDraw } from './BoxOpener.js';
import type { NonFungibleAsset } from './EquipmentNft.js';

export interface RegistrationChange {
    equipment: Equipment;
    miner: MinerAccount;
}

export class EquipmentRegistry {
    private readonly logger: winston.Logger;

    constructor(
        private readonly context: RecordContext,
        private readonly schedule: HalvingSchedule,
        private readonly nft: NonFungibleAsset,
        logger?: winston.Logger,
    ) {
        this.logger = logger ?? createLogger('info', 'registry');
    }

    newEquipmentId(): string {
        return generateEquipmentId();
    }

    /**
     * Stage a new, unregistered unit and the mint of its asset.
     * The caller's transaction must hold `equipmentKey(id)`.
     */
    async createWithin(tx: Transaction, id: string, owner: Identity, draw: BoxDraw, now: number): Promise<Equipment> {
        if (await tx.read(equipmentKey(id), 'equipment')) {
            throw new InvalidInputError(`Equipment ${id} already exists`, { id });
        }
        const equipment: Equipment = {
            _id: equipmentKey(id),
            kind: 'equipment',
            id,
            tier: draw.tier,
            hashPower: draw.hashPower,
            owner,
            active: false,
            createdAt: now,
        };
        tx.put(equipment);
        tx.effect({
            name: `nft-mint:${id}`,
            run: () => this.nft.mint(id, owner),
            undo: () => this.nft.burn(id, owner),
        });
        return equipment;
    }

    async register(equipmentId: string, caller: Identity, now: number): Promise<RegistrationChange> {
        return this.context.transact([equipmentKey(equipmentId), minerKey(caller)], async (tx) => {
            await ensureOperational(this.context);
            const equipment = await this.requireOwned(tx, equipmentId, caller);
            if (equipment.active) {
                throw new AlreadyRegisteredError(equipmentId);
            }
            const change = await this.registerWithin(tx, equipment, now);
            this.logger.info('Equipment registered', {
                equipmentId,
                owner: caller,
                hashPower: equipment.hashPower,
                registeredHashPower: change.miner.registeredHashPower,
            });
            return change;
        });
    }

    async deregister(equipmentId: string, caller: Identity, now: number): Promise<RegistrationChange> {
        return this.context.transact([equipmentKey(equipmentId), minerKey(caller)], async (tx) => {
            await ensureOperational(this.context);
            const equipment = await this.requireOwned(tx, equipmentId, caller);
            if (!equipment.active) {
                throw new NotRegisteredError(equipmentId);
            }
            const change = await this.deregisterWithin(tx, equipment, now);
            this.logger.info('Equipment deregistered', {
                equipmentId,
                owner: caller,
                registeredHashPower: change.miner.registeredHashPower,
            });
            return change;
        });
    }

    /**
     * Hand an unregistered unit to another identity.
     */
    async transfer(equipmentId: string, from: Identity, to: Identity): Promise<Equipment> {
        if (!to || to === from) {
            throw new InvalidInputError('Transfer needs a different, non-empty recipient', { from, to });
        }
        return this.context.transact([equipmentKey(equipmentId)], async (tx) => {
            await ensureOperational(this.context, from, to);
            const equipment = await this.requireOwned(tx, equipmentId, from);
            if (equipment.active) {
                throw new EquipmentActiveError(equipmentId);
            }
            const moved: Equipment = { ...equipment, owner: to };
            tx.put(moved);
            tx.effect({
                name: `nft-transfer:${equipmentId}`,
                run: () => this.nft.transfer(equipmentId, from, to),
                undo: () => this.nft.transfer(equipmentId, to, from),
            });
            this.logger.info('Equipment transferred', { equipmentId, from, to });
            return moved;
        });
    }

    /**
     * Destroy a unit, deregistering it first when active.
     */
    async retire(equipmentId: string, caller: Identity, now: number): Promise<RegistrationChange | null> {
        return this.context.transact([equipmentKey(equipmentId), minerKey(caller)], async (tx) => {
            await ensureOperational(this.context);
            const equipment = await this.requireOwned(tx, equipmentId, caller);
            const change = equipment.active ? await this.deregisterWithin(tx, equipment, now) : null;

            tx.delete(equipmentKey(equipmentId));
            tx.effect({
                name: `nft-burn:${equipmentId}`,
                run: () => this.nft.burn(equipmentId, caller),
                undo: () => this.nft.mint(equipmentId, caller),
            });
            this.logger.info('Equipment retired', { equipmentId, owner: caller, hashPower: equipment.hashPower });
            return change;
        });
    }

    /**
     * Force a settlement on the owner's account, then add the unit's hash power.
     * Creates the account on first registration.
     */
    async registerWithin(tx: Transaction, equipment: Equipment, now: number): Promise<RegistrationChange> {
        const existing = await tx.read(minerKey(equipment.owner), 'miner');
        const account = existing ?? createMinerAccount(equipment.owner, now);
        const settled = settleAccount(account, this.schedule, now, 'forced').account;

        const miner: MinerAccount = {
            ...settled,
            registeredHashPower: settled.registeredHashPower + equipment.hashPower,
            equipmentIds: [...settled.equipmentIds, equipment.id],
        };
        const registered: Equipment = { ...equipment, active: true };
        tx.put(miner);
        tx.put(registered);
        return { equipment: registered, miner };
    }

    private async deregisterWithin(tx: Transaction, equipment: Equipment, now: number): Promise<RegistrationChange> {
        const account = await tx.require(
            minerKey(equipment.owner),
            'miner',
            () => new UnknownMinerError(equipment.owner),
        );
        const settled = settleAccount(account, this.schedule, now, 'forced').account;

        const miner: MinerAccount = {
            ...settled,
            registeredHashPower: Math.max(0, settled.registeredHashPower - equipment.hashPower),
            equipmentIds: settled.equipmentIds.filter((id) => id !== equipment.id),
        };
        const deregistered: Equipment = { ...equipment, active: false };
        tx.put(miner);
        tx.put(deregistered);
        return { equipment: deregistered, miner };
    }

    async getEquipment(equipmentId: string): Promise<Equipment | null> {
        return this.context.read(equipmentKey(equipmentId), 'equipment');
    }

    private async requireOwned(tx: Transaction, equipmentId: string, caller: Identity): Promise<Equipment> {
        const equipment = await tx.require(
            equipmentKey(equipmentId),
            'equipment',
            () => new EquipmentNotFoundError(equipmentId),
        );
        const owner = await this.nft.ownerOf(equipmentId);
        if (owner !== caller || equipment.owner !== caller) {
            throw new NotOwnerError(equipmentId, caller, owner);
        }
        return equipment;
    }
}
