/**
 * EquipmentNft: in-process non-fungible asset primitive.
 *
 * Stands in for the host runtime's NFT program: one owner per asset id.
 * Metadata and royalties stay with the host; the engine only needs
 * ownership, transfer, creation and destruction.
 */

import { InvalidInputError, NotOwnerError } from '../errors/MiningError.js';
import type { Identity } from '../types/index.js';

export interface NonFungibleAsset {
    ownerOf(id: string): Promise<Identity | null>;
    mint(id: string, owner: Identity): Promise<void>;
    transfer(id: string, from: Identity, to: Identity): Promise<void>;
    burn(id: string, owner: Identity): Promise<void>;
}

export class EquipmentNft implements NonFungibleAsset {
    private readonly owners = new Map<string, Identity>();

    async ownerOf(id: string): Promise<Identity | null> {
        return this.owners.get(id) ?? null;
    }

    async mint(id: string, owner: Identity): Promise<void> {
        if (this.owners.has(id)) {
            throw new InvalidInputError(`Asset ${id} already exists`, { id });
        }
        this.owners.set(id, owner);
    }

    async transfer(id: string, from: Identity, to: Identity): Promise<void> {
        this.assertOwner(id, from);
        this.owners.set(id, to);
    }

    async burn(id: string, owner: Identity): Promise<void> {
        this.assertOwner(id, owner);
        this.owners.delete(id);
    }

    get count(): number {
        return this.owners.size;
    }

    private assertOwner(id: string, caller: Identity): void {
        const owner = this.owners.get(id) ?? null;
        if (owner !== caller) {
            throw new NotOwnerError(id, caller, owner);
        }
    }
}
