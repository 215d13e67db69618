/**
 * ReferralGraph: who referred whom. Each identity's referrer is set at most once.
 *
 * A chain is the ordered list of ancestors above an identity, nearest first.
 * Walks are explicit loops capped at maxDepth + 1 lookups; a longer chain is
 * ChainTooDeep, whatever the store holds.
 *
 * Each record also carries `heightBelow`, the longest chain of referrals
 * below its identity, so linking the top of an existing chain under a new
 * referrer is measured end to end. An identity that is referred to but has
 * no referrer of its own gets a record with a null referrer to hold it.
 *
 * Operations that depend on a chain lock every `referral:` key along it,
 * including the topmost one whose link is still empty, then re-walk under the
 * lock. Links never change once set, so the only way a chain can move is by
 * growing at the top, and the lock on the top key rules that out.
 */

import type winston from 'winston';
import { ensureOperational } from '../admin/guards.js';
import type { RecordContext, Transaction } from '../concurrency/RecordContext.js';
import {
    ChainTooDeepError,
    ConcurrencyConflictError,
    InvalidInputError,
    ReferralCycleError,
    ReferrerAlreadySetError,
} from '../errors/MiningError.js';
import { referralKey } from '../store/keys.js';
import type { Identity, ReferralLink } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { assertTimestamp } from '../utils/timestamp.js';

const MAX_CHAIN_ATTEMPTS = 3;

type ChainOutcome<T> = { stale: true } | { stale: false; value: T };
type LinkLookup = (key: string) => Promise<ReferralLink | null>;

export class ReferralGraph {
    private readonly logger: winston.Logger;

    constructor(
        private readonly context: RecordContext,
        readonly maxDepth: number,
        logger?: winston.Logger,
    ) {
        if (!Number.isSafeInteger(maxDepth) || maxDepth < 0) {
            throw new InvalidInputError('maxReferralDepth must be a non-negative integer', { maxDepth });
        }
        this.logger = logger ?? createLogger('info', 'referral');
    }

    async referrerOf(identity: Identity): Promise<Identity | null> {
        const link = await this.context.read(referralKey(identity), 'referral');
        return link?.referrer ?? null;
    }

    /**
     * Unlocked walk, for queries.
     * @throws ChainTooDeepError when more than maxDepth ancestors are linked
     */
    async chainOf(identity: Identity): Promise<Identity[]> {
        return this.walk(identity, (key) => this.context.read(key, 'referral'));
    }

    /**
     * Link `referred` to `referrer`. Checked in order: self-referral,
     * existing link, cycle, resulting depth counting the referrals already
     * below `referred`.
     */
    async setReferrer(referred: Identity, referrer: Identity, now: number): Promise<ReferralLink> {
        if (!referred || !referrer) {
            throw new InvalidInputError('Both referred and referrer identities are required', { referred, referrer });
        }
        if (referred === referrer) {
            throw new InvalidInputError(`${referred} cannot refer themselves`, { referred });
        }

        assertTimestamp(now);

        return this.withChain(referrer, [referralKey(referred)], async (tx, chain) => {
            await ensureOperational(this.context, referrer);

            const existing = await tx.read(referralKey(referred), 'referral');
            if (existing?.referrer) {
                throw new ReferrerAlreadySetError(referred, existing.referrer);
            }
            if (chain.includes(referred)) {
                throw new ReferralCycleError(referred, referrer);
            }
            const heightBelow = existing?.heightBelow ?? 0;
            if (chain.length + 1 + heightBelow > this.maxDepth) {
                throw new ChainTooDeepError(referred, this.maxDepth);
            }

            const link: ReferralLink = {
                _id: referralKey(referred),
                kind: 'referral',
                referred,
                referrer,
                linkedAt: now,
                heightBelow,
            };
            tx.put(link);
            await this.raiseAncestors(tx, [referrer, ...chain], heightBelow + 1);
            this.logger.info('Referral linked', { referred, referrer, depth: chain.length + 1, heightBelow });
            return link;
        });
    }

    /**
     * Run `work` with `identity`'s chain locked along with `extraKeys`.
     * Retries when the chain seen before locking is not the chain under the lock.
     */
    async withChain<T>(
        identity: Identity,
        extraKeys: string[],
        work: (tx: Transaction, chain: Identity[]) => Promise<T>,
    ): Promise<T> {
        for (let attempt = 1; attempt <= MAX_CHAIN_ATTEMPTS; attempt++) {
            const observed = await this.chainOf(identity);
            const keys = [...extraKeys, ...this.chainKeys(identity, observed)];

            const outcome = await this.context.transact(keys, async (tx): Promise<ChainOutcome<T>> => {
                const chain = await this.walk(identity, (key) => tx.read(key, 'referral'));
                if (!sameChain(chain, observed)) {
                    return { stale: true };
                }
                return { stale: false, value: await work(tx, chain) };
            });
            if (!outcome.stale) {
                return outcome.value;
            }
            this.logger.debug('Referral chain moved while locking, retrying', { identity, attempt });
        }
        throw new ConcurrencyConflictError(`Referral chain of ${identity} kept changing`, {
            identity,
            attempts: MAX_CHAIN_ATTEMPTS,
        });
    }

    /** ancestors[i] sits `height + i` levels above the deepest descendant. */
    private async raiseAncestors(tx: Transaction, ancestors: Identity[], height: number): Promise<void> {
        for (const [index, ancestor] of ancestors.entries()) {
            const current = await tx.read(referralKey(ancestor), 'referral');
            const raised = height + index;
            if (current && current.heightBelow >= raised) continue;
            tx.put({
                _id: referralKey(ancestor),
                kind: 'referral',
                referred: ancestor,
                referrer: current?.referrer ?? null,
                linkedAt: current?.linkedAt ?? null,
                heightBelow: raised,
            });
        }
    }

    private chainKeys(identity: Identity, chain: Identity[]): string[] {
        return [identity, ...chain].map(referralKey);
    }

    private async walk(identity: Identity, lookup: LinkLookup): Promise<Identity[]> {
        const chain: Identity[] = [];
        let cursor = identity;
        for (let level = 0; level <= this.maxDepth; level++) {
            const link = await lookup(referralKey(cursor));
            if (!link?.referrer) return chain;
            chain.push(link.referrer);
            cursor = link.referrer;
        }
        throw new ChainTooDeepError(identity, this.maxDepth);
    }
}

function sameChain(a: Identity[], b: Identity[]): boolean {
    return a.length === b.length && a.every((identity, index) => identity === b[index]);
}
