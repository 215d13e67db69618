// ── Identities ──────────────────────────────────────────────
/** Opaque account address supplied by the host runtime. */
export type Identity = string;

// ── Records ─────────────────────────────────────────────────
// Every record is addressed by a key derived from its natural key
// (see store/keys.ts); `kind` discriminates the union on load.

export interface SupplyRecord {
    _id: string;
    kind: 'supply';
    cap: bigint;
    totalMinted: bigint;
    totalBurned: bigint;
}

export interface MinerAccount {
    _id: string;
    kind: 'miner';
    owner: Identity;
    registeredHashPower: number;
    equipmentIds: string[];
    lastSettlement: number;
    pendingReward: bigint;
    /** Sub-unit remainder of past settlements, scaled by RATE_SCALE. */
    rewardDust: bigint;
    totalClaimed: bigint;
    claimNonce: number;
    dailyClaimed: bigint;
    dailyWindowStart: number;
    hourlyClaimed: bigint;
    hourlyWindowStart: number;
    createdAt: number;
}

export interface Equipment {
    _id: string;
    kind: 'equipment';
    id: string;
    tier: string;
    hashPower: number;
    owner: Identity;
    active: boolean;
    createdAt: number;
}

/**
 * `referrer` and `linkedAt` are null on the record of an identity that has
 * referrals below it but no referrer of its own yet.
 */
export interface ReferralLink {
    _id: string;
    kind: 'referral';
    referred: Identity;
    referrer: Identity | null;
    linkedAt: number | null;
    /** Length of the longest chain of referrals hanging below `referred`. */
    heightBelow: number;
}

export interface SaleStats {
    _id: string;
    kind: 'sale-stats';
    purchases: number;
    boxesSold: number;
    tokenVolume: bigint;
    burned: bigint;
    referralPaid: bigint;
    unpaidReferral: bigint;
}

export interface ControlState {
    _id: string;
    kind: 'control';
    admin: Identity;
    treasury: Identity;
    paused: boolean;
    pauseReason?: string;
    blacklist: Identity[];
}

export type AdminActionType = 'change-admin' | 'change-treasury' | 'resume';

export interface PendingAdminAction {
    _id: string;
    kind: 'admin-action';
    admin: Identity;
    action: AdminActionType;
    newValue: string;
    requestedAt: number;
    executed: boolean;
}

export type LedgerRecord =
    | SupplyRecord
    | MinerAccount
    | Equipment
    | ReferralLink
    | SaleStats
    | ControlState
    | PendingAdminAction;

export type LedgerRecordKind = LedgerRecord['kind'];
export type RecordOfKind<K extends LedgerRecordKind> = Extract<LedgerRecord, { kind: K }>;

// ── Configuration ───────────────────────────────────────────
export interface HalvingScheduleConfig {
    /** Unix seconds at which epoch 0 starts. */
    genesisTime: number;
    epochLengthSeconds: number;
    /** Token base units per hash power per second, as a decimal string. */
    baseRate: string;
    halvingDivisor: number;
}

export type UnpaidReferralPolicy = 'buyer' | 'treasury';

export interface SaleConfig {
    burnRateBps: number;
    /** Share of the post-burn amount paid per referral level, nearest referrer first. */
    referralRatesBps: number[];
    maxReferralDepth: number;
    unpaidReferralTo: UnpaidReferralPolicy;
}

export interface BoxTier {
    name: string;
    minHashPower: number;
    maxHashPower: number;
    weight: number;
}

export interface ClaimLimits {
    /** Base units claimable per rolling day; the hourly allowance is a 24th of it. */
    maxPerDay: bigint;
}

// ── Results ─────────────────────────────────────────────────
export interface EpochSlice {
    epoch: number;
    from: number;
    to: number;
    /** Scaled rate (RATE_SCALE) applied across the slice. */
    rate: bigint;
}

export interface SettlementResult {
    owner: Identity;
    from: number;
    to: number;
    hashPower: number;
    accrued: bigint;
    pendingReward: bigint;
    slices: EpochSlice[];
}

export type ClaimLimitReason = 'supply-cap' | 'claim-limit';

export interface ClaimResult {
    owner: Identity;
    minted: bigint;
    shortfall: bigint;
    pendingReward: bigint;
    limitedBy?: ClaimLimitReason;
    settlement: SettlementResult;
}

export interface ReferralPayout {
    level: number;
    referrer: Identity;
    amount: bigint;
}

export interface PurchaseSplit {
    tokenAmount: bigint;
    burnAmount: bigint;
    payouts: ReferralPayout[];
    unpaidReferral: bigint;
    net: bigint;
}

export interface PurchaseResult extends PurchaseSplit {
    buyer: Identity;
    stableAmountIn: bigint;
    netRecipient: Identity;
    unpaidRecipient: Identity;
}

export interface BoxPurchaseResult {
    sale: PurchaseResult;
    equipment: Equipment;
    registered: boolean;
}

// ── Events (internal pub/sub) ───────────────────────────────
export interface MiningEvents {
    'supply:minted': (to: Identity, amount: bigint, reason: string) => void;
    'supply:burned': (from: Identity, amount: bigint, description: string) => void;
    'reward:settled': (result: SettlementResult) => void;
    'reward:claimed': (result: ClaimResult) => void;
    'equipment:created': (equipment: Equipment) => void;
    'equipment:registered': (equipment: Equipment, miner: MinerAccount) => void;
    'equipment:deregistered': (equipment: Equipment, miner: MinerAccount) => void;
    'equipment:transferred': (equipment: Equipment, from: Identity) => void;
    'equipment:retired': (equipmentId: string, owner: Identity) => void;
    'referral:linked': (link: ReferralLink) => void;
    'sale:completed': (result: PurchaseResult) => void;
    'security': (eventType: string, identity: Identity, reason: string) => void;
    'admin:action': (admin: Identity, action: string, details: string) => void;
}
