/**
 * Error family for every engine entry point.
 *
 * Each subclass maps to one stable `code`. `retryable` marks the failures a
 * caller may retry as-is or with a smaller request; everything else is a
 * caller or configuration error and must not be blindly replayed.
 */

export type MiningErrorCode =
    | 'SUPPLY_CAP_EXCEEDED'
    | 'INSUFFICIENT_BURNABLE'
    | 'NON_MONOTONIC_TIME'
    | 'NOT_OWNER'
    | 'ALREADY_REGISTERED'
    | 'NOT_REGISTERED'
    | 'EQUIPMENT_ACTIVE'
    | 'EQUIPMENT_NOT_FOUND'
    | 'UNKNOWN_MINER'
    | 'CHAIN_TOO_DEEP'
    | 'REFERRER_ALREADY_SET'
    | 'REFERRAL_CYCLE'
    | 'INVALID_INPUT'
    | 'SYSTEM_PAUSED'
    | 'UNAUTHORIZED'
    | 'BLACKLISTED'
    | 'TIMELOCK_PENDING'
    | 'NO_PENDING_ACTION'
    | 'INSUFFICIENT_BALANCE'
    | 'CONCURRENCY_CONFLICT'
    | 'CORRUPT_RECORD'
    | 'COMPENSATION_FAILED';

export class MiningError extends Error {
    public readonly code: MiningErrorCode;
    public readonly details: Record<string, unknown>;
    public readonly retryable: boolean;
    public override readonly cause?: unknown;

    constructor(
        code: MiningErrorCode,
        message: string,
        details: Record<string, unknown> = {},
        options: { retryable?: boolean; cause?: unknown } = {},
    ) {
        super(message);
        this.name = 'MiningError';
        this.code = code;
        this.details = details;
        this.retryable = options.retryable ?? false;
        this.cause = options.cause;
    }
}

export class SupplyCapExceededError extends MiningError {
    constructor(requested: bigint, headroom: bigint) {
        super(
            'SUPPLY_CAP_EXCEEDED',
            `Mint of ${requested} exceeds remaining supply headroom ${headroom}`,
            { requested, headroom },
            { retryable: true },
        );
        this.name = 'SupplyCapExceededError';
    }
}

export class InsufficientBurnableError extends MiningError {
    constructor(requested: bigint, circulating: bigint) {
        super(
            'INSUFFICIENT_BURNABLE',
            `Burn of ${requested} exceeds circulating supply ${circulating}`,
            { requested, circulating },
        );
        this.name = 'InsufficientBurnableError';
    }
}

export class NonMonotonicTimeError extends MiningError {
    constructor(owner: string, now: number, lastSettlement: number) {
        super(
            'NON_MONOTONIC_TIME',
            `Settlement for ${owner} at ${now} is not after last settlement ${lastSettlement}`,
            { owner, now, lastSettlement },
        );
        this.name = 'NonMonotonicTimeError';
    }
}

export class NotOwnerError extends MiningError {
    constructor(equipmentId: string, caller: string, owner: string | null) {
        super('NOT_OWNER', `${caller} does not own equipment ${equipmentId}`, { equipmentId, caller, owner });
        this.name = 'NotOwnerError';
    }
}

export class AlreadyRegisteredError extends MiningError {
    constructor(equipmentId: string) {
        super('ALREADY_REGISTERED', `Equipment ${equipmentId} is already registered`, { equipmentId });
        this.name = 'AlreadyRegisteredError';
    }
}

export class NotRegisteredError extends MiningError {
    constructor(equipmentId: string) {
        super('NOT_REGISTERED', `Equipment ${equipmentId} is not registered`, { equipmentId });
        this.name = 'NotRegisteredError';
    }
}

export class EquipmentActiveError extends MiningError {
    constructor(equipmentId: string) {
        super(
            'EQUIPMENT_ACTIVE',
            `Equipment ${equipmentId} must be deregistered before it changes hands`,
            { equipmentId },
        );
        this.name = 'EquipmentActiveError';
    }
}

export class EquipmentNotFoundError extends MiningError {
    constructor(equipmentId: string) {
        super('EQUIPMENT_NOT_FOUND', `Equipment ${equipmentId} not found`, { equipmentId });
        this.name = 'EquipmentNotFoundError';
    }
}

export class UnknownMinerError extends MiningError {
    constructor(owner: string) {
        super('UNKNOWN_MINER', `No miner account for ${owner}`, { owner });
        this.name = 'UnknownMinerError';
    }
}

export class ChainTooDeepError extends MiningError {
    constructor(identity: string, maxDepth: number) {
        super(
            'CHAIN_TOO_DEEP',
            `Referral chain of ${identity} exceeds the maximum depth of ${maxDepth}`,
            { identity, maxDepth },
        );
        this.name = 'ChainTooDeepError';
    }
}

export class ReferrerAlreadySetError extends MiningError {
    constructor(referred: string, referrer: string) {
        super('REFERRER_ALREADY_SET', `${referred} is already referred by ${referrer}`, { referred, referrer });
        this.name = 'ReferrerAlreadySetError';
    }
}

export class ReferralCycleError extends MiningError {
    constructor(referred: string, referrer: string) {
        super('REFERRAL_CYCLE', `Linking ${referred} to ${referrer} would create a cycle`, { referred, referrer });
        this.name = 'ReferralCycleError';
    }
}

export class InvalidInputError extends MiningError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super('INVALID_INPUT', message, details);
        this.name = 'InvalidInputError';
    }
}

export class SystemPausedError extends MiningError {
    constructor(reason: string | undefined) {
        super('SYSTEM_PAUSED', `System is paused${reason ? `: ${reason}` : ''}`, { reason });
        this.name = 'SystemPausedError';
    }
}

export class UnauthorizedError extends MiningError {
    constructor(caller: string, action: string) {
        super('UNAUTHORIZED', `${caller} is not allowed to ${action}`, { caller, action });
        this.name = 'UnauthorizedError';
    }
}

export class BlacklistedError extends MiningError {
    constructor(identity: string) {
        super('BLACKLISTED', `${identity} is blacklisted`, { identity });
        this.name = 'BlacklistedError';
    }
}

export class TimelockPendingError extends MiningError {
    constructor(executableAt: number, now: number) {
        super(
            'TIMELOCK_PENDING',
            `Admin action executable at ${executableAt}, now is ${now}`,
            { executableAt, now },
        );
        this.name = 'TimelockPendingError';
    }
}

export class NoPendingActionError extends MiningError {
    constructor(admin: string) {
        super('NO_PENDING_ACTION', `No pending admin action for ${admin}`, { admin });
        this.name = 'NoPendingActionError';
    }
}

export class InsufficientBalanceError extends MiningError {
    constructor(holder: string, balance: bigint, requested: bigint) {
        super(
            'INSUFFICIENT_BALANCE',
            `Insufficient balance for ${holder}: has ${balance}, needs ${requested}`,
            { holder, balance, requested },
        );
        this.name = 'InsufficientBalanceError';
    }
}

export class ConcurrencyConflictError extends MiningError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super('CONCURRENCY_CONFLICT', message, details, { retryable: true });
        this.name = 'ConcurrencyConflictError';
    }
}

export class CorruptRecordError extends MiningError {
    constructor(key: string, expected: string, actual: string) {
        super('CORRUPT_RECORD', `Record ${key} is a ${actual}, expected ${expected}`, { key, expected, actual });
        this.name = 'CorruptRecordError';
    }
}

export class CompensationFailedError extends MiningError {
    constructor(cause: unknown, failures: unknown[]) {
        super(
            'COMPENSATION_FAILED',
            `Operation failed and ${failures.length} compensating step(s) could not be undone`,
            { failures: failures.map(describeError) },
            { cause },
        );
        this.name = 'CompensationFailedError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isMiningError(error: unknown): error is MiningError {
    return error instanceof MiningError;
}
