/**
 * Fixed-point helpers over bigint.
 *
 * Token amounts are integers in base units (10^decimals per whole token).
 * Reward rates carry an extra RATE_SCALE factor so fractional
 * per-second rates stay exact until a settlement floors them.
 */

export const RATE_DECIMALS = 18;
export const RATE_SCALE = 10n ** BigInt(RATE_DECIMALS);
export const BPS_DENOMINATOR = 10_000n;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Parse a non-negative decimal string ("12.5") into base units.
 * @throws If the string is malformed or has more fractional digits than `decimals`.
 */
export function parseUnits(value: string, decimals: number): bigint {
    const match = DECIMAL_PATTERN.exec(value.trim());
    if (!match) {
        throw new Error(`Invalid decimal amount "${value}"`);
    }
    const [, whole, fraction = ''] = match;
    if (fraction.length > decimals) {
        throw new Error(`Amount "${value}" has more than ${decimals} fractional digits`);
    }
    return BigInt(whole) * 10n ** BigInt(decimals) + BigInt(fraction.padEnd(decimals, '0') || '0');
}

/**
 * Render base units as a decimal string, trimming trailing zeros.
 */
export function formatUnits(value: bigint, decimals: number): string {
    const negative = value < 0n;
    const abs = negative ? -value : value;
    const scale = 10n ** BigInt(decimals);
    const whole = abs / scale;
    const fraction = (abs % scale).toString().padStart(decimals, '0').replace(/0+$/, '');
    const body = fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
    return negative ? `-${body}` : body;
}

/** floor(a * b / c) */
export function mulDiv(a: bigint, b: bigint, c: bigint): bigint {
    if (c === 0n) throw new Error('mulDiv: division by zero');
    return (a * b) / c;
}

/** floor(amount * bps / 10_000) */
export function bpsOf(amount: bigint, bps: number): bigint {
    return mulDiv(amount, BigInt(bps), BPS_DENOMINATOR);
}

export function minBigInt(first: bigint, ...rest: bigint[]): bigint {
    return rest.reduce((lowest, value) => (value < lowest ? value : lowest), first);
}
