/**
 * JSON helpers that understand bigint amounts.
 * Amounts are written as decimal strings; readers convert them back
 * through the record schemas rather than guessing from the shape.
 */

export const bigintReplacer = (_key: string, value: unknown): unknown =>
    typeof value === 'bigint' ? value.toString() : value;

export const toJson = (value: unknown, space?: number): string =>
    JSON.stringify(value, bigintReplacer, space);
