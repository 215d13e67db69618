import { InvalidInputError } from '../errors/MiningError.js';

/**
 * Returns the current Unix timestamp in whole seconds.
 * Wrapped in a function for testability (can be mocked).
 */
export const nowSeconds = (): number => Math.floor(Date.now() / 1000);

/** Rejects anything but a whole number of seconds. */
export function assertTimestamp(now: number, field = 'now'): void {
    if (!Number.isSafeInteger(now)) {
        throw new InvalidInputError(`${field} must be a whole number of seconds`, { [field]: now });
    }
}
