import { randomUUID } from 'node:crypto';

/**
 * Generates a UUID v4. Wraps Node.js crypto for testability.
 */
export const generateId = (): string => randomUUID();

/**
 * Equipment id: `rig-` followed by a UUID v4.
 */
export const generateEquipmentId = (): string => `rig-${randomUUID()}`;
