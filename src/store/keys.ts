import type { Identity } from '../types/index.js';

/**
 * Deterministic record addresses. Every lookup goes straight to its key,
 * so no secondary index is ever needed.
 */
export const SUPPLY_KEY = 'supply';
export const SALE_STATS_KEY = 'sale-stats';
export const CONTROL_KEY = 'control';

export const minerKey = (owner: Identity): string => `miner:${owner}`;
export const equipmentKey = (equipmentId: string): string => `equipment:${equipmentId}`;
export const referralKey = (referred: Identity): string => `referral:${referred}`;
export const adminActionKey = (admin: Identity): string => `admin-action:${admin}`;
