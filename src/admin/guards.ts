import {
    BlacklistedError,
    MiningError,
    SystemPausedError,
} from '../errors/MiningError.js';
import type { RecordContext } from '../concurrency/RecordContext.js';
import { CONTROL_KEY } from '../store/keys.js';
import type { ControlState, Identity } from '../types/index.js';

/**
 * Point-in-time read of the control record. Pausing is a control-plane switch,
 * so operations read it without taking its lock.
 */
export async function readControl(context: RecordContext): Promise<ControlState> {
    const control = await context.read(CONTROL_KEY, 'control');
    if (!control) {
        throw new MiningError('CORRUPT_RECORD', 'Control state is not initialized', { key: CONTROL_KEY });
    }
    return control;
}

export function assertOperational(control: ControlState): void {
    if (control.paused) {
        throw new SystemPausedError(control.pauseReason);
    }
}

export function assertNotBlacklisted(control: ControlState, ...identities: Identity[]): void {
    for (const identity of identities) {
        if (control.blacklist.includes(identity)) {
            throw new BlacklistedError(identity);
        }
    }
}

/**
 * Shorthand used at the top of mutating entry points.
 */
export async function ensureOperational(context: RecordContext, ...identities: Identity[]): Promise<ControlState> {
    const control = await readControl(context);
    assertOperational(control);
    assertNotBlacklisted(control, ...identities);
    return control;
}
