import { EventEmitter } from 'node:events';
import type { MiningEvents } from '../types/index.js';

/**
 * EventEmitter with the event names and listener signatures pinned to MiningEvents.
 */
export class MiningEventBus {
    private readonly emitter = new EventEmitter();

    on<E extends keyof MiningEvents>(event: E, listener: MiningEvents[E]): this {
        this.emitter.on(event, listener);
        return this;
    }

    once<E extends keyof MiningEvents>(event: E, listener: MiningEvents[E]): this {
        this.emitter.once(event, listener);
        return this;
    }

    off<E extends keyof MiningEvents>(event: E, listener: MiningEvents[E]): this {
        this.emitter.off(event, listener);
        return this;
    }

    emit<E extends keyof MiningEvents>(event: E, ...args: Parameters<MiningEvents[E]>): boolean {
        return this.emitter.emit(event, ...args);
    }

    removeAllListeners(): void {
        this.emitter.removeAllListeners();
    }
}
