/**
 * KeyedMutex: exclusive, FIFO access to named records.
 *
 * A caller asks for every key it will touch up front. Keys are taken in
 * sorted order, so two callers with overlapping key sets can never wait on
 * each other in a cycle.
 */

export type Release = () => void;

export class KeyedMutex {
    private readonly tails = new Map<string, Promise<void>>();

    async acquire(keys: Iterable<string>): Promise<Release> {
        const ordered = [...new Set(keys)].sort();
        const releases: Release[] = [];
        for (const key of ordered) {
            releases.push(await this.acquireOne(key));
        }
        let released = false;
        return () => {
            if (released) return;
            released = true;
            for (const release of releases.reverse()) release();
        };
    }

    /**
     * Whether someone currently holds or waits for `key`.
     */
    isLocked(key: string): boolean {
        return this.tails.has(key);
    }

    private async acquireOne(key: string): Promise<Release> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        let unlock: () => void = () => undefined;
        const held = new Promise<void>((resolve) => { unlock = resolve; });
        const tail = previous.then(() => held);
        this.tails.set(key, tail);

        await previous;

        return () => {
            unlock();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        };
    }
}
