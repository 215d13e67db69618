/**
 * RecordStore: keyed persistence behind every engine component.
 *
 * Same shape as a key-value database collection (put/get/del/all) plus an
 * atomic `commit` that applies a whole batch or nothing.
 */

export interface StoredRecord {
    _id: string;
}

export interface RecordBatch<R extends StoredRecord> {
    puts: R[];
    deletes: string[];
}

export interface RecordStore<R extends StoredRecord> {
    put(entry: R): Promise<void>;
    get(id: string): Promise<R | null>;
    del(id: string): Promise<void>;
    all(): Promise<Array<{ key: string; value: R }>>;
    commit(batch: RecordBatch<R>): Promise<void>;
}

/**
 * In-memory store: for testing and ephemeral runs.
 * Entries are cloned on the way in and out so callers never share
 * references with stored state.
 */
export class InMemoryStore<R extends StoredRecord> implements RecordStore<R> {
    private readonly data = new Map<string, R>();

    constructor(initial: Iterable<R> = []) {
        for (const entry of initial) {
            this.data.set(entry._id, structuredClone(entry));
        }
    }

    async put(entry: R): Promise<void> {
        this.data.set(entry._id, structuredClone(entry));
    }

    async get(id: string): Promise<R | null> {
        const entry = this.data.get(id);
        return entry ? structuredClone(entry) : null;
    }

    async del(id: string): Promise<void> {
        this.data.delete(id);
    }

    async all(): Promise<Array<{ key: string; value: R }>> {
        return [...this.data.entries()].map(([key, value]) => ({ key, value: structuredClone(value) }));
    }

    async commit(batch: RecordBatch<R>): Promise<void> {
        // Single synchronous section: no await between the first and last write.
        for (const id of batch.deletes) {
            this.data.delete(id);
        }
        for (const entry of batch.puts) {
            this.data.set(entry._id, structuredClone(entry));
        }
    }

    get size(): number {
        return this.data.size;
    }
}
