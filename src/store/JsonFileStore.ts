/**
 * JsonFileStore: durable RecordStore backed by a single JSON document.
 *
 * The whole record map is rewritten on every commit through a temp file
 * and a rename, so a crash leaves either the old or the new document on disk.
 * Records are revalidated on load with the caller's parser.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type winston from 'winston';
import { createLogger } from '../utils/logger.js';
import { toJson } from '../utils/json.js';
import type { RecordBatch, RecordStore, StoredRecord } from './RecordStore.js';

export const RECORD_FILE_VERSION = 1;

interface RecordFile {
    version: number;
    savedAt: string;
    records: unknown[];
}

function isRecordFile(value: unknown): value is RecordFile {
    return typeof value === 'object'
        && value !== null
        && 'version' in value
        && typeof value.version === 'number'
        && 'records' in value
        && Array.isArray(value.records);
}

export class JsonFileStore<R extends StoredRecord> implements RecordStore<R> {
    private readonly data = new Map<string, R>();
    private writeQueue: Promise<void> = Promise.resolve();

    private constructor(
        private readonly filePath: string,
        private readonly logger: winston.Logger,
    ) { }

    /**
     * Open (or create on first commit) the document at `filePath`.
     * @param parse - validates one persisted record; throws on malformed input
     */
    static async open<R extends StoredRecord>(
        filePath: string,
        parse: (value: unknown) => R,
        logger: winston.Logger = createLogger('info', 'store'),
    ): Promise<JsonFileStore<R>> {
        const store = new JsonFileStore<R>(filePath, logger);
        let raw: string | null = null;
        try {
            raw = await readFile(filePath, 'utf8');
        } catch (error) {
            if (!(error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT')) {
                throw error;
            }
        }

        if (raw !== null) {
            const parsed: unknown = JSON.parse(raw);
            if (!isRecordFile(parsed)) {
                throw new Error(`${filePath} is not a record file`);
            }
            if (parsed.version !== RECORD_FILE_VERSION) {
                throw new Error(`${filePath} has unsupported version ${parsed.version}`);
            }
            for (const value of parsed.records) {
                const record = parse(value);
                store.data.set(record._id, record);
            }
            logger.debug('Loaded record file', { filePath, records: store.data.size });
        }
        return store;
    }

    async put(entry: R): Promise<void> {
        await this.commit({ puts: [entry], deletes: [] });
    }

    async get(id: string): Promise<R | null> {
        const entry = this.data.get(id);
        return entry ? structuredClone(entry) : null;
    }

    async del(id: string): Promise<void> {
        await this.commit({ puts: [], deletes: [id] });
    }

    async all(): Promise<Array<{ key: string; value: R }>> {
        return [...this.data.entries()].map(([key, value]) => ({ key, value: structuredClone(value) }));
    }

    async commit(batch: RecordBatch<R>): Promise<void> {
        const touched = [...batch.deletes, ...batch.puts.map((entry) => entry._id)];
        const previous = new Map(touched.map((id) => [id, this.data.get(id)]));

        for (const id of batch.deletes) {
            this.data.delete(id);
        }
        for (const entry of batch.puts) {
            this.data.set(entry._id, structuredClone(entry));
        }

        try {
            await this.persist();
        } catch (error) {
            for (const [id, entry] of previous) {
                if (entry) this.data.set(id, entry);
                else this.data.delete(id);
            }
            this.logger.error('Record file write failed, batch reverted', { filePath: this.filePath, error });
            throw error;
        }
    }

    private persist(): Promise<void> {
        const run = this.writeQueue.then(() => this.flush());
        // Keep the queue alive after a failed write; `run` still rejects for its caller.
        this.writeQueue = run.catch((error: unknown) => {
            this.logger.debug('Queued write failed', { error });
        });
        return run;
    }

    private async flush(): Promise<void> {
        const document: RecordFile = {
            version: RECORD_FILE_VERSION,
            savedAt: new Date().toISOString(),
            records: [...this.data.values()],
        };
        await mkdir(dirname(this.filePath), { recursive: true });
        const tempPath = `${this.filePath}.tmp`;
        await writeFile(tempPath, toJson(document, 2), 'utf8');
        await rename(tempPath, this.filePath);
    }
}
