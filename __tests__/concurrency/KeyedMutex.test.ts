/**
 * KeyedMutex
 *
 * 1. One holder per key; waiters are served in arrival order
 * 2. Disjoint key sets never wait on each other
 * 3. Overlapping sets taken in any order do not deadlock
 * 4. Releasing twice is harmless
 */
import { KeyedMutex } from '../../src/concurrency/KeyedMutex.js';

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('KeyedMutex', () => {

    test('a second holder waits until the first releases', async () => {
        const mutex = new KeyedMutex();
        const first = await mutex.acquire(['a']);
        let acquired = false;
        const second = mutex.acquire(['a']).then((release) => {
            acquired = true;
            return release;
        });

        await flush();
        expect(acquired).toBe(false);
        expect(mutex.isLocked('a')).toBe(true);

        first();
        const release = await second;
        expect(acquired).toBe(true);
        release();
        expect(mutex.isLocked('a')).toBe(false);
    });

    test('waiters are served in the order they asked', async () => {
        const mutex = new KeyedMutex();
        const holder = await mutex.acquire(['k']);
        const order: number[] = [];
        const waiters = [1, 2, 3].map((n) =>
            mutex.acquire(['k']).then((release) => {
                order.push(n);
                release();
            }));

        holder();
        await Promise.all(waiters);
        expect(order).toEqual([1, 2, 3]);
    });

    test('disjoint key sets are held at the same time', async () => {
        const mutex = new KeyedMutex();
        const a = await mutex.acquire(['a']);
        const b = await mutex.acquire(['b']);
        expect(mutex.isLocked('a')).toBe(true);
        expect(mutex.isLocked('b')).toBe(true);
        a();
        b();
    });

    test('overlapping sets requested in opposite orders both complete', async () => {
        const mutex = new KeyedMutex();
        const log: string[] = [];
        const run = async (name: string, keys: string[]): Promise<void> => {
            const release = await mutex.acquire(keys);
            log.push(`${name}:start`);
            await flush();
            log.push(`${name}:end`);
            release();
        };

        await Promise.all([run('x', ['b', 'a']), run('y', ['a', 'b'])]);
        expect(log).toEqual(['x:start', 'x:end', 'y:start', 'y:end']);
    });

    test('calling a release twice does not free a later holder', async () => {
        const mutex = new KeyedMutex();
        const first = await mutex.acquire(['a']);
        first();
        const second = await mutex.acquire(['a']);
        first();
        expect(mutex.isLocked('a')).toBe(true);
        second();
        expect(mutex.isLocked('a')).toBe(false);
    });
});
