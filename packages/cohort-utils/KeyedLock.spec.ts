import { KeyedLock } from './KeyedLock';
import { delay } from './timer';

describe('KeyedLock', () => {
    it('should serialize work for the same key', async () => {
        let lock = new KeyedLock();
        let events: string[] = [];
        let task = (name: string, ms: number) => lock.inLock('study', async () => {
            events.push(name + ':start');
            await delay(ms);
            events.push(name + ':end');
        });

        await Promise.all([task('a', 20), task('b', 1)]);

        expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    });

    it('should run different keys concurrently', async () => {
        let lock = new KeyedLock();
        let events: string[] = [];
        let task = (key: string, ms: number) => lock.inLock(key, async () => {
            events.push(key + ':start');
            await delay(ms);
            events.push(key + ':end');
        });

        await Promise.all([task('a', 30), task('b', 1)]);

        expect(events).toEqual(['a:start', 'b:start', 'b:end', 'a:end']);
    });

    it('should release lock on failure and drop idle keys', async () => {
        let lock = new KeyedLock();
        await expect(lock.inLock('study', async () => {
            throw new Error('failed');
        })).rejects.toThrow('failed');
        expect(await lock.inLock('study', () => 42)).toBe(42);
        expect(lock.size).toBe(0);
    });
});
