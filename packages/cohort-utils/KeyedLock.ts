import { AsyncLock } from './timer';

/**
 * Serializes work per key. Different keys run concurrently; locks for idle keys are dropped.
 */
export class KeyedLock {
    private readonly locks = new Map<string, AsyncLock>();

    async inLock<T>(key: string, func: () => Promise<T> | T): Promise<T> {
        let lock = this.locks.get(key);
        if (!lock) {
            lock = new AsyncLock();
            this.locks.set(key, lock);
        }
        let current = lock;
        try {
            return await current.inLock(func);
        } finally {
            if (current.isIdle && this.locks.get(key) === current) {
                this.locks.delete(key);
            }
        }
    }

    get size() {
        return this.locks.size;
    }
}
