import { Clock, systemClock } from './timer';

type CacheEntry<T> = {
    value: T,
    savedAt: number
};

/**
 * Process-local cache keyed by string. Entries expire `timeout` ms after they were saved,
 * or never with `timeout: 'forever'`. Expiry is evaluated against the injected clock on read.
 */
export class ExpiringCache<T> {
    private readonly _timeout: number | 'forever';
    private readonly _clock: Clock;
    private readonly _cache = new Map<string, CacheEntry<T>>();
    private readonly _pending = new Map<string, Promise<T>>();
    // Bumped on delete, so loads started earlier neither save nor get shared
    private readonly _generations = new Map<string, number>();

    constructor(opts?: { timeout?: number | 'forever', clock?: Clock }) {
        if (opts && opts.timeout !== undefined) {
            this._timeout = opts.timeout;
        } else {
            this._timeout = 30 * 1000; // 30 sec
        }
        this._clock = (opts && opts.clock) || systemClock;
    }

    get(key: string): T | null {
        let res = this._cache.get(key);
        if (!res) {
            return null;
        }
        if (this._timeout !== 'forever' && this._clock.now() - res.savedAt >= this._timeout) {
            this._cache.delete(key);
            return null;
        }
        return res.value;
    }

    save(key: string, value: T) {
        this._cache.set(key, { value, savedAt: this._clock.now() });
    }

    delete(key: string) {
        this._cache.delete(key);
        this._pending.delete(key);
        this._generations.set(key, this.generation(key) + 1);
    }

    /**
     * Returns the cached value or loads, saves and returns a fresh one.
     * Concurrent loads of the same key share one loader call. Failed loads are not cached.
     */
    async getOrLoad(key: string, loader: () => Promise<T>): Promise<T> {
        let cached = this.get(key);
        if (cached !== null) {
            return cached;
        }
        let pending = this._pending.get(key);
        if (pending) {
            return pending;
        }
        let generation = this.generation(key);
        let promise = (async () => {
            try {
                let value = await loader();
                if (this.generation(key) === generation) {
                    this.save(key, value);
                }
                return value;
            } finally {
                if (this.generation(key) === generation) {
                    this._pending.delete(key);
                }
            }
        })();
        this._pending.set(key, promise);
        return promise;
    }

    private generation(key: string) {
        return this._generations.get(key) || 0;
    }
}
