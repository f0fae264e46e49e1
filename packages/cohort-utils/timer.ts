import { exponentialBackoffDelay } from './exponentialBackoffDelay';

export async function delay(ms: number) {
    return new Promise<void>(resolve => {
        setTimeout(resolve, ms);
    });
}

export interface RetryOptions {
    maxFailureCount: number;
    minDelay: number;
    maxDelay: number;
    shouldRetry?: (e: unknown) => boolean;
}

const defaultRetryOptions: RetryOptions = {
    maxFailureCount: 5,
    minDelay: 500,
    maxDelay: 15000
};

export async function retry<T>(callback: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
    let opts = { ...defaultRetryOptions, ...options };
    let currentFailureCount = 0;
    while (true) {
        try {
            return await callback();
        } catch (e) {
            if (opts.shouldRetry && !opts.shouldRetry(e)) {
                throw e;
            }
            currentFailureCount++;
            if (currentFailureCount > opts.maxFailureCount) {
                throw e;
            }
            let waitForRequest = exponentialBackoffDelay(currentFailureCount, opts.minDelay, opts.maxDelay, opts.maxFailureCount);
            await delay(waitForRequest);
        }
    }
}

export function currentTime(): number {
    return new Date().getTime();
}

export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: currentTime
};

export class ManualClock implements Clock {
    private time: number;

    constructor(time: number = 0) {
        this.time = time;
    }

    now() {
        return this.time;
    }

    set(time: number) {
        this.time = time;
    }

    advance(ms: number) {
        this.time += ms;
    }
}

export class AsyncLock {
    private permits: number = 1;
    private promiseResolverQueue: Array<(v: boolean) => void> = [];

    get isIdle() {
        return this.permits === 1 && this.promiseResolverQueue.length === 0;
    }

    async inLock<T>(func: () => Promise<T> | T): Promise<T> {
        await this.lock();
        try {
            return await func();
        } finally {
            this.unlock();
        }
    }

    private async lock() {
        if (this.permits > 0) {
            this.permits = this.permits - 1;
            return;
        }
        await new Promise<boolean>(resolve => this.promiseResolverQueue.push(resolve));
    }

    private unlock() {
        this.permits += 1;
        if (this.permits > 1 && this.promiseResolverQueue.length > 0) {
            throw new Error('this.permits should never be > 0 when there is someone waiting.');
        } else if (this.permits === 1 && this.promiseResolverQueue.length > 0) {
            // Hand the released permit straight to the next waiter
            this.permits -= 1;

            const nextResolver = this.promiseResolverQueue.shift();
            if (nextResolver) {
                setTimeout(() => {
                    nextResolver(true);
                }, 0);
            }
        }
    }
}
