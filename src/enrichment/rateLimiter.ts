import { sleep as defaultSleep } from '../utils.js';

export interface TokenBucketOptions {
    ratePerSecond: number;
    burst: number;
    now?: () => number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Admission control for one external service: `burst` tokens, refilled at `ratePerSecond`.
 * Callers over the quota wait for the next token instead of failing.
 */
export class TokenBucket {
    private readonly ratePerSecond: number;

    private readonly burst: number;

    private readonly now: () => number;

    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

    private tokens: number;

    private updatedAt: number;

    constructor({ ratePerSecond, burst, now = Date.now, sleep = defaultSleep }: TokenBucketOptions) {
        if (ratePerSecond <= 0) throw new RangeError('ratePerSecond must be positive');
        this.ratePerSecond = ratePerSecond;
        this.burst = Math.max(1, burst);
        this.now = now;
        this.sleep = sleep;
        this.tokens = this.burst;
        this.updatedAt = now();
    }

    private refill(): void {
        const current = this.now();
        const elapsedSecs = Math.max(0, current - this.updatedAt) / 1000;
        this.tokens = Math.min(this.burst, this.tokens + elapsedSecs * this.ratePerSecond);
        this.updatedAt = current;
    }

    tryAcquire(): boolean {
        this.refill();
        if (this.tokens < 1) return false;
        this.tokens -= 1;
        return true;
    }

    /** Waits until a token is free. Rejects when the signal aborts while waiting. */
    async acquire(signal?: AbortSignal): Promise<void> {
        for (;;) {
            signal?.throwIfAborted();
            if (this.tryAcquire()) return;
            const waitMs = Math.ceil(((1 - this.tokens) / this.ratePerSecond) * 1000);
            await this.sleep(waitMs, signal);
        }
    }
}
