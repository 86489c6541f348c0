import { describe, expect, it } from 'vitest';

import { TokenBucket } from '../enrichment/rateLimiter.js';

const createBucket = (ratePerSecond: number, burst: number) => {
    const clock = { now: 0 };
    const sleeps: number[] = [];
    const bucket = new TokenBucket({
        ratePerSecond,
        burst,
        now: () => clock.now,
        sleep: async (ms) => {
            sleeps.push(ms);
            clock.now += ms;
        },
    });
    return { bucket, clock, sleeps };
};

describe('TokenBucket', () => {
    it('should hand out the burst immediately and then refuse', () => {
        const { bucket } = createBucket(2, 2);

        expect([bucket.tryAcquire(), bucket.tryAcquire(), bucket.tryAcquire()]).toEqual([true, true, false]);
    });

    it('should wait for the next token instead of failing', async () => {
        const { bucket, sleeps } = createBucket(2, 2);
        bucket.tryAcquire();
        bucket.tryAcquire();

        await bucket.acquire();

        expect(sleeps).toEqual([500]);
    });

    it('should keep the long-run rate at the configured quota', async () => {
        const { bucket, clock } = createBucket(1, 1);

        for (let i = 0; i < 5; i++) await bucket.acquire();

        expect(clock.now).toBe(4000);
    });

    it('should not accumulate more tokens than the burst', () => {
        const { bucket, clock } = createBucket(2, 2);
        clock.now += 10_000;

        expect([bucket.tryAcquire(), bucket.tryAcquire(), bucket.tryAcquire()]).toEqual([true, true, false]);
    });

    it('should reject a waiting caller when the signal aborts', async () => {
        const { bucket } = createBucket(1, 1);
        const controller = new AbortController();
        controller.abort(new Error('deadline'));

        await expect(bucket.acquire(controller.signal)).rejects.toThrow('deadline');
    });

    it('should refuse a non-positive rate', () => {
        expect(() => new TokenBucket({ ratePerSecond: 0, burst: 1 })).toThrow(RangeError);
    });
});
