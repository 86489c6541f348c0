import { createHash } from 'node:crypto';

import { log } from 'apify';
import { z } from 'zod';

import { ENRICHMENT_CACHE_KEY } from '../constants.js';
import type { KeyValueStoreLike } from '../storage.js';
import type { Coordinates, EnrichmentCacheEntry, EnrichmentCacheStore } from '../types.js';
import { normalizeText, roundTo } from '../utils.js';

export interface EnrichmentCacheOptions {
    store: KeyValueStoreLike;
    ttlMs?: number | null; // null = entries never go stale
    flushEvery?: number;
    precision?: number;
    now?: () => number;
}

const cacheEntrySchema = z.object({
    locationFingerprint: z.string().min(1),
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
    travelTimeMinutes: z.number().nonnegative().nullable(),
    resolvedAt: z.string().datetime(),
});

const cacheStoreSchema = z.record(z.unknown());

const isCoordinates = (value: string | Coordinates): value is Coordinates => typeof value !== 'string';

/**
 * Process-wide map of location fingerprints to resolved coordinates and travel times.
 * Loaded once per run, written through in memory on every resolution and flushed to the
 * durable store every `flushEvery` writes and when the run ends.
 */
export class EnrichmentCache {
    private readonly store: KeyValueStoreLike;

    private readonly ttlMs: number | null;

    private readonly flushEvery: number;

    readonly precision: number;

    private readonly now: () => number;

    private readonly entries = new Map<string, EnrichmentCacheEntry>();

    private readonly written = new Map<string, EnrichmentCacheEntry>();

    private readonly locks = new Map<string, Promise<unknown>>();

    private writesSinceFlush = 0;

    private flushing: Promise<void> = Promise.resolve();

    constructor({ store, ttlMs = null, flushEvery = 25, precision = 4, now = Date.now }: EnrichmentCacheOptions) {
        this.store = store;
        this.ttlMs = ttlMs;
        this.flushEvery = Math.max(1, flushEvery);
        this.precision = precision;
        this.now = now;
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * Reads the durable cache, then layers `extra` (e.g. a prior run's delta) on top.
     * Entries that do not match the cache entry shape are skipped.
     */
    async load(extra: unknown = null): Promise<void> {
        const stored = await this.store.getValue<unknown>(ENRICHMENT_CACHE_KEY);
        this.written.clear();
        this.writesSinceFlush = 0;

        let skipped = 0;
        for (const source of [stored, extra]) {
            if (source === null || source === undefined) continue;
            const records = cacheStoreSchema.safeParse(source);
            if (!records.success) {
                log.warning('[enrichment] Ignoring a cache snapshot that is not a record of entries');
                continue;
            }
            for (const [fingerprint, value] of Object.entries(records.data)) {
                const entry = cacheEntrySchema.safeParse(value);
                if (entry.success) this.entries.set(fingerprint, entry.data);
                else skipped += 1;
            }
        }
        if (skipped > 0) log.warning(`[enrichment] Skipped ${skipped} malformed cache entries`);
        log.info(`[enrichment] Loaded ${this.entries.size} cached locations`);
    }

    /** Coordinates rounded to `precision` decimals, or a hash of the case-folded, whitespace-collapsed address. */
    fingerprint(location: string | Coordinates): string {
        if (isCoordinates(location)) {
            const lat = roundTo(location.lat, this.precision).toFixed(this.precision);
            const lon = roundTo(location.lon, this.precision).toFixed(this.precision);
            return `coords:${lat},${lon}`;
        }
        const digest = createHash('sha1').update(normalizeText(location)).digest('hex');
        return `address:${digest}`;
    }

    routeFingerprint(origin: Coordinates, destination: Coordinates): string {
        const point = (coords: Coordinates) => this.fingerprint(coords).slice('coords:'.length);
        return `route:${point(origin)}->${point(destination)}`;
    }

    private isStale(entry: EnrichmentCacheEntry): boolean {
        if (this.ttlMs === null) return false;
        return this.now() - Date.parse(entry.resolvedAt) > this.ttlMs;
    }

    get(fingerprint: string): EnrichmentCacheEntry | undefined {
        const entry = this.entries.get(fingerprint);
        return entry && !this.isStale(entry) ? entry : undefined;
    }

    /**
     * Stores a resolution unless a fresh entry already exists for the fingerprint.
     * Resolves to whether the entry was written.
     */
    async put(
        fingerprint: string,
        entry: Omit<EnrichmentCacheEntry, 'locationFingerprint' | 'resolvedAt'>,
    ): Promise<boolean> {
        if (this.get(fingerprint)) return false;
        const stored: EnrichmentCacheEntry = {
            ...entry,
            locationFingerprint: fingerprint,
            resolvedAt: new Date(this.now()).toISOString(),
        };
        this.entries.set(fingerprint, stored);
        this.written.set(fingerprint, stored);
        this.writesSinceFlush += 1;
        if (this.writesSinceFlush >= this.flushEvery) {
            // The entry stays in memory and goes out with the next flush
            await this.flush().catch((error: unknown) => {
                log.warning('[enrichment] Periodic cache flush failed', { error });
            });
        }
        return true;
    }

    /**
     * Runs `task` once any earlier task holding the same fingerprint has settled, so concurrent
     * lookups of one location wait for the first resolution instead of calling out again.
     */
    async withLock<T>(fingerprint: string, task: () => Promise<T>): Promise<T> {
        const previous = this.locks.get(fingerprint) ?? Promise.resolve();
        const current = previous.catch(() => undefined).then(task);
        this.locks.set(fingerprint, current);
        try {
            return await current;
        } finally {
            if (this.locks.get(fingerprint) === current) this.locks.delete(fingerprint);
        }
    }

    /** Drops one entry, or everything when called without a fingerprint. Takes effect on the next flush. */
    invalidate(fingerprint?: string): void {
        if (fingerprint === undefined) {
            this.entries.clear();
            this.written.clear();
        } else {
            this.entries.delete(fingerprint);
            this.written.delete(fingerprint);
        }
        this.writesSinceFlush += 1;
    }

    /** Entries resolved since this cache was last loaded, minus invalidated ones. */
    delta(): EnrichmentCacheStore {
        return Object.fromEntries(this.written);
    }

    async flush(): Promise<void> {
        this.writesSinceFlush = 0;
        const snapshot: EnrichmentCacheStore = Object.fromEntries(this.entries);
        // A failed earlier flush was already reported to its caller; later flushes still run
        const write = this.flushing
            .catch(() => undefined)
            .then(async () => this.store.setValue(ENRICHMENT_CACHE_KEY, snapshot));
        this.flushing = write;
        await write;
        log.debug(`[enrichment] Flushed ${Object.keys(snapshot).length} cache entries`);
    }
}
