import { log } from 'apify';

import { RETRY_DEFAULTS } from '../constants.js';
import { GeoNotFound, RouteNotFound } from '../errors.js';
import type { CombinedListing, Coordinates, GeocodingService, RoutingService } from '../types.js';
import { describeError, raceAbort, sleep as defaultSleep } from '../utils.js';
import type { EnrichmentCache } from './cache.js';
import type { TokenBucket } from './rateLimiter.js';

export interface RetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    factor: number;
    maxDelayMs: number;
}

export interface EnrichmentClientOptions {
    cache: EnrichmentCache;
    geocoder: GeocodingService;
    router: RoutingService;
    geocodingLimiter: TokenBucket;
    routingLimiter: TokenBucket;
    retry?: Partial<RetryPolicy>;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type EnrichmentStatus = 'complete' | 'partial' | 'failed' | 'timed-out';

export interface EnrichmentOutcome {
    status: EnrichmentStatus;
    latitude: number | null;
    longitude: number | null;
    travelTimeMinutes: number | null;
    errors: string[];
}

const LOG_PREFIX = '[enrichment]';

export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
    Math.min(policy.maxDelayMs, policy.baseDelayMs * policy.factor ** (attempt - 1));

const formatCoords = ({ lat, lon }: Coordinates): string => `${lat},${lon}`;

/**
 * Resolves coordinates and travel times for listings. Every lookup goes through the shared
 * cache first; misses wait for a rate-limiter token and are retried with exponential backoff.
 */
export class EnrichmentClient {
    private readonly cache: EnrichmentCache;

    private readonly geocoder: GeocodingService;

    private readonly router: RoutingService;

    private readonly geocodingLimiter: TokenBucket;

    private readonly routingLimiter: TokenBucket;

    private readonly retry: RetryPolicy;

    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

    readonly stats = { cacheHits: 0, networkCalls: 0 };

    constructor(options: EnrichmentClientOptions) {
        this.cache = options.cache;
        this.geocoder = options.geocoder;
        this.router = options.router;
        this.geocodingLimiter = options.geocodingLimiter;
        this.routingLimiter = options.routingLimiter;
        this.retry = { ...RETRY_DEFAULTS, ...options.retry };
        this.sleep = options.sleep ?? defaultSleep;
    }

    private async callWithRetry<T>(
        service: string,
        limiter: TokenBucket,
        call: () => Promise<T>,
        signal?: AbortSignal,
    ): Promise<T> {
        for (let attempt = 1; ; attempt++) {
            await limiter.acquire(signal);
            this.stats.networkCalls += 1;
            try {
                // On abort the pending call is abandoned, its late result is ignored
                return await raceAbort(call(), signal);
            } catch (error) {
                if (signal?.aborted || attempt >= this.retry.maxAttempts) throw error;
                const delayMs = backoffDelay(this.retry, attempt);
                log.debug(`${LOG_PREFIX} ${service} attempt ${attempt} failed, retrying in ${delayMs} ms`, {
                    error: describeError(error),
                });
                await this.sleep(delayMs, signal);
            }
        }
    }

    async resolveGeocode(address: string, signal?: AbortSignal): Promise<Coordinates> {
        const fingerprint = this.cache.fingerprint(address);
        return this.cache.withLock(fingerprint, async () => {
            const hit = this.cache.get(fingerprint);
            if (hit) {
                this.stats.cacheHits += 1;
                return { lat: hit.latitude, lon: hit.longitude };
            }

            let coords: Coordinates | null;
            try {
                coords = await this.callWithRetry(
                    'geocoding',
                    this.geocodingLimiter,
                    async () => this.geocoder.geocode(address),
                    signal,
                );
            } catch (error) {
                if (signal?.aborted) throw error;
                throw new GeoNotFound(address, { cause: error });
            }
            if (!coords) throw new GeoNotFound(address);

            await this.cache.put(fingerprint, { latitude: coords.lat, longitude: coords.lon, travelTimeMinutes: null });
            return coords;
        });
    }

    async resolveTravelTime(origin: Coordinates, destination: Coordinates, signal?: AbortSignal): Promise<number> {
        const fingerprint = this.cache.routeFingerprint(origin, destination);
        return this.cache.withLock(fingerprint, async () => {
            const hit = this.cache.get(fingerprint);
            if (hit && hit.travelTimeMinutes !== null) {
                this.stats.cacheHits += 1;
                return hit.travelTimeMinutes;
            }

            let minutes: number | null;
            try {
                minutes = await this.callWithRetry(
                    'routing',
                    this.routingLimiter,
                    async () => this.router.travelTime(origin, destination),
                    signal,
                );
            } catch (error) {
                if (signal?.aborted) throw error;
                throw new RouteNotFound(formatCoords(origin), formatCoords(destination), { cause: error });
            }
            if (minutes === null || !Number.isFinite(minutes) || minutes < 0) {
                throw new RouteNotFound(formatCoords(origin), formatCoords(destination));
            }

            await this.cache.put(fingerprint, { latitude: origin.lat, longitude: origin.lon, travelTimeMinutes: minutes });
            return minutes;
        });
    }

    private async geocodeListing(listing: CombinedListing, signal?: AbortSignal): Promise<Coordinates> {
        if (listing.latitude !== null && listing.longitude !== null) {
            return { lat: listing.latitude, lon: listing.longitude };
        }
        const queries = [listing.addressText, listing.city].filter(
            (query, index, all): query is string => !!query && all.indexOf(query) === index,
        );
        let lastError: unknown = new GeoNotFound(listing.addressText);
        // The city alone still places the listing when the full address is unknown
        for (const query of queries) {
            try {
                return await this.resolveGeocode(query, signal);
            } catch (error) {
                if (!(error instanceof GeoNotFound)) throw error;
                lastError = error;
            }
        }
        throw lastError;
    }

    /**
     * Fills coordinates and travel time for one listing. Never rejects for a lookup failure or
     * a deadline: fields that could not be resolved stay null and the outcome says why.
     */
    async enrichListing(
        listing: CombinedListing,
        destination: Coordinates | null,
        signal?: AbortSignal,
    ): Promise<EnrichmentOutcome> {
        const outcome: EnrichmentOutcome = {
            status: 'failed',
            latitude: listing.latitude,
            longitude: listing.longitude,
            travelTimeMinutes: listing.travelTimeMinutes,
            errors: [],
        };

        try {
            const coords = await this.geocodeListing(listing, signal);
            outcome.latitude = coords.lat;
            outcome.longitude = coords.lon;
            outcome.status = destination ? 'partial' : 'complete';
            if (destination) {
                outcome.travelTimeMinutes = await this.resolveTravelTime(coords, destination, signal);
                outcome.status = 'complete';
            }
        } catch (error) {
            if (signal?.aborted) {
                outcome.status = 'timed-out';
            } else if (!(error instanceof GeoNotFound || error instanceof RouteNotFound)) {
                throw error;
            }
            outcome.errors.push(describeError(error));
            log.debug(`${LOG_PREFIX} Listing ${listing.externalId.join('/')} left partly unresolved`, {
                status: outcome.status,
                error: describeError(error),
            });
        }
        return outcome;
    }
}
