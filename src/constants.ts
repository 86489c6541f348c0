export const PAGE_DELAY_MS = 500;

export const MAX_CONCURRENCY = 5;

export const INPUT_DEFAULTS = {
    sources: ['OLX' as const, 'OTODOM' as const],
    maxListingsPerSource: 100,
    destination: null,
    enrichmentConcurrency: 4,
    deadlineSecs: null,
    cacheStoreId: 'enrichment-cache',
    cacheTtlHours: null,
    cacheFlushEvery: 25,
    priceTolerance: 0.01,
    areaTolerance: 1,
    fingerprintPrecision: 4,
    userOffers: [],
};

export const ENRICHMENT_CACHE_KEY = 'ENRICHMENT_CACHE';

/** Keys of the per-run key-value store. */
export const RUN_STORE_KEYS = {
    rawOlx: 'RAW_OLX',
    rawOtodom: 'RAW_OTODOM',
    combined: 'COMBINED',
    enriched: 'ENRICHED',
    cacheDelta: 'ENRICHMENT_CACHE_DELTA',
    model: 'MODEL',
    diagnostics: 'DIAGNOSTICS',
} as const;

export const RETRY_DEFAULTS = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    factor: 2,
    maxDelayMs: 10_000,
};

// Nominatim usage policy: at most 1 request per second
export const GEOCODING_RATE_LIMIT = { ratePerSecond: 1, burst: 1 };

// OpenRouteService free plan: 40 directions requests per minute
export const ROUTING_RATE_LIMIT = { ratePerSecond: 40 / 60, burst: 5 };

export const REQUEST_TIMEOUT_MS = 10_000;

export const MODEL_FEATURE_COLUMNS = ['areaM2', 'rooms', 'travelTimeMinutes'];

export const MODEL_TARGET_COLUMN = 'price';

export const FETCH_HEADERS = {
    'User-Agent': 'Mozilla/5.0 (compatible; FlatMarketPipeline/1.0)',
    Accept: 'application/json',
    'Accept-Language': 'pl-PL,pl;q=0.9,en;q=0.7',
};
