import type { ProxyConfigurationOptions } from 'apify';

export const SOURCES = ['OLX', 'OTODOM'] as const;

export type Source = (typeof SOURCES)[number];

export interface Coordinates {
    lat: number;
    lon: number;
}

export interface Input {
    locationQuery: string;
    maxListingsPerSource: number;
    sources: Source[];
    destination: Coordinates | null; // travel-time target, null = skip travel times
    openRouteServiceApiKey?: string;
    enrichmentConcurrency: number;
    deadlineSecs: number | null; // null = no deadline
    cacheStoreId: string; // named KV store holding the cross-run enrichment cache
    cacheTtlHours: number | null; // null = entries never expire
    cacheFlushEvery: number;
    reuseCacheFrom?: string; // run key whose cache delta is preloaded
    priceTolerance: number; // relative, 0.01 = 1 %
    areaTolerance: number; // absolute, m²
    fingerprintPrecision: number; // decimals kept when rounding coordinates
    userOffers: RawListing[];
    proxyConfiguration?: ProxyConfigurationOptions & { useApifyProxy?: boolean };
}

export interface RawListing {
    source: Source;
    externalId: string;
    url: string;
    rawFields: Record<string, string>;
    htmlSnapshot: string | null;
}

export interface NormalizedListing {
    source: Source;
    externalId: string;
    url: string;
    price: number;
    areaM2: number;
    rooms: number | null;
    latitude: number | null;
    longitude: number | null;
    addressText: string;
    city: string | null;
    scrapedAt: string; // ISO date
}

export type MergeStatus = 'unmerged' | 'merged' | 'ambiguous';

export interface CombinedListing extends Omit<NormalizedListing, 'source' | 'externalId'> {
    source: Source[];
    externalId: string[]; // parallel to `source`
    travelTimeMinutes: number | null;
    isUserOffer: boolean;
    mergeStatus: MergeStatus;
}

export interface CombinedTable {
    schemaVersion: string;
    columns: string[];
    rows: CombinedListing[];
}

export interface EnrichmentCacheEntry {
    locationFingerprint: string;
    latitude: number;
    longitude: number;
    travelTimeMinutes: number | null;
    resolvedAt: string; // ISO date
}

export type EnrichmentCacheStore = Record<string, EnrichmentCacheEntry>;

export interface ModelHandle {
    id: string;
    runKey: string;
    kind: 'linear-regression';
    featureColumns: string[];
    targetColumn: string;
    intercept: number;
    coefficients: number[];
    trainedRows: number;
    createdAt: string; // ISO date
}

/** Producer of raw listings for one portal, e.g. a crawler or a CSV import. */
export interface ListingProducer {
    source: Source;
    produce(locationQuery: string, maxListings: number): Promise<RawListing[]>;
}

/** Address → coordinates. Resolves null when the service has no match. */
export interface GeocodingService {
    geocode(address: string): Promise<Coordinates | null>;
}

/** Origin → destination travel time in minutes. Resolves null when there is no route. */
export interface RoutingService {
    travelTime(origin: Coordinates, destination: Coordinates): Promise<number | null>;
}

export interface TrainingInput {
    runKey: string;
    table: CombinedTable;
    featureColumns: string[];
    targetColumn: string;
}

export interface TrainingResult {
    model: ModelHandle;
    validationError: number; // mean absolute error on the hold-out rows
}

export interface ModelTrainer {
    train(input: TrainingInput): Promise<TrainingResult>;
}
