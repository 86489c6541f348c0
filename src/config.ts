import { z } from 'zod';

import { INPUT_DEFAULTS } from './constants.js';
import { InvalidInput, ParseError } from './errors.js';
import { RunIdentity } from './runIdentity.js';
import { type Coordinates, type Input, SOURCES } from './types.js';

const formatZodError = (error: z.ZodError): string =>
    error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('\n');

const emptyToUndefined = (value: unknown): unknown =>
    (typeof value === 'string' && value.trim() === '') || value === null ? undefined : value;

// Apify named storages
const STORE_NAME_PATTERN = /^(?=.{1,63}$)[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;

const sourceSchema = z.enum(SOURCES);

const coordinatesSchema = z.object({
    lat: z.coerce.number().min(-90).max(90),
    lon: z.coerce.number().min(-180).max(180),
});

const rawListingSchema = z.object({
    source: sourceSchema.default('OLX'),
    externalId: z.coerce.string().min(1),
    url: z.string().default(''),
    rawFields: z.record(z.union([z.string(), z.number()]).transform(String)),
    htmlSnapshot: z.string().nullable().default(null),
});

const proxySchema = z.object({
    useApifyProxy: z.boolean().optional(),
    apifyProxyGroups: z.array(z.string()).optional(),
    apifyProxyCountry: z.string().optional(),
    proxyUrls: z.array(z.string()).optional(),
});

const inputSchema = z.object({
    locationQuery: z.string().trim().min(1),
    maxListingsPerSource: z.number().int().positive().default(INPUT_DEFAULTS.maxListingsPerSource),
    sources: z
        .array(sourceSchema)
        .min(1)
        .default(INPUT_DEFAULTS.sources)
        .transform((sources) => [...new Set(sources)]),
    destination: coordinatesSchema.nullable().default(INPUT_DEFAULTS.destination),
    openRouteServiceApiKey: z.preprocess(emptyToUndefined, z.string().optional()),
    enrichmentConcurrency: z.number().int().min(1).max(64).default(INPUT_DEFAULTS.enrichmentConcurrency),
    deadlineSecs: z.number().positive().nullable().default(INPUT_DEFAULTS.deadlineSecs),
    cacheStoreId: z
        .string()
        .regex(STORE_NAME_PATTERN, 'must be lowercase letters, digits and inner hyphens, at most 63 characters')
        .default(INPUT_DEFAULTS.cacheStoreId),
    cacheTtlHours: z.number().positive().nullable().default(INPUT_DEFAULTS.cacheTtlHours),
    cacheFlushEvery: z.number().int().positive().default(INPUT_DEFAULTS.cacheFlushEvery),
    reuseCacheFrom: z.preprocess(emptyToUndefined, z.string().optional()),
    priceTolerance: z.number().min(0).max(1).default(INPUT_DEFAULTS.priceTolerance),
    areaTolerance: z.number().min(0).default(INPUT_DEFAULTS.areaTolerance),
    fingerprintPrecision: z.number().int().min(0).max(8).default(INPUT_DEFAULTS.fingerprintPrecision),
    userOffers: z.array(rawListingSchema).default(INPUT_DEFAULTS.userOffers),
    proxyConfiguration: z.preprocess(emptyToUndefined, proxySchema.optional()),
});

/** "50.2649,19.0238" → coordinates; used for the DESTINATION_COORDINATES variable. */
export const parseCoordinates = (value: string): Coordinates | null => {
    const [lat, lon, ...rest] = value.split(',').map((part) => Number(part.trim()));
    if (rest.length > 0 || lat === undefined || lon === undefined) return null;
    const parsed = coordinatesSchema.safeParse({ lat, lon });
    return parsed.success ? parsed.data : null;
};

/**
 * Validates the Actor input and fills in defaults. Secrets and the travel-time destination
 * may also come from the environment (`OPENROUTESERVICE_API_KEY`, `DESTINATION_COORDINATES`).
 */
export const resolveInput = (rawInput: unknown, env: NodeJS.ProcessEnv = process.env): Input => {
    const parsed = inputSchema.safeParse(rawInput ?? {});
    if (!parsed.success) throw new InvalidInput(formatZodError(parsed.error));

    const { reuseCacheFrom } = parsed.data;
    if (reuseCacheFrom !== undefined) {
        try {
            RunIdentity.fromKey(reuseCacheFrom);
        } catch (error) {
            if (error instanceof ParseError) throw new InvalidInput(`reuseCacheFrom: ${error.message}`);
            throw error;
        }
    }

    const envDestination = env.DESTINATION_COORDINATES ? parseCoordinates(env.DESTINATION_COORDINATES) : null;
    if (env.DESTINATION_COORDINATES && !envDestination) {
        throw new InvalidInput(`DESTINATION_COORDINATES: expected "lat,lon", got "${env.DESTINATION_COORDINATES}"`);
    }

    return {
        ...parsed.data,
        destination: parsed.data.destination ?? envDestination,
        openRouteServiceApiKey: parsed.data.openRouteServiceApiKey ?? (env.OPENROUTESERVICE_API_KEY || undefined),
    };
};
