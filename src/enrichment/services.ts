import { gotScraping } from 'crawlee';
import { z } from 'zod';

import { FETCH_HEADERS, REQUEST_TIMEOUT_MS } from '../constants.js';
import { RateLimitExceeded, TransientServiceError } from '../errors.js';
import type { Coordinates, GeocodingService, RoutingService } from '../types.js';

const NOMINATIM_API = 'https://nominatim.openstreetmap.org/search';
const DIRECTIONS_API = 'https://api.openrouteservice.org/v2/directions/driving-car';

const nominatimSchema = z.array(z.object({ lat: z.coerce.number(), lon: z.coerce.number() }));

const directionsSchema = z.object({
    features: z
        .array(
            z.object({
                properties: z.object({
                    segments: z.array(z.object({ duration: z.number().nullable().optional() })).optional(),
                }),
            }),
        )
        .optional(),
});

/** First hit of a Nominatim `jsonv2` search, or null when the list is empty. */
export const parseNominatimResponse = (payload: unknown): Coordinates | null => {
    const [first] = nominatimSchema.parse(payload);
    return first ? { lat: first.lat, lon: first.lon } : null;
};

/** Duration of the first route segment in whole minutes (rounded up), or null without a usable route. */
export const parseDirectionsResponse = (payload: unknown): number | null => {
    const parsed = directionsSchema.parse(payload);
    const seconds = parsed.features?.[0]?.properties.segments?.[0]?.duration;
    if (seconds == null || seconds < 0) return null;
    return Math.ceil(seconds / 60);
};

interface HttpResult {
    statusCode: number;
    payload: unknown;
}

const fetchJson = async (
    service: string,
    url: string,
    searchParams: Record<string, string>,
    headers: Record<string, string> = {},
): Promise<HttpResult> => {
    const response = await gotScraping({
        url,
        searchParams,
        headers: { ...FETCH_HEADERS, ...headers },
        responseType: 'text',
        throwHttpErrors: false,
        timeout: { request: REQUEST_TIMEOUT_MS },
        retry: { limit: 0 },
    }).catch((error: unknown) => {
        throw new TransientServiceError(`${service} request failed`, null, { cause: error });
    });

    const { statusCode } = response;
    if (statusCode === 429) throw new RateLimitExceeded(service);
    if (statusCode >= 500) throw new TransientServiceError(`${service} answered ${statusCode}`, statusCode);

    const text = String(response.body);
    let payload: unknown = null;
    try {
        payload = text ? JSON.parse(text) : null;
    } catch (error) {
        throw new TransientServiceError(`${service} answered with malformed JSON`, statusCode, { cause: error });
    }
    return { statusCode, payload };
};

export class NominatimGeocoder implements GeocodingService {
    private readonly countryCodes: string;

    constructor(countryCodes = 'pl') {
        this.countryCodes = countryCodes;
    }

    async geocode(address: string): Promise<Coordinates | null> {
        const { statusCode, payload } = await fetchJson('Nominatim', NOMINATIM_API, {
            q: address,
            format: 'jsonv2',
            limit: '1',
            countrycodes: this.countryCodes,
        });
        if (statusCode >= 400) throw new TransientServiceError(`Nominatim answered ${statusCode}`, statusCode);
        return parseNominatimResponse(payload);
    }
}

export class OpenRouteServiceRouter implements RoutingService {
    private readonly apiKey: string;

    constructor(apiKey: string) {
        this.apiKey = apiKey;
    }

    async travelTime(origin: Coordinates, destination: Coordinates): Promise<number | null> {
        const { statusCode, payload } = await fetchJson(
            'OpenRouteService',
            DIRECTIONS_API,
            { start: `${origin.lon},${origin.lat}`, end: `${destination.lon},${destination.lat}` },
            { Authorization: this.apiKey },
        );
        // 404 is how the service reports that no route connects the points
        if (statusCode === 404) return null;
        if (statusCode >= 400) throw new TransientServiceError(`OpenRouteService answered ${statusCode}`, statusCode);
        return parseDirectionsResponse(payload);
    }
}
