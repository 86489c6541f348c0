import { log } from 'apify';

import type { RunDiagnostics } from './diagnostics.js';
import { RecordDropped } from './errors.js';
import type { NormalizedListing, RawListing, Source } from './types.js';
import { parseLooseNumber } from './utils.js';

type ListingField = 'price' | 'rent' | 'area' | 'rooms' | 'address' | 'city' | 'lat' | 'lon';

/** Raw field names each portal's producer emits, in order of preference. */
const FIELD_NAMES: Record<Source, Record<ListingField, string[]>> = {
    OLX: {
        price: ['price', 'cena'],
        rent: ['rent', 'czynsz'],
        area: ['area', 'powierzchnia'],
        rooms: ['rooms', 'liczba_pokoi'],
        address: ['address', 'location', 'lokalizacja'],
        city: ['city', 'miasto'],
        lat: ['lat', 'latitude'],
        lon: ['lon', 'lng', 'longitude'],
    },
    OTODOM: {
        price: ['price', 'cena', 'totalPrice'],
        rent: ['rent', 'czynsz'],
        area: ['area', 'powierzchnia', 'areaInSquareMeters'],
        rooms: ['rooms', 'liczba_pokoi', 'roomsNumber'],
        address: ['address', 'adres', 'location'],
        city: ['city', 'miasto'],
        lat: ['lat', 'latitude'],
        lon: ['lon', 'lng', 'longitude'],
    },
};

const ROOM_WORDS: Record<string, number> = { ONE: 1, TWO: 2, THREE: 3, FOUR: 4, FIVE: 5, SIX: 6, SEVEN: 7 };

const readField = (raw: RawListing, names: string[]): string | null => {
    for (const name of names) {
        const value = raw.rawFields[name]?.trim();
        if (value) return value;
    }
    return null;
};

export const parseRooms = (value: string | null): number | null => {
    if (!value) return null;
    const word = ROOM_WORDS[value.toUpperCase()];
    if (word !== undefined) return word;
    const num = parseLooseNumber(value);
    return num !== null && Number.isInteger(num) && num > 0 ? num : null;
};

const parseCoordinate = (value: string | null, limit: number): number | null => {
    const num = parseLooseNumber(value);
    return num !== null && Math.abs(num) <= limit ? num : null;
};

/**
 * Maps raw listings of either portal onto the shared schema. Keeps the set of
 * `(source, externalId)` pairs seen during the run so repeated offers are dropped.
 */
export class Normalizer {
    private readonly seen = new Set<string>();

    private readonly diagnostics: RunDiagnostics;

    private readonly scrapedAt: string;

    constructor(diagnostics: RunDiagnostics, scrapedAt: Date) {
        this.diagnostics = diagnostics;
        this.scrapedAt = scrapedAt.toISOString();
    }

    normalize(raw: RawListing): NormalizedListing | null {
        try {
            const listing = this.parse(raw);
            const pairKey = `${raw.source}:${raw.externalId}`;
            if (this.seen.has(pairKey)) {
                throw new RecordDropped('duplicate', `Listing ${pairKey} was already normalized in this run`);
            }
            this.seen.add(pairKey);
            return listing;
        } catch (error) {
            if (!(error instanceof RecordDropped)) throw error;
            this.diagnostics.recordDrop({ source: raw.source, externalId: raw.externalId, reason: error.reason });
            log.debug(`[normalizer] Dropped ${raw.source} listing ${raw.externalId}: ${error.message}`);
            return null;
        }
    }

    normalizeAll(raws: RawListing[]): NormalizedListing[] {
        return raws.map((raw) => this.normalize(raw)).filter((listing): listing is NormalizedListing => listing !== null);
    }

    private parse(raw: RawListing): NormalizedListing {
        const names = FIELD_NAMES[raw.source];
        const price = parseLooseNumber(readField(raw, names.price));
        if (price === null || price <= 0) {
            throw new RecordDropped('missing-price', `Listing ${raw.externalId} has no parseable price`);
        }
        const areaM2 = parseLooseNumber(readField(raw, names.area));
        if (areaM2 === null || areaM2 <= 0) {
            throw new RecordDropped('missing-area', `Listing ${raw.externalId} has no parseable area`);
        }
        // Monthly rent on top of the asking price makes up the total cost
        const rent = parseLooseNumber(readField(raw, names.rent)) ?? 0;

        const city = readField(raw, names.city);
        const latitude = parseCoordinate(readField(raw, names.lat), 90);
        const longitude = parseCoordinate(readField(raw, names.lon), 180);
        const hasCoordinates = latitude !== null && longitude !== null;

        return {
            source: raw.source,
            externalId: raw.externalId,
            url: raw.url,
            price: price + Math.max(rent, 0),
            areaM2,
            rooms: parseRooms(readField(raw, names.rooms)),
            latitude: hasCoordinates ? latitude : null,
            longitude: hasCoordinates ? longitude : null,
            addressText: readField(raw, names.address) ?? city ?? '',
            city,
            scrapedAt: this.scrapedAt,
        };
    }
}
