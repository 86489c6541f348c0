import { Actor } from 'apify';
import type { ProxyConfiguration } from 'crawlee';

import { scrapeOlx } from './scrapers/olx.js';
import { scrapeOtodom } from './scrapers/otodom.js';
import type { Input, ListingProducer, RawListing, Source } from './types.js';

type ScraperFn = (
    locationQuery: string,
    maxListings: number,
    proxyConfiguration?: ProxyConfiguration,
) => Promise<RawListing[]>;

const PORTAL_SCRAPERS: Record<Source, ScraperFn> = {
    OLX: scrapeOlx,
    OTODOM: scrapeOtodom,
};

/** One crawler-backed producer per requested portal, sharing the Actor's proxy configuration. */
export const createProducers = async (input: Input): Promise<Partial<Record<Source, ListingProducer>>> => {
    const proxyConfiguration = input.proxyConfiguration
        ? await Actor.createProxyConfiguration(input.proxyConfiguration)
        : undefined;

    return Object.fromEntries(
        input.sources.map((source): [Source, ListingProducer] => [
            source,
            {
                source,
                produce: async (locationQuery, maxListings) =>
                    PORTAL_SCRAPERS[source](locationQuery, maxListings, proxyConfiguration),
            },
        ]),
    );
};
