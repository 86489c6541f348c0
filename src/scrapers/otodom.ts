import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';
import { CheerioCrawler, type ProxyConfiguration } from 'crawlee';
import { z } from 'zod';

import { MAX_CONCURRENCY, PAGE_DELAY_MS } from '../constants.js';
import type { RawListing } from '../types.js';

// Otodom is a Next.js SSR app.
// Search results are embedded in <script id="__NEXT_DATA__"> under props.pageProps.data.searchAds.
const BASE_URL = 'https://www.otodom.pl';
const SEARCH_PATH = '/pl/wyniki/wynajem/mieszkanie/cala-polska';
const SOURCE = 'OTODOM' as const;
const LOG_PREFIX = '[otodom]';

const namedSchema = z.object({ name: z.string() }).nullish();

const moneySchema = z.object({ value: z.number().nullish() }).nullish();

const searchAdSchema = z.object({
    id: z.union([z.number(), z.string()]),
    href: z.string(),
    title: z.string().nullish(),
    totalPrice: moneySchema,
    rentPrice: moneySchema,
    areaInSquareMeters: z.number().nullish(),
    roomsNumber: z.string().nullish(),
    location: z
        .object({
            address: z
                .object({ street: namedSchema, city: namedSchema, province: namedSchema })
                .nullish(),
        })
        .nullish(),
});

const nextDataSchema = z.object({
    props: z.object({
        pageProps: z.object({
            data: z.object({
                searchAds: z.object({
                    items: z.array(z.unknown()),
                    pagination: z.object({ totalPages: z.number(), currentPage: z.number() }).nullish(),
                }),
            }),
        }),
    }),
});

type SearchAd = z.infer<typeof searchAdSchema>;

export interface OtodomPage {
    listings: RawListing[];
    totalPages: number;
}

export const buildOtodomSearchUrl = (locationQuery: string, page: number): string => {
    const url = new URL(`${BASE_URL}${SEARCH_PATH}`);
    url.searchParams.set('search[phrase]', locationQuery.trim());
    url.searchParams.set('viewType', 'listing');
    if (page > 1) url.searchParams.set('page', String(page));
    return url.toString();
};

// Search ads link through a `[lang]/ad/` template, promoted ones through /hpr/
export const canonicalOfferUrl = (href: string): string => {
    const path = href.replace(/^\/?(hpr\/)?/, '/').replace(/^\/\[lang\]\/ad\//, '/pl/oferta/');
    return new URL(path, BASE_URL).toString();
};

const adToListing = (ad: SearchAd): RawListing => {
    const address = ad.location?.address;
    const addressParts = [address?.street?.name, address?.city?.name, address?.province?.name].filter(
        (part): part is string => !!part,
    );

    const rawFields: Record<string, string> = {};
    if (ad.title) rawFields.title = ad.title;
    if (ad.totalPrice?.value != null) rawFields.totalPrice = String(ad.totalPrice.value);
    if (ad.rentPrice?.value != null) rawFields.rent = String(ad.rentPrice.value);
    if (ad.areaInSquareMeters != null) rawFields.areaInSquareMeters = String(ad.areaInSquareMeters);
    if (ad.roomsNumber) rawFields.roomsNumber = ad.roomsNumber;
    if (addressParts.length > 0) rawFields.address = addressParts.join(', ');
    if (address?.city?.name) rawFields.city = address.city.name;

    return {
        source: SOURCE,
        externalId: String(ad.id),
        url: canonicalOfferUrl(ad.href),
        rawFields,
        htmlSnapshot: null,
    };
};

/** Reads the search ads out of a `__NEXT_DATA__` payload. Ads that do not match the expected shape are skipped. */
export const parseOtodomNextData = (raw: string): OtodomPage | null => {
    let payload: unknown;
    try {
        payload = JSON.parse(raw);
    } catch {
        log.error(`${LOG_PREFIX} Failed to parse __NEXT_DATA__ JSON`);
        return null;
    }

    const parsed = nextDataSchema.safeParse(payload);
    if (!parsed.success) {
        log.error(`${LOG_PREFIX} Search ads not found in __NEXT_DATA__`);
        return null;
    }

    const { items, pagination } = parsed.data.props.pageProps.data.searchAds;
    const listings: RawListing[] = [];
    for (const item of items) {
        const ad = searchAdSchema.safeParse(item);
        if (ad.success) listings.push(adToListing(ad.data));
        else log.debug(`${LOG_PREFIX} Skipping malformed search ad`, { issues: ad.error.issues.length });
    }
    return { listings, totalPages: pagination?.totalPages ?? 1 };
};

export const scrapeOtodom = async (
    locationQuery: string,
    maxListings: number,
    proxyConfiguration?: ProxyConfiguration,
): Promise<RawListing[]> => {
    const results: RawListing[] = [];

    const crawler = new CheerioCrawler({
        proxyConfiguration,
        maxConcurrency: MAX_CONCURRENCY,
        async requestHandler({ request, $, crawler: crawlerInstance }) {
            if (results.length >= maxListings) return;

            const page = Number(request.userData.page ?? 1);
            log.info(`${LOG_PREFIX} Fetching page ${page}`, { url: request.url });

            const nextDataRaw = $('script[id="__NEXT_DATA__"]').html();
            if (!nextDataRaw) {
                log.error(`${LOG_PREFIX} __NEXT_DATA__ not found in page`, { url: request.url });
                return;
            }

            const pageData = parseOtodomNextData(nextDataRaw);
            if (!pageData) return;

            if (page === 1) log.info(`${LOG_PREFIX} Total pages available: ${pageData.totalPages}`);
            results.push(...pageData.listings.slice(0, maxListings - results.length));

            if (pageData.totalPages > page && results.length < maxListings) {
                const nextPage = page + 1;
                await crawlerInstance.addRequests([
                    { url: buildOtodomSearchUrl(locationQuery, nextPage), userData: { page: nextPage } },
                ]);
            }

            await setTimeout(PAGE_DELAY_MS);
        },
    });

    await crawler.run([{ url: buildOtodomSearchUrl(locationQuery, 1), userData: { page: 1 } }]);

    log.info(`${LOG_PREFIX} Done. Scraped ${results.length} listings.`);
    return results;
};
