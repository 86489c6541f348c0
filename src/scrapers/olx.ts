import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';
import { load } from 'cheerio';
import { CheerioCrawler, type ProxyConfiguration } from 'crawlee';

import { MAX_CONCURRENCY, PAGE_DELAY_MS } from '../constants.js';
import type { RawListing } from '../types.js';
import { transliterate } from '../utils.js';

// OLX renders listing cards server-side, so plain HTML parsing is enough.
const BASE_URL = 'https://www.olx.pl';
const CATEGORY_PATH = '/nieruchomosci/mieszkania/wynajem';
const SOURCE = 'OLX' as const;
const LOG_PREFIX = '[olx]';

const SELECTORS = {
    card: '[data-testid="l-card"]',
    offerLink: 'a[href*="/d/oferta/"]',
    title: 'h4, h5, h6, h3',
    price: '[data-testid="ad-price"]',
    locationDate: '[data-testid="location-date"]',
    nextPage: '[data-testid="pagination-forward"], a[rel="next"]',
} as const;

const AREA_PATTERN = /(\d[\d\s]*(?:[.,]\d+)?)\s*m(?:²|2)/;
const OFFER_ID_PATTERN = /-ID([A-Za-z0-9]+)\.html/;

export interface OlxPage {
    listings: RawListing[];
    hasNextPage: boolean;
}

/** "Kraków, Podgórze" becomes `q-krakow-podgorze`, OLX's free-text search path segment. */
export const buildOlxSearchUrl = (locationQuery: string, page: number): string => {
    const slug = transliterate(locationQuery)
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
    const url = new URL(`${BASE_URL}${CATEGORY_PATH}/q-${slug}/`);
    if (page > 1) url.searchParams.set('page', String(page));
    return url.toString();
};

// "Kraków, Podgórze - Odświeżono dnia 12 maja 2024" → address and city parts
export const splitLocationDate = (text: string): { address: string; city: string } | null => {
    const [location = ''] = text.split(' - ');
    const address = location.replace(/\s+/g, ' ').trim();
    if (!address) return null;
    const [city = address] = address.split(',');
    return { address, city: city.trim() };
};

export const parseOlxPage = (html: string, pageUrl: string): OlxPage => {
    const $ = load(html);
    const listings: RawListing[] = [];
    const seen = new Set<string>();

    $(SELECTORS.card).each((_, element) => {
        const card = $(element);
        const href = card.find(SELECTORS.offerLink).first().attr('href');
        if (!href) return;

        const url = new URL(href, pageUrl);
        url.search = '';
        const externalId = card.attr('id') ?? OFFER_ID_PATTERN.exec(url.pathname)?.[1] ?? url.pathname;
        if (seen.has(externalId)) return;
        seen.add(externalId);

        const rawFields: Record<string, string> = {};
        const title = card.find(SELECTORS.title).first().text().trim();
        if (title) rawFields.title = title;
        const price = card.find(SELECTORS.price).first().text().trim();
        if (price) rawFields.price = price;
        const area = AREA_PATTERN.exec(card.text())?.[1]?.trim();
        if (area) rawFields.area = area;
        const location = splitLocationDate(card.find(SELECTORS.locationDate).first().text());
        if (location) {
            rawFields.location = location.address;
            rawFields.city = location.city;
        }

        listings.push({ source: SOURCE, externalId, url: url.toString(), rawFields, htmlSnapshot: $.html(card) });
    });

    return { listings, hasNextPage: $(SELECTORS.nextPage).length > 0 };
};

export const scrapeOlx = async (
    locationQuery: string,
    maxListings: number,
    proxyConfiguration?: ProxyConfiguration,
): Promise<RawListing[]> => {
    const results: RawListing[] = [];

    const crawler = new CheerioCrawler({
        proxyConfiguration,
        maxConcurrency: MAX_CONCURRENCY,
        async requestHandler({ request, body, crawler: crawlerInstance }) {
            if (results.length >= maxListings) return;

            const page = Number(request.userData.page ?? 1);
            log.info(`${LOG_PREFIX} Fetching page ${page}`, { url: request.url });

            const { listings, hasNextPage } = parseOlxPage(body.toString(), request.loadedUrl ?? request.url);
            if (listings.length === 0) {
                log.warning(`${LOG_PREFIX} No listing cards on page ${page}`, { url: request.url });
                return;
            }
            results.push(...listings.slice(0, maxListings - results.length));

            if (hasNextPage && results.length < maxListings) {
                const nextPage = page + 1;
                await crawlerInstance.addRequests([
                    { url: buildOlxSearchUrl(locationQuery, nextPage), userData: { page: nextPage } },
                ]);
            }

            await setTimeout(PAGE_DELAY_MS);
        },
    });

    await crawler.run([{ url: buildOlxSearchUrl(locationQuery, 1), userData: { page: 1 } }]);

    log.info(`${LOG_PREFIX} Done. Scraped ${results.length} listings.`);
    return results;
};
