import type { KeyValueStoreLike, OpenStore } from '../storage.js';
import type { CombinedListing, NormalizedListing, RawListing, Source } from '../types.js';

/** Key-value store kept in memory. Values go through JSON like they would on disk. */
export class MemoryKeyValueStore implements KeyValueStoreLike {
    readonly records = new Map<string, string>();

    writes = 0;

    async getValue<T>(key: string): Promise<T | null> {
        const stored = this.records.get(key);
        return stored === undefined ? null : JSON.parse(stored);
    }

    async setValue<T>(key: string, value: T | null): Promise<void> {
        this.writes += 1;
        if (value === null) this.records.delete(key);
        else this.records.set(key, JSON.stringify(value));
    }
}

export const createMemoryStorage = (): { stores: Map<string, MemoryKeyValueStore>; openStore: OpenStore } => {
    const stores = new Map<string, MemoryKeyValueStore>();
    const openStore: OpenStore = async (name) => {
        const store = stores.get(name) ?? new MemoryKeyValueStore();
        stores.set(name, store);
        return store;
    };
    return { stores, openStore };
};

export const rawListing = (source: Source, externalId: string, rawFields: Record<string, string>): RawListing => ({
    source,
    externalId,
    url: `https://example.test/${source.toLowerCase()}/${externalId}`,
    rawFields,
    htmlSnapshot: null,
});

export const normalizedListing = (overrides: Partial<NormalizedListing> = {}): NormalizedListing => ({
    source: 'OLX',
    externalId: '1',
    url: 'https://example.test/olx/1',
    price: 2000,
    areaM2: 40,
    rooms: 2,
    latitude: null,
    longitude: null,
    addressText: 'Długa 5, Kraków',
    city: 'Kraków',
    scrapedAt: '2024-05-12T08:30:15.000Z',
    ...overrides,
});

export const combinedRow = (overrides: Partial<CombinedListing> = {}): CombinedListing => ({
    ...normalizedListing(),
    source: ['OLX'],
    externalId: ['1'],
    travelTimeMinutes: null,
    isUserOffer: false,
    mergeStatus: 'unmerged',
    ...overrides,
});
