import { beforeAll, describe, expect, it, vi } from 'vitest';

import { combine, type CombinedSchema, type CombineFn, loadCombinedSchema, validateCombinedTable } from '../combiner.js';
import { RUN_STORE_KEYS } from '../constants.js';
import { EnrichmentCache } from '../enrichment/cache.js';
import { EnrichmentClient } from '../enrichment/client.js';
import { TokenBucket } from '../enrichment/rateLimiter.js';
import { RunAlreadyExists } from '../errors.js';
import { LinearRegressionTrainer } from '../model.js';
import { type PipelineDependencies, type PipelineOptions, PipelineOrchestrator } from '../pipeline.js';
import { RunStore, runStoreName } from '../storage.js';
import type { Coordinates, ListingProducer, ModelHandle, ModelTrainer, RawListing, Source } from '../types.js';
import { createMemoryStorage, MemoryKeyValueStore, rawListing } from './fixtures.js';

const RUN_KEY = '2024_05_12_08_30_15_Krakow';
const STARTED_AT = new Date('2024-05-12T08:30:15.000Z');
const KRAKOW: Coordinates = { lat: 50.0614, lon: 19.9366 };
const KATOWICE: Coordinates = { lat: 50.2649, lon: 19.0238 };

const OLX_LISTINGS = [
    rawListing('OLX', 'o1', { price: '2 800 zł', area: '42', location: 'Długa 5, Kraków', city: 'Kraków' }),
    rawListing('OLX', 'o2', { area: '30', location: 'Kraków' }),
];

const OTODOM_LISTINGS = [
    rawListing('OTODOM', 't1', {
        totalPrice: '2800',
        areaInSquareMeters: '42.5',
        roomsNumber: 'TWO',
        address: 'Długa 5, Kraków',
        city: 'Kraków',
    }),
];

const OPTIONS: PipelineOptions = {
    locationQuery: 'Kraków',
    maxListingsPerSource: 50,
    sources: ['OLX', 'OTODOM'],
    destination: KATOWICE,
    enrichmentConcurrency: 2,
    deadlineSecs: null,
    reuseCacheFrom: undefined,
    priceTolerance: 0.01,
    areaTolerance: 1,
    userOffers: [],
};

const producer = (source: Source, listings: RawListing[]): ListingProducer => ({
    source,
    produce: async () => listings,
});

let schema: CombinedSchema;

beforeAll(async () => {
    schema = await loadCombinedSchema();
});

const createPipeline = (overrides: Partial<PipelineDependencies> = {}, startedAt = STARTED_AT) => {
    const storage = createMemoryStorage();
    const geocode = vi.fn<(address: string) => Promise<Coordinates | null>>().mockResolvedValue(KRAKOW);
    const travelTime = vi.fn<(origin: Coordinates, destination: Coordinates) => Promise<number | null>>();
    travelTime.mockResolvedValue(25);
    const cache = new EnrichmentCache({ store: new MemoryKeyValueStore() });
    const client = new EnrichmentClient({
        cache,
        geocoder: { geocode },
        router: { travelTime },
        geocodingLimiter: new TokenBucket({ ratePerSecond: 1000, burst: 100 }),
        routingLimiter: new TokenBucket({ ratePerSecond: 1000, burst: 100 }),
        sleep: async () => {},
    });
    const deps: PipelineDependencies = {
        producers: { OLX: producer('OLX', OLX_LISTINGS), OTODOM: producer('OTODOM', OTODOM_LISTINGS) },
        runStore: new RunStore(storage.openStore),
        cache,
        client,
        trainer: new LinearRegressionTrainer(() => startedAt),
        schema,
        now: () => startedAt,
        ...overrides,
    };
    return { orchestrator: new PipelineOrchestrator(deps), storage, geocode, travelTime };
};

describe('PipelineOrchestrator', () => {
    it('should run every stage and merge the offer listed on both portals', async () => {
        const { orchestrator } = createPipeline();

        const result = await orchestrator.run(OPTIONS);

        expect(result.state).toBe('Ready');
        if (result.state !== 'Ready') return;
        expect(result.run.toKey()).toBe(RUN_KEY);
        expect(result.table.rows).toHaveLength(1);
        expect(result.table.rows[0]).toMatchObject({
            source: ['OLX', 'OTODOM'],
            externalId: ['o1', 't1'],
            price: 2800,
            areaM2: 42,
            rooms: 2,
            latitude: KRAKOW.lat,
            longitude: KRAKOW.lon,
            travelTimeMinutes: 25,
            mergeStatus: 'merged',
            isUserOffer: false,
        });
        expect(result.history.map(({ state }) => state)).toEqual([
            'Scraping',
            'Cleaning',
            'Combining',
            'Enriching',
            'ModelTraining',
            'Ready',
        ]);
    });

    it('should count dropped records, merges and enrichment work in the diagnostics', async () => {
        const { orchestrator } = createPipeline();

        const { diagnostics } = await orchestrator.run(OPTIONS);

        expect(diagnostics).toMatchObject({
            runKey: RUN_KEY,
            droppedRecords: 1,
            drops: [{ source: 'OLX', externalId: 'o2', reason: 'missing-price' }],
            merges: 1,
            failedSources: [],
            missingSources: [],
            enrichment: { succeeded: 1, failed: 0, cacheHits: 0, networkCalls: 2 },
            timedOut: false,
        });
    });

    it('should finish without a model when there are too few rows to train on', async () => {
        const { orchestrator, storage } = createPipeline();

        const result = await orchestrator.run(OPTIONS);

        expect(result.state).toBe('Ready');
        if (result.state !== 'Ready') return;
        expect(result.model).toBeNull();
        expect(result.validationError).toBeNull();
        expect(result.diagnostics.modelTrainingError).toBe('Only 1 usable rows for training, 5 required');
        expect(storage.stores.get(runStoreName(RUN_KEY))?.records.has(RUN_STORE_KEYS.model)).toBe(false);
    });

    it('should store every artifact of the run under the run key', async () => {
        const { orchestrator, storage } = createPipeline();

        await orchestrator.run(OPTIONS);

        expect([...(storage.stores.get(runStoreName(RUN_KEY))?.records.keys() ?? [])].sort()).toEqual([
            'COMBINED',
            'DIAGNOSTICS',
            'ENRICHED',
            'ENRICHMENT_CACHE_DELTA',
            'RAW_OLX',
            'RAW_OTODOM',
        ]);
    });

    it('should save the trained model and its validation error', async () => {
        const model: ModelHandle = {
            id: `${RUN_KEY}-linear-regression`,
            runKey: RUN_KEY,
            kind: 'linear-regression',
            featureColumns: ['areaM2'],
            targetColumn: 'price',
            intercept: 100,
            coefficients: [64],
            trainedRows: 8,
            createdAt: STARTED_AT.toISOString(),
        };
        const trainer: ModelTrainer = { train: vi.fn(async () => ({ model, validationError: 120 })) };
        const { orchestrator, storage } = createPipeline({ trainer });

        const result = await orchestrator.run(OPTIONS);

        expect(result.state === 'Ready' && result.model).toEqual(model);
        expect(result.state === 'Ready' && result.validationError).toBe(120);
        expect(trainer.train).toHaveBeenCalledWith(
            expect.objectContaining({
                runKey: RUN_KEY,
                featureColumns: ['areaM2', 'rooms', 'travelTimeMinutes'],
                targetColumn: 'price',
            }),
        );
        expect(await storage.stores.get(runStoreName(RUN_KEY))?.getValue(RUN_STORE_KEYS.model)).toEqual(model);
    });

    it('should stop at combining when the table violates the schema', async () => {
        const trainer: ModelTrainer = { train: vi.fn(async () => Promise.reject(new Error('not expected'))) };
        const withoutArea: CombineFn = (normalizedBySource, options) => {
            const table = combine(normalizedBySource, options);
            const columns = table.columns.filter((column) => column !== 'areaM2');
            validateCombinedTable({ columns, rows: table.rows }, options.schema, options.runKey);
            return table;
        };
        const { orchestrator, storage, geocode } = createPipeline({ trainer, combine: withoutArea });

        const result = await orchestrator.run(OPTIONS);

        expect(result.state).toBe('Failed');
        if (result.state !== 'Failed') return;
        expect(result.failedAt).toBe('Combining');
        expect(result.error.issues).toEqual([{ rowIndex: null, field: 'areaM2', message: 'required column is missing' }]);
        expect(result.history.map(({ state }) => state)).toEqual(['Scraping', 'Cleaning', 'Combining', 'Failed']);
        expect(trainer.train).not.toHaveBeenCalled();
        expect(geocode).not.toHaveBeenCalled();

        const records = storage.stores.get(runStoreName(RUN_KEY))?.records;
        expect(records?.has(RUN_STORE_KEYS.diagnostics)).toBe(true);
        expect(records?.has(RUN_STORE_KEYS.combined)).toBe(false);
    });

    it('should continue without a portal whose producer failed', async () => {
        const failing: ListingProducer = {
            source: 'OTODOM',
            produce: async () => Promise.reject(new Error('blocked by the portal')),
        };
        const { orchestrator } = createPipeline({
            producers: { OLX: producer('OLX', OLX_LISTINGS), OTODOM: failing },
        });

        const result = await orchestrator.run(OPTIONS);

        expect(result.state).toBe('Ready');
        if (result.state !== 'Ready') return;
        expect(result.diagnostics.failedSources).toEqual(['OTODOM']);
        expect(result.diagnostics.missingSources).toEqual([]);
        expect(result.table.rows.map((row) => row.externalId)).toEqual([['o1']]);
        expect(result.table.rows[0].mergeStatus).toBe('unmerged');
    });

    it('should report a requested portal that left no raw listings', async () => {
        const { orchestrator } = createPipeline({ producers: { OLX: producer('OLX', OLX_LISTINGS) } });

        const result = await orchestrator.run(OPTIONS);

        expect(result.diagnostics.missingSources).toEqual(['OTODOM']);
        expect(result.diagnostics.failedSources).toEqual([]);
    });

    it('should append user offers without merging them', async () => {
        const userOffer = rawListing('OLX', 'mine', { price: '2800', area: '42', location: 'Długa 5, Kraków' });
        const { orchestrator } = createPipeline();

        const result = await orchestrator.run({ ...OPTIONS, userOffers: [userOffer] });

        expect(result.state).toBe('Ready');
        if (result.state !== 'Ready') return;
        expect(result.table.rows).toHaveLength(2);
        expect(result.table.rows[1]).toMatchObject({
            externalId: ['mine'],
            isUserOffer: true,
            mergeStatus: 'unmerged',
            travelTimeMinutes: 25,
        });
    });

    it('should keep going with partial enrichment once the deadline passes', async () => {
        const { orchestrator, geocode } = createPipeline();
        geocode.mockImplementation(async () => new Promise<Coordinates | null>(() => {}));

        const result = await orchestrator.run({ ...OPTIONS, deadlineSecs: 0.05 });

        expect(result.state).toBe('Ready');
        if (result.state !== 'Ready') return;
        expect(result.diagnostics.timedOut).toBe(true);
        expect(result.diagnostics.enrichment.failed).toBe(1);
        expect(result.table.rows[0]).toMatchObject({ latitude: null, longitude: null, travelTimeMinutes: null });
    });

    it('should refuse to overwrite the artifacts of a run with the same key', async () => {
        const first = createPipeline();
        await first.orchestrator.run(OPTIONS);
        const store = first.storage.stores.get(runStoreName(RUN_KEY));
        const writes = store?.writes;

        const second = createPipeline({ runStore: new RunStore(first.storage.openStore) });

        await expect(second.orchestrator.run(OPTIONS)).rejects.toBeInstanceOf(RunAlreadyExists);
        expect(store?.writes).toBe(writes);
        expect(second.geocode).not.toHaveBeenCalled();
    });

    it('should reuse the enrichment cache delta of an earlier run', async () => {
        const first = createPipeline();
        await first.orchestrator.run(OPTIONS);

        const second = createPipeline(
            { runStore: new RunStore(first.storage.openStore) },
            new Date('2024-05-13T10:00:00.000Z'),
        );
        const result = await second.orchestrator.run({ ...OPTIONS, reuseCacheFrom: RUN_KEY });

        expect(second.geocode).not.toHaveBeenCalled();
        expect(second.travelTime).not.toHaveBeenCalled();
        expect(result.diagnostics.enrichment).toEqual({ succeeded: 1, failed: 0, cacheHits: 2, networkCalls: 0 });
    });
});
