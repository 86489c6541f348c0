import { setTimeout } from 'node:timers/promises';

import { Actor, log } from 'apify';

import { loadCombinedSchema } from './combiner.js';
import { resolveInput } from './config.js';
import { GEOCODING_RATE_LIMIT, ROUTING_RATE_LIMIT } from './constants.js';
import { EnrichmentCache } from './enrichment/cache.js';
import { EnrichmentClient } from './enrichment/client.js';
import { TokenBucket } from './enrichment/rateLimiter.js';
import { NominatimGeocoder, OpenRouteServiceRouter } from './enrichment/services.js';
import { LinearRegressionTrainer } from './model.js';
import { PipelineOrchestrator } from './pipeline.js';
import { createProducers } from './portals.js';
import { RunStore } from './storage.js';
import type { RoutingService } from './types.js';

await Actor.init();

Actor.on('aborting', async () => {
    // Temporary workaround until SDK implements proper state persistence in the aborting event:
    // https://github.com/apify/apify-sdk-js/pull/561
    await setTimeout(1000);
    await Actor.exit();
});

const input = resolveInput(await Actor.getInputOrThrow());

log.info('Starting Flat Market Pipeline', {
    locationQuery: input.locationQuery,
    sources: input.sources,
    maxListingsPerSource: input.maxListingsPerSource,
    destination: input.destination,
    deadlineSecs: input.deadlineSecs,
    reuseCacheFrom: input.reuseCacheFrom,
});

// Without a key every route lookup is a miss and listings keep a null travel time
const unroutable: RoutingService = { travelTime: async () => null };
if (input.destination && !input.openRouteServiceApiKey) {
    log.warning('No OpenRouteService API key, travel times will not be resolved');
}

const cache = new EnrichmentCache({
    store: await Actor.openKeyValueStore(input.cacheStoreId),
    ttlMs: input.cacheTtlHours === null ? null : input.cacheTtlHours * 3_600_000,
    flushEvery: input.cacheFlushEvery,
    precision: input.fingerprintPrecision,
});

const orchestrator = new PipelineOrchestrator({
    producers: await createProducers(input),
    runStore: new RunStore(),
    cache,
    client: new EnrichmentClient({
        cache,
        geocoder: new NominatimGeocoder(),
        router: input.openRouteServiceApiKey ? new OpenRouteServiceRouter(input.openRouteServiceApiKey) : unroutable,
        geocodingLimiter: new TokenBucket(GEOCODING_RATE_LIMIT),
        routingLimiter: new TokenBucket(ROUTING_RATE_LIMIT),
    }),
    trainer: new LinearRegressionTrainer(),
    schema: await loadCombinedSchema(),
});

const result = await orchestrator.run(input);

if (result.state === 'Ready') {
    await Actor.pushData(result.table.rows);
    await Actor.setValue('OUTPUT', {
        runKey: result.run.toKey(),
        state: result.state,
        schemaVersion: result.table.schemaVersion,
        rows: result.table.rows.length,
        model: result.model,
        validationError: result.validationError,
        diagnostics: result.diagnostics,
    });
    log.info(`Done. Saved ${result.table.rows.length} listings of run ${result.run.toKey()}.`);
    await Actor.exit();
} else {
    await Actor.setValue('OUTPUT', {
        runKey: result.run.toKey(),
        state: result.state,
        failedAt: result.failedAt,
        error: result.error.message,
        issues: result.error.issues,
        diagnostics: result.diagnostics,
    });
    await Actor.fail(`Run ${result.run.toKey()} failed at ${result.failedAt}: ${result.error.message}`);
}
