import { log } from 'apify';

import { combine as defaultCombine, type CombinedSchema, type CombineFn } from './combiner.js';
import { MODEL_FEATURE_COLUMNS, MODEL_TARGET_COLUMN, RUN_STORE_KEYS } from './constants.js';
import { type DiagnosticsReport, logDiagnostics, RunDiagnostics } from './diagnostics.js';
import type { EnrichmentClient, EnrichmentOutcome } from './enrichment/client.js';
import type { EnrichmentCache } from './enrichment/cache.js';
import { DeadlineExceeded, RunAlreadyExists, SchemaViolation } from './errors.js';
import { Normalizer } from './normalizer.js';
import { RunIdentity } from './runIdentity.js';
import type { RunStore } from './storage.js';
import type {
    CombinedListing,
    CombinedTable,
    Input,
    ListingProducer,
    ModelHandle,
    ModelTrainer,
    NormalizedListing,
    Source,
} from './types.js';
import { describeError, mapWithConcurrency } from './utils.js';

export type PipelineState = 'Scraping' | 'Cleaning' | 'Combining' | 'Enriching' | 'ModelTraining' | 'Ready' | 'Failed';

const NEXT_STATES: Record<PipelineState, PipelineState[]> = {
    Scraping: ['Cleaning'],
    Cleaning: ['Combining'],
    Combining: ['Enriching', 'Failed'],
    Enriching: ['ModelTraining'],
    ModelTraining: ['Ready'],
    Ready: [],
    Failed: [],
};

// Combined rows list OLX offers first, then Otodom
const SOURCE_ORDER: [Source, Source] = ['OLX', 'OTODOM'];

const LOG_PREFIX = '[pipeline]';

export interface StateTransition {
    state: PipelineState;
    at: string; // ISO date
}

interface ResultBase {
    run: RunIdentity;
    diagnostics: DiagnosticsReport;
    history: StateTransition[];
}

export interface ReadyResult extends ResultBase {
    state: 'Ready';
    table: CombinedTable;
    model: ModelHandle | null;
    validationError: number | null;
}

export interface FailedResult extends ResultBase {
    state: 'Failed';
    failedAt: 'Combining';
    error: SchemaViolation;
}

export type PipelineResult = ReadyResult | FailedResult;

export interface PipelineDependencies {
    producers: Partial<Record<Source, ListingProducer>>;
    runStore: RunStore;
    cache: EnrichmentCache;
    client: EnrichmentClient;
    trainer: ModelTrainer;
    schema: CombinedSchema;
    combine?: CombineFn;
    now?: () => Date;
}

export type PipelineOptions = Pick<
    Input,
    | 'locationQuery'
    | 'maxListingsPerSource'
    | 'sources'
    | 'destination'
    | 'enrichmentConcurrency'
    | 'deadlineSecs'
    | 'reuseCacheFrom'
    | 'priceTolerance'
    | 'areaTolerance'
    | 'userOffers'
> & {
    featureColumns?: string[];
    targetColumn?: string;
};

/** State of one `run()` call. */
interface RunContext {
    run: RunIdentity;
    runKey: string;
    diagnostics: RunDiagnostics;
    history: StateTransition[];
    state: PipelineState | null;
}

const applyOutcome = (row: CombinedListing, outcome: EnrichmentOutcome): CombinedListing => ({
    ...row,
    latitude: outcome.latitude,
    longitude: outcome.longitude,
    travelTimeMinutes: outcome.travelTimeMinutes,
});

/**
 * Drives one run through Scraping → Cleaning → Combining → Enriching → ModelTraining → Ready.
 * Every stage works on the fully materialized output of the previous one. Degraded stages are
 * recorded in the run diagnostics; only an invalid combined table stops a run (state `Failed`).
 */
export class PipelineOrchestrator {
    private readonly deps: PipelineDependencies;

    private readonly combine: CombineFn;

    private readonly now: () => Date;

    constructor(deps: PipelineDependencies) {
        this.deps = deps;
        this.combine = deps.combine ?? defaultCombine;
        this.now = deps.now ?? (() => new Date());
    }

    private transition(context: RunContext, state: PipelineState): void {
        if (context.state !== null && !NEXT_STATES[context.state].includes(state)) {
            throw new Error(`Illegal pipeline transition ${context.state} → ${state}`);
        }
        context.state = state;
        context.history.push({ state, at: this.now().toISOString() });
        log.info(`${LOG_PREFIX} ${state}`, { run: context.runKey });
    }

    async run(options: PipelineOptions): Promise<PipelineResult> {
        const run = RunIdentity.create(options.locationQuery, this.now());
        const runKey = run.toKey();
        const context: RunContext = { run, runKey, diagnostics: new RunDiagnostics(runKey), history: [], state: null };
        // Artifacts of an earlier run are never overwritten
        if (await this.deps.runStore.exists(run)) throw new RunAlreadyExists(runKey);
        log.info(`${LOG_PREFIX} Starting run ${runKey}`, { sources: options.sources });

        const deadline = new AbortController();
        const timer =
            options.deadlineSecs === null
                ? null
                : setTimeout(() => deadline.abort(new DeadlineExceeded()), options.deadlineSecs * 1000);

        try {
            await this.loadCache(options.reuseCacheFrom);

            this.transition(context, 'Scraping');
            await this.scrape(context, options);

            this.transition(context, 'Cleaning');
            const { normalizedBySource, userOffers } = await this.clean(context, options);

            this.transition(context, 'Combining');
            let table: CombinedTable;
            try {
                table = this.combine(normalizedBySource, {
                    runKey,
                    schema: this.deps.schema,
                    sourceOrder: SOURCE_ORDER,
                    tolerance: { price: options.priceTolerance, area: options.areaTolerance },
                    diagnostics: context.diagnostics,
                    userOffers,
                });
            } catch (error) {
                if (!(error instanceof SchemaViolation)) throw error;
                return await this.fail(context, error);
            }
            await this.deps.runStore.saveArtifact(run, RUN_STORE_KEYS.combined, table);

            this.transition(context, 'Enriching');
            const enriched = await this.enrich(context, table, options, deadline.signal);

            this.transition(context, 'ModelTraining');
            const training = await this.train(context, enriched, options);

            this.transition(context, 'Ready');
            const diagnostics = await this.finishDiagnostics(context);
            return {
                state: 'Ready',
                run,
                table: enriched,
                model: training?.model ?? null,
                validationError: training?.validationError ?? null,
                diagnostics,
                history: context.history,
            };
        } finally {
            if (timer) clearTimeout(timer);
        }
    }

    private async loadCache(reuseCacheFrom: string | undefined): Promise<void> {
        let priorDelta: unknown = null;
        if (reuseCacheFrom) {
            priorDelta = await this.deps.runStore.loadArtifact<unknown>(
                RunIdentity.fromKey(reuseCacheFrom),
                RUN_STORE_KEYS.cacheDelta,
            );
            if (!priorDelta) log.warning(`${LOG_PREFIX} Run ${reuseCacheFrom} left no enrichment cache to reuse`);
        }
        await this.deps.cache.load(priorDelta);
    }

    private async scrape({ run, diagnostics }: RunContext, options: PipelineOptions): Promise<void> {
        for (const source of options.sources) {
            const producer = this.deps.producers[source];
            if (!producer) {
                log.warning(`${LOG_PREFIX} No producer configured for ${source}`);
                continue;
            }
            try {
                const listings = await producer.produce(options.locationQuery, options.maxListingsPerSource);
                await this.deps.runStore.saveRaw(run, source, listings);
            } catch (error) {
                diagnostics.failedSources.push(source);
                log.warning(`${LOG_PREFIX} Producer for ${source} failed, continuing without it`, {
                    error: describeError(error),
                });
            }
        }
    }

    private async clean(
        { run, diagnostics }: RunContext,
        options: PipelineOptions,
    ): Promise<{ normalizedBySource: Partial<Record<Source, NormalizedListing[]>>; userOffers: NormalizedListing[] }> {
        const normalizer = new Normalizer(diagnostics, this.now());
        const normalizedBySource: Partial<Record<Source, NormalizedListing[]>> = {};

        for (const source of SOURCE_ORDER) {
            if (!options.sources.includes(source)) continue;
            const { exists, listings } = await this.deps.runStore.loadRaw(run, source);
            if (!exists) {
                if (!diagnostics.failedSources.includes(source)) diagnostics.missingSources.push(source);
                log.warning(`${LOG_PREFIX} No raw ${source} listings for this run, skipping the source`);
                continue;
            }
            normalizedBySource[source] = normalizer.normalizeAll(listings);
        }

        const userOffers = normalizer.normalizeAll(options.userOffers);
        log.info(`${LOG_PREFIX} Normalized listings`, {
            olx: normalizedBySource.OLX?.length ?? 0,
            otodom: normalizedBySource.OTODOM?.length ?? 0,
            userOffers: userOffers.length,
            dropped: diagnostics.droppedRecords,
        });
        return { normalizedBySource, userOffers };
    }

    private async fail(context: RunContext, error: SchemaViolation): Promise<FailedResult> {
        this.transition(context, 'Failed');
        log.error(`${LOG_PREFIX} Run stopped while combining: ${error.message}`);
        const diagnostics = await this.finishDiagnostics(context);
        return {
            state: 'Failed',
            run: context.run,
            failedAt: 'Combining',
            error,
            diagnostics,
            history: context.history,
        };
    }

    private async enrich(
        { run, diagnostics }: RunContext,
        table: CombinedTable,
        options: PipelineOptions,
        signal: AbortSignal,
    ): Promise<CombinedTable> {
        const { client, cache, runStore } = this.deps;
        const statsBefore = { ...client.stats };

        const outcomes = await mapWithConcurrency(table.rows, options.enrichmentConcurrency, async (row) =>
            client.enrichListing(row, options.destination, signal),
        );
        const enriched: CombinedTable = { ...table, rows: table.rows.map((row, i) => applyOutcome(row, outcomes[i])) };

        for (const outcome of outcomes) {
            if (outcome.status === 'complete') diagnostics.enrichmentSucceeded += 1;
            else diagnostics.enrichmentFailed += 1;
        }
        diagnostics.cacheHits += client.stats.cacheHits - statsBefore.cacheHits;
        diagnostics.networkCalls += client.stats.networkCalls - statsBefore.networkCalls;
        diagnostics.timedOut = signal.aborted;
        if (signal.aborted) log.warning(`${LOG_PREFIX} Deadline reached, continuing with partial enrichment`);

        await runStore.saveArtifact(run, RUN_STORE_KEYS.enriched, enriched);
        await runStore.saveArtifact(run, RUN_STORE_KEYS.cacheDelta, cache.delta());
        try {
            await cache.flush();
        } catch (error) {
            log.warning(`${LOG_PREFIX} Could not flush the enrichment cache`, { error: describeError(error) });
        }
        return enriched;
    }

    private async train(
        { run, runKey, diagnostics }: RunContext,
        table: CombinedTable,
        options: PipelineOptions,
    ): Promise<{ model: ModelHandle; validationError: number } | null> {
        let result: { model: ModelHandle; validationError: number };
        try {
            result = await this.deps.trainer.train({
                runKey,
                table,
                featureColumns: options.featureColumns ?? MODEL_FEATURE_COLUMNS,
                targetColumn: options.targetColumn ?? MODEL_TARGET_COLUMN,
            });
        } catch (error) {
            diagnostics.modelTrainingError = describeError(error);
            log.warning(`${LOG_PREFIX} Model training failed, the run completes without a model`, {
                error: diagnostics.modelTrainingError,
            });
            return null;
        }
        await this.deps.runStore.saveArtifact(run, RUN_STORE_KEYS.model, result.model);
        return result;
    }

    private async finishDiagnostics({ run, diagnostics }: RunContext): Promise<DiagnosticsReport> {
        const report = diagnostics.toReport();
        await this.deps.runStore.saveArtifact(run, RUN_STORE_KEYS.diagnostics, report);
        logDiagnostics(report);
        return report;
    }
}
