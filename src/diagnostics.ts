import { log } from 'apify';

import type { Source } from './types.js';

export interface DroppedRecord {
    source: Source;
    externalId: string;
    reason: string;
}

export interface DiagnosticsReport {
    runKey: string;
    droppedRecords: number;
    duplicateRecords: number;
    drops: DroppedRecord[];
    merges: number;
    ambiguousRows: number;
    failedSources: Source[];
    missingSources: Source[];
    enrichment: {
        succeeded: number;
        failed: number;
        cacheHits: number;
        networkCalls: number;
    };
    timedOut: boolean;
    modelTrainingError: string | null;
}

/**
 * Run-wide degradation counters. One instance is created per run and handed to every stage,
 * which records what it had to drop or could not resolve instead of interrupting the run.
 */
export class RunDiagnostics {
    readonly runKey: string;

    private readonly drops: DroppedRecord[] = [];

    duplicateRecords = 0;

    merges = 0;

    ambiguousRows = 0;

    readonly failedSources: Source[] = [];

    readonly missingSources: Source[] = [];

    enrichmentSucceeded = 0;

    enrichmentFailed = 0;

    cacheHits = 0;

    networkCalls = 0;

    timedOut = false;

    modelTrainingError: string | null = null;

    constructor(runKey: string) {
        this.runKey = runKey;
    }

    get droppedRecords(): number {
        return this.drops.length;
    }

    recordDrop(drop: DroppedRecord): void {
        this.drops.push(drop);
        if (drop.reason === 'duplicate') this.duplicateRecords += 1;
    }

    toReport(): DiagnosticsReport {
        return {
            runKey: this.runKey,
            droppedRecords: this.droppedRecords,
            duplicateRecords: this.duplicateRecords,
            drops: [...this.drops],
            merges: this.merges,
            ambiguousRows: this.ambiguousRows,
            failedSources: [...this.failedSources],
            missingSources: [...this.missingSources],
            enrichment: {
                succeeded: this.enrichmentSucceeded,
                failed: this.enrichmentFailed,
                cacheHits: this.cacheHits,
                networkCalls: this.networkCalls,
            },
            timedOut: this.timedOut,
            modelTrainingError: this.modelTrainingError,
        };
    }
}

export function logDiagnostics(report: DiagnosticsReport): void {
    log.info('[pipeline] Run diagnostics', {
        run: report.runKey,
        droppedRecords: report.droppedRecords,
        duplicates: report.duplicateRecords,
        merges: report.merges,
        ambiguousRows: report.ambiguousRows,
        failedSources: report.failedSources,
        enrichmentSucceeded: report.enrichment.succeeded,
        enrichmentFailed: report.enrichment.failed,
        cacheHits: report.enrichment.cacheHits,
        timedOut: report.timedOut,
    });
}
