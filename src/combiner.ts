import { readFile } from 'node:fs/promises';

import { log } from 'apify';
import { z } from 'zod';

import { mergeCrossSource, type MergeOutcome, type MergeTolerance } from './dedupe.js';
import type { RunDiagnostics } from './diagnostics.js';
import { type SchemaIssue, SchemaViolation } from './errors.js';
import type { CombinedListing, CombinedTable, NormalizedListing, Source } from './types.js';

export const DEFAULT_SCHEMA_URL = new URL('../schemas/combined-listing.schema.json', import.meta.url);

const fieldSpecSchema = z.object({
    type: z.enum(['string', 'number', 'integer', 'boolean', 'datetime', 'string[]']),
    required: z.boolean(),
    values: z.array(z.string()).optional(),
});

const schemaDocumentSchema = z.object({
    version: z.string().min(1),
    fields: z.record(fieldSpecSchema),
});

export type FieldSpec = z.infer<typeof fieldSpecSchema>;
export type CombinedSchema = z.infer<typeof schemaDocumentSchema>;

export const COMBINED_COLUMNS = [
    'source',
    'externalId',
    'url',
    'price',
    'areaM2',
    'rooms',
    'latitude',
    'longitude',
    'addressText',
    'city',
    'scrapedAt',
    'travelTimeMinutes',
    'isUserOffer',
    'mergeStatus',
] as const satisfies readonly (keyof CombinedListing)[];

export const parseCombinedSchema = (document: unknown): CombinedSchema => schemaDocumentSchema.parse(document);

export const loadCombinedSchema = async (url: URL = DEFAULT_SCHEMA_URL): Promise<CombinedSchema> =>
    parseCombinedSchema(JSON.parse(await readFile(url, 'utf8')));

const valueValidator = (spec: FieldSpec): z.ZodTypeAny => {
    const { values } = spec;
    const inValues = (value: string) => !values || values.includes(value);
    const allowedMessage = `must be one of ${values?.join(', ') ?? ''}`;
    switch (spec.type) {
        case 'string':
            return z.string().refine(inValues, allowedMessage);
        case 'number':
            return z.number().finite();
        case 'integer':
            return z.number().int();
        case 'boolean':
            return z.boolean();
        case 'datetime':
            return z.string().datetime();
        case 'string[]':
            return z.array(z.string().refine(inValues, allowedMessage)).nonempty();
        default:
            return z.never();
    }
};

/**
 * Checks a table against the published schema: every required column is present, required
 * values are non-null, present values have the declared type and no `(source, externalId)`
 * pair occurs twice. Never coerces; throws `SchemaViolation` listing every offending cell.
 */
export const validateCombinedTable = <Row extends object>(
    table: { columns: readonly string[]; rows: readonly Row[] },
    schema: CombinedSchema,
    runKey: string,
): void => {
    const issues: SchemaIssue[] = [];
    const fields = Object.entries(schema.fields);

    for (const [field, spec] of fields) {
        if (spec.required && !table.columns.includes(field)) {
            issues.push({ rowIndex: null, field, message: 'required column is missing' });
        }
    }
    for (const column of table.columns) {
        if (!(column in schema.fields)) {
            issues.push({ rowIndex: null, field: column, message: `column is not part of schema ${schema.version}` });
        }
    }

    const validators = new Map(fields.map(([field, spec]) => [field, valueValidator(spec)]));
    const seenPairs = new Set<string>();

    table.rows.forEach((row, rowIndex) => {
        const values = new Map<string, unknown>(Object.entries(row));
        for (const [field, spec] of fields) {
            if (!table.columns.includes(field)) continue;
            const value = values.get(field);
            if (value === null || value === undefined) {
                if (spec.required) issues.push({ rowIndex, field, message: 'required value is null' });
                continue;
            }
            const parsed = validators.get(field)?.safeParse(value);
            if (parsed && !parsed.success) {
                issues.push({ rowIndex, field, message: parsed.error.issues.map((issue) => issue.message).join(', ') });
            }
        }

        const sources = values.get('source');
        const externalIds = values.get('externalId');
        if (!Array.isArray(sources) || !Array.isArray(externalIds)) return;
        if (sources.length !== externalIds.length) {
            issues.push({ rowIndex, field: 'externalId', message: 'must have one id per source' });
            return;
        }
        sources.forEach((source, i) => {
            const pair = `${String(source)}:${String(externalIds[i])}`;
            if (seenPairs.has(pair)) {
                issues.push({ rowIndex, field: 'externalId', message: `duplicate (source, externalId) pair ${pair}` });
            }
            seenPairs.add(pair);
        });
    });

    if (issues.length > 0) throw new SchemaViolation(runKey, issues);
};

export const toCombinedRow = (listing: NormalizedListing, isUserOffer: boolean): CombinedListing => ({
    ...listing,
    source: [listing.source],
    externalId: [listing.externalId],
    travelTimeMinutes: null,
    isUserOffer,
    mergeStatus: 'unmerged',
});

const countOutcomes = (outcomes: MergeOutcome[], diagnostics: RunDiagnostics): void => {
    for (const outcome of outcomes) {
        if (outcome.kind === 'merged') diagnostics.merges += 1;
        else if (outcome.kind === 'ambiguous') diagnostics.ambiguousRows += 1;
    }
};

export interface CombineOptions {
    runKey: string;
    schema: CombinedSchema;
    sourceOrder: [Source, Source];
    tolerance: MergeTolerance;
    diagnostics: RunDiagnostics;
    userOffers?: NormalizedListing[];
}

export type CombineFn = (
    normalizedBySource: Partial<Record<Source, NormalizedListing[]>>,
    options: CombineOptions,
) => CombinedTable;

/**
 * Concatenates the portals in `sourceOrder` (scrape order within each), merges offers
 * listed on both portals, appends user offers and validates the result.
 */
export const combine: CombineFn = (normalizedBySource, options) => {
    const { runKey, schema, sourceOrder, tolerance, diagnostics, userOffers = [] } = options;
    const scraped = sourceOrder.flatMap((source) =>
        (normalizedBySource[source] ?? []).map((listing) => toCombinedRow(listing, false)),
    );

    const { rows, outcomes } = mergeCrossSource(scraped, sourceOrder, tolerance);
    countOutcomes(outcomes, diagnostics);

    const table: CombinedTable = {
        schemaVersion: schema.version,
        columns: [...COMBINED_COLUMNS],
        rows: [...rows, ...userOffers.map((listing) => toCombinedRow(listing, true))],
    };
    validateCombinedTable(table, schema, runKey);

    log.info(`[combiner] Combined ${table.rows.length} rows`, {
        run: runKey,
        merges: diagnostics.merges,
        ambiguousRows: diagnostics.ambiguousRows,
    });
    return table;
};
