import { beforeAll, describe, expect, it } from 'vitest';

import {
    COMBINED_COLUMNS,
    type CombinedSchema,
    combine,
    type CombineOptions,
    loadCombinedSchema,
    parseCombinedSchema,
    validateCombinedTable,
} from '../combiner.js';
import { isSameOffer, mergeCrossSource } from '../dedupe.js';
import { RunDiagnostics } from '../diagnostics.js';
import { SchemaViolation } from '../errors.js';
import { combinedRow, normalizedListing } from './fixtures.js';

const RUN_KEY = '2024_05_12_08_30_15_Krakow';
const TOLERANCE = { price: 0.01, area: 1 };

let schema: CombinedSchema;

beforeAll(async () => {
    schema = await loadCombinedSchema();
});

const options = (diagnostics: RunDiagnostics, extra: Partial<CombineOptions> = {}): CombineOptions => ({
    runKey: RUN_KEY,
    schema,
    sourceOrder: ['OLX', 'OTODOM'],
    tolerance: TOLERANCE,
    diagnostics,
    ...extra,
});

const catchViolation = (run: () => void): SchemaViolation => {
    try {
        run();
    } catch (error) {
        if (error instanceof SchemaViolation) return error;
        throw error;
    }
    throw new Error('expected a SchemaViolation');
};

describe('isSameOffer', () => {
    const olx = combinedRow({ price: 2000, areaM2: 40 });

    it('should match offers within 1 % price and 1 m² area at the same address', () => {
        const otodom = combinedRow({ source: ['OTODOM'], externalId: ['9'], price: 2020, areaM2: 40.2 });

        expect(isSameOffer(olx, otodom, TOLERANCE)).toBe(true);
    });

    it('should compare addresses case- and whitespace-insensitively', () => {
        const otodom = combinedRow({ source: ['OTODOM'], addressText: '  długa 5,   KRAKÓW ' });

        expect(isSameOffer(olx, otodom, TOLERANCE)).toBe(true);
    });

    it('should not match when the price differs by more than the tolerance', () => {
        const otodom = combinedRow({ source: ['OTODOM'], price: 2100 });

        expect(isSameOffer(olx, otodom, TOLERANCE)).toBe(false);
    });

    it('should not match rows without an address', () => {
        expect(isSameOffer(combinedRow({ addressText: '' }), combinedRow({ addressText: '' }), TOLERANCE)).toBe(false);
    });
});

describe('mergeCrossSource', () => {
    it('should flag every row involved in a one-to-many match as ambiguous', () => {
        const rows = [
            combinedRow({ externalId: ['a'] }),
            combinedRow({ source: ['OTODOM'], externalId: ['x'], price: 2010 }),
            combinedRow({ source: ['OTODOM'], externalId: ['y'], price: 1995 }),
        ];

        const { rows: result, outcomes } = mergeCrossSource(rows, ['OLX', 'OTODOM'], TOLERANCE);

        expect(result.map((row) => row.mergeStatus)).toEqual(['ambiguous', 'ambiguous', 'ambiguous']);
        expect(outcomes[0]).toEqual({
            kind: 'ambiguous',
            member: { source: 'OLX', externalId: 'a' },
            candidates: [
                { source: 'OTODOM', externalId: 'x' },
                { source: 'OTODOM', externalId: 'y' },
            ],
        });
    });

    it('should never merge user offers', () => {
        const rows = [combinedRow({ isUserOffer: true }), combinedRow({ source: ['OTODOM'], externalId: ['9'] })];

        const { rows: result } = mergeCrossSource(rows, ['OLX', 'OTODOM'], TOLERANCE);

        expect(result).toHaveLength(2);
        expect(result.map((row) => row.mergeStatus)).toEqual(['unmerged', 'unmerged']);
    });
});

describe('combine', () => {
    it('should merge the same flat listed on both portals into one row', () => {
        const diagnostics = new RunDiagnostics(RUN_KEY);
        const table = combine(
            {
                OLX: [normalizedListing({ externalId: '1', price: 2000, areaM2: 40 })],
                OTODOM: [
                    normalizedListing({
                        source: 'OTODOM',
                        externalId: '9',
                        price: 2020,
                        areaM2: 40.2,
                        latitude: 50.05,
                        longitude: 19.94,
                    }),
                ],
            },
            options(diagnostics),
        );

        expect(table.rows).toHaveLength(1);
        expect(table.rows[0]).toMatchObject({
            source: ['OLX', 'OTODOM'],
            externalId: ['1', '9'],
            price: 2000,
            latitude: 50.05,
            longitude: 19.94,
            mergeStatus: 'merged',
        });
        expect(diagnostics.merges).toBe(1);
        expect(table.schemaVersion).toBe('1.0.0');
        expect(table.columns).toEqual([...COMBINED_COLUMNS]);
    });

    it('should keep source order, scrape order within a source and put user offers last', () => {
        const diagnostics = new RunDiagnostics(RUN_KEY);
        const table = combine(
            {
                OTODOM: [normalizedListing({ source: 'OTODOM', externalId: 'o1', addressText: 'Rynek 1, Kraków' })],
                OLX: [
                    normalizedListing({ externalId: 'b', addressText: 'Zwierzyniecka 3, Kraków' }),
                    normalizedListing({ externalId: 'a', addressText: 'Karmelicka 9, Kraków' }),
                ],
            },
            options(diagnostics, {
                userOffers: [normalizedListing({ externalId: 'mine', addressText: 'Rynek 1, Kraków' })],
            }),
        );

        expect(table.rows.map((row) => row.externalId)).toEqual([['b'], ['a'], ['o1'], ['mine']]);
        expect(table.rows.map((row) => row.isUserOffer)).toEqual([false, false, false, true]);
        expect(diagnostics.merges).toBe(0);
    });

    it('should combine a single source when the other one is missing', () => {
        const table = combine({ OTODOM: [normalizedListing({ source: 'OTODOM' })] }, options(new RunDiagnostics(RUN_KEY)));

        expect(table.rows.map((row) => row.source)).toEqual([['OTODOM']]);
    });
});

describe('validateCombinedTable', () => {
    it('should reject a table without the required areaM2 column', () => {
        const columns = COMBINED_COLUMNS.filter((column) => column !== 'areaM2');
        const rows = [combinedRow()].map(({ areaM2: _dropped, ...rest }) => rest);

        const violation = catchViolation(() => validateCombinedTable({ columns, rows }, schema, RUN_KEY));

        expect(violation.runKey).toBe(RUN_KEY);
        expect(violation.issues).toEqual([{ rowIndex: null, field: 'areaM2', message: 'required column is missing' }]);
        expect(violation.message).toBe(
            `Combined table of run ${RUN_KEY} violates the schema: areaM2: required column is missing`,
        );
    });

    it('should report values of the wrong type with their row', () => {
        const rows = [combinedRow(), combinedRow({ externalId: ['2'], rooms: 2.5 })];

        const violation = catchViolation(() =>
            validateCombinedTable({ columns: [...COMBINED_COLUMNS], rows }, schema, RUN_KEY),
        );

        expect(violation.issues.map(({ rowIndex, field }) => ({ rowIndex, field }))).toEqual([
            { rowIndex: 1, field: 'rooms' },
        ]);
    });

    it('should reject a duplicate (source, externalId) pair', () => {
        const rows = [combinedRow(), combinedRow({ price: 2500 })];

        const violation = catchViolation(() =>
            validateCombinedTable({ columns: [...COMBINED_COLUMNS], rows }, schema, RUN_KEY),
        );

        expect(violation.issues).toEqual([
            { rowIndex: 1, field: 'externalId', message: 'duplicate (source, externalId) pair OLX:1' },
        ]);
    });

    it('should reject an unknown source value', () => {
        const rows = [{ ...combinedRow(), source: ['GUMTREE'] }];

        const violation = catchViolation(() =>
            validateCombinedTable({ columns: [...COMBINED_COLUMNS], rows }, schema, RUN_KEY),
        );

        expect(violation.issues[0]).toMatchObject({ rowIndex: 0, field: 'source' });
    });

    it('should accept a valid table', () => {
        const rows = [combinedRow(), combinedRow({ source: ['OTODOM'], rooms: null, latitude: 50.1, longitude: 19.9 })];

        expect(() => validateCombinedTable({ columns: [...COMBINED_COLUMNS], rows }, schema, RUN_KEY)).not.toThrow();
    });

    it('should reject a schema document without a version', () => {
        expect(() => parseCombinedSchema({ fields: {} })).toThrow();
    });
});
