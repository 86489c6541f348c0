import { log } from 'apify';

import { InsufficientTrainingData } from './errors.js';
import type { CombinedListing, ModelHandle, ModelTrainer, TrainingInput, TrainingResult } from './types.js';

// Every HOLDOUT_EVERY-th usable row is kept aside for validation
const HOLDOUT_EVERY = 5;

const PIVOT_EPSILON = 1e-10;

interface Sample {
    features: number[];
    target: number;
}

const readNumber = (row: CombinedListing, column: string): number | null => {
    const value = new Map<string, unknown>(Object.entries(row)).get(column);
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
};

/**
 * Solves `matrix · x = rhs` by Gauss-Jordan elimination with partial pivoting.
 * Columns without a usable pivot (collinear features) get a zero coefficient.
 */
export const solveLinearSystem = (matrix: number[][], rhs: number[]): number[] => {
    const size = rhs.length;
    const rows = matrix.map((row, i) => [...row, rhs[i]]);
    const scale = Math.max(1, ...matrix.flat().map(Math.abs));
    const pivotColumns: number[] = [];

    let rank = 0;
    for (let column = 0; column < size && rank < size; column++) {
        let best = rank;
        for (let r = rank + 1; r < size; r++) {
            if (Math.abs(rows[r][column]) > Math.abs(rows[best][column])) best = r;
        }
        if (Math.abs(rows[best][column]) <= PIVOT_EPSILON * scale) continue;
        [rows[rank], rows[best]] = [rows[best], rows[rank]];

        const pivotRow = rows[rank];
        for (let r = 0; r < size; r++) {
            if (r === rank) continue;
            const factor = rows[r][column] / pivotRow[column];
            if (factor === 0) continue;
            for (let c = column; c <= size; c++) rows[r][c] -= factor * pivotRow[c];
        }
        pivotColumns.push(column);
        rank++;
    }

    const solution = new Array<number>(size).fill(0);
    pivotColumns.forEach((column, r) => {
        solution[column] = rows[r][size] / rows[r][column];
    });
    return solution;
};

/** Ordinary least squares with an intercept, via the normal equations. */
const fitOls = (samples: Sample[], featureCount: number): { intercept: number; coefficients: number[] } => {
    const width = featureCount + 1;
    const xtx = Array.from({ length: width }, () => new Array<number>(width).fill(0));
    const xty = new Array<number>(width).fill(0);

    for (const { features, target } of samples) {
        const x = [1, ...features];
        for (let i = 0; i < width; i++) {
            xty[i] += x[i] * target;
            for (let j = 0; j < width; j++) xtx[i][j] += x[i] * x[j];
        }
    }

    const [intercept, ...coefficients] = solveLinearSystem(xtx, xty);
    return { intercept, coefficients };
};

export const predict = (model: ModelHandle, features: Record<string, number>): number =>
    model.featureColumns.reduce((sum, column, i) => {
        const value = features[column];
        if (value === undefined) throw new RangeError(`Missing feature ${column} for model ${model.id}`);
        return sum + model.coefficients[i] * value;
    }, model.intercept);

const meanAbsoluteError = (model: ModelHandle, samples: Sample[]): number => {
    const total = samples.reduce((sum, { features, target }) => {
        const named = Object.fromEntries(model.featureColumns.map((column, i) => [column, features[i]]));
        return sum + Math.abs(predict(model, named) - target);
    }, 0);
    return total / samples.length;
};

/**
 * Price regression over the combined table. User offers are left out, feature columns that
 * are empty in every row are dropped and rows missing any remaining value are skipped.
 */
export class LinearRegressionTrainer implements ModelTrainer {
    private readonly now: () => Date;

    constructor(now: () => Date = () => new Date()) {
        this.now = now;
    }

    async train({ runKey, table, featureColumns, targetColumn }: TrainingInput): Promise<TrainingResult> {
        const candidates = table.rows.filter((row) => !row.isUserOffer);
        const usedColumns = featureColumns.filter((column) =>
            candidates.some((row) => readNumber(row, column) !== null),
        );

        const samples: Sample[] = [];
        for (const row of candidates) {
            const target = readNumber(row, targetColumn);
            const features = usedColumns.map((column) => readNumber(row, column));
            if (target === null || features.some((value) => value === null)) continue;
            samples.push({ target, features: features.filter((value): value is number => value !== null) });
        }

        const training = samples.filter((_, i) => i % HOLDOUT_EVERY !== HOLDOUT_EVERY - 1);
        const holdout = samples.filter((_, i) => i % HOLDOUT_EVERY === HOLDOUT_EVERY - 1);
        const required = usedColumns.length + 2;
        if (usedColumns.length === 0 || training.length < required) {
            throw new InsufficientTrainingData(training.length, required);
        }

        const { intercept, coefficients } = fitOls(training, usedColumns.length);
        const model: ModelHandle = Object.freeze({
            id: `${runKey}-linear-regression`,
            runKey,
            kind: 'linear-regression',
            featureColumns: usedColumns,
            targetColumn,
            intercept,
            coefficients,
            trainedRows: training.length,
            createdAt: this.now().toISOString(),
        });
        const validationError = meanAbsoluteError(model, holdout.length > 0 ? holdout : training);

        log.info(`[model] Trained on ${training.length} rows, validated on ${holdout.length}`, {
            run: runKey,
            features: usedColumns,
            meanAbsoluteError: Math.round(validationError),
        });
        return { model, validationError };
    }
}
