import { setTimeout } from 'node:timers/promises';

const EXTRA_TRANSLITERATIONS: Record<string, string> = { ł: 'l', Ł: 'L', ß: 'ss', æ: 'ae', Æ: 'AE', ø: 'o', Ø: 'O' };

/** Strips diacritics and maps the few letters NFD does not decompose (Polish "ł") to ASCII. */
export const transliterate = (text: string): string =>
    text
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .replace(/[łŁßæÆøØ]/g, (char) => EXTRA_TRANSLITERATIONS[char] ?? char);

/** Case-folded, diacritic-free, whitespace-collapsed form used to compare addresses. */
export const normalizeText = (text: string): string => transliterate(text).toLowerCase().replace(/\s+/g, ' ').trim();

/** Parses "2 500,50 zł", "48 m²" and similar scraped values; null when nothing numeric is left. */
export const parseLooseNumber = (value: string | number | null | undefined): number | null => {
    if (value == null) return null;
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    const cleaned = value
        .replace(/m²|m2/gi, '')
        .replace(/\s/g, '')
        .replace(',', '.')
        .replace(/[^\d.-]/g, '');
    if (!cleaned || !/\d/.test(cleaned)) return null;
    const num = Number.parseFloat(cleaned);
    return Number.isFinite(num) ? num : null;
};

export const roundTo = (value: number, decimals: number): number => {
    const factor = 10 ** decimals;
    const rounded = Math.round(value * factor) / factor;
    return Object.is(rounded, -0) ? 0 : rounded;
};

/** Sleeps for `ms`, rejecting early with the signal's reason when it aborts. */
export const sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
    await setTimeout(ms, undefined, { signal });
};

/** Settles with the promise, or rejects as soon as the signal aborts, abandoning the promise. */
export const raceAbort = async <T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> => {
    if (!signal) return promise;
    signal.throwIfAborted();
    let onAbort: (() => void) | undefined;
    const aborted = new Promise<never>((_, reject) => {
        onAbort = () => reject(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
    });
    try {
        return await Promise.race([promise, aborted]);
    } finally {
        if (onAbort) signal.removeEventListener('abort', onAbort);
    }
};

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`; a rejected call rejects the whole batch.
 */
export const mapWithConcurrency = async <T, R>(
    items: readonly T[],
    concurrency: number,
    worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
    const results = new Array<R>(items.length);
    let next = 0;

    const runLane = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await worker(items[index], index);
        }
    };

    const lanes = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: lanes }, runLane));
    return results;
};

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
