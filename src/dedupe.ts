import type { CombinedListing, Source } from './types.js';
import { normalizeText } from './utils.js';

export interface MergeTolerance {
    price: number; // relative difference, 0.01 = 1 %
    area: number; // absolute difference in m²
}

export interface OfferRef {
    source: Source;
    externalId: string;
}

/**
 * Result of looking for the same physical offer on both portals. Matching is a heuristic,
 * so a row with several look-alikes is kept as is and flagged for review instead of merged.
 */
export type MergeOutcome =
    | { kind: 'merged'; members: [OfferRef, OfferRef] }
    | { kind: 'unmerged'; member: OfferRef }
    | { kind: 'ambiguous'; member: OfferRef; candidates: OfferRef[] };

const refOf = (row: CombinedListing): OfferRef => ({ source: row.source[0], externalId: row.externalId[0] });

export const isSameOffer = (a: CombinedListing, b: CombinedListing, tolerance: MergeTolerance): boolean => {
    const addressA = normalizeText(a.addressText);
    if (!addressA || addressA !== normalizeText(b.addressText)) return false;
    const priceGap = Math.abs(a.price - b.price) / Math.min(a.price, b.price);
    return priceGap <= tolerance.price && Math.abs(a.areaM2 - b.areaM2) <= tolerance.area;
};

const mergeRows = (a: CombinedListing, b: CombinedListing): CombinedListing => {
    const hasOwnCoordinates = a.latitude !== null && a.longitude !== null;
    return {
        ...a,
        source: [...a.source, ...b.source],
        externalId: [...a.externalId, ...b.externalId],
        rooms: a.rooms ?? b.rooms,
        latitude: hasOwnCoordinates ? a.latitude : b.latitude,
        longitude: hasOwnCoordinates ? a.longitude : b.longitude,
        city: a.city ?? b.city,
        mergeStatus: 'merged',
    };
};

/**
 * Merges rows of the first portal with their single counterpart on the second one.
 * Merged rows take the position of the first-portal row; user offers never merge.
 */
export const mergeCrossSource = (
    rows: CombinedListing[],
    [first, second]: [Source, Source],
    tolerance: MergeTolerance,
): { rows: CombinedListing[]; outcomes: MergeOutcome[] } => {
    const eligible = (row: CombinedListing, source: Source) =>
        !row.isUserOffer && row.source.length === 1 && row.source[0] === source;
    const left = rows.filter((row) => eligible(row, first));
    const right = rows.filter((row) => eligible(row, second));

    const candidatesOf = new Map<CombinedListing, CombinedListing[]>();
    for (const row of left) candidatesOf.set(row, right.filter((other) => isSameOffer(row, other, tolerance)));
    for (const row of right) candidatesOf.set(row, left.filter((other) => isSameOffer(other, row, tolerance)));

    const partnerOf = new Map<CombinedListing, CombinedListing>();
    const ambiguous = new Set<CombinedListing>();
    for (const row of left) {
        const candidates = candidatesOf.get(row) ?? [];
        if (candidates.length === 0) continue;
        const [only] = candidates;
        if (candidates.length === 1 && (candidatesOf.get(only) ?? []).length === 1) {
            partnerOf.set(row, only);
            partnerOf.set(only, row);
        } else {
            ambiguous.add(row);
            for (const candidate of candidates) ambiguous.add(candidate);
        }
    }

    const outcomes: MergeOutcome[] = [];
    const result: CombinedListing[] = [];
    for (const row of rows) {
        const partner = partnerOf.get(row);
        if (partner && left.includes(row)) {
            result.push(mergeRows(row, partner));
            outcomes.push({ kind: 'merged', members: [refOf(row), refOf(partner)] });
        } else if (partner) {
            continue;
        } else if (ambiguous.has(row)) {
            result.push({ ...row, mergeStatus: 'ambiguous' });
            outcomes.push({ kind: 'ambiguous', member: refOf(row), candidates: (candidatesOf.get(row) ?? []).map(refOf) });
        } else {
            result.push(row);
            outcomes.push({ kind: 'unmerged', member: refOf(row) });
        }
    }

    return { rows: result, outcomes };
};
