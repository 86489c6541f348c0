import { ParseError } from './errors.js';
import { transliterate } from './utils.js';

const KEY_PATTERN = /^(\d{4})_(\d{2})_(\d{2})_(\d{2})_(\d{2})_(\d{2})_(.+)$/;
const LOCATION_PART = '[A-Za-z0-9]+(?:_[A-Za-z0-9]+)*';
const LOCATION_PATTERN = new RegExp(`^${LOCATION_PART}(?:__${LOCATION_PART})*$`);

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** "Mierzęcice, Będziński, Śląskie" → ["Mierzecice", "Bedzinski", "Slaskie"] */
export const sanitizeLocationParts = (locationQuery: string): string[] =>
    locationQuery
        .split(',')
        .map((part) =>
            transliterate(part)
                .replace(/[^A-Za-z0-9]+/g, '_')
                .replace(/^_+|_+$/g, ''),
        )
        .filter((part) => part.length > 0);

/**
 * Identity of one pipeline execution: the queried location and the moment the run started.
 * Its key (`YYYY_MM_DD_HH_MM_SS_<location>`) names every artifact the run stores, so it is
 * a valid path segment on any filesystem. Timestamps are UTC with whole-second precision.
 */
export class RunIdentity {
    readonly locationParts: readonly string[];

    private readonly epochMs: number;

    private constructor(epochMs: number, locationParts: string[]) {
        this.epochMs = epochMs;
        this.locationParts = Object.freeze(locationParts);
        Object.freeze(this);
    }

    static create(locationQuery: string, now: Date = new Date()): RunIdentity {
        const parts = sanitizeLocationParts(locationQuery);
        if (parts.length === 0) {
            throw new ParseError(`Location query "${locationQuery}" has no characters usable in a run key`);
        }
        if (Number.isNaN(now.getTime())) {
            throw new ParseError('Run timestamp is not a valid date');
        }
        return new RunIdentity(Math.floor(now.getTime() / 1000) * 1000, parts);
    }

    static fromKey(key: string): RunIdentity {
        const match = KEY_PATTERN.exec(key);
        if (!match) {
            throw new ParseError(`Run key "${key}" does not start with a YYYY_MM_DD_HH_MM_SS timestamp`);
        }
        const [, year, month, day, hours, minutes, seconds, location] = match;
        if (!LOCATION_PATTERN.test(location)) {
            throw new ParseError(`Run key "${key}" has a malformed location part "${location}"`);
        }

        const fields = [year, month, day, hours, minutes, seconds].map(Number);
        const [y, mo, d, h, mi, s] = fields;
        // Date.UTC would read years 0-99 as 1900-1999
        const date = new Date(0);
        date.setUTCFullYear(y, mo - 1, d);
        date.setUTCHours(h, mi, s, 0);
        const epochMs = date.getTime();
        const roundTrips =
            date.getUTCFullYear() === y &&
            date.getUTCMonth() === mo - 1 &&
            date.getUTCDate() === d &&
            date.getUTCHours() === h &&
            date.getUTCMinutes() === mi &&
            date.getUTCSeconds() === s;
        if (!roundTrips) {
            throw new ParseError(`Run key "${key}" holds an impossible date or time`);
        }

        return new RunIdentity(epochMs, location.split('__'));
    }

    get timestamp(): Date {
        return new Date(this.epochMs);
    }

    /** Human-readable location, e.g. "Mierzecice, Bedzinski, Slaskie". */
    get locationQuery(): string {
        return this.locationParts.map((part) => part.replace(/_/g, ' ')).join(', ');
    }

    toKey(): string {
        const date = this.timestamp;
        const stamp = [
            pad(date.getUTCFullYear(), 4),
            pad(date.getUTCMonth() + 1),
            pad(date.getUTCDate()),
            pad(date.getUTCHours()),
            pad(date.getUTCMinutes()),
            pad(date.getUTCSeconds()),
        ].join('_');
        return `${stamp}_${this.locationParts.join('__')}`;
    }

    equals(other: RunIdentity): boolean {
        return this.toKey() === other.toKey();
    }

    toString(): string {
        return this.toKey();
    }
}
