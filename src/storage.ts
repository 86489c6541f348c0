import { createHash } from 'node:crypto';

import { Actor, log } from 'apify';

import { RUN_STORE_KEYS } from './constants.js';
import type { RunIdentity } from './runIdentity.js';
import type { RawListing, Source } from './types.js';

/** The slice of Apify's `KeyValueStore` the pipeline relies on. */
export interface KeyValueStoreLike {
    getValue<T>(key: string): Promise<T | null>;
    setValue<T>(key: string, value: T | null, options?: { contentType?: string }): Promise<void>;
}

export type OpenStore = (name: string) => Promise<KeyValueStoreLike>;

export type RunArtifactKey = (typeof RUN_STORE_KEYS)[Exclude<keyof typeof RUN_STORE_KEYS, 'rawOlx' | 'rawOtodom'>];

const RAW_KEYS: Record<Source, string> = {
    OLX: RUN_STORE_KEYS.rawOlx,
    OTODOM: RUN_STORE_KEYS.rawOtodom,
};

// Named Apify storages take lowercase letters, digits and inner hyphens, at most 63 characters
const STORE_NAME_MAX_LENGTH = 63;
const STORE_NAME_HASH_LENGTH = 8;

/**
 * Name of the key-value store holding one run's artifacts. The readable part is the lowercased
 * run key cut to fit; the hash of the full key keeps names of different runs apart.
 */
export const runStoreName = (runKey: string): string => {
    const hash = createHash('sha1').update(runKey).digest('hex').slice(0, STORE_NAME_HASH_LENGTH);
    const readable = runKey
        .toLowerCase()
        .replace(/[^a-z0-9]/g, '-')
        .slice(0, STORE_NAME_MAX_LENGTH - STORE_NAME_HASH_LENGTH - 1)
        .replace(/^-+|-+$/g, '');
    return readable ? `${readable}-${hash}` : hash;
};

export const openApifyStore: OpenStore = async (name) => Actor.openKeyValueStore(name);

/**
 * Artifacts of each run live in their own key-value store named after the run key
 * (see `runStoreName`), which locally is one directory per run. A run only ever writes into its own store.
 */
export class RunStore {
    private readonly openStore: OpenStore;

    private readonly opened = new Map<string, Promise<KeyValueStoreLike>>();

    constructor(openStore: OpenStore = openApifyStore) {
        this.openStore = openStore;
    }

    private storeFor(run: RunIdentity | string): Promise<KeyValueStoreLike> {
        const key = typeof run === 'string' ? run : run.toKey();
        let store = this.opened.get(key);
        if (!store) {
            store = this.openStore(runStoreName(key));
            this.opened.set(key, store);
        }
        return store;
    }

    async saveRaw(run: RunIdentity, source: Source, listings: RawListing[]): Promise<void> {
        const store = await this.storeFor(run);
        await store.setValue(RAW_KEYS[source], listings);
        log.info(`[storage] Saved ${listings.length} raw ${source} listings`, { run: run.toKey() });
    }

    /** Reads one source's raw file of a run; `exists` is false when the source produced no file. */
    async loadRaw(run: RunIdentity, source: Source): Promise<{ exists: boolean; listings: RawListing[] }> {
        const store = await this.storeFor(run);
        const listings = await store.getValue<RawListing[]>(RAW_KEYS[source]);
        return listings ? { exists: true, listings } : { exists: false, listings: [] };
    }

    /** Whether any artifact was already stored under the run's key. */
    async exists(run: RunIdentity): Promise<boolean> {
        const store = await this.storeFor(run);
        for (const key of Object.values(RUN_STORE_KEYS)) {
            if ((await store.getValue<unknown>(key)) !== null) return true;
        }
        return false;
    }

    async saveArtifact<T>(run: RunIdentity, key: RunArtifactKey, value: T): Promise<void> {
        const store = await this.storeFor(run);
        await store.setValue(key, value);
    }

    /** Prior runs are addressed by key, so a later run can reuse e.g. their enrichment cache. */
    async loadArtifact<T>(run: RunIdentity | string, key: RunArtifactKey): Promise<T | null> {
        const store = await this.storeFor(run);
        return store.getValue<T>(key);
    }
}
