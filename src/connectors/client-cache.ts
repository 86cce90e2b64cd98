/**
 * Client cache: authenticated client handles owned by one connector.
 *
 * Entries are keyed by canonical resource ID and remember the credential
 * fingerprint they were built with. Concurrent acquisitions of the same key
 * and fingerprint share one in-flight creation (single-flight). An entry is
 * written only after its creation succeeds.
 *
 * @module
 */

import type { Logger } from "../shared/logger.js";
import { silentLogger } from "../shared/logger.js";

/** Cache key used by resource types that target one implicit resource. */
export const IMPLICIT_RESOURCE_KEY = "<implicit>";

interface CacheEntry<T> {
    client: T;
    fingerprint: string;
    generation: number;
}

interface Flight<T> {
    promise: Promise<T>;
    fingerprint: string;
    generation: number;
}

export interface ClientCacheOptions<T> {
    /** Release a client's provider-side session. */
    dispose?: (client: T) => Promise<void> | void;
    logger?: Logger;
    /** Prefix for log messages (e.g., the connector's type ID). */
    label?: string;
}

/**
 * Per-connector cache of authenticated clients.
 *
 * @example
 * ```ts
 * const cache = new ClientCache<Client>({ dispose: (c) => c.close() });
 * const client = await cache.acquire("myhost/app", config.fingerprint(), () => login());
 * ```
 */
export class ClientCache<T> {
    private readonly entries = new Map<string, CacheEntry<T>>();
    private readonly flights = new Map<string, Flight<T>>();
    /** Clients handed to callers but superseded before they were stored. */
    private readonly detached = new Set<T>();
    private readonly dispose: ((client: T) => Promise<void> | void) | undefined;
    private readonly logger: Logger;
    private readonly label: string;
    private generation = 0;

    constructor(options?: ClientCacheOptions<T>) {
        this.dispose = options?.dispose;
        this.logger = options?.logger ?? silentLogger;
        this.label = options?.label ?? "client-cache";
    }

    // ---------------------------------------------------------------------------
    // Acquisition
    // ---------------------------------------------------------------------------

    /**
     * Return the cached client for `key`, creating it when absent.
     *
     * - A cached entry with a matching fingerprint is returned as-is.
     * - A cached entry with a different fingerprint is evicted (and disposed)
     *   before a fresh client is created.
     * - A creation already in flight for the same key and fingerprint is
     *   joined instead of starting a second one.
     *
     * A failed creation leaves nothing in the cache and rejects every joined
     * caller with the same error.
     */
    acquire(key: string, fingerprint: string, create: () => Promise<T>): Promise<T> {
        const entry = this.entries.get(key);
        if (entry && entry.fingerprint === fingerprint) {
            this.logger.info(`${this.label}: cache hit for ${key}`);
            return Promise.resolve(entry.client);
        }

        const inFlight = this.flights.get(key);
        if (inFlight && inFlight.fingerprint === fingerprint) {
            this.logger.info(`${this.label}: joining in-flight connection for ${key}`);
            return inFlight.promise;
        }

        // The stale entry leaves the map before any await so that concurrent
        // callers see the new flight rather than the stale client.
        const stale = entry;
        if (stale) this.entries.delete(key);

        const generation = ++this.generation;
        const promise = this.run(key, fingerprint, generation, stale, create);
        const flight: Flight<T> = { promise, fingerprint, generation };
        this.flights.set(key, flight);

        const clearFlight = (): void => {
            if (this.flights.get(key) === flight) this.flights.delete(key);
        };
        void promise.then(clearFlight, clearFlight);

        return promise;
    }

    private async run(
        key: string,
        fingerprint: string,
        generation: number,
        stale: CacheEntry<T> | undefined,
        create: () => Promise<T>,
    ): Promise<T> {
        if (stale) {
            this.logger.info(`${this.label}: evicting client for ${key} built with superseded credentials`);
            await this.release(stale.client);
        }

        this.logger.info(`${this.label}: cache miss for ${key}, connecting`);
        const client = await create();

        const current = this.entries.get(key);
        if (current && current.generation > generation) {
            // A newer flight already stored a client; this one stays uncached
            // but is still released by the next eviction.
            this.logger.info(`${this.label}: client for ${key} superseded before it was stored`);
            this.detached.add(client);
            return client;
        }
        if (current) await this.release(current.client);
        this.entries.set(key, { client, fingerprint, generation });
        return client;
    }

    // ---------------------------------------------------------------------------
    // Inspection
    // ---------------------------------------------------------------------------

    /** Whether a client built with `fingerprint` is cached for `key`. */
    has(key: string, fingerprint?: string): boolean {
        const entry = this.entries.get(key);
        if (!entry) return false;
        return fingerprint === undefined || entry.fingerprint === fingerprint;
    }

    /** Whether any cached client was built with `fingerprint`. */
    hasFingerprint(fingerprint: string): boolean {
        for (const entry of this.entries.values()) {
            if (entry.fingerprint === fingerprint) return true;
        }
        return false;
    }

    /** Cached keys. */
    keys(): string[] {
        return Array.from(this.entries.keys());
    }

    /** Number of cached clients. */
    get size(): number {
        return this.entries.size;
    }

    // ---------------------------------------------------------------------------
    // Eviction
    // ---------------------------------------------------------------------------

    /**
     * Evict and dispose every entry whose fingerprint differs from
     * `fingerprint`, along with every superseded client.
     */
    async evictStale(fingerprint: string): Promise<number> {
        const stale: T[] = this.takeDetached();
        for (const [key, entry] of this.entries) {
            if (entry.fingerprint !== fingerprint) {
                this.entries.delete(key);
                stale.push(entry.client);
            }
        }
        await this.releaseAll(stale);
        return stale.length;
    }

    /**
     * Wait for in-flight creations started before this call, then evict and
     * dispose every client they or earlier calls cached, superseded clients
     * included. Resolves once every provider-side session has been released.
     */
    async clear(): Promise<void> {
        const horizon = this.generation;
        await Promise.allSettled(Array.from(this.flights.values(), (f) => f.promise));

        const evicted: T[] = this.takeDetached();
        for (const [key, entry] of this.entries) {
            if (entry.generation <= horizon) {
                this.entries.delete(key);
                evicted.push(entry.client);
            }
        }
        if (evicted.length > 0) {
            this.logger.info(`${this.label}: released ${evicted.length} cached client(s)`);
        }
        await this.releaseAll(evicted);
    }

    private takeDetached(): T[] {
        const clients = Array.from(this.detached);
        this.detached.clear();
        return clients;
    }

    private async release(client: T): Promise<void> {
        if (this.dispose) await this.dispose(client);
    }

    private async releaseAll(clients: T[]): Promise<void> {
        const results = await Promise.allSettled(clients.map((c) => this.release(c)));
        const failure = results.find((r): r is PromiseRejectedResult => r.status === "rejected");
        if (failure) throw failure.reason;
    }
}
