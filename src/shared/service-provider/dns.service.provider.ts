/**
 * Client address → hostname, through the cache
 * @license MIT
 */
import { reverse } from "dns/promises";
import { AppConfig } from "../../common/config";
import { Logger } from "../../common/logger";
import {
    DnsCacheStore,
    OpenDnsCacheStore,
    ReverseLookup
} from "../type/dns-cache.type";

const logger = new Logger("DnsServiceProvider");

export const systemReverseLookup: ReverseLookup = async (address) => {
    const [hostname] = await reverse(address);
    if (!hostname) throw new Error(`No PTR record for ${address}`);
    return hostname;
};

export class DnsServiceProvider {
    private readonly timeoutMs: number;

    constructor(
        config: AppConfig,
        private readonly openStore: OpenDnsCacheStore,
        private readonly lookup: ReverseLookup = systemReverseLookup
    ) {
        this.timeoutMs = config.dnsTimeoutMs;
    }

    /**
     * Runs `fn` against a freshly opened store and always closes it.
     * Any store failure resolves to `fallback`.
     */
    private async withStore<T>(
        fallback: T,
        fn: (store: DnsCacheStore) => Promise<T>
    ): Promise<T> {
        let store: DnsCacheStore;
        try {
            store = await this.openStore();
        } catch (err) {
            logger.debug({ err }, "DNS cache unavailable");
            return fallback;
        }
        try {
            return await fn(store);
        } catch (err) {
            logger.debug({ err }, "DNS cache operation failed");
            return fallback;
        } finally {
            await store
                .close()
                .catch((err: Error) =>
                    logger.debug(`DNS cache close failed: ${err.message}`)
                );
        }
    }

    /** Cached hostname, or the address itself. Never performs a lookup. */
    async cached(address: string): Promise<string> {
        const hit = await this.withStore<string | null>(null, async (store) =>
            (await store.has(address)) ? store.get(address) : null
        );
        return hit ?? address;
    }

    private async lookupWithTimeout(address: string): Promise<string | null> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<null>((resolve) => {
            timer = setTimeout(() => {
                logger.debug(`Reverse lookup of ${address} timed out`);
                resolve(null);
            }, this.timeoutMs);
        });
        try {
            return await Promise.race([
                this.lookup(address).catch((err: Error) => {
                    logger.debug(`Reverse lookup of ${address} failed: ${err.message}`);
                    return null;
                }),
                timeout
            ]);
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * Hostname for `address`: from the cache, else from a reverse lookup
     * that is cached when it succeeds. Any failure returns `address`.
     */
    async resolve(address: string): Promise<string> {
        const hit = await this.cached(address);
        if (hit !== address) return hit;

        const hostname = await this.lookupWithTimeout(address);
        if (!hostname) return address;

        await this.withStore<void>(undefined, (store) => store.set(address, hostname));
        return hostname;
    }
}
