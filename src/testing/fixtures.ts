/**
 * Shared test helpers: configuration, log lines and an in-memory DNS cache
 */
import { AppConfig, loadConfig } from "../common/config";
import { DnsCacheStore, OpenDnsCacheStore } from "../shared/type/dns-cache.type";

export function makeConfig(
    env: Record<string, string> = {},
    overrides: Partial<AppConfig> = {}
): AppConfig {
    return {
        ...loadConfig({ SITE_URL: "http://www.example.org/", ...env }),
        ...overrides
    };
}

type LineFields = {
    address?: string;
    time?: string;
    offset?: string;
    method?: string;
    resource?: string;
    status?: number;
    referrer?: string;
    agent?: string;
};

/** A combined log format line. */
export function combinedLine(fields: LineFields = {}): string {
    const {
        address = "198.51.100.7",
        time = "10/Oct/2024:13:55:36",
        offset = "+0000",
        method = "GET",
        resource = "/docs/",
        status = 200,
        referrer = "-",
        agent = "Mozilla/5.0 (X11; Linux x86_64)"
    } = fields;
    return `${address} - - [${time} ${offset}] "${method} ${resource} HTTP/1.1" ${status} 512 "${referrer}" "${agent}"`;
}

/** DnsCacheStore over a Map, counting opens and closes. */
export class MemoryDnsCache {
    readonly entries = new Map<string, string>();
    opened = 0;
    closed = 0;
    failOpen = false;
    failSet = false;

    readonly open: OpenDnsCacheStore = async () => {
        if (this.failOpen) throw new Error("cache store unavailable");
        this.opened++;
        const store: DnsCacheStore = {
            has: async (address) => this.entries.has(address),
            get: async (address) => this.entries.get(address) ?? null,
            set: async (address, hostname) => {
                if (this.failSet) throw new Error("cache store is read-only");
                this.entries.set(address, hostname);
            },
            close: async () => {
                this.closed++;
            }
        };
        return store;
    };
}
