/**
 * Per-resource and per-address views over the parsed log tail
 * @license MIT
 */
import { LogLine } from "../type/log-line.type";
import { IpDetails, PageVisit, UrlDetails, UrlHit } from "../type/overview.type";
import { DnsServiceProvider } from "./dns.service.provider";
import { OverviewServiceProvider } from "./overview.service.provider";

const USER_AGENT_MAX = 50;

export function truncateUserAgent(userAgent: string): string {
    if (userAgent.length <= USER_AGENT_MAX) return userAgent;
    return `${userAgent.slice(0, USER_AGENT_MAX).trim()}...`;
}

export class DetailsServiceProvider {
    constructor(
        private readonly overview: OverviewServiceProvider,
        private readonly dns: DnsServiceProvider
    ) {}

    /**
     * Every non-ignored request for exactly `url`, numbered from 1.
     * Hostnames come from the cache only, one address at a time.
     */
    async urlDetails(lines: LogLine[], url: string): Promise<UrlDetails> {
        const names = new Map<string, string>();
        const hits: UrlHit[] = [];

        for (const line of lines) {
            if (line.resource !== url || this.overview.isIgnored(line)) continue;
            const clientAddress = line.clientAddress ?? "";
            let hostname = names.get(clientAddress);
            if (hostname === undefined) {
                hostname = clientAddress ? await this.dns.cached(clientAddress) : "";
                names.set(clientAddress, hostname);
            }
            hits.push({
                counter: hits.length + 1,
                timestamp: line.timestamp ?? "",
                clientAddress,
                hostname
            });
        }
        return { url, hits };
    }

    /**
     * Every request from exactly `address`. The first one supplies referrer
     * and browser; only page hits are listed, numbered on their own.
     */
    async ipDetails(lines: LogLine[], address: string): Promise<IpDetails> {
        const own = lines.filter((line) => line.clientAddress === address);
        const first = own[0];

        const pages: PageVisit[] = [];
        for (const line of own) {
            if (!this.overview.isPage(line.resource)) continue;
            pages.push({
                counter: pages.length + 1,
                timestamp: line.timestamp ?? "",
                resource: line.resource
            });
        }

        const referrer = first?.referrer ?? "";
        const userAgent = first?.userAgent;
        return {
            address,
            hostname: await this.dns.resolve(address),
            referrer: referrer.length > 1 ? referrer : null,
            userAgent:
                userAgent === undefined ? null : truncateUserAgent(userAgent),
            totalHits: own.length,
            pages
        };
    }
}
