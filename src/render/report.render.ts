import "@fastify/view";
import { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { APP_VERSION as version, AppConfig, justDomain } from "../common/config";
import { Logger } from "../common/logger";
import { LogTailJob } from "../job/log-tail.job";
import { apacheDay, parseLine } from "../job/parser";
import { DetailsServiceProvider } from "../shared/service-provider/details.service.provider";
import { DnsServiceProvider } from "../shared/service-provider/dns.service.provider";
import { OverviewServiceProvider } from "../shared/service-provider/overview.service.provider";
import { CountMap, Overview } from "../shared/type/overview.type";
import { ReportQuery } from "../shared/type/query.type";
import {
    AtomViewModel,
    IpDetailsViewModel,
    OverviewViewModel,
    PageFrame,
    SummaryViewModel,
    UrlDetailsViewModel
} from "../shared/type/report.type";

const logger = new Logger("ReportRender");

export const REPORT_PATH = "/stats";

/** Keys ordered by count, highest first; ties by key. */
export function sortByCount(counts: CountMap): string[] {
    return Object.keys(counts).sort(
        (a, b) => counts[b] - counts[a] || a.localeCompare(b)
    );
}

/** "today, 13:55:36" for timestamps on `today`, the timestamp otherwise. */
export function formatWhen(timestamp: string, today: string): string {
    return timestamp.startsWith(`${today}:`)
        ? `today, ${timestamp.slice(today.length + 1)}`
        : timestamp;
}

export class ReportRender {
    private readonly details: DetailsServiceProvider;

    constructor(
        private readonly config: AppConfig,
        private readonly tail: LogTailJob,
        private readonly overview: OverviewServiceProvider,
        dns: DnsServiceProvider,
        private readonly clock: () => Date = () => new Date()
    ) {
        this.details = new DetailsServiceProvider(overview, dns);
        logger.notice("ReportRender init");
    }

    register(fastify: FastifyInstance): void {
        fastify.get<ReportQuery>(REPORT_PATH, (req, res) => this.index(req, res));
    }

    async index(req: FastifyRequest<ReportQuery>, res: FastifyReply) {
        const { url, ip, atom } = req.query;
        const lines = (await this.tail.readLines()).map(parseLine);
        const now = this.clock();
        const wantsJson =
            (req.headers.accept ?? "").toLowerCase() === "application/json";

        if (atom !== undefined) {
            const vm = this.atomViewModel(
                this.overview.buildOverview(lines, now),
                req,
                now
            );
            if (wantsJson) return vm;
            const xml = await res.server.view("atom", vm);
            return res.type("application/atom+xml; charset=utf-8").send(xml);
        }

        const frame = this.frame(req);
        const today = apacheDay(now);

        if (url) {
            const found = await this.details.urlDetails(lines, url);
            const vm: UrlDetailsViewModel = {
                ...frame,
                url,
                hits: found.hits.map((hit) => ({
                    counter: hit.counter,
                    when: formatWhen(hit.timestamp, today),
                    ipHref: this.link("ip", hit.clientAddress),
                    hostname: hit.hostname
                }))
            };
            return wantsJson ? vm : res.view("url-details", vm);
        }

        if (ip) {
            const found = await this.details.ipDetails(lines, ip);
            const vm: IpDetailsViewModel = {
                ...frame,
                address: found.address,
                hostname:
                    found.hostname === found.address
                        ? "unknown host"
                        : found.hostname,
                referrer: found.referrer,
                userAgent: found.userAgent,
                pages: found.pages.map((page) => ({
                    counter: page.counter,
                    when: formatWhen(page.timestamp, today),
                    resource: page.resource,
                    detailsHref: this.link("url", page.resource)
                }))
            };
            return wantsJson ? vm : res.view("ip-details", vm);
        }

        const vm: OverviewViewModel = {
            ...frame,
            summary: this.summary(this.overview.buildOverview(lines, now))
        };
        return wantsJson ? vm : res.view("overview", vm);
    }

    private link(param: "url" | "ip", value: string): string {
        return `${REPORT_PATH}?${param}=${encodeURIComponent(value)}`;
    }

    private frame(req: FastifyRequest): PageFrame {
        return {
            homeHref: REPORT_PATH,
            feedHref: `${this.origin(req)}${REPORT_PATH}?atom=true`,
            version
        };
    }

    private origin(req: FastifyRequest): string {
        return `${req.protocol}://${req.headers.host ?? req.hostname}`;
    }

    summary(overview: Overview): SummaryViewModel {
        const { hits, queries } = overview;
        const popularPages = sortByCount(hits)
            .filter((resource) => hits[resource] >= this.config.minResults)
            .map((resource) => ({
                resource,
                count: hits[resource],
                href: this.link("url", resource)
            }));

        const recentReferrers = overview.referrers
            .slice()
            .reverse()
            .slice(0, this.config.recentReferrers)
            .map(({ referrer, query }) => ({
                href: referrer,
                domain: justDomain(referrer),
                query
            }));

        const searches = sortByCount(queries)
            .slice(0, this.config.recentSearches)
            .map((query) => ({
                query,
                count: queries[query],
                searchHref: `https://www.google.com/search?q=${encodeURIComponent(query)}`
            }));

        return {
            hoursSince: overview.hoursSince,
            minutesSince: overview.minutesSince,
            totalHits: overview.totalHits,
            pageCount: overview.pageCount,
            pageHitsPerHour: overview.pageHitsPerHour,
            lastRequest: overview.lastRequest,
            lastRequestHref: overview.lastRequest
                ? this.link("url", overview.lastRequest)
                : null,
            timingMs: overview.timingMs,
            logFile: this.config.logFile,
            minResults: this.config.minResults,
            popularPages,
            recentReferrersCount: this.config.recentReferrers,
            recentReferrers,
            recentSearchesCount: this.config.recentSearches,
            searches
        };
    }

    private atomViewModel(
        overview: Overview,
        req: FastifyRequest,
        now: Date
    ): AtomViewModel {
        return {
            siteLabel: this.config.siteUrl.replace(/^https?:\/\//, ""),
            selfHref: `${this.origin(req)}${REPORT_PATH}`,
            updated: now.toISOString().replace(/\.\d{3}Z$/, "Z"),
            summary: this.summary(overview)
        };
    }
}
