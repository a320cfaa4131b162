/**
 * Single pass aggregation of the log tail into an Overview
 * @license MIT
 */
import { AppConfig, justDomain } from "../../common/config";
import { Logger } from "../../common/logger";
import { parseApacheDate } from "../../job/parser";
import { LogLine } from "../type/log-line.type";
import { CountMap, Overview, ReferrerEntry } from "../type/overview.type";

const logger = new Logger("OverviewServiceProvider");

const MINUTE_MS = 60_000;

/** Keys come straight from the log, so no inherited names may collide. */
function emptyCounts(): CountMap {
    return Object.create(null);
}

export class OverviewServiceProvider {
    constructor(private readonly config: AppConfig) {}

    isIgnored(line: LogLine): boolean {
        const pattern = this.config.ignorePattern;
        if (!pattern) return false;
        const target =
            this.config.ignoreScope === "resource" ? line.resource : line.raw;
        return target !== undefined && pattern.test(target);
    }

    isPage(resource: string | undefined): resource is string {
        return resource !== undefined && this.config.pagePattern.test(resource);
    }

    /** A page hit counts towards every total; anything else is skipped. */
    isPageHit(line: LogLine): boolean {
        return this.isPage(line.resource) && !this.isIgnored(line);
    }

    isInternalReferrer(referrer: string): boolean {
        return justDomain(referrer).includes(this.config.siteDomain);
    }

    /**
     * Lower-cased search terms carried by an external referrer, or null.
     * The parameter name depends on the referrer host.
     */
    extractQuery(referrer: string): string | null {
        const host = justDomain(referrer);
        const rule = this.config.queryParams.find((r) =>
            host.includes(r.marker)
        );
        const param = rule ? rule.param : this.config.defaultQueryParam;
        const search = referrer.slice(referrer.lastIndexOf("?") + 1);
        const query = new URLSearchParams(search).get(param);
        return query ? query.toLowerCase() : null;
    }

    buildOverview(lines: LogLine[], now: Date = new Date()): Overview {
        const started = Date.now();
        const hits = emptyCounts();
        const queries = emptyCounts();
        const referrers: ReferrerEntry[] = [];
        let pageCount = 0;
        let lastRequest: string | null = null;
        let firstHit: string | null = null;
        let firstHitAt: Date | null = null;

        for (const line of lines) {
            if (firstHitAt === null && line.timestamp !== undefined) {
                firstHitAt = parseApacheDate(line.timestamp, line.utcOffset);
                if (firstHitAt) firstHit = line.timestamp;
            }

            const resource = line.resource;
            if (!this.isPage(resource) || this.isIgnored(line)) continue;

            pageCount++;
            hits[resource] = (hits[resource] ?? 0) + 1;
            lastRequest = resource;

            const referrer = line.referrer ?? "";
            if (referrer.length <= 1 || this.isInternalReferrer(referrer)) {
                continue;
            }
            const query = this.extractQuery(referrer);
            if (query) queries[query] = (queries[query] ?? 0) + 1;
            referrers.push({ referrer, query });
        }

        const elapsedMs = firstHitAt ? now.getTime() - firstHitAt.getTime() : 0;
        const totalMinutes = Math.max(0, Math.floor(elapsedMs / MINUTE_MS));
        const hoursSince = Math.floor(totalMinutes / 60);
        const minutesSince = totalMinutes % 60;
        // under a minute there is no meaningful rate
        const pageHitsPerHour =
            totalMinutes > 0 ? Math.round(pageCount / (totalMinutes / 60)) : 0;

        const timingMs = Date.now() - started;
        logger.debug(
            `Aggregated ${lines.length} lines, ${pageCount} page hits in ${timingMs} ms`
        );

        return {
            totalHits: lines.length,
            pageCount,
            hits,
            referrers,
            queries,
            firstHit,
            lastRequest,
            hoursSince,
            minutesSince,
            pageHitsPerHour,
            timingMs
        };
    }
}
