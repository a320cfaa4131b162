/**
 * Unit tests for overview.service.provider.ts
 */

import { parseLine } from "../../job/parser";
import { combinedLine, makeConfig } from "../../testing/fixtures";
import { OverviewServiceProvider } from "./overview.service.provider";

const NOW = new Date("2024-10-10T15:55:36Z");
const SEARCH = "https://www.google.com/search?q=django+book";

function parse(lines: string[]) {
    return lines.map(parseLine);
}

describe("OverviewServiceProvider", () => {
    let provider: OverviewServiceProvider;

    beforeEach(() => {
        provider = new OverviewServiceProvider(
            makeConfig({ IGNORE_PATTERN: "192\\.0\\.2\\.99" })
        );
    });

    describe("buildOverview", () => {
        it("should count hits and queries for a resource", () => {
            const lines = parse([
                combinedLine({ referrer: "http://www.example.org/" }),
                combinedLine({ referrer: "http://www.example.org/docs/" }),
                combinedLine({ referrer: SEARCH })
            ]);
            const overview = provider.buildOverview(lines, NOW);

            expect(overview.hits).toEqual({ "/docs/": 3 });
            expect(overview.queries).toEqual({ "django book": 1 });
            expect(overview.referrers).toEqual([
                { referrer: SEARCH, query: "django book" }
            ]);
            expect(overview.pageCount).toBe(3);
            expect(overview.totalHits).toBe(3);
            expect(overview.lastRequest).toBe("/docs/");
        });

        it("should only count resources matching the page pattern", () => {
            const lines = parse([
                combinedLine({ resource: "/docs/" }),
                combinedLine({ resource: "/static/style.css" }),
                combinedLine({ resource: "/about/" })
            ]);
            const overview = provider.buildOverview(lines, NOW);

            expect(overview.hits).toEqual({ "/docs/": 1, "/about/": 1 });
            expect(overview.pageCount).toBe(2);
            expect(overview.totalHits).toBe(3);
            expect(overview.lastRequest).toBe("/about/");
        });

        it("should never count ignored lines", () => {
            const lines = parse([
                combinedLine({ address: "192.0.2.99", referrer: SEARCH }),
                combinedLine({ address: "198.51.100.1" })
            ]);
            const overview = provider.buildOverview(lines, NOW);

            expect(overview.hits).toEqual({ "/docs/": 1 });
            expect(overview.queries).toEqual({});
            expect(overview.referrers).toEqual([]);
        });

        it("should test the ignore pattern against the resource when so configured", () => {
            const scoped = new OverviewServiceProvider(
                makeConfig({ IGNORE_PATTERN: "^/admin/", IGNORE_SCOPE: "resource" })
            );
            const lines = parse([
                combinedLine({ resource: "/admin/" }),
                combinedLine({ resource: "/docs/", referrer: "http://x.example/admin/" })
            ]);
            expect(scoped.buildOverview(lines, NOW).hits).toEqual({ "/docs/": 1 });
        });

        it("should count queries case-insensitively", () => {
            const lines = parse([
                combinedLine({ referrer: "https://www.google.com/search?q=Django" }),
                combinedLine({ referrer: "https://duckduckgo.com/?q=django" })
            ]);
            expect(provider.buildOverview(lines, NOW).queries).toEqual({
                django: 2
            });
        });

        it("should keep external referrers without a query", () => {
            const lines = parse([
                combinedLine({ referrer: "https://blog.example.net/links" })
            ]);
            const overview = provider.buildOverview(lines, NOW);

            expect(overview.referrers).toEqual([
                { referrer: "https://blog.example.net/links", query: null }
            ]);
            expect(overview.queries).toEqual({});
        });

        it("should keep referrers in file order", () => {
            const lines = parse([
                combinedLine({ referrer: "https://a.example.net/" }),
                combinedLine({ referrer: "https://b.example.net/" })
            ]);
            expect(
                provider.buildOverview(lines, NOW).referrers.map((r) => r.referrer)
            ).toEqual(["https://a.example.net/", "https://b.example.net/"]);
        });

        it("should read the configured parameter for marked hosts", () => {
            const lines = parse([
                combinedLine({ referrer: "https://search.yahoo.com/search?p=Django+Forms&q=x" })
            ]);
            expect(provider.buildOverview(lines, NOW).queries).toEqual({
                "django forms": 1
            });
        });

        it("should ignore an empty query parameter", () => {
            const lines = parse([
                combinedLine({ referrer: "https://www.google.com/search?q=" })
            ]);
            const overview = provider.buildOverview(lines, NOW);
            expect(overview.queries).toEqual({});
            expect(overview.referrers[0].query).toBeNull();
        });

        it("should count queries named like object built-ins", () => {
            const lines = parse([
                combinedLine({ referrer: "https://www.google.com/search?q=constructor" }),
                combinedLine({ referrer: "https://www.google.com/search?q=toString" }),
                combinedLine({ referrer: "https://www.google.com/search?q=__proto__" }),
                combinedLine({ referrer: "https://www.google.com/search?q=constructor" })
            ]);
            const { queries } = provider.buildOverview(lines, NOW);

            expect(Object.keys(queries).sort()).toEqual([
                "__proto__",
                "constructor",
                "tostring"
            ]);
            expect(queries["constructor"]).toBe(2);
            expect(queries["tostring"]).toBe(1);
            expect(queries["__proto__"]).toBe(1);
        });

        it("should skip malformed lines without affecting the rest", () => {
            const good = [
                combinedLine({ referrer: SEARCH }),
                combinedLine({ resource: "/about/" })
            ];
            const clean = provider.buildOverview(parse(good), NOW);
            const mixed = provider.buildOverview(
                parse([good[0], "truncated line here", good[1]]),
                NOW
            );

            expect(mixed.hits).toEqual(clean.hits);
            expect(mixed.queries).toEqual(clean.queries);
            expect(mixed.referrers).toEqual(clean.referrers);
            expect(mixed.pageCount).toBe(clean.pageCount);
            expect(mixed.totalHits).toBe(3);
        });

        it("should be idempotent over the same lines", () => {
            const lines = parse([
                combinedLine({ referrer: SEARCH }),
                combinedLine({ resource: "/about/" })
            ]);
            const first = provider.buildOverview(lines, NOW);
            const second = provider.buildOverview(lines, NOW);

            expect(second.hits).toEqual(first.hits);
            expect(second.queries).toEqual(first.queries);
            expect(second.referrers).toEqual(first.referrers);
            expect(second.pageCount).toBe(first.pageCount);
        });

        it("should compute the rate from the first hit", () => {
            // first hit two hours before NOW
            const lines = parse([
                combinedLine({ time: "10/Oct/2024:13:55:36" }),
                combinedLine({ time: "10/Oct/2024:14:10:00" }),
                combinedLine({ time: "10/Oct/2024:15:00:00" }),
                combinedLine({ time: "10/Oct/2024:15:30:00" })
            ]);
            const overview = provider.buildOverview(lines, NOW);

            expect(overview.firstHit).toBe("10/Oct/2024:13:55:36");
            expect(overview.hoursSince).toBe(2);
            expect(overview.minutesSince).toBe(0);
            expect(overview.pageHitsPerHour).toBe(2);
        });

        it("should report a zero rate when no minute has elapsed", () => {
            const lines = parse([combinedLine({ time: "10/Oct/2024:15:55:36" })]);
            const overview = provider.buildOverview(lines, NOW);

            expect(overview.hoursSince).toBe(0);
            expect(overview.minutesSince).toBe(0);
            expect(overview.pageHitsPerHour).toBe(0);
        });

        it("should take the first parseable timestamp as first hit", () => {
            const lines = parse([
                "junk",
                combinedLine({ time: "10/Oct/2024:15:25:36" })
            ]);
            const overview = provider.buildOverview(lines, NOW);

            expect(overview.firstHit).toBe("10/Oct/2024:15:25:36");
            expect(overview.minutesSince).toBe(30);
            expect(overview.pageHitsPerHour).toBe(2);
        });

        it("should handle a window without any timestamp", () => {
            const overview = provider.buildOverview(parse(["junk", "more junk"]), NOW);

            expect(overview.firstHit).toBeNull();
            expect(overview.lastRequest).toBeNull();
            expect(overview.pageHitsPerHour).toBe(0);
            expect(overview.pageCount).toBe(0);
        });
    });

    describe("isInternalReferrer", () => {
        it("should match on the referrer host", () => {
            expect(provider.isInternalReferrer("http://www.example.org/docs/")).toBe(true);
            expect(
                provider.isInternalReferrer("https://other.example/?u=www.example.org")
            ).toBe(false);
        });
    });
});
