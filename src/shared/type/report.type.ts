/**
 * View models handed to the report templates.
 * Links, labels and ordering are worked out in ReportRender so the
 * templates stay logic-free.
 */

export type PopularPageItem = {
    resource: string;
    count: number;
    href: string;
};

export type ReferrerItem = {
    href: string;
    domain: string;
    query: string | null;
};

export type SearchItem = {
    query: string;
    count: number;
    searchHref: string;
};

export type SummaryViewModel = {
    hoursSince: number;
    minutesSince: number;
    totalHits: number;
    pageCount: number;
    pageHitsPerHour: number;
    lastRequest: string | null;
    lastRequestHref: string | null;
    timingMs: number;
    logFile: string;

    minResults: number;
    popularPages: PopularPageItem[];
    recentReferrersCount: number;
    recentReferrers: ReferrerItem[];
    recentSearchesCount: number;
    searches: SearchItem[];
};

export type PageFrame = {
    homeHref: string;
    feedHref: string;
    version: string;
};

export type OverviewViewModel = PageFrame & {
    summary: SummaryViewModel;
};

export type UrlHitRow = {
    counter: number;
    when: string;
    ipHref: string;
    hostname: string;
};

export type UrlDetailsViewModel = PageFrame & {
    url: string;
    hits: UrlHitRow[];
};

export type PageVisitRow = {
    counter: number;
    when: string;
    resource: string;
    detailsHref: string;
};

export type IpDetailsViewModel = PageFrame & {
    address: string;
    hostname: string;
    referrer: string | null;
    userAgent: string | null;
    pages: PageVisitRow[];
};

export type AtomViewModel = {
    siteLabel: string;
    selfHref: string;
    updated: string;
    summary: SummaryViewModel;
};
