/** An external referrer in file order, with the search terms found in it. */
export type ReferrerEntry = {
    referrer: string;
    query: string | null;
};

/** Resource or query → count */
export type CountMap = Record<string, number>;

/** Result of one aggregation pass over the log tail. */
export type Overview = {
    totalHits: number;
    pageCount: number;
    hits: CountMap;
    referrers: ReferrerEntry[];
    queries: CountMap;
    firstHit: string | null;
    lastRequest: string | null;
    hoursSince: number;
    minutesSince: number;
    pageHitsPerHour: number;
    timingMs: number;
};

/** One request for a given resource. */
export type UrlHit = {
    counter: number;
    timestamp: string;
    clientAddress: string;
    hostname: string;
};

export type UrlDetails = {
    url: string;
    hits: UrlHit[];
};

/** One page request made by a given client. */
export type PageVisit = {
    counter: number;
    timestamp: string;
    resource: string;
};

export type IpDetails = {
    address: string;
    hostname: string;
    /** From the client's first line in the window; null when it has none */
    referrer: string | null;
    userAgent: string | null;
    totalHits: number;
    pages: PageVisit[];
};
