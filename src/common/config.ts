/**
 * Application configuration, read once from the environment
 * @license MIT
 */
import { readFileSync } from "fs";
import { join } from "path";
import { ConfigError } from "./errors";
import { RedirectRule } from "../shared/type/redirect.type";

export const APP_VERSION = "1.0.0";

/** Which part of a log line the ignore pattern is tested against. */
export type IgnoreScope = "line" | "resource";

/** Referrer host marker → name of the query parameter holding the search terms. */
export type QueryParamRule = { marker: string; param: string };

export type AppConfig = {
    port: number;
    host: string;

    logFile: string;
    /** Root URL of the site whose log is analysed */
    siteUrl: string;
    /** Host part of siteUrl, used to drop internal referrers */
    siteDomain: string;
    tailLines: number;

    minResults: number;
    recentReferrers: number;
    recentSearches: number;

    pagePattern: RegExp;
    ignorePattern: RegExp | null;
    ignoreScope: IgnoreScope;
    queryParams: QueryParamRule[];
    defaultQueryParam: string;

    redisUrl: string;
    dnsCachePrefix: string;
    dnsTimeoutMs: number;

    docsRoot: string;
    docsPrefix: string;
    assetsRoot: string;
    viewsRoot: string;
    redirects: RedirectRule[];
};

type Env = Record<string, string | undefined>;

/**
 * Returns the host of an absolute URL, or "bad referrer" when there is none.
 * Works on raw referrer strings, which are not always valid URLs.
 */
export function justDomain(url: string): string {
    const afterScheme = url.split("//")[1];
    if (afterScheme === undefined) return "bad referrer";
    return afterScheme.split("/")[0];
}

function int(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === "") return fallback;
    const n = Number(raw);
    return Number.isInteger(n) && n > 0 ? n : fallback;
}

function regex(name: string, raw: string): RegExp {
    try {
        return new RegExp(raw);
    } catch (err) {
        throw new ConfigError(`${name} is not a valid regular expression`, {
            cause: err
        });
    }
}

/** Parses "marker=param,marker=param". */
export function parseQueryParams(raw: string): QueryParamRule[] {
    return raw
        .split(",")
        .map((pair) => pair.trim())
        .filter((pair) => pair.length > 0)
        .map((pair) => {
            const eq = pair.lastIndexOf("=");
            if (eq <= 0 || eq === pair.length - 1) {
                throw new ConfigError(
                    `SEARCH_QUERY_PARAMS entry "${pair}" must look like marker=param`
                );
            }
            return { marker: pair.slice(0, eq), param: pair.slice(eq + 1) };
        });
}

function isRedirectRule(value: unknown): value is RedirectRule {
    if (typeof value !== "object" || value === null) return false;
    const from: unknown = Reflect.get(value, "from");
    const to: unknown = Reflect.get(value, "to");
    return (
        typeof from === "string" &&
        from.startsWith("/") &&
        typeof to === "string"
    );
}

export function loadRedirects(file: string): RedirectRule[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(readFileSync(file, "utf8"));
    } catch (err) {
        throw new ConfigError(`Cannot load redirect table ${file}`, {
            cause: err
        });
    }
    if (!Array.isArray(parsed) || !parsed.every(isRedirectRule)) {
        throw new ConfigError(
            `Redirect table ${file} must be an array of { from, to } with absolute "from" paths`
        );
    }
    return parsed;
}

export function loadConfig(env: Env = process.env): AppConfig {
    const cwd = process.cwd();
    const siteUrl = env.SITE_URL || "http://localhost/";
    const ignoreScope = env.IGNORE_SCOPE || "line";
    if (ignoreScope !== "line" && ignoreScope !== "resource") {
        throw new ConfigError(
            `IGNORE_SCOPE must be "line" or "resource", got "${ignoreScope}"`
        );
    }

    return {
        port: int(env.PORT, 3000),
        host: env.HOST || "0.0.0.0",

        logFile: env.TAIL_LOG_FILE || `${cwd}/tmp/access.log`,
        siteUrl,
        siteDomain: justDomain(siteUrl),
        tailLines: int(env.TAIL_LINES, 5000),

        minResults: int(env.MIN_RESULTS, 10),
        recentReferrers: int(env.RECENT_REFERRERS, 20),
        recentSearches: int(env.RECENT_SEARCHES, 20),

        pagePattern: regex("PAGE_PATTERN", env.PAGE_PATTERN || "/$"),
        ignorePattern: env.IGNORE_PATTERN
            ? regex("IGNORE_PATTERN", env.IGNORE_PATTERN)
            : null,
        ignoreScope,
        queryParams: parseQueryParams(env.SEARCH_QUERY_PARAMS ?? ".yahoo.=p"),
        defaultQueryParam: "q",

        redisUrl: env.REDIS_URL || "redis://localhost:6379",
        dnsCachePrefix: env.DNS_CACHE_PREFIX || "dns:",
        dnsTimeoutMs: int(env.DNS_TIMEOUT_MS, 2000),

        docsRoot: env.DOCS_ROOT || join(cwd, "_build", "html"),
        docsPrefix: env.DOCS_PREFIX || "/en/2.0/",
        assetsRoot: join(cwd, "resources", "assets"),
        viewsRoot: join(cwd, "resources", "views"),
        redirects: loadRedirects(
            env.REDIRECTS_FILE || join(cwd, "resources", "redirects.json")
        )
    };
}
