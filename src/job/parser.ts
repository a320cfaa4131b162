/**
 * Access log line parsing
 * @license MIT
 */
import { LogLine } from "../shared/type/log-line.type";

/**
 * Fields are positional, for the Apache/nginx combined format:
 * 203.0.113.5 - - [10/Oct/2024:13:55:36 -0700] "GET /docs/ HTTP/1.1" 200 2326 "https://ref.example/" "Mozilla/5.0"
 * A line may be cut anywhere; whatever is missing stays undefined.
 */
const APACHE_DATE_RE =
    /^(\d{1,2})\/([A-Za-z]{3})\/(\d{4}):(\d{2}):(\d{2}):(\d{2})$/;
const OFFSET_RE = /^([+-])(\d{2})(\d{2})$/;
const MONTHS = [
    "Jan",
    "Feb",
    "Mar",
    "Apr",
    "May",
    "Jun",
    "Jul",
    "Aug",
    "Sep",
    "Oct",
    "Nov",
    "Dec"
];

function token(tokens: string[], index: number): string | undefined {
    const value = tokens[index];
    return value === undefined || value === "" ? undefined : value;
}

export function parseLine(raw: string): LogLine {
    const line = raw.replace(/\r$/, "");
    const tokens = line.split(" ");
    const entry: LogLine = { raw: line };

    entry.clientAddress = token(tokens, 0);
    entry.timestamp = token(tokens, 3)?.replace(/^\[/, "");
    entry.utcOffset = token(tokens, 4)?.replace(/\]$/, "");
    entry.method = token(tokens, 5)?.replace(/^"/, "");
    entry.resource = token(tokens, 6);
    entry.protocol = token(tokens, 7)?.replace(/"$/, "");

    const status = Number(token(tokens, 8));
    if (Number.isInteger(status)) entry.status = status;

    // some agents put escaped quotes in their name
    const quoted = line.replace(/\\"/g, "'").split('"');
    if (quoted.length >= 7) {
        const referrer = quoted[quoted.length - 4];
        entry.referrer = referrer === "-" ? "" : referrer;
        entry.userAgent = quoted[quoted.length - 2];
    }

    return entry;
}

/**
 * Apache timestamp to Date. With a UTC offset the instant is exact;
 * without one the timestamp is read as server local time.
 */
export function parseApacheDate(
    timestamp: string,
    utcOffset?: string
): Date | null {
    const m = APACHE_DATE_RE.exec(timestamp);
    if (!m) return null;
    const month = MONTHS.indexOf(m[2]);
    if (month < 0) return null;
    const [day, year, hours, minutes, seconds] = [m[1], m[3], m[4], m[5], m[6]].map(
        Number
    );

    const offset = utcOffset ? OFFSET_RE.exec(utcOffset) : null;
    if (!offset) {
        return new Date(year, month, day, hours, minutes, seconds);
    }
    const sign = offset[1] === "-" ? -1 : 1;
    const offsetMinutes = sign * (Number(offset[2]) * 60 + Number(offset[3]));
    return new Date(
        Date.UTC(year, month, day, hours, minutes, seconds) -
            offsetMinutes * 60_000
    );
}

/** Today's date the way it prefixes Apache timestamps, e.g. 10/Oct/2024 */
export function apacheDay(date: Date): string {
    const day = String(date.getDate()).padStart(2, "0");
    return `${day}/${MONTHS[date.getMonth()]}/${date.getFullYear()}`;
}
