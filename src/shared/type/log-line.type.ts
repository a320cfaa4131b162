/**
 * One access log line split into named fields.
 * Every field is optional: a short or malformed line keeps whatever
 * could be extracted and leaves the rest undefined.
 */
export type LogLine = {
    raw: string;
    clientAddress?: string;
    /** Apache format, e.g. 10/Oct/2024:13:55:36 */
    timestamp?: string;
    /** e.g. -0700 */
    utcOffset?: string;
    method?: string;
    resource?: string;
    protocol?: string;
    status?: number;
    /** Empty when the client sent none or "-" */
    referrer?: string;
    userAgent?: string;
};
