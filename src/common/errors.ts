/**
 * Error types that cross component boundaries
 * @license MIT
 */

/** The access log cannot be read, or yielded no lines at all. */
export class LogSourceError extends Error {
    constructor(
        message: string,
        readonly path: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = "LogSourceError";
    }
}

/** Invalid environment or redirect table, raised once at startup. */
export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ConfigError";
    }
}
