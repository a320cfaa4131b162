/**
 * Reads the most recent lines of a growing access log
 * @license MIT
 */
import { once } from "events";
import { createReadStream } from "fs";
import { FileHandle, open } from "fs/promises";
import { createInterface } from "readline";
import { AppConfig } from "../common/config";
import { LogSourceError } from "../common/errors";
import { Logger } from "../common/logger";

const logger = new Logger("LogTailJob");

const INITIAL_CHARS_PER_LINE = 150;
const CHARS_PER_LINE_GROWTH = 1.3;

/**
 * Reads backwards from the end of the file with an estimated line length,
 * widening the window until it holds more than `count` lines or reaches the
 * start of the file. The text after the last newline is a line still being
 * written and is never returned.
 */
async function tailFromEnd(handle: FileHandle, count: number): Promise<string[]> {
    const { size } = await handle.stat();
    let charsPerLine = INITIAL_CHARS_PER_LINE;
    let lines: string[];

    for (;;) {
        const start = Math.max(0, size - Math.ceil(charsPerLine * count));
        const buffer = Buffer.alloc(size - start);
        let filled = 0;
        while (filled < buffer.length) {
            const { bytesRead } = await handle.read(
                buffer,
                filled,
                buffer.length - filled,
                start + filled
            );
            if (bytesRead === 0) break;
            filled += bytesRead;
        }
        lines = buffer.subarray(0, filled).toString("utf8").split("\n");
        if (lines.length > count + 1 || start === 0) break;
        charsPerLine *= CHARS_PER_LINE_GROWTH;
    }

    // the last element is the unterminated remainder, the first may be cut
    const from = lines.length > count ? lines.length - count - 1 : 0;
    return lines.slice(from, lines.length - 1).map(stripCr);
}

/** Streams the whole file and keeps the last `count` complete lines. */
async function tailByStreaming(path: string, count: number): Promise<string[]> {
    const kept: string[] = [];
    const input = createReadStream(path, { encoding: "utf8" });
    // readline would not surface a failed open
    await once(input, "open");
    let endsWithNewline = true;
    input.on("data", (chunk) => {
        if (chunk.length > 0) endsWithNewline = chunk.toString().endsWith("\n");
    });
    const rl = createInterface({ input, crlfDelay: Infinity });

    for await (const line of rl) {
        kept.push(line);
        if (kept.length > count + 1) kept.shift();
    }

    // readline also yields the unterminated remainder
    if (!endsWithNewline) kept.pop();
    return kept.slice(-count);
}

function stripCr(line: string): string {
    return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Last `count` complete lines of `path`, oldest first.
 * Throws LogSourceError when the file cannot be read or has no complete line.
 */
export async function tailLines(path: string, count: number): Promise<string[]> {
    let handle: FileHandle;
    try {
        handle = await open(path, "r");
    } catch (err) {
        throw new LogSourceError(`Cannot open log file ${path}`, path, {
            cause: err
        });
    }

    let lines: string[];
    try {
        lines = await tailFromEnd(handle, count);
    } catch (err) {
        logger.warn({ err }, `Positional read of ${path} failed, streaming it`);
        try {
            lines = await tailByStreaming(path, count);
        } catch (streamErr) {
            throw new LogSourceError(`Cannot read log file ${path}`, path, {
                cause: streamErr
            });
        }
    } finally {
        await handle.close();
    }

    if (lines.length === 0) {
        throw new LogSourceError(`No lines found in ${path}`, path);
    }
    return lines;
}

export class LogTailJob {
    constructor(private readonly config: AppConfig) {
        logger.notice(`Log file: ${config.logFile}`);
        logger.notice(`Lines   : ${config.tailLines}`);
    }

    async readLines(): Promise<string[]> {
        const started = Date.now();
        const lines = await tailLines(this.config.logFile, this.config.tailLines);
        logger.debug(`Read ${lines.length} lines in ${Date.now() - started} ms`);
        return lines;
    }
}
