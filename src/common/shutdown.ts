import type { FastifyInstance } from "fastify";
import { Logger } from "./logger";

const logger = new Logger("Shutdown");

let instance: FastifyInstance | null = null;
let closing = false;

export function setFastifyInstance(fastify: FastifyInstance): void {
    instance = fastify;
}

export async function shutdown(code: number): Promise<never> {
    if (!closing) {
        closing = true;
        logger.notice("Shutting down...");
        if (instance) {
            await instance
                .close()
                .catch((err) => logger.error({ err }, "Error closing Fastify"));
        }
    }
    process.exit(code);
}

export function handleSignals(): void {
    for (const signal of ["SIGTERM", "SIGINT"] as const) {
        process.once(signal, () => {
            logger.notice(`Received ${signal}`);
            void shutdown(0);
        });
    }
}
