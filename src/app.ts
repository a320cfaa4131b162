import { APP_VERSION as version, AppConfig, loadConfig } from "./common/config";
import { Logger } from "./common/logger";
import { handleSignals, setFastifyInstance, shutdown } from "./common/shutdown";
import { buildApp } from "./server";

const logger = new Logger("App");

async function main(): Promise<void> {
    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (err) {
        logger.error({ err }, "Invalid configuration");
        return shutdown(1);
    }

    logger.notice(`Site     : ${config.siteUrl}`);
    logger.notice(`Docs     : ${config.docsRoot} at ${config.docsPrefix}`);
    logger.notice(
        `Pages    : ${config.pagePattern} ignore ${config.ignorePattern ?? "nothing"} (${config.ignoreScope})`
    );

    const fastify = await buildApp(config);
    setFastifyInstance(fastify);
    handleSignals();

    const addr = await fastify.listen({ port: config.port, host: config.host });
    fastify.log.notice(`Server listening at ${addr}. Version ${version}`);
}

main().catch((err) => {
    logger.error({ err }, "Startup failed");
    return shutdown(1);
});
