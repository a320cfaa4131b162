import fastifyStatic from "@fastify/static";
import fastifyView from "@fastify/view";
import Fastify, { FastifyInstance } from "fastify";
import { readFileSync } from "fs";
import Handlebars from "handlebars";
import { join } from "path";
import { AppConfig } from "./common/config";
import { LogSourceError } from "./common/errors";
import { Logger } from "./common/logger";
import { RedirectController } from "./controller/redirect.controller";
import { LogTailJob } from "./job/log-tail.job";
import { ReportRender } from "./render/report.render";
import {
    DnsServiceProvider,
    systemReverseLookup
} from "./shared/service-provider/dns.service.provider";
import { OverviewServiceProvider } from "./shared/service-provider/overview.service.provider";
import { redisDnsCache } from "./shared/service-provider/redis.service.provider";
import { OpenDnsCacheStore, ReverseLookup } from "./shared/type/dns-cache.type";

const logger = new Logger("Server");

export type AppDependencies = {
    openDnsCache?: OpenDnsCacheStore;
    reverseLookup?: ReverseLookup;
    clock?: () => Date;
};

export async function buildApp(
    config: AppConfig,
    deps: AppDependencies = {}
): Promise<FastifyInstance> {
    const fastify = Fastify({ logger: Logger.config });

    fastify.setErrorHandler((err, _req, res) => {
        if (err instanceof LogSourceError) {
            logger.error({ err }, `Log source unreadable: ${err.path}`);
            return res
                .status(503)
                .send({ error: "Log source unavailable", message: err.message });
        }
        logger.error({ err }, "Request failed");
        return res
            .status(err.statusCode ?? 500)
            .send({ error: err.name, message: err.message });
    });

    // report stylesheet
    await fastify.register(fastifyStatic, {
        root: config.assetsRoot,
        prefix: "/assets/"
    });

    // the documentation tree
    await fastify.register(fastifyStatic, {
        root: config.docsRoot,
        prefix: config.docsPrefix,
        decorateReply: false
    });

    Handlebars.registerPartial(
        "summary",
        readFileSync(join(config.viewsRoot, "partials", "summary.hbs"), "utf8")
    );
    await fastify.register(fastifyView, {
        engine: { handlebars: Handlebars },
        root: config.viewsRoot
    });

    const dns = new DnsServiceProvider(
        config,
        deps.openDnsCache ?? redisDnsCache(config),
        deps.reverseLookup ?? systemReverseLookup
    );
    const overview = new OverviewServiceProvider(config);
    new ReportRender(
        config,
        new LogTailJob(config),
        overview,
        dns,
        deps.clock
    ).register(fastify);
    new RedirectController(config.redirects).register(fastify);

    return fastify;
}
