import { FastifyInstance } from "fastify";
import { Logger } from "../common/logger";
import { RedirectRule } from "../shared/type/redirect.type";

const logger = new Logger("RedirectController");

const PLACEHOLDER_RE = /\{([A-Za-z0-9_]+)\}/g;

/**
 * Fills {name} placeholders from the named route params and {0}, {1}, …
 * from the same values in route order. Unknown placeholders are kept.
 */
export function formatTarget(
    template: string,
    params: Record<string, string>,
    order: string[]
): string {
    return template.replace(PLACEHOLDER_RE, (whole, key: string) => {
        const byName = params[key];
        if (byName !== undefined) return byName;
        const index = Number(key);
        const name = Number.isInteger(index) ? order[index] : undefined;
        const byPosition = name === undefined ? undefined : params[name];
        return byPosition ?? whole;
    });
}

/** Names of the :params in a route path, in order. */
export function routeParams(path: string): string[] {
    return path
        .split("/")
        .filter((segment) => segment.startsWith(":"))
        .map((segment) => segment.slice(1));
}

type RedirectParams = { Params: Record<string, string> };

export class RedirectController {
    constructor(private readonly rules: RedirectRule[]) {
        logger.notice(`RedirectController init (${rules.length} rules)`);
    }

    register(fastify: FastifyInstance): void {
        for (const rule of this.rules) {
            const order = routeParams(rule.from);
            fastify.get<RedirectParams>(rule.from, async (req, res) => {
                const target = formatTarget(rule.to, req.params, order);
                return res.code(301).redirect(target);
            });
        }
    }
}
