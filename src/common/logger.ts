/**
 * pino root logger with a notice level, one child per context
 * @license MIT
 */
import pino from "pino";

declare module "fastify" {
    interface FastifyBaseLogger {
        notice: pino.LogFn;
    }
}

const isTest = process.env.NODE_ENV === "test";

export class Logger {
    static readonly config = {
        customLevels: { notice: 35 },
        base: { context: "App" },
        level: process.env.LOG_LEVEL || (isTest ? "silent" : "notice"),
        // plain JSON under jest: no transport worker left running
        transport: isTest
            ? undefined
            : {
                  target: "pino-pretty",
                  options: {
                      customLevels:
                          "trace:10,debug:20,info:30,notice:35,warn:40,error:50,fatal:60",
                      colorize: [undefined, "local", "docker"].includes(
                          process.env.APP_ENV
                      ),
                      singleLine: true,
                      levelFirst: false,
                      translateTime: "yyyy-mm-dd'T'HH:MM:ss.l'Z'",
                      messageFormat: "[{context}] {msg}",
                      ignore: "pid,hostname,context,req,res,responseTime,reqId",
                      errorLikeObjectKeys: ["err", "error"]
                  }
              }
    };

    private static readonly root: pino.Logger<"notice"> = pino(Logger.config);

    readonly notice: pino.LogFn;
    readonly error: pino.LogFn;
    readonly warn: pino.LogFn;
    readonly info: pino.LogFn;
    readonly debug: pino.LogFn;

    constructor(context: string) {
        const child = Logger.root.child({ context });
        this.notice = child.notice.bind(child);
        this.error = child.error.bind(child);
        this.warn = child.warn.bind(child);
        this.info = child.info.bind(child);
        this.debug = child.debug.bind(child);
    }
}
