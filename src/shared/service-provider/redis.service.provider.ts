/**
 * Redis backed reverse-DNS cache
 * @license MIT
 */
import { createClient } from "redis";
import { AppConfig } from "../../common/config";
import { Logger } from "../../common/logger";
import { DnsCacheStore, OpenDnsCacheStore } from "../type/dns-cache.type";

const logger = new Logger("RedisServiceProvider");

const CONNECT_TIMEOUT_MS = 1000;

/**
 * One short-lived connection per cache operation. Keys are
 * {prefix}{address} → hostname, never expired.
 */
export class RedisDnsCacheStore implements DnsCacheStore {
    private constructor(
        private readonly redis: ReturnType<typeof createClient>,
        private readonly prefix: string
    ) {}

    static async open(url: string, prefix: string): Promise<RedisDnsCacheStore> {
        const redis = createClient({
            url,
            socket: {
                connectTimeout: CONNECT_TIMEOUT_MS,
                reconnectStrategy: false
            }
        });
        redis.on("error", (err: Error) => {
            logger.debug(`Redis error: ${err.message}`);
        });
        await redis.connect();
        return new RedisDnsCacheStore(redis, prefix);
    }

    async has(address: string): Promise<boolean> {
        return (await this.redis.exists(this.prefix + address)) === 1;
    }

    async get(address: string): Promise<string | null> {
        return this.redis.get(this.prefix + address);
    }

    async set(address: string, hostname: string): Promise<void> {
        await this.redis.set(this.prefix + address, hostname);
    }

    async close(): Promise<void> {
        if (this.redis.isOpen) await this.redis.quit();
    }
}

export function redisDnsCache(config: AppConfig): OpenDnsCacheStore {
    logger.notice(`Redis    : ${config.redisUrl}`);
    return () => RedisDnsCacheStore.open(config.redisUrl, config.dnsCachePrefix);
}
