import { Redis } from "ioredis";
import type { Logger } from "./logger.js";

// Lock keys carry a TTL, so no persistence is needed for correctness.
export function createRedis(url: string, logger: Logger): Redis {
    const redis = new Redis(url, { maxRetriesPerRequest: 3 });
    redis.on("error", (err) => logger.error({ err }, "Redis error"));
    return redis;
}
