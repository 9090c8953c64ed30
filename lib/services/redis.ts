import Redis from "ioredis";
import { createLogger } from "@/lib/utils/debugLog";

const log = createLogger("Redis");

export function createRedis(redisUrl: string): Redis {
  log.info("Connecting to:", redisUrl);
  const redis = new Redis(redisUrl, { lazyConnect: true, maxRetriesPerRequest: 3 });

  redis.on("error", (err: Error) => {
    // No explota, solo advierte
    log.warn("Connection error:", err.message);
  });
  return redis;
}
