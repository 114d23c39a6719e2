import { Redis, type RedisOptions } from "ioredis";
import { log } from "../logger.js";
import type { KeyValueStore } from "./key-value-store.js";

/**
 * INCR and EXPIRE in one round trip. A counter found without a TTL (left
 * behind by an interrupted write) is given one, so no window outlives its
 * length.
 */
export const INCREMENT_WITH_EXPIRY_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count == 1 or redis.call('TTL', KEYS[1]) == -1 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return count
`;

export interface RedisStoreOptions {
  host: string;
  port: number;
  db: number;
  username?: string;
  password?: string;
}

/**
 * KeyValueStore backed by Redis.
 *
 * The offline queue is disabled: while Redis is unreachable commands reject
 * immediately instead of piling up behind a reconnect, so callers can apply
 * their own failure policy (fail open for rate limiting, surface for status).
 */
export class RedisKeyValueStore implements KeyValueStore {
  private redis: Redis;

  constructor(redisOrOptions: Redis | RedisStoreOptions) {
    if (redisOrOptions instanceof Redis) {
      // Caller owns the client's options and event handlers
      this.redis = redisOrOptions;
      return;
    }

    const options: RedisOptions = {
      host: redisOrOptions.host,
      port: redisOrOptions.port,
      db: redisOrOptions.db,
      username: redisOrOptions.username,
      password: redisOrOptions.password,
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      enableReadyCheck: true,
      keepAlive: 30000,
      retryStrategy: (times) => Math.min(times * 200, 5000),
      reconnectOnError: (err) => err.message.includes("READONLY"),
    };

    this.redis = new Redis(options);

    this.redis.on("connect", () => {
      log.store.info({ host: redisOrOptions.host, port: redisOrOptions.port }, "Redis connected");
    });

    this.redis.on("error", (error: Error) => {
      log.store.error({ error: error.message }, "Redis connection error");
    });

    this.redis.on("close", () => {
      log.store.warn({}, "Redis disconnected");
    });
  }

  /**
   * Open the connection and verify it with a PING.
   */
  async connect(): Promise<void> {
    if (this.redis.status === "wait") {
      await this.redis.connect();
    }
    await this.redis.ping();
    log.store.info({}, "Redis connection verified");
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, "EX", ttlSeconds);
  }

  async incrementWithExpiry(key: string, windowSeconds: number): Promise<number> {
    const count = await this.redis.eval(INCREMENT_WITH_EXPIRY_SCRIPT, 1, key, String(windowSeconds));

    if (typeof count !== "number") {
      throw new Error(`Unexpected reply to counter increment for ${key}: ${String(count)}`);
    }
    return count;
  }

  async ttl(key: string): Promise<number> {
    return this.redis.ttl(key);
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.redis.del(key);
    return removed > 0;
  }

  async scanKeys(pattern: string): Promise<string[]> {
    const found = new Set<string>();
    let cursor = "0";

    do {
      const [nextCursor, batch] = await this.redis.scan(cursor, "MATCH", pattern, "COUNT", 100);
      cursor = nextCursor;
      for (const key of batch) {
        found.add(key);
      }
    } while (cursor !== "0");

    return [...found];
  }

  /**
   * Health check for the Redis connection
   */
  async ping(): Promise<boolean> {
    try {
      const result = await this.redis.ping();
      return result === "PONG";
    } catch (error) {
      log.store.warn({ error: error instanceof Error ? error.message : String(error) }, "Redis health check failed");
      return false;
    }
  }

  /**
   * Graceful shutdown
   */
  async close(): Promise<void> {
    log.store.info({}, "Closing Redis connection");
    if (this.redis.status === "wait" || this.redis.status === "end") {
      this.redis.disconnect();
      return;
    }
    await this.redis.quit();
  }
}
