import fs from "fs";
import IORedis, { RedisOptions } from "ioredis";
import { CacheStore } from "./types";
import { logger } from "../logger";

function getValkeyPassword() {
  if (process.env.VALKEY_PASSWORD) {
    return process.env.VALKEY_PASSWORD;
  }

  if (process.env.VALKEY_PASSWORD_FILE) {
    try {
      return fs.readFileSync(process.env.VALKEY_PASSWORD_FILE, "utf8").trim();
    } catch (err) {
      logger.warn({ err }, "Failed to read Valkey password from secret file");
    }
  }
  return undefined;
}

export class ValkeyStore implements CacheStore {
  private readonly redis: IORedis;
  private isCacheAvailable = false;
  private isShuttingDown = false;

  constructor(opts: RedisOptions = {}) {
    this.redis = new IORedis({
      host: process.env.VALKEY_HOST || "127.0.0.1",
      port: Number(process.env.VALKEY_PORT) || 6379,
      password: getValkeyPassword(),
      retryStrategy: () => (this.isShuttingDown ? null : 5000),
      maxRetriesPerRequest: null,
      enableReadyCheck: true,
      lazyConnect: false,
      ...opts,
    });

    // -------------------------
    // Connection state tracking
    // -------------------------
    this.redis.on("connect", () => {
      if (!this.isCacheAvailable) {
        this.isCacheAvailable = true;
        logger.info("Valkey connected");
      }
    });

    this.redis.on("error", (err: Error) => {
      if (this.isCacheAvailable) {
        this.isCacheAvailable = false;
        logger.warn({ err: err.message }, "Valkey unavailable, running without cache");
      }
    });

    this.redis.on("close", () => {
      if (this.isCacheAvailable) {
        this.isCacheAvailable = false;
        logger.warn("Valkey connection closed");
      }
    });
  }

  available(): boolean {
    return this.isCacheAvailable;
  }

  async get<T>(key: string): Promise<T | null> {
    if (!this.isCacheAvailable) return null;

    try {
      const raw = await this.redis.get(key);
      return raw ? (JSON.parse(raw) as T) : null;
    } catch (err) {
      logger.warn({ err, key }, "Error while reading cache");
      return null;
    }
  }

  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    if (!this.isCacheAvailable) return;

    try {
      await this.redis.set(key, JSON.stringify(value), "EX", ttlSeconds);
    } catch (err) {
      logger.error({ err, key }, "Error while setting cache");
    }
  }

  shutdown(): void {
    this.isShuttingDown = true;
    this.redis.disconnect(); // force close (no await)
  }
}
