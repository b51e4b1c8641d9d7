import { CacheStore } from "./types";
import { MemoryStore } from "./memoryStore";
import { ValkeyStore } from "./valkeyStore";
import { logger } from "../logger";

export type { CacheStore } from "./types";

let store: CacheStore | null = null;

function createStore(): CacheStore {
  if (process.env.VALKEY_HOST) {
    logger.info({ host: process.env.VALKEY_HOST }, "Using Valkey cache");
    return new ValkeyStore();
  }
  logger.info("Using in-memory cache");
  return new MemoryStore();
}

function activeStore(): CacheStore {
  if (!store) {
    store = createStore();
  }
  return store;
}

// -------------------------
// Helpers
// -------------------------
export function useCacheStore(next: CacheStore) {
  store = next;
}

export function cacheAvailable() {
  return activeStore().available();
}

export async function cacheGet<T>(key: string): Promise<T | null> {
  return activeStore().get<T>(key);
}

export async function cacheSet<T>(key: string, value: T, ttlSeconds: number) {
  await activeStore().set(key, value, ttlSeconds);
}

export function shutdownCache() {
  if (!store) return;
  store.shutdown();
  store = null;
}
