import { CacheStore } from './types';

type Entry = {
  value: unknown;
  expiresAt: number;
};

/**
 * In-process TTL map. Entries are dropped lazily when a read finds them
 * expired; nothing sweeps in the background and there is no size bound.
 */
export class MemoryStore implements CacheStore {
  private readonly entries = new Map<string, Entry>();

  available(): boolean {
    return true;
  }

  async get<T>(key: string): Promise<T | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }

    return entry.value as T;
  }

  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    this.entries.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  size(): number {
    return this.entries.size;
  }

  shutdown(): void {
    this.entries.clear();
  }
}
