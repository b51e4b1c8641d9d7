export interface CacheStore {
  available(): boolean;
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttlSeconds: number): Promise<void>;
  shutdown(): void;
}
