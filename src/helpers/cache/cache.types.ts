export type CacheValue = object;

export type TtlCache<T extends CacheValue> = {
  func: (key: string, ttl: number) => Promise<T | null>;
  key: string;
  ttl?: number;
};
