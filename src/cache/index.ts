export { cacheKey, DiskTier } from "./diskTier";
export { FetchCache, type FetchCacheStats } from "./fetchCache";
export { LruMap } from "./lruMap";
