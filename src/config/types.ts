import { LogLevel } from "../observability/types";

export interface CacheDirs {
  thumbnails: string;
  pages: string;
}

export interface AppConfig {
  baseUrl: string;
  colorGuideBaseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  thumbnailTimeoutMs: number;
  maxConcurrentDownloads: number;
  memoryCacheLimit: number;
  enrichConcurrency: number;
  maxNestingDepth: number;
  logLevel: LogLevel | "silent";
  storeMode: "sqlite" | "memory";
  storePath: string;
  cachePages: boolean;
  cacheDirs: CacheDirs;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "cacheDirs">> & {
  cacheDirs?: Partial<CacheDirs>;
};
