export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  setNumber?: string;
  url?: string;
  depth?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_fetched"
  | "inventories_ok"
  | "inventories_failed"
  | "minifigures_enriched"
  | "subinventories_resolved"
  | "cache_memory_hits"
  | "cache_disk_hits"
  | "cache_shared_waits"
  | "cache_network_fetches"
  | "cache_fetch_failed"
  | "colors_refreshed";

export type MetricTimerName = "page_fetch_ms" | "extract_ms" | "cache_fetch_ms";
