import { AppConfig } from "../config";
import { InMemoryStore } from "./memoryStore";
import { SqliteStore } from "./sqliteStore";
import { InventoryStore } from "./types";

export function createStore(config: AppConfig): InventoryStore {
  if (config.storeMode === "memory") {
    return new InMemoryStore();
  }
  return new SqliteStore(config.storePath);
}

export { InMemoryStore } from "./memoryStore";
export { SqliteStore } from "./sqliteStore";
export * from "./types";
