import { ColorGuideEntry, Inventory, InventorySummary, StoredInventory } from "../types";

export interface StoreStats {
  inventories: number;
  colors: number;
  lastFetchedAt?: string;
}

export interface ColorReplaceSummary {
  inserted: number;
  updated: number;
  removed: number;
}

export interface InventoryStore {
  saveInventory(inventory: Inventory, fetchedAt: string): Promise<void>;
  getInventory(setNumber: string): Promise<StoredInventory | undefined>;
  listInventories(limit: number): Promise<InventorySummary[]>;
  /** Upserts every entry and deletes stored colors missing from `entries`. */
  replaceColors(entries: readonly ColorGuideEntry[]): Promise<ColorReplaceSummary>;
  listColors(): Promise<ColorGuideEntry[]>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
