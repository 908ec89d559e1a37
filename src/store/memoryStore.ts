import { ColorGuideEntry, Inventory, InventorySummary, StoredInventory } from "../types";
import { ColorReplaceSummary, InventoryStore, StoreStats } from "./types";

function summarize(stored: StoredInventory): InventorySummary {
  return {
    setNumber: stored.inventory.setNumber,
    name: stored.inventory.name,
    partCount: stored.inventory.parts.length,
    minifigureCount: stored.inventory.minifigures.length,
    fetchedAt: stored.fetchedAt,
  };
}

export class InMemoryStore implements InventoryStore {
  private readonly inventories = new Map<string, StoredInventory>();
  private readonly colors = new Map<number, ColorGuideEntry>();

  async saveInventory(inventory: Inventory, fetchedAt: string): Promise<void> {
    this.inventories.set(inventory.setNumber, { inventory, fetchedAt });
  }

  async getInventory(setNumber: string): Promise<StoredInventory | undefined> {
    return this.inventories.get(setNumber);
  }

  async listInventories(limit: number): Promise<InventorySummary[]> {
    return [...this.inventories.values()]
      .sort((left, right) => (left.fetchedAt < right.fetchedAt ? 1 : left.fetchedAt > right.fetchedAt ? -1 : 0))
      .slice(0, limit)
      .map(summarize);
  }

  async replaceColors(entries: readonly ColorGuideEntry[]): Promise<ColorReplaceSummary> {
    const incoming = new Set(entries.map((entry) => entry.brickLinkColorId));
    let removed = 0;
    for (const id of [...this.colors.keys()]) {
      if (!incoming.has(id)) {
        this.colors.delete(id);
        removed += 1;
      }
    }

    let inserted = 0;
    let updated = 0;
    for (const entry of entries) {
      if (this.colors.has(entry.brickLinkColorId)) {
        updated += 1;
      } else {
        inserted += 1;
      }
      this.colors.set(entry.brickLinkColorId, entry);
    }
    return { inserted, updated, removed };
  }

  async listColors(): Promise<ColorGuideEntry[]> {
    return [...this.colors.values()].sort((left, right) => left.brickLinkColorId - right.brickLinkColorId);
  }

  async getStats(): Promise<StoreStats> {
    const [latest] = await this.listInventories(1);
    return {
      inventories: this.inventories.size,
      colors: this.colors.size,
      lastFetchedAt: latest?.fetchedAt,
    };
  }

  async close(): Promise<void> {
    return;
  }
}
