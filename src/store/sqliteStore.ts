import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { ColorGuideEntry, Inventory, InventorySummary, StoredInventory } from "../types";
import { ColorReplaceSummary, InventoryStore, StoreStats } from "./types";

type InventoryRow = {
  setNumber: string;
  name: string;
  partCount: number;
  minifigureCount: number;
  payload: string;
  fetchedAt: string;
};

type ColorRow = {
  brickLinkColorId: number;
  brickLinkName: string;
  legoColorName: string | null;
  legoColorId: number | null;
  hexColor: string | null;
};

const IN_MEMORY_PATH = ":memory:";

export class SqliteStore implements InventoryStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === IN_MEMORY_PATH) {
      this.db = new Database(IN_MEMORY_PATH);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async saveInventory(inventory: Inventory, fetchedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO inventories (setNumber, name, partCount, minifigureCount, payload, fetchedAt)
        VALUES (@setNumber, @name, @partCount, @minifigureCount, @payload, @fetchedAt)
        ON CONFLICT(setNumber) DO UPDATE SET
          name = excluded.name,
          partCount = excluded.partCount,
          minifigureCount = excluded.minifigureCount,
          payload = excluded.payload,
          fetchedAt = excluded.fetchedAt
      `,
      )
      .run({
        setNumber: inventory.setNumber,
        name: inventory.name,
        partCount: inventory.parts.length,
        minifigureCount: inventory.minifigures.length,
        payload: JSON.stringify(inventory),
        fetchedAt,
      });
  }

  async getInventory(setNumber: string): Promise<StoredInventory | undefined> {
    const row = this.db
      .prepare(
        `
        SELECT setNumber, name, partCount, minifigureCount, payload, fetchedAt
        FROM inventories
        WHERE setNumber = ?
      `,
      )
      .get(setNumber) as InventoryRow | undefined;

    if (!row) {
      return undefined;
    }

    return {
      inventory: JSON.parse(row.payload) as Inventory,
      fetchedAt: row.fetchedAt,
    };
  }

  async listInventories(limit: number): Promise<InventorySummary[]> {
    const rows = this.db
      .prepare(
        `
        SELECT setNumber, name, partCount, minifigureCount, fetchedAt
        FROM inventories
        ORDER BY fetchedAt DESC, setNumber ASC
        LIMIT ?
      `,
      )
      .all(limit) as Array<Omit<InventoryRow, "payload">>;

    return rows.map((row) => ({
      setNumber: row.setNumber,
      name: row.name,
      partCount: row.partCount,
      minifigureCount: row.minifigureCount,
      fetchedAt: row.fetchedAt,
    }));
  }

  async replaceColors(entries: readonly ColorGuideEntry[]): Promise<ColorReplaceSummary> {
    const existing = new Set(
      (this.db.prepare(`SELECT brickLinkColorId FROM colors`).all() as Array<Pick<ColorRow, "brickLinkColorId">>).map(
        (row) => row.brickLinkColorId,
      ),
    );
    const incoming = new Set(entries.map((entry) => entry.brickLinkColorId));
    const now = new Date().toISOString();

    const upsert = this.db.prepare(
      `
      INSERT INTO colors (brickLinkColorId, brickLinkName, legoColorName, legoColorId, hexColor, updatedAt)
      VALUES (@brickLinkColorId, @brickLinkName, @legoColorName, @legoColorId, @hexColor, @updatedAt)
      ON CONFLICT(brickLinkColorId) DO UPDATE SET
        brickLinkName = excluded.brickLinkName,
        legoColorName = excluded.legoColorName,
        legoColorId = excluded.legoColorId,
        hexColor = excluded.hexColor,
        updatedAt = excluded.updatedAt
    `,
    );
    const remove = this.db.prepare(`DELETE FROM colors WHERE brickLinkColorId = ?`);

    const summary: ColorReplaceSummary = { inserted: 0, updated: 0, removed: 0 };
    const tx = this.db.transaction(() => {
      for (const id of existing) {
        if (!incoming.has(id)) {
          remove.run(id);
          summary.removed += 1;
        }
      }
      for (const entry of entries) {
        upsert.run({
          brickLinkColorId: entry.brickLinkColorId,
          brickLinkName: entry.brickLinkName,
          legoColorName: entry.legoColorName ?? null,
          legoColorId: entry.legoColorId ?? null,
          hexColor: entry.hexColor ?? null,
          updatedAt: now,
        });
        if (existing.has(entry.brickLinkColorId)) {
          summary.updated += 1;
        } else {
          summary.inserted += 1;
        }
      }
    });
    tx();

    return summary;
  }

  async listColors(): Promise<ColorGuideEntry[]> {
    const rows = this.db
      .prepare(
        `
        SELECT brickLinkColorId, brickLinkName, legoColorName, legoColorId, hexColor
        FROM colors
        ORDER BY brickLinkColorId ASC
      `,
      )
      .all() as ColorRow[];

    return rows.map((row) => ({
      brickLinkColorId: row.brickLinkColorId,
      brickLinkName: row.brickLinkName,
      legoColorName: row.legoColorName ?? undefined,
      legoColorId: row.legoColorId ?? undefined,
      hexColor: row.hexColor ?? undefined,
    }));
  }

  async getStats(): Promise<StoreStats> {
    const inventories = this.count("inventories");
    const colors = this.count("colors");
    const latest = this.db.prepare(`SELECT MAX(fetchedAt) as fetchedAt FROM inventories`).get() as {
      fetchedAt: string | null;
    };

    return {
      inventories,
      colors,
      lastFetchedAt: latest.fetchedAt ?? undefined,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private count(tableName: "inventories" | "colors"): number {
    const row = this.db.prepare(`SELECT COUNT(*) as count FROM ${tableName}`).get() as { count: number };
    return row.count;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS inventories (
        setNumber TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        partCount INTEGER NOT NULL,
        minifigureCount INTEGER NOT NULL,
        payload TEXT NOT NULL,
        fetchedAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS colors (
        brickLinkColorId INTEGER PRIMARY KEY,
        brickLinkName TEXT NOT NULL,
        legoColorName TEXT NULL,
        legoColorId INTEGER NULL,
        hexColor TEXT NULL,
        updatedAt TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_inventories_fetched_at ON inventories(fetchedAt);
    `);
  }
}
