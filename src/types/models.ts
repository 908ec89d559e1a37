export type PartSection = "regular" | "counterpart" | "extra" | "alternate";

export interface Category {
  readonly id?: string;
  readonly name: string;
}

export interface Part {
  readonly id: string;
  readonly canonicalUrl?: string;
  readonly name: string;
  readonly colorName: string;
  readonly colorId: string;
  readonly imageUrl?: string;
  readonly quantity: number;
  readonly section: PartSection;
  /** Sub-inventory link of a multipack row (`catalogItemInv.asp?P=`). */
  readonly inventoryUrl?: string;
  readonly subparts: readonly Part[];
}

export interface Minifigure {
  readonly identifier: string;
  readonly name: string;
  readonly quantity: number;
  readonly imageUrl?: string;
  readonly catalogUrl?: string;
  readonly inventoryUrl?: string;
  readonly categories: readonly Category[];
  readonly parts: readonly Part[];
}

export interface Inventory {
  readonly setNumber: string;
  readonly name: string;
  readonly thumbnailUrl?: string;
  readonly parts: readonly Part[];
  readonly categories: readonly Category[];
  readonly minifigures: readonly Minifigure[];
}

export interface ColorGuideEntry {
  readonly brickLinkColorId: number;
  readonly brickLinkName: string;
  readonly legoColorName?: string;
  readonly legoColorId?: number;
  readonly hexColor?: string;
}

export interface StoredInventory {
  readonly inventory: Inventory;
  readonly fetchedAt: string;
}

export interface InventorySummary {
  readonly setNumber: string;
  readonly name: string;
  readonly partCount: number;
  readonly minifigureCount: number;
  readonly fetchedAt: string;
}
