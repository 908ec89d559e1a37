import { Inventory, Part, PartSection } from "../types";

const SECTION_ORDER: Record<PartSection, number> = {
  regular: 0,
  counterpart: 1,
  extra: 2,
  alternate: 3,
};

/** Appends the `-1` variant suffix BrickLink expects when none is given. */
export function normalizeSetNumber(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === "" || trimmed.includes("-")) {
    return trimmed;
  }
  return `${trimmed}-1`;
}

function compareText(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

function compareParts(left: Part, right: Part): number {
  return (
    SECTION_ORDER[left.section] - SECTION_ORDER[right.section] ||
    compareText(left.colorName, right.colorName) ||
    compareText(left.name, right.name) ||
    compareText(left.id, right.id)
  );
}

/**
 * Merges parts sharing id, color and section. Quantities are summed; every
 * other field comes from the first part of the group.
 */
export function aggregateParts(parts: readonly Part[]): Part[] {
  const groups = new Map<string, Part>();
  for (const part of parts) {
    const key = JSON.stringify([part.id, part.colorId, part.section]);
    const existing = groups.get(key);
    groups.set(key, existing ? { ...existing, quantity: existing.quantity + part.quantity } : part);
  }
  return [...groups.values()].sort(compareParts);
}

export function aggregateInventory(inventory: Inventory): Inventory {
  return {
    ...inventory,
    parts: aggregateParts(inventory.parts),
    minifigures: inventory.minifigures.map((minifigure) => ({
      ...minifigure,
      parts: aggregateParts(minifigure.parts),
    })),
  };
}
