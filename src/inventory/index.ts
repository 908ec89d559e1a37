export { aggregateInventory, aggregateParts, normalizeSetNumber } from "./aggregate";
export { resolveInOrder, type ResolveOptions } from "./enrichment";
export { extractInventory, extractParts, parseMinifigureRow, parsePartRow } from "./extractor";
export { parseBreadcrumb, parseSetMetadata } from "./metadata";
export { InventoryService } from "./service";
export { minifigureInventoryUrl, setInventoryUrl } from "./urls";
