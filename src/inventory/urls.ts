function inventoryUrl(baseUrl: string, itemType: "S" | "M" | "P", itemNumber: string): string {
  const url = new URL("/catalogItemInv.asp", baseUrl);
  url.searchParams.set(itemType, itemNumber);
  url.searchParams.set("viewType", "R");
  return url.toString();
}

export function setInventoryUrl(baseUrl: string, setNumber: string): string {
  return inventoryUrl(baseUrl, "S", setNumber);
}

export function minifigureInventoryUrl(baseUrl: string, identifier: string): string {
  return inventoryUrl(baseUrl, "M", identifier);
}
