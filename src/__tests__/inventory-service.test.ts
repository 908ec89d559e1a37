import { describe, it, expect } from "vitest";
import { HttpStatusError } from "../core/errors";
import { InventoryService } from "../inventory";
import { MetricsRegistry } from "../observability";
import { AppConfig } from "../config";
import { FakeSource, silentLogger, testConfig } from "./helpers/context";
import { readFixtureBuffer } from "./helpers/fixtures";

const SET_URL = "https://www.bricklink.com/catalogItemInv.asp?S=6000-1&viewType=R";
const MINIFIG_URL = "https://www.bricklink.com/catalogItemInv.asp?M=cty0001";
const MULTIPACK_URL = "https://www.bricklink.com/catalogItemInv.asp?P=66645b";

const LOOPING_MULTIPACK = `
<table>
  <tr><th>Image</th><th>Qty</th></tr>
  <tr>
    <td><img src="//img.bricklink.com/ItemImage/PN/0/9999.png" alt="Part No: 9999 Name: Loop Pack"></td>
    <td>1</td>
    <td><a href="/v2/catalog/catalogitem.page?P=9999&amp;idColor=0">9999</a> <a href="/catalogItemInv.asp?P=66645b">(Inv)</a></td>
    <td><b>Loop Pack</b></td>
  </tr>
</table>`;

function fixturePages(): Record<string, string | Buffer> {
  return {
    [SET_URL]: readFixtureBuffer("set-inventory.html"),
    [MINIFIG_URL]: readFixtureBuffer("minifig-inventory.html"),
    [MULTIPACK_URL]: readFixtureBuffer("multipack-inventory.html"),
  };
}

function createService(source: FakeSource, overrides: Partial<AppConfig> = {}) {
  const metrics = new MetricsRegistry();
  const service = new InventoryService({
    config: testConfig(overrides),
    logger: silentLogger(),
    metrics,
    source,
  });
  return { service, metrics };
}

describe("InventoryService", () => {
  it("fetches a set and resolves nested minifigure and multipack inventories", async () => {
    const source = new FakeSource(fixturePages());
    const { service, metrics } = createService(source);

    const inventory = await service.fetchInventory("6000");

    expect(source.requests[0]).toBe(SET_URL);
    expect([...source.requests].sort()).toEqual([MINIFIG_URL, MULTIPACK_URL, SET_URL].sort());
    expect(inventory.setNumber).toBe("6000-1");
    expect(inventory.name).toBe("Harbor Patrol");
    expect(inventory.parts.map((part) => part.id)).toEqual(["3001", "66645b", "3020"]);
    expect(inventory.parts[1].subparts).toEqual([
      {
        id: "3003",
        canonicalUrl: "https://www.bricklink.com/v2/catalog/catalogitem.page?P=3003&idColor=1",
        name: "Brick 2 x 2",
        colorName: "White",
        colorId: "1",
        imageUrl: "https://img.bricklink.com/ItemImage/PN/1/3003.png",
        quantity: 6,
        section: "regular",
        inventoryUrl: undefined,
        subparts: [],
      },
    ]);
    expect(inventory.parts[0].subparts).toEqual([]);
    expect(inventory.minifigures).toHaveLength(1);
    expect(inventory.minifigures[0].parts.map((part) => [part.id, part.colorName, part.quantity])).toEqual([
      ["3626", "Yellow", 1],
      ["973", "Black", 1],
    ]);
    expect(metrics.getCounter("pages_fetched")).toBe(3);
    expect(metrics.getCounter("minifigures_enriched")).toBe(1);
    expect(metrics.getCounter("subinventories_resolved")).toBe(1);
  });

  it("leaves stubs unresolved when nesting is disabled", async () => {
    const source = new FakeSource(fixturePages());
    const { service, metrics } = createService(source, { maxNestingDepth: 0 });

    const inventory = await service.fetchInventory("6000-1");

    expect(source.requests).toEqual([SET_URL]);
    expect(inventory.minifigures[0].parts).toEqual([]);
    expect(inventory.parts[1].subparts).toEqual([]);
    expect(metrics.getCounter("pages_fetched")).toBe(1);
  });

  it("does not revisit an inventory already on the current path", async () => {
    const pages = { ...fixturePages(), [MULTIPACK_URL]: LOOPING_MULTIPACK };
    const source = new FakeSource(pages);
    const { service } = createService(source, { maxNestingDepth: 5 });

    const inventory = await service.fetchInventory("6000-1");
    const [loop] = inventory.parts[1].subparts;

    expect(loop.id).toBe("9999");
    expect(loop.inventoryUrl).toBe(MULTIPACK_URL);
    expect(loop.subparts).toEqual([]);
    expect(source.requests.filter((url) => url === MULTIPACK_URL)).toHaveLength(1);
  });

  it("fails the whole set when a nested inventory cannot be fetched", async () => {
    const pages = fixturePages();
    delete pages[MINIFIG_URL];
    const { service } = createService(new FakeSource(pages));

    await expect(service.fetchInventory("6000-1")).rejects.toBeInstanceOf(HttpStatusError);
  });

  it("keeps minifigure order regardless of completion order", async () => {
    const { service } = createService(new FakeSource(fixturePages()), { enrichConcurrency: 1 });
    const stubs = ["a", "b", "c"].map((identifier) => ({
      identifier,
      name: identifier,
      quantity: 1,
      inventoryUrl: identifier === "b" ? MINIFIG_URL : MULTIPACK_URL,
      categories: [],
      parts: [],
    }));

    const resolved = await service.enrichMinifigures(stubs);

    expect(resolved.map((minifigure) => [minifigure.identifier, minifigure.parts.map((part) => part.id)])).toEqual([
      ["a", ["3003"]],
      ["b", ["3626", "973"]],
      ["c", ["3003"]],
    ]);
  });
});
