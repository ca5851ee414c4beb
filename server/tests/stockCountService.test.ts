import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { seedLocations, seedProductCategories } from "../src/data/seed.js";
import { StockCountService } from "../src/services/stockCountService.js";
import { createSeededStore, StockCountStore } from "../src/store/StockCountStore.js";
import { HttpError } from "../src/utils/httpError.js";
import { createLogger } from "../src/utils/log.js";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

let store: StockCountStore;
let service: StockCountService;

const quiet = createLogger("error");

beforeEach(() => {
  store = createSeededStore();
  service = new StockCountService(store, quiet);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("get", () => {
  it("returns the matching count", () => {
    const count = service.get({ stockCountId: 3 });
    expect(count.description).toBe("Stevanage - Clothing");
    expect(count.location).toEqual({ locationId: 2, name: "Stevenage" });
  });

  it.each([0, 5, 99, -1])("answers 404 for id %i", (id) => {
    const err = captureError(() => service.get({ stockCountId: id }));
    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ status: 404, message: `No stock count found with id ${id}` });
  });

  it("answers 404 when no id is given", () => {
    const err = captureError(() => service.get({}));
    expect(err).toMatchObject({ status: 404, message: "No stock count found with id " });
  });
});

describe("find", () => {
  const ids = (request: Parameters<StockCountService["find"]>[0]) => service.find(request).map((c) => c.stockCountId);

  it("returns everything without filters", () => {
    expect(ids({})).toEqual([1, 2, 3, 4]);
  });

  it("filters by location", () => {
    expect(ids({ locationId: 1 })).toEqual([1, 2]);
  });

  it("filters by category", () => {
    expect(ids({ categoryCode: "H7" })).toEqual([1, 3]);
  });

  it("combines both filters", () => {
    expect(ids({ locationId: 2, categoryCode: "H7" })).toEqual([3]);
    expect(ids({ locationId: 1, categoryCode: "H75" })).toEqual([]);
  });

  it("returns an empty list for unknown values", () => {
    expect(ids({ locationId: 3 })).toEqual([]);
    expect(ids({ categoryCode: "H99" })).toEqual([]);
  });
});

describe("start", () => {
  it("adds a count with the next id and a generated description", async () => {
    const id = await service.start({ locationId: 1, productCategoryCode: "H71" });
    expect(id).toBe(5);

    const created = service.get({ stockCountId: 5 });
    expect(created).toEqual({
      stockCountId: 5,
      description: "Baldock - Womens",
      location: { locationId: 1, name: "Baldock" },
      productCategory: { categoryId: 1, categoryCode: "H71", categoryName: "Womens" },
      rfidEventLog: { rfidEvents: [] },
    });
    expect(service.find({}).map((c) => c.stockCountId)).toEqual([1, 2, 3, 4, 5]);
  });

  it("hands out distinct ids to overlapping calls", async () => {
    const created = await Promise.all([
      service.start({ locationId: 1, productCategoryCode: "H72" }),
      service.start({ locationId: 2, productCategoryCode: "H73" }),
      service.start({ locationId: 2, productCategoryCode: "H74" }),
    ]);
    expect(created).toEqual([5, 6, 7]);
    expect(service.get({ stockCountId: 7 }).description).toBe("Stevenage - Girls");
  });

  it("answers 406 for an unknown location and leaves the store alone", async () => {
    await expect(service.start({ locationId: 99, productCategoryCode: "H71" })).rejects.toMatchObject({
      status: 406,
      message: "Unacceptable location or product code",
    });
    expect(store.size).toBe(4);
  });

  it("answers 406 for an unknown category", async () => {
    await expect(service.start({ locationId: 1, productCategoryCode: "ZZ" })).rejects.toBeInstanceOf(HttpError);
    expect(store.size).toBe(4);
  });

  it("does not use up an id on a rejected call", async () => {
    await expect(service.start({ locationId: 99, productCategoryCode: "H71" })).rejects.toBeInstanceOf(HttpError);
    await expect(service.start({ locationId: 2, productCategoryCode: "H76" })).resolves.toBe(5);
  });

  it("works on an empty store", async () => {
    const empty = new StockCountService(
      new StockCountStore({ locations: seedLocations, productCategories: seedProductCategories }),
      quiet
    );
    await expect(empty.start({ locationId: 2, productCategoryCode: "H7" })).resolves.toBe(1);
    expect(empty.get({ stockCountId: 1 }).description).toBe("Stevenage - Clothing");
  });
});

describe("reportTake", () => {
  it("appends one event per tag to the first count at the location", async () => {
    const result = await service.reportTake({
      stockTake: {
        locationId: 2,
        workArea: "Shop floor",
        productIdentifiers: [{ tagIdHex: "E28011600000020A" }, { tagIdHex: "E28011600000020B" }],
      },
    });

    expect(result).toEqual({ stockCountId: 3, eventsAdded: 2 });
    expect(service.get({ stockCountId: 3 }).rfidEventLog.rfidEvents).toEqual([
      { locationId: 2, workArea: "Shop floor", tagIdHex: "E28011600000020A" },
      { locationId: 2, workArea: "Shop floor", tagIdHex: "E28011600000020B" },
    ]);
    expect(service.get({ stockCountId: 4 }).rfidEventLog.rfidEvents).toEqual([]);
  });

  it("keeps the list order intact", async () => {
    await service.reportTake({ stockTake: { locationId: 1, productIdentifiers: [{ tagIdHex: "01" }] } });
    expect(service.find({}).map((c) => c.stockCountId)).toEqual([1, 2, 3, 4]);
  });

  it("appends to the same count on repeated reports", async () => {
    await service.reportTake({ stockTake: { locationId: 1, productIdentifiers: [{ tagIdHex: "01" }] } });
    await service.reportTake({ stockTake: { locationId: 1, productIdentifiers: [{ tagIdHex: "02" }] } });
    const tags = service.get({ stockCountId: 1 }).rfidEventLog.rfidEvents.map((e) => e.tagIdHex);
    expect(tags).toEqual(["01", "02"]);
  });

  it("uses the first count overall when no location is given", async () => {
    const result = await service.reportTake({ stockTake: { productIdentifiers: [{ tagIdHex: "FF" }] } });
    expect(result.stockCountId).toBe(1);
    expect(service.get({ stockCountId: 1 }).rfidEventLog.rfidEvents).toEqual([
      { locationId: null, workArea: null, tagIdHex: "FF" },
    ]);
  });

  it("accepts a take with no tags", async () => {
    const result = await service.reportTake({ stockTake: { locationId: 2, productIdentifiers: [] } });
    expect(result).toEqual({ stockCountId: 3, eventsAdded: 0 });
  });

  it("answers 404 when no count matches", async () => {
    await expect(
      service.reportTake({ stockTake: { locationId: 7, productIdentifiers: [{ tagIdHex: "AB" }] } })
    ).rejects.toMatchObject({ status: 404, message: "No stock count found for location 7" });
  });
});

describe("logging", () => {
  function loggedLines(spy: { mock: { calls: unknown[][] } }): unknown[] {
    return spy.mock.calls.map(([line]) => (typeof line === "string" ? JSON.parse(line) : line));
  }

  it("writes an info line when a count starts", async () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logged = new StockCountService(store, createLogger("info"));

    await logged.start({ locationId: 1, productCategoryCode: "H71" });

    expect(loggedLines(spy)).toEqual([
      expect.objectContaining({
        level: "info",
        message: "stock count started",
        stockCountId: 5,
        locationId: 1,
        categoryCode: "H71",
      }),
    ]);
  });

  it("writes an info line when a stock take is reported", async () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logged = new StockCountService(store, createLogger("info"));

    await logged.reportTake({
      stockTake: { locationId: 2, workArea: "Till 1", productIdentifiers: [{ tagIdHex: "AA" }, { tagIdHex: "BB" }] },
    });

    expect(loggedLines(spy)).toEqual([
      expect.objectContaining({
        level: "info",
        message: "stock take reported",
        stockCountId: 3,
        locationId: 2,
        workArea: "Till 1",
        tags: 2,
      }),
    ]);
  });

  it("drops info lines at level error", async () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    await service.start({ locationId: 1, productCategoryCode: "H71" });
    expect(spy).not.toHaveBeenCalled();
  });
});
