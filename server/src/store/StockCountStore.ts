import { seedLocations, seedProductCategories, seedStockCounts } from "../data/seed.js";
import type { Location, ProductCategory, StockCount } from "../models/StockCount.js";

export type StockCountStoreInit = {
  locations: readonly Location[];
  productCategories: readonly ProductCategory[];
  stockCounts?: readonly StockCount[];
};

/**
 * In-memory home of the reference lists and the in-progress stock counts.
 *
 * Counts are keyed by id; iteration follows insertion order. Ids are handed
 * out by a counter that only moves forward, so an id is never issued twice.
 */
export class StockCountStore {
  readonly locations: readonly Location[];
  readonly productCategories: readonly ProductCategory[];

  private readonly counts = new Map<number, StockCount>();
  private nextId: number;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(init: StockCountStoreInit) {
    this.locations = init.locations;
    this.productCategories = init.productCategories;

    let maxId = 0;
    for (const count of init.stockCounts ?? []) {
      if (this.counts.has(count.stockCountId)) {
        throw new Error(`Duplicate stock count id ${count.stockCountId}`);
      }
      this.counts.set(count.stockCountId, count);
      maxId = Math.max(maxId, count.stockCountId);
    }
    this.nextId = maxId + 1;
  }

  get size(): number {
    return this.counts.size;
  }

  list(): StockCount[] {
    return [...this.counts.values()];
  }

  get(stockCountId: number): StockCount | undefined {
    return this.counts.get(stockCountId);
  }

  findLocation(locationId: number): Location | undefined {
    return this.locations.find((l) => l.locationId === locationId);
  }

  findProductCategory(categoryCode: string): ProductCategory | undefined {
    return this.productCategories.find((c) => c.categoryCode === categoryCode);
  }

  allocateId(): number {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }

  add(count: StockCount): void {
    if (this.counts.has(count.stockCountId)) {
      throw new Error(`Duplicate stock count id ${count.stockCountId}`);
    }
    this.counts.set(count.stockCountId, count);
    if (count.stockCountId >= this.nextId) {
      this.nextId = count.stockCountId + 1;
    }
  }

  /** Runs `fn` after every previously queued call has settled. */
  exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    // callers see the rejection through `run`
    this.queue = run.catch(() => undefined);
    return run;
  }
}

export function createSeededStore(): StockCountStore {
  const stockCounts: StockCount[] = seedStockCounts.map((s) => {
    const location = seedLocations.find((l) => l.locationId === s.locationId);
    const productCategory = seedProductCategories.find((c) => c.categoryCode === s.categoryCode);
    if (!location || !productCategory) {
      throw new Error(`Seed stock count ${s.stockCountId} references unknown location or category`);
    }
    return {
      stockCountId: s.stockCountId,
      description: s.description,
      location: { ...location },
      productCategory: { ...productCategory },
      rfidEventLog: { rfidEvents: [] },
    };
  });

  return new StockCountStore({
    locations: seedLocations,
    productCategories: seedProductCategories,
    stockCounts,
  });
}
