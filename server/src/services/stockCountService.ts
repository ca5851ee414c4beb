import type { FindStockCount, GetStockCount, ReportStockTake, StartStockCount } from "../contracts/stockCount.js";
import type { StockCount } from "../models/StockCount.js";
import type { StockCountStore } from "../store/StockCountStore.js";
import { HttpError } from "../utils/httpError.js";
import type { Logger } from "../utils/log.js";

export type StockTakeResult = {
  stockCountId: number;
  eventsAdded: number;
};

export class StockCountService {
  constructor(
    private readonly store: StockCountStore,
    private readonly log: Logger
  ) {}

  get(request: GetStockCount): StockCount {
    const id = request.stockCountId;
    const stockCount = id === undefined ? undefined : this.store.get(id);
    if (!stockCount) {
      throw new HttpError(404, `No stock count found with id ${id ?? ""}`);
    }
    return stockCount;
  }

  find(request: FindStockCount): StockCount[] {
    let matching = this.store.list();
    if (request.locationId !== undefined) {
      matching = matching.filter((c) => c.location.locationId === request.locationId);
    }
    if (request.categoryCode) {
      matching = matching.filter((c) => c.productCategory.categoryCode === request.categoryCode);
    }
    return matching;
  }

  /** Resolves to the id of the new count. */
  start(request: StartStockCount): Promise<number> {
    return this.store.exclusive(() => {
      const location = this.store.findLocation(request.locationId);
      const category = this.store.findProductCategory(request.productCategoryCode);
      if (!location || !category) {
        throw new HttpError(406, "Unacceptable location or product code");
      }

      const stockCount: StockCount = {
        stockCountId: this.store.allocateId(),
        description: `${location.name} - ${category.categoryName}`,
        location: { ...location },
        productCategory: { ...category },
        rfidEventLog: { rfidEvents: [] },
      };
      this.store.add(stockCount);

      this.log.info("stock count started", {
        stockCountId: stockCount.stockCountId,
        locationId: location.locationId,
        categoryCode: category.categoryCode,
      });
      return stockCount.stockCountId;
    });
  }

  /**
   * Appends one RFID event per tag to the first in-progress count at the
   * stock take's location (the first count overall when no location is given).
   */
  reportTake(request: ReportStockTake): Promise<StockTakeResult> {
    const take = request.stockTake;
    return this.store.exclusive(() => {
      const target = this.find({ locationId: take.locationId })[0];
      if (!target) {
        throw new HttpError(404, `No stock count found for location ${take.locationId ?? ""}`);
      }

      for (const product of take.productIdentifiers) {
        target.rfidEventLog.rfidEvents.push({
          locationId: take.locationId ?? null,
          workArea: take.workArea ?? null,
          tagIdHex: product.tagIdHex,
        });
      }

      this.log.info("stock take reported", {
        stockCountId: target.stockCountId,
        locationId: take.locationId ?? null,
        workArea: take.workArea ?? null,
        tags: take.productIdentifiers.length,
      });
      return { stockCountId: target.stockCountId, eventsAdded: take.productIdentifiers.length };
    });
  }
}
