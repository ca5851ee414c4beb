export type Location = {
  locationId: number;
  name: string;
};

export type ProductCategory = {
  categoryId: number;
  categoryCode: string;
  categoryName: string;
};

export type RfidEvent = {
  locationId: number | null;
  workArea: string | null;
  tagIdHex: string;
};

export type RfidEventLog = {
  rfidEvents: RfidEvent[];
};

export type StockCount = {
  stockCountId: number;
  description: string;
  location: Location;
  productCategory: ProductCategory;
  rfidEventLog: RfidEventLog;
};

/** One tag read submitted in a stock take. */
export type ProductIdentifier = {
  tagIdHex: string;
};

export type StockTake = {
  locationId?: number;
  workArea?: string;
  productIdentifiers: ProductIdentifier[];
};
