import type { Location, ProductCategory } from "../models/StockCount.js";

export const seedLocations: readonly Location[] = [
  { locationId: 1, name: "Baldock" },
  { locationId: 2, name: "Stevenage" },
];

export const seedProductCategories: readonly ProductCategory[] = [
  { categoryId: 0, categoryCode: "H7", categoryName: "Clothing" },
  { categoryId: 1, categoryCode: "H71", categoryName: "Womens" },
  { categoryId: 2, categoryCode: "H72", categoryName: "Toddlers" },
  { categoryId: 3, categoryCode: "H73", categoryName: "Baby" },
  { categoryId: 4, categoryCode: "H74", categoryName: "Girls" },
  { categoryId: 5, categoryCode: "H75", categoryName: "Boys" },
  { categoryId: 6, categoryCode: "H76", categoryName: "Mens" },
  { categoryId: 7, categoryCode: "H77", categoryName: "Schoolwear" },
  { categoryId: 8, categoryCode: "H78", categoryName: "Footwear" },
  { categoryId: 9, categoryCode: "H79", categoryName: "Underwear" },
];

export type SeedStockCount = {
  stockCountId: number;
  description: string;
  locationId: number;
  categoryCode: string;
};

// Descriptions are stored as entered by the stores, typos included.
export const seedStockCounts: readonly SeedStockCount[] = [
  { stockCountId: 1, description: "Baldock - Clothing", locationId: 1, categoryCode: "H7" },
  { stockCountId: 2, description: "Baldock - Menswear", locationId: 1, categoryCode: "H76" },
  { stockCountId: 3, description: "Stevanage - Clothing", locationId: 2, categoryCode: "H7" },
  { stockCountId: 4, description: "Stevanage - Boys", locationId: 2, categoryCode: "H75" },
];
