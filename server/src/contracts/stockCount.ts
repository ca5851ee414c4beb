import type { ProductIdentifier, StockTake } from "../models/StockCount.js";
import { asArray, asInteger, asRecord, asString, pick, pickPresent, type ValidationResult } from "../utils/validate.js";

export type GetStockCount = { stockCountId?: number };

export type FindStockCount = { locationId?: number; categoryCode?: string };

export type StartStockCount = { locationId: number; productCategoryCode: string };

export type ReportStockTake = { stockTake: StockTake };

export type ParamLocation = "path" | "query" | "body";

export type ApiMember = {
  name: string;
  description: string;
  in: ParamLocation;
  type: "int" | "string" | "StockTake";
  required: boolean;
};

export type ApiRoute = {
  method: "GET" | "POST";
  path: string;
  summary: string;
  notes?: string;
  params: ApiMember[];
};

export const stockCountRoutes = {
  get: {
    method: "GET",
    path: "/stockcount/{StockCountId}",
    summary: "Get a stock count by ID",
    params: [
      { name: "StockCountId", description: "The ID of the stock count", in: "path", type: "int", required: false },
    ],
  },
  find: {
    method: "GET",
    path: "/stockcount",
    summary: "Find matching stock counts",
    notes: "Will find stock counts that match the criteria",
    params: [
      { name: "LocationId", description: "A location id for getting stock counts", in: "query", type: "int", required: false },
      { name: "CategoryCode", description: "A category code for getting stock counts", in: "query", type: "string", required: false },
    ],
  },
  start: {
    method: "POST",
    path: "/stockcount/start",
    summary: "Start a stock count with specified data",
    params: [
      { name: "LocationId", description: "Location for this stock count", in: "query", type: "int", required: true },
      { name: "ProductCategoryCode", description: "Product Category for this stock count", in: "query", type: "string", required: true },
    ],
  },
  take: {
    method: "POST",
    path: "/stockcount/take",
    summary: "Report the RFID tag reads for the stock count",
    notes: "Send RFID reads for stock counting",
    params: [
      { name: "StockTake", description: "The location and tags for a stock count", in: "body", type: "StockTake", required: true },
    ],
  },
} satisfies Record<string, ApiRoute>;

const MAX_TAGS_PER_TAKE = 10_000;

export function parseGetStockCount(params: Record<string, unknown>): ValidationResult<GetStockCount> {
  const idR = asInteger(pick(params, "StockCountId"), { field: "StockCountId" });
  if (!idR.ok) return idR;
  return { ok: true, value: { stockCountId: idR.value } };
}

export function parseFindStockCount(query: Record<string, unknown>): ValidationResult<FindStockCount> {
  const locationR = asInteger(pick(query, "LocationId"), { field: "LocationId" });
  if (!locationR.ok) return locationR;
  const categoryR = asString(pick(query, "CategoryCode"), { field: "CategoryCode", maxLen: 40 });
  if (!categoryR.ok) return categoryR;

  return {
    ok: true,
    value: { locationId: locationR.value, categoryCode: categoryR.value || undefined },
  };
}

/** Query values win over body values of the same name; a blank query value defers to the body. */
export function parseStartStockCount(
  query: Record<string, unknown>,
  body: Record<string, unknown>
): ValidationResult<StartStockCount> {
  const locationR = asInteger(pickPresent(query, "LocationId") ?? pick(body, "LocationId"), { field: "LocationId", required: true });
  if (!locationR.ok) return locationR;
  const codeR = asString(pickPresent(query, "ProductCategoryCode") ?? pick(body, "ProductCategoryCode"), {
    field: "ProductCategoryCode",
    required: true,
    maxLen: 40,
  });
  if (!codeR.ok) return codeR;

  return { ok: true, value: { locationId: locationR.value, productCategoryCode: codeR.value } };
}

function parseProductIdentifier(raw: unknown, index: number): ValidationResult<ProductIdentifier> {
  const field = `ProductIdentifiers[${index}]`;
  const recordR = asRecord(raw, { field });
  if (!recordR.ok) return recordR;
  const tagR = asString(pick(recordR.value, "TagIdHex"), { field: `${field}.TagIdHex`, required: true, maxLen: 128 });
  if (!tagR.ok) return tagR;
  return { ok: true, value: { tagIdHex: tagR.value } };
}

export function parseReportStockTake(body: unknown): ValidationResult<ReportStockTake> {
  const bodyR = asRecord(body, { field: "body" });
  if (!bodyR.ok) return bodyR;

  // The wrapper is optional: a bare StockTake object is accepted too.
  const wrapped = pick(bodyR.value, "StockTake");
  const inner = wrapped === undefined ? bodyR.value : wrapped;
  const takeR = asRecord(inner, { field: "StockTake" });
  if (!takeR.ok) return takeR;
  const take = takeR.value;

  const locationR = asInteger(pick(take, "LocationId"), { field: "StockTake.LocationId" });
  if (!locationR.ok) return locationR;
  const workAreaR = asString(pick(take, "WorkArea"), { field: "StockTake.WorkArea", trim: true, maxLen: 120 });
  if (!workAreaR.ok) return workAreaR;
  const idsR = asArray(pick(take, "ProductIdentifiers"), { field: "StockTake.ProductIdentifiers", maxLen: MAX_TAGS_PER_TAKE });
  if (!idsR.ok) return idsR;

  const productIdentifiers: ProductIdentifier[] = [];
  for (const [i, raw] of idsR.value.entries()) {
    const idR = parseProductIdentifier(raw, i);
    if (!idR.ok) return idR;
    productIdentifiers.push(idR.value);
  }

  return {
    ok: true,
    value: {
      stockTake: {
        locationId: locationR.value,
        workArea: workAreaR.value,
        productIdentifiers,
      },
    },
  };
}
