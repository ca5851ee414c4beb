import express from "express";

import {
  parseFindStockCount,
  parseGetStockCount,
  parseReportStockTake,
  parseStartStockCount,
  stockCountRoutes,
} from "../contracts/stockCount.js";
import type { StockCountService } from "../services/stockCountService.js";
import { asRecord } from "../utils/validate.js";

export function createStockCountRouter(service: StockCountService): express.Router {
  const router = express.Router();

  router.get("/endpoints", (_req, res) => {
    res.json({ ok: true, endpoints: Object.values(stockCountRoutes) });
  });

  router.get("/", (req, res) => {
    const parsed = parseFindStockCount(req.query);
    if (!parsed.ok) {
      res.status(400).json({ ok: false, error: parsed.error });
      return;
    }
    res.json(service.find(parsed.value));
  });

  router.post("/start", async (req, res) => {
    const bodyR = asRecord(req.body ?? {}, { field: "body" });
    const parsed = parseStartStockCount(req.query, bodyR.ok ? bodyR.value : {});
    if (!parsed.ok) {
      res.status(400).json({ ok: false, error: parsed.error });
      return;
    }
    const stockCountId = await service.start(parsed.value);
    res.status(202).json(stockCountId);
  });

  router.post("/take", async (req, res) => {
    const parsed = parseReportStockTake(req.body);
    if (!parsed.ok) {
      res.status(400).json({ ok: false, error: parsed.error });
      return;
    }
    await service.reportTake(parsed.value);
    // Clients only check the status; the body has always been a bare 0.
    res.status(202).json(0);
  });

  router.get("/:StockCountId", (req, res) => {
    const parsed = parseGetStockCount(req.params);
    if (!parsed.ok) {
      res.status(400).json({ ok: false, error: parsed.error });
      return;
    }
    res.json(service.get(parsed.value));
  });

  return router;
}
