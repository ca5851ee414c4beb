import cors from "cors";
import express from "express";
import type { NextFunction, Response } from "express";

import type { AppConfig } from "./config.js";
import { createMetrics, rateLimit, requestId, requestLog, securityHeaders, type ReqWithId } from "./middleware/http.js";
import { createStockCountRouter } from "./routes/stockCounts.js";
import { StockCountService } from "./services/stockCountService.js";
import type { StockCountStore } from "./store/StockCountStore.js";
import { isHttpError } from "./utils/httpError.js";
import { createLogger, type Logger } from "./utils/log.js";

export type AppDeps = {
  store: StockCountStore;
  config: AppConfig;
  log?: Logger;
  service?: StockCountService;
};

export function createApp(deps: AppDeps): express.Express {
  const { store, config } = deps;
  const log = deps.log ?? createLogger(config.logLevel);
  const service = deps.service ?? new StockCountService(store, log);

  const app = express();
  const metrics = createMetrics();

  if (config.trustProxy) {
    app.set("trust proxy", true);
  }

  app.use(requestId());
  app.use(requestLog(metrics, log));
  app.use(securityHeaders(config.isProd));
  app.use(express.json({ limit: "1mb" }));
  app.use(
    cors({
      origin: config.corsAllowed.length ? config.corsAllowed : config.isProd ? false : true,
      credentials: config.corsAllowed.length > 0,
    })
  );
  app.use(rateLimit({ windowMs: 60_000, max: config.rateLimitMax, keyPrefix: "global" }));

  app.get("/", (_req, res) => {
    res.json({ ok: true, message: "Stock count API running. See /health" });
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true, stockCounts: store.size });
  });

  app.get("/metrics", (req, res) => {
    if (config.isProd && config.metricsToken) {
      const provided = (req.header("x-metrics-token") ?? "").trim();
      if (!provided || provided !== config.metricsToken) {
        res.status(404).send("Not found");
        return;
      }
    }

    const uptimeSeconds = Math.floor((Date.now() - metrics.startedAtMs) / 1000);

    const lines: string[] = [];
    lines.push("# HELP stock_count_uptime_seconds Process uptime in seconds");
    lines.push("# TYPE stock_count_uptime_seconds gauge");
    lines.push(`stock_count_uptime_seconds ${uptimeSeconds}`);
    lines.push("# HELP stock_count_in_progress Stock counts currently in progress");
    lines.push("# TYPE stock_count_in_progress gauge");
    lines.push(`stock_count_in_progress ${store.size}`);
    lines.push("# HELP stock_count_http_requests_total Total HTTP requests");
    lines.push("# TYPE stock_count_http_requests_total counter");
    lines.push(`stock_count_http_requests_total ${metrics.httpRequestsTotal}`);

    lines.push("# HELP stock_count_http_requests_by_method_total Total HTTP requests by method");
    lines.push("# TYPE stock_count_http_requests_by_method_total counter");
    for (const [method, count] of Object.entries(metrics.httpRequestsByMethod)) {
      lines.push(`stock_count_http_requests_by_method_total{method="${method}"} ${count}`);
    }

    lines.push("# HELP stock_count_http_responses_by_status_class_total Total HTTP responses by status class");
    lines.push("# TYPE stock_count_http_responses_by_status_class_total counter");
    for (const [cls, count] of Object.entries(metrics.httpResponsesByStatusClass)) {
      lines.push(`stock_count_http_responses_by_status_class_total{class="${cls}"} ${count}`);
    }

    res.setHeader("content-type", "text/plain; version=0.0.4");
    res.status(200).send(lines.join("\n") + "\n");
  });

  app.use("/stockcount", createStockCountRouter(service));

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  app.use((err: unknown, req: ReqWithId, res: Response, _next: NextFunction) => {
    const requestId = req.requestId;

    if (isHttpError(err)) {
      res.status(err.status).json({ ok: false, error: err.message, requestId });
      return;
    }

    // body-parser rejects malformed JSON with a 4xx status on the error
    const status = statusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json({ ok: false, error: "Invalid request body", requestId });
      return;
    }

    log.error(err instanceof Error ? err.message : "Internal server error", {
      requestId,
      stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(500).json({ ok: false, error: "Internal server error", requestId });
  });

  return app;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  return typeof err.status === "number" ? err.status : undefined;
}
