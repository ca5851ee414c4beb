import crypto from "crypto";
import type { NextFunction, Request, Response } from "express";

import type { Logger } from "../utils/log.js";

export type ReqWithId = Request & { requestId?: string };

export type MetricsSnapshot = {
  startedAtMs: number;
  httpRequestsTotal: number;
  httpRequestsByMethod: Record<string, number>;
  httpResponsesByStatusClass: Record<string, number>;
};

export function createMetrics(now: number = Date.now()): MetricsSnapshot {
  return {
    startedAtMs: now,
    httpRequestsTotal: 0,
    httpRequestsByMethod: {},
    httpResponsesByStatusClass: {},
  };
}

export function requestId() {
  return (req: ReqWithId, res: Response, next: NextFunction) => {
    const header = req.header("x-request-id") ?? "";
    const id = header.trim() || crypto.randomUUID();
    req.requestId = id;
    res.setHeader("x-request-id", id);
    next();
  };
}

export function requestLog(metrics: MetricsSnapshot, log: Logger) {
  return (req: ReqWithId, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      metrics.httpRequestsTotal += 1;
      metrics.httpRequestsByMethod[req.method] = (metrics.httpRequestsByMethod[req.method] ?? 0) + 1;
      const statusClass = `${Math.floor(res.statusCode / 100)}xx`;
      metrics.httpResponsesByStatusClass[statusClass] = (metrics.httpResponsesByStatusClass[statusClass] ?? 0) + 1;

      log.info("request", {
        requestId: req.requestId,
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        ms: Date.now() - startedAt,
        ip: req.ip,
      });
    });
    next();
  };
}

export function securityHeaders(isProd: boolean) {
  return (_req: Request, res: Response, next: NextFunction) => {
    res.setHeader("x-content-type-options", "nosniff");
    res.setHeader("x-frame-options", "DENY");
    res.setHeader("referrer-policy", "no-referrer");
    res.setHeader("cross-origin-resource-policy", "same-origin");
    if (isProd) {
      res.setHeader("content-security-policy", "default-src 'none'; frame-ancestors 'none'");
    }
    next();
  };
}

type RateBucket = { count: number; resetAtMs: number };

/** Fixed window per client IP. */
export function rateLimit(opts: { windowMs: number; max: number; keyPrefix: string }) {
  const buckets = new Map<string, RateBucket>();

  return (req: Request, res: Response, next: NextFunction) => {
    const now = Date.now();
    const key = `${opts.keyPrefix}:${req.ip || "unknown"}`;
    const existing = buckets.get(key);
    const bucket: RateBucket =
      existing && existing.resetAtMs > now ? existing : { count: 0, resetAtMs: now + opts.windowMs };

    bucket.count += 1;
    buckets.set(key, bucket);

    const remaining = Math.max(0, opts.max - bucket.count);
    res.setHeader("x-ratelimit-limit", String(opts.max));
    res.setHeader("x-ratelimit-remaining", String(remaining));
    res.setHeader("x-ratelimit-reset", String(Math.floor(bucket.resetAtMs / 1000)));

    if (bucket.count > opts.max) {
      res.status(429).json({ ok: false, error: "Too many requests" });
      return;
    }

    next();
  };
}
