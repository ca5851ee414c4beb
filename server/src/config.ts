import dotenv from "dotenv";

export type AppConfig = {
  port: number;
  isProd: boolean;
  trustProxy: boolean;
  corsAllowed: string[];
  metricsToken?: string;
  rateLimitMax: number;
  logLevel: "info" | "error";
};

type Env = Record<string, string | undefined>;

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const corsOrigin = env.CORS_ORIGIN;
  return {
    port: positiveInt(env.PORT, 4000),
    isProd: String(env.NODE_ENV ?? "").toLowerCase() === "production",
    trustProxy: Boolean(env.TRUST_PROXY),
    corsAllowed: corsOrigin ? corsOrigin.split(",").map((s) => s.trim()).filter(Boolean) : [],
    metricsToken: env.METRICS_TOKEN || undefined,
    rateLimitMax: positiveInt(env.RATE_LIMIT_MAX, 300),
    logLevel: String(env.LOG_LEVEL ?? "").toLowerCase() === "error" ? "error" : "info",
  };
}

export function loadConfigFromEnvFile(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
