import { z } from "zod";

const DEFAULT_REQUIRED_METRICS = "time-to-connect,throughput,coverage,capacity,successful-connects";

const intFromEnv = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  PORT: intFromEnv(5000),
  DATABASE_URL: z.string().optional(),
  VENDOR_API_HOST: z.string().url().default("https://api.mist.com"),
  VENDOR_API_TOKEN: z.string().default(""),
  VENDOR_TIMEOUT_MS: intFromEnv(10_000),
  VENDOR_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  VENDOR_BACKOFF_MS: intFromEnv(500),
  SITE_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  STEP_LEASE_MS: intFromEnv(300_000),
  MAX_STEP_ATTEMPTS: z.coerce.number().int().min(1).default(1),
  SLE_THRESHOLD: z.coerce.number().min(0).max(100).default(90),
  SLE_REQUIRED_METRICS: z.string().default(DEFAULT_REQUIRED_METRICS),
  CANARY_WINDOW_MS: intFromEnv(600_000),
  CANARY_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
});

export type AppConfig = {
  port: number;
  databaseUrl: string | null;
  vendor: {
    host: string;
    token: string;
    timeoutMs: number;
    maxAttempts: number;
    backoffMs: number;
  };
  workflow: {
    siteConcurrency: number;
    stepLeaseMs: number;
    maxStepAttempts: number;
  };
  assurance: {
    threshold: number;
    requiredMetrics: string[];
    canaryWindowMs: number;
    canaryIntervalMs: number;
  };
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid environment: ${detail}`);
  }
  const e = parsed.data;

  const requiredMetrics = e.SLE_REQUIRED_METRICS.split(",")
    .map((m) => m.trim())
    .filter((m) => m.length > 0);

  return {
    port: e.PORT,
    databaseUrl: e.DATABASE_URL ?? null,
    vendor: {
      host: e.VENDOR_API_HOST.replace(/\/+$/, ""),
      token: e.VENDOR_API_TOKEN,
      timeoutMs: e.VENDOR_TIMEOUT_MS,
      maxAttempts: e.VENDOR_MAX_ATTEMPTS,
      backoffMs: e.VENDOR_BACKOFF_MS,
    },
    workflow: {
      siteConcurrency: e.SITE_CONCURRENCY,
      stepLeaseMs: e.STEP_LEASE_MS,
      maxStepAttempts: e.MAX_STEP_ATTEMPTS,
    },
    assurance: {
      threshold: e.SLE_THRESHOLD,
      requiredMetrics,
      canaryWindowMs: e.CANARY_WINDOW_MS,
      canaryIntervalMs: e.CANARY_INTERVAL_MS,
    },
  };
}
