import { defaultTrackedSymbolList, parseTrackedSymbols, TrackedSymbol } from "@tech-tracker/server-shared";
import { z } from "zod";

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
  PORT: intFromEnv(8080, 1),
  HOST: z.string().min(1).default("127.0.0.1"),
  TRACKED_SYMBOLS: z
    .string()
    .default(defaultTrackedSymbolList())
    .transform((value) => parseTrackedSymbols(value))
    .refine((symbols) => symbols.length > 0, "TRACKED_SYMBOLS must name at least one symbol"),
  REFRESH_INTERVAL_SECONDS: intFromEnv(60, 1),
  PRICE_PRECISION: intFromEnv(2, 0),
  VOLUME_PRECISION: intFromEnv(1, 0),
  FETCH_TIMEOUT_MS: intFromEnv(10_000, 1),
  FETCH_MAX_RETRIES: intFromEnv(2, 0),
  FETCH_RETRY_DELAY_MS: intFromEnv(2_000, 0),
  STALE_QUOTE_MAX_AGE_SECONDS: intFromEnv(0, 0),
  CLIENT_ORIGIN: z.string().optional()
});

export interface AppConfig {
  port: number;
  host: string;
  trackedSymbols: TrackedSymbol[];
  refreshIntervalSeconds: number;
  pricePrecision: number;
  volumePrecision: number;
  fetchTimeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  maxStaleAgeMs: number;
  clientOrigins: string[];
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

const parseOrigins = (raw?: string) =>
  (raw ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

// Empty strings count as unset so that `FOO=` in a .env file falls back to the default.
function withoutBlanks(env: NodeJS.ProcessEnv) {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: parsed.error });
  }
  const values = parsed.data;
  return {
    port: values.PORT,
    host: values.HOST,
    trackedSymbols: values.TRACKED_SYMBOLS,
    refreshIntervalSeconds: values.REFRESH_INTERVAL_SECONDS,
    pricePrecision: values.PRICE_PRECISION,
    volumePrecision: values.VOLUME_PRECISION,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    maxRetries: values.FETCH_MAX_RETRIES,
    retryDelayMs: values.FETCH_RETRY_DELAY_MS,
    maxStaleAgeMs: values.STALE_QUOTE_MAX_AGE_SECONDS * 1000,
    clientOrigins: parseOrigins(values.CLIENT_ORIGIN)
  };
}
