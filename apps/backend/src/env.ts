import dotenv from "dotenv";

// .env in the working directory (the project root when run through npm scripts)
dotenv.config();

function str(name: string, defaultValue: string): string {
  const v = process.env[name];
  return (typeof v === "string" && v.trim()) || defaultValue;
}
function num(name: string, defaultValue: number): number {
  const v = process.env[name];
  if (v === undefined || v === "") return defaultValue;
  const n = Number(v);
  return Number.isFinite(n) ? n : defaultValue;
}

/** REDIS_URL wins; otherwise assemble one from the discrete host/port/password variables. */
function redisUrl(): string {
  const url = str("REDIS_URL", "");
  if (url) return url;
  const host = str("REDIS_HOST", "localhost");
  const port = num("REDIS_PORT", 6379);
  const password = str("REDIS_PASSWORD", "");
  const auth = password ? `:${encodeURIComponent(password)}@` : "";
  return `redis://${auth}${host}:${port}`;
}

export type StoreBackend = "redis" | "memory";

function storeBackend(): StoreBackend {
  return str("STORE_BACKEND", "redis") === "memory" ? "memory" : "redis";
}

/** Loaded once at startup. Use this instead of process.env everywhere. */
export const env = {
  NODE_ENV: str("NODE_ENV", "development"),
  PORT: num("PORT", 8000),
  HOST: str("HOST", "0.0.0.0"),
  REDIS_URL: redisUrl(),
  /** redis (durable) or memory (lost on restart; local runs only). */
  STORE_BACKEND: storeBackend(),
  /** Bearer token required on every route but /health. When empty, only loopback clients are served. */
  API_TOKEN: str("API_TOKEN", ""),
  /** Namespace for persisted message keys; the item id follows it. */
  KEY_PREFIX: str("KEY_PREFIX", "message:"),
  /** COUNT hint passed to Redis SCAN. */
  SCAN_COUNT: num("SCAN_COUNT", 1000),
  /** Max ms for one webhook POST before it counts as failed. */
  WEBHOOK_TIMEOUT_MS: num("WEBHOOK_TIMEOUT_MS", 30_000),
  /** Max ms to wait for Redis at startup. */
  REDIS_READY_TIMEOUT_MS: num("REDIS_READY_TIMEOUT_MS", 10_000),
} as const;

/** True when API_TOKEN is set; then every route except /health requires it. */
export function isTokenAuthEnabled(): boolean {
  return env.API_TOKEN.trim() !== "";
}
