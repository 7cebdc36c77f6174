/**
 * Shared Redis client. Call initRedis(redisUrl) once at process startup;
 * then use getRedis() where a Redis connection is needed.
 */
import createDebug from "debug";
import { Redis } from "ioredis";

const debug = createDebug("hook-scheduler:redis");

let client: Redis | null = null;
let currentUrl = "";

/**
 * Initialize the shared Redis client. Idempotent: same URL is a no-op; different URL replaces the client.
 */
export function initRedis(redisUrl: string): Redis | null {
  const url = redisUrl.trim();
  if (url === currentUrl && client) return client;
  if (client) {
    client.disconnect();
    client = null;
  }
  currentUrl = url;
  if (!url) return null;
  client = new Redis(url, { maxRetriesPerRequest: 1 });
  client.on("error", (err: Error) => {
    // avoid crashing; commands reject and callers map that to StoreUnavailableError
    debug("redis error: %s", err.message);
  });
  return client;
}

/**
 * Return the shared Redis client, or null if not initialized or URL was empty.
 */
export function getRedis(): Redis | null {
  return client;
}

/**
 * Wait for the shared Redis client to be in "ready" state. Resolves immediately if already ready.
 * Rejects after timeoutMs (default 10s) if the connection doesn't become ready.
 */
export function waitForRedis(timeoutMs = 10_000): Promise<void> {
  return new Promise((resolve, reject) => {
    const redis = client;
    if (!redis) return reject(new Error("Redis not initialized"));
    if (redis.status === "ready") return resolve();
    const onReady = () => {
      clearTimeout(timer);
      redis.off("error", onError);
      resolve();
    };
    const onError = (err: Error) => {
      clearTimeout(timer);
      redis.off("ready", onReady);
      reject(err);
    };
    const timer = setTimeout(() => {
      redis.off("ready", onReady);
      redis.off("error", onError);
      reject(
        new Error(
          `Redis not ready after ${timeoutMs}ms (status: ${redis.status})`,
        ),
      );
    }, timeoutMs);
    redis.once("ready", onReady);
    redis.once("error", onError);
  });
}

/**
 * Close the shared client. Call on process shutdown.
 */
export async function closeRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
  }
  currentUrl = "";
}
