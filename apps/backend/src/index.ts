import createDebug from "debug";
import http from "http";
import { createApp } from "./app.js";
import {
  createMemoryMessageStore,
  createRedisMessageStore,
} from "./data/message-store.js";
import type { MessageStore } from "./data/message-store.js";
import { initRedis, waitForRedis, closeRedis } from "./data/redis.js";
import { createScheduleService } from "./scheduling/schedule-service.js";
import { createWebhookClient } from "./webhook-client.js";
import { env, isTokenAuthEnabled } from "./env.js";

const debug = createDebug("hook-scheduler:api");

async function openStore(): Promise<MessageStore> {
  if (env.STORE_BACKEND === "memory") {
    debug("STORE_BACKEND=memory: scheduled messages will not survive a restart");
    return createMemoryMessageStore();
  }
  const redis = initRedis(env.REDIS_URL);
  if (!redis) throw new Error("REDIS_URL is empty");
  await waitForRedis(env.REDIS_READY_TIMEOUT_MS);
  debug("Redis ready");
  return createRedisMessageStore(redis, {
    keyPrefix: env.KEY_PREFIX,
    scanCount: env.SCAN_COUNT,
  });
}

async function main() {
  const store = await openStore();
  const webhook = createWebhookClient({ timeoutMs: env.WEBHOOK_TIMEOUT_MS });
  const scheduler = createScheduleService({
    store,
    webhook,
    onDispatch: (outcome) => debug("dispatch %s: %o", outcome.id, outcome),
  });

  // Timers must exist before the API can mutate them
  const report = await scheduler.restore();
  debug(
    "Restored %d scheduled message(s) from store (%d unreadable)",
    report.restored,
    report.failed.length,
  );

  if (!isTokenAuthEnabled()) {
    debug("API_TOKEN not set; accepting local requests only");
  }
  const app = createApp({ scheduler }, { apiToken: env.API_TOKEN });
  const server = http.createServer(app);
  server.listen(env.PORT, env.HOST, () => {
    debug("Scheduler API listening on http://%s:%s", env.HOST, env.PORT);
  });

  const shutdown = async () => {
    scheduler.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await closeRedis();
    debug("Scheduler API stopped.");
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((err) => {
  debug("API startup failed: %o", err);
  process.exit(1);
});
