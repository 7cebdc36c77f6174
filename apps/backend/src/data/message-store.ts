import createDebug from "debug";
import type { Redis } from "ioredis";
import { StoreUnavailableError } from "../scheduling/errors.js";
import { decodeMessage, encodeMessage } from "../scheduling/message-schema.js";
import type { ScheduledMessage } from "../scheduling/types.js";

const debug = createDebug("hook-scheduler:store");

export interface StoredMessage {
  message: ScheduledMessage;
  /** Raw stored value; pass back to delete() to remove only this exact version. */
  revision: string;
}

/**
 * Durable home of scheduled messages, one key per id. Knows nothing about timers.
 * get() throws CorruptRecordError for values that do not decode.
 */
export interface MessageStore {
  /** Create or replace. Resolves true when the id was new. */
  put(message: ScheduledMessage): Promise<boolean>;
  get(id: string): Promise<StoredMessage | null>;
  /** Resolves true when a key was removed. With a revision, removes only if the value is unchanged. */
  delete(id: string, revision?: string): Promise<boolean>;
  /** Ids whose key starts with prefix ("" for all). May be lazy; order is unspecified. */
  scanIds(prefix?: string): AsyncIterable<string>;
  ping(): Promise<void>;
}

export interface RedisMessageStoreOptions {
  keyPrefix: string;
  scanCount: number;
}

const DELETE_IF_UNCHANGED = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
end
return 0
`;

/** Escape Redis glob metacharacters so ids are matched literally by SCAN MATCH. */
export function escapeGlob(s: string): string {
  return s.replace(/[*?[\]\\]/g, "\\$&");
}

async function attempt<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new StoreUnavailableError(operation, err);
  }
}

export function createRedisMessageStore(
  redis: Redis,
  options: RedisMessageStoreOptions,
): MessageStore {
  const { keyPrefix, scanCount } = options;
  const keyOf = (id: string) => keyPrefix + id;

  return {
    async put(message: ScheduledMessage): Promise<boolean> {
      const results = await attempt("put", () =>
        redis
          .multi()
          .exists(keyOf(message.id))
          .set(keyOf(message.id), encodeMessage(message))
          .exec(),
      );
      const existed = results?.[0];
      if (!existed || existed[0]) {
        throw new StoreUnavailableError("put", existed?.[0] ?? "transaction aborted");
      }
      return existed[1] === 0;
    },

    async get(id: string): Promise<StoredMessage | null> {
      const raw = await attempt("get", () => redis.get(keyOf(id)));
      if (raw === null) return null;
      return { message: decodeMessage(id, raw), revision: raw };
    },

    async delete(id: string, revision?: string): Promise<boolean> {
      if (revision === undefined) {
        const n = await attempt("delete", () => redis.del(keyOf(id)));
        return n > 0;
      }
      const n = await attempt("delete", () =>
        redis.eval(DELETE_IF_UNCHANGED, 1, keyOf(id), revision),
      );
      return Number(n) > 0;
    },

    async *scanIds(prefix = ""): AsyncIterable<string> {
      const match = `${escapeGlob(keyPrefix + prefix)}*`;
      // SCAN may repeat keys across batches
      const seen = new Set<string>();
      let cursor = "0";
      do {
        const [next, keys] = await attempt("scan", () =>
          redis.scan(cursor, "MATCH", match, "COUNT", scanCount),
        );
        cursor = next;
        for (const key of keys) {
          if (seen.has(key) || !key.startsWith(keyPrefix)) continue;
          seen.add(key);
          yield key.slice(keyPrefix.length);
        }
      } while (cursor !== "0");
      debug("scan %s: %d key(s)", match, seen.size);
    },

    async ping(): Promise<void> {
      await attempt("ping", () => redis.ping());
    },
  };
}

/**
 * Process-local store with the same semantics as the Redis one. Nothing
 * survives a restart; used when STORE_BACKEND=memory and in tests.
 */
export function createMemoryMessageStore(): MessageStore & {
  /** Write a raw value as-is, bypassing encoding. */
  putRaw(id: string, raw: string): void;
  size(): number;
} {
  const values = new Map<string, string>();

  return {
    async put(message: ScheduledMessage): Promise<boolean> {
      const created = !values.has(message.id);
      values.set(message.id, encodeMessage(message));
      return created;
    },

    async get(id: string): Promise<StoredMessage | null> {
      const raw = values.get(id);
      if (raw === undefined) return null;
      return { message: decodeMessage(id, raw), revision: raw };
    },

    async delete(id: string, revision?: string): Promise<boolean> {
      const raw = values.get(id);
      if (raw === undefined) return false;
      if (revision !== undefined && raw !== revision) return false;
      return values.delete(id);
    },

    async *scanIds(prefix = ""): AsyncIterable<string> {
      // snapshot so deletes during iteration are safe
      for (const id of [...values.keys()]) {
        if (id.startsWith(prefix)) yield id;
      }
    },

    async ping(): Promise<void> {},

    putRaw(id: string, raw: string): void {
      values.set(id, raw);
    },

    size(): number {
      return values.size;
    },
  };
}
