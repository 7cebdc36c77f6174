/**
 * Id filtering for search and bulk delete.
 *
 * prefix narrows the store scan itself (SCAN MATCH <keyPrefix><prefix>*), so
 * it costs O(matching keys). contains is tested client-side against every id
 * the scan returns; without a prefix that is O(all keys). No index backs
 * substring matching, so contains-only queries are for moderate item counts.
 */
import createDebug from "debug";
import type { MessageStore, StoredMessage } from "../data/message-store.js";
import {
  CorruptRecordError,
  errorMessage,
  InvalidArgumentError,
} from "./errors.js";
import type { TimerRegistry } from "./timer-registry.js";
import type {
  BulkDeleteResult,
  FailedId,
  IdFilter,
  SearchResult,
} from "./types.js";

const debug = createDebug("hook-scheduler:lookup");

/** Drops empty filters; throws when none is left. */
export function normalizeFilter(filter: IdFilter): IdFilter {
  const prefix = filter.prefix || undefined;
  const contains = filter.contains || undefined;
  if (!prefix && !contains) {
    throw new InvalidArgumentError(
      "Provide at least one filter: 'prefix' or 'contains'.",
    );
  }
  return { prefix, contains };
}

/** Matching ids, sorted, collected before the caller acts on any of them. */
export async function matchIds(
  store: MessageStore,
  filter: IdFilter,
): Promise<string[]> {
  const { prefix, contains } = normalizeFilter(filter);
  const ids: string[] = [];
  for await (const id of store.scanIds(prefix ?? "")) {
    if (contains && !id.includes(contains)) continue;
    ids.push(id);
  }
  return ids.sort();
}

export async function searchMessages(
  store: MessageStore,
  registry: TimerRegistry,
  filter: IdFilter,
): Promise<SearchResult[]> {
  const ids = await matchIds(store, filter);
  const results: SearchResult[] = [];
  for (const id of ids) {
    let found: StoredMessage | null;
    try {
      found = await store.get(id);
    } catch (err) {
      if (!(err instanceof CorruptRecordError)) throw err;
      debug("Failed to parse message %s: %s", id, err.message);
      continue;
    }
    // deleted between scan and load
    if (!found) continue;
    const nextRun = registry.get(id);
    results.push({
      ...found.message,
      nextRun: nextRun ? nextRun.toISOString() : null,
    });
  }
  return results;
}

/**
 * Delete every match from the store and cancel its timer. One failure does
 * not stop the rest; only ids whose store deletion succeeded are reported.
 */
export async function bulkDeleteMessages(
  store: MessageStore,
  registry: TimerRegistry,
  filter: IdFilter,
): Promise<BulkDeleteResult> {
  const ids = await matchIds(store, filter);
  const messageIds: string[] = [];
  const failed: FailedId[] = [];
  for (const id of ids) {
    try {
      const removed = await store.delete(id);
      registry.cancel(id);
      if (removed) messageIds.push(id);
    } catch (err) {
      failed.push({ id, error: errorMessage(err) });
      debug("Failed to delete %s: %s", id, errorMessage(err));
    }
  }
  debug(
    "Bulk delete %o: %d deleted, %d failed",
    filter,
    messageIds.length,
    failed.length,
  );
  return { deleted: messageIds.length, messageIds, failed };
}
