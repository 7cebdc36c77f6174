import createDebug from "debug";
import type { MessageStore } from "../data/message-store.js";
import { CorruptRecordError, errorMessage } from "./errors.js";
import { fireAtOf } from "./message-schema.js";
import type { TimerRegistry } from "./timer-registry.js";
import type { FailedId, RestoreReport, ScheduledMessage } from "./types.js";

const debug = createDebug("hook-scheduler:restore");

/**
 * Rebuild timers from every persisted message. Run once at boot, before the
 * API accepts traffic. Persistence is not written; undecodable records are
 * skipped and listed in the report. A store outage rejects.
 */
export async function restoreTimers(
  store: MessageStore,
  registry: TimerRegistry,
): Promise<RestoreReport> {
  const messages: ScheduledMessage[] = [];
  const failed: FailedId[] = [];

  for await (const id of store.scanIds()) {
    try {
      const found = await store.get(id);
      if (found) messages.push(found.message);
    } catch (err) {
      if (!(err instanceof CorruptRecordError)) throw err;
      failed.push({ id, error: errorMessage(err) });
      debug("Failed to restore message %s: %s", id, err.message);
    }
  }

  messages.sort((a, b) => fireAtOf(a).getTime() - fireAtOf(b).getTime());
  for (const m of messages) {
    registry.upsert(m.id, fireAtOf(m));
    debug("Restored scheduled message %s for %s", m.id, m.scheduleTo);
  }

  debug(
    "Restored %d scheduled message(s); %d skipped",
    messages.length,
    failed.length,
  );
  return { restored: messages.length, failed };
}
