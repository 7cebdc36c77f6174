/**
 * Scheduling facade. Stateless over each call: the store owns persisted
 * messages and the timer registry owns timers; this wires the two together
 * and hands fired timers to the dispatch worker.
 */
import createDebug from "debug";
import type { MessageStore } from "../data/message-store.js";
import type { WebhookClient } from "../webhook-client.js";
import { createDispatchWorker } from "./dispatch-worker.js";
import type { DispatchOutcome } from "./dispatch-worker.js";
import { errorMessage, NotFoundError } from "./errors.js";
import { bulkDeleteMessages, searchMessages } from "./lookup.js";
import { fireAtOf, parseScheduleInput } from "./message-schema.js";
import { restoreTimers } from "./restore.js";
import type { TimerClock } from "./timer-clock.js";
import { TimerRegistry } from "./timer-registry.js";
import type { ScheduleService } from "./types.js";

const debug = createDebug("hook-scheduler:scheduler");

export interface ScheduleServiceDeps {
  store: MessageStore;
  webhook: WebhookClient;
  /** Defaults to node-schedule on wall-clock time. */
  clock?: TimerClock;
  onDispatch?: (outcome: DispatchOutcome) => void;
}

export function createScheduleService(deps: ScheduleServiceDeps): ScheduleService {
  const { store, webhook, clock, onDispatch } = deps;

  const registry = new TimerRegistry((ticket) => worker.dispatch(ticket), clock);
  const worker = createDispatchWorker({
    store,
    registry,
    webhook,
    onOutcome: onDispatch,
  });

  return {
    async schedule(input: unknown) {
      const message = parseScheduleInput(input);
      const created = await store.put(message);
      debug(
        "%s message %s for %s",
        created ? "Stored new" : "Replaced",
        message.id,
        message.scheduleTo,
      );
      registry.upsert(message.id, fireAtOf(message));
      return { status: "scheduled" as const, messageId: message.id, created };
    },

    async get(id: string) {
      const found = await store.get(id);
      if (!found) throw new NotFoundError(id);
      return found.message;
    },

    async search(filter) {
      const messages = await searchMessages(store, registry, filter);
      return { count: messages.length, messages };
    },

    async delete(id: string) {
      const removed = await store.delete(id);
      // a timer without a record would only skip when it fires; drop it anyway
      registry.cancel(id);
      if (!removed) throw new NotFoundError(id);
      debug("Deleted message %s", id);
      return { status: "deleted" as const, messageId: id };
    },

    bulkDelete(filter) {
      return bulkDeleteMessages(store, registry, filter);
    },

    listInMemory() {
      const scheduledJobs = registry.listSnapshot().map((e) => ({
        messageId: e.id,
        nextRun: e.fireAt.toISOString(),
      }));
      return { scheduledJobs, count: scheduledJobs.length };
    },

    async healthCheck() {
      try {
        await store.ping();
        return { storeReachable: true };
      } catch (err) {
        return { storeReachable: false, error: errorMessage(err) };
      }
    },

    restore() {
      return restoreTimers(store, registry);
    },

    stop() {
      registry.stop();
    },
  };
}
