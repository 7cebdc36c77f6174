/**
 * One-shot execution for a fired timer: re-read the record, deliver once,
 * then delete the record and release the timer whether or not delivery worked.
 */
import createDebug from "debug";
import type { MessageStore, StoredMessage } from "../data/message-store.js";
import type { WebhookClient } from "../webhook-client.js";
import { errorMessage } from "./errors.js";
import { fireAtOf } from "./message-schema.js";
import type { TimerRegistry, TimerTicket } from "./timer-registry.js";

const debug = createDebug("hook-scheduler:dispatch");

export type DispatchOutcome =
  | {
      id: string;
      /** missing: deleted before it fired. superseded: re-scheduled since this timer was armed. */
      status: "skipped";
      reason: "missing" | "superseded";
    }
  | {
      id: string;
      /** The record could not be read; nothing was delivered and the record is left in place. */
      status: "lookup_failed";
      error: string;
    }
  | {
      id: string;
      status: "delivered" | "delivery_failed";
      deliveryError?: string;
      cleanup: "ok" | "failed";
      cleanupError?: string;
    };

export interface DispatchWorkerDeps {
  store: MessageStore;
  registry: TimerRegistry;
  webhook: WebhookClient;
  /** Observer for every finished dispatch. */
  onOutcome?: (outcome: DispatchOutcome) => void;
}

export interface DispatchWorker {
  dispatch(ticket: TimerTicket): Promise<DispatchOutcome>;
}

export function createDispatchWorker(deps: DispatchWorkerDeps): DispatchWorker {
  const { store, registry, webhook, onOutcome } = deps;

  async function run(ticket: TimerTicket): Promise<DispatchOutcome> {
    const { id } = ticket;

    let found: StoredMessage | null;
    try {
      found = await store.get(id);
    } catch (err) {
      registry.release(ticket);
      const error = errorMessage(err);
      console.error(
        `[dispatch] ${id} fired but could not be read (${error}); it stays stored without a timer until the next restart`,
      );
      return { id, status: "lookup_failed", error };
    }

    if (!found) {
      registry.release(ticket);
      debug("%s fired but is no longer stored; skipping", id);
      return { id, status: "skipped", reason: "missing" };
    }

    const { message, revision } = found;
    if (
      fireAtOf(message).getTime() !== ticket.fireAt.getTime() ||
      !registry.isCurrent(ticket)
    ) {
      registry.release(ticket);
      debug("%s was re-scheduled after this timer was armed; skipping", id);
      return { id, status: "skipped", reason: "superseded" };
    }

    let status: "delivered" | "delivery_failed" = "delivered";
    let deliveryError: string | undefined;
    try {
      await webhook.deliver(message.webhookUrl, message.payload);
      debug("webhook delivered for %s", id);
    } catch (err) {
      status = "delivery_failed";
      deliveryError = errorMessage(err);
      debug("webhook failed for %s: %s", id, deliveryError);
    }

    let cleanup: "ok" | "failed" = "ok";
    let cleanupError: string | undefined;
    try {
      await store.delete(id, revision);
    } catch (err) {
      cleanup = "failed";
      cleanupError = errorMessage(err);
      debug("could not remove %s from store after dispatch: %s", id, cleanupError);
    } finally {
      registry.release(ticket);
    }

    return { id, status, deliveryError, cleanup, cleanupError };
  }

  return {
    async dispatch(ticket: TimerTicket): Promise<DispatchOutcome> {
      const outcome = await run(ticket);
      onOutcome?.(outcome);
      return outcome;
    },
  };
}
